/**
 * src/service-impl/HttpPositionSink.ts
 *
 * HttpPositionSink：
 * - POST {url}，body 为 {"x": <number>, "y": <number>}
 * - Content-Type: application/json
 * - 只有 status === 200 算成功（201/204 也按失败处理）
 *
 * 数据流：
 * PositionReportService 定时触发 -> push(position) -> fetch -> PushOutcome
 */

import type IPositionSink from "../service-api/IPositionSink";
import type { PushOutcome } from "../service-api/IPositionSink";
import { describeError } from "../lib/errors/LocatorError";
import type { PositionEstimate } from "../utils/trilateration";

export default class HttpPositionSink implements IPositionSink {
  constructor(private readonly url: string) {}

  async push(position: PositionEstimate): Promise<PushOutcome> {
    try {
      const resp = await fetch(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ x: position.x, y: position.y }),
      });

      if (resp.status === 200) {
        return { ok: true, status: resp.status };
      }
      return { ok: false, status: resp.status, error: `HTTP ${resp.status} ${resp.statusText}` };
    } catch (e) {
      return { ok: false, error: describeError(e) };
    }
  }
}
