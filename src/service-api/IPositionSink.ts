/**
 * src/service-api/IPositionSink.ts
 *
 * 上报通道（外部协作方）：把一次位置估计推给远端收集服务。
 * - 成功：HTTP 200
 * - 失败：其它状态码，或请求本身抛异常
 *
 * push 不应该 reject：失败用 PushOutcome 表达。
 * 调度器仍会兜底 catch，防止第三方 sink 抛错打断定时上报。
 */

import type { PositionEstimate } from "../utils/trilateration";

export type PushOutcome =
  | { ok: true; status: number }
  | { ok: false; status?: number; error: string };

export default interface IPositionSink {
  push(position: PositionEstimate): Promise<PushOutcome>;
}
