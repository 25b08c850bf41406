/**
 * src/service-impl/PositionReportService.ts
 *
 * PositionReportService 的职责：
 * 1) 同一时间最多一个上报计划；schedule 会先取消旧计划
 * 2) 第一次上报发生在 t0 + interval，之后每 interval 一次
 * 3) 定时回调只 enqueue 一个 push 任务，任务之间可以并发、无顺序保证
 * 4) 失败写入 state + 日志，计划照常继续
 *
 * 取消令牌：
 * - generation 每次 schedule/cancel 自增
 * - 定时回调里比对自己捕获的 generation，不一致直接丢弃
 *   这样即使旧定时器的回调已经排进事件循环，也不会推送旧计划的位置
 */

import StateBase from "../lib/service/StateBase";
import LocatorError, { ELocatorError, describeError } from "../lib/errors/LocatorError";
import type IPositionReportService from "../service-api/IPositionReportService";
import type { IPositionReportState } from "../service-api/IPositionReportService";
import type IPositionSink from "../service-api/IPositionSink";
import type { PushOutcome } from "../service-api/IPositionSink";
import type { PositionEstimate } from "../utils/trilateration";

export default class PositionReportService
  extends StateBase<IPositionReportState>
  implements IPositionReportService
{
  private timer: NodeJS.Timeout | null = null;

  private generation = 0;

  /**
   * inFlight：
   * - 数据来源：enqueue 时加入，任务结束时移除
   * - 用途：flush()/dispose() 等待在途请求
   */
  private inFlight = new Set<Promise<void>>();

  constructor() {
    super({
      active: false,
      target: null,
      intervalSeconds: null,
      pushCount: 0,
      failureCount: 0,
      lastOutcome: null,
      lastReportedAt: null,
    });
  }

  schedule(position: PositionEstimate, intervalSeconds: number, sink: IPositionSink): void {
    if (!Number.isFinite(intervalSeconds) || intervalSeconds <= 0) {
      throw new LocatorError(
        ELocatorError.InvalidConfig,
        `report interval must be a positive number of seconds, got ${intervalSeconds}`
      );
    }

    this.clearTimer();
    const token = ++this.generation;

    this.timer = setInterval(() => {
      if (token !== this.generation) return;
      this.enqueue(position, sink);
    }, intervalSeconds * 1000);

    this.setState({ active: true, target: position, intervalSeconds });

    console.log(
      `[Report] streaming (${position.x.toFixed(2)}, ${position.y.toFixed(2)}) every ${intervalSeconds}s`
    );
  }

  cancel(): void {
    this.generation++;
    if (this.clearTimer()) {
      console.log("[Report] schedule canceled");
    }
    if (this.getState().active) {
      this.setState({ active: false });
    }
  }

  async flush(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  async dispose(): Promise<void> {
    this.cancel();
    await this.flush();
  }

  private clearTimer(): boolean {
    if (this.timer == null) return false;
    clearInterval(this.timer);
    this.timer = null;
    return true;
  }

  /**
   * enqueue：
   * - 定时回调里唯一做的事
   * - 不 await，push 耗时不会拖慢节拍
   */
  private enqueue(position: PositionEstimate, sink: IPositionSink): void {
    const task: Promise<void> = this.dispatch(position, sink)
      .catch((e) => {
        console.error("[Report] dispatch error:", e);
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  private async dispatch(position: PositionEstimate, sink: IPositionSink): Promise<void> {
    let outcome: PushOutcome;
    try {
      outcome = await sink.push(position);
    } catch (e) {
      outcome = { ok: false, error: describeError(e) };
    }

    if (outcome.ok) {
      console.log("[Report] Position sent successfully!");
    } else if (outcome.status !== undefined) {
      console.warn(`[Report] Failed to send position. Status code: ${outcome.status}`);
    } else {
      console.warn(`[Report] Error sending position: ${outcome.error}`);
    }

    this.setState((prev) => ({
      pushCount: prev.pushCount + 1,
      failureCount: outcome.ok ? prev.failureCount : prev.failureCount + 1,
      lastOutcome: outcome,
      lastReportedAt: Date.now(),
    }));
  }
}
