/**
 * src/service-api/IPositionReportService.ts
 *
 * IPositionReportService 的职责（接口层面）：
 * - schedule(position, intervalSeconds, sink)：取消旧计划，按固定间隔反复上报同一个位置
 * - 定时器只负责“投递任务”，不等待上一次 push 完成
 * - 上报失败只记录，不停止、不重置计划
 *
 * 数据流：
 * LocatorSessionService 求解成功
 *   -> schedule(position, 5, sink)
 *   -> 每 5 秒：enqueue push 任务 -> sink.push(position)
 *   -> PushOutcome -> setState(统计) -> subscribe
 */

import type { PositionEstimate } from "../utils/trilateration";
import type IPositionSink from "./IPositionSink";
import type { PushOutcome } from "./IPositionSink";

export interface IPositionReportState {
  /** 是否有生效中的上报计划 */
  active: boolean;
  /** 当前计划锁定的位置（schedule 时捕获，之后不变） */
  target: PositionEstimate | null;
  intervalSeconds: number | null;
  pushCount: number;
  failureCount: number;
  lastOutcome: PushOutcome | null;
  /** 最近一次 push 结束的时间戳（ms） */
  lastReportedAt: number | null;
}

export default interface IPositionReportService {
  getState(): IPositionReportState;

  subscribe(listener: (s: IPositionReportState) => void): () => void;

  schedule(position: PositionEstimate, intervalSeconds: number, sink: IPositionSink): void;

  /** 取消当前计划；不会中断已经发出的 push */
  cancel(): void;

  /** 等待所有在途 push 结束 */
  flush(): Promise<void>;

  /** cancel + flush；之后不会再有任何定时器 */
  dispose(): Promise<void>;
}
