/**
 * src/service-api/ILocatorSessionService.ts
 *
 * ILocatorSessionService 的职责（接口层面）：
 * - 一次扫描会话的完整生命周期：start -> (发现/求解/上报) -> stop / dispose
 * - 持有 registry、当前上报计划、发现源订阅；不依赖任何全局单例
 * - 对外只暴露不可变快照：{ phase, status, beacons, position, positionText, lastError }
 *
 * 端到端数据流：
 * start()
 *   -> permissionGate.request()
 *   -> source.scan({ onDevice, onError })
 *   -> onDevice -> 名称过滤 -> registry.observe
 *   -> 新增且 size >= 3 -> calculatePosition()
 *   -> 前三个槽位 distanceFrom -> solveTrilateration
 *   -> reporter.schedule(position, interval, sink)
 *   -> setState(快照) -> 展示层 subscribe
 */

import type { ELocatorError } from "../lib/errors/LocatorError";
import type { PositionEstimate } from "../utils/trilateration";
import type { BeaconObservation } from "./IBeaconRegistryService";
import type { DiscoveredDevice } from "./IDiscoverySource";

export enum ELocatorPhase {
  Initializing = "initializing",
  Scanning = "scanning",
  /** 权限被拒，没有开始扫描 */
  Blocked = "blocked",
  /** 发现源报错终止 */
  Failed = "failed",
  Stopped = "stopped",
}

export interface ILocatorState {
  phase: ELocatorPhase;
  /** 人类可读的当前状态 */
  status: string;
  /** 已跟踪的 beacon（名称 + RSSI 供展示） */
  beacons: readonly BeaconObservation[];
  /** 最近一次求解成功的位置 */
  position: PositionEstimate | null;
  /** 位置 / 求解失败的文本 */
  positionText: string;
  lastError: { kind: ELocatorError; message: string } | null;
}

export default interface ILocatorSessionService {
  getState(): ILocatorState;

  subscribe(listener: (s: ILocatorState) => void): () => void;

  /** 检查权限并开始消费发现源；重复调用无副作用 */
  start(): Promise<void>;

  /** 处理一条发现事件（发现源回调入口） */
  handleDevice(device: DiscoveredDevice): void;

  /**
   * 用 registry 的前三个槽位求解并重新安排上报。
   * 不足三个或几何退化时返回 null，结果写入 positionText。
   */
  calculatePosition(): PositionEstimate | null;

  /** 退订发现源并取消上报计划 */
  stop(): void;

  /** stop + 等待在途上报结束 */
  dispose(): Promise<void>;
}
