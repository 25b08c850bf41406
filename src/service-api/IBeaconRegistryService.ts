/**
 * src/service-api/IBeaconRegistryService.ts
 *
 * IBeaconRegistryService 的职责（接口层面）：
 * - 按 identity 去重，保存本次会话里见过的所有 beacon
 * - 保持发现顺序；只增不减，没有删除操作
 * - 不主动触发计算：调用方根据 observe 返回的 size 决定是否进入下一步
 *
 * 数据流（典型）：
 * DiscoverySource -> LocatorSessionService.handleDevice
 *   -> observe(identity, name, rssi)
 *   -> { added, size } -> size >= 3 时会话读取 slots(3) 求解
 *   -> subscribe 回调拿到 { beacons } 快照
 */

/**
 * BeaconObservation：
 * - 某个 identity 第一次出现时创建，之后冻结不变
 * - 同一 identity 的后续读数直接丢弃（先到先得）
 */
export interface BeaconObservation {
  /** 稳定标识（通常是 MAC 或平台设备 id） */
  readonly identity: string;
  readonly displayName: string;
  /** dBm，有符号整数 */
  readonly signalStrength: number;
  /** 发现序号，从 0 开始单调递增 */
  readonly discoveryOrder: number;
}

export interface ObserveResult {
  added: boolean;
  size: number;
}

export interface IBeaconRegistryState {
  beacons: readonly BeaconObservation[];
}

export default interface IBeaconRegistryService {
  getState(): IBeaconRegistryState;

  subscribe(listener: (s: IBeaconRegistryState) => void): () => void;

  /**
   * observe：
   * - identity 已存在：无操作，返回 added=false 和原 size
   * - 否则按到达顺序追加，返回 added=true 和新 size
   */
  observe(identity: string, displayName: string, signalStrength: number): ObserveResult;

  /** 按发现顺序取前 count 个观测 */
  slots(count: number): readonly BeaconObservation[];

  has(identity: string): boolean;

  readonly size: number;
}
