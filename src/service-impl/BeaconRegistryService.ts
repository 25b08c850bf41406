/**
 * src/service-impl/BeaconRegistryService.ts
 *
 * BeaconRegistryService 的职责：
 * - 维护 beacons（按发现顺序、按 identity 去重）
 * - identities 作为索引，O(1) 判断是否见过
 *
 * 事实：
 * - 不保留同一设备的历史读数，第一次的 RSSI 就是最终值
 * - 不做截断：一次扫描会话内只增不减
 */

import StateBase from "../lib/service/StateBase";
import type IBeaconRegistryService from "../service-api/IBeaconRegistryService";
import type {
  BeaconObservation,
  IBeaconRegistryState,
  ObserveResult,
} from "../service-api/IBeaconRegistryService";

export default class BeaconRegistryService
  extends StateBase<IBeaconRegistryState>
  implements IBeaconRegistryService
{
  /**
   * identities：
   * - 数据来源：observe 成功追加时写入
   * - 用途：去重判断
   */
  private identities = new Set<string>();

  constructor() {
    super({ beacons: Object.freeze([]) });
  }

  get size(): number {
    return this.identities.size;
  }

  has(identity: string): boolean {
    return this.identities.has(identity);
  }

  observe(identity: string, displayName: string, signalStrength: number): ObserveResult {
    if (this.identities.has(identity)) {
      return { added: false, size: this.size };
    }

    const prev = this.getState().beacons;
    const observation: BeaconObservation = Object.freeze({
      identity,
      displayName,
      signalStrength,
      discoveryOrder: prev.length,
    });

    this.identities.add(identity);

    // 新数组，保证订阅者手里的旧快照不被改动
    this.setState({ beacons: Object.freeze([...prev, observation]) });

    console.log(
      `[Registry] added ${identity} (${displayName}) rssi=${signalStrength} #${observation.discoveryOrder}`
    );

    return { added: true, size: this.size };
  }

  slots(count: number): readonly BeaconObservation[] {
    return this.getState().beacons.slice(0, count);
  }
}
