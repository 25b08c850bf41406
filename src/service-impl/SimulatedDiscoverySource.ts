/**
 * src/service-impl/SimulatedDiscoverySource.ts
 *
 * 没有射频硬件时的发现源：
 * - 按配置的 beacon 坐标和一个“真实”目标位置，用路径损耗模型反推 RSSI
 * - 每 intervalMs 轮流广播一个 beacon（和真实扫描一样会重复出现，去重交给 registry）
 */

import LocatorError, { ELocatorError } from "../lib/errors/LocatorError";
import type IDiscoverySource from "../service-api/IDiscoverySource";
import type { DiscoveredDevice, DiscoveryHandlers } from "../service-api/IDiscoverySource";
import { signalStrengthAt, type PathLossModel } from "../utils/rangeEstimator";
import type { ReferencePosition } from "../utils/trilateration";

export interface SimulatedBeacon {
  identity: string;
  displayName: string;
  position: ReferencePosition;
}

export interface SimulatedDiscoveryOptions {
  beacons: readonly SimulatedBeacon[];
  target: ReferencePosition;
  pathLoss: PathLossModel;
  intervalMs: number;
}

/**
 * simulateReading：目标点处收到某个 beacon 的 RSSI（取整到 dBm）
 */
export function simulateReading(
  beacon: SimulatedBeacon,
  target: ReferencePosition,
  pathLoss: PathLossModel
): DiscoveredDevice {
  // 贴脸时距离为 0，log10 会发散，按 1cm 处理
  const distance = Math.max(
    Math.hypot(beacon.position.x - target.x, beacon.position.y - target.y),
    0.01
  );
  return {
    identity: beacon.identity,
    displayName: beacon.displayName,
    signalStrength: Math.round(
      signalStrengthAt(distance, pathLoss.referenceRssiAt1m, pathLoss.exponent)
    ),
  };
}

export default class SimulatedDiscoverySource implements IDiscoverySource {
  private timer: NodeJS.Timeout | null = null;
  private consumed = false;
  private cursor = 0;

  constructor(private readonly options: SimulatedDiscoveryOptions) {}

  scan(handlers: DiscoveryHandlers): () => void {
    if (this.consumed) {
      throw new LocatorError(ELocatorError.ScanError, "discovery source cannot be restarted");
    }
    this.consumed = true;

    const { beacons, target, pathLoss, intervalMs } = this.options;
    if (beacons.length === 0) {
      handlers.onError(new LocatorError(ELocatorError.ScanError, "no simulated beacons configured"));
      return () => undefined;
    }

    console.log(
      `[Discovery] simulating ${beacons.length} beacons around (${target.x}, ${target.y})`
    );

    this.timer = setInterval(() => {
      const beacon = beacons[this.cursor % beacons.length];
      this.cursor++;
      handlers.onDevice(simulateReading(beacon, target, pathLoss));
    }, intervalMs);

    return () => {
      if (this.timer == null) return;
      clearInterval(this.timer);
      this.timer = null;
    };
  }
}
