/**
 * src/service-impl/LocatorSessionService.ts
 *
 * LocatorSessionService 的职责：
 * 1) 会话启动：权限检查 -> 订阅发现源
 * 2) 发现事件：名称过滤 -> registry 去重 -> 达到 3 个后每次新增都重新求解
 * 3) 求解成功：交给 PositionReportService 重新安排定时上报
 * 4) 所有结果都转成状态快照，只有权限拒绝 / 扫描错误会让会话停下
 *
 * 槽位映射（事实）：
 * - 参考坐标按“发现顺序”配对：第 1 个发现的 beacon 对应 referencePositions[0]，以此类推
 * - 与 beacon 的 identity 无关；发现顺序变了，映射就跟着变
 */

import LocatorError, { ELocatorError, describeError } from "../lib/errors/LocatorError";
import StateBase from "../lib/service/StateBase";
import type IBeaconRegistryService from "../service-api/IBeaconRegistryService";
import type IDiscoverySource from "../service-api/IDiscoverySource";
import type { DiscoveredDevice } from "../service-api/IDiscoverySource";
import { ELocatorPhase } from "../service-api/ILocatorSessionService";
import type ILocatorSessionService from "../service-api/ILocatorSessionService";
import type { ILocatorState } from "../service-api/ILocatorSessionService";
import type IPermissionGate from "../service-api/IPermissionGate";
import type IPositionReportService from "../service-api/IPositionReportService";
import type IPositionSink from "../service-api/IPositionSink";
import type { PathLossModel } from "../utils/rangeEstimator";
import { distanceFrom } from "../utils/rangeEstimator";
import {
  solveTrilateration,
  type DistanceTriple,
  type PositionEstimate,
  type ReferenceTriple,
} from "../utils/trilateration";
import BeaconRegistryService from "./BeaconRegistryService";
import PositionReportService from "./PositionReportService";

/** 求解所需的 beacon 数量 */
export const REQUIRED_BEACONS = 3;

export const STATUS_TEXT = {
  initializing: "Initializing beacon scanning...",
  scanning: "Scanning for beacons...",
  permissionDenied: "Permissions not granted. Please enable them to scan for beacons.",
  stopped: "Scanning stopped.",
  found: (count: number, filter: string) =>
    filter ? `Found ${count} ${filter} beacons!` : `Found ${count} beacons!`,
  scanError: (message: string) => `Error: ${message}`,
};

export const POSITION_TEXT = {
  insufficient: `Not enough beacons to calculate position. Need at least ${REQUIRED_BEACONS}.`,
  degenerate: "Error: Unable to calculate position (denominator=0)",
  estimate: (p: PositionEstimate) =>
    `Estimated Position: (X: ${p.x.toFixed(2)}, Y: ${p.y.toFixed(2)})`,
};

export interface LocatorSessionOptions {
  referencePositions: ReferenceTriple;
  pathLoss: PathLossModel;
  beaconNameFilter: string;
  reportIntervalSeconds: number;

  source: IDiscoverySource;
  permissionGate: IPermissionGate;
  sink: IPositionSink;

  /** 不传则会话自己创建；测试可以注入 */
  registry?: IBeaconRegistryService;
  reporter?: IPositionReportService;
}

export default class LocatorSessionService
  extends StateBase<ILocatorState>
  implements ILocatorSessionService
{
  readonly registry: IBeaconRegistryService;
  readonly reporter: IPositionReportService;

  private started = false;

  /** 发现源返回的 stop()；null 表示当前没有订阅 */
  private stopScan: (() => void) | null = null;

  constructor(private readonly options: LocatorSessionOptions) {
    super({
      phase: ELocatorPhase.Initializing,
      status: STATUS_TEXT.initializing,
      beacons: Object.freeze([]),
      position: null,
      positionText: "",
      lastError: null,
    });

    this.registry = options.registry ?? new BeaconRegistryService();
    this.reporter = options.reporter ?? new PositionReportService();
  }

  async start(): Promise<void> {
    if (this.started) {
      console.log("[Session] already started");
      return;
    }
    this.started = true;

    let granted: boolean;
    try {
      granted = await this.options.permissionGate.request();
    } catch (e) {
      console.warn("[Session] permission request failed:", describeError(e));
      granted = false;
    }

    // 等权限期间可能已经被 stop()
    if (this.getState().phase === ELocatorPhase.Stopped) return;

    if (!granted) {
      this.setState({
        phase: ELocatorPhase.Blocked,
        status: STATUS_TEXT.permissionDenied,
        lastError: {
          kind: ELocatorError.PermissionDenied,
          message: STATUS_TEXT.permissionDenied,
        },
      });
      return;
    }

    this.setState({ phase: ELocatorPhase.Scanning, status: STATUS_TEXT.scanning });
    console.log("[Session] scanning, name filter:", JSON.stringify(this.options.beaconNameFilter));

    try {
      this.stopScan = this.options.source.scan({
        onDevice: (device) => this.handleDevice(device),
        onError: (error) => this.handleScanError(error),
      });
    } catch (e) {
      this.handleScanError(e);
    }

    // 发现源可能在 scan() 内部就同步报错
    if (this.getState().phase !== ELocatorPhase.Scanning) {
      this.unsubscribeSource();
    }
  }

  handleDevice(device: DiscoveredDevice): void {
    if (this.getState().phase !== ELocatorPhase.Scanning) return;
    if (!device.displayName.includes(this.options.beaconNameFilter)) return;

    const { added, size } = this.registry.observe(
      device.identity,
      device.displayName,
      device.signalStrength
    );
    if (!added) return;

    this.setState({
      status: STATUS_TEXT.found(size, this.options.beaconNameFilter),
      beacons: this.registry.getState().beacons,
    });

    if (size >= REQUIRED_BEACONS) {
      this.calculatePosition();
    }
  }

  calculatePosition(): PositionEstimate | null {
    // 停止之后不再求解，也不再安排上报定时器
    if (this.getState().phase === ELocatorPhase.Stopped) return null;

    const slots = this.registry.slots(REQUIRED_BEACONS);
    if (slots.length < REQUIRED_BEACONS) {
      this.setState({
        positionText: POSITION_TEXT.insufficient,
        lastError: {
          kind: ELocatorError.InsufficientBeacons,
          message: POSITION_TEXT.insufficient,
        },
      });
      return null;
    }

    const { referenceRssiAt1m, exponent } = this.options.pathLoss;
    const [first, second, third] = slots;
    const distances: DistanceTriple = [
      distanceFrom(first.signalStrength, referenceRssiAt1m, exponent),
      distanceFrom(second.signalStrength, referenceRssiAt1m, exponent),
      distanceFrom(third.signalStrength, referenceRssiAt1m, exponent),
    ];

    const result = solveTrilateration(this.options.referencePositions, distances);
    if (!result.ok) {
      console.warn("[Session]", result.error.message);
      this.setState({
        positionText: POSITION_TEXT.degenerate,
        lastError: { kind: result.error.kind, message: result.error.message },
      });
      return null;
    }

    const { position } = result;
    this.setState({
      position,
      positionText: POSITION_TEXT.estimate(position),
      lastError: null,
    });
    console.log("[Session]", POSITION_TEXT.estimate(position));

    this.reporter.schedule(position, this.options.reportIntervalSeconds, this.options.sink);
    return position;
  }

  stop(): void {
    this.unsubscribeSource();
    this.reporter.cancel();

    if (this.getState().phase !== ELocatorPhase.Stopped) {
      this.setState({ phase: ELocatorPhase.Stopped, status: STATUS_TEXT.stopped });
      console.log("[Session] stopped");
    }
  }

  async dispose(): Promise<void> {
    this.stop();
    await this.reporter.dispose();
  }

  private handleScanError(error: unknown): void {
    const err =
      error instanceof LocatorError
        ? error
        : new LocatorError(ELocatorError.ScanError, describeError(error), { cause: error });

    console.warn("[Session] scan error:", err.message);
    this.unsubscribeSource();

    // 已经 stop 的会话不再改状态
    if (this.getState().phase === ELocatorPhase.Stopped) return;

    this.setState({
      phase: ELocatorPhase.Failed,
      status: STATUS_TEXT.scanError(err.message),
      lastError: { kind: ELocatorError.ScanError, message: err.message },
    });
  }

  private unsubscribeSource(): void {
    const stop = this.stopScan;
    this.stopScan = null;
    stop?.();
  }
}
