/**
 * src/lib/env/Environment.ts
 *
 * Environment 的职责：
 * - 按 LocatorConfig 创建一套完整的服务实例（发现源、权限门、上报通道、会话）
 * - 不注册任何全局容器：每个 Environment 都是独立的一套，测试里可以同时存在多个
 *
 * 启动链路：
 * main.ts
 *   -> loadConfig()
 *   -> new Environment({ config })
 *   -> env.start()            // 会话开始扫描
 *   -> env.dispose()          // 退出时取消定时器、等待在途上报
 */

import type IDiscoverySource from "../../service-api/IDiscoverySource";
import type IPermissionGate from "../../service-api/IPermissionGate";
import type IPositionSink from "../../service-api/IPositionSink";
import type { DiscoveryConfig, LocatorConfig } from "../../service-config/LocatorConfig";
import ConfigPermissionGate from "../../service-impl/ConfigPermissionGate";
import HttpPositionSink from "../../service-impl/HttpPositionSink";
import LocatorSessionService from "../../service-impl/LocatorSessionService";
import SimulatedDiscoverySource from "../../service-impl/SimulatedDiscoverySource";
import WebSocketDiscoverySource from "../../service-impl/WebSocketDiscoverySource";
import type { PathLossModel } from "../../utils/rangeEstimator";

export interface IOptions {
  config: LocatorConfig;

  /** 以下三个外部协作方可替换；不传按 config 创建 */
  source?: IDiscoverySource;
  permissionGate?: IPermissionGate;
  sink?: IPositionSink;
}

export function createDiscoverySource(
  discovery: DiscoveryConfig,
  pathLoss: PathLossModel
): IDiscoverySource {
  switch (discovery.kind) {
    case "websocket":
      return new WebSocketDiscoverySource(discovery.url);
    case "simulated":
      return new SimulatedDiscoverySource({
        beacons: discovery.beacons,
        target: discovery.target,
        pathLoss,
        intervalMs: discovery.intervalMs,
      });
  }
}

export default class Environment {
  readonly config: LocatorConfig;

  readonly session: LocatorSessionService;

  constructor(options: IOptions) {
    const { config } = options;
    this.config = config;

    this.session = new LocatorSessionService({
      referencePositions: config.referencePositions,
      pathLoss: config.pathLoss,
      beaconNameFilter: config.beaconNameFilter,
      reportIntervalSeconds: config.reportIntervalSeconds,
      source: options.source ?? createDiscoverySource(config.discovery, config.pathLoss),
      permissionGate: options.permissionGate ?? new ConfigPermissionGate(config.permissions),
      sink: options.sink ?? new HttpPositionSink(config.sinkUrl),
    });
  }

  async start(): Promise<void> {
    console.log("[Environment] started");
    await this.session.start();
  }

  async dispose(): Promise<void> {
    await this.session.dispose();
  }
}
