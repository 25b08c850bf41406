/**
 * src/service-config/LocatorConfig.ts
 *
 * 静态配置：
 * - 三个参考坐标（按发现槽位 0/1/2，不按 beacon identity）
 * - 路径损耗参数 A / n
 * - beacon 名称过滤子串
 * - 上报间隔、上报地址
 * - 权限结果、发现源
 *
 * 加载顺序：
 * DEFAULT_CONFIG <- config/locator.json <- 环境变量
 *   LOCATOR_SINK_URL / LOCATOR_DISCOVERY_URL / LOCATOR_REPORT_INTERVAL
 *
 * 文件不存在时直接用默认值；文件存在但格式不对抛 InvalidConfig。
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import LocatorError, { ELocatorError, describeError } from "../lib/errors/LocatorError";
import type { PermissionGrants } from "../service-api/IPermissionGate";
import type { SimulatedBeacon } from "../service-impl/SimulatedDiscoverySource";
import { DEFAULT_PATH_LOSS, type PathLossModel } from "../utils/rangeEstimator";
import type { ReferencePosition, ReferenceTriple } from "../utils/trilateration";

export type DiscoveryConfig =
  | { kind: "websocket"; url: string }
  | {
      kind: "simulated";
      target: ReferencePosition;
      beacons: SimulatedBeacon[];
      intervalMs: number;
    };

export interface LocatorConfig {
  referencePositions: ReferenceTriple;
  pathLoss: PathLossModel;
  beaconNameFilter: string;
  reportIntervalSeconds: number;
  sinkUrl: string;
  permissions: PermissionGrants;
  discovery: DiscoveryConfig;
}

export const DEFAULT_CONFIG_PATH = "config/locator.json";

export const DEFAULT_CONFIG: LocatorConfig = {
  referencePositions: [
    { x: 0, y: 0 },
    { x: 5, y: 0 },
    { x: 0, y: 5 },
  ],
  pathLoss: DEFAULT_PATH_LOSS,
  beaconNameFilter: "ESP32",
  reportIntervalSeconds: 5,
  sinkUrl: "http://localhost:8080/api/update_position",
  permissions: { location: true, bluetoothScan: true, bluetoothConnect: true },
  discovery: { kind: "websocket", url: "ws://localhost:8081/ws" },
};

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function invalid(path: string, expected: string): LocatorError {
  const where = path ? `config.${path}` : "config";
  return new LocatorError(ELocatorError.InvalidConfig, `${where}: expected ${expected}`);
}

function readNumber(value: unknown, path: string, fallback: number): number {
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isFinite(value)) throw invalid(path, "a finite number");
  return value;
}

function readString(value: unknown, path: string, fallback: string): string {
  if (value === undefined) return fallback;
  if (typeof value !== "string") throw invalid(path, "a string");
  return value;
}

function readBoolean(value: unknown, path: string, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  if (typeof value !== "boolean") throw invalid(path, "a boolean");
  return value;
}

function readPosition(value: unknown, path: string): ReferencePosition {
  if (!isRecord(value)) throw invalid(path, "an {x, y} object");
  const x = value.x;
  const y = value.y;
  if (typeof x !== "number" || !Number.isFinite(x)) throw invalid(`${path}.x`, "a finite number");
  if (typeof y !== "number" || !Number.isFinite(y)) throw invalid(`${path}.y`, "a finite number");
  return { x, y };
}

function readReferencePositions(value: unknown): ReferenceTriple {
  if (value === undefined) return DEFAULT_CONFIG.referencePositions;
  if (!Array.isArray(value) || value.length !== 3) {
    throw invalid("referencePositions", "exactly three positions");
  }
  return [
    readPosition(value[0], "referencePositions[0]"),
    readPosition(value[1], "referencePositions[1]"),
    readPosition(value[2], "referencePositions[2]"),
  ];
}

function readDiscovery(value: unknown): DiscoveryConfig {
  if (value === undefined) return DEFAULT_CONFIG.discovery;
  if (!isRecord(value)) throw invalid("discovery", "an object");

  if (value.kind === "websocket") {
    const url = readString(value.url, "discovery.url", "");
    if (!url) throw invalid("discovery.url", "a non-empty string");
    return { kind: "websocket", url };
  }

  if (value.kind === "simulated") {
    if (!Array.isArray(value.beacons)) throw invalid("discovery.beacons", "an array");
    const beacons = value.beacons.map((b: unknown, i: number): SimulatedBeacon => {
      const path = `discovery.beacons[${i}]`;
      if (!isRecord(b)) throw invalid(path, "an object");
      const identity = readString(b.identity, `${path}.identity`, "");
      if (!identity) throw invalid(`${path}.identity`, "a non-empty string");
      return {
        identity,
        displayName: readString(b.displayName, `${path}.displayName`, identity),
        position: readPosition(b.position, `${path}.position`),
      };
    });
    const intervalMs = readNumber(value.intervalMs, "discovery.intervalMs", 500);
    if (intervalMs <= 0) throw invalid("discovery.intervalMs", "a positive number");
    return {
      kind: "simulated",
      target: readPosition(value.target, "discovery.target"),
      beacons,
      intervalMs,
    };
  }

  throw invalid("discovery.kind", '"websocket" or "simulated"');
}

/**
 * parseConfig：
 * - 输入：JSON.parse 后的原始对象 + 环境变量
 * - 输出：完整且校验过的 LocatorConfig
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = {}): LocatorConfig {
  if (!isRecord(raw)) throw invalid("", "a JSON object");

  const pathLossRaw = raw.pathLoss ?? {};
  if (!isRecord(pathLossRaw)) throw invalid("pathLoss", "an object");
  const exponent = readNumber(pathLossRaw.exponent, "pathLoss.exponent", DEFAULT_PATH_LOSS.exponent);
  if (exponent <= 0) throw invalid("pathLoss.exponent", "a positive number");

  const permissionsRaw = raw.permissions ?? {};
  if (!isRecord(permissionsRaw)) throw invalid("permissions", "an object");

  const config: LocatorConfig = {
    referencePositions: readReferencePositions(raw.referencePositions),
    pathLoss: {
      referenceRssiAt1m: readNumber(
        pathLossRaw.referenceRssiAt1m,
        "pathLoss.referenceRssiAt1m",
        DEFAULT_PATH_LOSS.referenceRssiAt1m
      ),
      exponent,
    },
    beaconNameFilter: readString(raw.beaconNameFilter, "beaconNameFilter", DEFAULT_CONFIG.beaconNameFilter),
    reportIntervalSeconds: readNumber(
      raw.reportIntervalSeconds,
      "reportIntervalSeconds",
      DEFAULT_CONFIG.reportIntervalSeconds
    ),
    sinkUrl: readString(raw.sinkUrl, "sinkUrl", DEFAULT_CONFIG.sinkUrl),
    permissions: {
      location: readBoolean(permissionsRaw.location, "permissions.location", true),
      bluetoothScan: readBoolean(permissionsRaw.bluetoothScan, "permissions.bluetoothScan", true),
      bluetoothConnect: readBoolean(permissionsRaw.bluetoothConnect, "permissions.bluetoothConnect", true),
    },
    discovery: readDiscovery(raw.discovery),
  };

  if (env.LOCATOR_SINK_URL) {
    config.sinkUrl = env.LOCATOR_SINK_URL;
  }
  if (env.LOCATOR_DISCOVERY_URL) {
    config.discovery = { kind: "websocket", url: env.LOCATOR_DISCOVERY_URL };
  }
  if (env.LOCATOR_REPORT_INTERVAL) {
    config.reportIntervalSeconds = Number(env.LOCATOR_REPORT_INTERVAL);
  }

  if (!Number.isFinite(config.reportIntervalSeconds) || config.reportIntervalSeconds <= 0) {
    throw invalid("reportIntervalSeconds", "a positive number");
  }
  if (!config.sinkUrl) throw invalid("sinkUrl", "a non-empty string");

  return config;
}

/**
 * loadConfig：
 * - 读取 JSON 配置文件（相对路径按 cwd 解析）
 * - 文件不存在：打印提示，使用默认值（环境变量仍然生效）
 */
export function loadConfig(
  path: string = DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env
): LocatorConfig {
  const file = resolve(path);

  if (!existsSync(file)) {
    console.log(`[Config] ${file} not found, using defaults`);
    return parseConfig({}, env);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, "utf8"));
  } catch (e) {
    throw new LocatorError(
      ELocatorError.InvalidConfig,
      `cannot read ${file}: ${describeError(e)}`,
      { cause: e }
    );
  }

  console.log(`[Config] loaded ${file}`);
  return parseConfig(raw, env);
}

/**
 * simulatedDiscovery：
 * - 用三个参考坐标生成模拟 beacon（名字带上过滤子串，保证能通过名称过滤）
 * - 供命令行 --simulate 使用
 */
export function simulatedDiscovery(
  config: LocatorConfig,
  target: ReferencePosition = { x: 1, y: 1 }
): DiscoveryConfig {
  return {
    kind: "simulated",
    target,
    beacons: config.referencePositions.map((position, i) => ({
      identity: `sim-${i + 1}`,
      displayName: `${config.beaconNameFilter}-Beacon-${i + 1}`,
      position,
    })),
    intervalMs: 500,
  };
}
