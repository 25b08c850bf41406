// src/main.ts
/**
 * 入口文件职责：
 * 1) 解析命令行：--config <path>、--simulate
 * 2) 加载配置，构建 Environment（一次扫描会话）
 * 3) 订阅会话快照，把状态变化打印出来（展示层的最小实现）
 * 4) SIGINT / SIGTERM 时 dispose，保证没有残留定时器
 *
 * 数据流概览：
 * config/locator.json -> loadConfig -> Environment -> session.start()
 *   -> 发现 / 求解 / 定时上报 -> session.subscribe -> 控制台
 */

import Environment from "./lib/env/Environment";
import { describeError } from "./lib/errors/LocatorError";
import type { ILocatorState } from "./service-api/ILocatorSessionService";
import { DEFAULT_CONFIG_PATH, loadConfig, simulatedDiscovery } from "./service-config/LocatorConfig";

const args = process.argv.slice(2);

function getArg(flag: string, fallback?: string) {
  const idx = args.indexOf(flag);
  if (idx === -1) return fallback;
  const val = args[idx + 1];
  if (!val || val.startsWith("--")) return fallback;
  return val;
}

function hasFlag(flag: string) {
  return args.includes(flag);
}

function usage() {
  console.log(`beacon-locator [options]

Options:
  --config <path>   configuration file (default ${DEFAULT_CONFIG_PATH})
  --simulate        use simulated beacons at the configured reference positions
  --help            show this message`);
}

function printState(state: ILocatorState, prev: ILocatorState | null) {
  if (!prev || state.status !== prev.status) {
    console.log(`[Status] ${state.status}`);
  }
  if (!prev || state.beacons !== prev.beacons) {
    for (const b of state.beacons) {
      console.log(`  #${b.discoveryOrder} ${b.displayName} (${b.identity})  RSSI: ${b.signalStrength}`);
    }
  }
  if (state.positionText && (!prev || state.positionText !== prev.positionText)) {
    console.log(`[Status] ${state.positionText}`);
  }
}

async function init() {
  if (hasFlag("--help")) {
    usage();
    return;
  }

  const config = loadConfig(getArg("--config", DEFAULT_CONFIG_PATH));
  if (hasFlag("--simulate")) {
    config.discovery = simulatedDiscovery(config);
  }

  const env = new Environment({ config });

  let prev: ILocatorState | null = null;
  printState(env.session.getState(), prev);
  prev = env.session.getState();
  env.session.subscribe((state) => {
    printState(state, prev);
    prev = state;
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[Main] ${signal}, shutting down`);
    env.dispose().then(
      () => process.exit(0),
      (e: unknown) => {
        console.error("[Main] dispose failed:", describeError(e));
        process.exit(1);
      }
    );
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  await env.start();
}

init().catch((e: unknown) => {
  console.error("[Main]", describeError(e));
  process.exitCode = 1;
});
