import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ELocatorPhase } from "../../service-api/ILocatorSessionService";
import type { PushOutcome } from "../../service-api/IPositionSink";
import { DEFAULT_CONFIG, simulatedDiscovery, type LocatorConfig } from "../../service-config/LocatorConfig";
import SimulatedDiscoverySource from "../../service-impl/SimulatedDiscoverySource";
import WebSocketDiscoverySource from "../../service-impl/WebSocketDiscoverySource";
import { DEFAULT_PATH_LOSS } from "../../utils/rangeEstimator";
import type { PositionEstimate } from "../../utils/trilateration";
import Environment, { createDiscoverySource } from "./Environment";

describe("createDiscoverySource", () => {
  it("builds a gateway client for websocket discovery", () => {
    const source = createDiscoverySource({ kind: "websocket", url: "ws://gateway.test/ws" }, DEFAULT_PATH_LOSS);
    expect(source).toBeInstanceOf(WebSocketDiscoverySource);
  });

  it("builds a simulator for simulated discovery", () => {
    const source = createDiscoverySource(simulatedDiscovery(DEFAULT_CONFIG), DEFAULT_PATH_LOSS);
    expect(source).toBeInstanceOf(SimulatedDiscoverySource);
  });
});

describe("Environment", () => {
  let env: Environment | null;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    env = null;
  });

  afterEach(async () => {
    await env?.dispose();
    vi.useRealTimers();
  });

  it("locates a simulated target and reports it on schedule", async () => {
    const config: LocatorConfig = { ...DEFAULT_CONFIG, discovery: simulatedDiscovery(DEFAULT_CONFIG) };
    const push = vi.fn(async (_position: PositionEstimate): Promise<PushOutcome> => ({ ok: true, status: 200 }));
    env = new Environment({ config, sink: { push } });

    await env.start();
    vi.advanceTimersByTime(1500);

    const state = env.session.getState();
    expect(state.phase).toBe(ELocatorPhase.Scanning);
    expect(state.status).toBe("Found 3 ESP32 beacons!");
    expect(state.positionText).toBe("Estimated Position: (X: 1.11, Y: 1.11)");

    vi.advanceTimersByTime(5000);
    expect(push).toHaveBeenCalledTimes(1);
    expect(push).toHaveBeenCalledWith(state.position);
  });

  it("stays blocked when the configured permissions are missing", async () => {
    const config: LocatorConfig = {
      ...DEFAULT_CONFIG,
      permissions: { location: false, bluetoothScan: true, bluetoothConnect: true },
      discovery: simulatedDiscovery(DEFAULT_CONFIG),
    };
    env = new Environment({ config });

    await env.start();
    vi.advanceTimersByTime(5000);

    expect(env.session.getState().phase).toBe(ELocatorPhase.Blocked);
    expect(env.session.getState().beacons).toEqual([]);
  });
});
