import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ELocatorError } from "../lib/errors/LocatorError";
import type { DiscoveredDevice } from "../service-api/IDiscoverySource";
import { DEFAULT_PATH_LOSS } from "../utils/rangeEstimator";
import SimulatedDiscoverySource, { simulateReading, type SimulatedBeacon } from "./SimulatedDiscoverySource";

const origin: SimulatedBeacon = { identity: "sim-a", displayName: "ESP32-A", position: { x: 0, y: 0 } };
const far: SimulatedBeacon = { identity: "sim-b", displayName: "ESP32-B", position: { x: 3, y: 4 } };

describe("simulateReading", () => {
  it("loses 20 dB per decade with an exponent of 2", () => {
    const beacon: SimulatedBeacon = { ...origin, position: { x: 10, y: 0 } };
    expect(simulateReading(beacon, { x: 0, y: 0 }, DEFAULT_PATH_LOSS).signalStrength).toBe(-79);
  });

  it("clamps a zero distance to one centimetre", () => {
    expect(simulateReading(origin, { x: 0, y: 0 }, DEFAULT_PATH_LOSS)).toEqual({
      identity: "sim-a",
      displayName: "ESP32-A",
      signalStrength: -19,
    });
  });
});

describe("SimulatedDiscoverySource", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("advertises the beacons in turn", () => {
    const devices: DiscoveredDevice[] = [];
    const source = new SimulatedDiscoverySource({
      beacons: [origin, far],
      target: { x: 0, y: 0 },
      pathLoss: DEFAULT_PATH_LOSS,
      intervalMs: 100,
    });
    const stop = source.scan({ onDevice: (d) => devices.push(d), onError: () => undefined });

    vi.advanceTimersByTime(300);
    stop();

    expect(devices.map((d) => [d.identity, d.signalStrength])).toEqual([
      ["sim-a", -19],
      ["sim-b", -73],
      ["sim-a", -19],
    ]);
  });

  it("leaves no timer behind after stop", () => {
    const onDevice = vi.fn();
    const source = new SimulatedDiscoverySource({
      beacons: [origin],
      target: { x: 1, y: 1 },
      pathLoss: DEFAULT_PATH_LOSS,
      intervalMs: 100,
    });
    const stop = source.scan({ onDevice, onError: () => undefined });

    stop();
    vi.advanceTimersByTime(1000);

    expect(onDevice).not.toHaveBeenCalled();
    expect(vi.getTimerCount()).toBe(0);
  });

  it("cannot be restarted", () => {
    const source = new SimulatedDiscoverySource({
      beacons: [origin],
      target: { x: 1, y: 1 },
      pathLoss: DEFAULT_PATH_LOSS,
      intervalMs: 100,
    });
    const stop = source.scan({ onDevice: () => undefined, onError: () => undefined });

    expect(() => source.scan({ onDevice: () => undefined, onError: () => undefined })).toThrow(
      "discovery source cannot be restarted"
    );
    stop();
  });

  it("fails immediately without beacons", () => {
    const errors: Error[] = [];
    const source = new SimulatedDiscoverySource({
      beacons: [],
      target: { x: 1, y: 1 },
      pathLoss: DEFAULT_PATH_LOSS,
      intervalMs: 100,
    });

    source.scan({ onDevice: () => undefined, onError: (e) => errors.push(e) });

    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ kind: ELocatorError.ScanError, message: "no simulated beacons configured" });
    expect(vi.getTimerCount()).toBe(0);
  });
});
