import { beforeEach, describe, expect, it, vi } from "vitest";
import BeaconRegistryService from "./BeaconRegistryService";

describe("BeaconRegistryService", () => {
  let registry: BeaconRegistryService;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    registry = new BeaconRegistryService();
  });

  it("appends new identities in arrival order", () => {
    expect(registry.observe("aa", "ESP32-A", -60)).toEqual({ added: true, size: 1 });
    expect(registry.observe("bb", "ESP32-B", -70)).toEqual({ added: true, size: 2 });
    expect(registry.observe("cc", "ESP32-C", -80)).toEqual({ added: true, size: 3 });

    expect(registry.getState().beacons.map((b) => [b.identity, b.discoveryOrder])).toEqual([
      ["aa", 0],
      ["bb", 1],
      ["cc", 2],
    ]);
    expect(registry.slots(2).map((b) => b.identity)).toEqual(["aa", "bb"]);
  });

  it("keeps the first reading for a repeated identity", () => {
    registry.observe("aa", "ESP32-A", -60);

    expect(registry.observe("aa", "ESP32-A-renamed", -40)).toEqual({ added: false, size: 1 });
    expect(registry.size).toBe(1);
    expect(registry.getState().beacons[0]).toEqual({
      identity: "aa",
      displayName: "ESP32-A",
      signalStrength: -60,
      discoveryOrder: 0,
    });
  });

  it("notifies subscribers only when something was added", () => {
    const listener = vi.fn();
    registry.subscribe(listener);

    registry.observe("aa", "ESP32-A", -60);
    registry.observe("aa", "ESP32-A", -61);
    registry.observe("bb", "ESP32-B", -62);

    expect(listener).toHaveBeenCalledTimes(2);
    expect(listener.mock.calls[1][0].beacons).toHaveLength(2);
  });

  it("never mutates a snapshot that was already handed out", () => {
    registry.observe("aa", "ESP32-A", -60);
    const before = registry.getState().beacons;

    registry.observe("bb", "ESP32-B", -70);

    expect(before).toHaveLength(1);
    expect(Object.isFrozen(before)).toBe(true);
    expect(Object.isFrozen(before[0])).toBe(true);
    expect(registry.getState().beacons).toHaveLength(2);
  });

  it("answers membership queries", () => {
    registry.observe("aa", "ESP32-A", -60);
    expect(registry.has("aa")).toBe(true);
    expect(registry.has("bb")).toBe(false);
  });
});
