import { beforeEach, describe, expect, it, vi } from "vitest";
import ConfigPermissionGate from "./ConfigPermissionGate";

describe("ConfigPermissionGate", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  it("passes when every grant is present", async () => {
    const gate = new ConfigPermissionGate({ location: true, bluetoothScan: true, bluetoothConnect: true });
    await expect(gate.request()).resolves.toBe(true);
    expect(console.warn).not.toHaveBeenCalled();
  });

  it("refuses and names every missing grant", async () => {
    const gate = new ConfigPermissionGate({ location: false, bluetoothScan: true, bluetoothConnect: false });
    await expect(gate.request()).resolves.toBe(false);
    expect(console.warn).toHaveBeenCalledWith("[Permission] not granted:", "location, bluetoothConnect");
  });
});
