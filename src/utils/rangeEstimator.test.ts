import { describe, expect, it } from "vitest";
import { distanceFrom, signalStrengthAt } from "./rangeEstimator";

describe("distanceFrom", () => {
  it("returns 1m at the reference RSSI", () => {
    expect(distanceFrom(-59, -59, 2.0)).toBe(1);
  });

  it("returns 10m for 20 dB below the reference with n=2", () => {
    expect(distanceFrom(-79, -59, 2.0)).toBe(10);
  });

  it("gets closer as the signal gets stronger", () => {
    expect(distanceFrom(-60, -59, 2.0)).toBeLessThan(distanceFrom(-70, -59, 2.0));
    expect(distanceFrom(-45, -59, 2.0)).toBeLessThan(1);
  });

  it("is deterministic", () => {
    expect(distanceFrom(-67, -59, 2.5)).toBe(distanceFrom(-67, -59, 2.5));
  });

  it("stays positive for very weak signals", () => {
    expect(distanceFrom(-120, -59, 4)).toBeGreaterThan(0);
  });
});

describe("signalStrengthAt", () => {
  it("inverts distanceFrom", () => {
    expect(signalStrengthAt(10, -59, 2.0)).toBe(-79);
    expect(distanceFrom(signalStrengthAt(3.7, -59, 2.0), -59, 2.0)).toBeCloseTo(3.7, 9);
  });
});
