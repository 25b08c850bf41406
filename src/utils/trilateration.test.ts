import { describe, expect, it } from "vitest";
import { ELocatorError } from "../lib/errors/LocatorError";
import { solveTrilateration, type ReferenceTriple } from "./trilateration";

const square: ReferenceTriple = [
  { x: 0, y: 0 },
  { x: 5, y: 0 },
  { x: 0, y: 5 },
];

describe("solveTrilateration", () => {
  it("recovers (1, 1) from exact distances", () => {
    const result = solveTrilateration(square, [Math.SQRT2, Math.sqrt(17), Math.sqrt(17)], 1234);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(Math.abs(result.position.x - 1)).toBeLessThan(1e-6);
    expect(Math.abs(result.position.y - 1)).toBeLessThan(1e-6);
    expect(result.position.computedAt).toBe(1234);
  });

  it("solves with references away from the origin", () => {
    const refs: ReferenceTriple = [
      { x: 2, y: 3 },
      { x: 8, y: 3 },
      { x: 2, y: 9 },
    ];
    const result = solveTrilateration(refs, [Math.sqrt(10), Math.sqrt(10), Math.sqrt(34)]);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.position.x).toBeCloseTo(5, 9);
    expect(result.position.y).toBeCloseTo(4, 9);
  });

  it("returns a frozen estimate", () => {
    const result = solveTrilateration(square, [1, 2, 3]);
    expect(result.ok && Object.isFrozen(result.position)).toBe(true);
  });

  it.each([
    [[1, 2, 3]],
    [[0, 0, 0]],
    [[10, 0.5, 7]],
  ] as const)("reports a duplicated reference point as degenerate for distances %j", (distances) => {
    const refs: ReferenceTriple = [
      { x: 0, y: 0 },
      { x: 0, y: 0 },
      { x: 5, y: 0 },
    ];
    const result = solveTrilateration(refs, distances);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe(ELocatorError.DegenerateGeometry);
  });

  it("reports collinear references as degenerate", () => {
    const refs: ReferenceTriple = [
      { x: 0, y: 0 },
      { x: 2, y: 0 },
      { x: 4, y: 0 },
    ];
    const result = solveTrilateration(refs, [1, 1, 3]);

    expect(result.ok).toBe(false);
  });
});
