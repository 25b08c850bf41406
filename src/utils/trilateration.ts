// src/utils/trilateration.ts
//
// 三点定位（线性化）：
// 三个圆方程 (x - xi)^2 + (y - yi)^2 = ri^2，用第 2、3 个分别减去第 1 个，
// 消去二次项后得到 2x2 线性方程组，再用克莱姆法则求解。
// 只接受恰好三个参考点；不做迭代修正、不做最小二乘、不做边界裁剪。

import LocatorError, { ELocatorError } from "../lib/errors/LocatorError";

export interface ReferencePosition {
  x: number;
  y: number;
}

export interface PositionEstimate {
  readonly x: number;
  readonly y: number;
  /** 求解成功的时间戳（ms） */
  readonly computedAt: number;
}

/** 按发现顺序排列的三个槽位：0、1、2 */
export type ReferenceTriple = readonly [ReferencePosition, ReferencePosition, ReferencePosition];
export type DistanceTriple = readonly [number, number, number];

export type TrilaterationResult =
  | { ok: true; position: PositionEstimate }
  | { ok: false; error: LocatorError };

export function solveTrilateration(
  positions: ReferenceTriple,
  distances: DistanceTriple,
  computedAt: number = Date.now()
): TrilaterationResult {
  const [{ x: x1, y: y1 }, { x: x2, y: y2 }, { x: x3, y: y3 }] = positions;
  const [r1, r2, r3] = distances;

  const A = 2 * (x2 - x1);
  const B = 2 * (y2 - y1);
  const C = r1 ** 2 - r2 ** 2 - x1 ** 2 + x2 ** 2 - y1 ** 2 + y2 ** 2;
  const D = 2 * (x3 - x1);
  const E = 2 * (y3 - y1);
  const F = r1 ** 2 - r3 ** 2 - x1 ** 2 + x3 ** 2 - y1 ** 2 + y3 ** 2;

  const denominator = A * E - B * D;
  if (denominator === 0) {
    return {
      ok: false,
      error: new LocatorError(
        ELocatorError.DegenerateGeometry,
        "reference positions are collinear or coincident (denominator=0)"
      ),
    };
  }

  const position: PositionEstimate = Object.freeze({
    x: (C * E - B * F) / denominator,
    y: (A * F - C * D) / denominator,
    computedAt,
  });

  return { ok: true, position };
}
