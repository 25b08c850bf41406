// src/utils/rangeEstimator.ts
//
// 对数距离路径损耗模型（log-distance path loss）：
//   rssi(d) = A - 10 * n * log10(d)
// 其中 A 为 1 米处的参考 RSSI，n 为路径损耗指数（自由空间约为 2）。
// A 和 n 都是按环境标定的常量，由配置传入，这里不做自动标定。

export interface PathLossModel {
  /** 1 米处的 RSSI（dBm），例如 -59 */
  referenceRssiAt1m: number;
  /** 路径损耗指数 n */
  exponent: number;
}

export const DEFAULT_PATH_LOSS: PathLossModel = {
  referenceRssiAt1m: -59,
  exponent: 2.0,
};

/**
 * distanceFrom：
 * - 输入：一次 RSSI 读数（dBm）
 * - 输出：估算距离（与参考坐标同一长度单位，通常是米）
 *
 *   distance = 10 ^ ((A - rssi) / (10 * n))
 *
 * 信号越强距离越近；结果是 10 的幂，对有限输入恒为正数。
 */
export function distanceFrom(
  signalStrength: number,
  referenceRssiAt1m: number,
  pathLossExponent: number
): number {
  return Math.pow(10, (referenceRssiAt1m - signalStrength) / (10 * pathLossExponent));
}

/**
 * signalStrengthAt：distanceFrom 的反函数，模拟发现源用它生成读数。
 */
export function signalStrengthAt(
  distance: number,
  referenceRssiAt1m: number,
  pathLossExponent: number
): number {
  return referenceRssiAt1m - 10 * pathLossExponent * Math.log10(distance);
}
