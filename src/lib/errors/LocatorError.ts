/**
 * src/lib/errors/LocatorError.ts
 *
 * 定位链路的统一错误类型。
 * - kind 区分错误类别，调用方按 kind 决定“终止流程”还是“仅转成状态文本”
 * - 只有 PermissionDenied / ScanError 会让会话停下来，其它都只体现在状态里
 */

export enum ELocatorError {
  /** 权限未授予：扫描开始前终止，不自动重试 */
  PermissionDenied = "PermissionDenied",

  /** 发现源异常终止：本次会话不再处理后续发现事件 */
  ScanError = "ScanError",

  /** 已跟踪的 beacon 少于 3 个：不求解，不算真正的错误 */
  InsufficientBeacons = "InsufficientBeacons",

  /** 三个参考点共线或重合，线性方程组无唯一解 */
  DegenerateGeometry = "DegenerateGeometry",

  /** 上报失败（非 200 或传输异常）：只记录，不影响调度 */
  ReportTransportFailure = "ReportTransportFailure",

  /** 配置文件或参数非法 */
  InvalidConfig = "InvalidConfig",
}

export default class LocatorError extends Error {
  readonly kind: ELocatorError;

  constructor(kind: ELocatorError, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LocatorError";
    this.kind = kind;
  }
}

/**
 * describeError：
 * - 把任意 throw 出来的值转成一行可读文本
 * - 用于状态文本和日志
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
