/**
 * src/service-api/IDiscoverySource.ts
 *
 * 发现源（外部协作方）：无线扫描栈的抽象。
 * - 源源不断地产出 { identity, displayName, signalStrength }
 * - 或者以一次 onError 终止
 * - 不可重启：同一个实例第二次 scan() 直接抛 ScanError
 *
 * 数据流：
 * 扫描栈 / WS 推送 / 模拟器 -> handlers.onDevice(device)
 *   -> LocatorSessionService.handleDevice
 */

export interface DiscoveredDevice {
  identity: string;
  displayName: string;
  /** dBm */
  signalStrength: number;
}

export interface DiscoveryHandlers {
  onDevice(device: DiscoveredDevice): void;
  /** 终止性错误；之后不会再有 onDevice */
  onError(error: Error): void;
}

export default interface IDiscoverySource {
  /**
   * scan：
   * - 开始消费发现序列
   * - 返回 stop()，调用后不再回调任何 handler
   */
  scan(handlers: DiscoveryHandlers): () => void;
}
