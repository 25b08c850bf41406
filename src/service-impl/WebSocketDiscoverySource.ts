// src/service-impl/WebSocketDiscoverySource.ts
//
// WebSocketDiscoverySource 的职责：
// 1) 连接扫描网关的 WebSocket（网关把 BLE 广播透传成 JSON 帧）
// 2) 收到消息后 normalize 成字符串 + JSON.parse，再解析成 DiscoveredDevice
// 3) 认识的帧交给 handlers.onDevice；不认识的帧 debug 打印后忽略
// 4) socket 报错或意外断开 = 发现源终止（ScanError），不自动重连
//
// 支持的帧格式：
//   { raw: { mac, name, rssi }, parsed?: {...} }        网关透传格式
//   { cmd: "Advertisement", id | mac, name, rssi }      扁平格式

import { WebSocket, type RawData } from "ws";
import LocatorError, { ELocatorError, describeError } from "../lib/errors/LocatorError";
import type IDiscoverySource from "../service-api/IDiscoverySource";
import type { DiscoveredDevice, DiscoveryHandlers } from "../service-api/IDiscoverySource";

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

/** 只接受有限数字，或能完整解析成有限数字的非空字符串 */
function toSignalStrength(value: unknown): number | null {
  let n: number;
  if (typeof value === "number") {
    n = value;
  } else if (typeof value === "string" && value.trim() !== "") {
    n = Number(value);
  } else {
    return null;
  }
  return Number.isFinite(n) ? Math.round(n) : null;
}

/**
 * parseDiscoveryFrame：
 * - 输入：JSON.parse 之后的任意值
 * - 输出：DiscoveredDevice；不是广播帧或字段缺失时返回 null
 */
export function parseDiscoveryFrame(msg: unknown): DiscoveredDevice | null {
  if (!isRecord(msg)) return null;

  let body: Record<string, unknown> | null = null;
  if (isRecord(msg.raw)) {
    body = msg.raw;
  } else if (msg.cmd === "Advertisement") {
    body = msg;
  }
  if (!body) return null;

  const identity = body.id ?? body.mac;
  if (typeof identity !== "string" || identity.length === 0) return null;

  const signalStrength = toSignalStrength(body.rssi);
  if (signalStrength === null) return null;

  return {
    identity,
    displayName: typeof body.name === "string" ? body.name : "",
    signalStrength,
  };
}

function rawDataToText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  return Buffer.from(data).toString("utf8");
}

export default class WebSocketDiscoverySource implements IDiscoverySource {
  private ws: WebSocket | null = null;

  /** scan() 只能调用一次 */
  private consumed = false;

  /** stop() 之后或已经报过 onError 之后，不再回调 */
  private finished = false;

  constructor(private readonly url: string) {}

  scan(handlers: DiscoveryHandlers): () => void {
    if (this.consumed) {
      throw new LocatorError(ELocatorError.ScanError, "discovery source cannot be restarted");
    }
    this.consumed = true;

    console.log("[Discovery] connecting:", this.url);

    const ws = new WebSocket(this.url);
    this.ws = ws;

    ws.on("open", () => {
      console.log("[Discovery] connected");
    });

    ws.on("message", (data) => {
      this.handleMessage(rawDataToText(data), handlers);
    });

    ws.on("error", (err) => {
      this.fail(handlers, err);
    });

    // 正常 stop() 时 finished 已经是 true，这里不会误报
    ws.on("close", (code) => {
      console.log("[Discovery] disconnected:", code);
      this.ws = null;
      this.fail(handlers, new Error(`discovery stream closed (code ${code})`));
    });

    return () => this.stop();
  }

  private stop(): void {
    if (this.finished) return;
    this.finished = true;

    const ws = this.ws;
    this.ws = null;
    if (ws && (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING)) {
      ws.close();
    }
  }

  private fail(handlers: DiscoveryHandlers, cause: Error): void {
    if (this.finished) return;
    this.stop();
    handlers.onError(
      new LocatorError(ELocatorError.ScanError, describeError(cause), { cause })
    );
  }

  private handleMessage(text: string, handlers: DiscoveryHandlers): void {
    if (this.finished) return;

    let msg: unknown;
    try {
      msg = JSON.parse(text);
    } catch {
      console.debug("[Discovery] non-JSON frame ignored");
      return;
    }

    const device = parseDiscoveryFrame(msg);
    if (!device) {
      console.debug("[Discovery] unknown message:", msg);
      return;
    }

    handlers.onDevice(device);
  }
}
