/**
 * Device transport: the socket a session talks through.
 * WsTransport adapts a `ws` WebSocket; tests use an in-memory implementation.
 */

import WebSocket from "ws";
import { randomUUID } from "crypto";

export interface DeviceTransport {
  readonly id: string;
  readonly isOpen: boolean;
  sendText(data: string): Promise<void>;
  sendBinary(data: Buffer): Promise<void>;
  close(code: number, reason: string): void;
}

export class WsTransport implements DeviceTransport {
  readonly id = randomUUID();

  constructor(private readonly ws: WebSocket) {}

  get isOpen(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }

  sendText(data: string): Promise<void> {
    return this.send(data, false);
  }

  sendBinary(data: Buffer): Promise<void> {
    return this.send(data, true);
  }

  close(code: number, reason: string): void {
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close(code, reason);
    }
  }

  private send(data: string | Buffer, binary: boolean): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.ws.readyState !== WebSocket.OPEN) {
        reject(new Error("WebSocket is not open"));
        return;
      }
      this.ws.send(data, { binary }, (err) => (err ? reject(err) : resolve()));
    });
  }
}
