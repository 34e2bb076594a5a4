/**
 * Outbound side of one device connection. Sends go out one at a time in call order, so a
 * frame queued from outside the controller (an HTTP upload ack) cannot split a meta/binary pair.
 * Once closed, sends are dropped (debug-logged) and report false instead of throwing.
 */

import { logger } from "../logging";
import { errorMessage } from "../errors";
import { encodeServerMessage, type MessageSink, type ServerMessage } from "./protocol";
import type { DeviceTransport } from "./transport";

export class OutboundChannel implements MessageSink {
  private closed = false;
  private tail: Promise<boolean> = Promise.resolve(true);

  constructor(
    private readonly transport: DeviceTransport,
    private readonly sessionId: string
  ) {}

  get isClosed(): boolean {
    return this.closed || !this.transport.isOpen;
  }

  close(): void {
    this.closed = true;
  }

  sendJson(msg: ServerMessage): Promise<boolean> {
    return this.serialized(() => this.deliver(msg.type, () => this.transport.sendText(encodeServerMessage(msg))));
  }

  sendChunk(meta: ServerMessage, data: Buffer): Promise<boolean> {
    return this.serialized(
      async () =>
        (await this.deliver(meta.type, () => this.transport.sendText(encodeServerMessage(meta)))) &&
        this.deliver("binary", () => this.transport.sendBinary(data))
    );
  }

  /** deliver() never rejects, so the tail always settles to a result. */
  private serialized(op: () => Promise<boolean>): Promise<boolean> {
    const result = this.tail.then(op);
    this.tail = result;
    return result;
  }

  private async deliver(what: string, send: () => Promise<void>): Promise<boolean> {
    if (this.isClosed) {
      logger.debug({ event: "SEND_DROPPED", sessionId: this.sessionId, what }, "Connection closed; dropping frame");
      return false;
    }
    try {
      await send();
      return true;
    } catch (err) {
      logger.warn({ event: "SEND_FAILED", sessionId: this.sessionId, what, err: errorMessage(err) }, "Send to device failed");
      return false;
    }
  }
}
