/**
 * WebSocket endpoint for devices. Shares the HTTP server through `upgrade`; every upgrade on
 * the configured path is accepted at the socket level and then run through the ConnectionGate,
 * so a refused device sees a close code rather than a bare HTTP error.
 */

import type { IncomingMessage, Server } from "http";
import type { Duplex } from "stream";
import WebSocket, { WebSocketServer } from "ws";
import { logger, logError } from "../logging";
import { errorMessage } from "../errors";
import {
  SessionController,
  type SessionControllerConfig,
  type SessionControllerDeps,
} from "../pipeline/session-controller";
import { extractToken, type ConnectionGate } from "./connection-gate";
import { WsTransport } from "./transport";

export interface DeviceServerOptions {
  path: string;
  gate: ConnectionGate;
  deps: SessionControllerDeps;
  controller: SessionControllerConfig;
}

/** Session id and token from the upgrade request (`?session=&token=` or Authorization). */
export function parseUpgradeRequest(req: IncomingMessage): { pathname: string; sessionId: string | null; token: string | undefined } {
  const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
  const header = req.headers.authorization;
  return {
    pathname: url.pathname,
    sessionId: url.searchParams.get("session"),
    token: extractToken(url.searchParams.get("token"), header),
  };
}

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

export class DeviceServer {
  private readonly wss = new WebSocketServer({ noServer: true });
  private readonly controllers = new Map<string, SessionController>();

  constructor(private readonly options: DeviceServerOptions) {
    this.wss.on("connection", (ws: WebSocket, req: IncomingMessage) => this.onConnection(ws, req));
  }

  /** Route upgrades on the device path to this server; anything else gets 404. */
  attach(server: Server): void {
    server.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      const { pathname } = parseUpgradeRequest(req);
      if (pathname !== this.options.path) {
        socket.write("HTTP/1.1 404 Not Found\r\n\r\n");
        socket.destroy();
        return;
      }
      this.wss.handleUpgrade(req, socket, head, (ws) => {
        this.wss.emit("connection", ws, req);
      });
    });
  }

  controllerFor(sessionId: string): SessionController | undefined {
    return this.controllers.get(sessionId);
  }

  /** Close every device socket (1001 going away). */
  async close(): Promise<void> {
    for (const ws of this.wss.clients) ws.close(1001, "server shutdown");
    await new Promise<void>((resolve, reject) => this.wss.close((err) => (err ? reject(err) : resolve())));
  }

  private onConnection(ws: WebSocket, req: IncomingMessage): void {
    const { sessionId, token } = parseUpgradeRequest(req);
    const transport = new WsTransport(ws);
    const admission = this.options.gate.accept(transport, sessionId, token);
    if (!admission.admitted) return;

    const session = admission.session;
    const controller = new SessionController(session, transport, this.options.deps, this.options.controller);
    this.controllers.set(session.id, controller);

    const log = (err: unknown): void => logError(logger, err, { event: "DEVICE_FRAME_FAILED", sessionId: session.id });
    ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
      const buf = toBuffer(data);
      const frame = isBinary ? { kind: "binary" as const, data: buf } : { kind: "text" as const, text: buf.toString("utf8") };
      controller.enqueue(frame).catch(log);
    });
    ws.on("close", (code: number) => {
      logger.info({ event: "DEVICE_DISCONNECTED", sessionId: session.id, code }, "Device disconnected");
      this.options.gate.disconnect(transport);
      controller.disconnect();
      if (this.controllers.get(session.id) === controller) this.controllers.delete(session.id);
    });
    ws.on("error", (err: Error) => {
      logger.warn({ event: "DEVICE_SOCKET_ERROR", sessionId: session.id, err: errorMessage(err) }, "Device socket error");
    });

    controller.start().catch(log);
  }
}
