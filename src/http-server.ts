/**
 * HTTP side channel on the same port as the device WebSocket.
 * POST /image?session=<id>    camera upload (token required)
 * GET  /health                liveness plus usage and counters
 * GET  /state?session=<id>    one session's diagnostic snapshot
 * GET  /download/<token>      TTS artifact while the token is valid
 */

import * as fs from "fs";
import * as http from "http";
import { logger, logError } from "./logging";
import { getCounters, getLastTurnMetrics } from "./metrics";
import { ImageRejectedError } from "./errors";
import { extractToken, tokensMatch } from "./device/connection-gate";
import type { SessionRegistry } from "./session/registry";
import type { DownloadRegistry } from "./storage/downloads";
import type { ImageStore } from "./storage/image-store";
import type { StorageQuotaManager } from "./storage/quota-manager";

export interface HttpServerDeps {
  registry: SessionRegistry;
  quota: StorageQuotaManager;
  images: ImageStore;
  downloads: DownloadRegistry;
  token: string;
  maxImageBytes: number;
  /** Live device connections. */
  connectionCount: () => number;
  /** Forward image_received to the session's device, when connected. */
  notifyImageReceived: (sessionId: string, filename: string) => Promise<void>;
}

const startedAt = Date.now();

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

/** Read the request body; stops buffering past `limit` and reports the full size. */
function readBody(req: http.IncomingMessage, limit: number): Promise<{ body: Buffer; size: number }> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size <= limit) chunks.push(chunk);
    });
    req.on("end", () => resolve({ body: Buffer.concat(chunks), size }));
    req.on("error", reject);
  });
}

export function createHttpServer(deps: HttpServerDeps): http.Server {
  const handle = async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const method = req.method ?? "GET";

    if (method === "GET" && (url.pathname === "/health" || url.pathname === "/")) {
      const diskUsage = await deps.quota.storeUsage();
      sendJson(res, 200, {
        ok: true,
        timestamp: new Date().toISOString(),
        uptimeSec: Math.round((Date.now() - startedAt) / 1000),
        diskUsage,
        sessions: deps.registry.stats(),
        connections: deps.connectionCount(),
        metrics: { counters: getCounters(), lastTurn: getLastTurnMetrics() },
      });
      return;
    }

    if (method === "GET" && url.pathname === "/state") {
      const session = deps.registry.getSession(url.searchParams.get("session") ?? "");
      if (!session) {
        sendJson(res, 404, { error: "Unknown session" });
        return;
      }
      await deps.quota.sessionUsage(session);
      sendJson(res, 200, deps.registry.snapshot(session));
      return;
    }

    if (method === "GET" && url.pathname.startsWith("/download/")) {
      const filePath = deps.downloads.resolve(url.pathname.slice("/download/".length));
      const stat = filePath ? await fs.promises.stat(filePath).catch(() => null) : null;
      if (!filePath || !stat) {
        sendJson(res, 404, { error: "Download not found or expired" });
        return;
      }
      res.writeHead(200, { "Content-Type": "audio/wav", "Content-Length": stat.size });
      fs.createReadStream(filePath)
        .on("error", (err) => {
          logError(logger, err, { event: "DOWNLOAD_STREAM_FAILED" });
          res.destroy();
        })
        .pipe(res);
      return;
    }

    if (method === "POST" && url.pathname === "/image") {
      const token = extractToken(url.searchParams.get("token"), req.headers.authorization);
      if (!tokensMatch(deps.token, token)) {
        sendJson(res, 401, { error: "Unauthorized" });
        return;
      }
      const session = deps.registry.getSession(url.searchParams.get("session") ?? "");
      if (!session) {
        sendJson(res, 404, { error: "Unknown session" });
        return;
      }
      const { body, size } = await readBody(req, deps.maxImageBytes);
      try {
        if (size > deps.maxImageBytes) {
          throw new ImageRejectedError(`Image too large: ${size} bytes (max ${deps.maxImageBytes})`);
        }
        const artifact = await deps.images.save(session, body);
        await deps.notifyImageReceived(session.id, artifact.filename);
        sendJson(res, 200, { type: "image_received", filename: artifact.filename });
      } catch (err) {
        if (!(err instanceof ImageRejectedError)) throw err;
        logger.warn({ event: "IMAGE_REJECTED", sessionId: session.id, status: err.status, err: err.message }, "Image upload rejected");
        sendJson(res, err.status, { error: err.message });
      }
      return;
    }

    sendJson(res, 404, { error: "Not found" });
  };

  return http.createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      logError(logger, err, { event: "HTTP_REQUEST_FAILED", path: req.url });
      if (!res.headersSent) sendJson(res, 500, { error: "Internal error" });
      else res.destroy();
    });
  });
}
