// server.ts - HTTP endpoints, WebSocket session endpoint, graceful shutdown.

import { createServer, type IncomingMessage, type ServerResponse } from "http";
import { randomBytes } from "crypto";
import type { EventEmitter } from "events";
import { readFile } from "fs/promises";
import { extname, join, normalize, sep } from "path";
import { WebSocketServer, type WebSocket } from "ws";
import { ChatConnection, type ClientSocket } from "./connection.js";
import { PATHS } from "./constants.js";
import type { ConversationController } from "./conversation.js";
import { createLogger } from "./logger.js";
import { listPersonas } from "./personas.js";
import type { PersonaId } from "./types.js";

const log = createLogger("server");

const MIME_TYPES: Record<string, string> = {
  ".js": "application/javascript",
  ".mjs": "application/javascript",
  ".html": "text/html",
  ".css": "text/css",
  ".json": "application/json",
  ".svg": "image/svg+xml",
  ".png": "image/png",
  ".ico": "image/x-icon",
};

const CORS_HEADERS = { "Access-Control-Allow-Origin": "*" };

export interface ServerOptions {
  port: number;
  controller: ConversationController;
  defaultPersona: PersonaId;
  voiceEnabledByDefault: boolean;
  clientDir?: string;
}

export interface ServerHandle {
  port: number;
  close: () => Promise<void>;
}

/** The parts of an http request/response the handler touches. */
export interface HttpRequest {
  url?: string;
  method?: string;
}

export interface HttpResponse {
  writeHead(statusCode: number, headers?: Record<string, string>): unknown;
  end(body?: string | Buffer): unknown;
}

function sendJson(res: HttpResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json", ...CORS_HEADERS });
  res.end(JSON.stringify(body));
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "EISDIR");
}

/** Resolve a URL path inside `root`, or null when it escapes it. */
export function resolveStaticPath(root: string, pathname: string): string | null {
  let decoded: string;
  try {
    decoded = decodeURIComponent(pathname);
  } catch {
    return null;
  }
  if (decoded.endsWith("/")) decoded += "index.html";

  const base = normalize(root);
  const filePath = normalize(join(base, decoded));
  const prefix = base.endsWith(sep) ? base : base + sep;
  return filePath.startsWith(prefix) ? filePath : null;
}

/**
 * Build the HTTP request handler.
 */
export function createHttpHandler(
  clientDir?: string
): (req: HttpRequest, res: HttpResponse) => Promise<void> {
  return async (req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");

    if (req.method === "OPTIONS") {
      res.writeHead(204, {
        ...CORS_HEADERS,
        "Access-Control-Allow-Methods": "GET, OPTIONS",
        "Access-Control-Allow-Headers": "Content-Type",
      });
      res.end();
      return;
    }

    if (url.pathname === PATHS.HEALTH) {
      sendJson(res, 200, { status: "ok" });
      return;
    }

    if (url.pathname === PATHS.PERSONAS) {
      sendJson(
        res,
        200,
        listPersonas().map(({ id, label, greeting }) => ({ id, label, greeting }))
      );
      return;
    }

    if (clientDir) {
      const filePath = resolveStaticPath(clientDir, url.pathname);
      const type = filePath ? MIME_TYPES[extname(filePath)] : undefined;
      if (filePath && type !== undefined) {
        try {
          const content = await readFile(filePath);
          res.writeHead(200, { "Content-Type": type, "Cache-Control": "no-cache", ...CORS_HEADERS });
          res.end(content);
          return;
        } catch (err: unknown) {
          // Missing files fall through to 404
          if (!isNotFound(err)) log.warn({ err, path: url.pathname }, "Static file read failed");
        }
      }
    }

    res.writeHead(404);
    res.end("Not found");
  };
}

function toBuffer(raw: unknown): Buffer | null {
  if (Buffer.isBuffer(raw)) return raw;
  if (raw instanceof ArrayBuffer) return Buffer.from(raw);
  if (Array.isArray(raw) && raw.every((part) => Buffer.isBuffer(part))) return Buffer.concat(raw);
  return null;
}

/**
 * Route a socket's frames into its connection. Text frames are JSON control
 * messages; binary frames are audio. `onClosed` runs once `stop()` settles.
 */
export function bindSocket(
  ws: EventEmitter & ClientSocket,
  connection: ChatConnection,
  onClosed: () => void
): void {
  ws.on("message", (raw: unknown, isBinary: unknown) => {
    const data = toBuffer(raw);
    if (!data) return;
    if (isBinary === true) {
      connection.onAudio(data);
    } else {
      connection.onMessage(data.toString("utf-8"));
    }
  });

  ws.on("close", () => {
    connection
      .stop()
      .catch((err: unknown) => log.error({ err }, "Session shutdown failed"))
      .finally(onClosed);
  });

  ws.on("error", (err: unknown) => {
    log.error({ err }, "WebSocket error");
  });
}

/**
 * Create and start the server.
 */
export async function startServer(options: ServerOptions): Promise<ServerHandle> {
  const connections = new Map<string, ChatConnection>();
  const handler = createHttpHandler(options.clientDir);

  // ── HTTP server ────────────────────────────────────────────────

  const httpServer = createServer((req: IncomingMessage, res: ServerResponse) => {
    handler(req, res).catch((err: unknown) => {
      log.error({ err }, "HTTP handler failed");
      if (!res.headersSent) res.writeHead(500);
      res.end();
    });
  });

  // ── WebSocket server ───────────────────────────────────────────

  const wss = new WebSocketServer({ server: httpServer, path: PATHS.WEBSOCKET });

  wss.on("connection", (ws: WebSocket) => {
    const id = randomBytes(16).toString("hex");
    const connection = new ChatConnection(id, ws, options.controller, {
      personaId: options.defaultPersona,
      voiceEnabled: options.voiceEnabledByDefault,
    });
    connections.set(id, connection);
    bindSocket(ws, connection, () => connections.delete(id));

    log.info({ session: id.slice(0, 8) }, "Client connected");
    connection.start();
  });

  // ── Start listening ────────────────────────────────────────────

  const actualPort = await new Promise<number>((resolve) => {
    httpServer.listen(options.port, () => {
      const addr = httpServer.address();
      const port = typeof addr === "object" && addr ? addr.port : options.port;
      log.info(
        { port, websocket: PATHS.WEBSOCKET, clientDir: options.clientDir ?? null },
        "Server listening"
      );
      resolve(port);
    });
  });

  // ── Graceful shutdown ──────────────────────────────────────────

  const close = async (): Promise<void> => {
    log.info("Shutting down");
    process.removeListener("SIGINT", shutdown);
    process.removeListener("SIGTERM", shutdown);
    for (const ws of wss.clients) ws.close();
    await Promise.all([...connections.values()].map((connection) => connection.stop()));
    connections.clear();
    wss.close();
    await new Promise<void>((resolve) => httpServer.close(() => resolve()));
  };

  const shutdown = (): void => {
    close()
      .catch((err: unknown) => log.error({ err }, "Shutdown failed"))
      .finally(() => process.exit(0));
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  return { port: actualPort, close };
}
