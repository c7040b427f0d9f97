import { randomUUID } from "node:crypto";
import { createServer, IncomingMessage, ServerResponse } from "node:http";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { createLogger, describeError } from "../utils/logger.js";

export const MCP_PATH = "/mcp";

const logger = createLogger("http");

interface McpSession {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

export interface HttpServerOptions {
  host: string;
  port: number;
  createSessionServer: () => McpServer;
}

/**
 * Serves MCP over streamable HTTP. Every initialize request opens a new
 * session with its own `McpServer`; later requests are routed by the
 * `mcp-session-id` header. Resolves to a function that stops the server.
 */
export async function startHttpServer(
  options: HttpServerOptions,
): Promise<() => Promise<void>> {
  const sessions = new Map<string, McpSession>();

  const httpServer = createServer((req, res) => {
    routeRequest(req, res, sessions, options.createSessionServer).catch((error: unknown) => {
      logger.error("Request failed.", { path: req.url, reason: describeError(error) });
      if (!res.headersSent) {
        writeJson(res, 500, { error: "Internal server error" });
      }
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(options.port, options.host, () => resolve());
  });

  return async () => {
    for (const session of sessions.values()) {
      await session.transport.close();
      await session.server.close();
    }
    sessions.clear();

    await new Promise<void>((resolve, reject) => {
      httpServer.close((error) => (error ? reject(error) : resolve()));
    });
  };
}

async function routeRequest(
  req: IncomingMessage,
  res: ServerResponse,
  sessions: Map<string, McpSession>,
  createSessionServer: () => McpServer,
): Promise<void> {
  const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

  if (url.pathname === "/healthz") {
    writeJson(res, 200, { ok: true, sessions: sessions.size });
    return;
  }
  if (url.pathname !== MCP_PATH) {
    res.writeHead(404, { "Content-Type": "text/plain" });
    res.end("Not found");
    return;
  }

  const sessionId = readSessionId(req);
  const session = sessionId ? sessions.get(sessionId) : undefined;

  switch (req.method) {
    case "POST": {
      const body = await readJsonBody(req);
      if (session) {
        await session.transport.handleRequest(req, res, body);
        return;
      }
      if (sessionId) {
        writeJsonRpcError(res, 404, -32001, "Session not found");
        return;
      }
      if (!isInitializeRequest(body)) {
        writeJsonRpcError(res, 400, -32000, "Initialize request is required before other calls");
        return;
      }
      await openSession(req, res, body, sessions, createSessionServer);
      return;
    }
    case "GET":
    case "DELETE":
      if (!session) {
        res.writeHead(400, { "Content-Type": "text/plain" });
        res.end("Missing or invalid mcp-session-id");
        return;
      }
      await session.transport.handleRequest(req, res);
      return;
    default:
      writeJson(res, 405, { error: "Method not allowed" });
  }
}

async function openSession(
  req: IncomingMessage,
  res: ServerResponse,
  body: unknown,
  sessions: Map<string, McpSession>,
  createSessionServer: () => McpServer,
): Promise<void> {
  const server = createSessionServer();
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: () => randomUUID(),
    onsessioninitialized: (id) => {
      sessions.set(id, { server, transport });
      logger.debug("Session opened.", { session_id: id });
    },
  });

  transport.onclose = () => {
    const id = transport.sessionId;
    const closing = id ? sessions.get(id) : undefined;
    if (!id || !closing) {
      return;
    }
    sessions.delete(id);
    closing.server.close().catch((error: unknown) => {
      logger.warn("Failed to close session server.", { session_id: id, reason: describeError(error) });
    });
  };

  await server.connect(transport);
  await transport.handleRequest(req, res, body);
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }

  const raw = Buffer.concat(chunks).toString("utf-8").trim();
  if (!raw) {
    return {};
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new Error("Invalid JSON body");
  }
}

function readSessionId(req: IncomingMessage): string | null {
  const header = req.headers["mcp-session-id"];
  if (!header) {
    return null;
  }
  return Array.isArray(header) ? header[0] ?? null : header;
}

function writeJson(res: ServerResponse, status: number, payload: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(payload));
}

function writeJsonRpcError(res: ServerResponse, status: number, code: number, message: string): void {
  writeJson(res, status, { jsonrpc: "2.0", error: { code, message }, id: null });
}
