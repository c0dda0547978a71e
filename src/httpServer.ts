import { randomUUID } from "node:crypto";
import { createServer, IncomingMessage, Server, ServerResponse } from "node:http";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { Logger, createLogger, describeError } from "./utils/logger.js";

export const MCP_PATH = "/mcp";

export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export interface McpHttpServerOptions {
  host: string;
  port: number;
  maxBodyBytes: number;
  sessionIdleMs: number;
  createServer: () => McpServer;
  health: () => Promise<unknown>;
  logger?: Logger;
}

interface Session {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
  lastSeenAt: number;
}

/** Streamable HTTP transport with one MCP server per session; idle sessions are closed. */
export class McpHttpServer {
  private readonly sessions = new Map<string, Session>();

  private readonly logger: Logger;

  private httpServer: Server | null = null;

  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(private readonly options: McpHttpServerOptions) {
    this.logger = options.logger ?? createLogger("http");
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  async start(): Promise<void> {
    const httpServer = createServer((req, res) => {
      this.handle(req, res).catch((error: unknown) => this.fail(req, res, error));
    });
    await new Promise<void>((resolve, reject) => {
      httpServer.once("error", reject);
      httpServer.listen(this.options.port, this.options.host, () => resolve());
    });
    this.httpServer = httpServer;

    this.sweepTimer = setInterval(() => {
      this.closeIdleSessions(Date.now()).catch((error: unknown) => {
        this.logger.warn("idle session sweep failed", { error: describeError(error) });
      });
    }, Math.max(1_000, Math.floor(this.options.sessionIdleMs / 2)));
    this.sweepTimer.unref();

    this.logger.info("listening", { url: `http://${this.options.host}:${this.options.port}${MCP_PATH}` });
  }

  async stop(): Promise<void> {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    await Promise.all([...this.sessions.keys()].map((id) => this.closeSession(id)));

    const httpServer = this.httpServer;
    this.httpServer = null;
    if (!httpServer) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      httpServer.close((error) => (error ? reject(error) : resolve()));
    });
  }

  async closeIdleSessions(now: number): Promise<void> {
    const idle = [...this.sessions.entries()]
      .filter(([, session]) => now - session.lastSeenAt > this.options.sessionIdleMs)
      .map(([id]) => id);
    await Promise.all(idle.map((id) => this.closeSession(id)));
  }

  private async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    if (url.pathname === "/healthz") {
      writeJson(res, 200, { ok: true, status: await this.options.health() });
      return;
    }
    if (url.pathname !== MCP_PATH) {
      writeJson(res, 404, { error: "Not found" });
      return;
    }

    const sessionId = sessionIdOf(req);
    const session = sessionId ? this.sessions.get(sessionId) : undefined;
    if (session) {
      session.lastSeenAt = Date.now();
    }

    if (req.method === "POST") {
      const body = await readJsonBody(req, this.options.maxBodyBytes);
      if (session) {
        await session.transport.handleRequest(req, res, body);
      } else if (sessionId) {
        writeJsonRpcError(res, 404, -32001, "Session not found");
      } else if (!isInitializeRequest(body)) {
        writeJsonRpcError(res, 400, -32000, "Initialize request is required when session is not established");
      } else {
        await this.openSession(req, res, body);
      }
      return;
    }

    if (req.method === "GET" || req.method === "DELETE") {
      if (!session) {
        writeJson(res, 400, { error: "Missing or invalid mcp-session-id" });
        return;
      }
      await session.transport.handleRequest(req, res);
      return;
    }

    writeJson(res, 405, { error: "Method not allowed" });
  }

  private async openSession(req: IncomingMessage, res: ServerResponse, body: unknown): Promise<void> {
    const server = this.options.createServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (id) => {
        this.sessions.set(id, { server, transport, lastSeenAt: Date.now() });
        this.logger.info("session opened", { sessionId: id, sessions: this.sessions.size });
      },
    });
    transport.onclose = () => {
      const id = transport.sessionId;
      if (id && this.sessions.delete(id)) {
        server.close().catch((error: unknown) => {
          this.logger.warn("session close failed", { sessionId: id, error: describeError(error) });
        });
      }
    };

    await server.connect(transport);
    await transport.handleRequest(req, res, body);
  }

  private async closeSession(id: string): Promise<void> {
    const session = this.sessions.get(id);
    if (!session) {
      return;
    }
    this.sessions.delete(id);
    await session.transport.close();
    await session.server.close();
    this.logger.info("session closed", { sessionId: id, sessions: this.sessions.size });
  }

  private fail(req: IncomingMessage, res: ServerResponse, error: unknown): void {
    const status = error instanceof HttpError ? error.status : 500;
    if (status >= 500) {
      this.logger.error("request failed", { method: req.method, url: req.url, error: describeError(error) });
    }
    if (!res.headersSent) {
      writeJson(res, status, { error: describeError(error) });
    }
  }
}

/** Reads and parses a JSON body. An empty body reads as `{}`. */
export async function readJsonBody(source: AsyncIterable<Buffer | string>, maxBytes: number): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of source) {
    const buffer = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
    size += buffer.length;
    if (size > maxBytes) {
      throw new HttpError(413, `Request body exceeds ${maxBytes} bytes.`);
    }
    chunks.push(buffer);
  }

  const raw = Buffer.concat(chunks).toString("utf-8").trim();
  if (!raw) {
    return {};
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new HttpError(400, `Invalid JSON body: ${describeError(error)}`);
  }
}

function sessionIdOf(req: IncomingMessage): string | null {
  const header = req.headers["mcp-session-id"];
  if (!header) {
    return null;
  }
  return Array.isArray(header) ? (header[0] ?? null) : header;
}

function writeJson(res: ServerResponse, status: number, payload: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(payload));
}

function writeJsonRpcError(res: ServerResponse, status: number, code: number, message: string): void {
  writeJson(res, status, { jsonrpc: "2.0", error: { code, message }, id: null });
}
