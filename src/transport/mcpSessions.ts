import { randomUUID } from "node:crypto";
import { IncomingMessage, ServerResponse } from "node:http";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { Logger } from "../utils/logger.js";

const SESSION_HEADER = "mcp-session-id";

const RPC_SESSION_NOT_FOUND = -32001;
const RPC_NOT_INITIALIZED = -32000;

interface McpSession {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

/**
 * Live streamable-HTTP MCP sessions keyed by the `mcp-session-id` header.
 * Each session owns its own `McpServer`; a session is only opened by an
 * initialize request that carries no session id.
 */
export class McpSessionRegistry {
  private readonly sessions = new Map<string, McpSession>();

  constructor(
    private readonly serverFactory: () => McpServer,
    private readonly logger: Logger,
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  async handlePost(req: IncomingMessage, res: ServerResponse, body: unknown): Promise<void> {
    const sessionId = readSessionId(req);
    if (sessionId) {
      const session = this.sessions.get(sessionId);
      if (!session) {
        sendRpcError(res, 404, RPC_SESSION_NOT_FOUND, "Session not found");
        return;
      }
      await session.transport.handleRequest(req, res, body);
      return;
    }

    if (!isInitializeRequest(body)) {
      sendRpcError(
        res,
        400,
        RPC_NOT_INITIALIZED,
        "Initialize request is required when session is not established",
      );
      return;
    }

    const session = this.open();
    await session.server.connect(session.transport);
    await session.transport.handleRequest(req, res, body);
  }

  // GET opens the server-sent event stream; DELETE ends the session.
  async handleStream(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const sessionId = readSessionId(req);
    const session = sessionId ? this.sessions.get(sessionId) : undefined;
    if (!session) {
      res.writeHead(400, { "Content-Type": "text/plain" });
      res.end(`Missing or invalid ${SESSION_HEADER}`);
      return;
    }
    await session.transport.handleRequest(req, res);
  }

  async closeAll(): Promise<void> {
    const open = [...this.sessions.values()];
    this.sessions.clear();
    for (const session of open) {
      await session.transport.close();
      await session.server.close();
    }
  }

  private open(): McpSession {
    const server = this.serverFactory();
    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (sessionId) => {
        this.sessions.set(sessionId, { server, transport });
        this.logger.debug(`MCP session ${sessionId} opened`);
      },
    });

    transport.onclose = () => {
      const sessionId = transport.sessionId;
      if (!sessionId || !this.sessions.delete(sessionId)) {
        return;
      }
      this.logger.debug(`MCP session ${sessionId} closed`);
      server.close().catch((error) => {
        this.logger.error(`closing MCP session ${sessionId} failed`, error);
      });
    };

    return { server, transport };
  }
}

function readSessionId(req: IncomingMessage): string | null {
  const value = req.headers[SESSION_HEADER];
  const first = Array.isArray(value) ? value[0] : value;
  return first || null;
}

function sendRpcError(res: ServerResponse, status: number, code: number, message: string) {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify({ jsonrpc: "2.0", error: { code, message }, id: null }));
}
