import { createServer, IncomingMessage, ServerResponse } from "node:http";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { VaultQaService } from "../services/vaultQaService.js";
import { Logger } from "../utils/logger.js";
import { McpSessionRegistry } from "./mcpSessions.js";

export const MCP_PATH = "/mcp";

const chatRequestSchema = z.object({
  user_id: z.string().min(1),
  channel_id: z.string().min(1),
  text: z.string(),
});

const sourcesRequestSchema = z.object({
  user_id: z.string().min(1),
  channel_id: z.string().min(1),
});

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export interface HttpServerOptions {
  host: string;
  port: number;
  service: VaultQaService;
  logger: Logger;
  serverFactory: () => McpServer;
}

export interface RunningHttpServer {
  port: number;
  close(): Promise<void>;
}

/**
 * One HTTP listener for both surfaces: MCP over streamable HTTP at `/mcp`
 * and the plain JSON endpoints `/chat` and `/sources`.
 */
export async function runHttpServer(options: HttpServerOptions): Promise<RunningHttpServer> {
  const { service, logger, serverFactory } = options;
  const mcpSessions = new McpSessionRegistry(serverFactory, logger);

  const httpServer = createServer(async (req, res) => {
    try {
      const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

      if (url.pathname === "/healthz") {
        writeJson(res, 200, { ok: true });
        return;
      }

      if (url.pathname === "/chat" || url.pathname === "/sources") {
        if (req.method !== "POST") {
          writeJson(res, 405, { error: "Method not allowed" });
          return;
        }
        await handleRestRequest(url.pathname, req, res, service);
        return;
      }

      if (url.pathname !== MCP_PATH) {
        res.writeHead(404, { "Content-Type": "text/plain" });
        res.end("Not found");
        return;
      }

      if (req.method === "POST") {
        await mcpSessions.handlePost(req, res, await readJsonBody(req));
        return;
      }

      if (req.method === "GET" || req.method === "DELETE") {
        await mcpSessions.handleStream(req, res);
        return;
      }

      writeJson(res, 405, { error: "Method not allowed" });
    } catch (error) {
      const status = error instanceof HttpError ? error.status : 500;
      if (status >= 500) {
        logger.error(`request ${req.method ?? "?"} ${req.url ?? "/"} failed`, error);
      }
      if (!res.headersSent) {
        writeJson(res, status, {
          error: error instanceof Error ? error.message : "Internal server error",
        });
      }
    }
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(options.port, options.host, () => resolve());
  });

  const address = httpServer.address();
  const port = address && typeof address === "object" ? address.port : options.port;

  const close = async () => {
    await mcpSessions.closeAll();

    await new Promise<void>((resolve, reject) => {
      httpServer.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  };

  return { port, close };
}

async function handleRestRequest(
  pathname: string,
  req: IncomingMessage,
  res: ServerResponse,
  service: VaultQaService,
) {
  const body = await readJsonBody(req);

  if (pathname === "/chat") {
    const parsed = chatRequestSchema.safeParse(body);
    if (!parsed.success) {
      writeJson(res, 400, { error: "Invalid request", issues: parsed.error.issues });
      return;
    }
    const result = await service.query({
      userId: parsed.data.user_id,
      channelId: parsed.data.channel_id,
      text: parsed.data.text,
    });
    writeJson(res, 200, { reply: result.reply });
    return;
  }

  const parsed = sourcesRequestSchema.safeParse(body);
  if (!parsed.success) {
    writeJson(res, 400, { error: "Invalid request", issues: parsed.error.issues });
    return;
  }
  const sources = await service.getSources({
    userId: parsed.data.user_id,
    channelId: parsed.data.channel_id,
  });
  writeJson(res, 200, { sources });
}

// An empty body reads as `{}` so schema errors, not parse errors, report it.
async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  let raw = "";
  req.setEncoding("utf-8");
  for await (const chunk of req) {
    raw += String(chunk);
  }
  if (!raw.trim()) {
    return {};
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new HttpError(400, "Invalid JSON body");
  }
}

function writeJson(res: ServerResponse, httpCode: number, payload: unknown) {
  res.writeHead(httpCode, { "Content-Type": "application/json" });
  res.end(JSON.stringify(payload));
}
