#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import "dotenv/config";
import { z } from "zod";
import { AppConfig, loadConfig } from "./config/env.js";
import { createAnswerGenerator } from "./infra/ai/createAnswerGenerator.js";
import { JsonFileSessionStore } from "./infra/store/jsonFileSessionStore.js";
import { VaultIndex } from "./infra/vault/vaultIndex.js";
import { VaultQaService } from "./services/vaultQaService.js";
import { registerAskVaultTool } from "./tools/askVault.js";
import { registerGetSourcesTool } from "./tools/getSources.js";
import { registerNoteTools } from "./tools/readNotes.js";
import { registerRebuildIndexTool } from "./tools/rebuildIndex.js";
import { MCP_PATH, runHttpServer } from "./transport/httpServer.js";
import { StderrLogger } from "./utils/logger.js";

const rootLogger = new StderrLogger("vault-qa");

async function main() {
  const config = loadConfig();
  const logger = new StderrLogger("vault-qa", config.logLevel);
  const generator = createAnswerGenerator(config);
  const sessions = new JsonFileSessionStore(
    config.sessionPath,
    config.sessionMaxTurns,
    logger.child("sessions"),
  );
  await sessions.initialize();

  const index = new VaultIndex(config.vaultPath);
  const service = new VaultQaService(index, generator, sessions, {
    maxSnippets: config.maxSnippets,
    requestTimeoutMs: config.requestTimeoutMs,
    logger: logger.child("qa"),
  });

  if (config.vaultPath) {
    await service.rebuildIndex();
  } else {
    logger.warn("VAULT_PATH is not set; every vault lookup will report no information.");
  }

  const shutdownTasks: Array<() => Promise<void>> = [];

  if (config.transport === "http") {
    const httpServer = await runHttpServer({
      host: config.host,
      port: config.port,
      service,
      logger: logger.child("http"),
      serverFactory: () => createAppServer(config, service),
    });
    shutdownTasks.push(() => httpServer.close());
    logger.info(
      `HTTP server listening on http://${config.host}:${httpServer.port} (MCP at ${MCP_PATH}, REST at /chat and /sources)`,
    );
  } else {
    await runStdioServer(createAppServer(config, service));
    logger.info(`MCP stdio server ready (answer backend: ${generator.backend})`);
  }

  const shutdown = async () => {
    for (const task of shutdownTasks) {
      await task();
    }
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error) => {
      logger.error("shutdown failed", error);
      process.exit(1);
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

function createAppServer(config: AppConfig, service: VaultQaService): McpServer {
  const server = new McpServer({
    name: "vault-qa",
    version: "0.1.0",
  });

  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns basic server status.",
      inputSchema: {
        name: z.string().optional().describe("Optional caller name"),
      },
    },
    async ({ name }) => {
      const who = name?.trim() || "anonymous";
      return {
        content: [
          {
            type: "text",
            text: `vault-qa is running. hello ${who}`,
          },
        ],
      };
    },
  );

  registerAskVaultTool(server, service);
  registerGetSourcesTool(server, service);
  registerRebuildIndexTool(server, service);
  registerNoteTools(server, {
    vaultRoot: config.vaultPath,
    maxSnippets: config.maxSnippets,
    windowLines: config.maxSnippetLines,
  });

  return server;
}

async function runStdioServer(server: McpServer): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error) => {
  rootLogger.error("Failed to start vault-qa server", error);
  process.exit(1);
});
