import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { VaultQaService } from "../services/vaultQaService.js";

export function registerAskVaultTool(server: McpServer, service: VaultQaService) {
  server.registerTool(
    "ask_vault",
    {
      title: "Ask Vault",
      description:
        "Answers a question from the Markdown vault and cites the note sections it used.",
      inputSchema: {
        user_id: z.string().min(1).describe("Caller identity used to key the session"),
        channel_id: z.string().min(1).describe("Conversation channel used to key the session"),
        text: z.string().describe("Free-text question or message"),
      },
    },
    async ({ user_id, channel_id, text }) => {
      const startedAt = Date.now();
      const result = await service.query({ userId: user_id, channelId: channel_id, text });

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(
              {
                reply: result.reply,
                route: result.route,
                outcome: result.outcome,
                sources: result.sources,
                latency_ms: Date.now() - startedAt,
              },
              null,
              2,
            ),
          },
        ],
      };
    },
  );
}
