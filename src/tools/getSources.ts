import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { VaultQaService } from "../services/vaultQaService.js";

export function registerGetSourcesTool(server: McpServer, service: VaultQaService) {
  server.registerTool(
    "get_sources",
    {
      title: "Get Sources",
      description: "Lists the citations behind the last answer in a session.",
      inputSchema: {
        user_id: z.string().min(1),
        channel_id: z.string().min(1),
      },
    },
    async ({ user_id, channel_id }) => {
      const sources = await service.getSources({ userId: user_id, channelId: channel_id });

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify({ sources }, null, 2),
          },
        ],
      };
    },
  );
}
