import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { VaultQaService } from "../services/vaultQaService.js";

export function registerRebuildIndexTool(server: McpServer, service: VaultQaService) {
  server.registerTool(
    "rebuild_index",
    {
      title: "Rebuild Index",
      description: "Re-reads every note in the vault and replaces the section index.",
      inputSchema: {},
    },
    async () => {
      const result = await service.rebuildIndex();

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(result, null, 2),
          },
        ],
      };
    },
  );
}
