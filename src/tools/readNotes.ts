import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { openNote, searchVaultLines } from "../infra/vault/noteReader.js";

interface NoteToolOptions {
  vaultRoot: string | null;
  maxSnippets: number;
  windowLines: number;
}

export function registerNoteTools(server: McpServer, options: NoteToolOptions) {
  server.registerTool(
    "open_note",
    {
      title: "Open Note",
      description: "Returns the raw Markdown of one vault note.",
      inputSchema: {
        path: z.string().min(1).describe("Note path relative to the vault root"),
        max_chars: z.number().int().min(100).max(200_000).optional(),
      },
    },
    async ({ path, max_chars }) => {
      try {
        const content = await openNote(options.vaultRoot, path, max_chars);
        return { content: [{ type: "text", text: content }] };
      } catch (error) {
        return {
          isError: true,
          content: [
            {
              type: "text",
              text: error instanceof Error ? error.message : "Failed to open note",
            },
          ],
        };
      }
    },
  );

  server.registerTool(
    "search_vault",
    {
      title: "Search Vault",
      description: "Line-level keyword search across vault notes, with surrounding context.",
      inputSchema: {
        query: z.string().min(1),
        max_snippets: z.number().int().min(1).max(50).optional(),
      },
    },
    async ({ query, max_snippets }) => {
      const hits = await searchVaultLines(options.vaultRoot, query, {
        maxSnippets: max_snippets ?? options.maxSnippets,
        windowLines: options.windowLines,
      });

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify({ query, hits }, null, 2),
          },
        ],
      };
    },
  );
}
