import { promises as fs } from "node:fs";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { openNote, searchVaultLines } from "../src/infra/vault/noteReader.js";
import { createTempVault, removeTempVault } from "./helpers/tempVault.js";

const FILES = {
  "Guides/Setup.md":
    "# Setup\nInstall the agent.\nConfigure the vault path.\n## Troubleshooting\nRestart the agent if it hangs.\n",
  "Zebra Notes.md": "Nothing relevant inside.\n",
};

describe("note reader", () => {
  let root = "";

  beforeAll(async () => {
    root = await createTempVault("note-reader", FILES);
  });

  afterAll(async () => {
    await removeTempVault(root);
  });

  it("opens a note by vault-relative path", async () => {
    expect(await openNote(root, "Zebra Notes.md")).toBe("Nothing relevant inside.\n");
  });

  it("truncates long notes", async () => {
    expect(await openNote(root, "Guides/Setup.md", 10)).toBe("# Setup\nIn\n...\n");
  });

  it("refuses paths outside the vault", async () => {
    await expect(openNote(root, "../outside.md")).rejects.toThrow("Path traversal is not allowed");
  });

  it("reports missing notes and a missing vault", async () => {
    await expect(openNote(root, "missing.md")).rejects.toThrow("Note not found: missing.md");
    await expect(openNote(root, "Guides")).rejects.toThrow("Note not found: Guides");
    await expect(openNote(null, "Setup.md")).rejects.toThrow("VAULT_PATH is not set");
  });

  it("returns matching lines with context and the nearest heading", async () => {
    const hits = await searchVaultLines(root, "agent", { maxSnippets: 5, windowLines: 1 });

    expect(hits).toEqual([
      {
        path: "Guides/Setup.md",
        heading: "Setup",
        lineStart: 1,
        lineEnd: 3,
        excerpt: "# Setup\nInstall the agent.\nConfigure the vault path.",
        score: 1,
      },
      {
        path: "Guides/Setup.md",
        heading: "Troubleshooting",
        lineStart: 4,
        lineEnd: 5,
        excerpt: "## Troubleshooting\nRestart the agent if it hangs.",
        score: 1,
      },
    ]);
  });

  it("falls back to the opening lines of notes matched by filename", async () => {
    const hits = await searchVaultLines(root, "zebra", { maxSnippets: 5, windowLines: 1 });

    expect(hits).toEqual([
      {
        path: "Zebra Notes.md",
        heading: "(top)",
        lineStart: 1,
        lineEnd: 1,
        excerpt: "Nothing relevant inside.",
        score: 3,
      },
    ]);
  });

  it("searches each note once when the vault links back into itself", async () => {
    const loopRoot = await createTempVault("note-reader-loop", { "note.md": "the agent lives here\n" });
    await fs.symlink(".", path.join(loopRoot, "loop"));
    try {
      const hits = await searchVaultLines(loopRoot, "agent", { maxSnippets: 10, windowLines: 0 });
      expect(hits.map((hit) => hit.path)).toEqual(["note.md"]);
    } finally {
      await removeTempVault(loopRoot);
    }
  });

  it("finds nothing without a vault", async () => {
    expect(await searchVaultLines(null, "agent", { maxSnippets: 5, windowLines: 1 })).toEqual([]);
  });
});
