import { promises as fs } from "node:fs";
import path from "node:path";
import fg from "fast-glob";
import { Snippet } from "../../domain/types.js";
import { TOP_HEADING } from "../../pipelines/sectioning.js";
import { countOccurrences, splitLines, tokenize } from "../../utils/text.js";
import { readNoteContent } from "./vaultIndex.js";

const DEFAULT_MAX_NOTE_CHARS = 12_000;
const HITS_PER_FILE = 3;
const FILENAME_WEIGHT = 3;

export interface SearchVaultLinesOptions {
  maxSnippets: number;
  windowLines: number;
}

/** Resolves a vault-relative path, refusing anything that escapes the root. */
export function resolveNotePath(vaultRoot: string, notePath: string): string {
  const root = path.resolve(vaultRoot);
  const target = path.resolve(root, notePath);
  if (!target.startsWith(root + path.sep)) {
    throw new Error("Path traversal is not allowed");
  }
  return target;
}

export async function openNote(
  vaultRoot: string | null,
  notePath: string,
  maxChars: number = DEFAULT_MAX_NOTE_CHARS,
): Promise<string> {
  if (!vaultRoot) {
    throw new Error("VAULT_PATH is not set");
  }
  const target = resolveNotePath(vaultRoot, notePath);

  const stat = await fs.stat(target).catch(() => null);
  if (!stat || !stat.isFile()) {
    throw new Error(`Note not found: ${notePath}`);
  }

  const content = await fs.readFile(target, "utf-8");
  if (content.length > maxChars) {
    return `${content.slice(0, maxChars)}\n...\n`;
  }
  return content;
}

/**
 * Line-level search straight off the disk, independent of the section
 * index: the best matching lines of each note with surrounding context.
 * Notes matched only by filename contribute their opening lines.
 */
export async function searchVaultLines(
  vaultRoot: string | null,
  query: string,
  options: SearchVaultLinesOptions,
): Promise<Snippet[]> {
  if (!vaultRoot) {
    return [];
  }
  const root = path.resolve(vaultRoot);
  const stat = await fs.stat(root).catch(() => null);
  if (!stat || !stat.isDirectory()) {
    return [];
  }

  const terms = tokenize(query);
  if (terms.length === 0) {
    return [];
  }

  const files = await fg("**/*.md", {
    cwd: root,
    onlyFiles: true,
    dot: true,
    caseSensitiveMatch: false,
    followSymbolicLinks: false,
    suppressErrors: true,
  });
  files.sort();

  const results: Snippet[] = [];
  for (const notePath of files) {
    const filenameLower = path.posix.basename(notePath).toLowerCase();
    const filenameScore =
      terms.filter((term) => filenameLower.includes(term)).length * FILENAME_WEIGHT;

    const lines = splitLines(await readNoteContent(path.join(root, notePath)));
    const lineHits = lines
      .map((line, index) => ({ index, score: scoreLine(line, terms) }))
      .filter((hit) => hit.score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, HITS_PER_FILE);

    for (const hit of lineHits) {
      const start = Math.max(0, hit.index - options.windowLines);
      const end = Math.min(lines.length - 1, hit.index + options.windowLines);
      results.push({
        path: notePath,
        heading: headingAbove(lines, hit.index),
        lineStart: start + 1,
        lineEnd: end + 1,
        excerpt: lines.slice(start, end + 1).join("\n").trim(),
        score: hit.score + filenameScore,
      });
    }

    if (lineHits.length === 0 && filenameScore > 0) {
      const leadEnd = Math.min(lines.length, options.windowLines * 2);
      results.push({
        path: notePath,
        heading: headingAbove(lines, 0),
        lineStart: 1,
        lineEnd: leadEnd > 0 ? leadEnd : 1,
        excerpt: lines.slice(0, leadEnd).join("\n").trim(),
        score: filenameScore,
      });
    }
  }

  return results.sort((a, b) => b.score - a.score).slice(0, options.maxSnippets);
}

function scoreLine(line: string, terms: string[]): number {
  const lower = line.toLowerCase();
  return terms.reduce((sum, term) => sum + countOccurrences(lower, term), 0);
}

function headingAbove(lines: string[], index: number): string {
  for (let i = Math.min(index, lines.length - 1); i >= 0; i -= 1) {
    const line = lines[i].trim();
    if (line.startsWith("#")) {
      return line.replace(/^#+/, "").trim() || TOP_HEADING;
    }
  }
  return TOP_HEADING;
}
