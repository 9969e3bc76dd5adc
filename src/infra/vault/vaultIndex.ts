import { promises as fs } from "node:fs";
import path from "node:path";
import fg from "fast-glob";
import { NoteMeta, Section, VaultSnapshot } from "../../domain/types.js";
import { buildAliases } from "../../pipelines/aliases.js";
import { detectTitle, splitIntoSections } from "../../pipelines/sectioning.js";
import { countOccurrences, splitLines, tokenize } from "../../utils/text.js";

const ALIAS_BOOST = 20;
const HEADING_WEIGHT = 3;
const PATH_WEIGHT = 2;
const PHRASE_BOOST = 8;

const EMPTY_SNAPSHOT: VaultSnapshot = {
  sections: [],
  notes: new Map(),
  builtAt: null,
};

export interface BuildResult {
  note_count: number;
  section_count: number;
  built_at: string | null;
}

/**
 * Heading-aware lexical index over a directory of Markdown notes.
 *
 * `build()` replaces the whole snapshot in one assignment, so readers holding
 * a snapshot never observe a partially built index.
 */
export class VaultIndex {
  readonly vaultRoot: string | null;

  private current: VaultSnapshot = EMPTY_SNAPSHOT;

  constructor(vaultRoot: string | null) {
    this.vaultRoot = vaultRoot ? path.resolve(vaultRoot) : null;
  }

  snapshot(): VaultSnapshot {
    return this.current;
  }

  get sectionCount(): number {
    return this.current.sections.length;
  }

  get noteCount(): number {
    return this.current.notes.size;
  }

  async build(): Promise<BuildResult> {
    if (!this.vaultRoot || !(await isDirectory(this.vaultRoot))) {
      this.current = EMPTY_SNAPSHOT;
      return toBuildResult(this.current);
    }

    const files = await fg("**/*.md", {
      cwd: this.vaultRoot,
      onlyFiles: true,
      dot: true,
      caseSensitiveMatch: false,
      followSymbolicLinks: false,
      suppressErrors: true,
    });
    files.sort();

    const sections: Section[] = [];
    const notes = new Map<string, NoteMeta>();

    for (const relativePath of files) {
      const notePath = relativePath.split(path.sep).join("/");
      const content = await readNoteContent(path.join(this.vaultRoot, relativePath));
      const lines = splitLines(content);
      const filename = path.posix.basename(notePath);

      const title = detectTitle(lines, filename);
      notes.set(notePath, {
        path: notePath,
        title,
        aliases: buildAliases(title, filename),
      });
      sections.push(...splitIntoSections(notePath, lines));
    }

    this.current = {
      sections,
      notes,
      builtAt: new Date().toISOString(),
    };
    return toBuildResult(this.current);
  }

  findSections(query: string, topK = 5): Section[] {
    const queryLower = query.toLowerCase();
    const tokens = tokenize(queryLower);
    if (tokens.length === 0) {
      return [];
    }

    const { sections, notes } = this.current;
    const results: Section[] = [];
    for (const section of sections) {
      const note = notes.get(section.path);
      const aliasBoost = note && matchesAnyAlias(note, queryLower) ? ALIAS_BOOST : 0;
      const score = aliasBoost + scoreSection(section, tokens, queryLower);
      if (score > 0) {
        results.push({ ...section, score });
      }
    }

    return results.sort((a, b) => b.score - a.score).slice(0, topK);
  }

  /** Scores an arbitrary section list the same way, without the alias boost. */
  rankSections(sections: readonly Section[], query: string, topK: number): Section[] {
    const queryLower = query.toLowerCase();
    const tokens = tokenize(queryLower);
    if (tokens.length === 0) {
      return [];
    }

    const results: Section[] = [];
    for (const section of sections) {
      const score = scoreSection(section, tokens, queryLower);
      if (score > 0) {
        results.push({ ...section, score });
      }
    }
    return results.sort((a, b) => b.score - a.score).slice(0, topK);
  }

  // Alias-in-query containment: short aliases can match unrelated queries.
  findPathsByAlias(query: string): string[] {
    const queryLower = query.toLowerCase();
    const matches: string[] = [];
    for (const [notePath, note] of this.current.notes) {
      if (matchesAnyAlias(note, queryLower)) {
        matches.push(notePath);
      }
    }
    return matches;
  }

  sectionsForPaths(paths: readonly string[]): Section[] {
    const wanted = new Set(paths);
    return this.current.sections.filter((section) => wanted.has(section.path));
  }
}

export function scoreSection(section: Section, tokens: string[], queryLower: string): number {
  const textLower = section.text.toLowerCase();
  const headingLower = section.heading.toLowerCase();
  const pathLower = section.path.toLowerCase();

  let score = 0;
  for (const token of tokens) {
    score += countOccurrences(textLower, token);
    score += HEADING_WEIGHT * countOccurrences(headingLower, token);
    score += PATH_WEIGHT * countOccurrences(pathLower, token);
  }
  if (textLower.includes(queryLower)) {
    score += PHRASE_BOOST;
  }
  return score;
}

function matchesAnyAlias(note: NoteMeta, queryLower: string): boolean {
  return note.aliases.some((alias) => queryLower.includes(alias));
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    const stat = await fs.stat(target);
    return stat.isDirectory();
  } catch {
    return false;
  }
}

/** Strict UTF-8 first, lossy decode second; unreadable files read as empty. */
export async function readNoteContent(filePath: string): Promise<string> {
  let data: Buffer;
  try {
    data = await fs.readFile(filePath);
  } catch {
    return "";
  }

  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(data);
  } catch {
    return new TextDecoder("utf-8").decode(data);
  }
}

function toBuildResult(snapshot: VaultSnapshot): BuildResult {
  return {
    note_count: snapshot.notes.size,
    section_count: snapshot.sections.length,
    built_at: snapshot.builtAt,
  };
}
