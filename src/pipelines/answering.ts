import { PriceItem, Section, Snippet } from "../domain/types.js";

export const IDENTITY_LINE = "Jeg hedder Dory, jeg er din digitale praktikant.";
export const NO_INFO_LINE = "I can't find that in the vault.";
export const SOURCES_HEADER = "Sources:";
export const SOURCES_REMINDER = " You MUST include a Sources section with citations.";

const DEFAULT_MAX_EXCERPT_CHARS = 1600;
const FALLBACK_SOURCE_COUNT = 3;
const EXTRACTED_SCORE = 999;

export function buildSnippetsFromSections(
  sections: readonly Section[],
  maxChars: number = DEFAULT_MAX_EXCERPT_CHARS,
): Snippet[] {
  return sections.map((section) => {
    let excerpt = section.text.trim();
    if (excerpt.length > maxChars) {
      excerpt = `${excerpt.slice(0, maxChars).trimEnd()}\n...`;
    }
    return {
      path: section.path,
      heading: section.heading,
      lineStart: section.lineStart,
      lineEnd: section.lineEnd,
      excerpt,
      score: section.score,
    };
  });
}

/** One snippet per note section, listing `name — price` lines in item order. */
export function buildPriceSnippets(items: readonly PriceItem[]): Snippet[] {
  const groups = new Map<string, PriceItem[]>();
  for (const item of items) {
    const key = JSON.stringify([item.path, item.heading]);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }

  return [...groups.values()].map((group) => ({
    path: group[0].path,
    heading: group[0].heading,
    lineStart: Math.min(...group.map((item) => item.lineStart)),
    lineEnd: Math.max(...group.map((item) => item.lineEnd)),
    excerpt: group.map((item) => `${item.name} — ${item.price}`).join("\n"),
    score: EXTRACTED_SCORE,
  }));
}

export function buildSystemPrompt(infoSeeking: boolean, priceQuery = false): string {
  const base = [
    `You are Dory. If asked who you are or your name, reply exactly: '${IDENTITY_LINE}'.`,
    "You are a vault-grounded assistant and must not invent corporate facts.",
  ].join(" ");
  if (!infoSeeking) {
    return base;
  }

  const rules = [
    base,
    "You will receive extracted facts from the vault.",
    "Your job is to format those facts clearly without adding, inferring, or omitting information.",
    "Answer only using the provided vault snippets.",
    `If the answer is not in the snippets, reply: '${NO_INFO_LINE}'`,
    "Include a Sources section with citations in this exact format:",
    "- <path>#<heading> (lines a-b)",
  ];
  if (priceQuery) {
    rules.push(
      "When asked for prices or packages, list each package name with its price exactly as provided.",
    );
  }
  return rules.join(" ");
}

export function formatSourceLine(snippet: Snippet): string {
  return `${snippet.path}#${snippet.heading} (lines ${snippet.lineStart}-${snippet.lineEnd})`;
}

/** Citation entries listed as `- ` lines under any `Sources:` line. */
export function parseSources(text: string): string[] {
  if (!text.includes(SOURCES_HEADER)) {
    return [];
  }

  const sources: string[] = [];
  let capturing = false;
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.startsWith(SOURCES_HEADER)) {
      capturing = true;
      continue;
    }
    if (!capturing || !trimmed) {
      continue;
    }
    if (!trimmed.startsWith("-")) {
      break;
    }
    sources.push(trimmed.slice(2));
  }
  return sources;
}

/**
 * Returns the response with a usable Sources block. When the generator gave
 * none, any dangling `Sources:` tail is dropped and the first snippets are
 * cited instead.
 */
export function ensureSources(
  response: string,
  snippets: readonly Snippet[],
): { response: string; sources: string[] } {
  const parsed = parseSources(response);
  if (parsed.length > 0) {
    return { response, sources: parsed };
  }

  const headerAt = response.indexOf(SOURCES_HEADER);
  const base = headerAt >= 0 ? response.slice(0, headerAt) : response;
  const fallback = snippets.slice(0, FALLBACK_SOURCE_COUNT).map(formatSourceLine);
  if (fallback.length === 0) {
    return { response, sources: [] };
  }

  const block = fallback.map((source) => `- ${source}`).join("\n");
  return {
    response: `${base.trimEnd()}\n\n${SOURCES_HEADER}\n${block}`,
    sources: fallback,
  };
}
