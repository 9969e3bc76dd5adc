import { Section, Snippet } from "../domain/types.js";
import { extractQueryTerms, splitLines } from "../utils/text.js";

export const INCLUSION_MARKERS = [
  "inkl",
  "inkl.",
  "inklusive",
  "gratis",
  "medlemskab",
  "medlem",
  "uden ekstra",
  "incl",
  "included",
  "free",
  "membership",
  "no extra charge",
] as const;

/**
 * Lines that name a query term together with an "included"/"free" marker,
 * each returned with one line of context on either side.
 */
export function extractInclusionSnippets(
  sections: readonly Section[],
  query: string,
  limit = 4,
): Snippet[] {
  const terms = extractQueryTerms(query);
  if (terms.length === 0) {
    return [];
  }

  const snippets: Snippet[] = [];
  for (const section of sections) {
    const lines = splitLines(section.text);
    for (let index = 0; index < lines.length; index += 1) {
      const lineLower = lines[index].toLowerCase();
      if (!terms.some((term) => lineLower.includes(term))) {
        continue;
      }
      if (!INCLUSION_MARKERS.some((marker) => lineLower.includes(marker))) {
        continue;
      }

      const startIndex = Math.max(0, index - 1);
      const endIndex = Math.min(lines.length - 1, index + 1);
      snippets.push({
        path: section.path,
        heading: section.heading,
        lineStart: section.lineStart + startIndex,
        lineEnd: section.lineStart + endIndex,
        excerpt: lines.slice(startIndex, endIndex + 1).join("\n").trim(),
        score: section.score,
      });
      if (snippets.length >= limit) {
        return snippets;
      }
    }
  }
  return snippets;
}
