const WORD_REGEX = /[\p{L}\p{N}_]+/gu;
const LETTER_REGEX = /\p{L}/u;
const MARKDOWN_LINK_REGEX = /\[([^\]]+)\]\([^)]+\)/g;

const QUERY_STOPWORDS = new Set([
  "hvad",
  "hvor",
  "hvem",
  "hvordan",
  "det",
  "for",
  "til",
  "et",
  "en",
  "den",
  "der",
  "som",
  "at",
  "og",
  "the",
  "what",
  "where",
  "how",
  "does",
  "do",
  "is",
  "are",
  "a",
  "an",
  "of",
  "it",
  "cost",
  "costs",
  "koster",
  "pris",
  "priser",
  "price",
  "pricing",
  "pakke",
  "pakker",
  "package",
  "packages",
  "abonnement",
  "abonnements",
]);

// Domain codes short enough to fall under the length cut.
const SHORT_KEEP = new Set(["gln", "gtin", "gdsn", "sscc"]);

export function splitLines(text: string): string[] {
  if (!text) {
    return [];
  }
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(WORD_REGEX) ?? [];
}

export function stemToken(token: string): string {
  if (token.endsWith("s") && token.length > 3) {
    return token.slice(0, -1);
  }
  if (token.endsWith("er") && token.length > 4) {
    return token.slice(0, -2);
  }
  if (token.endsWith("e") && token.length > 4) {
    return token.slice(0, -1);
  }
  return token;
}

/**
 * Content-bearing terms of a query: stopwords and very short tokens are
 * dropped, and each surviving token is paired with its stemmed form.
 * Returned unique and sorted.
 */
export function extractQueryTerms(query: string): string[] {
  const terms = new Set<string>();
  for (const token of tokenize(query)) {
    if (QUERY_STOPWORDS.has(token)) {
      continue;
    }
    if (token.length < 3 && !SHORT_KEEP.has(token)) {
      continue;
    }
    terms.add(token);
    terms.add(stemToken(token));
  }
  return [...terms].sort();
}

export function countOccurrences(haystack: string, needle: string): number {
  if (!needle) {
    return 0;
  }
  let count = 0;
  let from = 0;
  while (true) {
    const found = haystack.indexOf(needle, from);
    if (found < 0) {
      return count;
    }
    count += 1;
    from = found + needle.length;
  }
}

export function stripChars(text: string, chars: string): string {
  let start = 0;
  let end = text.length;
  while (start < end && chars.includes(text[start])) {
    start += 1;
  }
  while (end > start && chars.includes(text[end - 1])) {
    end -= 1;
  }
  return text.slice(start, end);
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** Drops link targets and emphasis markers, then trims list/label punctuation. */
export function cleanMarkup(text: string): string {
  const unlinked = text.replace(MARKDOWN_LINK_REGEX, "$1");
  const plain = unlinked.split("**").join("").split("*").join("");
  return collapseWhitespace(stripChars(plain.trim(), "-:•\t "));
}

export function hasLetters(text: string): boolean {
  return LETTER_REGEX.test(text);
}
