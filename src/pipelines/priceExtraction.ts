import { PriceItem, Section } from "../domain/types.js";
import {
  cleanMarkup,
  extractQueryTerms,
  hasLetters,
  splitLines,
  stripChars,
} from "../utils/text.js";

const PRICE_REGEX = /(\d[\d.,]*)\s*(dkk|kr\.?|\bkr\b)/i;

const LABEL_STOP = new Set([
  "pris",
  "price",
  "abonnement",
  "billedpakker",
  "certificering",
  "pakker",
  "pakken",
]);

const PERIOD_ONLY_LABELS = new Set(["/ år", "/ aar", "/år", "pr. år", "pr år"]);

const CONTINUATION_PREFIXES = ["inkl", "inkl.", "inklusive", "pr.", "pr", "per", "/"];

const MAX_LABEL_LINES = 4;

export function isStopLabel(text: string): boolean {
  return LABEL_STOP.has(stripChars(text.toLowerCase(), " :\t"));
}

/**
 * The first price on a line, e.g. `499 kr.`. A following `/ år`, `pr. md.`
 * or `per user` qualifier is kept with it, up to two words.
 */
export function extractPriceFromLine(line: string): string | null {
  const match = PRICE_REGEX.exec(line);
  if (!match) {
    return null;
  }

  const price = match[0].trim();
  const suffixWords = line
    .slice(match.index + match[0].length)
    .trim()
    .split(/\s+/)
    .filter(Boolean);
  const first = suffixWords[0]?.toLowerCase();
  if (first && (first.startsWith("/") || first.startsWith("pr") || first.startsWith("per"))) {
    return `${price} ${suffixWords.slice(0, 2).join(" ")}`.trim();
  }
  return price;
}

/** Item name left on a price line once markup and the price are removed, or "". */
export function nameFromLine(line: string, price: string | null): string {
  if (!line) {
    return "";
  }

  let cleaned = cleanMarkup(line);
  if (price) {
    cleaned = cleaned.split(price).join("").trim();
  }
  cleaned = stripChars(cleaned, "-:•\t ");
  if (!cleaned) {
    return "";
  }

  const lowered = cleaned.toLowerCase();
  if (isStopLabel(lowered) || PERIOD_ONLY_LABELS.has(lowered)) {
    return "";
  }
  if (!hasLetters(cleaned) || cleaned.length <= 2) {
    return "";
  }
  return cleaned;
}

/**
 * Walks upward from `index` gathering up to `maxLines` label lines. Headings
 * and generic labels are skipped; a blank line ends the label once something
 * has been collected.
 */
export function collectLabel(lines: string[], index: number, maxLines = MAX_LABEL_LINES): string {
  const collected: string[] = [];
  for (let j = index - 1; j >= 0 && collected.length < maxLines; j -= 1) {
    const raw = lines[j].trim();
    if (!raw) {
      if (collected.length > 0) {
        break;
      }
      continue;
    }
    if (raw.startsWith("#")) {
      continue;
    }
    const candidate = cleanMarkup(raw);
    if (!candidate || isStopLabel(candidate)) {
      continue;
    }
    collected.unshift(candidate);
  }
  return collected.join(" ").trim();
}

export function parseTableRow(line: string): string[] | null {
  if (!line.includes("|")) {
    return null;
  }
  const stripped = line.trim();
  if (!stripped) {
    return null;
  }
  if ([...stripped].every((char) => "|-: ".includes(char))) {
    return null;
  }
  return stripChars(stripped, "|")
    .split("|")
    .map((cell) => cell.trim())
    .filter(Boolean);
}

export function extractPriceItems(sections: readonly Section[]): PriceItem[] {
  const items: PriceItem[] = [];

  for (const section of sections) {
    const lines = splitLines(section.text);

    lines.forEach((line, index) => {
      const toItem = (name: string, price: string): PriceItem => ({
        name,
        price,
        path: section.path,
        heading: section.heading,
        lineStart: section.lineStart + Math.max(index - 1, 0),
        lineEnd: section.lineStart + index,
      });

      const cells = parseTableRow(line);
      if (cells && cells.length > 0) {
        const item = priceFromTableRow(cells, lines, index);
        if (item) {
          items.push(toItem(item.name, item.price));
        }
        return;
      }

      const price = extractPriceFromLine(line);
      if (!price) {
        return;
      }
      let name = nameFromLine(line, price) || collectLabel(lines, index);
      if (!name) {
        return;
      }
      if (startsWithContinuation(name)) {
        const extended = collectLabel(lines, index);
        if (extended && extended !== name) {
          name = extended;
        }
      }
      items.push(toItem(name, price));
    });
  }

  return sortByPosition(dedupeItems(items));
}

function priceFromTableRow(
  cells: string[],
  lines: string[],
  index: number,
): { name: string; price: string } | null {
  const priceCell = cells.find((cell) => PRICE_REGEX.test(cell));
  if (!priceCell) {
    return null;
  }
  const price = extractPriceFromLine(priceCell);

  let name = "";
  for (const cell of cells) {
    if (cell === priceCell) {
      continue;
    }
    const candidate = nameFromLine(cell, null);
    if (candidate) {
      name = candidate;
      break;
    }
  }
  if (!name) {
    name = collectLabel(lines, index);
  }

  return name && price ? { name, price } : null;
}

function startsWithContinuation(name: string): boolean {
  const lowered = name.toLowerCase();
  return CONTINUATION_PREFIXES.some((prefix) => lowered.startsWith(prefix));
}

function dedupeItems(items: PriceItem[]): PriceItem[] {
  const seen = new Set<string>();
  return items.filter((item) => {
    const key = JSON.stringify([item.path, item.heading, item.name, item.price, item.lineStart]);
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}

function sortByPosition(items: PriceItem[]): PriceItem[] {
  return [...items].sort((a, b) => {
    if (a.path !== b.path) {
      return a.path < b.path ? -1 : 1;
    }
    return a.lineStart - b.lineStart;
  });
}

/**
 * Keeps items whose name mentions a query term, deduplicated by
 * case-insensitive name and price. Without usable terms every item is kept.
 */
export function filterPriceItems(items: readonly PriceItem[], query: string): PriceItem[] {
  const terms = extractQueryTerms(query);
  if (terms.length === 0) {
    return [...items];
  }

  const seen = new Set<string>();
  const filtered: PriceItem[] = [];
  for (const item of items) {
    const nameLower = item.name.toLowerCase();
    if (!terms.some((term) => nameLower.includes(term))) {
      continue;
    }
    const key = JSON.stringify([nameLower, item.price]);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    filtered.push(item);
  }
  return filtered;
}
