import { fileStem } from "./sectioning.js";
import { collapseWhitespace, tokenize } from "../utils/text.js";

/** Inserts spaces at lower→upper case and letter↔digit boundaries. */
export function splitCamel(text: string): string {
  return text
    .replace(/(\p{Ll})(\p{Lu})/gu, "$1 $2")
    .replace(/(\p{N})(\p{L})/gu, "$1 $2")
    .replace(/(\p{L})(\p{N})/gu, "$1 $2");
}

/**
 * Lowercase lookup keys for a note: the title and filename in a few
 * spellings, plus their leading two- and three-word prefixes. Codes written
 * as `GS 1` are folded back into `gs1`.
 */
export function buildAliases(title: string, filename: string): string[] {
  const stem = fileStem(filename);
  const variants = new Set([title, stem, stem.replace(/-/g, " "), stem.replace(/_/g, " ")]);

  const expanded = new Set<string>();
  for (const variant of variants) {
    if (!variant) {
      continue;
    }
    expanded.add(variant);
    expanded.add(splitCamel(variant));
  }

  const aliases = new Set<string>();
  for (const variant of expanded) {
    const cleaned = collapseWhitespace(variant);
    if (!cleaned) {
      continue;
    }
    const lowered = cleaned.toLowerCase();
    aliases.add(lowered);

    let tokens = tokenize(lowered);
    if (tokens.length >= 2 && tokens[0] === "gs" && /^\d+$/.test(tokens[1])) {
      tokens = [`gs${tokens[1]}`, ...tokens.slice(2)];
    }
    if (tokens.length >= 2) {
      aliases.add(tokens.slice(0, 2).join(" "));
    }
    if (tokens.length >= 3) {
      aliases.add(tokens.slice(0, 3).join(" "));
    }
    if (tokens.length >= 2 && tokens[0].startsWith("gs1")) {
      aliases.add(tokens.slice(1, 3).join(" "));
    }
  }

  return [...aliases].sort();
}
