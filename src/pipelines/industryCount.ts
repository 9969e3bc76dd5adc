import { Snippet, VaultSnapshot } from "../domain/types.js";
import { splitLines } from "../utils/text.js";

const INDEX_NOTE_SUFFIX = "gs1dk brancher index.md";
const PAGES_HEADING = "pages";
const LIST_ENTRY_PREFIX = "- [[";
const MAX_LISTED = 20;

/**
 * Answers "how many industries" from the industry index note: counts the
 * wiki-link bullets under its Pages heading.
 */
export function buildIndustryCountSnippets(snapshot: VaultSnapshot): Snippet[] {
  let targetPath: string | null = null;
  for (const notePath of snapshot.notes.keys()) {
    if (notePath.toLowerCase().endsWith(INDEX_NOTE_SUFFIX)) {
      targetPath = notePath;
      break;
    }
  }
  if (!targetPath) {
    return [];
  }

  const pages = snapshot.sections.find(
    (section) => section.path === targetPath && section.heading.toLowerCase() === PAGES_HEADING,
  );
  if (!pages) {
    return [];
  }

  const entries = splitLines(pages.text).filter((line) =>
    line.trim().startsWith(LIST_ENTRY_PREFIX),
  );
  if (entries.length === 0) {
    return [];
  }

  return [
    {
      path: pages.path,
      heading: pages.heading,
      lineStart: pages.lineStart,
      lineEnd: pages.lineEnd,
      excerpt: [`Antal brancher i index: ${entries.length}`, ...entries.slice(0, MAX_LISTED)].join(
        "\n",
      ),
      score: 999,
    },
  ];
}
