import path from "node:path";
import { Section } from "../domain/types.js";

export const TOP_HEADING = "(top)";

const HEADING_REGEX = /^(#{1,6})\s+(.*)/;

interface HeadingBoundary {
  index: number;
  heading: string;
}

export function matchHeading(line: string): string | null {
  const match = HEADING_REGEX.exec(line.trim());
  if (!match) {
    return null;
  }
  return (match[2] ?? "").trim();
}

/** First heading with text, else the filename stem with `_` and `-` read as spaces. */
export function detectTitle(lines: string[], filename: string): string {
  for (const line of lines) {
    const heading = matchHeading(line);
    if (heading) {
      return heading;
    }
  }
  return fileStem(filename).replace(/_/g, " ").replace(/-/g, " ");
}

export function fileStem(filename: string): string {
  const base = path.basename(filename);
  const ext = path.extname(base);
  return ext ? base.slice(0, -ext.length) : base;
}

/**
 * Splits a note into heading-delimited sections. Lines before the first
 * heading form their own `(top)` section; a note without headings is a single
 * `(top)` section and an empty note has none.
 */
export function splitIntoSections(notePath: string, lines: string[]): Section[] {
  if (lines.length === 0) {
    return [];
  }

  const boundaries: HeadingBoundary[] = [];
  lines.forEach((line, index) => {
    const heading = matchHeading(line);
    if (heading !== null) {
      boundaries.push({ index, heading: heading || TOP_HEADING });
    }
  });

  if (boundaries.length === 0) {
    return [createSection(notePath, TOP_HEADING, lines, 0, lines.length - 1)];
  }

  const sections: Section[] = [];
  const firstHeadingIndex = boundaries[0].index;
  if (firstHeadingIndex > 0) {
    sections.push(createSection(notePath, TOP_HEADING, lines, 0, firstHeadingIndex - 1));
  }

  boundaries.forEach((boundary, position) => {
    const next = boundaries[position + 1];
    const endIndex = next ? next.index - 1 : lines.length - 1;
    sections.push(createSection(notePath, boundary.heading, lines, boundary.index, endIndex));
  });

  return sections;
}

function createSection(
  notePath: string,
  heading: string,
  lines: string[],
  startIndex: number,
  endIndex: number,
): Section {
  return {
    path: notePath,
    heading,
    lineStart: startIndex + 1,
    lineEnd: endIndex + 1,
    text: lines.slice(startIndex, endIndex + 1).join("\n").trim(),
    score: 0,
  };
}
