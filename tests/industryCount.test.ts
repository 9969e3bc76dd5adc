import { describe, expect, it } from "vitest";
import { NoteMeta, Section, VaultSnapshot } from "../src/domain/types.js";
import { buildIndustryCountSnippets } from "../src/pipelines/industryCount.js";

const INDEX_PATH = "Brancher/GS1DK Brancher Index.md";

function snapshotWith(sections: Section[], paths: string[]): VaultSnapshot {
  const notes = new Map<string, NoteMeta>(
    paths.map((notePath) => [notePath, { path: notePath, title: notePath, aliases: [] }]),
  );
  return { sections, notes, builtAt: "2026-01-01T00:00:00.000Z" };
}

const pages: Section = {
  path: INDEX_PATH,
  heading: "Pages",
  lineStart: 3,
  lineEnd: 7,
  text: "## Pages\n- [[Detail]]\n- [[Fødevarer]]\n- [[Byggeri]]\nSidst opdateret 2024",
  score: 0,
};

describe("industry count", () => {
  it("counts wiki-link bullets under the Pages heading", () => {
    const snippets = buildIndustryCountSnippets(snapshotWith([pages], [INDEX_PATH]));

    expect(snippets).toEqual([
      {
        path: INDEX_PATH,
        heading: "Pages",
        lineStart: 3,
        lineEnd: 7,
        excerpt: "Antal brancher i index: 3\n- [[Detail]]\n- [[Fødevarer]]\n- [[Byggeri]]",
        score: 999,
      },
    ]);
  });

  it("lists at most twenty entries but counts them all", () => {
    const bullets = Array.from({ length: 25 }, (_, i) => `- [[Branche ${i + 1}]]`);
    const big: Section = { ...pages, text: ["## Pages", ...bullets].join("\n") };

    const [snippet] = buildIndustryCountSnippets(snapshotWith([big], [INDEX_PATH]));
    const lines = snippet.excerpt.split("\n");
    expect(lines[0]).toBe("Antal brancher i index: 25");
    expect(lines).toHaveLength(21);
    expect(lines[20]).toBe("- [[Branche 20]]");
  });

  it("returns nothing without the index note or its Pages section", () => {
    expect(buildIndustryCountSnippets(snapshotWith([], []))).toEqual([]);
    const other: Section = { ...pages, heading: "Notes" };
    expect(buildIndustryCountSnippets(snapshotWith([other], [INDEX_PATH]))).toEqual([]);
  });
});
