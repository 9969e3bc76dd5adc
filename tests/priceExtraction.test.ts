import { describe, expect, it } from "vitest";
import { PriceItem, Section } from "../src/domain/types.js";
import {
  extractPriceFromLine,
  extractPriceItems,
  filterPriceItems,
} from "../src/pipelines/priceExtraction.js";

function section(path: string, heading: string, lineStart: number, text: string): Section {
  const lineCount = text.split("\n").length;
  return { path, heading, lineStart, lineEnd: lineStart + lineCount - 1, text, score: 0 };
}

function item(name: string, price: string, path = "Pricing.md"): PriceItem {
  return { name, price, path, heading: "Pricing", lineStart: 1, lineEnd: 2 };
}

describe("price extraction", () => {
  it("reads a table row with the name in another cell", () => {
    const items = extractPriceItems([
      section("Pricing.md", "Pricing", 1, "## Pricing\n| Basis | 499 kr. |"),
    ]);

    expect(items).toEqual([
      {
        name: "Basis",
        price: "499 kr.",
        path: "Pricing.md",
        heading: "Pricing",
        lineStart: 1,
        lineEnd: 2,
      },
    ]);
  });

  it("skips header and separator rows", () => {
    const items = extractPriceItems([
      section(
        "Pricing.md",
        "Priser",
        1,
        "# Priser\n| Pakke | Pris |\n|---|---|\n| Basis | 499 kr. |\n| Premium | 999 kr. |",
      ),
    ]);

    expect(items.map((entry) => [entry.name, entry.price, entry.lineStart, entry.lineEnd])).toEqual([
      ["Basis", "499 kr.", 3, 4],
      ["Premium", "999 kr.", 4, 5],
    ]);
  });

  it("keeps a period qualifier after the price", () => {
    expect(extractPriceFromLine("- Premium: 1.299 kr. / år")).toBe("1.299 kr. / år");
    expect(extractPriceFromLine("350 DKK pr. md. ekstra")).toBe("350 DKK pr. md.");
    expect(extractPriceFromLine("no price here")).toBeNull();

    const [premium] = extractPriceItems([
      section("Pricing.md", "Pricing", 5, "## Pricing\n- Premium: 1.299 kr. / år"),
    ]);
    expect(premium.name).toBe("Premium");
    expect(premium.price).toBe("1.299 kr. / år");
  });

  it("takes the label from the lines above a bare price", () => {
    const [guld] = extractPriceItems([
      section("Medlemskab.md", "Guld", 10, "### Guld\nGuld medlemskab\n\n2.500 kr"),
    ]);

    expect(guld).toMatchObject({ name: "Guld medlemskab", price: "2.500 kr", lineStart: 12, lineEnd: 13 });
  });

  it("skips generic labels while walking upward", () => {
    const [gtin] = extractPriceItems([
      section("Certificering.md", "Certificering", 20, "## Certificering\nGTIN-registrering\nPris:\n350 DKK"),
    ]);

    expect(gtin).toMatchObject({ name: "GTIN-registrering", price: "350 DKK", lineStart: 22, lineEnd: 23 });
  });

  it("replaces a qualifier-only name with the label above", () => {
    const [support] = extractPriceItems([
      section("Support.md", "Support", 1, "## Support\nSupport\ninkl. moms 100 kr"),
    ]);

    expect(support.name).toBe("Support");
    expect(support.price).toBe("100 kr");
  });

  it("is deterministic and ordered by path then line", () => {
    const sections = [
      section("b.md", "B", 1, "## B\n| Extra | 50 kr |"),
      section("a.md", "A", 1, "## A\n| Basis | 499 kr. |"),
    ];

    const first = extractPriceItems(sections);
    const second = extractPriceItems(sections);
    expect(second).toEqual(first);
    expect(first.map((entry) => entry.path)).toEqual(["a.md", "b.md"]);
  });

  it("filters by query terms and drops repeated name and price pairs", () => {
    const items = [
      item("Basis", "499 kr."),
      item("Premium", "999 kr."),
      item("Enterprise", "2.999 kr."),
      item("basis", "499 kr.", "Other.md"),
    ];

    expect(filterPriceItems(items, "hvad koster Basis pakken")).toEqual([item("Basis", "499 kr.")]);
  });

  it("keeps everything when the query has no usable terms", () => {
    const items = [item("Basis", "499 kr."), item("Premium", "999 kr.")];
    expect(filterPriceItems(items, "hvad koster det?")).toEqual(items);
  });
});
