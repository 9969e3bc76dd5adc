import { promises as fs } from "node:fs";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { VaultIndex } from "../src/infra/vault/vaultIndex.js";
import { createTempVault, removeTempVault } from "./helpers/tempVault.js";

const FILES = {
  "Pricing.md": "# Pricing\n| Pakke | Pris |\n|---|---|\n| Basis | 499 kr. |\n| Premium | 999 kr. |\n",
  "notes/Onboarding Guide.md":
    "Intro line\n# Onboarding\nSteps to onboard a new member.\n## Checklist\n- Create account\n- Send welcome mail\n",
  "UPPER.MD": "no headings here\nsecond line\n",
  "empty.md": "",
  "README.txt": "# Not a note\n",
};

describe("VaultIndex", () => {
  let root = "";

  beforeAll(async () => {
    root = await createTempVault("vault-index", FILES);
  });

  afterAll(async () => {
    await removeTempVault(root);
  });

  it("indexes every markdown note regardless of extension case", async () => {
    const index = new VaultIndex(root);
    const result = await index.build();

    expect(result.note_count).toBe(4);
    expect(result.section_count).toBe(5);
    expect(result.built_at).not.toBeNull();
    expect(index.noteCount).toBe(4);
    expect([...index.snapshot().notes.keys()]).toEqual([
      "Pricing.md",
      "UPPER.MD",
      "empty.md",
      "notes/Onboarding Guide.md",
    ]);
  });

  it("derives titles and aliases per note", async () => {
    const index = new VaultIndex(root);
    await index.build();

    const onboarding = index.snapshot().notes.get("notes/Onboarding Guide.md");
    expect(onboarding?.title).toBe("Onboarding");
    expect(onboarding?.aliases).toContain("onboarding guide");
    expect(index.snapshot().notes.get("UPPER.MD")?.title).toBe("UPPER");
  });

  it("scores body, heading, path and exact phrase matches", async () => {
    const index = new VaultIndex(root);
    await index.build();

    const results = index.findSections("checklist");
    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({
      path: "notes/Onboarding Guide.md",
      heading: "Checklist",
      lineStart: 4,
      lineEnd: 6,
      score: 12,
    });
  });

  it("boosts every section of a note named in the query", async () => {
    const index = new VaultIndex(root);
    await index.build();

    const results = index.findSections("onboarding guide");
    expect(results.map((section) => [section.heading, section.score])).toEqual([
      ["Onboarding", 28],
      ["(top)", 24],
      ["Checklist", 24],
    ]);
  });

  it("returns nothing for queries without word tokens", async () => {
    const index = new VaultIndex(root);
    await index.build();
    expect(index.findSections("!!! ???")).toEqual([]);
  });

  it("looks notes up by alias and expands them to sections", async () => {
    const index = new VaultIndex(root);
    await index.build();

    expect(index.findPathsByAlias("what does pricing say")).toEqual(["Pricing.md"]);
    expect(
      index.sectionsForPaths(["notes/Onboarding Guide.md"]).map((section) => section.heading),
    ).toEqual(["(top)", "Onboarding", "Checklist"]);
  });

  it("ranks a given section list without the alias boost", async () => {
    const index = new VaultIndex(root);
    await index.build();

    const ranked = index.rankSections(
      index.sectionsForPaths(["notes/Onboarding Guide.md"]),
      "onboarding guide",
      5,
    );
    expect(ranked.map((section) => section.score)).toEqual([8, 4, 4]);
  });

  it("builds an empty index without a usable root", async () => {
    const missing = new VaultIndex(path.join(root, "does-not-exist"));
    expect(await missing.build()).toEqual({ note_count: 0, section_count: 0, built_at: null });

    const unset = new VaultIndex(null);
    expect((await unset.build()).section_count).toBe(0);
    expect(unset.findSections("anything")).toEqual([]);
  });

  it("does not descend into symlinked directories", async () => {
    const loopRoot = await createTempVault("vault-index-loop", { "note.md": "# Note\nbody" });
    await fs.symlink(".", path.join(loopRoot, "loop"));
    try {
      const index = new VaultIndex(loopRoot);
      await index.build();

      expect(index.noteCount).toBe(1);
      expect([...index.snapshot().notes.keys()]).toEqual(["note.md"]);
    } finally {
      await removeTempVault(loopRoot);
    }
  });

  it("decodes invalid UTF-8 with replacement characters", async () => {
    const lossyRoot = await createTempVault("vault-index-lossy", {
      "broken.md": Buffer.from([0x23, 0x20, 0x41, 0xff, 0x0a, 0x62]),
    });
    try {
      const index = new VaultIndex(lossyRoot);
      await index.build();

      const [section] = index.snapshot().sections;
      expect(section.heading).toBe("A\uFFFD");
      expect(section.text).toBe("# A\uFFFD\nb");
    } finally {
      await removeTempVault(lossyRoot);
    }
  });
});
