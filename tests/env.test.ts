import { describe, expect, it } from "vitest";
import { loadConfig, splitArgs } from "../src/config/env.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      vaultPath: null,
      answerBackend: "codex",
      codexBin: "codex",
      codexArgs: [],
      maxSnippets: 10,
      maxSnippetLines: 5,
      sessionPath: ".data/sessions.json",
      sessionMaxTurns: 16,
      requestTimeoutMs: 60_000,
      transport: "stdio",
      port: 3000,
      logLevel: "info",
    });
  });

  it("trims paths, converts seconds and splits codex arguments", () => {
    const config = loadConfig({
      VAULT_PATH: "  /srv/vault ",
      REQUEST_TIMEOUT_S: "2.5",
      CODEX_ARGS: `--model "gpt 5" -q`,
    });

    expect(config.vaultPath).toBe("/srv/vault");
    expect(config.requestTimeoutMs).toBe(2500);
    expect(config.codexArgs).toEqual(["--model", "gpt 5", "-q"]);
  });

  it("fails fast when the openai backend has no key", () => {
    expect(() => loadConfig({ ANSWER_BACKEND: "openai" })).toThrow(
      "ANSWER_BACKEND=openai requires OPENAI_API_KEY.",
    );
    expect(loadConfig({ ANSWER_BACKEND: "openai", OPENAI_API_KEY: "test-secret" }).openaiApiKey).toBe(
      "test-secret",
    );
  });

  it("rejects out-of-range numbers", () => {
    expect(() => loadConfig({ MAX_SNIPPETS: "0" })).toThrow();
  });
});

describe("splitArgs", () => {
  it("groups quoted words", () => {
    expect(splitArgs(`a 'b c' "d e" f`)).toEqual(["a", "b c", "d e", "f"]);
    expect(splitArgs("   ")).toEqual([]);
  });
});
