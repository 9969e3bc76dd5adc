import { z } from "zod";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const envSchema = z.object({
  VAULT_PATH: optionalString,
  ANSWER_BACKEND: z.enum(["codex", "openai", "ollama"]).default("codex"),
  CODEX_BIN: z.string().default("codex"),
  CODEX_ARGS: z.string().default(""),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  OLLAMA_BASE_URL: z.string().default("http://127.0.0.1:11434"),
  OLLAMA_CHAT_MODEL: z.string().default("qwen2.5:7b-instruct"),
  MAX_SNIPPETS: z.coerce.number().int().positive().default(10),
  MAX_SNIPPET_LINES: z.coerce.number().int().nonnegative().default(5),
  SESSION_PATH: z.string().default(".data/sessions.json"),
  SESSION_MAX_TURNS: z.coerce.number().int().positive().default(16),
  REQUEST_TIMEOUT_S: z.coerce.number().positive().default(60),
  MCP_TRANSPORT: z.enum(["stdio", "http"]).default("stdio"),
  MCP_HOST: z.string().default("0.0.0.0"),
  MCP_PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export type AnswerBackend = "codex" | "openai" | "ollama";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface AppConfig {
  vaultPath: string | null;
  answerBackend: AnswerBackend;
  codexBin: string;
  codexArgs: string[];
  openaiApiKey: string | null;
  openaiModel: string;
  ollamaBaseUrl: string;
  ollamaChatModel: string;
  maxSnippets: number;
  maxSnippetLines: number;
  sessionPath: string;
  sessionMaxTurns: number;
  requestTimeoutMs: number;
  transport: "stdio" | "http";
  host: string;
  port: number;
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  if (parsed.ANSWER_BACKEND === "openai" && !parsed.OPENAI_API_KEY) {
    throw new Error("ANSWER_BACKEND=openai requires OPENAI_API_KEY.");
  }

  return {
    vaultPath: parsed.VAULT_PATH ?? null,
    answerBackend: parsed.ANSWER_BACKEND,
    codexBin: parsed.CODEX_BIN,
    codexArgs: splitArgs(parsed.CODEX_ARGS),
    openaiApiKey: parsed.OPENAI_API_KEY ?? null,
    openaiModel: parsed.OPENAI_MODEL,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL,
    ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
    maxSnippets: parsed.MAX_SNIPPETS,
    maxSnippetLines: parsed.MAX_SNIPPET_LINES,
    sessionPath: parsed.SESSION_PATH,
    sessionMaxTurns: parsed.SESSION_MAX_TURNS,
    requestTimeoutMs: Math.round(parsed.REQUEST_TIMEOUT_S * 1000),
    transport: parsed.MCP_TRANSPORT,
    host: parsed.MCP_HOST,
    port: parsed.MCP_PORT,
    logLevel: parsed.LOG_LEVEL,
  };
}

// Shell-style split: whitespace separated, single or double quotes group words.
export function splitArgs(raw: string): string[] {
  const args: string[] = [];
  const pattern = /"([^"]*)"|'([^']*)'|(\S+)/g;
  for (const match of raw.matchAll(pattern)) {
    args.push(match[1] ?? match[2] ?? match[3] ?? "");
  }
  return args;
}
