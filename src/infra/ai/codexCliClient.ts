import { execFile } from "node:child_process";
import { buildTranscriptPrompt } from "./promptFormat.js";
import {
  AnswerGenerator,
  GenerationRequest,
  GenerationResult,
  generationFailure,
} from "./types.js";

interface CodexCliClientOptions {
  bin: string;
  args: string[];
  cwd?: string;
}

interface ExecOutcome {
  error: (Error & { code?: string | number | null; killed?: boolean }) | null;
  stdout: string;
  stderr: string;
}

const MAX_OUTPUT_BYTES = 8 * 1024 * 1024;

/**
 * Runs a local agent CLI (`<bin> exec <args...>`) with the flattened
 * transcript on stdin and takes its stdout as the answer.
 */
export class CodexCliClient implements AnswerGenerator {
  readonly backend = "codex";

  constructor(private readonly options: CodexCliClientOptions) {}

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const prompt = buildTranscriptPrompt(
      request.systemPrompt,
      request.conversation,
      request.snippets,
    );
    const { error, stdout, stderr } = await this.run(prompt, request.timeoutMs);

    if (!error) {
      const text = stdout.trim();
      return text
        ? { ok: true, text }
        : generationFailure("invalid_response", "Local codex exec produced no output.");
    }
    if (error.code === "ENOENT") {
      return generationFailure(
        "unavailable",
        `Local codex binary not found (${this.options.bin}). Check CODEX_BIN.`,
      );
    }
    if (error.killed) {
      return generationFailure(
        "timeout",
        `Local codex exec timed out after ${request.timeoutMs} ms.`,
      );
    }
    const detail = stderr.trim() || stdout.trim() || error.message;
    return generationFailure("process", `Local codex exec failed: ${detail}`);
  }

  private run(input: string, timeoutMs: number): Promise<ExecOutcome> {
    return new Promise((resolve) => {
      const child = execFile(
        this.options.bin,
        ["exec", ...this.options.args],
        {
          cwd: this.options.cwd,
          timeout: timeoutMs,
          killSignal: "SIGKILL",
          maxBuffer: MAX_OUTPUT_BYTES,
          encoding: "utf-8",
        },
        (error, stdout, stderr) => {
          resolve({ error, stdout, stderr });
        },
      );
      // The child may exit before reading stdin; the exec callback reports that.
      child.stdin?.on("error", () => undefined);
      child.stdin?.end(input);
    });
  }
}
