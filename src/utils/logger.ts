import { LogLevel } from "../config/env.js";

/**
 * Leveled logger writing to stderr. Stdout is reserved for the stdio MCP
 * transport, so nothing here may print to it.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export class StderrLogger implements Logger {
  constructor(
    private readonly scope: string,
    private readonly level: LogLevel = "info",
  ) {}

  child(scope: string): StderrLogger {
    return new StderrLogger(`${this.scope}:${scope}`, this.level);
  }

  debug(message: string): void {
    this.write("debug", message);
  }

  info(message: string): void {
    this.write("info", message);
  }

  warn(message: string): void {
    this.write("warn", message);
  }

  error(message: string, error?: unknown): void {
    const detail = error === undefined ? "" : `: ${describeError(error)}`;
    this.write("error", `${message}${detail}`);
  }

  private write(level: Exclude<LogLevel, "silent">, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }
    console.error(`${new Date().toISOString()} ${level.toUpperCase()} [${this.scope}] ${message}`);
  }
}

export const noopLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? error.message;
  }
  return String(error);
}
