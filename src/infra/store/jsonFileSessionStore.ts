import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { SessionKey } from "../../domain/sessionStore.js";
import { ConversationTurn } from "../../domain/types.js";
import { Logger, noopLogger } from "../../utils/logger.js";
import { InMemorySessionStore, SessionStoreSnapshot } from "./inMemorySessionStore.js";

const turnSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
});

const persistedSchema = z.object({
  sessions: z.record(z.array(turnSchema)).default({}),
  sources: z.record(z.array(z.string())).default({}),
});

/**
 * Session store backed by a JSON file. The file is read once on first use;
 * an absent or unreadable file starts an empty store. Every mutation rewrites
 * the file through a serialized write chain.
 */
export class JsonFileSessionStore extends InMemorySessionStore {
  private initialized = false;

  private writeChain: Promise<void> = Promise.resolve();

  private readonly absolutePath: string;

  constructor(
    filePath: string,
    maxTurns: number,
    private readonly logger: Logger = noopLogger,
  ) {
    super(maxTurns);
    this.absolutePath = path.resolve(filePath);
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    try {
      const raw = await fs.readFile(this.absolutePath, "utf-8");
      this.importSnapshot(parseSnapshot(raw));
    } catch (error) {
      if (!isFileMissing(error)) {
        this.logger.warn(
          `Ignoring unreadable session file ${this.absolutePath}: ${
            error instanceof Error ? error.message : String(error)
          }`,
        );
      }
    }

    this.initialized = true;
  }

  async getSession(key: SessionKey): Promise<ConversationTurn[]> {
    await this.initialize();
    return super.getSession(key);
  }

  async updateSession(key: SessionKey, turns: ConversationTurn[]): Promise<void> {
    await this.initialize();
    await super.updateSession(key, turns);
    await this.enqueueWrite(() => this.persistNow());
  }

  async getSources(key: SessionKey): Promise<string[]> {
    await this.initialize();
    return super.getSources(key);
  }

  async setSources(key: SessionKey, sources: string[]): Promise<void> {
    await this.initialize();
    await super.setSources(key, sources);
    await this.enqueueWrite(() => this.persistNow());
  }

  private enqueueWrite(task: () => Promise<void>): Promise<void> {
    this.writeChain = this.writeChain.then(task, task);
    return this.writeChain;
  }

  private async persistNow(): Promise<void> {
    await fs.mkdir(path.dirname(this.absolutePath), { recursive: true });
    const serialized = JSON.stringify(this.exportSnapshot(), null, 2);
    const tempPath = `${this.absolutePath}.tmp`;
    await fs.writeFile(tempPath, serialized, "utf-8");
    await fs.rename(tempPath, this.absolutePath);
  }
}

function parseSnapshot(raw: string): SessionStoreSnapshot {
  return persistedSchema.parse(JSON.parse(raw));
}

function isFileMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
