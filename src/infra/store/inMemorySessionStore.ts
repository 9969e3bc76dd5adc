import { SessionKey, SessionStore, toSessionKey } from "../../domain/sessionStore.js";
import { ConversationTurn } from "../../domain/types.js";

export interface SessionStoreSnapshot {
  sessions: Record<string, ConversationTurn[]>;
  sources: Record<string, string[]>;
}

export class InMemorySessionStore implements SessionStore {
  protected sessions = new Map<string, ConversationTurn[]>();

  protected sources = new Map<string, string[]>();

  constructor(protected readonly maxTurns: number) {}

  async getSession(key: SessionKey): Promise<ConversationTurn[]> {
    return [...(this.sessions.get(toSessionKey(key)) ?? [])];
  }

  async updateSession(key: SessionKey, turns: ConversationTurn[]): Promise<void> {
    this.sessions.set(toSessionKey(key), turns.slice(-this.maxTurns));
  }

  async getSources(key: SessionKey): Promise<string[]> {
    return [...(this.sources.get(toSessionKey(key)) ?? [])];
  }

  async setSources(key: SessionKey, sources: string[]): Promise<void> {
    this.sources.set(toSessionKey(key), [...sources]);
  }

  protected exportSnapshot(): SessionStoreSnapshot {
    return {
      sessions: Object.fromEntries(this.sessions),
      sources: Object.fromEntries(this.sources),
    };
  }

  protected importSnapshot(snapshot: SessionStoreSnapshot): void {
    this.sessions = new Map(Object.entries(snapshot.sessions));
    this.sources = new Map(Object.entries(snapshot.sources));
  }
}
