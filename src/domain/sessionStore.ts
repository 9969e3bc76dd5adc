import { ConversationTurn } from "./types.js";

export interface SessionKey {
  userId: string;
  channelId: string;
}

export interface SessionStore {
  getSession(key: SessionKey): Promise<ConversationTurn[]>;
  updateSession(key: SessionKey, turns: ConversationTurn[]): Promise<void>;
  getSources(key: SessionKey): Promise<string[]>;
  setSources(key: SessionKey, sources: string[]): Promise<void>;
}

export function toSessionKey({ userId, channelId }: SessionKey): string {
  return `${userId}:${channelId}`;
}
