export interface Section {
  path: string;
  heading: string;
  lineStart: number;
  lineEnd: number;
  text: string;
  score: number;
}

export interface NoteMeta {
  path: string;
  title: string;
  aliases: string[];
}

export interface PriceItem {
  name: string;
  price: string;
  path: string;
  heading: string;
  lineStart: number;
  lineEnd: number;
}

export interface Snippet {
  path: string;
  heading: string;
  lineStart: number;
  lineEnd: number;
  excerpt: string;
  score: number;
}

export type ConversationRole = "user" | "assistant";

export interface ConversationTurn {
  role: ConversationRole;
  content: string;
}

export interface VaultSnapshot {
  sections: readonly Section[];
  notes: ReadonlyMap<string, NoteMeta>;
  builtAt: string | null;
}
