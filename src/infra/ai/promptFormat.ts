import { ConversationTurn, Snippet } from "../../domain/types.js";

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export function formatSnippetBlock(snippets: readonly Snippet[]): string {
  return snippets
    .map(
      (snippet, idx) =>
        `[${idx + 1}] ${snippet.path}#${snippet.heading} (lines ${snippet.lineStart}-${snippet.lineEnd})\n${snippet.excerpt}`,
    )
    .join("\n\n");
}

/** Chat-API message list: system prompt, prior turns, then the vault excerpts. */
export function buildChatMessages(
  systemPrompt: string,
  conversation: readonly ConversationTurn[],
  snippets: readonly Snippet[],
): ChatMessage[] {
  const messages: ChatMessage[] = [{ role: "system", content: systemPrompt }];
  messages.push(...conversation.map((turn) => ({ role: turn.role, content: turn.content })));
  if (snippets.length > 0) {
    messages.push({
      role: "system",
      content: `Vault snippets:\n${formatSnippetBlock(snippets)}`,
    });
  }
  return messages;
}

/** Single-document transcript for CLI backends that read one prompt on stdin. */
export function buildTranscriptPrompt(
  systemPrompt: string,
  conversation: readonly ConversationTurn[],
  snippets: readonly Snippet[],
): string {
  const lines = ["SYSTEM:", systemPrompt.trim(), "", "CONVERSATION:"];
  for (const turn of conversation) {
    lines.push(`${turn.role === "user" ? "User" : "Assistant"}: ${turn.content}`);
  }
  if (snippets.length > 0) {
    lines.push("", "VAULT SNIPPETS:", formatSnippetBlock(snippets));
  }
  lines.push("", "ASSISTANT:");
  return lines.join("\n");
}
