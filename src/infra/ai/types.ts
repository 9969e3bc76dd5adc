import { ConversationTurn, Snippet } from "../../domain/types.js";

export interface GenerationRequest {
  systemPrompt: string;
  conversation: ConversationTurn[];
  snippets: Snippet[];
  timeoutMs: number;
}

export type GenerationFailureKind =
  | "timeout"
  | "unavailable"
  | "process"
  | "http"
  | "invalid_response";

export type GenerationResult =
  | { ok: true; text: string }
  | { ok: false; kind: GenerationFailureKind; message: string };

export interface AnswerGenerator {
  readonly backend: string;
  generate(request: GenerationRequest): Promise<GenerationResult>;
}

export function generationFailure(
  kind: GenerationFailureKind,
  message: string,
): GenerationResult {
  return { ok: false, kind, message };
}
