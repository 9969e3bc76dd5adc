import { z } from "zod";
import { buildChatMessages } from "./promptFormat.js";
import {
  AnswerGenerator,
  GenerationRequest,
  GenerationResult,
  generationFailure,
} from "./types.js";

type FetchFn = typeof fetch;

interface OpenAiClientOptions {
  apiKey: string;
  chatModel: string;
  baseUrl?: string;
  fetchImpl?: FetchFn;
}

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }).optional(),
      }),
    )
    .optional(),
});

export class OpenAiClient implements AnswerGenerator {
  readonly backend = "openai";

  private readonly fetchImpl: FetchFn;

  private readonly baseUrl: string;

  constructor(private readonly options: OpenAiClientOptions) {
    if (!options.apiKey) {
      throw new Error("OPENAI_API_KEY is required for the openai answer backend.");
    }
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.baseUrl = options.baseUrl ?? "https://api.openai.com/v1";
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: this.options.chatModel,
          temperature: 0.2,
          messages: buildChatMessages(
            request.systemPrompt,
            request.conversation,
            request.snippets,
          ),
        }),
        signal: AbortSignal.timeout(request.timeoutMs),
      });
    } catch (error) {
      return fetchFailure("OpenAI", error);
    }

    if (!response.ok) {
      let detail: string;
      try {
        detail = await response.text();
      } catch (error) {
        return fetchFailure("OpenAI", error);
      }
      return generationFailure("http", `OpenAI chat failed (${response.status}): ${detail}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      return fetchFailure("OpenAI", error);
    }
    const parsed = chatResponseSchema.safeParse(body);
    const content = parsed.success ? parsed.data.choices?.[0]?.message?.content?.trim() : undefined;
    if (!content) {
      return generationFailure("invalid_response", "OpenAI chat returned no message content.");
    }
    return { ok: true, text: content };
  }
}

/** Maps a rejected fetch or body read onto a failure category. */
export function fetchFailure(provider: string, error: unknown): GenerationResult {
  if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
    return generationFailure("timeout", `${provider} request timed out.`);
  }
  if (error instanceof SyntaxError) {
    return generationFailure("invalid_response", `${provider} returned malformed JSON.`);
  }
  const reason = error instanceof Error ? error.message : "unknown error";
  return generationFailure("unavailable", `${provider} request failed: ${reason}`);
}
