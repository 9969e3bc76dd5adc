import { z } from "zod";
import { fetchFailure } from "./openAiClient.js";
import { buildChatMessages } from "./promptFormat.js";
import {
  AnswerGenerator,
  GenerationRequest,
  GenerationResult,
  generationFailure,
} from "./types.js";

interface OllamaClientOptions {
  baseUrl: string;
  chatModel: string;
  fetchImpl?: typeof fetch;
}

const ollamaChatResponseSchema = z.object({
  message: z.object({ content: z.string().optional() }).optional(),
});

export class OllamaClient implements AnswerGenerator {
  readonly backend = "ollama";

  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: OllamaClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.options.baseUrl}/api/chat`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: this.options.chatModel,
          stream: false,
          keep_alive: "30m",
          options: {
            temperature: 0.1,
            top_p: 0.9,
          },
          messages: buildChatMessages(
            request.systemPrompt,
            request.conversation,
            request.snippets,
          ),
        }),
        signal: AbortSignal.timeout(request.timeoutMs),
      });
    } catch (error) {
      return fetchFailure("Ollama", error);
    }

    if (!response.ok) {
      let detail: string;
      try {
        detail = await response.text();
      } catch (error) {
        return fetchFailure("Ollama", error);
      }
      return generationFailure("http", `Ollama chat failed (${response.status}): ${detail}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      return fetchFailure("Ollama", error);
    }
    const parsed = ollamaChatResponseSchema.safeParse(body);
    const content = parsed.success ? parsed.data.message?.content?.trim() : undefined;
    if (!content) {
      return generationFailure("invalid_response", "Ollama chat returned an empty message.");
    }
    return { ok: true, text: content };
  }
}
