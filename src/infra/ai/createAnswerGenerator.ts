import { AppConfig } from "../../config/env.js";
import { CodexCliClient } from "./codexCliClient.js";
import { OllamaClient } from "./ollamaClient.js";
import { OpenAiClient } from "./openAiClient.js";
import { AnswerGenerator } from "./types.js";

export function createAnswerGenerator(config: AppConfig): AnswerGenerator {
  switch (config.answerBackend) {
    case "openai":
      if (!config.openaiApiKey) {
        throw new Error("ANSWER_BACKEND=openai requires OPENAI_API_KEY.");
      }
      return new OpenAiClient({
        apiKey: config.openaiApiKey,
        chatModel: config.openaiModel,
      });
    case "ollama":
      return new OllamaClient({
        baseUrl: config.ollamaBaseUrl,
        chatModel: config.ollamaChatModel,
      });
    case "codex":
      return new CodexCliClient({
        bin: config.codexBin,
        args: config.codexArgs,
      });
  }
}
