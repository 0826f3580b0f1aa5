import type { GenerationConfig } from "@groundwork/types";
import type { CircuitBreakerOptions } from "@groundwork/errors";
import type { IChatModel } from "./chat-model.interface.js";
import { OpenAIChatModel } from "./openai-chat-model.js";

export function createChatModel(
  config: Pick<GenerationConfig, "apiKey" | "model">,
  breaker?: CircuitBreakerOptions,
): IChatModel {
  if (!config.apiKey) {
    throw new Error("API key is required for the generation model");
  }
  return new OpenAIChatModel({ apiKey: config.apiKey, model: config.model, breaker });
}
