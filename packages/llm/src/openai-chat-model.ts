import OpenAI from "openai";
import type CircuitBreaker from "opossum";
import { GenerationError, createCircuitBreaker, errorMessage } from "@groundwork/errors";
import type { CircuitBreakerOptions } from "@groundwork/errors";
import type { ChatRequest, ChatResult, IChatModel } from "./chat-model.interface.js";

const DEFAULT_MODEL = "gpt-4o-mini";
const DEFAULT_TIMEOUT_MS = 60_000;

/** The slice of the OpenAI SDK this model calls. */
export interface ChatCompletionsApi {
  create(
    body: OpenAI.ChatCompletionCreateParamsNonStreaming,
    options?: { signal?: AbortSignal },
  ): Promise<{ model: string; choices: Array<{ message: { content: string | null } }> }>;
}

export interface OpenAIChatModelConfig {
  apiKey: string;
  model?: string;
  breaker?: CircuitBreakerOptions;
  /** Overrides the SDK client, mainly for tests. */
  completions?: ChatCompletionsApi;
}

function isTimeout(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ETIMEDOUT";
}

/**
 * OpenAI chat completions behind an opossum circuit breaker. Repeated
 * upstream failures open the circuit and later calls fail fast until the
 * reset timeout passes.
 */
export class OpenAIChatModel implements IChatModel {
  readonly name = "openai";
  readonly model: string;
  private breaker: CircuitBreaker<[ChatRequest], ChatResult>;
  private completions: ChatCompletionsApi;

  constructor(config: OpenAIChatModelConfig) {
    this.model = config.model ?? DEFAULT_MODEL;
    // Retries are owned by the caller
    this.completions =
      config.completions ?? new OpenAI({ apiKey: config.apiKey, maxRetries: 0 }).chat.completions;
    this.breaker = createCircuitBreaker("openai-chat", (request: ChatRequest) => this.send(request), {
      timeout: DEFAULT_TIMEOUT_MS,
      ...config.breaker,
    });
  }

  get circuitState(): "open" | "halfOpen" | "closed" {
    if (this.breaker.opened) return "open";
    if (this.breaker.halfOpen) return "halfOpen";
    return "closed";
  }

  async complete(request: ChatRequest): Promise<ChatResult> {
    try {
      return await this.breaker.fire(request);
    } catch (err: unknown) {
      const timedOut = request.signal?.aborted === true || isTimeout(err);
      throw new GenerationError(
        timedOut ? "Generation timed out" : `Generation failed: ${errorMessage(err)}`,
        this.name,
        { cause: err, timedOut },
      );
    }
  }

  private async send(request: ChatRequest): Promise<ChatResult> {
    const response = await this.completions.create(
      {
        model: this.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        messages: [
          { role: "system", content: request.system },
          { role: "user", content: request.prompt },
        ],
        ...(request.responseFormat === "json"
          ? { response_format: { type: "json_object" as const } }
          : {}),
      },
      { signal: request.signal },
    );

    const content = response.choices[0]?.message.content;
    if (!content) {
      throw new Error("Model returned an empty completion");
    }

    return { text: content, model: response.model };
  }
}
