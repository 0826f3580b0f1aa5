import { describe, it, expect, vi } from "vitest";
import { GenerationError } from "@groundwork/errors";
import { OpenAIChatModel } from "./openai-chat-model.js";
import type { ChatCompletionsApi } from "./openai-chat-model.js";
import { createChatModel } from "./factory.js";

const REQUEST = { system: "Be brief.", prompt: "Say hi", maxTokens: 64, temperature: 0.2 };

function reply(content: string | null) {
  return { model: "gpt-4o-mini-2024-07-18", choices: [{ message: { content } }] };
}

function fakeCompletions(impl: ChatCompletionsApi["create"]) {
  return { create: vi.fn(impl) };
}

describe("createChatModel", () => {
  it("creates an OpenAI chat model for the configured model", () => {
    const model = createChatModel({ apiKey: "test-key", model: "gpt-4o" });
    expect(model).toBeInstanceOf(OpenAIChatModel);
    expect(model.model).toBe("gpt-4o");
  });

  it("throws without an API key", () => {
    expect(() => createChatModel({ apiKey: "", model: "gpt-4o" })).toThrow(
      "API key is required for the generation model",
    );
  });
});

describe("OpenAIChatModel", () => {
  it("sends system and user messages with the generation settings", async () => {
    const completions = fakeCompletions(async () => reply("hi"));
    const model = new OpenAIChatModel({ apiKey: "test-key", completions });

    const result = await model.complete(REQUEST);

    expect(result).toEqual({ text: "hi", model: "gpt-4o-mini-2024-07-18" });
    expect(completions.create).toHaveBeenCalledWith(
      {
        model: "gpt-4o-mini",
        max_tokens: 64,
        temperature: 0.2,
        messages: [
          { role: "system", content: "Be brief." },
          { role: "user", content: "Say hi" },
        ],
      },
      { signal: undefined },
    );
  });

  it("requests a JSON object when asked to", async () => {
    const completions = fakeCompletions(async () => reply("{}"));
    const model = new OpenAIChatModel({ apiKey: "test-key", completions });

    await model.complete({ ...REQUEST, responseFormat: "json" });

    expect(completions.create.mock.calls[0]?.[0].response_format).toEqual({
      type: "json_object",
    });
  });

  it("wraps upstream failures in GenerationError", async () => {
    const completions = fakeCompletions(async () => {
      throw new Error("500 internal error");
    });
    const model = new OpenAIChatModel({ apiKey: "test-key", completions });

    const error = await model.complete(REQUEST).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationError);
    expect(error).toMatchObject({
      code: "GENERATION_FAILED",
      message: "Generation failed: 500 internal error",
    });
  });

  it("treats an empty completion as a failure", async () => {
    const completions = fakeCompletions(async () => reply(null));
    const model = new OpenAIChatModel({ apiKey: "test-key", completions });

    await expect(model.complete(REQUEST)).rejects.toThrow(
      "Generation failed: Model returned an empty completion",
    );
  });

  it("reports an aborted call as a timeout", async () => {
    const controller = new AbortController();
    const completions = fakeCompletions(async () => {
      controller.abort();
      throw new Error("Request was aborted.");
    });
    const model = new OpenAIChatModel({ apiKey: "test-key", completions });

    const error = await model.complete({ ...REQUEST, signal: controller.signal }).catch(
      (e: unknown) => e,
    );

    expect(error).toMatchObject({ code: "GENERATION_TIMEOUT", message: "Generation timed out" });
  });

  it("fails fast once the circuit opens", async () => {
    const onStateChange = vi.fn();
    const completions = fakeCompletions(async () => {
      throw new Error("503 overloaded");
    });
    const model = new OpenAIChatModel({
      apiKey: "test-key",
      completions,
      breaker: { errorThresholdPercentage: 1, resetTimeout: 60_000, onStateChange },
    });

    await expect(model.complete(REQUEST)).rejects.toBeInstanceOf(GenerationError);
    expect(model.circuitState).toBe("open");
    expect(onStateChange).toHaveBeenCalledWith("openai-chat", "open");

    await expect(model.complete(REQUEST)).rejects.toBeInstanceOf(GenerationError);
    expect(completions.create).toHaveBeenCalledTimes(1);
  });
});
