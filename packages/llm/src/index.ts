export type { IChatModel, ChatRequest, ChatResult } from "./chat-model.interface.js";
export { OpenAIChatModel } from "./openai-chat-model.js";
export type { OpenAIChatModelConfig, ChatCompletionsApi } from "./openai-chat-model.js";
export { createChatModel } from "./factory.js";
