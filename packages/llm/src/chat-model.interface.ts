export interface ChatRequest {
  system: string;
  prompt: string;
  maxTokens: number;
  temperature: number;
  /** "json" asks the model for a single JSON object. */
  responseFormat?: "text" | "json";
  signal?: AbortSignal;
}

export interface ChatResult {
  text: string;
  model: string;
}

export interface IChatModel {
  readonly name: string;
  readonly model: string;

  complete(request: ChatRequest): Promise<ChatResult>;
}
