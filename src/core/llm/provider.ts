/** Provider-agnostic completion types and interface. */

export interface LLMMessage {
  role: "user" | "assistant";
  content: string;
}

export interface LLMUsage {
  inputTokens: number | null;
  outputTokens: number | null;
}

export interface LLMResponse {
  text: string | null;
  stopReason: "end_turn" | "max_tokens";
  usage: LLMUsage;
  model: string;
  provider: string;
}

export interface LLMChatParams {
  model: string;
  system: string;
  messages: LLMMessage[];
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface LLMProvider {
  readonly name: string;
  chat(params: LLMChatParams): Promise<LLMResponse>;
}
