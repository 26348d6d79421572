import type { LLMResponse } from "../../src/core/llm/provider.js";
import type { PublishRequest } from "../../src/publishing/types.js";

export const TEST_SECRET = "test-secret";
export const TEST_EVALUATION_URL = "https://evaluator.test/notify";

export function createTextResponse(
  text: string,
  provider: string = "mock"
): LLMResponse {
  return {
    text,
    stopReason: "end_turn",
    usage: { inputTokens: 100, outputTokens: 50 },
    model: "mock-model",
    provider,
  };
}

/** Model output in the delimited multi-file format. */
export function delimitedOutput(files: Record<string, string>): string {
  return Object.entries(files)
    .map(([name, content]) => `>>> filename: ${name}\n${content}\n---END FILE---`)
    .join("\n");
}

export function createRequest(overrides: Partial<PublishRequest> = {}): PublishRequest {
  return {
    secret: TEST_SECRET,
    email: "student@example.com",
    task: "demo-task",
    round: 1,
    nonce: "nonce-1",
    brief: "Build index.html that greets the visitor",
    attachments: [],
    checks: [],
    evaluation_url: TEST_EVALUATION_URL,
    ...overrides,
  };
}
