import { describe, it, expect } from "vitest";
import { createProvider } from "../../../../src/core/llm/factory.js";
import { AnthropicProvider } from "../../../../src/core/llm/anthropic.js";
import { OpenAICompatProvider } from "../../../../src/core/llm/openai-compat.js";
import type { LLMConfig } from "../../../../src/utils/config.js";

function config(overrides: Partial<LLMConfig> = {}): LLMConfig {
  return {
    provider: "openai_compat",
    api_key: "test-key",
    model: "gpt-4o",
    max_tokens: 8192,
    ...overrides,
  };
}

describe("createProvider", () => {
  it('creates AnthropicProvider for provider "anthropic"', () => {
    const provider = createProvider(config({ provider: "anthropic" }));
    expect(provider).toBeInstanceOf(AnthropicProvider);
    expect(provider.name).toBe("anthropic");
  });

  it('creates OpenAICompatProvider for provider "openai_compat"', () => {
    const provider = createProvider(config({ base_url: "https://llm.test/v1" }));
    expect(provider).toBeInstanceOf(OpenAICompatProvider);
    expect(provider.name).toBe("openai_compat");
  });

  it("accepts default headers for OpenAI-compatible gateways", () => {
    const provider = createProvider(
      config({
        base_url: "https://gateway.test/api/v1",
        default_headers: { "HTTP-Referer": "https://pagewright.local" },
      })
    );
    expect(provider).toBeInstanceOf(OpenAICompatProvider);
  });
});
