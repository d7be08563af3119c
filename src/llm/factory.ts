import type { LlmConfig } from "../core/config.js";

import { AnthropicClient } from "./anthropic.js";
import type { LlmClient } from "./client.js";
import { isMockLlmEnabled, MockLlmClient } from "./mock.js";
import { OpenAiClient } from "./openai.js";

// MOCK_LLM=1 forces the offline client regardless of the configured provider.
export function createLlmClient(config: LlmConfig): LlmClient {
  if (config.provider === "mock" || isMockLlmEnabled()) {
    return new MockLlmClient();
  }

  const common = {
    model: config.model,
    defaultTemperature: config.temperature,
    defaultTimeoutMs: config.timeout_ms,
    maxRetries: config.max_retries,
  };

  switch (config.provider) {
    case "openai":
      return new OpenAiClient(common);
    case "anthropic":
      return new AnthropicClient(common);
  }
}
