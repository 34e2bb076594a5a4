/**
 * LLM adapter factory. A selected provider without an API key degrades to StubLLM, so every
 * turn ends in the chat client's canned reply instead of a startup failure.
 */

import type { AppConfig } from "../../config";
import { logger } from "../../logging";
import type { ILLM } from "./types";
import { StubLLM } from "./stub";
import { OpenAILLM } from "./openai";
import { AnthropicLLM } from "./anthropic";

export type { ILLM, Message, MessageImage, MessageRole, ChatOptions, ChatResponse } from "./types";
export { StubLLM } from "./stub";
export { OpenAILLM } from "./openai";
export { AnthropicLLM } from "./anthropic";

export function createLLM(config: AppConfig): ILLM {
  const { provider, openaiApiKey, openaiModel, baseUrl, anthropicApiKey, anthropicModel } = config.llm;
  switch (provider) {
    case "openai":
      if (openaiApiKey) return new OpenAILLM({ apiKey: openaiApiKey, model: openaiModel, baseUrl });
      break;
    case "anthropic":
      if (anthropicApiKey) return new AnthropicLLM({ apiKey: anthropicApiKey, model: anthropicModel });
      break;
    case "stub":
      return new StubLLM();
  }
  logger.warn({ event: "LLM_PROVIDER_UNCONFIGURED", provider }, "No API key for the LLM provider; using the stub");
  return new StubLLM();
}
