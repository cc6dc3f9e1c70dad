/**
 * LLM Provider Factory and Registry
 * @module src/llm/index
 */

// =============================================================================
// Re-exports
// =============================================================================

export * from "./types.js";
export {
  BaseCompletionProvider,
  BaseProviderConfigSchema,
  parseJSONResponse,
  handleRateLimitResponse,
} from "./base.js";
export type { BaseProviderConfig } from "./base.js";
export { OpenAIProvider } from "./openai.js";
export { AnthropicProvider } from "./anthropic.js";
export { OllamaProvider, DEFAULT_OLLAMA_URL } from "./ollama.js";
export {
  CompletionProviderWithFallback,
  createFallbackProvider,
} from "./fallback.js";
export { withTimeout, DEFAULT_TIMEOUTS } from "./timeout.js";
export type { TimeoutOptions } from "./timeout.js";

import type {
  LLMProviderType,
  LLMCompletionProvider,
  ProviderFactoryConfig,
} from "./types.js";
import { ProviderFactoryConfigSchema } from "./types.js";
import { OpenAIProvider } from "./openai.js";
import { AnthropicProvider } from "./anthropic.js";
import { OllamaProvider, DEFAULT_OLLAMA_URL } from "./ollama.js";
import { createFallbackProvider } from "./fallback.js";
import { LLMError, LLMErrorSubType } from "../errors/index.js";

// =============================================================================
// Provider Models Registry
// =============================================================================

/**
 * Default chat models per provider
 * @remarks helper is used for classification/selection/assessment,
 * chat for the final answer
 */
export const PROVIDER_MODELS = {
  openai: { chat: "gpt-4.1-mini", helper: "gpt-4.1-mini" },
  anthropic: { chat: "claude-sonnet-4-5", helper: "claude-haiku-4-5" },
  ollama: { chat: "llama3.1", helper: "mistral" },
} as const satisfies Record<LLMProviderType, { chat: string; helper: string }>;

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create a completion provider by type
 * @param type - Provider type
 * @param config - Keys, URL, model and timeout
 * @throws LLMError with CONFIG subtype if the provider's key is missing
 *
 * @example
 * ```typescript
 * const provider = createCompletionProvider("ollama", {
 *   ollamaUrl: "http://localhost:11434",
 * });
 * const result = await provider.complete("Hello!");
 * ```
 */
export function createCompletionProvider(
  type: LLMProviderType,
  config: ProviderFactoryConfig = {}
): LLMCompletionProvider {
  const validated = ProviderFactoryConfigSchema.parse(config);
  const model = validated.chatModel ?? PROVIDER_MODELS[type].chat;

  switch (type) {
    case "openai":
      if (!validated.openaiApiKey) {
        throw new LLMError(
          "OPENAI_API_KEY is required for the openai provider",
          LLMErrorSubType.CONFIG,
          type
        );
      }
      return new OpenAIProvider(validated.openaiApiKey, model, validated.timeoutMs);
    case "anthropic":
      if (!validated.anthropicApiKey) {
        throw new LLMError(
          "ANTHROPIC_API_KEY is required for the anthropic provider",
          LLMErrorSubType.CONFIG,
          type
        );
      }
      return new AnthropicProvider(
        validated.anthropicApiKey,
        model,
        validated.timeoutMs
      );
    case "ollama":
      return new OllamaProvider(
        model,
        validated.ollamaUrl ?? DEFAULT_OLLAMA_URL,
        validated.timeoutMs
      );
    default: {
      const exhaustiveCheck: never = type;
      throw new Error(`Unknown LLM provider type: ${exhaustiveCheck}`);
    }
  }
}

/**
 * Check which providers can be built from config
 *
 * @example
 * ```typescript
 * getAvailableProviders({ openaiApiKey: "test-key" });
 * // Returns: ["openai", "ollama"]
 * ```
 */
export function getAvailableProviders(
  config: ProviderFactoryConfig
): LLMProviderType[] {
  const available: LLMProviderType[] = [];

  if (config.openaiApiKey) available.push("openai");
  if (config.anthropicApiKey) available.push("anthropic");
  available.push("ollama");

  return available;
}

/**
 * Build the preferred provider, falling back to every other configured one
 *
 * @remarks Order: preferred, then openai, anthropic, ollama
 */
export function createProviderChain(
  preferred: LLMProviderType,
  config: ProviderFactoryConfig
): LLMCompletionProvider {
  const order: LLMProviderType[] = [
    preferred,
    ...getAvailableProviders(config).filter((type) => type !== preferred),
  ];

  // Only the preferred provider gets the configured model name
  const providers = order.map((type) =>
    createCompletionProvider(
      type,
      type === preferred ? config : { ...config, chatModel: undefined }
    )
  );

  return createFallbackProvider(providers);
}
