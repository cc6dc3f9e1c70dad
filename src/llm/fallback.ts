/**
 * Fallback wrapper for completion providers
 * @module src/llm/fallback
 */

import type {
  LLMCompletionProvider,
  CompletionResult,
  CompletionOptions,
  LLMProviderType,
} from "./types.js";
import { LLMError, LLMErrorSubType, toError } from "../errors/index.js";
import { logger } from "../utils.js";

// =============================================================================
// Fallback Provider
// =============================================================================

/**
 * Completion provider that tries multiple providers in order
 *
 * @remarks
 * Useful when a hosted API is configured alongside a local Ollama server:
 * an outage of the first falls through to the next.
 *
 * @example
 * ```typescript
 * const fallback = new CompletionProviderWithFallback([
 *   openaiProvider,
 *   ollamaProvider,
 * ]);
 * const result = await fallback.complete("Hello!");
 * ```
 */
export class CompletionProviderWithFallback implements LLMCompletionProvider {
  readonly name: LLMProviderType;

  private readonly providerNames: readonly string[];

  /**
   * @param providers - Providers to try in order
   * @throws Error if no providers are provided
   */
  constructor(private readonly providers: readonly LLMCompletionProvider[]) {
    const first = providers[0];
    if (!first) {
      throw new Error("At least one provider required for fallback");
    }
    this.name = first.name;
    this.providerNames = providers.map((p) => p.name);
  }

  /**
   * Generate completion, trying each provider until one succeeds
   * @throws LLMError if all providers fail
   */
  async complete(
    prompt: string,
    options?: CompletionOptions
  ): Promise<CompletionResult> {
    const errors: Array<{ provider: string; error: Error }> = [];

    for (const provider of this.providers) {
      try {
        return await provider.complete(prompt, options);
      } catch (error) {
        const err = toError(error);
        errors.push({ provider: provider.name, error: err });
        logger.warn(
          `[Fallback] ${provider.name} failed: ${err.message}, trying next...`
        );
      }
    }

    const errorMessages = errors.map((e) => `${e.provider}: ${e.error.message}`);
    throw new LLMError(
      `All ${this.providers.length} providers failed: ${errorMessages.join("; ")}`,
      LLMErrorSubType.API_ERROR,
      "fallback",
      {
        providers: this.providerNames,
        errors: errorMessages,
      }
    );
  }

  /**
   * Available when any wrapped provider is available
   */
  async checkAvailability(): Promise<{ available: boolean; error?: string }> {
    const unavailableProviders: string[] = [];

    for (const provider of this.providers) {
      try {
        const result = await provider.checkAvailability();
        if (result.available) {
          return { available: true };
        }
        unavailableProviders.push(
          `${provider.name}: ${result.error ?? "unknown error"}`
        );
      } catch (error) {
        unavailableProviders.push(`${provider.name}: ${toError(error).message}`);
      }
    }

    return {
      available: false,
      error: `No providers available: ${unavailableProviders.join("; ")}`,
    };
  }
}

/**
 * Wrap providers in a fallback chain; a single provider is returned as is
 */
export function createFallbackProvider(
  providers: readonly LLMCompletionProvider[]
): LLMCompletionProvider {
  const [only, ...rest] = providers;
  if (only && rest.length === 0) {
    return only;
  }
  return new CompletionProviderWithFallback(providers);
}
