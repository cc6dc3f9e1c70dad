/**
 * Timeout wrapper for LLM operations
 * @module src/llm/timeout
 */

import { LLMError, LLMErrorSubType } from "../errors/index.js";

/**
 * Options for timeout wrapper
 */
export interface TimeoutOptions {
  /** Timeout duration in milliseconds */
  readonly timeoutMs: number;
  /** Context description for error message */
  readonly context?: string;
  /** Provider name for LLMError */
  readonly provider?: string;
}

/**
 * Wraps a promise with a timeout
 *
 * @typeParam T - Type of the promise result
 * @throws LLMError with TIMEOUT subtype if operation times out
 *
 * @example
 * ```typescript
 * const result = await withTimeout(provider.complete(prompt), {
 *   timeoutMs: 60000,
 *   context: "File selection",
 *   provider: provider.name,
 * });
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  options: TimeoutOptions
): Promise<T> {
  const { timeoutMs, context = "Operation", provider = "unknown" } = options;

  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new Error(
      `Invalid timeout value: ${timeoutMs}. Must be a positive finite number.`
    );
  }

  let timeoutId: NodeJS.Timeout | undefined;

  // Promise<never> only ever rejects, so Promise.race keeps T as its type
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(
        new LLMError(
          `${context} timed out after ${timeoutMs}ms`,
          LLMErrorSubType.TIMEOUT,
          provider
        )
      );
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Default timeout values for reasoning calls (in milliseconds)
 */
export const DEFAULT_TIMEOUTS = {
  /** Classification, file selection and confidence assessment */
  helper: 60000,
  /** Final answer generation over the evidence bundle */
  answer: 180000,
} as const;
