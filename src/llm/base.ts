import { z } from "zod";
import { LLMError, LLMErrorSubType } from "../errors/index.js";
import type {
  LLMCompletionProvider,
  LLMProviderType,
  CompletionResult,
  CompletionOptions,
} from "./types.js";

// =============================================================================
// JSON Parsing Utilities
// =============================================================================

/**
 * Parse a JSON response body and validate it against a schema
 * @param text - Raw response body
 * @param schema - Expected shape
 * @param providerName - Provider name for error context
 * @throws LLMError with INVALID_RESPONSE subtype on bad JSON or shape
 */
export function parseJSONResponse<T>(
  text: string,
  schema: z.ZodType<T>,
  providerName: string
): T {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new LLMError(
      `Invalid JSON response: ${text.slice(0, 200)}`,
      LLMErrorSubType.INVALID_RESPONSE,
      providerName
    );
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new LLMError(
      `Unexpected response shape: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`,
      LLMErrorSubType.INVALID_RESPONSE,
      providerName
    );
  }
  return parsed.data;
}

/**
 * Handle rate limit (429) response and extract retry-after header
 * @param response - Fetch Response object
 * @param providerName - Name of the LLM provider for error context
 * @throws LLMError with RATE_LIMIT subtype if response status is 429
 */
export function handleRateLimitResponse(
  response: Response,
  providerName: string
): void {
  if (response.status === 429) {
    const retryAfterHeader = response.headers.get("retry-after");
    let retryAfterSeconds: number | null = null;

    if (retryAfterHeader) {
      const parsed = parseInt(retryAfterHeader, 10);
      if (!isNaN(parsed)) {
        retryAfterSeconds = parsed;
      }
    }

    throw new LLMError(
      `Rate limit exceeded. Retry after ${retryAfterSeconds ?? "unknown"} seconds`,
      LLMErrorSubType.RATE_LIMIT,
      providerName,
      { retryAfterSeconds }
    );
  }
}

/**
 * Turn a non-OK HTTP response into an LLMError, using the API's own
 * message when the body carries one
 */
export async function throwResponseError(
  response: Response,
  providerName: string,
  extractMessage: (body: unknown) => string | undefined
): Promise<never> {
  const errorText = await response.text();
  let detail: string | undefined;
  try {
    detail = extractMessage(JSON.parse(errorText));
  } catch {
    detail = undefined;
  }

  throw new LLMError(
    `${providerName} API error: ${detail ?? `${response.status} ${response.statusText}`}`,
    LLMErrorSubType.API_ERROR,
    providerName,
    { status: response.status }
  );
}

// =============================================================================
// Base Provider Configuration
// =============================================================================

/**
 * Schema for base provider configuration
 * @remarks apiKey is optional because local providers run without one
 */
export const BaseProviderConfigSchema = z.object({
  /** API key for authentication */
  apiKey: z.string().min(1).optional(),
  /** Base URL for API requests */
  baseUrl: z.string().url(),
  /** Request timeout in milliseconds (1s - 10min) */
  timeout: z.number().min(1000).max(600000).default(60000),
});
export type BaseProviderConfig = z.input<typeof BaseProviderConfigSchema>;

// =============================================================================
// Abstract Base Provider
// =============================================================================

export abstract class BaseCompletionProvider implements LLMCompletionProvider {
  abstract readonly name: LLMProviderType;

  protected readonly apiKey: string | undefined;
  protected readonly baseUrl: string;
  protected readonly timeout: number;

  constructor(config: BaseProviderConfig) {
    const validated = BaseProviderConfigSchema.parse(config);
    this.apiKey = validated.apiKey;
    this.baseUrl = validated.baseUrl.replace(/\/+$/, "");
    this.timeout = validated.timeout;
  }

  /**
   * Fetch with timeout support
   * @throws LLMError with TIMEOUT subtype when the request is aborted
   */
  protected async fetchWithTimeout(
    url: string,
    options: RequestInit
  ): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await fetch(url, {
        ...options,
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new LLMError(
          `Request timed out after ${this.timeout}ms`,
          LLMErrorSubType.TIMEOUT,
          this.name
        );
      }
      throw new LLMError(
        `Request failed: ${error instanceof Error ? error.message : String(error)}`,
        LLMErrorSubType.API_ERROR,
        this.name,
        { url },
        error instanceof Error ? error : undefined
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Build authorization headers for API requests
   */
  protected buildAuthHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (this.apiKey !== undefined) {
      headers["Authorization"] = `Bearer ${this.apiKey}`;
    }
    return headers;
  }

  abstract complete(
    prompt: string,
    options?: CompletionOptions
  ): Promise<CompletionResult>;
  abstract checkAvailability(): Promise<{ available: boolean; error?: string }>;
}
