import { z } from "zod";
import {
  BaseCompletionProvider,
  handleRateLimitResponse,
  parseJSONResponse,
  throwResponseError,
} from "./base.js";
import { buildChatMessages } from "./types.js";
import type {
  CompletionResult,
  CompletionOptions,
  FinishReason,
} from "./types.js";

// =============================================================================
// Anthropic API Configuration
// =============================================================================

/** Anthropic API version header value */
const ANTHROPIC_API_VERSION = "2023-06-01";

/** Default timeout for API requests (60 seconds) */
const DEFAULT_TIMEOUT_MS = 60000;

/** Default chat model */
const DEFAULT_MODEL = "claude-sonnet-4-5";

// =============================================================================
// Anthropic API Response Schemas
// =============================================================================

const AnthropicContentBlockSchema = z.object({
  type: z.string(),
  text: z.string().optional(),
});

const AnthropicMessageResponseSchema = z.object({
  content: z.array(AnthropicContentBlockSchema),
  model: z.string(),
  stop_reason: z.string().nullable(),
  usage: z.object({
    input_tokens: z.number(),
    output_tokens: z.number(),
  }),
});
type AnthropicContentBlock = z.infer<typeof AnthropicContentBlockSchema>;

const AnthropicErrorResponseSchema = z.object({
  type: z.literal("error"),
  error: z.object({
    type: z.string(),
    message: z.string(),
  }),
});

function extractAnthropicError(body: unknown): string | undefined {
  const parsed = AnthropicErrorResponseSchema.safeParse(body);
  return parsed.success ? parsed.data.error.message : undefined;
}

// =============================================================================
// Anthropic Provider Implementation
// =============================================================================

/**
 * Anthropic Messages API provider
 */
export class AnthropicProvider extends BaseCompletionProvider {
  readonly name = "anthropic" as const;

  private readonly chatModel: string;

  /**
   * Create Anthropic provider instance
   * @param apiKey - Anthropic API key
   * @param chatModel - Model to use for completions
   * @param timeout - Request timeout in milliseconds (default: 60000)
   */
  constructor(
    apiKey: string,
    chatModel: string = DEFAULT_MODEL,
    timeout: number = DEFAULT_TIMEOUT_MS
  ) {
    if (!apiKey || apiKey.trim().length === 0) {
      throw new Error("Anthropic API key is required");
    }

    super({
      apiKey,
      baseUrl: "https://api.anthropic.com/v1",
      timeout,
    });
    this.chatModel = chatModel;
  }

  /**
   * Build authorization headers for Anthropic API
   * @remarks Uses x-api-key header instead of Bearer token
   */
  protected override buildAuthHeaders(): Record<string, string> {
    return {
      "x-api-key": this.apiKey ?? "",
      "anthropic-version": ANTHROPIC_API_VERSION,
      "Content-Type": "application/json",
    };
  }

  private mapStopReason(stopReason: string | null): FinishReason {
    switch (stopReason) {
      case "end_turn":
      case "stop_sequence":
        return "stop";
      case "max_tokens":
        return "length";
      case "tool_use":
        return "tool_use";
      default:
        return "unknown";
    }
  }

  private extractTextContent(content: readonly AnthropicContentBlock[]): string {
    return content
      .filter((block) => block.type === "text")
      .map((block) => block.text ?? "")
      .join("");
  }

  /**
   * Generate text completion using Anthropic Messages API
   * @param prompt - Input prompt
   * @param options - Optional model overrides and chat history
   */
  async complete(
    prompt: string,
    options?: CompletionOptions
  ): Promise<CompletionResult> {
    const model = options?.model ?? this.chatModel;
    const maxTokens = options?.maxTokens ?? 4096;
    const temperature = options?.temperature ?? 0.7;

    const response = await this.fetchWithTimeout(`${this.baseUrl}/messages`, {
      method: "POST",
      headers: this.buildAuthHeaders(),
      body: JSON.stringify({
        model,
        max_tokens: maxTokens,
        temperature,
        messages: buildChatMessages(prompt, options?.history),
      }),
    });

    handleRateLimitResponse(response, this.name);

    if (!response.ok) {
      return throwResponseError(response, this.name, extractAnthropicError);
    }

    const data = parseJSONResponse(
      await response.text(),
      AnthropicMessageResponseSchema,
      this.name
    );

    return {
      text: this.extractTextContent(data.content),
      tokenCount: data.usage.input_tokens + data.usage.output_tokens,
      model: data.model,
      finishReason: this.mapStopReason(data.stop_reason),
    };
  }

  /**
   * Check if Anthropic API is available and properly configured
   */
  async checkAvailability(): Promise<{ available: boolean; error?: string }> {
    try {
      // No health endpoint; a one-token completion is the cheapest probe
      const response = await this.fetchWithTimeout(`${this.baseUrl}/messages`, {
        method: "POST",
        headers: this.buildAuthHeaders(),
        body: JSON.stringify({
          model: this.chatModel,
          max_tokens: 1,
          messages: [{ role: "user", content: "hi" }],
        }),
      });

      handleRateLimitResponse(response, this.name);

      if (response.ok) {
        return { available: true };
      }

      const errorText = await response.text();
      let detail: string | undefined;
      try {
        detail = extractAnthropicError(JSON.parse(errorText));
      } catch {
        detail = undefined;
      }
      return {
        available: false,
        error: detail ?? `HTTP ${response.status} ${response.statusText}`,
      };
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : "Unknown error";
      return {
        available: false,
        error: errorMessage,
      };
    }
  }
}
