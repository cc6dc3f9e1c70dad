import { z } from "zod";
import { LLMError, LLMErrorSubType } from "../errors/index.js";
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
// OpenAI API Response Schemas (Zod validation)
// =============================================================================

/** OpenAI chat completion API response schema */
const OpenAIChatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable(),
      }),
      finish_reason: z.string().nullable(),
    })
  ),
  usage: z
    .object({
      total_tokens: z.number(),
    })
    .optional(),
  model: z.string(),
});

/** OpenAI API error response schema */
const OpenAIErrorResponseSchema = z.object({
  error: z.object({
    message: z.string(),
    type: z.string().optional(),
  }),
});

function extractOpenAIError(body: unknown): string | undefined {
  const parsed = OpenAIErrorResponseSchema.safeParse(body);
  if (!parsed.success) return undefined;
  const { message, type } = parsed.data.error;
  return type ? `${message} (${type})` : message;
}

// =============================================================================
// OpenAI Provider Implementation
// =============================================================================

/**
 * OpenAI chat completions provider
 * @remarks Also works against OpenAI-compatible servers via baseUrl
 */
export class OpenAIProvider extends BaseCompletionProvider {
  readonly name = "openai" as const;

  private readonly chatModel: string;

  /**
   * Create OpenAI provider instance
   * @param apiKey - OpenAI API key
   * @param chatModel - Model for completions (default: gpt-4.1-mini)
   * @param timeout - Request timeout in milliseconds (default: 60000)
   * @param baseUrl - API root (default: https://api.openai.com/v1)
   */
  constructor(
    apiKey: string,
    chatModel = "gpt-4.1-mini",
    timeout = 60000,
    baseUrl = "https://api.openai.com/v1"
  ) {
    if (!apiKey || apiKey.trim().length === 0) {
      throw new Error("OpenAI API key is required");
    }

    super({ apiKey, baseUrl, timeout });
    this.chatModel = chatModel;
  }

  /**
   * Generate chat completion
   * @param prompt - Input prompt
   * @param options - Optional model overrides and chat history
   */
  async complete(
    prompt: string,
    options?: CompletionOptions
  ): Promise<CompletionResult> {
    const temperature = options?.temperature ?? 0.7;
    const maxTokens = options?.maxTokens ?? 4096;
    const model = options?.model ?? this.chatModel;

    const response = await this.fetchWithTimeout(
      `${this.baseUrl}/chat/completions`,
      {
        method: "POST",
        headers: this.buildAuthHeaders(),
        body: JSON.stringify({
          model,
          messages: buildChatMessages(prompt, options?.history),
          temperature,
          max_tokens: maxTokens,
        }),
      }
    );

    handleRateLimitResponse(response, this.name);

    if (!response.ok) {
      return throwResponseError(response, this.name, extractOpenAIError);
    }

    const data = parseJSONResponse(
      await response.text(),
      OpenAIChatResponseSchema,
      this.name
    );
    const choice = data.choices[0];

    if (!choice) {
      throw new LLMError(
        "OpenAI returned empty choices array",
        LLMErrorSubType.INVALID_RESPONSE,
        this.name
      );
    }

    return {
      text: choice.message.content ?? "",
      tokenCount: data.usage?.total_tokens ?? 0,
      model: data.model,
      finishReason: this.mapFinishReason(choice.finish_reason),
    };
  }

  /**
   * Check if OpenAI API is available
   * @returns Availability status with optional error message
   */
  async checkAvailability(): Promise<{ available: boolean; error?: string }> {
    try {
      // Models endpoint is the cheapest authenticated call
      const response = await this.fetchWithTimeout(`${this.baseUrl}/models`, {
        method: "GET",
        headers: this.buildAuthHeaders(),
      });

      handleRateLimitResponse(response, this.name);

      if (!response.ok) {
        const errorText = await response.text();
        let detail: string | undefined;
        try {
          detail = extractOpenAIError(JSON.parse(errorText));
        } catch {
          detail = undefined;
        }
        return {
          available: false,
          error: `API error: ${detail ?? `${response.status} ${response.statusText}`}`,
        };
      }

      return { available: true };
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      return { available: false, error: message };
    }
  }

  /**
   * Map OpenAI finish_reason to our FinishReason type
   */
  private mapFinishReason(reason: string | null): FinishReason {
    switch (reason) {
      case "stop":
        return "stop";
      case "length":
        return "length";
      case "content_filter":
        return "content_filter";
      case "tool_calls":
      case "function_call":
        return "tool_use";
      default:
        return "unknown";
    }
  }
}
