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

/** Default local Ollama endpoint */
export const DEFAULT_OLLAMA_URL = "http://localhost:11434";

/** Local models are slow on CPU; allow three minutes per call */
const DEFAULT_TIMEOUT_MS = 180000;

/** Context window requested from Ollama (num_ctx) */
const DEFAULT_CONTEXT_WINDOW = 16000;

// =============================================================================
// Ollama API Response Schemas
// =============================================================================

const OllamaChatResponseSchema = z.object({
  model: z.string(),
  message: z.object({
    role: z.string(),
    content: z.string(),
  }),
  done: z.boolean().optional(),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

const OllamaErrorResponseSchema = z.object({
  error: z.string(),
});

const OllamaTagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })),
});

function extractOllamaError(body: unknown): string | undefined {
  const parsed = OllamaErrorResponseSchema.safeParse(body);
  return parsed.success ? parsed.data.error : undefined;
}

// =============================================================================
// Ollama Provider Implementation
// =============================================================================

/**
 * Local Ollama chat provider (non-streaming /api/chat)
 */
export class OllamaProvider extends BaseCompletionProvider {
  readonly name = "ollama" as const;

  private readonly chatModel: string;
  private readonly contextWindow: number;

  constructor(
    chatModel = "llama3.1",
    baseUrl: string = DEFAULT_OLLAMA_URL,
    timeout: number = DEFAULT_TIMEOUT_MS,
    contextWindow: number = DEFAULT_CONTEXT_WINDOW
  ) {
    super({ baseUrl, timeout });
    this.chatModel = chatModel;
    this.contextWindow = contextWindow;
  }

  async complete(
    prompt: string,
    options?: CompletionOptions
  ): Promise<CompletionResult> {
    const model = options?.model ?? this.chatModel;

    const requestOptions: Record<string, number> = {
      num_ctx: this.contextWindow,
    };
    if (options?.temperature !== undefined) {
      requestOptions["temperature"] = options.temperature;
    }
    if (options?.maxTokens !== undefined) {
      requestOptions["num_predict"] = options.maxTokens;
    }

    const response = await this.fetchWithTimeout(`${this.baseUrl}/api/chat`, {
      method: "POST",
      headers: this.buildAuthHeaders(),
      body: JSON.stringify({
        model,
        messages: buildChatMessages(prompt, options?.history),
        stream: false,
        options: requestOptions,
      }),
    });

    handleRateLimitResponse(response, this.name);

    if (!response.ok) {
      return throwResponseError(response, this.name, extractOllamaError);
    }

    const data = parseJSONResponse(
      await response.text(),
      OllamaChatResponseSchema,
      this.name
    );

    return {
      text: data.message.content.trim(),
      tokenCount: (data.prompt_eval_count ?? 0) + (data.eval_count ?? 0),
      model: data.model,
      finishReason: this.mapDoneReason(data.done_reason),
    };
  }

  /**
   * Check that the Ollama server answers and has the chat model pulled
   */
  async checkAvailability(): Promise<{ available: boolean; error?: string }> {
    try {
      const response = await this.fetchWithTimeout(`${this.baseUrl}/api/tags`, {
        method: "GET",
        headers: this.buildAuthHeaders(),
      });

      if (!response.ok) {
        return {
          available: false,
          error: `HTTP ${response.status} ${response.statusText}`,
        };
      }

      const tags = parseJSONResponse(
        await response.text(),
        OllamaTagsResponseSchema,
        this.name
      );
      const hasModel = tags.models.some(
        (m) => m.name === this.chatModel || m.name.startsWith(`${this.chatModel}:`)
      );

      return hasModel
        ? { available: true }
        : {
            available: false,
            error: `Model "${this.chatModel}" is not pulled on the Ollama server`,
          };
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      return { available: false, error: message };
    }
  }

  private mapDoneReason(reason: string | undefined): FinishReason {
    switch (reason) {
      case "stop":
        return "stop";
      case "length":
        return "length";
      case undefined:
        return "stop";
      default:
        return "unknown";
    }
  }
}
