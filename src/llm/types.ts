import { z } from "zod";

// =============================================================================
// Provider Types
// =============================================================================

export const LLMProviderTypeSchema = z.enum(["openai", "anthropic", "ollama"]);
export type LLMProviderType = z.infer<typeof LLMProviderTypeSchema>;

// =============================================================================
// Model Configuration
// =============================================================================

export interface ModelConfig {
  provider: LLMProviderType;
  model: string;
  temperature: number;
  maxTokens: number;
}

// =============================================================================
// Result Types
// =============================================================================

/**
 * Reason why completion finished
 * @remarks Extended to cover all common API responses
 */
export const FinishReasonSchema = z.enum([
  "stop",
  "length",
  "content_filter",
  "tool_use",
  "error",
  "unknown",
]);
export type FinishReason = z.infer<typeof FinishReasonSchema>;

/** Result of completion operation */
export interface CompletionResult {
  readonly text: string;
  readonly tokenCount: number;
  readonly model: string;
  readonly finishReason: FinishReason;
}

/** A prior exchange replayed to the model as chat turns */
export interface ChatTurn {
  readonly user: string;
  readonly assistant: string;
}

/** Per-call overrides accepted by complete() */
export interface CompletionOptions extends Partial<ModelConfig> {
  /** Earlier exchanges sent ahead of the prompt */
  readonly history?: readonly ChatTurn[];
}

// =============================================================================
// Provider Interface
// =============================================================================

export interface LLMCompletionProvider {
  readonly name: LLMProviderType;

  /**
   * Generate text completion
   * @param prompt - Input prompt
   * @param options - Optional model overrides and chat history
   */
  complete(
    prompt: string,
    options?: CompletionOptions
  ): Promise<CompletionResult>;

  /**
   * Check if provider is available and properly configured
   */
  checkAvailability(): Promise<{ available: boolean; error?: string }>;
}

/** Chat message in the role/content shape shared by all three APIs */
export interface ChatMessage {
  readonly role: "user" | "assistant";
  readonly content: string;
}

/** Expand history turns and the prompt into an ordered message list */
export function buildChatMessages(
  prompt: string,
  history: readonly ChatTurn[] = []
): ChatMessage[] {
  const messages: ChatMessage[] = [];
  for (const turn of history) {
    messages.push({ role: "user", content: turn.user });
    messages.push({ role: "assistant", content: turn.assistant });
  }
  messages.push({ role: "user", content: prompt });
  return messages;
}

// =============================================================================
// Factory Configuration
// =============================================================================

/**
 * Schema for provider factory configuration
 * @remarks Every field optional; the factory checks what the chosen provider needs
 */
export const ProviderFactoryConfigSchema = z.object({
  openaiApiKey: z.string().min(1).optional(),
  anthropicApiKey: z.string().min(1).optional(),
  ollamaUrl: z.string().url().optional(),
  chatModel: z.string().min(1).optional(),
  timeoutMs: z.number().min(1000).max(600000).optional(),
});
export type ProviderFactoryConfig = z.infer<typeof ProviderFactoryConfigSchema>;
