import type { LLMProviderType } from "./llm/types.js";
import type { AgentConfig } from "./codebase/types.js";

export interface RateLimiterConfig {
  readonly maxRequests: number;
  readonly windowMs: number;
  readonly cleanupIntervalMs: number;
}

export interface LLMSettings {
  readonly provider: LLMProviderType;
  readonly openaiApiKey?: string | undefined;
  readonly anthropicApiKey?: string | undefined;
  readonly ollamaUrl: string;
  /** Model for final answers; provider default when unset */
  readonly chatModel?: string | undefined;
  /** Model for classification, selection and assessment */
  readonly helperModel?: string | undefined;
  readonly timeoutMs: number;
}

export interface Config {
  readonly telegramToken: string;
  readonly authorizedUsers: number[];
  readonly projectPath: string;
  readonly rateLimiter: RateLimiterConfig;
  readonly llm: LLMSettings;
  readonly agent: AgentConfig;
}

export type TelegramUserId = number;
export type ChatId = number;
export type Milliseconds = number;

export const CONSTANTS = {
  MAX_MESSAGE_LENGTH: 2000,
  MIN_MESSAGE_LENGTH: 2,
  /** Telegram rejects messages above 4096 characters */
  TELEGRAM_MESSAGE_LIMIT: 4096,
  /** Answers longer than this are attached as a Markdown document */
  ATTACHMENT_THRESHOLD: 3500,
  LIST_LIMIT: 50,
  SEARCH_RESULT_LIMIT: 20,
  DEFAULT_REASONING_TIMEOUT: 120_000,
  RATE_LIMIT_WINDOW: 60_000,
  MAX_REQUESTS_PER_MINUTE: 10,
  RATE_LIMIT_CLEANUP_INTERVAL: 300_000,
  RATE_LIMITER_MAX_TRACKED_USERS: 10_000,
} as const;
