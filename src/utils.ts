/**
 * Utility functions for the codebase Q&A bot
 */
import { ZodError } from "zod";
import { AgentConfigSchema } from "./codebase/types.js";
import { LLMProviderTypeSchema } from "./llm/types.js";
import { DEFAULT_OLLAMA_URL } from "./llm/ollama.js";
import { CONSTANTS, Config, LLMSettings, RateLimiterConfig } from "./types.js";

const ANALYSIS = {
  MAX_SUMMARY_LENGTH: 300,
} as const;

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LOG_LEVEL = (() => {
  const level = process.env.LOG_LEVEL?.toUpperCase() || "INFO";
  const isProduction = process.env.NODE_ENV === "production";

  if (isProduction && (level === "DEBUG" || level === "INFO")) {
    return LogLevel.WARN;
  }

  switch (level) {
    case "DEBUG":
      return LogLevel.DEBUG;
    case "INFO":
      return LogLevel.INFO;
    case "WARN":
      return LogLevel.WARN;
    case "ERROR":
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
})();

export const logger = {
  debug: (message: string, ...args: unknown[]) => {
    if (LOG_LEVEL <= LogLevel.DEBUG) {
      console.log(`🔍 ${message}`, ...args);
    }
  },

  info: (message: string, ...args: unknown[]) => {
    if (LOG_LEVEL <= LogLevel.INFO) {
      console.log(`ℹ️ ${message}`, ...args);
    }
  },

  warn: (message: string, ...args: unknown[]) => {
    if (LOG_LEVEL <= LogLevel.WARN) {
      console.warn(`⚠️ ${message}`, ...args);
    }
  },

  error: (message: string, ...args: unknown[]) => {
    if (LOG_LEVEL <= LogLevel.ERROR) {
      console.error(`❌ ${message}`, ...args);
    }
  },
};

/**
 * Builds a filesystem-safe name for an answer attachment
 */
export function analysisFileName(question: string, now: Date = new Date()): string {
  const timestamp = now.toISOString().replace(/[:.]/g, "-");
  const questionSlug = question
    .replace(/[^a-zA-Z0-9\s]/g, "")
    .trim()
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .slice(0, 5)
    .join("-")
    .toLowerCase();

  return questionSlug
    ? `analysis-${questionSlug}-${timestamp}.md`
    : `analysis-${timestamp}.md`;
}

/**
 * Renders an answer as a Markdown document
 */
export function formatAnalysisDocument(
  question: string,
  answer: string,
  analyzedFiles: readonly string[],
  now: Date = new Date()
): string {
  const filesSection =
    analyzedFiles.length > 0
      ? analyzedFiles.map((path) => `- \`${path}\``).join("\n")
      : "_No files were consulted._";

  return `# Code Analysis

**Question:** ${question}

**Date:** ${now.toLocaleString("en-US")}

**Files analyzed:**

${filesSection}

---

${answer}
`;
}

/**
 * Creates brief summary from content
 */
export function createSummary(
  content: string,
  maxLength: number = ANALYSIS.MAX_SUMMARY_LENGTH
): string {
  if (content.length <= maxLength) {
    return content;
  }

  const truncated = content.substring(0, maxLength);
  const lastSpaceIndex = truncated.lastIndexOf(" ");

  if (lastSpaceIndex === -1) {
    return truncated + "...";
  }

  return truncated.substring(0, lastSpaceIndex) + "...";
}

/**
 * Splits text into chunks that fit one Telegram message,
 * preferring line breaks as split points
 */
export function splitMessage(
  text: string,
  limit: number = CONSTANTS.TELEGRAM_MESSAGE_LIMIT
): string[] {
  if (limit <= 0) {
    throw new Error(`Invalid message limit: ${limit}`);
  }
  if (text.length <= limit) {
    return [text];
  }

  const chunks: string[] = [];
  let rest = text;

  while (rest.length > limit) {
    const window = rest.substring(0, limit);
    const breakAt = window.lastIndexOf("\n");
    const cut = breakAt > 0 ? breakAt : limit;
    chunks.push(rest.substring(0, cut));
    rest = rest.substring(breakAt > 0 ? cut + 1 : cut);
  }

  if (rest.length > 0) {
    chunks.push(rest);
  }

  return chunks;
}

/**
 * Formats duration in milliseconds to readable format
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);

  if (seconds < 60) {
    return `${seconds}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  if (minutes < 60) {
    return remainingSeconds > 0
      ? `${minutes}m ${remainingSeconds}s`
      : `${minutes}m`;
  }

  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;

  return remainingMinutes > 0 ? `${hours}h ${remainingMinutes}m` : `${hours}h`;
}

/**
 * Reads a positive integer variable; unset falls back to the default,
 * malformed values are logged and replaced by the default
 */
function readPositiveInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }

  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value <= 0) {
    logger.warn(`Invalid ${name}: ${raw}, using default: ${fallback}`);
    return fallback;
  }
  return value;
}

/** Integer variable handed to schema validation as is; unset means default */
function readInt(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }

  const value = Number(raw.trim());
  if (!Number.isInteger(value)) {
    throw new Error(`${name} must be an integer, got: ${raw}`);
  }
  return value;
}

function readOptional(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Loads rate limiter configuration from environment variables
 */
function loadRateLimiterConfig(): RateLimiterConfig {
  return {
    maxRequests: readPositiveInt(
      "RATE_LIMIT_MAX_REQUESTS",
      CONSTANTS.MAX_REQUESTS_PER_MINUTE
    ),
    windowMs: readPositiveInt("RATE_LIMIT_WINDOW_MS", CONSTANTS.RATE_LIMIT_WINDOW),
    cleanupIntervalMs: readPositiveInt(
      "RATE_LIMIT_CLEANUP_INTERVAL_MS",
      CONSTANTS.RATE_LIMIT_CLEANUP_INTERVAL
    ),
  };
}

/**
 * Loads language model settings from environment variables
 */
function loadLLMSettings(): LLMSettings {
  const providerName = (process.env.LLM_PROVIDER || "ollama").trim().toLowerCase();
  const provider = LLMProviderTypeSchema.safeParse(providerName);
  if (!provider.success) {
    throw new Error(
      `LLM_PROVIDER must be one of: ${LLMProviderTypeSchema.options.join(", ")}`
    );
  }

  const openaiApiKey = readOptional("OPENAI_API_KEY");
  const anthropicApiKey = readOptional("ANTHROPIC_API_KEY");

  if (provider.data === "openai" && !openaiApiKey) {
    throw new Error("OPENAI_API_KEY is required when LLM_PROVIDER=openai");
  }
  if (provider.data === "anthropic" && !anthropicApiKey) {
    throw new Error("ANTHROPIC_API_KEY is required when LLM_PROVIDER=anthropic");
  }

  return {
    provider: provider.data,
    openaiApiKey,
    anthropicApiKey,
    ollamaUrl: readOptional("OLLAMA_URL") ?? DEFAULT_OLLAMA_URL,
    chatModel: readOptional("CHAT_MODEL"),
    helperModel: readOptional("HELPER_MODEL"),
    timeoutMs: readPositiveInt(
      "REASONING_TIMEOUT_MS",
      CONSTANTS.DEFAULT_REASONING_TIMEOUT
    ),
  };
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message
    )
    .join("; ");
}

/**
 * Loads configuration from environment variables
 */
export function loadConfig(): Config {
  const telegramToken = process.env.TELEGRAM_BOT_TOKEN;
  if (!telegramToken) {
    throw new Error("TELEGRAM_BOT_TOKEN environment variable is required");
  }

  const authorizedUsersString = process.env.AUTHORIZED_USERS;
  if (!authorizedUsersString) {
    throw new Error("AUTHORIZED_USERS environment variable is required");
  }

  const authorizedUsers = authorizedUsersString
    .split(",")
    .map((id) => parseInt(id.trim(), 10))
    .filter((id) => !isNaN(id) && id > 0);

  if (authorizedUsers.length === 0) {
    throw new Error("AUTHORIZED_USERS must contain at least one valid user ID");
  }

  const projectPath = process.env.PROJECT_PATH;
  if (!projectPath) {
    throw new Error("PROJECT_PATH environment variable is required");
  }

  const agent = AgentConfigSchema.safeParse({
    maxIterations: readInt("MAX_ITERATIONS"),
    maxFilesPerIteration: readInt("MAX_FILES_PER_ITERATION"),
    historyLength: readInt("HISTORY_LENGTH"),
    historyEntryChars: readInt("HISTORY_ENTRY_CHARS"),
    cacheMaxChars: readInt("CACHE_MAX_CHARS"),
    cacheHeadChars: readInt("CACHE_HEAD_CHARS"),
    cacheTailChars: readInt("CACHE_TAIL_CHARS"),
    previewChars: readInt("PREVIEW_CHARS"),
    maxFileBytes: readInt("MAX_FILE_BYTES"),
    maxDepth: readInt("MAX_DEPTH"),
  });
  if (!agent.success) {
    throw new Error(`Invalid agent configuration: ${formatZodError(agent.error)}`);
  }

  return {
    telegramToken,
    authorizedUsers,
    projectPath,
    rateLimiter: loadRateLimiterConfig(),
    llm: loadLLMSettings(),
    agent: agent.data,
  };
}
