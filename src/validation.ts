import { toIndexPath } from "./codebase/path-validator.js";
import { CONSTANTS, RateLimiterConfig } from "./types.js";

const MAX_TELEGRAM_USER_ID = 999999999999;
const MAX_PATH_ARGUMENT_LENGTH = 500;
const MAX_SEARCH_TERM_LENGTH = 200;

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

export type ValidatedUserMessage = string;
export type ValidatedTelegramUserId = number;

// Markup that renders as active content
const SUSPICIOUS_PATTERNS: readonly RegExp[] = [
  /<script/i,
  /javascript:/i,
  /vbscript:/i,
  /\bon(click|error|load)\s*=/i,
];

// Control characters other than tab, newline and carriage return
const CONTROL_CHARACTERS = /[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f]/;

export function validateUserMessage(
  message: unknown
): ValidationResult<ValidatedUserMessage> {
  if (typeof message !== "string") {
    return { success: false, error: "Message must be a string" };
  }

  const trimmed = message.trim();

  if (trimmed.length < CONSTANTS.MIN_MESSAGE_LENGTH) {
    return {
      success: false,
      error: `Message too short (minimum ${CONSTANTS.MIN_MESSAGE_LENGTH} characters)`,
    };
  }

  if (trimmed.length > CONSTANTS.MAX_MESSAGE_LENGTH) {
    return {
      success: false,
      error: `Message too long (maximum ${CONSTANTS.MAX_MESSAGE_LENGTH} characters)`,
    };
  }

  if (CONTROL_CHARACTERS.test(trimmed)) {
    return { success: false, error: "Message contains invalid characters" };
  }

  if (SUSPICIOUS_PATTERNS.some((pattern) => pattern.test(trimmed))) {
    return {
      success: false,
      error: "Message contains suspicious content",
    };
  }

  return { success: true, data: trimmed };
}

export function validateTelegramUserId(
  userId: unknown
): ValidationResult<ValidatedTelegramUserId> {
  if (typeof userId !== "number") {
    return { success: false, error: "User ID must be a number" };
  }

  if (!Number.isInteger(userId)) {
    return { success: false, error: "User ID must be an integer" };
  }

  if (userId <= 0) {
    return {
      success: false,
      error: "User ID must be a positive number",
    };
  }

  if (userId > MAX_TELEGRAM_USER_ID) {
    return { success: false, error: "User ID too large" };
  }

  return { success: true, data: userId };
}

/**
 * Validate a codebase path given to /ls or /read.
 * Empty input and "/" mean the codebase root.
 */
export function validatePathArgument(input: string): ValidationResult<string> {
  const raw = input.trim();
  if (raw.length > MAX_PATH_ARGUMENT_LENGTH) {
    return { success: false, error: "Path too long" };
  }
  if (CONTROL_CHARACTERS.test(raw)) {
    return { success: false, error: "Path contains invalid characters" };
  }

  const relative = raw.replace(/^\/+/, "");
  if (relative === "" || relative === ".") {
    return { success: true, data: "" };
  }

  const path = toIndexPath(relative);
  if (path === undefined) {
    return { success: false, error: "Path must stay inside the codebase" };
  }
  return { success: true, data: path };
}

export function validateSearchTerm(input: string): ValidationResult<string> {
  const term = input.trim();
  if (term.length === 0) {
    return { success: false, error: "Search term cannot be empty" };
  }
  if (term.length > MAX_SEARCH_TERM_LENGTH) {
    return {
      success: false,
      error: `Search term too long (maximum ${MAX_SEARCH_TERM_LENGTH} characters)`,
    };
  }
  if (CONTROL_CHARACTERS.test(term)) {
    return { success: false, error: "Search term contains invalid characters" };
  }
  return { success: true, data: term };
}

export function sanitizeMessage(message: string): string {
  return message
    .trim()
    // Order matters: remove <> first, then collapse spaces that may appear
    // (e.g., "Hello > world" -> "Hello  world" -> "Hello world")
    .replace(/[<>]/g, "")
    .replace(/[ \t]+/g, " ")
    .substring(0, CONSTANTS.MAX_MESSAGE_LENGTH);
}

export class SimpleLimiter {
  private requests = new Map<number, number[]>();
  private readonly config: RateLimiterConfig;
  private cleanupIntervalId: NodeJS.Timeout | null = null;

  constructor(config: RateLimiterConfig) {
    this.config = config;
    this.startCleanupTimer();
  }

  public isAllowed(userId: number): boolean {
    // Prevent unbounded memory growth
    if (this.requests.size >= CONSTANTS.RATE_LIMITER_MAX_TRACKED_USERS) {
      this.cleanup();
    }

    const now = Date.now();
    const userRequests = this.requests.get(userId) || [];

    const recentRequests = userRequests.filter(
      (time) => now - time < this.config.windowMs
    );

    if (recentRequests.length >= this.config.maxRequests) {
      return false;
    }

    recentRequests.push(now);
    this.requests.set(userId, recentRequests);

    return true;
  }

  public getUserRequestCount(userId: number): number {
    const now = Date.now();
    const userRequests = this.requests.get(userId) || [];

    return userRequests.filter((time) => now - time < this.config.windowMs)
      .length;
  }

  public getTimeUntilReset(userId: number): number {
    const userRequests = this.requests.get(userId) || [];
    if (userRequests.length === 0) return 0;

    const now = Date.now();
    const oldestRequest = Math.min(...userRequests);
    const resetTime = oldestRequest + this.config.windowMs;

    return Math.max(0, resetTime - now);
  }

  private startCleanupTimer(): void {
    this.cleanupIntervalId = setInterval(() => {
      this.cleanup();
    }, this.config.cleanupIntervalMs);
    // The bot's polling loop keeps the process alive, not this timer
    this.cleanupIntervalId.unref();
  }

  private cleanup(): void {
    const now = Date.now();
    const cutoffTime = now - this.config.windowMs;

    for (const [userId, requests] of this.requests.entries()) {
      const recentRequests = requests.filter((time) => time > cutoffTime);

      if (recentRequests.length === 0) {
        this.requests.delete(userId);
      } else if (recentRequests.length < requests.length) {
        this.requests.set(userId, recentRequests);
      }
    }
  }

  public destroy(): void {
    if (this.cleanupIntervalId) {
      clearInterval(this.cleanupIntervalId);
      this.cleanupIntervalId = null;
    }
    this.requests.clear();
  }

  public getStats(): {
    totalUsers: number;
    totalRequests: number;
    config: RateLimiterConfig;
  } {
    let totalRequests = 0;
    for (const requests of this.requests.values()) {
      totalRequests += requests.length;
    }

    return {
      totalUsers: this.requests.size,
      totalRequests,
      config: this.config,
    };
  }
}

export function isSpamMessage(
  userId: number,
  rateLimiter: SimpleLimiter
): boolean {
  return !rateLimiter.isAllowed(userId);
}
