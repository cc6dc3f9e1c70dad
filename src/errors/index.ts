export abstract class AppError extends Error {
  abstract readonly code: string;
  abstract readonly category: ErrorCategory;
  abstract readonly severity: ErrorSeverity;
  abstract readonly userMessage: string;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/** Codebase index could not be built (missing root or no eligible files) */
export class IndexBuildError extends AppError {
  readonly code = "INDEX_BUILD_ERROR";
  readonly category = ErrorCategory.SYSTEM;
  readonly severity = ErrorSeverity.HIGH;
  readonly userMessage =
    "📁 Codebase could not be indexed. Check project path settings.";

  constructor(
    message: string,
    public readonly rootPath: string,
    context?: Record<string, unknown>,
    originalError?: Error
  ) {
    super(message, context, originalError);
  }
}

/** A single file could not be read; never fatal to a query */
export class FileReadError extends AppError {
  readonly code = "FILE_READ_ERROR";
  readonly category = ErrorCategory.SYSTEM;
  readonly severity = ErrorSeverity.LOW;
  readonly userMessage: string;

  constructor(
    message: string,
    public readonly path: string,
    public readonly reason: FileReadFailure,
    originalError?: Error
  ) {
    super(message, { path, reason }, originalError);
    this.userMessage = `${FILE_READ_MESSAGES[reason]}: ${path}`;
  }
}

/** LLM provider errors (transport, HTTP, malformed payloads) */
export class LLMError extends AppError {
  readonly code = "LLM_ERROR";
  readonly category = ErrorCategory.EXTERNAL;
  readonly severity: ErrorSeverity;
  readonly userMessage: string;

  constructor(
    message: string,
    public readonly subType: LLMErrorSubType,
    public readonly provider: string,
    context?: Record<string, unknown>,
    originalError?: Error
  ) {
    super(message, context, originalError);
    this.severity =
      subType === LLMErrorSubType.CONFIG
        ? ErrorSeverity.HIGH
        : ErrorSeverity.MEDIUM;
    this.userMessage = LLM_MESSAGES[subType];
  }
}

/** Reasoning engine call failed; aborts the current query only */
export class ReasoningUnavailableError extends AppError {
  readonly code = "REASONING_UNAVAILABLE";
  readonly category = ErrorCategory.EXTERNAL;
  readonly severity = ErrorSeverity.MEDIUM;
  readonly userMessage =
    "🤖 The reasoning engine is unavailable right now. Please try again.";

  constructor(
    message: string,
    public readonly callKind: string,
    context?: Record<string, unknown>,
    originalError?: Error
  ) {
    super(message, { ...context, callKind }, originalError);
  }
}

/**
 * Agentic search stopped by a reasoning failure.
 * Carries the work done before the failure.
 */
export class SearchAbortedError extends AppError {
  readonly code = "SEARCH_ABORTED";
  readonly category = ErrorCategory.EXTERNAL;
  readonly severity = ErrorSeverity.MEDIUM;
  readonly userMessage: string;

  constructor(
    public readonly reason: ReasoningUnavailableError,
    public readonly phase: string,
    public readonly analyzedFiles: readonly string[],
    public readonly iterationsCompleted: number
  ) {
    super(
      `Could not complete analysis during ${phase}: ${reason.message}`,
      { phase, analyzedFiles, iterationsCompleted },
      reason
    );
    this.userMessage = `⚠️ Could not complete analysis: ${reason.message}`;
  }
}

/** Authorization and authentication errors */
export class AuthorizationError extends AppError {
  readonly code = "AUTH_ERROR";
  readonly category = ErrorCategory.SECURITY;
  readonly severity = ErrorSeverity.MEDIUM;
  readonly userMessage = "🚫 You don't have permission to perform this action.";

  constructor(
    message: string,
    public readonly userId?: number,
    context?: Record<string, unknown>
  ) {
    super(message, context);
  }
}

/** System and configuration errors */
export class SystemError extends AppError {
  readonly code = "SYSTEM_ERROR";
  readonly category = ErrorCategory.SYSTEM;
  readonly severity = ErrorSeverity.HIGH;
  readonly userMessage = "🔧 System error. Contact administrator.";

  constructor(
    message: string,
    public readonly subType: SystemErrorSubType,
    context?: Record<string, unknown>,
    originalError?: Error
  ) {
    super(message, context, originalError);
  }
}

export enum ErrorCategory {
  USER = "user", // User input errors
  SYSTEM = "system", // System/infrastructure errors
  EXTERNAL = "external", // External service errors
  SECURITY = "security", // Authorization/security errors
}

export enum ErrorSeverity {
  LOW = "low", // User can continue, minor issue
  MEDIUM = "medium", // Feature unavailable, retry possible
  HIGH = "high", // Service unavailable, admin needed
  CRITICAL = "critical", // Complete failure, immediate attention
}

export enum LLMErrorSubType {
  RATE_LIMIT = "rate_limit",
  TIMEOUT = "timeout",
  API_ERROR = "api_error",
  INVALID_RESPONSE = "invalid_response",
  CONFIG = "config",
}

export enum FileReadFailure {
  NOT_FOUND = "not_found",
  PERMISSION_DENIED = "permission_denied",
  DECODE = "decode",
  OUTSIDE_ROOT = "outside_root",
  UNKNOWN = "unknown",
}

export enum SystemErrorSubType {
  CONFIG = "config",
  STARTUP = "startup",
}

const FILE_READ_MESSAGES: Record<FileReadFailure, string> = {
  [FileReadFailure.NOT_FOUND]: "📄 File not found",
  [FileReadFailure.PERMISSION_DENIED]: "🔒 Permission denied",
  [FileReadFailure.DECODE]: "📄 File is not readable as text",
  [FileReadFailure.OUTSIDE_ROOT]: "🚫 Path is outside the codebase",
  [FileReadFailure.UNKNOWN]: "📄 Could not read file",
};

const LLM_MESSAGES: Record<LLMErrorSubType, string> = {
  [LLMErrorSubType.RATE_LIMIT]:
    "⏳ The language model is rate limited. Please try again shortly.",
  [LLMErrorSubType.TIMEOUT]:
    "⏰ The language model took too long. Try a more specific question.",
  [LLMErrorSubType.API_ERROR]: "🤖 Language model request failed. Try again.",
  [LLMErrorSubType.INVALID_RESPONSE]:
    "🤖 Language model returned an unexpected response.",
  [LLMErrorSubType.CONFIG]:
    "🔧 Language model is not configured. Contact administrator.",
};

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function isIndexBuildError(error: unknown): error is IndexBuildError {
  return error instanceof IndexBuildError;
}

export function isFileReadError(error: unknown): error is FileReadError {
  return error instanceof FileReadError;
}

export function isLLMError(error: unknown): error is LLMError {
  return error instanceof LLMError;
}

export function isReasoningUnavailableError(
  error: unknown
): error is ReasoningUnavailableError {
  return error instanceof ReasoningUnavailableError;
}

export function isSearchAbortedError(
  error: unknown
): error is SearchAbortedError {
  return error instanceof SearchAbortedError;
}

export function isAuthorizationError(
  error: unknown
): error is AuthorizationError {
  return error instanceof AuthorizationError;
}

export function isSystemError(error: unknown): error is SystemError {
  return error instanceof SystemError;
}

/** Convert an unknown thrown value into an Error instance */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export interface SimpleErrorHandler {
  handle(error: unknown): { userMessage: string; shouldRetry: boolean };
}

export class DefaultErrorHandler implements SimpleErrorHandler {
  handle(error: unknown): { userMessage: string; shouldRetry: boolean } {
    if (isAppError(error)) {
      return {
        userMessage: error.userMessage,
        shouldRetry:
          error.severity === ErrorSeverity.LOW ||
          error.severity === ErrorSeverity.MEDIUM,
      };
    }

    if (error instanceof Error) {
      return {
        userMessage: "⚠️ An error occurred. Please try again.",
        shouldRetry: true,
      };
    }

    return {
      userMessage: "❌ Unknown error. Contact administrator.",
      shouldRetry: false,
    };
  }
}

export function createDefaultErrorHandler(): SimpleErrorHandler {
  return new DefaultErrorHandler();
}
