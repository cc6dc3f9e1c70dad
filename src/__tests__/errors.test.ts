/**
 * Unit tests for the error hierarchy and DefaultErrorHandler
 */
import { describe, it, expect } from "vitest";
import {
  AppError,
  AuthorizationError,
  DefaultErrorHandler,
  ErrorCategory,
  ErrorSeverity,
  FileReadError,
  FileReadFailure,
  IndexBuildError,
  LLMError,
  LLMErrorSubType,
  ReasoningUnavailableError,
  SearchAbortedError,
  SystemError,
  SystemErrorSubType,
  createDefaultErrorHandler,
  isAppError,
  isAuthorizationError,
  isFileReadError,
  isIndexBuildError,
  isLLMError,
  isReasoningUnavailableError,
  isSearchAbortedError,
  isSystemError,
  toError,
} from "../errors/index.js";

// =============================================================================
// Error Classes
// =============================================================================

describe("IndexBuildError", () => {
  it("creates error with correct properties", () => {
    const cause = new Error("ENOENT");
    const error = new IndexBuildError("root missing", "/srv/app", { depth: 0 }, cause);

    expect(error).toBeInstanceOf(AppError);
    expect(error.name).toBe("IndexBuildError");
    expect(error.code).toBe("INDEX_BUILD_ERROR");
    expect(error.category).toBe(ErrorCategory.SYSTEM);
    expect(error.severity).toBe(ErrorSeverity.HIGH);
    expect(error.rootPath).toBe("/srv/app");
    expect(error.context).toEqual({ depth: 0 });
    expect(error.originalError).toBe(cause);
  });
});

describe("FileReadError", () => {
  it.each([
    [FileReadFailure.NOT_FOUND, "📄 File not found: src/a.ts"],
    [FileReadFailure.PERMISSION_DENIED, "🔒 Permission denied: src/a.ts"],
    [FileReadFailure.DECODE, "📄 File is not readable as text: src/a.ts"],
    [FileReadFailure.OUTSIDE_ROOT, "🚫 Path is outside the codebase: src/a.ts"],
    [FileReadFailure.UNKNOWN, "📄 Could not read file: src/a.ts"],
  ])("describes %s failures for the user", (reason, userMessage) => {
    const error = new FileReadError("read failed", "src/a.ts", reason);

    expect(error.userMessage).toBe(userMessage);
    expect(error.context).toEqual({ path: "src/a.ts", reason });
    expect(error.severity).toBe(ErrorSeverity.LOW);
  });
});

describe("LLMError", () => {
  it("creates RATE_LIMIT error with correct properties", () => {
    const error = new LLMError("429", LLMErrorSubType.RATE_LIMIT, "openai", {
      retryAfterSeconds: 30,
    });

    expect(error.code).toBe("LLM_ERROR");
    expect(error.category).toBe(ErrorCategory.EXTERNAL);
    expect(error.severity).toBe(ErrorSeverity.MEDIUM);
    expect(error.provider).toBe("openai");
    expect(error.context).toEqual({ retryAfterSeconds: 30 });
    expect(error.userMessage).toBe(
      "⏳ The language model is rate limited. Please try again shortly."
    );
  });

  it("treats CONFIG errors as HIGH severity", () => {
    const error = new LLMError("no key", LLMErrorSubType.CONFIG, "anthropic");

    expect(error.severity).toBe(ErrorSeverity.HIGH);
    expect(error.userMessage).toBe(
      "🔧 Language model is not configured. Contact administrator."
    );
  });

  it.each([
    LLMErrorSubType.TIMEOUT,
    LLMErrorSubType.API_ERROR,
    LLMErrorSubType.INVALID_RESPONSE,
  ])("treats %s errors as MEDIUM severity", (subType) => {
    expect(new LLMError("x", subType, "ollama").severity).toBe(ErrorSeverity.MEDIUM);
  });
});

describe("ReasoningUnavailableError", () => {
  it("records the call kind in its context", () => {
    const cause = new Error("socket hang up");
    const error = new ReasoningUnavailableError(
      "File selection failed: socket hang up",
      "select",
      { iteration: 2 },
      cause
    );

    expect(error.code).toBe("REASONING_UNAVAILABLE");
    expect(error.callKind).toBe("select");
    expect(error.context).toEqual({ iteration: 2, callKind: "select" });
    expect(error.originalError).toBe(cause);
  });
});

describe("SearchAbortedError", () => {
  it("carries the partial progress and the reason", () => {
    const reason = new ReasoningUnavailableError(
      "Sufficiency assessment failed: timeout",
      "assess"
    );
    const error = new SearchAbortedError(reason, "assessment", ["src/a.ts"], 1);

    expect(error.message).toBe(
      "Could not complete analysis during assessment: Sufficiency assessment failed: timeout"
    );
    expect(error.userMessage).toBe(
      "⚠️ Could not complete analysis: Sufficiency assessment failed: timeout"
    );
    expect(error.analyzedFiles).toEqual(["src/a.ts"]);
    expect(error.iterationsCompleted).toBe(1);
    expect(error.originalError).toBe(reason);
    expect(error.context).toEqual({
      phase: "assessment",
      analyzedFiles: ["src/a.ts"],
      iterationsCompleted: 1,
    });
  });
});

describe("AuthorizationError", () => {
  it("creates error with correct properties", () => {
    const error = new AuthorizationError("forbidden", 42);

    expect(error.code).toBe("AUTH_ERROR");
    expect(error.category).toBe(ErrorCategory.SECURITY);
    expect(error.userId).toBe(42);
    expect(error.userMessage).toBe("🚫 You don't have permission to perform this action.");
  });

  it("works without userId", () => {
    expect(new AuthorizationError("forbidden").userId).toBeUndefined();
  });
});

describe("SystemError", () => {
  it("creates CONFIG error with correct properties", () => {
    const cause = new Error("PROJECT_PATH environment variable is required");
    const error = new SystemError(
      "Invalid configuration",
      SystemErrorSubType.CONFIG,
      undefined,
      cause
    );

    expect(error.code).toBe("SYSTEM_ERROR");
    expect(error.severity).toBe(ErrorSeverity.HIGH);
    expect(error.subType).toBe(SystemErrorSubType.CONFIG);
    expect(error.originalError).toBe(cause);
    expect(error.userMessage).toBe("🔧 System error. Contact administrator.");
  });
});

// =============================================================================
// Type Guards
// =============================================================================

describe("Type Guards", () => {
  const reason = new ReasoningUnavailableError("down", "answer");
  const errors = {
    index: new IndexBuildError("x", "/root"),
    fileRead: new FileReadError("x", "a.ts", FileReadFailure.NOT_FOUND),
    llm: new LLMError("x", LLMErrorSubType.TIMEOUT, "openai"),
    reasoning: reason,
    aborted: new SearchAbortedError(reason, "answer generation", [], 0),
    auth: new AuthorizationError("x"),
    system: new SystemError("x", SystemErrorSubType.STARTUP),
  };

  it("isAppError accepts every subclass and nothing else", () => {
    for (const error of Object.values(errors)) {
      expect(isAppError(error)).toBe(true);
    }
    expect(isAppError(new Error("plain"))).toBe(false);
    expect(isAppError("string")).toBe(false);
    expect(isAppError(null)).toBe(false);
  });

  it.each([
    ["index", isIndexBuildError],
    ["fileRead", isFileReadError],
    ["llm", isLLMError],
    ["reasoning", isReasoningUnavailableError],
    ["aborted", isSearchAbortedError],
    ["auth", isAuthorizationError],
    ["system", isSystemError],
  ] as const)("%s guard matches only its own class", (key, guard) => {
    for (const [name, error] of Object.entries(errors)) {
      expect(guard(error)).toBe(name === key);
    }
  });
});

describe("toError", () => {
  it("returns Error instances unchanged", () => {
    const error = new Error("boom");

    expect(toError(error)).toBe(error);
  });

  it("wraps other values", () => {
    expect(toError("boom").message).toBe("boom");
    expect(toError(404).message).toBe("404");
  });
});

// =============================================================================
// DefaultErrorHandler
// =============================================================================

describe("DefaultErrorHandler", () => {
  const handler = new DefaultErrorHandler();

  it("retries LOW and MEDIUM severity errors", () => {
    expect(
      handler.handle(new FileReadError("x", "a.ts", FileReadFailure.DECODE))
    ).toEqual({ userMessage: "📄 File is not readable as text: a.ts", shouldRetry: true });
    expect(handler.handle(new AuthorizationError("x")).shouldRetry).toBe(true);
  });

  it("does not retry HIGH severity errors", () => {
    expect(handler.handle(new SystemError("x", SystemErrorSubType.CONFIG))).toEqual({
      userMessage: "🔧 System error. Contact administrator.",
      shouldRetry: false,
    });
    expect(handler.handle(new LLMError("x", LLMErrorSubType.CONFIG, "openai")).shouldRetry).toBe(
      false
    );
  });

  it("returns a generic message for standard errors", () => {
    expect(handler.handle(new Error("Something went wrong"))).toEqual({
      userMessage: "⚠️ An error occurred. Please try again.",
      shouldRetry: true,
    });
  });

  it.each([null, undefined, "error string", 500])(
    "returns the unknown error message for %s",
    (value) => {
      expect(handler.handle(value)).toEqual({
        userMessage: "❌ Unknown error. Contact administrator.",
        shouldRetry: false,
      });
    }
  );

  it("is what createDefaultErrorHandler builds", () => {
    expect(createDefaultErrorHandler()).toBeInstanceOf(DefaultErrorHandler);
  });
});
