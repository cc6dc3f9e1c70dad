import { describe, it, expect, vi, afterEach } from "vitest";
import { withTimeout, DEFAULT_TIMEOUTS } from "../../llm/timeout.js";
import { LLMError, LLMErrorSubType } from "../../errors/index.js";

describe("withTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("should resolve with the wrapped value", async () => {
    await expect(withTimeout(Promise.resolve("done"), { timeoutMs: 1000 })).resolves.toBe(
      "done"
    );
  });

  it("should pass through rejections", async () => {
    const cause = new Error("network");

    await expect(withTimeout(Promise.reject(cause), { timeoutMs: 1000 })).rejects.toBe(cause);
  });

  it("should reject with TIMEOUT when the deadline passes", async () => {
    vi.useFakeTimers();
    const never = new Promise<string>(() => undefined);

    const pending = withTimeout(never, {
      timeoutMs: 500,
      context: "file selection",
      provider: "ollama",
    });
    const assertion = expect(pending).rejects.toMatchObject({
      subType: LLMErrorSubType.TIMEOUT,
      provider: "ollama",
      message: "file selection timed out after 500ms",
    });
    await vi.advanceTimersByTimeAsync(500);

    await assertion;
    await expect(pending).rejects.toBeInstanceOf(LLMError);
  });

  it.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY])(
    "should reject timeout %s",
    async (timeoutMs) => {
      await expect(withTimeout(Promise.resolve(1), { timeoutMs })).rejects.toThrow(
        "Invalid timeout value"
      );
    }
  );

  it("should give answers more time than helper calls", () => {
    expect(DEFAULT_TIMEOUTS.answer).toBeGreaterThan(DEFAULT_TIMEOUTS.helper);
  });
});
