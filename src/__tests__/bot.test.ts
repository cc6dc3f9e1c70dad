/**
 * Unit tests for bot.ts module
 *
 * Tests createBot(), error handling, commands and questions via captured
 * handlers, over real sessions backed by in-memory files and scripted
 * reasoning.
 */
import { describe, it, expect, vi, beforeEach, afterEach, Mock } from "vitest";
import type { Message, Chat, User } from "grammy/types";

// =============================================================================
// Mocks Setup (before imports)
// =============================================================================

type Handler = (ctx: unknown, next?: () => Promise<void>) => Promise<void>;

// Using vi.hoisted() to make the record available in mock factories
const capturedHandlers = vi.hoisted(() => {
  const handlers: Record<string, Handler> = {};
  return handlers;
});

vi.mock("grammy", () => {
  // Must be a real class for 'new' to work
  const MockBot = class {
    catch = vi.fn((handler: Handler) => {
      capturedHandlers.error = handler;
    });
    use = vi.fn((handler: Handler) => {
      capturedHandlers.middleware = handler;
    });
    command = vi.fn((name: string, handler: Handler) => {
      capturedHandlers[`cmd:${name}`] = handler;
    });
    on = vi.fn((event: string, handler: Handler) => {
      capturedHandlers[`on:${event}`] = handler;
    });
  };

  const MockInputFile = class {
    constructor(
      readonly content: unknown,
      readonly filename?: string
    ) {}
  };

  return { Bot: MockBot, InputFile: MockInputFile };
});

vi.mock("../utils.js", async (importOriginal) => ({
  ...(await importOriginal<typeof import("../utils.js")>()),
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

// =============================================================================
// Imports after mocks
// =============================================================================

import { HELP_TEXT, createBot, formatFileList, formatOutcome } from "../bot.js";
import { CodebaseSession, SessionRegistry } from "../codebase/session.js";
import { FileIndex } from "../codebase/file-index.js";
import { FileMemoryCache } from "../codebase/file-cache.js";
import { AgentConfigSchema } from "../codebase/types.js";
import { FileReadError, FileReadFailure } from "../errors/index.js";
import type { Config } from "../types.js";
import { logger } from "../utils.js";
import { SimpleLimiter } from "../validation.js";
import { InMemoryFileSource, ScriptedReasoning, unavailable } from "./codebase/fakes.js";

// =============================================================================
// Helper Functions
// =============================================================================

interface MockContextOverrides {
  from?: Partial<User> | null;
  message?: Partial<Message.TextMessage> | null;
  chat?: Partial<Chat.PrivateChat>;
  match?: string;
}

interface MockContext {
  from: User | undefined;
  message: Message.TextMessage | undefined;
  chat: Chat.PrivateChat;
  reply: Mock;
  replyWithDocument: Mock;
  api: {
    deleteMessage: Mock;
  };
  match: string;
}

const USER_ID = 123456789;
const CHAT_ID = 987654321;
const STATUS_MESSAGE_ID = 111;

/**
 * Creates a mock grammy Context for testing
 */
function createMockContext(overrides: MockContextOverrides = {}): MockContext {
  const defaultUser: User = {
    id: USER_ID,
    is_bot: false,
    first_name: "Test",
  };

  const chat: Chat.PrivateChat = {
    id: CHAT_ID,
    type: "private",
    first_name: "Test",
    ...overrides.chat,
  };

  const defaultMessage: Message.TextMessage = {
    message_id: 1,
    date: Math.floor(Date.now() / 1000) + 10,
    chat,
    text: "test message content",
    from: defaultUser,
  };

  return {
    from: overrides.from === null ? undefined : { ...defaultUser, ...overrides.from },
    message:
      overrides.message === null ? undefined : { ...defaultMessage, ...overrides.message },
    chat,
    reply: vi.fn().mockResolvedValue({ message_id: STATUS_MESSAGE_ID }),
    replyWithDocument: vi.fn().mockResolvedValue({}),
    api: {
      deleteMessage: vi.fn().mockResolvedValue(true),
    },
    match: overrides.match ?? "",
  };
}

function textContext(text: string, overrides: MockContextOverrides = {}): MockContext {
  return createMockContext({ ...overrides, message: { text, ...overrides.message } });
}

/**
 * Clears all captured handlers
 */
function clearCapturedHandlers(): void {
  for (const key of Object.keys(capturedHandlers)) {
    delete capturedHandlers[key];
  }
}

/**
 * Gets a handler from capturedHandlers, failing the test when it is missing
 */
function getHandler(key: string): Handler {
  const handler = capturedHandlers[key];
  if (!handler) {
    throw new Error(`Handler "${key}" was not registered`);
  }
  return handler;
}

async function runCommand(name: string, match = "", chatId = CHAT_ID): Promise<MockContext> {
  const ctx = createMockContext({ match, chat: { id: chatId } });
  await getHandler(`cmd:${name}`)(ctx);
  return ctx;
}

async function ask(text: string, overrides: MockContextOverrides = {}): Promise<MockContext> {
  const ctx = textContext(text, overrides);
  await getHandler("on:message:text")(ctx);
  return ctx;
}

function replies(ctx: MockContext): unknown[] {
  return ctx.reply.mock.calls.map((call) => call[0]);
}

// =============================================================================
// Fixtures
// =============================================================================

const FILES = {
  "README.md": "# Demo\n",
  "src/auth.ts": "export function login() {}\n",
  "src/big.ts": "x".repeat(4000),
  "src/bot.ts": "import { login } from './auth';\nlogin();\n",
};

const config: Config = {
  telegramToken: "test-token",
  authorizedUsers: [USER_ID],
  projectPath: "/project",
  rateLimiter: { maxRequests: 2, windowMs: 60000, cleanupIntervalMs: 300000 },
  llm: { provider: "ollama", ollamaUrl: "http://localhost:11434", timeoutMs: 120000 },
  agent: AgentConfigSchema.parse({}),
};

// =============================================================================
// Tests
// =============================================================================

describe("bot.ts", () => {
  let source: InMemoryFileSource;
  let reasoning: ScriptedReasoning;
  let rateLimiter: SimpleLimiter | undefined;

  async function setup(script: ConstructorParameters<typeof ScriptedReasoning>[0] = {}) {
    source = InMemoryFileSource.of(FILES);
    reasoning = new ScriptedReasoning(script);
    const fileIndex = await FileIndex.build("/project", { source });
    const sessions = new SessionRegistry(
      () => new CodebaseSession({ fileIndex, reader: source, reasoning })
    );
    const limiter = new SimpleLimiter(config.rateLimiter);
    rateLimiter = limiter;
    createBot({ config, fileIndex, reader: source, sessions, rateLimiter: limiter });
  }

  const loginScript = {
    classify: [{ action: "SEARCH_CODE" as const }],
    select: [{ paths: ["src/auth.ts"] }],
    assess: [{ level: "HIGH" as const }],
    answer: ["Login is in auth.ts."],
  };

  beforeEach(() => {
    vi.clearAllMocks();
    vi.useFakeTimers({ toFake: ["Date"] });
    clearCapturedHandlers();
  });

  afterEach(() => {
    rateLimiter?.destroy();
    rateLimiter = undefined;
    vi.useRealTimers();
  });

  // ===========================================================================
  // createBot Tests
  // ===========================================================================

  describe("createBot", () => {
    it("should register every command and message handler", async () => {
      await setup();

      expect(Object.keys(capturedHandlers).sort()).toEqual(
        [
          "error",
          "middleware",
          "cmd:start",
          "cmd:help",
          "cmd:ls",
          "cmd:tree",
          "cmd:search",
          "cmd:read",
          "cmd:memory",
          "cmd:clear",
          "cmd:history",
          "cmd:forget",
          "on:message:text",
          "on:message",
        ].sort()
      );
    });

    it("should reject users outside the allow-list in middleware", async () => {
      await setup();
      const ctx = createMockContext({ from: { id: 5 } });
      const next = vi.fn().mockResolvedValue(undefined);

      await getHandler("middleware")(ctx, next);

      expect(next).not.toHaveBeenCalled();
      expect(ctx.reply).toHaveBeenCalledWith(
        "🚫 You don't have permission to perform this action."
      );
    });

    it("should let allowed users through the middleware", async () => {
      await setup();
      const ctx = createMockContext();
      const next = vi.fn().mockResolvedValue(undefined);

      await getHandler("middleware")(ctx, next);

      expect(next).toHaveBeenCalledTimes(1);
    });
  });

  // ===========================================================================
  // Error Handler Tests
  // ===========================================================================

  describe("error handler", () => {
    it("should reply with the error's user message", async () => {
      await setup();
      const ctx = createMockContext();
      const error = new FileReadError("denied", "src/auth.ts", FileReadFailure.PERMISSION_DENIED);

      await getHandler("error")({ error, ctx });

      expect(logger.error).toHaveBeenCalledWith("Bot error:", error);
      expect(ctx.reply).toHaveBeenCalledWith("🔒 Permission denied: src/auth.ts");
    });

    it("should log when the error reply itself fails", async () => {
      await setup();
      const ctx = createMockContext();
      const replyError = new Error("chat not found");
      ctx.reply.mockRejectedValue(replyError);

      await getHandler("error")({ error: new Error("boom"), ctx });

      expect(logger.error).toHaveBeenCalledWith("Failed to send error reply:", replyError);
    });
  });

  // ===========================================================================
  // Command Tests
  // ===========================================================================

  describe("commands", () => {
    beforeEach(async () => {
      await setup(loginScript);
    });

    it("/start should greet with the codebase size", async () => {
      const ctx = await runCommand("start");

      expect(ctx.reply).toHaveBeenCalledWith(
        "👋 Hello, Test!\n\n" +
          "🤖 I answer questions about a codebase of 4 files.\n\n" +
          "📝 Send your question as a text message, or /help for commands."
      );
    });

    it("/help should list the commands", async () => {
      const ctx = await runCommand("help");

      expect(ctx.reply).toHaveBeenCalledWith(HELP_TEXT);
    });

    describe("/ls", () => {
      it("should list every file with line counts", async () => {
        const ctx = await runCommand("ls");

        expect(replies(ctx)).toEqual([
          "📂 Files in '/' (4):\n" +
            "  README.md (1 line)\n" +
            "  src/auth.ts (1 line)\n" +
            "  src/big.ts (1 line)\n" +
            "  src/bot.ts (2 lines)",
        ]);
      });

      it("should list files under a directory", async () => {
        const ctx = await runCommand("ls", "/src/");

        expect(replies(ctx)).toEqual([
          "📂 Files in 'src' (3):\n" +
            "  src/auth.ts (1 line)\n" +
            "  src/big.ts (1 line)\n" +
            "  src/bot.ts (2 lines)",
        ]);
      });

      it("should report an empty directory", async () => {
        const ctx = await runCommand("ls", "docs");

        expect(ctx.reply).toHaveBeenCalledWith("No files found in 'docs'");
      });

      it("should reject paths outside the codebase", async () => {
        const ctx = await runCommand("ls", "../etc");

        expect(ctx.reply).toHaveBeenCalledWith("❌ Path must stay inside the codebase");
      });
    });

    it("/tree should group files by directory", async () => {
      const ctx = await runCommand("tree");

      expect(replies(ctx)).toEqual([
        "🌳 Directory structure:\n" +
          "  /\n" +
          "    README.md\n" +
          "  src/\n" +
          "    auth.ts\n" +
          "    big.ts\n" +
          "    bot.ts",
      ]);
    });

    describe("/search", () => {
      it("should list files containing the term", async () => {
        const ctx = await runCommand("search", "LOGIN");

        expect(replies(ctx)).toEqual([
          "🔎 Found 'LOGIN' in 2 files:\n  src/auth.ts\n  src/bot.ts",
        ]);
      });

      it("should report no matches", async () => {
        const ctx = await runCommand("search", "zzz");

        expect(ctx.reply).toHaveBeenCalledWith("No files found containing 'zzz'");
      });

      it("should show usage without a term", async () => {
        const ctx = await runCommand("search", "  ");

        expect(ctx.reply).toHaveBeenCalledWith("Usage: /search <term>");
      });
    });

    describe("/read", () => {
      it("should show a short file inline", async () => {
        const ctx = await runCommand("read", "src/auth.ts");

        expect(ctx.reply).toHaveBeenCalledWith(
          "--- src/auth.ts ---\nexport function login() {}\n\n--- End of src/auth.ts ---"
        );
      });

      it("should attach a long file as a document", async () => {
        const ctx = await runCommand("read", "src/big.ts");

        expect(ctx.reply).not.toHaveBeenCalled();
        expect(ctx.replyWithDocument).toHaveBeenCalledWith(
          expect.objectContaining({ filename: "big.ts" }),
          { caption: "📄 src/big.ts (1 line)" }
        );
      });

      it("should report files missing from the index", async () => {
        const ctx = await runCommand("read", "src/missing.ts");

        expect(ctx.reply).toHaveBeenCalledWith("File not found: src/missing.ts");
        expect(source.fullReads).toEqual([]);
      });

      it("should show usage without a path", async () => {
        const ctx = await runCommand("read");

        expect(ctx.reply).toHaveBeenCalledWith("Usage: /read <file>");
      });
    });

    describe("session commands", () => {
      it("should report an empty cache and history before any question", async () => {
        expect(replies(await runCommand("memory"))).toEqual(["No files in memory cache."]);
        expect(replies(await runCommand("history"))).toEqual(["No questions yet."]);
      });

      it("should show files and questions from earlier answers", async () => {
        await ask("How does login work?");

        expect(replies(await runCommand("memory"))).toEqual([
          "🧠 Cached files (1):\n  src/auth.ts",
        ]);
        expect(replies(await runCommand("history"))).toEqual([
          "🕘 Recent questions:\n1. How does login work?\n   → Login is in auth.ts.",
        ]);
      });

      it("/clear should wipe the cache but keep history", async () => {
        await ask("How does login work?");

        expect(replies(await runCommand("clear"))).toEqual([
          "🧹 Memory cache cleared (1 file removed).",
        ]);
        expect(replies(await runCommand("memory"))).toEqual(["No files in memory cache."]);
        expect(replies(await runCommand("history"))).toEqual([
          "🕘 Recent questions:\n1. How does login work?\n   → Login is in auth.ts.",
        ]);
      });

      it("/forget should wipe cache and history", async () => {
        await ask("How does login work?");

        expect(replies(await runCommand("forget"))).toEqual([
          "🧹 Conversation and file cache cleared.",
        ]);
        expect(replies(await runCommand("memory"))).toEqual(["No files in memory cache."]);
        expect(replies(await runCommand("history"))).toEqual(["No questions yet."]);
      });

      it("should keep sessions separate per chat", async () => {
        await ask("How does login work?");

        expect(replies(await runCommand("memory", "", 555))).toEqual([
          "No files in memory cache.",
        ]);
      });
    });
  });

  // ===========================================================================
  // Question Handler Tests
  // ===========================================================================

  describe("questions", () => {
    it("should answer from analyzed files and remove the status message", async () => {
      await setup(loginScript);

      const ctx = await ask("How does login work?");

      expect(replies(ctx)).toEqual([
        "⏳ Analyzing...",
        "Login is in auth.ts.\n\n📁 Analyzed: src/auth.ts\n⏱️ Time: 0s",
      ]);
      expect(ctx.api.deleteMessage).toHaveBeenCalledWith(CHAT_ID, STATUS_MESSAGE_ID);
      expect(reasoning.answers()[0]?.query).toBe("How does login work?");
    });

    it("should mark answers from general knowledge", async () => {
      await setup({
        classify: [{ action: "DIRECT" }],
        answer: ["A closure captures variables."],
      });

      const ctx = await ask("What is a closure?");

      expect(replies(ctx)[1]).toBe(
        "A closure captures variables.\n\n💡 Answered from general knowledge\n⏱️ Time: 0s"
      );
      expect(reasoning.selections()).toEqual([]);
    });

    it("should report a reasoning failure with the partial progress", async () => {
      await setup({
        select: [{ paths: ["src/auth.ts"] }],
        assess: [unavailable("assess")],
      });

      const ctx = await ask("How does login work?");

      expect(replies(ctx)).toEqual([
        "⏳ Analyzing...",
        "⚠️ Could not complete analysis: confidence assessment failed: connection refused\n\n" +
          "📁 Analyzed before stopping: src/auth.ts",
      ]);
      expect(ctx.api.deleteMessage).toHaveBeenCalledWith(CHAT_ID, STATUS_MESSAGE_ID);
      expect(replies(await runCommand("history"))).toEqual(["No questions yet."]);
    });

    it("should attach long answers as a document", async () => {
      const longAnswer = "word ".repeat(800).trim();
      await setup({ classify: [{ action: "DIRECT" }], answer: [longAnswer] });

      const ctx = await ask("Explain everything please");

      expect(replies(ctx)).toEqual([
        "⏳ Analyzing...",
        "✅ Analysis completed\n\n" +
          `${"word ".repeat(60).trim()}...\n\n` +
          "📄 Full answer attached.\n⏱️ Time: 0s",
      ]);
      expect(ctx.replyWithDocument).toHaveBeenCalledWith(
        expect.objectContaining({
          filename: expect.stringMatching(/^analysis-explain-everything-please-.+\.md$/),
        })
      );
    });

    it("should not fail the reply when the status message cannot be deleted", async () => {
      await setup(loginScript);
      const ctx = textContext("How does login work?");
      ctx.api.deleteMessage.mockRejectedValue(new Error("message to delete not found"));

      await getHandler("on:message:text")(ctx);

      expect(replies(ctx)).toHaveLength(2);
      expect(logger.debug).toHaveBeenCalledWith(
        "Could not delete status message: message to delete not found"
      );
    });

    it("should answer unknown commands with a hint", async () => {
      await setup();

      const ctx = await ask("/deploy now");

      expect(replies(ctx)).toEqual(["Unknown command. Type /help for available commands."]);
      expect(reasoning.requests).toEqual([]);
    });

    it("should ignore messages sent before the bot started", async () => {
      await setup();

      const ctx = await ask("How does login work?", { message: { date: 1 } });

      expect(ctx.reply).not.toHaveBeenCalled();
    });

    it("should reject invalid messages", async () => {
      await setup();

      const ctx = await ask("a");

      expect(replies(ctx)).toEqual(["❌ Message too short (minimum 2 characters)"]);
    });

    it("should rate limit repeated questions", async () => {
      await setup(loginScript);

      await ask("How does login work?");
      await ask("How does login work?");
      const ctx = await ask("How does login work?");

      expect(replies(ctx)).toEqual(["⏳ Too many requests. Try again in 1m."]);
    });

    it("should refuse non-text messages", async () => {
      await setup();
      const ctx = createMockContext({ message: null });

      await getHandler("on:message")(ctx);

      expect(ctx.reply).toHaveBeenCalledWith("❌ Only text messages supported.");
    });
  });

  // ===========================================================================
  // Formatting Tests
  // ===========================================================================

  describe("formatFileList", () => {
    it("should cap the list and count the rest", () => {
      expect(formatFileList("Files:", ["a.ts", "b.ts", "c.ts"], 2)).toBe(
        "Files:\n  a.ts\n  b.ts\n  ... and 1 more files"
      );
    });
  });

  describe("formatOutcome", () => {
    const emptyCache = () => new FileMemoryCache(InMemoryFileSource.of({}));

    it("should say when a search found nothing", () => {
      const text = formatOutcome(
        {
          status: "answered",
          result: {
            action: "SEARCH_CODE",
            answer: "I could not find it.",
            analyzedFiles: [],
            updatedCache: emptyCache(),
            iterations: [],
          },
        },
        90000
      );

      expect(text).toBe(
        "I could not find it.\n\n📁 No relevant files were found\n⏱️ Time: 1m 30s"
      );
    });

    it("should label answers from memory", () => {
      const text = formatOutcome(
        {
          status: "answered",
          result: {
            action: "USE_MEMORY",
            answer: "Same as before.",
            analyzedFiles: ["src/auth.ts", "src/bot.ts"],
            updatedCache: emptyCache(),
            iterations: [],
          },
        },
        2000
      );

      expect(text).toBe("Same as before.\n\n📁 From memory: src/auth.ts, src/bot.ts\n⏱️ Time: 2s");
    });
  });
});
