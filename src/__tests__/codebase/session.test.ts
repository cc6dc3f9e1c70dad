import { describe, it, expect, beforeEach, vi } from "vitest";
import { CodebaseSession, SessionRegistry } from "../../codebase/session.js";
import { AgentConfigSchema } from "../../codebase/types.js";
import type { ReasoningEngine } from "../../codebase/reasoning.js";
import { createReasoningEngine } from "../../codebase/llm-reasoning.js";
import type { CompletionResult, LLMCompletionProvider } from "../../llm/types.js";
import {
  InMemoryFileSource,
  ScriptedReasoning,
  createIndex,
  unavailable,
} from "./fakes.js";

const FILES = {
  "src/app.ts": "app",
  "src/db.ts": "db",
};

describe("CodebaseSession", () => {
  let source: InMemoryFileSource;

  function createSession(
    reasoning: ReasoningEngine,
    agent = AgentConfigSchema.parse({})
  ): CodebaseSession {
    return new CodebaseSession({
      fileIndex: createIndex(Object.keys(FILES)),
      reader: source,
      reasoning,
      agent,
    });
  }

  beforeEach(() => {
    source = InMemoryFileSource.of(FILES);
  });

  it("should answer and record the exchange in history", async () => {
    const reasoning = new ScriptedReasoning({
      select: [{ paths: ["src/app.ts"] }],
      assess: [{ level: "HIGH" }],
      answer: ["It starts in src/app.ts"],
    });
    const session = createSession(reasoning);

    const outcome = await session.ask("Where does it start?");

    expect(outcome.status).toBe("answered");
    expect(session.historyEntries()).toEqual([
      { index: 0, query: "Where does it start?", answer: "It starts in src/app.ts" },
    ]);
    expect(session.cachedPaths()).toEqual(["src/app.ts"]);
  });

  it("should analyze no more files per iteration than configured", async () => {
    const files = { "src/a.ts": "a", "src/b.ts": "b", "src/c.ts": "c" };
    const replies = [
      '{"action": "SEARCH_CODE"}',
      '{"files": ["src/a.ts", "src/b.ts", "src/c.ts"]}',
      '{"confidence": "HIGH"}',
      "Spread over src/a.ts and src/b.ts",
    ];
    const complete = vi.fn(
      async (): Promise<CompletionResult> => ({
        text: replies.shift() ?? "",
        tokenCount: 1,
        model: "test-model",
        finishReason: "stop",
      })
    );
    const provider: LLMCompletionProvider = {
      name: "ollama",
      complete,
      checkAvailability: async () => ({ available: true }),
    };
    const config = {
      llm: { provider: "ollama" as const, ollamaUrl: "http://localhost:11434", timeoutMs: 1000 },
      agent: AgentConfigSchema.parse({ maxFilesPerIteration: 2 }),
    };
    const session = new CodebaseSession({
      fileIndex: createIndex(Object.keys(files)),
      reader: InMemoryFileSource.of(files),
      reasoning: createReasoningEngine(config, { helper: provider, chat: provider }),
      agent: config.agent,
    });

    const outcome = await session.ask("Where are the helpers?");

    expect(outcome).toMatchObject({
      status: "answered",
      result: { analyzedFiles: ["src/a.ts", "src/b.ts"] },
    });
    expect(complete).toHaveBeenCalledTimes(4);
  });

  it("should report a failed query without touching history", async () => {
    const reasoning = new ScriptedReasoning({
      select: [{ paths: ["src/db.ts"] }],
      assess: [unavailable("assess")],
    });
    const session = createSession(reasoning);

    const outcome = await session.ask("How is the db opened?");

    expect(outcome).toMatchObject({
      status: "failed",
      reason: "confidence assessment failed: connection refused",
      analyzedFiles: ["src/db.ts"],
    });
    expect(session.historyEntries()).toEqual([]);
    expect(session.cachedPaths()).toEqual(["src/db.ts"]);
  });

  it("should stay usable after a failed query", async () => {
    const reasoning = new ScriptedReasoning({
      classify: [unavailable("classify"), { action: "DIRECT" }],
      answer: ["Fine now"],
    });
    const session = createSession(reasoning);

    await session.ask("first");
    const outcome = await session.ask("second");

    expect(outcome.status).toBe("answered");
    expect(session.history.size).toBe(1);
  });

  it("should pass earlier exchanges to later queries", async () => {
    const reasoning = new ScriptedReasoning({
      classify: [{ action: "DIRECT" }],
      answer: ["one", "two"],
    });
    const session = createSession(reasoning);

    await session.ask("first");
    await session.ask("second");

    const second = reasoning.answers()[1];
    expect(second?.history.map((entry) => entry.query)).toEqual(["first"]);
  });

  it("should apply agent settings to cache and history", async () => {
    const reasoning = new ScriptedReasoning({
      classify: [{ action: "DIRECT" }],
      answer: ["a long answer"],
    });
    const agent = AgentConfigSchema.parse({ historyLength: 1, historyEntryChars: 6 });
    const session = createSession(reasoning, agent);

    await session.ask("question one");
    await session.ask("question two");

    expect(session.historyEntries()).toEqual([
      { index: 1, query: "questi", answer: "a long" },
    ]);
  });

  it("should run queued tasks one at a time in order", async () => {
    const reasoning = new ScriptedReasoning({
      select: [{ paths: ["src/app.ts"] }],
      assess: [{ level: "HIGH" }],
    });
    const session = createSession(reasoning);

    const first = session.ask("first");
    const wipe = session.wipeCache();
    expect(session.pendingTasks).toBe(2);

    await first;
    // The wipe runs after the query has cached its file
    expect(await wipe).toBe(1);
    expect(session.cachedPaths()).toEqual([]);
    expect(session.pendingTasks).toBe(0);
  });

  it("should clear history without touching the cache", async () => {
    const reasoning = new ScriptedReasoning({
      select: [{ paths: ["src/app.ts"] }],
      assess: [{ level: "HIGH" }],
    });
    const session = createSession(reasoning);
    await session.ask("q");

    await session.clearHistory();

    expect(session.historyEntries()).toEqual([]);
    expect(session.cachedPaths()).toEqual(["src/app.ts"]);
  });

  it("should clear both on reset", async () => {
    const reasoning = new ScriptedReasoning({
      select: [{ paths: ["src/app.ts"] }],
      assess: [{ level: "HIGH" }],
    });
    const session = createSession(reasoning);
    await session.ask("q");

    await session.reset();

    expect(session.historyEntries()).toEqual([]);
    expect(session.cachedPaths()).toEqual([]);
  });

  it("should rethrow unexpected errors and keep the queue running", async () => {
    const boom = new TypeError("bug");
    const reasoning = new ScriptedReasoning({
      classify: [boom, { action: "DIRECT" }],
    });
    const session = createSession(reasoning);

    await expect(session.ask("first")).rejects.toBe(boom);
    await expect(session.ask("second")).resolves.toMatchObject({ status: "answered" });
  });
});

describe("SessionRegistry", () => {
  it("should create one session per chat on demand", () => {
    let created = 0;
    const registry = new SessionRegistry(() => {
      created++;
      return new CodebaseSession({
        fileIndex: createIndex(["a.ts"]),
        reader: InMemoryFileSource.of({ "a.ts": "a" }),
        reasoning: new ScriptedReasoning(),
      });
    });

    const first = registry.get(1);
    const again = registry.get(1);
    registry.get(2);

    expect(again).toBe(first);
    expect(created).toBe(2);
    expect(registry.size).toBe(2);
    expect(registry.has(2)).toBe(true);
  });

  it("should forget a deleted chat", () => {
    const registry = new SessionRegistry(
      () =>
        new CodebaseSession({
          fileIndex: createIndex(["a.ts"]),
          reader: InMemoryFileSource.of({ "a.ts": "a" }),
          reasoning: new ScriptedReasoning(),
        })
    );
    registry.get(7);

    expect(registry.delete(7)).toBe(true);
    expect(registry.has(7)).toBe(false);
    expect(registry.delete(7)).toBe(false);
  });
});
