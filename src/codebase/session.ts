/**
 * Per-chat session state
 *
 * A session owns one File Memory Cache and one Conversation History over a
 * shared File Index. Queries and cache/history mutations run one at a time
 * through a promise queue, so the controller is the only writer while a
 * query is in flight.
 */
import { isSearchAbortedError, type SearchAbortedError } from "../errors/index.js";
import { logger } from "../utils.js";
import { AgenticSearchController, type SearchResult } from "./controller.js";
import type { FileIndex } from "./file-index.js";
import { FileMemoryCache } from "./file-cache.js";
import type { FileReader } from "./file-reader.js";
import { ConversationHistory } from "./history.js";
import type { ReasoningEngine } from "./reasoning.js";
import { AgentConfigSchema, type AgentConfig, type HistoryEntry } from "./types.js";

export type QueryOutcome =
  | { readonly status: "answered"; readonly result: SearchResult }
  | {
      readonly status: "failed";
      readonly error: SearchAbortedError;
      /** What stopped the analysis */
      readonly reason: string;
      /** Files analyzed before the failure */
      readonly analyzedFiles: readonly string[];
    };

export interface CodebaseSessionOptions {
  readonly fileIndex: FileIndex;
  readonly reader: FileReader;
  readonly reasoning: ReasoningEngine;
  readonly agent?: AgentConfig | undefined;
}

export class CodebaseSession {
  readonly fileIndex: FileIndex;
  readonly cache: FileMemoryCache;
  readonly history: ConversationHistory;
  private readonly reasoning: ReasoningEngine;
  private readonly controller: AgenticSearchController;
  private readonly maxIterations: number;
  /** Tail of the task queue */
  private queue: Promise<unknown> = Promise.resolve();
  private pending = 0;

  constructor(options: CodebaseSessionOptions) {
    const agent = options.agent ?? AgentConfigSchema.parse({});

    this.fileIndex = options.fileIndex;
    this.reasoning = options.reasoning;
    this.maxIterations = agent.maxIterations;
    this.cache = new FileMemoryCache(options.reader, {
      maxChars: agent.cacheMaxChars,
      headChars: agent.cacheHeadChars,
      tailChars: agent.cacheTailChars,
    });
    this.history = new ConversationHistory(agent.historyLength, agent.historyEntryChars);
    this.controller = new AgenticSearchController({
      maxFilesPerIteration: agent.maxFilesPerIteration,
    });
  }

  /** Queued tasks, including the one running */
  get pendingTasks(): number {
    return this.pending;
  }

  /**
   * Answer a query after every earlier task has finished.
   * The exchange is added to history only when an answer was produced.
   */
  ask(query: string): Promise<QueryOutcome> {
    return this.enqueue(() => this.runQuery(query));
  }

  cachedPaths(): string[] {
    return this.cache.snapshot();
  }

  historyEntries(): readonly HistoryEntry[] {
    return this.history.render();
  }

  /** Clear the File Memory Cache on user request */
  wipeCache(): Promise<number> {
    return this.enqueue(async () => this.cache.wipe());
  }

  clearHistory(): Promise<void> {
    return this.enqueue(async () => {
      this.history.clear();
      logger.info("Conversation history cleared");
    });
  }

  /** Clear both cache and history */
  reset(): Promise<void> {
    return this.enqueue(async () => {
      this.cache.wipe();
      this.history.clear();
    });
  }

  private async runQuery(query: string): Promise<QueryOutcome> {
    try {
      const result = await this.controller.run({
        query,
        fileIndex: this.fileIndex,
        fileCache: this.cache,
        history: this.history,
        maxIterations: this.maxIterations,
        reasoning: this.reasoning,
      });
      this.history.append(query, result.answer);
      return { status: "answered", result };
    } catch (error) {
      if (!isSearchAbortedError(error)) throw error;

      logger.warn(`Query aborted during ${error.phase}: ${error.reason.message}`);
      return {
        status: "failed",
        error,
        reason: error.reason.message,
        analyzedFiles: error.analyzedFiles,
      };
    }
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const run = this.queue.then(task).finally(() => {
      this.pending--;
    });
    // The caller sees the rejection through `run`; the queue only needs ordering
    this.queue = run.catch(() => undefined);
    return run;
  }
}

/** One session per chat over a shared File Index */
export class SessionRegistry {
  private readonly sessions = new Map<number, CodebaseSession>();

  constructor(private readonly createSession: () => CodebaseSession) {}

  get(chatId: number): CodebaseSession {
    let session = this.sessions.get(chatId);
    if (!session) {
      session = this.createSession();
      this.sessions.set(chatId, session);
      logger.debug(`Created session for chat ${chatId}`);
    }
    return session;
  }

  has(chatId: number): boolean {
    return this.sessions.has(chatId);
  }

  /** Drop a chat's session with its cache and history */
  delete(chatId: number): boolean {
    return this.sessions.delete(chatId);
  }

  get size(): number {
    return this.sessions.size;
  }
}
