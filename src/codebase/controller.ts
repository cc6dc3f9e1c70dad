/**
 * Agentic Search Controller
 *
 * CLASSIFYING → SELECTING → LOADING → ASSESSING → (SELECTING | DONE)
 *
 * One query runs strictly sequentially: every reasoning call, file load and
 * cache write happens in order, and the final answer is generated exactly
 * once. A reasoning failure aborts the query as SearchAbortedError; cache
 * entries already added stay.
 */
import {
  SearchAbortedError,
  isFileReadError,
  isReasoningUnavailableError,
  toError,
} from "../errors/index.js";
import { logger } from "../utils.js";
import type { FileMemoryCache } from "./file-cache.js";
import type { ConversationHistory } from "./history.js";
import {
  PHASE_BY_KIND,
  type FileIndexView,
  type ReasoningEngine,
  type ReasoningKind,
} from "./reasoning.js";
import type {
  CacheEntry,
  HistoryEntry,
  IterationRecord,
  QueryAction,
} from "./types.js";

export const DEFAULT_MAX_ITERATIONS = 3;
export const DEFAULT_MAX_FILES_PER_ITERATION = 3;

export interface SearchRunInput {
  readonly query: string;
  readonly fileIndex: FileIndexView;
  readonly fileCache: FileMemoryCache;
  /** Read only; the caller appends the finished exchange */
  readonly history: ConversationHistory;
  readonly maxIterations?: number | undefined;
  readonly reasoning: ReasoningEngine;
}

export interface SearchResult {
  /** Action actually taken, after any fallback to SEARCH_CODE */
  readonly action: QueryAction;
  readonly answer: string;
  /** Paths the answer relied on, in analysis order; all are cached */
  readonly analyzedFiles: readonly string[];
  /** The session cache, mutated in place */
  readonly updatedCache: FileMemoryCache;
  readonly iterations: readonly IterationRecord[];
}

export interface ControllerOptions {
  readonly maxFilesPerIteration?: number;
}

function cachedEntries(cache: FileMemoryCache, paths: readonly string[]): CacheEntry[] {
  return paths.flatMap((path) => {
    const entry = cache.peek(path);
    return entry ? [entry] : [];
  });
}

/** Mutable state of one run */
class SearchState {
  phase: ReasoningKind = "classify";
  readonly analyzed: string[] = [];
  readonly iterations: IterationRecord[] = [];
  private readonly analyzedSet = new Set<string>();

  markAnalyzed(path: string): void {
    if (!this.analyzedSet.has(path)) {
      this.analyzedSet.add(path);
      this.analyzed.push(path);
    }
  }

  isAnalyzed(path: string): boolean {
    return this.analyzedSet.has(path);
  }
}

export class AgenticSearchController {
  private readonly maxFilesPerIteration: number;

  constructor(options: ControllerOptions = {}) {
    this.maxFilesPerIteration =
      options.maxFilesPerIteration ?? DEFAULT_MAX_FILES_PER_ITERATION;
  }

  /**
   * Answer one query
   * @throws SearchAbortedError when a reasoning call fails
   */
  async run(input: SearchRunInput): Promise<SearchResult> {
    const maxIterations = input.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    if (!Number.isInteger(maxIterations) || maxIterations < 1) {
      throw new RangeError(`maxIterations must be a positive integer, got ${maxIterations}`);
    }

    const state = new SearchState();
    try {
      return await this.execute(input, maxIterations, state);
    } catch (error) {
      if (isReasoningUnavailableError(error)) {
        throw new SearchAbortedError(
          error,
          PHASE_BY_KIND[state.phase],
          [...state.analyzed],
          state.iterations.length
        );
      }
      throw error;
    }
  }

  private async execute(
    input: SearchRunInput,
    maxIterations: number,
    state: SearchState
  ): Promise<SearchResult> {
    const { query, fileCache, reasoning } = input;
    const history = input.history.render();

    state.phase = "classify";
    const classification = await reasoning.classify({
      kind: "classify",
      query,
      cachedPaths: fileCache.snapshot(),
      history,
    });
    logger.info(
      `Query classified as ${classification.action}${classification.reason ? `: ${classification.reason}` : ""}`
    );

    if (classification.action === "DIRECT") {
      state.phase = "answer";
      const answer = await reasoning.generateAnswer({
        kind: "answer",
        query,
        mode: "direct",
        evidence: [],
        history,
      });
      return this.result("DIRECT", answer, state, fileCache);
    }

    let suggestedTerm: string | undefined;

    if (classification.action === "USE_MEMORY") {
      if (fileCache.size === 0) {
        logger.info("No files in memory, switching to codebase search");
      } else {
        const memory = cachedEntries(fileCache, fileCache.snapshot());

        state.phase = "assess";
        const assessment = await reasoning.assessConfidence({
          kind: "assess",
          query,
          files: memory,
          history,
        });

        if (assessment.level !== "LOW") {
          for (const entry of memory) state.markAnalyzed(entry.path);

          state.phase = "answer";
          const answer = await reasoning.generateAnswer({
            kind: "answer",
            query,
            mode: "memory",
            evidence: memory,
            history,
          });
          return this.result("USE_MEMORY", answer, state, fileCache);
        }

        logger.info("Cached files judged insufficient, switching to codebase search");
        suggestedTerm = assessment.suggestedTerm;
      }
    }

    await this.searchLoop(input, maxIterations, state, history, suggestedTerm);

    state.phase = "answer";
    const answer = await reasoning.generateAnswer({
      kind: "answer",
      query,
      mode: "search",
      evidence: cachedEntries(fileCache, state.analyzed),
      history,
    });
    return this.result("SEARCH_CODE", answer, state, fileCache);
  }

  private async searchLoop(
    input: SearchRunInput,
    maxIterations: number,
    state: SearchState,
    history: readonly HistoryEntry[],
    initialTerm: string | undefined
  ): Promise<void> {
    const { query, fileIndex, fileCache, reasoning } = input;
    let suggestedTerm = initialTerm;

    for (let iteration = 1; iteration <= maxIterations; iteration++) {
      if (iteration > 1) {
        logger.info(
          `Refining search (iteration ${iteration})${suggestedTerm ? `: ${suggestedTerm}` : ""}`
        );
      }

      // SELECTING
      state.phase = "select";
      const selection = await reasoning.selectFiles({
        kind: "select",
        query,
        fileIndex,
        alreadyAnalyzed: [...state.analyzed],
        cachedPaths: fileCache.snapshot().filter((path) => !state.isAnalyzed(path)),
        suggestedTerm,
        iteration,
      });
      const requested = this.newPaths(selection.paths, fileIndex, state);

      if (requested.length === 0 && iteration > 1) {
        logger.info("No new files selected, stopping search");
        break;
      }

      // LOADING
      const newlyLoaded: string[] = [];
      const failed: string[] = [];
      for (const path of requested) {
        try {
          await fileCache.get(path);
          state.markAnalyzed(path);
          newlyLoaded.push(path);
        } catch (error) {
          if (!isFileReadError(error)) throw error;
          logger.warn(`Skipping ${path}: ${toError(error).message}`);
          failed.push(path);
        }
      }
      logger.info(
        `Iteration ${iteration}: loaded ${newlyLoaded.length} of ${requested.length} selected files`
      );

      // ASSESSING
      state.phase = "assess";
      const assessment = await reasoning.assessConfidence({
        kind: "assess",
        query,
        files: cachedEntries(fileCache, state.analyzed),
        history,
      });
      state.iterations.push({
        iteration,
        filesRequested: requested,
        filesNewlyLoaded: newlyLoaded,
        filesFailed: failed,
        confidence: assessment.level,
        suggestedTerm: assessment.suggestedTerm,
      });
      logger.info(`Iteration ${iteration}: confidence ${assessment.level}`);

      if (assessment.level === "HIGH") break;
      if (newlyLoaded.length === 0) {
        logger.info("No new files loaded, stopping search");
        break;
      }
      suggestedTerm = assessment.suggestedTerm;
    }
  }

  /**
   * Distinct indexed paths not yet analyzed in this query,
   * capped at maxFilesPerIteration
   */
  private newPaths(
    candidates: readonly string[],
    fileIndex: FileIndexView,
    state: SearchState
  ): string[] {
    const accepted: string[] = [];
    for (const candidate of candidates) {
      const record = fileIndex.lookup(candidate);
      if (!record) {
        logger.debug(`Discarding unknown path from selection: ${candidate}`);
        continue;
      }
      if (state.isAnalyzed(record.path) || accepted.includes(record.path)) continue;

      accepted.push(record.path);
      if (accepted.length >= this.maxFilesPerIteration) break;
    }
    return accepted;
  }

  private result(
    action: QueryAction,
    answer: string,
    state: SearchState,
    fileCache: FileMemoryCache
  ): SearchResult {
    return {
      action,
      answer,
      // Only paths still cached
      analyzedFiles: state.analyzed.filter((path) => fileCache.has(path)),
      updatedCache: fileCache,
      iterations: state.iterations,
    };
  }
}
