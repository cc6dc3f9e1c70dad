import { z } from "zod";

// ============================================================================
// Enumerations
// ============================================================================

/** How a query is handled: agentic search, cached files only, or no files */
export const QueryActionSchema = z.enum(["SEARCH_CODE", "USE_MEMORY", "DIRECT"]);
export type QueryAction = z.infer<typeof QueryActionSchema>;

/** Whether the gathered evidence is judged enough to answer */
export const ConfidenceLevelSchema = z.enum(["HIGH", "MEDIUM", "LOW"]);
export type ConfidenceLevel = z.infer<typeof ConfidenceLevelSchema>;

// ============================================================================
// Records
// ============================================================================

/** One indexed file; immutable for the session */
export interface FileRecord {
  /** Path relative to the codebase root, "/"-separated */
  readonly path: string;
  readonly lineCount: number;
  /** Extension including the dot, "" when the file has none */
  readonly extension: string;
  /** First characters of the file, capped at previewChars */
  readonly preview: string;
  readonly sizeBytes: number;
}

/** File content held by the File Memory Cache */
export interface CacheEntry {
  readonly path: string;
  readonly content: string;
  readonly truncated: boolean;
  /** Length of the content before truncation */
  readonly originalLength: number;
}

/** One completed query/answer exchange */
export interface HistoryEntry {
  /** Append order, starting at 0 for the first entry of the session */
  readonly index: number;
  readonly query: string;
  readonly answer: string;
}

/** Trace of one select → load → assess round; scoped to one query */
export interface IterationRecord {
  readonly iteration: number;
  readonly filesRequested: readonly string[];
  readonly filesNewlyLoaded: readonly string[];
  readonly filesFailed: readonly string[];
  readonly confidence: ConfidenceLevel;
  readonly suggestedTerm?: string | undefined;
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Agent tunables
 *
 * Constraints:
 * - cacheHeadChars + cacheTailChars must not exceed cacheMaxChars
 */
export const AgentConfigSchema = z
  .object({
    /** Select → load → assess rounds per query */
    maxIterations: z.number().int().min(1).max(10).default(3),
    /** New paths accepted from one selection */
    maxFilesPerIteration: z.number().int().min(1).max(3).default(3),
    /** Conversation exchanges kept */
    historyLength: z.number().int().min(0).default(4),
    /** Cap on each stored query and answer */
    historyEntryChars: z.number().int().positive().default(500),
    /** Content longer than this is truncated in the cache */
    cacheMaxChars: z.number().int().positive().default(8000),
    cacheHeadChars: z.number().int().nonnegative().default(6000),
    cacheTailChars: z.number().int().nonnegative().default(2000),
    /** Characters of each file kept as its index preview */
    previewChars: z.number().int().nonnegative().default(500),
    /** Files above this size are left out of the index */
    maxFileBytes: z.number().int().positive().default(1_048_576),
    /** Directory recursion limit while indexing */
    maxDepth: z.number().int().positive().default(20),
  })
  .refine((data) => data.cacheHeadChars + data.cacheTailChars <= data.cacheMaxChars, {
    message: "cacheHeadChars + cacheTailChars must not exceed cacheMaxChars",
  });
export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type AgentConfigInput = z.input<typeof AgentConfigSchema>;

/** Truncation policy applied by the File Memory Cache */
export interface TruncationPolicy {
  readonly maxChars: number;
  readonly headChars: number;
  readonly tailChars: number;
}

export const DEFAULT_TRUNCATION: TruncationPolicy = {
  maxChars: 8000,
  headChars: 6000,
  tailChars: 2000,
};
