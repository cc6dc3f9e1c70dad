/**
 * Reasoning Engine Adapter contract
 *
 * The four calls the search controller makes are a closed set of
 * request/response pairs keyed by `kind`. Every call may fail with
 * ReasoningUnavailableError; responses are already validated and clamped
 * by the adapter.
 */
import type {
  CacheEntry,
  ConfidenceLevel,
  FileRecord,
  HistoryEntry,
  QueryAction,
} from "./types.js";

/** Read-only view of the File Index offered to selection */
export interface FileIndexView {
  readonly size: number;
  records(): readonly FileRecord[];
  lookup(path: string): FileRecord | undefined;
  overview(limit?: number): string;
}

/** How the final answer is grounded */
export type AnswerMode = "search" | "memory" | "direct";

export interface ClassifyRequest {
  readonly kind: "classify";
  readonly query: string;
  /** Paths currently in the File Memory Cache */
  readonly cachedPaths: readonly string[];
  readonly history: readonly HistoryEntry[];
}

export interface SelectRequest {
  readonly kind: "select";
  readonly query: string;
  readonly fileIndex: FileIndexView;
  /** Paths already analyzed for this query */
  readonly alreadyAnalyzed: readonly string[];
  /** Cached paths not yet analyzed for this query */
  readonly cachedPaths: readonly string[];
  readonly suggestedTerm?: string | undefined;
  readonly iteration: number;
}

export interface AssessRequest {
  readonly kind: "assess";
  readonly query: string;
  readonly files: readonly CacheEntry[];
  readonly history: readonly HistoryEntry[];
}

export interface AnswerRequest {
  readonly kind: "answer";
  readonly query: string;
  readonly mode: AnswerMode;
  /** Every analyzed file, in analysis order; empty for "direct" */
  readonly evidence: readonly CacheEntry[];
  readonly history: readonly HistoryEntry[];
}

export type ReasoningRequest =
  | ClassifyRequest
  | SelectRequest
  | AssessRequest
  | AnswerRequest;

export type ReasoningKind = ReasoningRequest["kind"];

export interface Classification {
  readonly action: QueryAction;
  readonly reason?: string | undefined;
}

export interface FileSelection {
  /** At most three indexed paths, none of them already analyzed */
  readonly paths: readonly string[];
  readonly reasoning?: string | undefined;
}

export interface ConfidenceAssessment {
  readonly level: ConfidenceLevel;
  /** Only set for MEDIUM and LOW */
  readonly suggestedTerm?: string | undefined;
  readonly reason?: string | undefined;
}

/** Response type of each request kind */
export interface ReasoningResponses {
  readonly classify: Classification;
  readonly select: FileSelection;
  readonly assess: ConfidenceAssessment;
  readonly answer: string;
}

export type ReasoningResponse<K extends ReasoningKind> = ReasoningResponses[K];

export interface ReasoningEngine {
  classify(request: ClassifyRequest): Promise<ReasoningResponse<"classify">>;
  selectFiles(request: SelectRequest): Promise<ReasoningResponse<"select">>;
  assessConfidence(request: AssessRequest): Promise<ReasoningResponse<"assess">>;
  generateAnswer(request: AnswerRequest): Promise<ReasoningResponse<"answer">>;
}

/** Controller phase a reasoning call belongs to */
export const PHASE_BY_KIND: Readonly<Record<ReasoningKind, string>> = {
  classify: "classification",
  select: "file selection",
  assess: "confidence assessment",
  answer: "answer generation",
};
