/**
 * Agentic codebase retrieval
 * @module src/codebase
 */

export * from "./types.js";
export {
  NodeFileSource,
  IGNORED_DIRECTORIES,
  BINARY_EXTENSIONS,
  isBinaryPath,
} from "./file-reader.js";
export type {
  FileReader,
  FileSource,
  SourceFile,
  ListFilesOptions,
} from "./file-reader.js";
export {
  isPathWithinBase,
  toIndexPath,
  resolveWithinRoot,
  validateProjectRoot,
} from "./path-validator.js";
export { FileIndex, searchFiles, OVERVIEW_LIMIT } from "./file-index.js";
export type { FileIndexOptions, TreeView, DirectoryGroup } from "./file-index.js";
export { FileMemoryCache, truncateContent, truncationMarker } from "./file-cache.js";
export type { CacheStats } from "./file-cache.js";
export { ConversationHistory } from "./history.js";
export { PHASE_BY_KIND } from "./reasoning.js";
export type {
  AnswerMode,
  AnswerRequest,
  AssessRequest,
  Classification,
  ClassifyRequest,
  ConfidenceAssessment,
  FileIndexView,
  FileSelection,
  ReasoningEngine,
  ReasoningKind,
  ReasoningRequest,
  ReasoningResponse,
  ReasoningResponses,
  SelectRequest,
} from "./reasoning.js";
export {
  LLMReasoningEngine,
  MAX_SELECTION,
  createReasoningEngine,
  extractJsonObject,
  parseClassification,
  parseConfidence,
  parseSelection,
  sanitizeSelection,
} from "./llm-reasoning.js";
export type { LLMReasoningEngineOptions } from "./llm-reasoning.js";
export {
  AgenticSearchController,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_MAX_FILES_PER_ITERATION,
} from "./controller.js";
export type { SearchResult, SearchRunInput, ControllerOptions } from "./controller.js";
export { CodebaseSession, SessionRegistry } from "./session.js";
export type { QueryOutcome, CodebaseSessionOptions } from "./session.js";
