/**
 * Reasoning engine over LLM completion providers
 *
 * Model output is untrusted text: each response is reduced to its first
 * flat JSON object, validated with zod, and clamped. Anything that does
 * not parse maps to a conservative default instead of failing the query.
 * Transport failures and timeouts become ReasoningUnavailableError.
 */
import { z } from "zod";
import { ReasoningUnavailableError, toError } from "../errors/index.js";
import type {
  ChatTurn,
  CompletionOptions,
  LLMCompletionProvider,
} from "../llm/types.js";
import { withTimeout, DEFAULT_TIMEOUTS } from "../llm/timeout.js";
import type { Config } from "../types.js";
import { logger } from "../utils.js";
import {
  buildAnswerPrompt,
  buildAssessmentPrompt,
  buildClassificationPrompt,
  buildSelectionPrompt,
} from "./prompts.js";
import {
  PHASE_BY_KIND,
  type AnswerRequest,
  type AssessRequest,
  type Classification,
  type ClassifyRequest,
  type ConfidenceAssessment,
  type FileSelection,
  type ReasoningEngine,
  type ReasoningKind,
  type SelectRequest,
} from "./reasoning.js";
import {
  ConfidenceLevelSchema,
  QueryActionSchema,
  type ConfidenceLevel,
  type HistoryEntry,
  type QueryAction,
} from "./types.js";

/** Most paths accepted from one selection */
export const MAX_SELECTION = 3;

export interface LLMReasoningEngineOptions {
  /** Classification, selection and assessment */
  readonly helper: LLMCompletionProvider;
  /** Final answers; defaults to the helper */
  readonly chat?: LLMCompletionProvider | undefined;
  readonly helperTimeoutMs?: number | undefined;
  readonly answerTimeoutMs?: number | undefined;
  readonly maxSelection?: number | undefined;
}

// =============================================================================
// Response parsing
// =============================================================================

const optionalText = z.string().nullish().catch(undefined);

const ClassificationResponseSchema = z.object({
  action: z.string(),
  reason: optionalText,
});

const SelectionResponseSchema = z.object({
  files: z.array(z.unknown()).optional().catch(undefined),
  reasoning: optionalText,
  sufficient: z.boolean().optional().catch(undefined),
});

const ConfidenceResponseSchema = z.object({
  confidence: z.string(),
  reason: optionalText,
  suggestion: optionalText,
});

/**
 * First `{...}` object without nested braces, parsed as JSON
 * @returns undefined when there is none or it is not valid JSON
 */
export function extractJsonObject(text: string): unknown {
  const match = /\{[^{}]*\}/s.exec(text);
  if (!match) return undefined;

  try {
    return JSON.parse(match[0]);
  } catch {
    return undefined;
  }
}

function nonEmpty(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  if (!trimmed || /^(null|none|n\/a)$/i.test(trimmed)) return undefined;
  return trimmed;
}

/** Whole-word keyword scan over free text; SEARCH_CODE when nothing matches */
function scanForAction(text: string): QueryAction {
  const keywords = new Set(text.toUpperCase().match(/\b(SEARCH_CODE|USE_MEMORY|DIRECT)\b/g));
  if (keywords.has("SEARCH_CODE")) return "SEARCH_CODE";
  if (keywords.has("USE_MEMORY")) return "USE_MEMORY";
  if (keywords.has("DIRECT")) return "DIRECT";
  return "SEARCH_CODE";
}

export function parseClassification(text: string): Classification {
  const parsed = ClassificationResponseSchema.safeParse(extractJsonObject(text));
  if (!parsed.success) {
    return { action: scanForAction(text) };
  }

  const action = QueryActionSchema.safeParse(parsed.data.action.trim().toUpperCase());
  if (!action.success) {
    return { action: "SEARCH_CODE" };
  }
  return { action: action.data, reason: nonEmpty(parsed.data.reason) };
}

/**
 * Keep indexed, not yet analyzed, distinct paths, capped at maxSelection
 */
export function sanitizeSelection(
  candidates: readonly unknown[],
  request: SelectRequest,
  maxSelection: number = MAX_SELECTION
): string[] {
  const analyzed = new Set(request.alreadyAnalyzed);
  const selected: string[] = [];

  for (const candidate of candidates) {
    if (selected.length >= maxSelection) break;
    if (typeof candidate !== "string") continue;

    const record = request.fileIndex.lookup(candidate.trim().replace(/^`+|`+$/g, ""));
    if (!record || analyzed.has(record.path) || selected.includes(record.path)) {
      continue;
    }
    selected.push(record.path);
  }
  return selected;
}

/** Indexed paths that appear verbatim in free text, in index order */
function mentionedPaths(text: string, request: SelectRequest): string[] {
  return request.fileIndex
    .records()
    .map((record) => record.path)
    .filter((path) => text.includes(path));
}

export function parseSelection(
  text: string,
  request: SelectRequest,
  maxSelection: number = MAX_SELECTION
): FileSelection {
  const parsed = SelectionResponseSchema.safeParse(extractJsonObject(text));

  if (parsed.success && parsed.data.files !== undefined) {
    const reasoning = nonEmpty(parsed.data.reasoning);
    // "sufficient" only stops the search once something has been analyzed
    if (parsed.data.sufficient === true && request.alreadyAnalyzed.length > 0) {
      return { paths: [], reasoning };
    }
    return {
      paths: sanitizeSelection(parsed.data.files, request, maxSelection),
      reasoning,
    };
  }

  return { paths: sanitizeSelection(mentionedPaths(text, request), request, maxSelection) };
}

const CONSERVATIVE_ORDER: readonly ConfidenceLevel[] = ["LOW", "MEDIUM", "HIGH"];

/** Lowest standalone HIGH / MEDIUM / LOW in free text */
function scanForConfidence(text: string): ConfidenceLevel | undefined {
  const levels = new Set(text.toUpperCase().match(/\b(HIGH|MEDIUM|LOW)\b/g));
  return CONSERVATIVE_ORDER.find((level) => levels.has(level));
}

export function parseConfidence(text: string): ConfidenceAssessment {
  const parsed = ConfidenceResponseSchema.safeParse(extractJsonObject(text));
  if (parsed.success) {
    const level = ConfidenceLevelSchema.safeParse(
      parsed.data.confidence.trim().toUpperCase()
    );
    if (level.success) {
      return {
        level: level.data,
        suggestedTerm:
          level.data === "HIGH" ? undefined : nonEmpty(parsed.data.suggestion),
        reason: nonEmpty(parsed.data.reason),
      };
    }
  }

  return { level: scanForConfidence(text) ?? "LOW" };
}

// =============================================================================
// Engine
// =============================================================================

function toChatTurns(history: readonly HistoryEntry[]): ChatTurn[] {
  return history.map((entry) => ({ user: entry.query, assistant: entry.answer }));
}

export class LLMReasoningEngine implements ReasoningEngine {
  private readonly helper: LLMCompletionProvider;
  private readonly chat: LLMCompletionProvider;
  private readonly helperTimeoutMs: number;
  private readonly answerTimeoutMs: number;
  private readonly maxSelection: number;

  constructor(options: LLMReasoningEngineOptions) {
    this.helper = options.helper;
    this.chat = options.chat ?? options.helper;
    this.helperTimeoutMs = options.helperTimeoutMs ?? DEFAULT_TIMEOUTS.helper;
    this.answerTimeoutMs = options.answerTimeoutMs ?? DEFAULT_TIMEOUTS.answer;
    this.maxSelection = options.maxSelection ?? MAX_SELECTION;
  }

  async classify(request: ClassifyRequest): Promise<Classification> {
    const text = await this.invoke("classify", this.helper, buildClassificationPrompt(request), {
      temperature: 0.1,
      maxTokens: 256,
    });
    const classification = parseClassification(text);
    logger.debug(`Classified query as ${classification.action}`);
    return classification;
  }

  async selectFiles(request: SelectRequest): Promise<FileSelection> {
    const prompt = buildSelectionPrompt(request, this.maxSelection);
    const text = await this.invoke("select", this.helper, prompt, {
      temperature: 0.1,
      maxTokens: 512,
    });
    return parseSelection(text, request, this.maxSelection);
  }

  async assessConfidence(request: AssessRequest): Promise<ConfidenceAssessment> {
    const text = await this.invoke("assess", this.helper, buildAssessmentPrompt(request), {
      temperature: 0.1,
      maxTokens: 256,
    });
    return parseConfidence(text);
  }

  async generateAnswer(request: AnswerRequest): Promise<string> {
    const text = await this.invoke("answer", this.chat, buildAnswerPrompt(request), {
      temperature: 0.3,
      history: toChatTurns(request.history),
    });

    const answer = text.trim();
    if (!answer) {
      throw new ReasoningUnavailableError(
        "Language model returned an empty answer",
        "answer",
        { provider: this.chat.name }
      );
    }
    return answer;
  }

  private async invoke(
    kind: ReasoningKind,
    provider: LLMCompletionProvider,
    prompt: string,
    options: CompletionOptions
  ): Promise<string> {
    const timeoutMs = kind === "answer" ? this.answerTimeoutMs : this.helperTimeoutMs;

    try {
      const result = await withTimeout(provider.complete(prompt, options), {
        timeoutMs,
        context: PHASE_BY_KIND[kind],
        provider: provider.name,
      });
      return result.text;
    } catch (error) {
      const cause = toError(error);
      logger.warn(`Reasoning call "${kind}" failed: ${cause.message}`);
      throw new ReasoningUnavailableError(
        `${PHASE_BY_KIND[kind]} failed: ${cause.message}`,
        kind,
        { provider: provider.name },
        cause
      );
    }
  }
}

/**
 * Engine wired from the bot configuration: every reasoning call uses
 * the configured timeout, selections use the per-iteration file cap
 */
export function createReasoningEngine(
  config: Pick<Config, "llm" | "agent">,
  providers: { readonly helper: LLMCompletionProvider; readonly chat: LLMCompletionProvider }
): LLMReasoningEngine {
  return new LLMReasoningEngine({
    helper: providers.helper,
    chat: providers.chat,
    helperTimeoutMs: config.llm.timeoutMs,
    answerTimeoutMs: config.llm.timeoutMs,
    maxSelection: config.agent.maxFilesPerIteration,
  });
}
