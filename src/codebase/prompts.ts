/**
 * Prompt builders for the four reasoning calls
 */
import type { CacheEntry, HistoryEntry } from "./types.js";
import type {
  AnswerRequest,
  AssessRequest,
  ClassifyRequest,
  SelectRequest,
} from "./reasoning.js";

/** Characters of each preview shown to selection for cached candidates */
const CANDIDATE_PREVIEW_CHARS = 200;

function bulletList(paths: readonly string[]): string {
  return paths.map((path) => `- ${path}`).join("\n");
}

export function renderHistory(history: readonly HistoryEntry[]): string {
  if (history.length === 0) return "";
  const turns = history
    .map((entry) => `User: ${entry.query}\nAssistant: ${entry.answer}`)
    .join("\n\n");
  return `\n\nRecent conversation:\n${turns}`;
}

/** Concatenate file contents into one fenced evidence bundle */
export function renderEvidence(files: readonly CacheEntry[]): string {
  return files
    .map((file) => `File: ${file.path}\n\`\`\`\n${file.content}\n\`\`\``)
    .join("\n\n");
}

export function buildClassificationPrompt(request: ClassifyRequest): string {
  const memory =
    request.cachedPaths.length > 0
      ? `\n\nFiles currently loaded in memory:\n${bulletList(request.cachedPaths)}`
      : "\n\nNo files are currently loaded in memory.";

  return `You route questions for an assistant that answers questions about one source-code repository.

User Query: ${request.query}${memory}${renderHistory(request.history)}

Choose exactly one action:
- "SEARCH_CODE" when the answer depends on this repository: how something is implemented, where it lives, how the code is structured, or why it behaves as it does. The assistant sees no code unless it searches.
- "USE_MEMORY" when the query follows up on the files already loaded in memory and those files should be enough.
- "DIRECT" for general programming questions, concepts, greetings and anything that does not need this repository.

Respond in JSON format:
{"action": "SEARCH_CODE|USE_MEMORY|DIRECT", "reason": "brief explanation"}`;
}

export function buildSelectionPrompt(request: SelectRequest, maxFiles = 3): string {
  const analyzed =
    request.alreadyAnalyzed.length > 0
      ? `\n\nFiles already analyzed for this question:\n${bulletList(request.alreadyAnalyzed)}`
      : "";

  const cached =
    request.cachedPaths.length > 0
      ? `\n\nFiles in cache (available instantly):\n${request.cachedPaths
          .map((path) => {
            const preview = request.fileIndex
              .lookup(path)
              ?.preview.slice(0, CANDIDATE_PREVIEW_CHARS)
              .replace(/\s+/g, " ")
              .trim();
            return preview ? `- ${path}: ${preview}` : `- ${path}`;
          })
          .join("\n")}`
      : "";

  const focus = request.suggestedTerm
    ? `\n\nThe previous round suggested looking for: ${request.suggestedTerm}`
    : "";

  return `You help a code analysis assistant decide which files to read.

Available files:
${request.fileIndex.overview()}${analyzed}${cached}

User Question: ${request.query}${focus}

Task: select up to ${maxFiles} NEW files that would help answer the question.
- Do not repeat files that were already analyzed
- Prefer cached files when they are relevant
- Use file names, extensions and usual project layout as hints
- Return an empty list when the analyzed files already answer the question

Respond in JSON format:
{"files": ["path1", "path2"], "reasoning": "why these files", "sufficient": true/false}

Set "sufficient" to true when the already analyzed files are enough.`;
}

export function buildAssessmentPrompt(request: AssessRequest): string {
  const evidence =
    request.files.length > 0
      ? renderEvidence(request.files)
      : "(no files could be loaded)";

  return `You judge whether the files gathered so far are enough to answer a question about a codebase.

Question: ${request.query}${renderHistory(request.history)}

Files gathered:
${evidence}

Rate your confidence that these files answer the question:
- HIGH: the files directly contain the answer
- MEDIUM: the files partly answer it; more code would help
- LOW: the important code is missing

When confidence is not HIGH, suggest one short search term (a file, symbol or concept) for finding the missing code.

Respond in JSON format:
{"confidence": "HIGH|MEDIUM|LOW", "reason": "brief explanation", "suggestion": "next search term or null"}`;
}

export function buildAnswerPrompt(request: AnswerRequest): string {
  switch (request.mode) {
    case "search":
      return `You are a code analysis assistant. Answer the question from the code files below.

Code Context:
${request.evidence.length > 0 ? renderEvidence(request.evidence) : "(no relevant files were found)"}

Instructions:
- Base the answer on the code and reference files and functions by name
- Say what is missing when the files do not cover the whole question
- Use the conversation so far for follow-up questions
- Answer "I don't know." rather than guessing about code you have not seen

User Question: ${request.query}

Answer:`;
    case "memory":
      return `You are a code analysis assistant. Answer from the files loaded earlier in this conversation.

Code Context:
${renderEvidence(request.evidence)}

Instructions:
- Reference specific files and functions where relevant
- Say so when the loaded files do not contain the answer
- Use the conversation so far for follow-up questions

User Question: ${request.query}

Answer:`;
    case "direct":
      return `You are a programming assistant attached to a source-code repository. Answer the question from general programming knowledge. If the user seems unsure what to ask, suggest asking about the codebase.

User Question: ${request.query}

Instructions:
- Be clear and accurate
- Include short code examples when they help
- Use the conversation so far for context

Answer:`;
    default: {
      const exhaustiveCheck: never = request.mode;
      throw new Error(`Unknown answer mode: ${String(exhaustiveCheck)}`);
    }
  }
}
