import { JudgeServiceError } from "../domain/errors.js";
import { RelevanceVerdict } from "../infra/ai/types.js";

const JUDGE_SNIPPET_CHARS = 500;

const NEGATIVE_ANSWERS = /^(?:(?:n|no|not relevant|irrelevant)(?![\p{L}\p{N}])|不相关|无关)/u;
const POSITIVE_ANSWERS = /^(?:(?:y|yes|relevant)(?![\p{L}\p{N}])|相关)/u;

export function buildRelevancePrompt(question: string, chunkText: string): string {
  return [
    "Decide whether the text fragment is relevant to the question.",
    "",
    `Question: ${question}`,
    "",
    "Fragment:",
    chunkText.slice(0, JUDGE_SNIPPET_CHARS),
    "",
    "Answer Y if the fragment answers the question fully or in part, or gives context needed to answer it.",
    "Answer N if the fragment has nothing to do with the question.",
    "Reply with the single letter Y or N and nothing else.",
  ].join("\n");
}

/**
 * Strict verdict from raw judge output. Negative forms are checked first so
 * "not relevant" never reads as relevant. Anything else is a judge failure.
 */
export function parseRelevanceVerdict(output: string): RelevanceVerdict {
  const normalized = output
    .normalize("NFKC")
    .trim()
    .toLowerCase()
    .replace(/^["'`*\s]+/, "")
    .replace(/[\s"'`*.!。！]+$/u, "");

  if (!normalized) {
    throw new JudgeServiceError("Relevance judge returned an empty answer.");
  }
  if (NEGATIVE_ANSWERS.test(normalized)) {
    return "not_relevant";
  }
  if (POSITIVE_ANSWERS.test(normalized)) {
    return "relevant";
  }
  throw new JudgeServiceError(`Unparseable relevance verdict: ${output.slice(0, 80)}`);
}
