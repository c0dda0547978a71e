import { RelevanceLabel, SelectedChunk } from "../domain/types.js";
import { RetrievedContext } from "../infra/ai/types.js";
import { QuestionIntent, extractYear, truncate } from "../utils/text.js";

export interface Citation {
  source: string;
  document_key: string;
  chunk_id: string;
  chunk_index: number;
  section: string | null;
  score: number;
  relevance: RelevanceLabel;
  snippet: string;
}

export const NO_CONTEXT_ANSWER =
  "No relevant context was found in the indexed documents. Try a more specific question.";

export function buildCitations(chunks: readonly SelectedChunk[]): Citation[] {
  return chunks.map((chunk) => ({
    source: chunk.filename,
    document_key: chunk.documentKey,
    chunk_id: chunk.chunkId,
    chunk_index: chunk.chunkIndex,
    section: chunk.section,
    score: Number(chunk.score.toFixed(4)),
    relevance: chunk.relevance,
    snippet: chunk.text.slice(0, 280),
  }));
}

export function toRetrievedContexts(chunks: readonly SelectedChunk[]): RetrievedContext[] {
  return chunks.map((chunk) => ({
    source: chunk.filename,
    chunkIndex: chunk.chunkIndex,
    snippet: chunk.section ? `[${chunk.section}]\n${chunk.text}` : chunk.text,
  }));
}

/**
 * Answer assembled from the selected chunks alone. Used when no answer model
 * is configured or when generation fails.
 */
export function buildAnswerWithCitations(
  question: string,
  chunks: readonly SelectedChunk[],
  intent: QuestionIntent = "general",
): { answer: string; citations: Citation[] } {
  if (chunks.length === 0) {
    return { answer: NO_CONTEXT_ANSWER, citations: [] };
  }

  const broad = intent !== "general";
  const lines = [`Question: ${question}`, "Context-grounded summary:"];
  const lineLimit = broad ? Math.min(chunks.length, 6) : Math.min(chunks.length, 3);
  for (let i = 0; i < lineLimit; i += 1) {
    const chunk = chunks[i];
    const year = intent === "evolution" ? extractYear(chunk.filename) : null;
    const prefix = year === null ? "" : `[${year}] `;
    lines.push(
      `${i + 1}. ${prefix}${truncate(chunk.text, 180)} (source: ${chunk.filename}#${chunk.chunkIndex})`,
    );
  }

  if (broad) {
    const structured = extractStructuredItems(chunks, 8);
    if (structured.length > 0) {
      lines.push("Key structured items:");
      for (const item of structured) {
        lines.push(`- ${item}`);
      }
    }
  }

  return { answer: lines.join("\n"), citations: buildCitations(chunks) };
}

function extractStructuredItems(chunks: readonly SelectedChunk[], limit: number): string[] {
  const items = new Set<string>();

  for (const chunk of chunks) {
    for (const rawLine of chunk.text.split("\n")) {
      const line = rawLine.trim();
      if (line.length < 3) {
        continue;
      }
      if (
        /^[-*]\s+/.test(line) ||
        /^\d+\.\s+/.test(line) ||
        /^<[^>]{2,80}>$/.test(line) ||
        /\([A-Z_]+\)/.test(line)
      ) {
        items.add(line);
      }
      if (items.size >= limit) {
        return [...items];
      }
    }
  }

  return [...items];
}
