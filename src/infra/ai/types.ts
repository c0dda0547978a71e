import type { ConversationTurn, IndexHit } from "../../domain/types.js";

export interface RetrievedContext {
  source: string;
  chunkIndex: number;
  snippet: string;
}

export type AnswerMode = "client_llm" | "openai" | "ollama";

export interface Embedder {
  embedTexts(texts: string[], signal?: AbortSignal): Promise<number[][]>;
  embedQuery(query: string, signal?: AbortSignal): Promise<number[]>;
}

export type RelevanceVerdict = "relevant" | "not_relevant";

export interface RelevanceJudge {
  judge(question: string, chunkText: string, signal?: AbortSignal): Promise<RelevanceVerdict>;
}

export interface AnswerGenerator {
  generateAnswer(
    question: string,
    contexts: RetrievedContext[],
    history: readonly ConversationTurn[],
    signal?: AbortSignal,
  ): Promise<string | null>;
}

/** Turns a follow-up question into a standalone retrieval query. */
export interface QueryRewriter {
  rewrite(question: string, history: readonly ConversationTurn[], signal?: AbortSignal): Promise<string>;
}

export interface Reranker {
  readonly name: string;
  rerank(query: string, hits: IndexHit[], topK: number): IndexHit[];
}

/**
 * External model capabilities. A null member means the capability is not
 * configured and callers run in the matching degraded mode.
 */
export interface AiCapabilities {
  answerMode: AnswerMode;
  embedder: Embedder | null;
  judge: RelevanceJudge | null;
  answerGenerator: AnswerGenerator | null;
  queryRewriter: QueryRewriter | null;
}
