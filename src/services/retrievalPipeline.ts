import { ConversationTurn, IndexHit, RelevanceLabel, SelectedChunk } from "../domain/types.js";
import { Embedder, QueryRewriter, Reranker } from "../infra/ai/types.js";
import {
  DocumentIndex,
  HybridWeights,
  compareHits,
  compareRank,
  effectiveWeights,
  fuseHits,
} from "../infra/store/documentIndex.js";
import { QuestionIntent, classifyQuestion, extractYear } from "../utils/text.js";
import { Logger, createLogger, describeError } from "../utils/logger.js";
import { KnowledgeBaseManager, SearchableIndexes } from "./knowledgeBaseManager.js";
import { EvaluationStats, RelevanceEvaluator, assertFallbackRatio } from "./relevanceEvaluator.js";

export type RetrievalScope = { kind: "document"; key: string } | { kind: "all" };

export type RetrievalMode = "fast" | "intelligent";

export type Degradation = "embedding_unavailable" | "judge_unavailable" | "rewrite_unavailable";

export type RetrievalPhase = "COLLECT_CANDIDATES" | "EVALUATE" | "SELECT";

export interface RetrieveRequest {
  question: string;
  scope: RetrievalScope;
  mode?: RetrievalMode;
  topK?: number;
  fallbackRatio?: number;
  history?: readonly ConversationTurn[];
  signal?: AbortSignal;
}

export interface RetrievalReport {
  status: "ok";
  question: string;
  retrievalQuery: string;
  scope: RetrievalScope["kind"];
  mode: RetrievalMode;
  intent: QuestionIntent;
  topK: number;
  candidateCount: number;
  chunks: SelectedChunk[];
  evaluation: EvaluationStats | null;
  fallbackUsed: boolean;
  degraded: Degradation[];
  failures: SearchableIndexes["failures"];
  timings: Partial<Record<RetrievalPhase, number>>;
}

export type RetrievalResult = RetrievalReport | { status: "not_found"; key: string };

export interface RetrievalPipelineOptions {
  manager: KnowledgeBaseManager;
  evaluator: RelevanceEvaluator;
  embedder?: Embedder | null;
  rewriter?: QueryRewriter | null;
  reranker?: Reranker | null;
  weights?: HybridWeights;
  defaultTopK?: number;
  logger?: Logger;
}

const INTENT_TOP_K: Record<Exclude<QuestionIntent, "general">, number> = {
  statistical: 20,
  evolution: 15,
};

export function defaultModeFor(scope: RetrievalScope): RetrievalMode {
  return scope.kind === "document" ? "fast" : "intelligent";
}

/** Standalone query built from the window without a model: prior questions, then this one. */
export function foldQuestions(question: string, history: readonly ConversationTurn[]): string {
  return [...history.map((turn) => turn.question), question]
    .map((text) => text.trim())
    .filter((text) => text.length > 0)
    .join(" ");
}

/**
 * COLLECT_CANDIDATES → EVALUATE → SELECT over one document or every live
 * document. Each phase works on an immutable index snapshot taken at its start.
 */
export class RetrievalPipeline {
  private readonly manager: KnowledgeBaseManager;

  private readonly evaluator: RelevanceEvaluator;

  private readonly embedder: Embedder | null;

  private readonly rewriter: QueryRewriter | null;

  private readonly reranker: Reranker | null;

  private readonly weights: HybridWeights | undefined;

  private readonly defaultTopK: number;

  private readonly logger: Logger;

  private requestCounter = 0;

  constructor(options: RetrievalPipelineOptions) {
    this.manager = options.manager;
    this.evaluator = options.evaluator;
    this.embedder = options.embedder ?? null;
    this.rewriter = options.rewriter ?? null;
    this.reranker = options.reranker ?? null;
    this.weights = options.weights;
    this.defaultTopK = options.defaultTopK ?? 10;
    this.logger = options.logger ?? createLogger("retrieval");
  }

  async retrieve(request: RetrieveRequest): Promise<RetrievalResult> {
    const question = request.question.trim();
    if (!question) {
      throw new RangeError("question must not be empty.");
    }
    if (request.topK !== undefined && (!Number.isInteger(request.topK) || request.topK < 1)) {
      throw new RangeError(`topK must be a positive integer, got ${request.topK}.`);
    }
    if (request.fallbackRatio !== undefined) {
      assertFallbackRatio(request.fallbackRatio);
    }

    const requestId = (this.requestCounter += 1);
    const mode = request.mode ?? defaultModeFor(request.scope);
    const intent = classifyQuestion(question);
    const topK = request.topK ?? (intent === "general" ? this.defaultTopK : INTENT_TOP_K[intent]);
    const history = request.history ?? [];
    const degraded = new Set<Degradation>();
    const timings: RetrievalReport["timings"] = {};
    const log = this.logger.child(`req-${requestId}`);

    // COLLECT_CANDIDATES
    let startedAt = Date.now();
    log.info("phase start", { phase: "COLLECT_CANDIDATES", scope: request.scope.kind, mode, intent, topK });

    let indexes: DocumentIndex[];
    let failures: SearchableIndexes["failures"] = [];
    if (request.scope.kind === "document") {
      const lookup = await this.manager.getIndex(request.scope.key);
      if (lookup.status === "not_found") {
        log.info("document not found", { key: request.scope.key });
        return { status: "not_found", key: request.scope.key };
      }
      indexes = [lookup.index];
    } else {
      const searchable = await this.manager.searchableIndexes();
      indexes = searchable.indexes;
      failures = searchable.failures;
      for (const failure of failures) {
        log.warn("document skipped", failure);
      }
    }

    const retrievalQuery = await this.foldQuery(question, history, degraded, request.signal, log);
    const queries = retrievalQuery === question ? [question] : [retrievalQuery, question];
    const wantEmbedding = indexes.some((index) => index.hasEmbeddings);
    const poolSize = this.reranker ? topK * 2 : topK;

    const perQuery = await Promise.all(
      queries.map(async (query) => {
        const queryEmbedding = wantEmbedding
          ? await this.embedQuery(query, degraded, request.signal, log)
          : null;
        const pooled = indexes.flatMap((index) => index.scoreChunks(query, queryEmbedding));
        return fuseHits(pooled, effectiveWeights(queryEmbedding, this.weights), poolSize);
      }),
    );

    let candidates = mergeByBestScore(perQuery.flat()).slice(0, poolSize);
    if (this.reranker) {
      candidates = this.reranker.rerank(retrievalQuery, candidates, topK);
    }
    candidates = candidates.slice(0, topK);
    timings.COLLECT_CANDIDATES = Date.now() - startedAt;
    log.info("phase end", {
      phase: "COLLECT_CANDIDATES",
      candidates: candidates.length,
      documents: indexes.length,
      ms: timings.COLLECT_CANDIDATES,
    });

    // EVALUATE
    let evaluated: Array<{ hit: IndexHit; relevance: RelevanceLabel }> = candidates.map((hit) => ({
      hit,
      relevance: "unevaluated",
    }));
    let evaluation: EvaluationStats | null = null;
    let fallbackUsed = false;

    if (mode === "intelligent") {
      startedAt = Date.now();
      log.info("phase start", { phase: "EVALUATE", candidates: candidates.length });
      const outcome = await this.evaluator.evaluate(retrievalQuery, candidates, {
        topK,
        fallbackRatio: request.fallbackRatio,
        signal: request.signal,
      });
      evaluated = outcome.selected;
      evaluation = outcome.stats;
      fallbackUsed = outcome.fallbackUsed;
      if (outcome.degraded) {
        degraded.add(outcome.degraded);
      }
      timings.EVALUATE = Date.now() - startedAt;
      log.info("phase end", {
        phase: "EVALUATE",
        kept: evaluated.length,
        fallback: fallbackUsed,
        ms: timings.EVALUATE,
      });
    }

    // SELECT
    startedAt = Date.now();
    let chunks = evaluated.map(({ hit, relevance }) => toSelectedChunk(hit, relevance));
    if (intent === "evolution") {
      chunks = orderChronologically(chunks);
    }
    timings.SELECT = Date.now() - startedAt;
    log.info("phase end", { phase: "SELECT", selected: chunks.length, ms: timings.SELECT });

    return {
      status: "ok",
      question,
      retrievalQuery,
      scope: request.scope.kind,
      mode,
      intent,
      topK,
      candidateCount: candidates.length,
      chunks,
      evaluation,
      fallbackUsed,
      degraded: [...degraded],
      failures,
      timings,
    };
  }

  private async foldQuery(
    question: string,
    history: readonly ConversationTurn[],
    degraded: Set<Degradation>,
    signal: AbortSignal | undefined,
    log: Logger,
  ): Promise<string> {
    if (history.length === 0) {
      return question;
    }
    if (!this.rewriter) {
      return foldQuestions(question, history);
    }

    try {
      const rewritten = (await this.rewriter.rewrite(question, history, signal)).trim();
      return rewritten || foldQuestions(question, history);
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      degraded.add("rewrite_unavailable");
      log.warn("query rewrite failed; folding prior questions", { error: describeError(error) });
      return foldQuestions(question, history);
    }
  }

  private async embedQuery(
    query: string,
    degraded: Set<Degradation>,
    signal: AbortSignal | undefined,
    log: Logger,
  ): Promise<number[] | null> {
    if (!this.embedder) {
      degraded.add("embedding_unavailable");
      return null;
    }
    try {
      return await this.embedder.embedQuery(query, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      degraded.add("embedding_unavailable");
      log.warn("query embedding failed; lexical only", { error: describeError(error) });
      return null;
    }
  }
}

/** One hit per chunk, keeping the better-ranked one, in global order. */
function mergeByBestScore(hits: readonly IndexHit[]): IndexHit[] {
  const best = new Map<string, IndexHit>();
  for (const hit of hits) {
    const current = best.get(hit.chunk.id);
    if (!current || compareHits(hit, current) < 0) {
      best.set(hit.chunk.id, hit);
    }
  }
  return [...best.values()].sort(compareHits);
}

function toSelectedChunk(hit: IndexHit, relevance: RelevanceLabel): SelectedChunk {
  return {
    chunkId: hit.chunk.id,
    documentKey: hit.document.key,
    filename: hit.document.filename,
    chunkIndex: hit.chunk.index,
    start: hit.chunk.start,
    end: hit.chunk.end,
    section: hit.chunk.section,
    text: hit.chunk.text,
    score: hit.score,
    relevance,
  };
}

/** By year in the filename, unknown years last; ties keep their score order. */
function orderChronologically(chunks: SelectedChunk[]): SelectedChunk[] {
  return [...chunks].sort((a, b) => compareRank(extractYear(a.filename), extractYear(b.filename)));
}
