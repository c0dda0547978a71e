import { IndexHit } from "../domain/types.js";
import { RelevanceJudge, RelevanceVerdict } from "../infra/ai/types.js";
import { compareHits } from "../infra/store/documentIndex.js";
import { mapWithConcurrency, withTimeout } from "../utils/concurrency.js";
import { Logger, createLogger, describeError } from "../utils/logger.js";
import { RelevanceCache } from "./relevanceCache.js";

export const MIN_FALLBACK_RATIO = 0.2;
export const MAX_FALLBACK_RATIO = 0.8;

export interface RelevanceEvaluatorOptions {
  judge: RelevanceJudge | null;
  cache: RelevanceCache;
  concurrency?: number;
  timeoutMs?: number;
  defaultFallbackRatio?: number;
  logger?: Logger;
}

export interface EvaluateOptions {
  topK: number;
  fallbackRatio?: number;
  signal?: AbortSignal;
}

export interface EvaluationStats {
  total: number;
  relevant: number;
  irrelevant: number;
  unconfirmed: number;
  cached: number;
  judged: number;
}

export interface EvaluatedHit {
  hit: IndexHit;
  relevance: "confirmed" | "fallback";
}

export interface EvaluationOutcome {
  selected: EvaluatedHit[];
  stats: EvaluationStats;
  fallbackUsed: boolean;
  degraded: "judge_unavailable" | null;
}

export function assertFallbackRatio(ratio: number): void {
  if (!Number.isFinite(ratio) || ratio < MIN_FALLBACK_RATIO || ratio > MAX_FALLBACK_RATIO) {
    throw new RangeError(
      `fallbackRatio must be between ${MIN_FALLBACK_RATIO} and ${MAX_FALLBACK_RATIO}, got ${ratio}.`,
    );
  }
}

/** How many candidates survive when the judge confirms nothing. */
export function fallbackCount(topK: number, ratio: number): number {
  return Math.ceil(Math.max(0, topK) * ratio);
}

/**
 * Second retrieval stage: asks the judge about each candidate, keeps the
 * confirmed ones, and falls back to the best-scored slice when none are.
 */
export class RelevanceEvaluator {
  private readonly judge: RelevanceJudge | null;

  private readonly cache: RelevanceCache;

  private readonly concurrency: number;

  private readonly timeoutMs: number;

  private readonly defaultFallbackRatio: number;

  private readonly logger: Logger;

  private readonly inflight = new Map<string, SharedJudgement>();

  constructor(options: RelevanceEvaluatorOptions) {
    this.judge = options.judge;
    this.cache = options.cache;
    this.concurrency = Math.max(1, options.concurrency ?? 8);
    this.timeoutMs = Math.max(1, options.timeoutMs ?? 15_000);
    this.defaultFallbackRatio = options.defaultFallbackRatio ?? 0.5;
    this.logger = options.logger ?? createLogger("relevance");
    assertFallbackRatio(this.defaultFallbackRatio);
  }

  get isJudgeConfigured(): boolean {
    return this.judge !== null;
  }

  async evaluate(question: string, candidates: IndexHit[], options: EvaluateOptions): Promise<EvaluationOutcome> {
    const ratio = options.fallbackRatio ?? this.defaultFallbackRatio;
    assertFallbackRatio(ratio);

    const stats: EvaluationStats = {
      total: candidates.length,
      relevant: 0,
      irrelevant: 0,
      unconfirmed: 0,
      cached: 0,
      judged: 0,
    };

    const verdicts: Array<RelevanceVerdict | null> = new Array(candidates.length).fill(null);
    const misses: number[] = [];
    const judge = this.judge;

    if (judge) {
      candidates.forEach((hit, i) => {
        const cached = this.cache.get(question, hit.chunk.id);
        if (cached === undefined) {
          misses.push(i);
          return;
        }
        stats.cached += 1;
        verdicts[i] = cached ? "relevant" : "not_relevant";
      });

      const judged = await mapWithConcurrency(misses, this.concurrency, (i) =>
        this.judgeOnce(judge, question, candidates[i], options.signal, stats),
      );
      misses.forEach((candidateIndex, j) => {
        verdicts[candidateIndex] = judged[j];
      });
    }

    const selected: EvaluatedHit[] = [];
    candidates.forEach((hit, i) => {
      const verdict = verdicts[i];
      if (verdict === "relevant") {
        stats.relevant += 1;
        selected.push({ hit, relevance: "confirmed" });
      } else if (verdict === "not_relevant") {
        stats.irrelevant += 1;
      } else {
        stats.unconfirmed += 1;
      }
    });

    const degraded = judge ? null : "judge_unavailable";
    if (selected.length > 0) {
      this.logger.info("relevance evaluated", { ...stats, fallback: false });
      return { selected, stats, fallbackUsed: false, degraded };
    }

    const fallback = [...candidates]
      .sort(compareHits)
      .slice(0, fallbackCount(options.topK, ratio))
      .map((hit): EvaluatedHit => ({ hit, relevance: "fallback" }));

    this.logger.info("relevance evaluated", { ...stats, fallback: true, kept: fallback.length });
    return { selected: fallback, stats, fallbackUsed: true, degraded };
  }

  private judgeOnce(
    judge: RelevanceJudge,
    question: string,
    hit: IndexHit,
    signal: AbortSignal | undefined,
    stats: EvaluationStats,
  ): Promise<RelevanceVerdict | null> {
    const key = RelevanceCache.keyFor(question, hit.chunk.id);
    const shared = this.inflight.get(key);
    if (shared && !shared.controller.signal.aborted) {
      return joinJudgement(shared, signal);
    }

    stats.judged += 1;
    const controller = new AbortController();
    const judgement: SharedJudgement = {
      controller,
      cancellable: 0,
      pinned: false,
      detach: [],
      task: Promise.resolve(null),
    };
    judgement.task = withTimeout(
      (timeoutSignal) => judge.judge(question, hit.chunk.text, timeoutSignal),
      this.timeoutMs,
      controller.signal,
    )
      .then((verdict) => {
        this.cache.set(question, hit.chunk.id, verdict === "relevant");
        return verdict;
      })
      .catch((error: unknown) => {
        // Unconfirmed. Failures are never cached.
        this.logger.warn("relevance judge failed", { chunkId: hit.chunk.id, error: describeError(error) });
        return null;
      })
      .finally(() => {
        if (this.inflight.get(key) === judgement) {
          this.inflight.delete(key);
        }
        for (const detach of judgement.detach) {
          detach();
        }
      });

    this.inflight.set(key, judgement);
    return joinJudgement(judgement, signal);
  }
}

/** One judge call shared by every evaluation that asks about the same chunk. */
interface SharedJudgement {
  task: Promise<RelevanceVerdict | null>;
  controller: AbortController;
  /** Waiters whose signal has not aborted yet. */
  cancellable: number;
  /** Set once a waiter joins without a signal; the call then always runs to completion. */
  pinned: boolean;
  detach: Array<() => void>;
}

/** The shared call is cancelled only after every waiter has cancelled. */
function joinJudgement(
  judgement: SharedJudgement,
  signal: AbortSignal | undefined,
): Promise<RelevanceVerdict | null> {
  if (!signal) {
    judgement.pinned = true;
    return judgement.task;
  }
  if (signal.aborted) {
    if (judgement.cancellable === 0 && !judgement.pinned) {
      judgement.controller.abort(signal.reason);
    }
    return judgement.task;
  }

  judgement.cancellable += 1;
  const onAbort = () => {
    judgement.cancellable -= 1;
    if (judgement.cancellable === 0 && !judgement.pinned) {
      judgement.controller.abort(signal.reason);
    }
  };
  signal.addEventListener("abort", onAbort, { once: true });
  judgement.detach.push(() => signal.removeEventListener("abort", onAbort));
  return judgement.task;
}
