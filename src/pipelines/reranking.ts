import { IndexHit } from "../domain/types.js";
import { Reranker } from "../infra/ai/types.js";
import { scoreByTokenOverlap } from "../utils/text.js";

export type RerankerName = "none" | "overlap";

export function createReranker(name: RerankerName): Reranker | null {
  return name === "overlap" ? overlapReranker : null;
}

/**
 * Blends the normalized fused score with token overlap, then picks greedily
 * with a penalty for piling up chunks from the same document.
 */
export const overlapReranker: Reranker = {
  name: "overlap",
  rerank(query: string, hits: IndexHit[], topK: number): IndexHit[] {
    if (hits.length === 0 || topK <= 0) {
      return [];
    }

    const hasSemantic = hits.some((hit) => hit.signals.semanticRank !== null);
    const minRaw = Math.min(...hits.map((hit) => hit.score));
    const maxRaw = Math.max(...hits.map((hit) => hit.score));
    const spread = Math.max(1e-9, maxRaw - minRaw);

    const enriched = hits.map((hit) => {
      const lexical = scoreByTokenOverlap(query, hit.chunk.text);
      const normalizedRaw = (hit.score - minRaw) / spread;
      const combined = hasSemantic
        ? normalizedRaw * 0.65 + lexical * 0.35
        : normalizedRaw * 0.85 + lexical * 0.15;
      return { hit, combined };
    });

    const selected: typeof enriched = [];
    const selectedIds = new Set<string>();

    while (selected.length < topK) {
      let bestIndex = -1;
      let bestScore = Number.NEGATIVE_INFINITY;

      for (let i = 0; i < enriched.length; i += 1) {
        const candidate = enriched[i];
        if (selectedIds.has(candidate.hit.chunk.id)) {
          continue;
        }
        const finalScore = candidate.combined - computeDiversityPenalty(selected, candidate.hit);
        if (finalScore > bestScore) {
          bestScore = finalScore;
          bestIndex = i;
        }
      }

      if (bestIndex < 0) {
        break;
      }

      const picked = enriched[bestIndex];
      selected.push(picked);
      selectedIds.add(picked.hit.chunk.id);
    }

    return selected.map((item) => item.hit);
  },
};

function computeDiversityPenalty(selected: Array<{ hit: IndexHit }>, candidate: IndexHit): number {
  const sameDocument = selected.filter((item) => item.hit.document.key === candidate.document.key);
  if (sameDocument.length === 0) {
    return 0;
  }

  let penalty = Math.min(0.18, sameDocument.length * 0.04);
  if (sameDocument.some((item) => Math.abs(item.hit.chunk.index - candidate.chunk.index) <= 1)) {
    penalty += 0.02;
  }
  return penalty;
}
