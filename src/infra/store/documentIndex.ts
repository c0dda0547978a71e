import { z } from "zod";
import { IndexCorruptionError } from "../../domain/errors.js";
import { documentRecordSchema } from "../../domain/indexStore.js";
import { ChunkRecord, DocumentRecord, IndexHit, LexicalSource } from "../../domain/types.js";
import { contentHash } from "../../utils/hash.js";
import { scoreByTokenOverlap, tokenize, tokenizeForBm25 } from "../../utils/text.js";
import { cosineSimilarity } from "../../utils/vector.js";

export const INDEX_FORMAT_VERSION = 1;

const BM25_K1 = 1.2;
const BM25_B = 0.75;
const RRF_K = 60;

const chunkRecordSchema = z.object({
  id: z.string().min(1),
  documentKey: z.string().min(1),
  index: z.number().int().nonnegative(),
  text: z.string(),
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
  section: z.string().nullable(),
  embedding: z.array(z.number()).nullable(),
});

const snapshotSchema = z.object({
  format_version: z.number().int(),
  document: documentRecordSchema,
  chunks: z.array(chunkRecordSchema),
});

export type DocumentIndexSnapshot = z.infer<typeof snapshotSchema>;

export interface HybridWeights {
  semantic: number;
  lexical: number;
}

export const DEFAULT_HYBRID_WEIGHTS: HybridWeights = { semantic: 0.5, lexical: 0.5 };

export interface IndexSearchInput {
  query: string;
  queryEmbedding: number[] | null;
  topK: number;
  weights?: HybridWeights;
}

interface Bm25Document {
  chunk: ChunkRecord;
  tf: Map<string, number>;
  docLength: number;
}

interface RankedChunk {
  chunk: ChunkRecord;
  score: number;
}

interface LexicalRanking {
  source: LexicalSource;
  ranked: RankedChunk[];
}

/**
 * Immutable retrieval index for one document: chunk vectors for cosine
 * ranking plus a BM25 term structure over the same chunks.
 */
export class DocumentIndex {
  readonly fingerprint: string;

  private readonly bm25Docs: Bm25Document[];

  private readonly docFreq = new Map<string, number>();

  private readonly avgDocLength: number;

  private constructor(
    readonly document: Readonly<DocumentRecord>,
    readonly chunks: readonly Readonly<ChunkRecord>[],
  ) {
    this.bm25Docs = buildBm25Documents(chunks);
    let totalLength = 0;
    for (const doc of this.bm25Docs) {
      totalLength += doc.docLength;
      for (const token of doc.tf.keys()) {
        this.docFreq.set(token, (this.docFreq.get(token) ?? 0) + 1);
      }
    }
    this.avgDocLength = this.bm25Docs.length > 0 ? totalLength / this.bm25Docs.length : 0;
    this.fingerprint = contentHash(this.serialize());
  }

  static build(document: DocumentRecord, chunks: ChunkRecord[]): DocumentIndex {
    const ordered = [...chunks]
      .sort((a, b) => a.index - b.index)
      .map((chunk) => Object.freeze({ ...chunk, embedding: chunk.embedding ? [...chunk.embedding] : null }));
    return new DocumentIndex(
      Object.freeze({ ...document, chunkCount: ordered.length }),
      Object.freeze(ordered),
    );
  }

  /** Validates a persisted snapshot. Throws IndexCorruptionError on any mismatch. */
  static fromSnapshot(raw: unknown, expectedKey: string): DocumentIndex {
    const parsed = snapshotSchema.safeParse(raw);
    if (!parsed.success) {
      throw new IndexCorruptionError(
        expectedKey,
        `Index snapshot for ${expectedKey} failed validation: ${parsed.error.issues[0]?.message ?? "invalid"}`,
      );
    }

    const snapshot = parsed.data;
    if (snapshot.format_version !== INDEX_FORMAT_VERSION) {
      throw new IndexCorruptionError(
        expectedKey,
        `Unsupported index format version: ${snapshot.format_version}. Expected ${INDEX_FORMAT_VERSION}.`,
      );
    }
    if (snapshot.document.key !== expectedKey) {
      throw new IndexCorruptionError(
        expectedKey,
        `Index snapshot belongs to ${snapshot.document.key}, expected ${expectedKey}.`,
      );
    }
    if (snapshot.document.chunkCount !== snapshot.chunks.length) {
      throw new IndexCorruptionError(expectedKey, "Index snapshot chunk count does not match its chunks.");
    }
    const seen = new Set<number>();
    for (const chunk of snapshot.chunks) {
      if (chunk.documentKey !== expectedKey || chunk.id !== `${expectedKey}:${chunk.index}`) {
        throw new IndexCorruptionError(expectedKey, `Chunk ${chunk.id} does not belong to ${expectedKey}.`);
      }
      if (seen.has(chunk.index)) {
        throw new IndexCorruptionError(expectedKey, `Duplicate chunk index ${chunk.index}.`);
      }
      seen.add(chunk.index);
    }

    return DocumentIndex.build(snapshot.document, snapshot.chunks);
  }

  static parse(serialized: string, expectedKey: string): DocumentIndex {
    let raw: unknown;
    try {
      raw = JSON.parse(serialized);
    } catch (error) {
      throw new IndexCorruptionError(expectedKey, `Index snapshot for ${expectedKey} is not valid JSON.`, {
        cause: error,
      });
    }
    return DocumentIndex.fromSnapshot(raw, expectedKey);
  }

  get key(): string {
    return this.document.key;
  }

  get hasEmbeddings(): boolean {
    return this.chunks.some((chunk) => chunk.embedding !== null);
  }

  toSnapshot(): DocumentIndexSnapshot {
    return {
      format_version: INDEX_FORMAT_VERSION,
      document: { ...this.document },
      chunks: this.chunks.map((chunk) => ({
        ...chunk,
        embedding: chunk.embedding ? [...chunk.embedding] : null,
      })),
    };
  }

  serialize(): string {
    return JSON.stringify(this.toSnapshot());
  }

  /** Fused top-K of this document alone. */
  search(input: IndexSearchInput): IndexHit[] {
    return fuseHits(
      this.scoreChunks(input.query, input.queryEmbedding),
      effectiveWeights(input.queryEmbedding, input.weights),
      input.topK,
    );
  }

  /**
   * Raw cosine and lexical scores for every chunk that has either one.
   * Ranks and fused score are left empty for {@link fuseHits} to fill in.
   */
  scoreChunks(query: string, queryEmbedding: number[] | null): IndexHit[] {
    const hits = new Map<string, IndexHit>();
    const hitFor = (chunk: ChunkRecord): IndexHit => {
      let hit = hits.get(chunk.id);
      if (!hit) {
        hit = {
          document: this.document,
          chunk,
          score: 0,
          signals: { semanticRank: null, lexicalRank: null, semantic: null, lexical: null, lexicalSource: null },
        };
        hits.set(chunk.id, hit);
      }
      return hit;
    };

    if (queryEmbedding) {
      for (const item of this.rankBySemantic(queryEmbedding)) {
        hitFor(item.chunk).signals.semantic = item.score;
      }
    }
    const lexical = this.rankByLexical(query);
    for (const item of lexical.ranked) {
      const { signals } = hitFor(item.chunk);
      signals.lexical = item.score;
      signals.lexicalSource = lexical.source;
    }

    return [...hits.values()];
  }

  private rankBySemantic(queryEmbedding: number[]): RankedChunk[] {
    const ranked: RankedChunk[] = [];
    for (const chunk of this.chunks) {
      if (!chunk.embedding) {
        continue;
      }
      ranked.push({ chunk, score: cosineSimilarity(queryEmbedding, chunk.embedding) });
    }
    return ranked.sort(compareRanked);
  }

  private rankByLexical(query: string): LexicalRanking {
    const bm25 = this.rankByBm25(query);
    if (bm25.length > 0) {
      return { source: "bm25", ranked: bm25 };
    }

    const overlap: RankedChunk[] = [];
    for (const chunk of this.chunks) {
      const score = scoreByTokenOverlap(query, chunk.text);
      if (score > 0) {
        overlap.push({ chunk, score });
      }
    }
    return { source: "overlap", ranked: overlap.sort(compareRanked) };
  }

  private rankByBm25(query: string): RankedChunk[] {
    const queryTokens = tokenize(query);
    if (queryTokens.length === 0 || this.bm25Docs.length === 0) {
      return [];
    }

    const total = this.bm25Docs.length;
    const scored: RankedChunk[] = [];
    for (const doc of this.bm25Docs) {
      let score = 0;
      for (const term of queryTokens) {
        const tf = doc.tf.get(term) ?? 0;
        if (tf <= 0) {
          continue;
        }
        const df = this.docFreq.get(term) ?? 0;
        const idf = Math.log(1 + (total - df + 0.5) / (df + 0.5));
        const numerator = tf * (BM25_K1 + 1);
        const denominator =
          tf + BM25_K1 * (1 - BM25_B + BM25_B * (doc.docLength / Math.max(this.avgDocLength, 1e-9)));
        score += idf * (numerator / Math.max(denominator, 1e-9));
      }
      if (score > 0) {
        scored.push({ chunk: doc.chunk, score });
      }
    }
    return scored.sort(compareRanked);
  }
}

function buildBm25Documents(chunks: readonly ChunkRecord[]): Bm25Document[] {
  const docs: Bm25Document[] = [];
  for (const chunk of chunks) {
    const tokens = tokenizeForBm25(chunk.text);
    if (tokens.length === 0) {
      continue;
    }
    const tf = new Map<string, number>();
    for (const token of tokens) {
      tf.set(token, (tf.get(token) ?? 0) + 1);
    }
    docs.push({ chunk, tf, docLength: tokens.length });
  }
  return docs;
}

function compareRanked(a: RankedChunk, b: RankedChunk): number {
  return b.score - a.score || a.chunk.index - b.chunk.index;
}

/** Lexical-only fusion when the query has no embedding. */
export function effectiveWeights(queryEmbedding: number[] | null, weights?: HybridWeights): HybridWeights {
  return queryEmbedding ? (weights ?? DEFAULT_HYBRID_WEIGHTS) : { semantic: 0, lexical: 1 };
}

/**
 * Weighted reciprocal rank fusion over hits pooled from any number of
 * documents. Each signal is ranked across the whole pool, so a chunk's score
 * reflects how it compares with every other candidate, not only its siblings.
 * Duplicate chunk ids keep their first occurrence.
 */
export function fuseHits(hits: readonly IndexHit[], weights: HybridWeights, topK: number): IndexHit[] {
  const limit = Math.floor(topK);
  if (limit <= 0) {
    return [];
  }

  const pool = new Map<string, IndexHit>();
  for (const hit of hits) {
    if (!pool.has(hit.chunk.id)) {
      pool.set(hit.chunk.id, hit);
    }
  }
  const candidates = [...pool.values()];

  const semanticRanks = rankPositions(
    candidates.filter((hit) => hit.signals.semantic !== null),
    (a, b) => (b.signals.semantic ?? 0) - (a.signals.semantic ?? 0),
  );
  const lexicalRanks = rankPositions(
    candidates.filter((hit) => hit.signals.lexical !== null),
    (a, b) =>
      sourceOrder(a.signals.lexicalSource) - sourceOrder(b.signals.lexicalSource) ||
      (b.signals.lexical ?? 0) - (a.signals.lexical ?? 0),
  );

  return candidates
    .map((hit): IndexHit => {
      const semanticRank = semanticRanks.get(hit.chunk.id) ?? null;
      const lexicalRank = lexicalRanks.get(hit.chunk.id) ?? null;
      let score = 0;
      if (semanticRank !== null) {
        score += weights.semantic / (RRF_K + semanticRank);
      }
      if (lexicalRank !== null) {
        score += weights.lexical / (RRF_K + lexicalRank);
      }
      return { ...hit, score, signals: { ...hit.signals, semanticRank, lexicalRank } };
    })
    .sort(compareHits)
    .slice(0, limit);
}

function rankPositions(hits: IndexHit[], compare: (a: IndexHit, b: IndexHit) => number): Map<string, number> {
  const ordered = [...hits].sort(
    (a, b) => compare(a, b) || a.document.key.localeCompare(b.document.key) || a.chunk.index - b.chunk.index,
  );
  return new Map(ordered.map((hit, i) => [hit.chunk.id, i + 1]));
}

function sourceOrder(source: LexicalSource | null): number {
  return source === "bm25" ? 0 : 1;
}

/** Ascending with missing ranks last. */
export function compareRank(a: number | null, b: number | null): number {
  if (a === b) {
    return 0;
  }
  if (a === null) {
    return 1;
  }
  if (b === null) {
    return -1;
  }
  return a - b;
}

/** Global order for hits merged from several documents. */
export function compareHits(a: IndexHit, b: IndexHit): number {
  return (
    b.score - a.score ||
    compareRank(a.signals.semanticRank, b.signals.semanticRank) ||
    compareRank(a.signals.lexicalRank, b.signals.lexicalRank) ||
    a.document.key.localeCompare(b.document.key) ||
    a.chunk.index - b.chunk.index
  );
}
