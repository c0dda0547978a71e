import { describe, expect, it } from "vitest";
import { IndexCorruptionError } from "../src/domain/errors.js";
import { ChunkRecord, DocumentRecord, IndexHit } from "../src/domain/types.js";
import { DEFAULT_HYBRID_WEIGHTS, DocumentIndex, compareHits, fuseHits } from "../src/infra/store/documentIndex.js";

const KEY = "0123456789abcdef0123456789abcdef";

function makeDocument(key = KEY): DocumentRecord {
  return {
    key,
    contentHash: key,
    filename: "fruit.txt",
    format: "txt",
    sizeBytes: 42,
    ingestedAt: "2024-01-01T00:00:00.000Z",
    chunkCount: 0,
  };
}

function makeChunks(texts: string[], embeddings: Array<number[] | null> = [], key = KEY): ChunkRecord[] {
  let offset = 0;
  return texts.map((text, index) => {
    const start = offset;
    offset += text.length + 2;
    return {
      id: `${key}:${index}`,
      documentKey: key,
      index,
      text,
      start,
      end: start + text.length,
      section: null,
      embedding: embeddings[index] ?? null,
    };
  });
}

const TEXTS = ["apple banana", "cherry date", "apple apple cherry"];

describe("DocumentIndex", () => {
  it("ranks lexically by BM25 when there is no query embedding", () => {
    const index = DocumentIndex.build(makeDocument(), makeChunks(TEXTS));

    const hits = index.search({ query: "apple", queryEmbedding: null, topK: 5 });

    expect(hits.map((hit) => hit.chunk.index)).toEqual([2, 0]);
    expect(hits[0].score).toBeCloseTo(1 / 61, 12);
    expect(hits[1].score).toBeCloseTo(1 / 62, 12);
    expect(hits[0].signals).toMatchObject({ semanticRank: null, lexicalRank: 1, semantic: null });
  });

  it("fuses semantic and lexical ranks", () => {
    const index = DocumentIndex.build(
      makeDocument(),
      makeChunks(TEXTS, [
        [1, 0],
        [0, 1],
        [0.6, 0.8],
      ]),
    );

    const hits = index.search({ query: "apple", queryEmbedding: [0, 1], topK: 5 });

    expect(hits.map((hit) => hit.chunk.index)).toEqual([2, 0, 1]);
    expect(hits[0].score).toBeCloseTo(0.5 / 62 + 0.5 / 61, 12);
    expect(hits[2].score).toBeCloseTo(0.5 / 61, 12);
    expect(hits[2].signals).toMatchObject({ semanticRank: 1, lexicalRank: null, semantic: 1 });
  });

  it("honours custom fusion weights", () => {
    const index = DocumentIndex.build(
      makeDocument(),
      makeChunks(TEXTS, [
        [1, 0],
        [0, 1],
        [0.6, 0.8],
      ]),
    );

    const hits = index.search({
      query: "apple",
      queryEmbedding: [0, 1],
      topK: 1,
      weights: { semantic: 1, lexical: 0 },
    });

    expect(hits.map((hit) => hit.chunk.index)).toEqual([1]);
  });

  it("falls back to token overlap when no query term is indexed", () => {
    const index = DocumentIndex.build(makeDocument(), makeChunks(TEXTS));

    const hits = index.search({ query: "appl", queryEmbedding: null, topK: 5 });

    expect(hits.map((hit) => hit.chunk.index)).toEqual([0, 2]);
  });

  it("returns nothing for a non-positive topK", () => {
    const index = DocumentIndex.build(makeDocument(), makeChunks(TEXTS));

    expect(index.search({ query: "apple", queryEmbedding: null, topK: 0 })).toEqual([]);
  });

  it("round-trips through its serialized snapshot with the same fingerprint", () => {
    const index = DocumentIndex.build(makeDocument(), makeChunks(TEXTS, [[1, 0], null, [0, 1]]));

    const restored = DocumentIndex.parse(index.serialize(), KEY);

    expect(restored.fingerprint).toBe(index.fingerprint);
    expect(restored.document.chunkCount).toBe(3);
    expect(restored.hasEmbeddings).toBe(true);
  });

  it("rejects snapshots that do not belong to the expected key", () => {
    const index = DocumentIndex.build(makeDocument(), makeChunks(TEXTS));
    const otherKey = "ffffffffffffffffffffffffffffffff";

    expect(() => DocumentIndex.parse(index.serialize(), otherKey)).toThrow(IndexCorruptionError);
    expect(() => DocumentIndex.parse("{broken", KEY)).toThrow(`Index snapshot for ${KEY} is not valid JSON.`);
  });

  it("rejects unknown format versions and inconsistent chunk counts", () => {
    const snapshot = DocumentIndex.build(makeDocument(), makeChunks(TEXTS)).toSnapshot();

    expect(() => DocumentIndex.fromSnapshot({ ...snapshot, format_version: 2 }, KEY)).toThrow(
      "Unsupported index format version: 2. Expected 1.",
    );
    expect(() =>
      DocumentIndex.fromSnapshot({ ...snapshot, document: { ...snapshot.document, chunkCount: 7 } }, KEY),
    ).toThrow("Index snapshot chunk count does not match its chunks.");
  });
});

describe("fuseHits", () => {
  const OTHER_KEY = "fedcba9876543210fedcba9876543210";

  it("ranks each signal across every pooled document", () => {
    const near = DocumentIndex.build(makeDocument(), makeChunks(["cherry"], [[1, 0]]));
    const far = DocumentIndex.build(makeDocument(OTHER_KEY), makeChunks(["date"], [[0, 1]], OTHER_KEY));

    const hits = fuseHits(
      [...far.scoreChunks("plum", [1, 0]), ...near.scoreChunks("plum", [1, 0])],
      DEFAULT_HYBRID_WEIGHTS,
      2,
    );

    expect(hits.map((hit) => hit.document.key)).toEqual([KEY, OTHER_KEY]);
    expect(hits[0].score).toBeCloseTo(0.5 / 61, 12);
    expect(hits[1].score).toBeCloseTo(0.5 / 62, 12);
    expect(hits[1].signals).toMatchObject({ semanticRank: 2, semantic: 0, lexicalRank: null });
    expect(far.search({ query: "plum", queryEmbedding: [1, 0], topK: 1 })[0].score).toBeCloseTo(0.5 / 61, 12);
  });

  it("puts BM25 matches ahead of token-overlap matches from other documents", () => {
    const exact = DocumentIndex.build(makeDocument(), makeChunks(["apple pie"]));
    const partial = DocumentIndex.build(makeDocument(OTHER_KEY), makeChunks(["applesauce"], [], OTHER_KEY));

    const pooled = [...partial.scoreChunks("apple", null), ...exact.scoreChunks("apple", null)];
    const hits = fuseHits(pooled, { semantic: 0, lexical: 1 }, 5);

    expect(pooled.find((hit) => hit.document.key === OTHER_KEY)?.signals.lexical).toBeCloseTo((4 / 9) * 0.85, 12);
    expect(hits.map((hit) => [hit.document.key, hit.signals.lexicalSource])).toEqual([
      [KEY, "bm25"],
      [OTHER_KEY, "overlap"],
    ]);
  });

  it("keeps the first copy of a chunk seen twice", () => {
    const index = DocumentIndex.build(makeDocument(), makeChunks(TEXTS));
    const scored = index.scoreChunks("apple", null);

    expect(fuseHits([...scored, ...scored], { semantic: 0, lexical: 1 }, 10)).toHaveLength(2);
  });
});

describe("compareHits", () => {
  const hit = (key: string, index: number, score: number, semanticRank: number | null): IndexHit => ({
    document: makeDocument(key),
    chunk: { ...makeChunks(["x"])[0], id: `${key}:${index}`, documentKey: key, index },
    score,
    signals: { semanticRank, lexicalRank: null, semantic: null, lexical: null, lexicalSource: null },
  });

  it("orders by score, then semantic rank, then document key, then chunk index", () => {
    const hits = [
      hit("bbbb", 0, 0.5, null),
      hit("aaaa", 1, 0.5, null),
      hit("aaaa", 0, 0.5, null),
      hit("cccc", 0, 0.5, 2),
      hit("dddd", 0, 0.9, null),
    ];

    const ordered = [...hits].sort(compareHits).map((item) => item.chunk.id);

    expect(ordered).toEqual(["dddd:0", "cccc:0", "aaaa:0", "aaaa:1", "bbbb:0"]);
  });
});
