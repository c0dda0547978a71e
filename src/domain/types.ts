export type DocumentFormat = "md" | "txt" | "csv" | "pdf";

export type IndexStatus = "ACTIVE" | "REBUILDING" | "PENDING_DELETE";

export interface DocumentRecord {
  /** Equal to `contentHash`, so identity changes exactly when content does. */
  key: string;
  contentHash: string;
  filename: string;
  format: DocumentFormat;
  sizeBytes: number;
  ingestedAt: string;
  chunkCount: number;
}

export interface ChunkRecord {
  /** `${documentKey}:${index}`; changes whenever the parent content changes. */
  id: string;
  documentKey: string;
  index: number;
  text: string;
  start: number;
  end: number;
  section: string | null;
  embedding: number[] | null;
}

/** BM25 scores outrank token-overlap scores regardless of magnitude. */
export type LexicalSource = "bm25" | "overlap";

export interface HitSignals {
  semanticRank: number | null;
  lexicalRank: number | null;
  semantic: number | null;
  lexical: number | null;
  lexicalSource: LexicalSource | null;
}

export interface IndexHit {
  document: DocumentRecord;
  chunk: ChunkRecord;
  score: number;
  signals: HitSignals;
}

export type RelevanceLabel = "confirmed" | "fallback" | "unevaluated";

/** A chunk ready for answer generation, with provenance for citation. */
export interface SelectedChunk {
  chunkId: string;
  documentKey: string;
  filename: string;
  chunkIndex: number;
  start: number;
  end: number;
  section: string | null;
  text: string;
  score: number;
  relevance: RelevanceLabel;
}

export interface ConversationTurn {
  question: string;
  answer: string;
  timestamp: string;
  citedChunkIds: string[];
}

export interface DocumentInput {
  filename: string;
  bytes: Buffer;
  format: DocumentFormat;
}
