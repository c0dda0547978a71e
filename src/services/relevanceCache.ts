import { normalizeQuestion } from "../utils/text.js";

export interface RelevanceCacheOptions {
  maxEntries: number;
  ttlMs: number;
  now?: () => number;
}

interface CacheEntry {
  relevant: boolean;
  storedAt: number;
}

export interface RelevanceCacheStats {
  size: number;
  hits: number;
  misses: number;
  evictions: number;
}

/**
 * LRU + TTL cache of judge verdicts keyed by (normalized question, chunk id).
 * Chunk ids embed the content hash, so a changed document never hits.
 */
export class RelevanceCache {
  private readonly entries = new Map<string, CacheEntry>();

  private readonly maxEntries: number;

  private readonly ttlMs: number;

  private readonly now: () => number;

  private hits = 0;

  private misses = 0;

  private evictions = 0;

  constructor(options: RelevanceCacheOptions) {
    this.maxEntries = Math.max(1, Math.floor(options.maxEntries));
    this.ttlMs = Math.max(1, options.ttlMs);
    this.now = options.now ?? Date.now;
  }

  static keyFor(question: string, chunkId: string): string {
    return `${normalizeQuestion(question)}\u0000${chunkId}`;
  }

  get(question: string, chunkId: string): boolean | undefined {
    const key = RelevanceCache.keyFor(question, chunkId);
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses += 1;
      return undefined;
    }
    if (this.now() - entry.storedAt > this.ttlMs) {
      this.entries.delete(key);
      this.misses += 1;
      return undefined;
    }
    // Map iteration order doubles as recency order.
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits += 1;
    return entry.relevant;
  }

  set(question: string, chunkId: string, relevant: boolean): void {
    const key = RelevanceCache.keyFor(question, chunkId);
    this.entries.delete(key);
    this.entries.set(key, { relevant, storedAt: this.now() });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
      this.evictions += 1;
    }
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): RelevanceCacheStats {
    return { size: this.entries.size, hits: this.hits, misses: this.misses, evictions: this.evictions };
  }
}
