import { IndexStorageInfo, IndexStore, KnowledgeBaseManifest } from "../../domain/indexStore.js";

interface StoredIndex {
  serialized: string;
  source: Buffer;
}

/** Process-local store. Used by tests and KB_STORE=memory. */
export class MemoryIndexStore implements IndexStore {
  private manifest: KnowledgeBaseManifest | null = null;

  private readonly indexes = new Map<string, StoredIndex>();

  async initialize(): Promise<void> {}

  async loadManifest(): Promise<KnowledgeBaseManifest | null> {
    return this.manifest ? structuredClone(this.manifest) : null;
  }

  async saveManifest(manifest: KnowledgeBaseManifest): Promise<void> {
    this.manifest = structuredClone(manifest);
  }

  async saveIndex(key: string, serialized: string, source: Buffer): Promise<void> {
    this.indexes.set(key, { serialized, source: Buffer.from(source) });
  }

  async loadIndex(key: string): Promise<string | null> {
    return this.indexes.get(key)?.serialized ?? null;
  }

  async loadSource(key: string): Promise<Buffer | null> {
    const stored = this.indexes.get(key);
    return stored ? Buffer.from(stored.source) : null;
  }

  async deleteIndex(key: string): Promise<void> {
    this.indexes.delete(key);
  }

  /** Overwrites a stored index in place. Lets tests simulate on-disk damage. */
  corruptIndex(key: string, serialized: string): void {
    const stored = this.indexes.get(key);
    if (stored) {
      this.indexes.set(key, { ...stored, serialized });
    }
  }

  hasIndex(key: string): boolean {
    return this.indexes.has(key);
  }

  async getStorageInfo(): Promise<IndexStorageInfo> {
    let sizeBytes = 0;
    for (const stored of this.indexes.values()) {
      sizeBytes += Buffer.byteLength(stored.serialized, "utf-8") + stored.source.length;
    }
    return {
      kind: "memory",
      location: "memory",
      indexCount: this.indexes.size,
      sizeBytes,
      maxIndexBytes: null,
    };
  }

  async close(): Promise<void> {}
}
