import {
  EmbeddingServiceError,
  IndexCorruptionError,
  IngestError,
  KnowledgeBaseError,
  isAbortError,
} from "../domain/errors.js";
import { IndexStore, KnowledgeBaseManifest, MANIFEST_FORMAT_VERSION } from "../domain/indexStore.js";
import {
  ChunkRecord,
  DocumentFormat,
  DocumentInput,
  DocumentRecord,
  IndexStatus,
} from "../domain/types.js";
import { Embedder } from "../infra/ai/types.js";
import { extractTextBlocks } from "../infra/parsers/documentLoader.js";
import { DocumentIndex } from "../infra/store/documentIndex.js";
import { ChunkingOptions, joinTextBlocks, splitIntoChunks } from "../pipelines/chunking.js";
import { mapWithConcurrency } from "../utils/concurrency.js";
import { contentHash, shortHash } from "../utils/hash.js";
import { Logger, createLogger, describeError } from "../utils/logger.js";

export type TextExtractor = (bytes: Buffer, format: DocumentFormat) => Promise<string[]>;

export interface KnowledgeBaseManagerOptions {
  store: IndexStore;
  embedder?: Embedder | null;
  extract?: TextExtractor;
  chunking?: ChunkingOptions;
  deleteGraceMs?: number;
  logger?: Logger;
  now?: () => Date;
}

/** One published index. Never mutated; a status change replaces the entry. */
export interface IndexEntry {
  readonly document: DocumentRecord;
  readonly status: IndexStatus;
  readonly generation: number;
  /** Null while a corrupt persisted index awaits rebuild. */
  readonly index: DocumentIndex | null;
}

export type UpdateResult =
  | { status: "unchanged"; key: string; filename: string }
  | { status: "created"; key: string; filename: string; generation: number }
  | { status: "rebuilt"; key: string; previousKey: string; filename: string; generation: number }
  | { status: "superseded"; key: string; filename: string };

export type DeleteResult =
  | { status: "deleted"; key: string; filename: string }
  | { status: "not_found"; key: string };

export type IndexLookup =
  | { status: "found"; entry: IndexEntry; index: DocumentIndex }
  | { status: "not_found"; key: string };

export interface DocumentInfo {
  document: DocumentRecord;
  status: IndexStatus;
  generation: number;
  fingerprint: string | null;
  corrupt: boolean;
}

export interface SearchableIndexes {
  indexes: DocumentIndex[];
  failures: Array<{ key: string; filename: string; reason: string }>;
}

interface InflightBuild {
  controller: AbortController;
  key: string;
}

const LOAD_CONCURRENCY = 4;

/**
 * Owns the per-document indexes. Builds happen off to the side and are
 * swapped in with a single map replacement, so readers see the whole old
 * index or the whole new one.
 */
export class KnowledgeBaseManager {
  private entries: ReadonlyMap<string, IndexEntry> = new Map();

  private filenames: ReadonlyMap<string, string> = new Map();

  private readonly pendingDeletions = new Set<string>();

  private readonly reclaimTimers = new Map<string, NodeJS.Timeout>();

  private readonly reclaiming = new Set<Promise<void>>();

  private readonly inflight = new Map<string, InflightBuild>();

  private readonly repairs = new Map<string, Promise<DocumentIndex>>();

  private manifestChain: Promise<void> = Promise.resolve();

  private generation = 0;

  private opened = false;

  private closed = false;

  private readonly store: IndexStore;

  private readonly embedder: Embedder | null;

  private readonly extract: TextExtractor;

  private readonly chunking: ChunkingOptions;

  private readonly deleteGraceMs: number;

  private readonly logger: Logger;

  private readonly now: () => Date;

  constructor(options: KnowledgeBaseManagerOptions) {
    this.store = options.store;
    this.embedder = options.embedder ?? null;
    this.extract = options.extract ?? extractTextBlocks;
    this.chunking = options.chunking ?? {};
    this.deleteGraceMs = Math.max(0, options.deleteGraceMs ?? 500);
    this.logger = options.logger ?? createLogger("knowledge-base");
    this.now = options.now ?? (() => new Date());
  }

  /** Restores published indexes and retries reclamation left over from a previous run. */
  async open(): Promise<void> {
    if (this.opened) {
      return;
    }
    await this.store.initialize();
    const manifest = await this.store.loadManifest();

    if (manifest) {
      const loaded = await mapWithConcurrency(manifest.documents, LOAD_CONCURRENCY, async (entry) => {
        const { generation, ...document } = entry;
        const index = await this.loadPersistedIndex(document.key);
        return { document, generation, index };
      });

      const entries = new Map<string, IndexEntry>();
      const filenames = new Map<string, string>();
      for (const item of loaded) {
        entries.set(item.document.key, { ...item, status: "ACTIVE" });
        filenames.set(item.document.filename, item.document.key);
        this.generation = Math.max(this.generation, item.generation);
      }
      this.entries = entries;
      this.filenames = filenames;

      for (const key of manifest.pending_deletions) {
        if (!entries.has(key)) {
          this.pendingDeletions.add(key);
        }
      }
    }

    this.opened = true;
    this.logger.info("knowledge base opened", {
      documents: this.entries.size,
      pendingDeletions: this.pendingDeletions.size,
    });

    if (this.pendingDeletions.size > 0) {
      await this.flushReclamation();
    }
  }

  /** Ingests a document and returns its key. */
  async upload(input: DocumentInput, signal?: AbortSignal): Promise<string> {
    const result = await this.ingest(input, signal);
    return result.key;
  }

  /** Upload with the full outcome. A known filename with new content becomes an update. */
  async ingest(input: DocumentInput, signal?: AbortSignal): Promise<UpdateResult> {
    this.assertOpen();
    const key = contentHash(input.bytes);

    const existing = this.entries.get(key);
    if (existing && existing.status !== "PENDING_DELETE") {
      if (existing.document.filename === input.filename) {
        this.cancelInflight(input.filename, key);
      }
      return { status: "unchanged", key, filename: existing.document.filename };
    }

    if (this.filenames.has(input.filename)) {
      return this.update(input.filename, input, { signal });
    }
    return this.build(input, key, { signal });
  }

  async update(
    filename: string,
    input: DocumentInput,
    options: { force?: boolean; signal?: AbortSignal } = {},
  ): Promise<UpdateResult> {
    this.assertOpen();
    const key = contentHash(input.bytes);
    const currentKey = this.filenames.get(filename);
    const document = { ...input, filename };

    if (currentKey === undefined) {
      const existing = this.entries.get(key);
      if (existing && existing.status !== "PENDING_DELETE") {
        return { status: "unchanged", key, filename: existing.document.filename };
      }
      return this.build(document, key, { signal: options.signal });
    }

    if (currentKey === key && !options.force) {
      this.cancelInflight(filename, key);
      return { status: "unchanged", key, filename };
    }

    const owner = this.entries.get(key);
    if (owner && owner.status !== "PENDING_DELETE" && owner.document.filename !== filename) {
      throw new IngestError(
        `Content of ${filename} is identical to the indexed document ${owner.document.filename}.`,
      );
    }

    return this.build(document, key, { signal: options.signal, previousKey: currentKey });
  }

  /** Marks the index unavailable now and reclaims its storage after the grace period. */
  async delete(key: string): Promise<DeleteResult> {
    this.assertOpen();
    const entry = this.entries.get(key);
    if (!entry || entry.status === "PENDING_DELETE") {
      return { status: "not_found", key };
    }

    const filename = entry.document.filename;
    const build = this.inflight.get(filename);
    if (build) {
      this.inflight.delete(filename);
      build.controller.abort();
    }

    this.replaceEntry(key, { ...entry, status: "PENDING_DELETE" });
    if (this.filenames.get(filename) === key) {
      const filenames = new Map(this.filenames);
      filenames.delete(filename);
      this.filenames = filenames;
    }
    this.pendingDeletions.add(key);
    await this.persistManifest();
    this.scheduleReclamation(key);

    this.logger.info("document deleted", { key: shortHash(key), filename });
    return { status: "deleted", key, filename };
  }

  /** Live documents ordered by filename. Each iteration walks a fresh snapshot. */
  list(): Iterable<DocumentRecord> {
    const snapshot = this.entries;
    return {
      *[Symbol.iterator]() {
        const live = [...snapshot.values()]
          .filter((entry) => entry.status !== "PENDING_DELETE")
          .sort((a, b) => a.document.filename.localeCompare(b.document.filename));
        for (const entry of live) {
          yield entry.document;
        }
      },
    };
  }

  async getIndex(key: string): Promise<IndexLookup> {
    const entry = this.entries.get(key);
    if (!entry || entry.status === "PENDING_DELETE") {
      return { status: "not_found", key };
    }
    if (entry.index) {
      return { status: "found", entry, index: entry.index };
    }

    const index = await this.repair(entry);
    const current = this.entries.get(key) ?? entry;
    return { status: "found", entry: current, index };
  }

  findByFilename(filename: string): DocumentRecord | null {
    const key = this.filenames.get(filename);
    if (key === undefined) {
      return null;
    }
    return this.entries.get(key)?.document ?? null;
  }

  getDocumentInfo(filenameOrKey: string): DocumentInfo | null {
    const key = this.filenames.get(filenameOrKey) ?? filenameOrKey;
    const entry = this.entries.get(key);
    if (!entry || entry.status === "PENDING_DELETE") {
      return null;
    }
    return {
      document: entry.document,
      status: entry.status,
      generation: entry.generation,
      fingerprint: entry.index?.fingerprint ?? null,
      corrupt: entry.index === null,
    };
  }

  /** Every servable index. Corrupt ones are rebuilt first; failures are reported, not thrown. */
  async searchableIndexes(): Promise<SearchableIndexes> {
    const live = [...this.entries.values()].filter((entry) => entry.status !== "PENDING_DELETE");
    const failures: SearchableIndexes["failures"] = [];
    const indexes: DocumentIndex[] = [];

    for (const entry of live) {
      if (entry.index) {
        indexes.push(entry.index);
        continue;
      }
      try {
        indexes.push(await this.repair(entry));
      } catch (error) {
        failures.push({
          key: entry.document.key,
          filename: entry.document.filename,
          reason: describeError(error),
        });
      }
    }

    return { indexes, failures };
  }

  stats(): { documents: number; rebuilding: number; pendingDeletions: number; corrupt: number; inflightBuilds: number } {
    let documents = 0;
    let rebuilding = 0;
    let corrupt = 0;
    for (const entry of this.entries.values()) {
      if (entry.status === "PENDING_DELETE") {
        continue;
      }
      documents += 1;
      if (entry.status === "REBUILDING") {
        rebuilding += 1;
      }
      if (!entry.index) {
        corrupt += 1;
      }
    }
    return {
      documents,
      rebuilding,
      pendingDeletions: this.pendingDeletions.size,
      corrupt,
      inflightBuilds: this.inflight.size,
    };
  }

  /** Reclaims every pending deletion now instead of waiting for its timer. */
  async flushReclamation(): Promise<void> {
    for (const timer of this.reclaimTimers.values()) {
      clearTimeout(timer);
    }
    this.reclaimTimers.clear();

    await Promise.all([...this.pendingDeletions].map((key) => this.trackReclamation(key)));
    await Promise.all([...this.reclaiming]);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const build of this.inflight.values()) {
      build.controller.abort();
    }
    await this.flushReclamation();
    await this.manifestChain;
    await this.store.close();
  }

  private async build(
    input: DocumentInput,
    key: string,
    options: { signal?: AbortSignal; previousKey?: string },
  ): Promise<UpdateResult> {
    const filename = input.filename;
    const controller = new AbortController();
    const onCallerAbort = () => controller.abort(options.signal?.reason);
    options.signal?.addEventListener("abort", onCallerAbort, { once: true });

    const prior = this.inflight.get(filename);
    if (prior) {
      this.logger.info("superseding in-flight build", { filename, key: shortHash(prior.key) });
      prior.controller.abort();
    }
    this.inflight.set(filename, { controller, key });

    const previousKey = options.previousKey;
    if (previousKey) {
      this.setStatus(previousKey, "REBUILDING");
    }

    const ownsBuild = () => this.inflight.get(filename)?.controller === controller;
    const startedAt = Date.now();
    try {
      const index = await this.buildIndex(input, key, controller.signal);
      controller.signal.throwIfAborted();
      await this.store.saveIndex(key, index.serialize(), input.bytes);

      if (!ownsBuild()) {
        this.discardUnpublished(key);
        return { status: "superseded", key, filename };
      }
      controller.signal.throwIfAborted();

      const generation = this.publish(index, previousKey);
      await this.persistManifest();
      if (previousKey && previousKey !== key) {
        this.scheduleReclamation(previousKey);
      }

      this.logger.info(previousKey ? "document rebuilt" : "document indexed", {
        filename,
        key: shortHash(key),
        generation,
        chunks: index.chunks.length,
        ms: Date.now() - startedAt,
      });
      return previousKey
        ? { status: "rebuilt", key, previousKey, filename, generation }
        : { status: "created", key, filename, generation };
    } catch (error) {
      if (!ownsBuild()) {
        return { status: "superseded", key, filename };
      }
      if (previousKey) {
        this.setStatus(previousKey, "ACTIVE");
      }
      if (controller.signal.aborted) {
        throw error;
      }
      this.logger.warn("document build failed", { filename, error: describeError(error) });
      if (error instanceof IngestError) {
        throw error;
      }
      throw new IngestError(`Failed to index ${filename}: ${describeError(error)}`, { cause: error });
    } finally {
      options.signal?.removeEventListener("abort", onCallerAbort);
      if (ownsBuild()) {
        this.inflight.delete(filename);
      }
    }
  }

  private async buildIndex(input: DocumentInput, key: string, signal?: AbortSignal): Promise<DocumentIndex> {
    const blocks = await this.extract(input.bytes, input.format);
    const chunks = splitIntoChunks(joinTextBlocks(blocks), this.chunking);
    if (chunks.length === 0) {
      throw new IngestError(`No indexable text in ${input.filename}.`);
    }

    let embeddings: number[][] = [];
    if (this.embedder) {
      try {
        embeddings = await this.embedder.embedTexts(
          chunks.map((chunk) => chunk.text),
          signal,
        );
      } catch (error) {
        if (isAbortError(error) || signal?.aborted) {
          throw error;
        }
        throw new IngestError(`Embedding failed for ${input.filename}: ${describeError(error)}`, {
          cause: error instanceof EmbeddingServiceError ? error : new EmbeddingServiceError(describeError(error)),
        });
      }
      if (embeddings.length !== chunks.length) {
        throw new IngestError(
          `Embedding count mismatch for ${input.filename} (${embeddings.length} != ${chunks.length}).`,
        );
      }
    }

    const records: ChunkRecord[] = chunks.map((chunk, i) => ({
      id: `${key}:${chunk.index}`,
      documentKey: key,
      index: chunk.index,
      text: chunk.text,
      start: chunk.start,
      end: chunk.end,
      section: chunk.section,
      embedding: embeddings[i] ?? null,
    }));

    const document: DocumentRecord = {
      key,
      contentHash: key,
      filename: input.filename,
      format: input.format,
      sizeBytes: input.bytes.length,
      ingestedAt: this.now().toISOString(),
      chunkCount: records.length,
    };
    return DocumentIndex.build(document, records);
  }

  /** The swap: one synchronous map replacement. */
  private publish(index: DocumentIndex, previousKey: string | undefined): number {
    this.generation += 1;
    const key = index.key;
    const entries = new Map(this.entries);
    entries.set(key, { document: index.document, status: "ACTIVE", generation: this.generation, index });
    if (previousKey && previousKey !== key) {
      const previous = entries.get(previousKey);
      if (previous) {
        entries.set(previousKey, { ...previous, status: "PENDING_DELETE" });
        this.pendingDeletions.add(previousKey);
      }
    }
    this.entries = entries;

    const filenames = new Map(this.filenames);
    filenames.set(index.document.filename, key);
    this.filenames = filenames;

    this.cancelReclamation(key);
    return this.generation;
  }

  private repair(entry: IndexEntry): Promise<DocumentIndex> {
    const key = entry.document.key;
    const running = this.repairs.get(key);
    if (running) {
      return running;
    }

    const task = (async () => {
      this.logger.warn("rebuilding corrupt index", { key: shortHash(key), filename: entry.document.filename });
      const source = await this.store.loadSource(key);
      if (!source) {
        throw new IndexCorruptionError(key, `Index for ${entry.document.filename} is corrupt and its source is missing.`);
      }
      if (contentHash(source) !== key) {
        throw new IndexCorruptionError(key, `Stored source for ${entry.document.filename} does not match its key.`);
      }

      let index: DocumentIndex;
      try {
        index = await this.buildIndex(
          { filename: entry.document.filename, bytes: source, format: entry.document.format },
          key,
        );
      } catch (error) {
        throw new IndexCorruptionError(key, `Could not rebuild ${entry.document.filename}: ${describeError(error)}`, {
          cause: error,
        });
      }
      await this.store.saveIndex(key, index.serialize(), source);

      const current = this.entries.get(key);
      if (current && current.status !== "PENDING_DELETE" && current.index === null) {
        this.generation += 1;
        this.replaceEntry(key, { ...current, document: index.document, index, generation: this.generation });
        await this.persistManifest();
      }
      return index;
    })();

    this.repairs.set(key, task);
    const cleanup = () => {
      this.repairs.delete(key);
    };
    void task.then(cleanup, cleanup);
    return task;
  }

  private async loadPersistedIndex(key: string): Promise<DocumentIndex | null> {
    try {
      const serialized = await this.store.loadIndex(key);
      if (serialized === null) {
        throw new IndexCorruptionError(key, `Index for ${key} is missing from the store.`);
      }
      return DocumentIndex.parse(serialized, key);
    } catch (error) {
      if (!(error instanceof KnowledgeBaseError)) {
        throw error;
      }
      this.logger.warn("persisted index is corrupt; will rebuild on access", {
        key: shortHash(key),
        error: describeError(error),
      });
      return null;
    }
  }

  /** Drops a pending rebuild of `filename` so the published `key` stays current. */
  private cancelInflight(filename: string, key: string): void {
    const build = this.inflight.get(filename);
    if (!build) {
      return;
    }
    this.inflight.delete(filename);
    build.controller.abort();
    this.setStatus(key, "ACTIVE");
    this.logger.info("in-flight build cancelled by a request for the published content", {
      filename,
      key: shortHash(build.key),
    });
  }

  private setStatus(key: string, status: IndexStatus): void {
    const entry = this.entries.get(key);
    if (entry && entry.status !== "PENDING_DELETE" && entry.status !== status) {
      this.replaceEntry(key, { ...entry, status });
    }
  }

  private replaceEntry(key: string, entry: IndexEntry): void {
    const entries = new Map(this.entries);
    entries.set(key, entry);
    this.entries = entries;
  }

  private isLive(key: string): boolean {
    const entry = this.entries.get(key);
    return Boolean(entry && entry.status !== "PENDING_DELETE");
  }

  private discardUnpublished(key: string): void {
    if (!this.isLive(key) && !this.isBuilding(key)) {
      this.pendingDeletions.add(key);
      this.scheduleReclamation(key);
    }
  }

  private isBuilding(key: string): boolean {
    for (const build of this.inflight.values()) {
      if (build.key === key && !build.controller.signal.aborted) {
        return true;
      }
    }
    return false;
  }

  private scheduleReclamation(key: string): void {
    if (this.closed) {
      return;
    }
    this.cancelTimer(key);
    const timer = setTimeout(() => {
      this.reclaimTimers.delete(key);
      this.trackReclamation(key).catch((error: unknown) => {
        this.logger.error("reclamation crashed", { key: shortHash(key), error: describeError(error) });
      });
    }, this.deleteGraceMs);
    timer.unref();
    this.reclaimTimers.set(key, timer);
  }

  private cancelReclamation(key: string): void {
    this.cancelTimer(key);
    this.pendingDeletions.delete(key);
  }

  private cancelTimer(key: string): void {
    const timer = this.reclaimTimers.get(key);
    if (timer) {
      clearTimeout(timer);
      this.reclaimTimers.delete(key);
    }
  }

  private trackReclamation(key: string): Promise<void> {
    const task = this.reclaim(key);
    this.reclaiming.add(task);
    const cleanup = () => {
      this.reclaiming.delete(task);
    };
    void task.then(cleanup, cleanup);
    return task;
  }

  private async reclaim(key: string): Promise<void> {
    if (!this.pendingDeletions.has(key)) {
      return;
    }
    if (this.isLive(key) || this.isBuilding(key)) {
      this.pendingDeletions.delete(key);
      await this.persistManifest();
      return;
    }

    try {
      await this.store.deleteIndex(key);
    } catch (error) {
      // Stays in the persisted pending list; the next open() retries it.
      this.logger.warn("reclamation failed", { key: shortHash(key), error: describeError(error) });
      return;
    }

    this.pendingDeletions.delete(key);
    const entry = this.entries.get(key);
    if (entry && entry.status === "PENDING_DELETE") {
      const entries = new Map(this.entries);
      entries.delete(key);
      this.entries = entries;
    }
    await this.persistManifest();
    this.logger.debug("index storage reclaimed", { key: shortHash(key) });
  }

  private persistManifest(): Promise<void> {
    const write = () => this.store.saveManifest(this.buildManifest());
    const next = this.manifestChain.then(write, write);
    this.manifestChain = next.catch((error: unknown) => {
      this.logger.error("manifest write failed", { error: describeError(error) });
    });
    return next;
  }

  private buildManifest(): KnowledgeBaseManifest {
    const documents = [...this.entries.values()]
      .filter((entry) => entry.status !== "PENDING_DELETE")
      .sort((a, b) => a.document.filename.localeCompare(b.document.filename))
      .map((entry) => ({ ...entry.document, generation: entry.generation }));

    return {
      format_version: MANIFEST_FORMAT_VERSION,
      saved_at: this.now().toISOString(),
      documents,
      pending_deletions: [...this.pendingDeletions].sort(),
    };
  }

  private assertOpen(): void {
    if (!this.opened) {
      throw new Error("KnowledgeBaseManager.open() must be called first.");
    }
    if (this.closed) {
      throw new Error("KnowledgeBaseManager is closed.");
    }
  }
}
