import { z } from "zod";
import {
  IndexStorageInfo,
  IndexStore,
  KnowledgeBaseManifest,
  MANIFEST_FORMAT_VERSION,
  parseManifest,
} from "../../domain/indexStore.js";
import { SqlDatabase, SqlRow } from "../db/postgres.js";

const indexRowSchema = z.object({ snapshot: z.string() });

const sourceRowSchema = z.object({ source: z.instanceof(Buffer) });

const documentRowSchema = z.object({
  filename: z.string(),
  key: z.string(),
  generation: z.coerce.number(),
  format: z.string(),
  size_bytes: z.coerce.number(),
  ingested_at: z.string(),
  chunk_count: z.coerce.number(),
});

const pendingRowSchema = z.object({ key: z.string() });

// COUNT and SUM come back from pg as strings.
const statsRowSchema = z.object({
  index_count: z.coerce.number(),
  size_bytes: z.coerce.number(),
});

function parseRows<T extends z.ZodTypeAny>(schema: T, rows: SqlRow[]): Array<z.infer<T>> {
  return z.array(schema).parse(rows);
}

export interface PgIndexStoreOptions {
  maxIndexBytes: number;
}

/**
 * Tables:
 *   kb_indexes            one serialized index plus its source bytes per key
 *   kb_documents          manifest rows: filename → key
 *   kb_pending_deletions  keys awaiting reclamation
 */
export class PgIndexStore implements IndexStore {
  private initialized = false;

  constructor(
    private readonly db: SqlDatabase,
    private readonly options: PgIndexStoreOptions,
  ) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.db.query(`
      CREATE TABLE IF NOT EXISTS kb_indexes (
        key TEXT PRIMARY KEY,
        snapshot TEXT NOT NULL,
        source BYTEA NOT NULL,
        size_bytes INTEGER NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    await this.db.query(`
      CREATE TABLE IF NOT EXISTS kb_documents (
        filename TEXT PRIMARY KEY,
        key TEXT NOT NULL,
        generation INTEGER NOT NULL,
        format TEXT NOT NULL,
        size_bytes INTEGER NOT NULL,
        ingested_at TEXT NOT NULL,
        chunk_count INTEGER NOT NULL
      )
    `);
    await this.db.query(`
      CREATE TABLE IF NOT EXISTS kb_pending_deletions (
        key TEXT PRIMARY KEY
      )
    `);

    this.initialized = true;
  }

  async loadManifest(): Promise<KnowledgeBaseManifest | null> {
    await this.initialize();
    const documents = parseRows(
      documentRowSchema,
      await this.db.query(
        `SELECT filename, key, generation, format, size_bytes, ingested_at, chunk_count
         FROM kb_documents ORDER BY filename`,
      ),
    );
    const pending = parseRows(
      pendingRowSchema,
      await this.db.query(`SELECT key FROM kb_pending_deletions ORDER BY key`),
    );
    if (documents.length === 0 && pending.length === 0) {
      return null;
    }

    // Rows go through the same validation as a manifest file.
    return parseManifest({
      format_version: MANIFEST_FORMAT_VERSION,
      saved_at: new Date().toISOString(),
      documents: documents.map((row) => ({
        key: row.key,
        contentHash: row.key,
        filename: row.filename,
        format: row.format,
        sizeBytes: row.size_bytes,
        ingestedAt: row.ingested_at,
        chunkCount: row.chunk_count,
        generation: row.generation,
      })),
      pending_deletions: pending.map((row) => row.key),
    });
  }

  async saveManifest(manifest: KnowledgeBaseManifest): Promise<void> {
    await this.initialize();
    await this.db.transaction(async (tx) => {
      await tx.query(`DELETE FROM kb_documents`);
      for (const entry of manifest.documents) {
        await tx.query(
          `INSERT INTO kb_documents (filename, key, generation, format, size_bytes, ingested_at, chunk_count)
           VALUES ($1, $2, $3, $4, $5, $6, $7)`,
          [
            entry.filename,
            entry.key,
            entry.generation,
            entry.format,
            entry.sizeBytes,
            entry.ingestedAt,
            entry.chunkCount,
          ],
        );
      }
      await tx.query(`DELETE FROM kb_pending_deletions`);
      for (const key of manifest.pending_deletions) {
        await tx.query(`INSERT INTO kb_pending_deletions (key) VALUES ($1)`, [key]);
      }
    });
  }

  async saveIndex(key: string, serialized: string, source: Buffer): Promise<void> {
    await this.initialize();
    const bytes = Buffer.byteLength(serialized, "utf-8");
    if (bytes > this.options.maxIndexBytes) {
      throw new Error(`Index snapshot exceeds size limit (${bytes} > ${this.options.maxIndexBytes} bytes).`);
    }

    await this.db.query(
      `
        INSERT INTO kb_indexes (key, snapshot, source, size_bytes, updated_at)
        VALUES ($1, $2, $3, $4, NOW())
        ON CONFLICT (key)
        DO UPDATE SET snapshot = EXCLUDED.snapshot, source = EXCLUDED.source,
          size_bytes = EXCLUDED.size_bytes, updated_at = NOW()
      `,
      [key, serialized, source, bytes],
    );
  }

  async loadIndex(key: string): Promise<string | null> {
    await this.initialize();
    const rows = parseRows(
      indexRowSchema,
      await this.db.query(`SELECT snapshot FROM kb_indexes WHERE key = $1`, [key]),
    );
    return rows[0]?.snapshot ?? null;
  }

  async loadSource(key: string): Promise<Buffer | null> {
    await this.initialize();
    const rows = parseRows(
      sourceRowSchema,
      await this.db.query(`SELECT source FROM kb_indexes WHERE key = $1`, [key]),
    );
    return rows[0]?.source ?? null;
  }

  async deleteIndex(key: string): Promise<void> {
    await this.initialize();
    await this.db.query(`DELETE FROM kb_indexes WHERE key = $1`, [key]);
  }

  async getStorageInfo(): Promise<IndexStorageInfo> {
    await this.initialize();
    const rows = parseRows(
      statsRowSchema,
      await this.db.query(
        `SELECT COUNT(*) AS index_count, COALESCE(SUM(size_bytes), 0) AS size_bytes FROM kb_indexes`,
      ),
    );
    return {
      kind: "postgres",
      location: "kb_indexes",
      indexCount: rows[0]?.index_count ?? 0,
      sizeBytes: rows[0]?.size_bytes ?? 0,
      maxIndexBytes: this.options.maxIndexBytes,
    };
  }

  async close(): Promise<void> {
    await this.db.end();
  }
}
