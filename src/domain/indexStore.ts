import { z } from "zod";

export const MANIFEST_FORMAT_VERSION = 1;

export const documentRecordSchema = z.object({
  key: z.string().min(1),
  contentHash: z.string().min(1),
  filename: z.string().min(1),
  format: z.enum(["md", "txt", "csv", "pdf"]),
  sizeBytes: z.number().int().nonnegative(),
  ingestedAt: z.string(),
  chunkCount: z.number().int().nonnegative(),
});

export const manifestEntrySchema = documentRecordSchema.extend({
  generation: z.number().int().nonnegative(),
});

export const manifestSchema = z.object({
  format_version: z.literal(MANIFEST_FORMAT_VERSION),
  saved_at: z.string(),
  documents: z.array(manifestEntrySchema),
  pending_deletions: z.array(z.string()),
});

/** filename → key → index location, plus keys whose storage still awaits reclamation. */
export type KnowledgeBaseManifest = z.infer<typeof manifestSchema>;

export type ManifestEntry = z.infer<typeof manifestEntrySchema>;

export interface IndexStorageInfo {
  kind: "memory" | "file" | "postgres";
  location: string;
  indexCount: number;
  sizeBytes: number;
  maxIndexBytes: number | null;
}

/**
 * Persistence for serialized per-document indexes. Each index is stored next
 * to the source bytes it was built from, so a corrupt index can be rebuilt.
 */
export interface IndexStore {
  initialize(): Promise<void>;
  loadManifest(): Promise<KnowledgeBaseManifest | null>;
  saveManifest(manifest: KnowledgeBaseManifest): Promise<void>;
  saveIndex(key: string, serialized: string, source: Buffer): Promise<void>;
  loadIndex(key: string): Promise<string | null>;
  loadSource(key: string): Promise<Buffer | null>;
  deleteIndex(key: string): Promise<void>;
  getStorageInfo(): Promise<IndexStorageInfo>;
  close(): Promise<void>;
}

export function parseManifest(raw: unknown): KnowledgeBaseManifest {
  const parsed = manifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(
      `Invalid knowledge base manifest: ${parsed.error.issues[0]?.message ?? "unknown issue"}`,
    );
  }
  return parsed.data;
}
