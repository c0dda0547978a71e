import { describe, expect, it } from "vitest";
import { KnowledgeBaseManifest } from "../src/domain/indexStore.js";
import { PgIndexStore } from "../src/infra/store/pgIndexStore.js";
import { KnowledgeBaseManager } from "../src/services/knowledgeBaseManager.js";
import { FakeSqlDatabase } from "./helpers/fakeSql.js";
import { fakeExtract, silentLogger, textInput } from "./helpers/fakes.js";

const KEY = "0123456789abcdef0123456789abcdef";

const manifest: KnowledgeBaseManifest = {
  format_version: 1,
  saved_at: "2024-01-01T00:00:00.000Z",
  documents: [
    {
      key: KEY,
      contentHash: KEY,
      filename: "notes.txt",
      format: "txt",
      sizeBytes: 5,
      ingestedAt: "2024-01-01T00:00:00.000Z",
      chunkCount: 1,
      generation: 2,
    },
  ],
  pending_deletions: ["fedcba9876543210fedcba9876543210"],
};

describe("PgIndexStore", () => {
  it("creates its tables once", async () => {
    const db = new FakeSqlDatabase();
    const store = new PgIndexStore(db, { maxIndexBytes: 1_000 });

    await store.initialize();
    await store.initialize();

    expect(db.statements.filter((sql) => sql.startsWith("CREATE TABLE"))).toHaveLength(3);
  });

  it("round-trips the manifest through its tables", async () => {
    const store = new PgIndexStore(new FakeSqlDatabase(), { maxIndexBytes: 1_000 });

    expect(await store.loadManifest()).toBeNull();
    await store.saveManifest(manifest);
    const loaded = await store.loadManifest();

    expect(loaded?.documents).toEqual(manifest.documents);
    expect(loaded?.pending_deletions).toEqual(manifest.pending_deletions);
  });

  it("stores the snapshot beside its source bytes", async () => {
    const store = new PgIndexStore(new FakeSqlDatabase(), { maxIndexBytes: 1_000 });

    await store.saveIndex(KEY, '{"snapshot":true}', Buffer.from("hello"));

    expect(await store.loadIndex(KEY)).toBe('{"snapshot":true}');
    expect((await store.loadSource(KEY))?.toString("utf-8")).toBe("hello");
    expect(await store.getStorageInfo()).toEqual({
      kind: "postgres",
      location: "kb_indexes",
      indexCount: 1,
      sizeBytes: 17,
      maxIndexBytes: 1_000,
    });

    await store.deleteIndex(KEY);
    expect(await store.loadIndex(KEY)).toBeNull();
    expect(await store.loadSource(KEY)).toBeNull();
  });

  it("keeps the previous manifest when a save fails midway", async () => {
    const db = new FakeSqlDatabase();
    const store = new PgIndexStore(db, { maxIndexBytes: 1_000 });
    await store.saveManifest(manifest);

    db.failOn = /^INSERT INTO kb_pending_deletions/;
    await expect(store.saveManifest({ ...manifest, documents: [] })).rejects.toThrow("forced failure");
    db.failOn = null;

    expect((await store.loadManifest())?.documents).toEqual(manifest.documents);
  });

  it("enforces the snapshot size limit", async () => {
    const store = new PgIndexStore(new FakeSqlDatabase(), { maxIndexBytes: 5 });

    await expect(store.saveIndex(KEY, "123456", Buffer.from("x"))).rejects.toThrow(
      "Index snapshot exceeds size limit (6 > 5 bytes).",
    );
  });

  it("ends the database on close", async () => {
    const db = new FakeSqlDatabase();
    const store = new PgIndexStore(db, { maxIndexBytes: 1_000 });

    await store.close();

    expect(db.ended).toBe(true);
  });

  it("backs a knowledge base that survives a restart", async () => {
    const db = new FakeSqlDatabase();
    const open = async () => {
      const manager = new KnowledgeBaseManager({
        store: new PgIndexStore(db, { maxIndexBytes: 1_000_000 }),
        extract: fakeExtract,
        deleteGraceMs: 0,
        logger: silentLogger,
      });
      await manager.open();
      return manager;
    };

    const first = await open();
    await first.upload(textInput("a.txt", "Alpha document."));
    await first.upload(textInput("b.txt", "Beta document."));

    const second = await open();

    expect([...second.list()].map((doc) => doc.filename)).toEqual(["a.txt", "b.txt"]);
    expect(second.getDocumentInfo("b.txt")).toMatchObject({ status: "ACTIVE", generation: 2, corrupt: false });
  });
});
