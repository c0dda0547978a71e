import { createHash } from "node:crypto";
import { describe, expect, it } from "vitest";
import { CorruptFileError, IngestError } from "../src/domain/errors.js";
import { DocumentFormat } from "../src/domain/types.js";
import { Embedder } from "../src/infra/ai/types.js";
import { MemoryIndexStore } from "../src/infra/store/memoryIndexStore.js";
import { KnowledgeBaseManager } from "../src/services/knowledgeBaseManager.js";
import { deferred, fakeExtract, HashingEmbedder, openManager, textInput } from "./helpers/fakes.js";

const md5 = (text: string) => createHash("md5").update(Buffer.from(text, "utf-8")).digest("hex");
const fixedNow = () => new Date("2024-03-01T00:00:00.000Z");

describe("KnowledgeBaseManager", () => {
  it("keys documents by the MD5 of their bytes", async () => {
    const { manager } = await openManager();

    const key = await manager.upload(textInput("notes.txt", "Alpha beta gamma."));

    expect(key).toBe(md5("Alpha beta gamma."));
    expect([...manager.list()].map((doc) => doc.filename)).toEqual(["notes.txt"]);
  });

  it("treats a repeated upload of the same bytes as a no-op", async () => {
    const { manager } = await openManager();
    const input = textInput("notes.txt", "Alpha beta gamma.");

    const first = await manager.ingest(input);
    const before = manager.getDocumentInfo("notes.txt");
    const second = await manager.ingest(input);
    const renamed = await manager.ingest({ ...input, filename: "copy.txt" });

    expect(first).toEqual({ status: "created", key: md5("Alpha beta gamma."), filename: "notes.txt", generation: 1 });
    expect(second).toEqual({ status: "unchanged", key: first.key, filename: "notes.txt" });
    expect(renamed).toEqual({ status: "unchanged", key: first.key, filename: "notes.txt" });
    expect(manager.getDocumentInfo("notes.txt")).toEqual(before);
    expect([...manager.list()]).toHaveLength(1);
  });

  it("rebuilds only the updated document", async () => {
    const { manager } = await openManager({ embedder: new HashingEmbedder() });
    await manager.upload(textInput("a.txt", "Apples grow on trees."));
    await manager.upload(textInput("b.txt", "Bananas grow in bunches."));
    const fingerprintA = manager.getDocumentInfo("a.txt")?.fingerprint;

    const result = await manager.update("b.txt", textInput("b.txt", "Bananas are yellow."));

    expect(result).toEqual({
      status: "rebuilt",
      key: md5("Bananas are yellow."),
      previousKey: md5("Bananas grow in bunches."),
      filename: "b.txt",
      generation: 3,
    });
    expect(manager.getDocumentInfo("a.txt")?.fingerprint).toBe(fingerprintA);
    expect(manager.getDocumentInfo("a.txt")?.generation).toBe(1);
    expect(manager.findByFilename("b.txt")?.key).toBe(md5("Bananas are yellow."));
  });

  it("turns an upload of a known filename with new bytes into an update", async () => {
    const { manager } = await openManager();
    await manager.upload(textInput("a.txt", "first version"));

    const result = await manager.ingest(textInput("a.txt", "second version"));

    expect(result.status).toBe("rebuilt");
    expect([...manager.list()].map((doc) => doc.key)).toEqual([md5("second version")]);
  });

  it("skips unchanged content unless forced", async () => {
    const { manager } = await openManager();
    const input = textInput("a.txt", "stable content");
    const key = await manager.upload(input);

    const skipped = await manager.update("a.txt", input);
    const forced = await manager.update("a.txt", input, { force: true });

    expect(skipped).toEqual({ status: "unchanged", key, filename: "a.txt" });
    expect(forced).toEqual({ status: "rebuilt", key, previousKey: key, filename: "a.txt", generation: 2 });
    expect(manager.getDocumentInfo("a.txt")?.status).toBe("ACTIVE");
  });

  it("ingests an update for an unknown filename as a new document", async () => {
    const { manager } = await openManager();

    const result = await manager.update("new.txt", textInput("new.txt", "fresh"));

    expect(result.status).toBe("created");
  });

  it("rejects an update whose content already belongs to another document", async () => {
    const { manager } = await openManager();
    await manager.upload(textInput("a.txt", "shared text"));
    const keyB = await manager.upload(textInput("b.txt", "other text"));

    await expect(manager.update("b.txt", textInput("b.txt", "shared text"))).rejects.toBeInstanceOf(IngestError);
    expect(manager.findByFilename("b.txt")?.key).toBe(keyB);
    expect(manager.getDocumentInfo("b.txt")?.status).toBe("ACTIVE");
  });

  it("leaves the previous index active when a rebuild fails", async () => {
    const extract = async (bytes: Buffer, format: DocumentFormat) => {
      if (bytes.toString("utf-8").includes("broken")) {
        throw new Error("parser exploded");
      }
      return fakeExtract(bytes, format);
    };
    const { manager } = await openManager({ extract });
    const key = await manager.upload(textInput("a.txt", "good content"));

    await expect(manager.update("a.txt", textInput("a.txt", "broken content"))).rejects.toThrow(
      "Failed to index a.txt: parser exploded",
    );

    const lookup = await manager.getIndex(key);
    expect(lookup.status).toBe("found");
    expect(manager.getDocumentInfo("a.txt")).toMatchObject({ status: "ACTIVE", document: { key } });
  });

  it("surfaces extraction errors as typed ingest errors", async () => {
    const { manager } = await openManager();

    await expect(manager.upload(textInput("empty.txt", "   \n\n  "))).rejects.toBeInstanceOf(CorruptFileError);
    expect([...manager.list()]).toEqual([]);
  });

  it("fails the build when the embedder returns the wrong number of vectors", async () => {
    const embedder: Embedder = {
      embedTexts: async () => [],
      embedQuery: async () => [1],
    };
    const { manager } = await openManager({ embedder });

    await expect(manager.upload(textInput("a.txt", "some text"))).rejects.toThrow("Embedding count mismatch");
  });

  it("serves the old index until the new one is published", async () => {
    const gate = deferred<void>();
    const extract = async (bytes: Buffer, format: DocumentFormat) => {
      if (bytes.toString("utf-8").startsWith("slow")) {
        await gate.promise;
      }
      return fakeExtract(bytes, format);
    };
    const { manager } = await openManager({ extract });
    const oldKey = await manager.upload(textInput("a.txt", "old content"));

    const pending = manager.update("a.txt", textInput("a.txt", "slow new content"));

    expect(manager.getDocumentInfo("a.txt")?.status).toBe("REBUILDING");
    const during = await manager.getIndex(oldKey);
    expect(during.status).toBe("found");
    expect(manager.stats().inflightBuilds).toBe(1);

    gate.resolve();
    const result = await pending;

    expect(result.status).toBe("rebuilt");
    expect((await manager.getIndex(oldKey)).status).toBe("not_found");
    expect((await manager.getIndex(md5("slow new content"))).status).toBe("found");
    expect(manager.getDocumentInfo("a.txt")?.status).toBe("ACTIVE");
  });

  it("lets the latest update win over an in-flight one", async () => {
    const gate = deferred<void>();
    const extract = async (bytes: Buffer, format: DocumentFormat) => {
      if (bytes.toString("utf-8").startsWith("slow")) {
        await gate.promise;
      }
      return fakeExtract(bytes, format);
    };
    const { manager } = await openManager({ extract });
    await manager.upload(textInput("a.txt", "version one"));

    const slow = manager.update("a.txt", textInput("a.txt", "slow version two"));
    const fast = await manager.update("a.txt", textInput("a.txt", "version three"));
    gate.resolve();

    expect(fast.status).toBe("rebuilt");
    expect(await slow).toEqual({ status: "superseded", key: md5("slow version two"), filename: "a.txt" });
    expect(manager.findByFilename("a.txt")?.key).toBe(md5("version three"));
  });

  it.each([
    ["update", (manager: KnowledgeBaseManager) => manager.update("a.txt", textInput("a.txt", "version one"))],
    ["ingest", (manager: KnowledgeBaseManager) => manager.ingest(textInput("a.txt", "version one"))],
  ] as const)("keeps the published content when %s re-sends it during a rebuild", async (_name, resend) => {
    const gate = deferred<void>();
    const extract = async (bytes: Buffer, format: DocumentFormat) => {
      if (bytes.toString("utf-8").startsWith("slow")) {
        await gate.promise;
      }
      return fakeExtract(bytes, format);
    };
    const { manager } = await openManager({ extract });
    await manager.upload(textInput("a.txt", "version one"));

    const slow = manager.update("a.txt", textInput("a.txt", "slow version two"));
    expect(manager.getDocumentInfo("a.txt")?.status).toBe("REBUILDING");
    const again = await resend(manager);
    gate.resolve();

    expect(again).toEqual({ status: "unchanged", key: md5("version one"), filename: "a.txt" });
    expect(await slow).toEqual({ status: "superseded", key: md5("slow version two"), filename: "a.txt" });
    expect(manager.findByFilename("a.txt")?.key).toBe(md5("version one"));
    expect(manager.getDocumentInfo("a.txt")?.status).toBe("ACTIVE");
    expect(manager.stats().inflightBuilds).toBe(0);
  });

  it("hides a deleted document at once and reclaims its storage later", async () => {
    const { manager, store } = await openManager();
    const key = await manager.upload(textInput("a.txt", "to be removed"));

    const result = await manager.delete(key);

    expect(result).toEqual({ status: "deleted", key, filename: "a.txt" });
    expect([...manager.list()]).toEqual([]);
    expect(manager.getDocumentInfo("a.txt")).toBeNull();
    expect((await manager.getIndex(key)).status).toBe("not_found");
    expect(await manager.delete(key)).toEqual({ status: "not_found", key });

    await manager.flushReclamation();
    expect(store.hasIndex(key)).toBe(false);
    expect((await store.loadManifest())?.pending_deletions).toEqual([]);
  });

  it("reclaims the storage of a replaced index", async () => {
    const { manager, store } = await openManager();
    const oldKey = await manager.upload(textInput("a.txt", "before"));
    await manager.update("a.txt", textInput("a.txt", "after"));

    await manager.flushReclamation();

    expect(store.hasIndex(oldKey)).toBe(false);
    expect(store.hasIndex(md5("after"))).toBe(true);
  });

  it("restores published indexes when reopened", async () => {
    const store = new MemoryIndexStore();
    const first = await openManager({ store, now: fixedNow });
    await first.manager.upload(textInput("a.txt", "persisted alpha"));
    await first.manager.upload(textInput("b.txt", "persisted beta"));
    const info = first.manager.getDocumentInfo("b.txt");

    const second = await openManager({ store, now: fixedNow });

    expect([...second.manager.list()].map((doc) => doc.filename)).toEqual(["a.txt", "b.txt"]);
    expect(second.manager.getDocumentInfo("b.txt")).toEqual(info);
    const created = await second.manager.ingest(textInput("c.txt", "persisted gamma"));
    expect(created).toMatchObject({ status: "created", generation: 3 });
  });

  it("rebuilds a corrupt persisted index from its stored source", async () => {
    const store = new MemoryIndexStore();
    const first = await openManager({ store, now: fixedNow });
    const key = await first.manager.upload(textInput("a.txt", "Recoverable content here."));
    const fingerprint = first.manager.getDocumentInfo(key)?.fingerprint;
    store.corruptIndex(key, "{not json");

    const second = await openManager({ store, now: fixedNow });
    expect(second.manager.getDocumentInfo(key)).toMatchObject({ corrupt: true, fingerprint: null });

    const lookup = await second.manager.getIndex(key);

    expect(lookup.status).toBe("found");
    expect(second.manager.getDocumentInfo(key)).toMatchObject({ corrupt: false, fingerprint });
  });

  it("reports documents that cannot be repaired instead of failing the whole search", async () => {
    const store = new MemoryIndexStore();
    const first = await openManager({ store });
    await first.manager.upload(textInput("a.txt", "healthy document"));
    const badKey = await first.manager.upload(textInput("b.txt", "damaged document"));
    await store.deleteIndex(badKey);

    const second = await openManager({ store });
    const searchable = await second.manager.searchableIndexes();

    expect(searchable.indexes.map((index) => index.document.filename)).toEqual(["a.txt"]);
    expect(searchable.failures).toEqual([
      { key: badKey, filename: "b.txt", reason: "Index for b.txt is corrupt and its source is missing." },
    ]);
  });

  it("refuses work after close", async () => {
    const { manager } = await openManager();
    await manager.close();

    await expect(manager.upload(textInput("a.txt", "late"))).rejects.toThrow("KnowledgeBaseManager is closed.");
  });
});
