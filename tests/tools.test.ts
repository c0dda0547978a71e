import { createHash } from "node:crypto";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { App, createApp } from "../src/app.js";
import { createMcpServer } from "../src/mcpServer.js";
import { fakeExtract, judgeByKeyword, testConfig } from "./helpers/fakes.js";

const toolResultSchema = z.object({
  content: z.array(z.object({ type: z.literal("text"), text: z.string() })).min(1),
  isError: z.boolean().optional(),
});

const base64 = (text: string) => Buffer.from(text, "utf-8").toString("base64");
const md5 = (text: string) => createHash("md5").update(Buffer.from(text, "utf-8")).digest("hex");

const APPLES = "Apples ripen in autumn.";
const BANANAS = "Bananas ripen in summer.";

describe("MCP tools", () => {
  let app: App;
  let client: Client;

  const call = async (name: string, args: Record<string, unknown> = {}) => {
    const result = toolResultSchema.parse(await client.callTool({ name, arguments: args }));
    const payload: unknown = JSON.parse(result.content[0].text);
    return { payload, isError: result.isError ?? false };
  };

  const uploadFruit = () =>
    call("upload_documents", {
      documents: [
        { filename: "apples.txt", content_base64: base64(APPLES) },
        { filename: "bananas.txt", content_base64: base64(BANANAS) },
      ],
    });

  beforeEach(async () => {
    app = await createApp(testConfig(), {
      extract: fakeExtract,
      capabilities: {
        answerMode: "client_llm",
        embedder: null,
        judge: judgeByKeyword("banana"),
        answerGenerator: null,
        queryRewriter: null,
      },
    });
    const server = createMcpServer(app.assistant);
    client = new Client({ name: "test-client", version: "1.0.0" });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await app.close();
  });

  it("lists every tool", async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([
      "ask",
      "clear_conversation",
      "delete_document",
      "document_info",
      "health_check",
      "list_documents",
      "update_document",
      "upload_documents",
    ]);
  });

  it("reports health with knowledge base counters", async () => {
    await uploadFruit();

    const { payload } = await call("health_check", { name: "tester" });

    expect(payload).toMatchObject({
      message: "doc-memory is running. hello tester",
      status: { documents: 2, answerMode: "client_llm", judgeEnabled: true, embeddingEnabled: false },
    });
  });

  it("indexes uploads and reports the ones that fail", async () => {
    const { payload } = await call("upload_documents", {
      documents: [
        { filename: "apples.txt", content_base64: base64(APPLES) },
        { filename: "sheet.xlsx", content_base64: base64("cells") },
        { filename: "broken.txt", content_base64: "###" },
      ],
    });

    expect(payload).toEqual({
      indexed_count: 1,
      unchanged_count: 0,
      results: [{ status: "created", key: md5(APPLES), filename: "apples.txt", generation: 1 }],
      failed: [
        {
          path: "sheet.xlsx",
          reason: "Unsupported format: xlsx. Allowed: .md, .txt, .csv, .pdf",
          code: "unsupported_format",
        },
        { path: "broken.txt", reason: "Invalid base64 payload.", code: "ingest_failed" },
      ],
    });
  });

  it("counts a repeated upload as unchanged", async () => {
    await uploadFruit();

    const { payload } = await uploadFruit();

    expect(payload).toMatchObject({ indexed_count: 0, unchanged_count: 2 });
  });

  it("lists documents by filename", async () => {
    await uploadFruit();

    const { payload } = await call("list_documents");

    expect(payload).toMatchObject({
      count: 2,
      documents: [{ filename: "apples.txt" }, { filename: "bananas.txt" }],
    });
  });

  it("answers from one document with citations", async () => {
    await uploadFruit();

    const { payload } = await call("ask", { question: "When do apples ripen?", document: "apples.txt" });

    expect(payload).toMatchObject({
      status: "ok",
      answer: [
        "Question: When do apples ripen?",
        "Context-grounded summary:",
        "1. Apples ripen in autumn. (source: apples.txt#0)",
      ].join("\n"),
      answer_source: "extractive",
      answer_generation_mode: "client_llm",
      citations: [{ source: "apples.txt", chunk_index: 0, relevance: "unevaluated" }],
      retrieval: { mode: "fast", scope: "document" },
      session_id: "default",
    });
  });

  it("filters candidates with the judge across all documents", async () => {
    await uploadFruit();

    const { payload } = await call("ask", { question: "What ripens in summer?" });

    expect(payload).toMatchObject({
      status: "ok",
      citations: [{ source: "bananas.txt", relevance: "confirmed" }],
      retrieval: { mode: "intelligent", scope: "all", fallbackUsed: false, degraded: [] },
    });
  });

  it("reports a document that is not indexed", async () => {
    const { payload, isError } = await call("ask", { question: "anything?", document: "missing.txt" });

    expect(isError).toBe(false);
    expect(payload).toEqual({ status: "not_found", document: "missing.txt" });
  });

  it("returns invalid arguments as tool errors", async () => {
    const { payload, isError } = await call("ask", { question: "   " });

    expect(isError).toBe(true);
    expect(payload).toEqual({ error: "question must not be empty.", code: "invalid_argument" });
  });

  it("clears a session's conversation", async () => {
    await uploadFruit();
    await call("ask", { question: "When do apples ripen?", session_id: "s1" });
    await call("ask", { question: "And bananas?", session_id: "s1" });

    expect((await call("clear_conversation", { session_id: "s1" })).payload).toEqual({
      cleared: true,
      previous_turns: 2,
    });
    expect((await call("clear_conversation", { session_id: "s1" })).payload).toEqual({
      cleared: false,
      previous_turns: 0,
    });
  });

  it("rebuilds a document on update", async () => {
    await uploadFruit();

    const { payload } = await call("update_document", {
      filename: "apples.txt",
      content_base64: base64("Apples ripen in late autumn."),
    });

    expect(payload).toEqual({
      status: "rebuilt",
      key: md5("Apples ripen in late autumn."),
      previousKey: md5(APPLES),
      filename: "apples.txt",
      generation: 3,
    });
  });

  it("requires exactly one content source for an update", async () => {
    const { payload, isError } = await call("update_document", { filename: "apples.txt" });

    expect(isError).toBe(true);
    expect(payload).toEqual({ error: "Provide exactly one of path or content_base64.", code: "invalid_argument" });
  });

  it("deletes a document by filename", async () => {
    await uploadFruit();

    const deleted = await call("delete_document", { document: "apples.txt" });
    const info = await call("document_info", { document: "apples.txt" });
    const remaining = await call("document_info", { document: "bananas.txt" });

    expect(deleted.payload).toEqual({ status: "deleted", key: md5(APPLES), filename: "apples.txt" });
    expect(info.payload).toEqual({ status: "not_found", document: "apples.txt" });
    expect(remaining.payload).toMatchObject({
      status: "found",
      index_status: "ACTIVE",
      generation: 2,
      corrupt: false,
      document: { filename: "bananas.txt", key: md5(BANANAS) },
    });
  });
});
