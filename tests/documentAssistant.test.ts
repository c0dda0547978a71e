import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { App, createApp } from "../src/app.js";
import { NO_CONTEXT_ANSWER } from "../src/pipelines/answering.js";
import { RecordingAnswerGenerator, fakeExtract, testConfig } from "./helpers/fakes.js";

describe("DocumentAssistant", () => {
  let app: App;
  let generator: RecordingAnswerGenerator;

  beforeEach(async () => {
    generator = new RecordingAnswerGenerator();
    app = await createApp(testConfig({ HISTORY_TURNS: "2" }), {
      extract: fakeExtract,
      capabilities: {
        answerMode: "openai",
        embedder: null,
        judge: null,
        answerGenerator: generator,
        queryRewriter: null,
      },
    });
    await app.assistant.uploadDocument("apples.txt", Buffer.from("Apples ripen in autumn.", "utf-8"));
  });

  afterEach(async () => {
    await app.close();
  });

  it("answers with the configured model", async () => {
    const result = await app.assistant.ask("When do apples ripen?", { document: "apples.txt" });

    expect(result).toMatchObject({
      status: "ok",
      answer: "Answer from 1 chunks: apples.txt",
      answerSource: "generated",
      answerMode: "openai",
    });
    expect(generator.calls[0]?.contexts).toEqual([
      { source: "apples.txt", chunkIndex: 0, snippet: "Apples ripen in autumn." },
    ]);
  });

  it("falls back to the extractive answer when generation fails", async () => {
    generator.fail = true;

    const result = await app.assistant.ask("When do apples ripen?", { document: "apples.txt" });

    expect(result).toMatchObject({
      status: "ok",
      answerSource: "extractive",
      answer: [
        "Question: When do apples ripen?",
        "Context-grounded summary:",
        "1. Apples ripen in autumn. (source: apples.txt#0)",
      ].join("\n"),
    });
  });

  it("skips the model when nothing was retrieved", async () => {
    const result = await app.assistant.ask("zzz", { document: "apples.txt" });

    expect(result).toMatchObject({ status: "ok", answer: NO_CONTEXT_ANSWER, answerSource: "extractive" });
    expect(generator.calls).toEqual([]);
  });

  it("passes the bounded history to the model and records each turn", async () => {
    for (const question of ["first apples?", "second apples?", "third apples?"]) {
      await app.assistant.ask(question, { document: "apples.txt", sessionId: "s" });
    }

    expect(generator.calls.map((call) => call.historyLength)).toEqual([0, 1, 2]);
    expect(app.assistant.getConversation("s").map((turn) => turn.question)).toEqual([
      "second apples?",
      "third apples?",
    ]);
    expect(app.assistant.getConversation("s")[1]?.citedChunkIds).toHaveLength(1);
    expect(app.assistant.getConversation()).toEqual([]);
  });

  it("deletes by filename or key", async () => {
    const other = await app.assistant.uploadDocument("pears.txt", Buffer.from("Pears ripen late.", "utf-8"));

    expect(await app.assistant.deleteDocument("apples.txt")).toMatchObject({ status: "deleted", filename: "apples.txt" });
    expect(await app.assistant.deleteDocument(other.key)).toMatchObject({ status: "deleted", filename: "pears.txt" });
    expect(app.assistant.listDocuments()).toEqual([]);
  });

  it("reports status counters", async () => {
    await app.assistant.ask("When do apples ripen?", { sessionId: "a" });

    const status = await app.assistant.getStatus();

    expect(status).toMatchObject({
      documents: 1,
      rebuilding: 0,
      corrupt: 0,
      answerMode: "openai",
      embeddingEnabled: false,
      judgeEnabled: false,
      sessions: 1,
      storage: { kind: "memory", indexCount: 1 },
    });
  });
});
