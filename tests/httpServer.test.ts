import { Readable } from "node:stream";
import { describe, expect, it } from "vitest";
import { createApp } from "../src/app.js";
import { HttpError, McpHttpServer, readJsonBody } from "../src/httpServer.js";
import { createMcpServer } from "../src/mcpServer.js";
import { fakeExtract, silentLogger, testConfig } from "./helpers/fakes.js";

function body(...chunks: string[]): Readable {
  return Readable.from(chunks.map((chunk) => Buffer.from(chunk, "utf-8")));
}

describe("readJsonBody", () => {
  it("parses a body split across chunks", async () => {
    await expect(readJsonBody(body('{"jsonrpc":', '"2.0","id":1}'), 1024)).resolves.toEqual({ jsonrpc: "2.0", id: 1 });
  });

  it("reads an empty body as an empty object", async () => {
    await expect(readJsonBody(body("  "), 1024)).resolves.toEqual({});
  });

  it("rejects a body over the limit with 413", async () => {
    const error = await readJsonBody(body("12345", "67890"), 8).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ status: 413, message: "Request body exceeds 8 bytes." });
  });

  it("rejects malformed JSON with 400", async () => {
    const error = await readJsonBody(body("{not json"), 1024).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ status: 400 });
  });
});

describe("McpHttpServer", () => {
  it("starts with no sessions and stops cleanly before start", async () => {
    const app = await createApp(testConfig(), { extract: fakeExtract });
    const http = new McpHttpServer({
      host: "127.0.0.1",
      port: 0,
      maxBodyBytes: 1024,
      sessionIdleMs: 1000,
      createServer: () => createMcpServer(app.assistant),
      health: () => app.assistant.getStatus(),
      logger: silentLogger,
    });

    await http.closeIdleSessions(Date.now());
    await http.stop();

    expect(http.sessionCount).toBe(0);
    await app.close();
  });
});
