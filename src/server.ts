#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import "dotenv/config";
import { createApp } from "./app.js";
import { loadConfig } from "./config/env.js";
import { McpHttpServer } from "./httpServer.js";
import { createMcpServer } from "./mcpServer.js";
import { createLogger, describeError } from "./utils/logger.js";

const logger = createLogger("server");

async function main() {
  const config = loadConfig();
  const app = await createApp(config);
  const shutdownTasks: Array<() => Promise<void>> = [app.close];

  if (config.transport === "http") {
    const http = new McpHttpServer({
      host: config.host,
      port: config.port,
      maxBodyBytes: config.maxBodyBytes,
      sessionIdleMs: config.sessionIdleMs,
      createServer: () => createMcpServer(app.assistant),
      health: () => app.assistant.getStatus(),
      logger: logger.child("http"),
    });
    await http.start();
    shutdownTasks.unshift(() => http.stop());
  } else {
    await createMcpServer(app.assistant).connect(new StdioServerTransport());
    logger.info("serving MCP over stdio");
  }

  let stopping: Promise<void> | null = null;
  const shutdown = (signal: string) => {
    stopping ??= (async () => {
      logger.info("shutting down", { signal });
      for (const task of shutdownTasks) {
        await task();
      }
    })();
    stopping.then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error("shutdown failed", { error: describeError(error) });
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  logger.error("failed to start MCP server", { error: describeError(error) });
  process.exit(1);
});
