import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { promises as fs } from "node:fs";
import { z } from "zod";
import { DocumentAssistant } from "../services/documentAssistant.js";
import { decodeBase64 } from "./payload.js";
import { errorResult, jsonResult } from "./response.js";

export function registerUpdateDocumentTool(server: McpServer, assistant: DocumentAssistant) {
  server.registerTool(
    "update_document",
    {
      title: "Update Document",
      description:
        "Replaces the content of an indexed document. Unchanged content is a no-op unless force is set. Other documents are never touched.",
      inputSchema: {
        filename: z.string().min(1).describe("Filename of the document to update"),
        path: z.string().optional().describe("Local file to read the new content from"),
        content_base64: z.string().optional().describe("New raw file bytes, base64 encoded"),
        force: z.boolean().optional().describe("Rebuild even when the content hash is unchanged"),
      },
    },
    async ({ filename, path, content_base64, force }) => {
      try {
        if ((path === undefined) === (content_base64 === undefined)) {
          throw new RangeError("Provide exactly one of path or content_base64.");
        }
        const bytes = path !== undefined ? await fs.readFile(path) : decodeBase64(content_base64 ?? "");
        return jsonResult(await assistant.updateDocument(filename, bytes, { force }));
      } catch (error) {
        return errorResult(error);
      }
    },
  );
}
