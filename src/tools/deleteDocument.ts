import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DocumentAssistant } from "../services/documentAssistant.js";
import { errorResult, jsonResult } from "./response.js";

export function registerDeleteDocumentTool(server: McpServer, assistant: DocumentAssistant) {
  server.registerTool(
    "delete_document",
    {
      title: "Delete Document",
      description: "Removes a document from retrieval immediately; its storage is reclaimed shortly after.",
      inputSchema: {
        document: z.string().min(1).describe("Filename or key of the document"),
      },
    },
    async ({ document }) => {
      try {
        return jsonResult(await assistant.deleteDocument(document));
      } catch (error) {
        return errorResult(error);
      }
    },
  );
}
