import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DocumentAssistant } from "../services/documentAssistant.js";
import { jsonResult } from "./response.js";

export function registerListDocumentsTool(server: McpServer, assistant: DocumentAssistant) {
  server.registerTool(
    "list_documents",
    {
      title: "List Documents",
      description: "Lists indexed documents ordered by filename.",
      inputSchema: {},
    },
    async () => {
      const documents = assistant.listDocuments();
      return jsonResult({ count: documents.length, documents });
    },
  );

  server.registerTool(
    "document_info",
    {
      title: "Document Info",
      description: "Returns metadata, index status and fingerprint of one document.",
      inputSchema: {
        document: z.string().min(1).describe("Filename or key of the document"),
      },
    },
    async ({ document }) => {
      const info = assistant.getDocumentInfo(document);
      if (!info) {
        return jsonResult({ status: "not_found", document });
      }
      return jsonResult({
        status: "found",
        document: info.document,
        index_status: info.status,
        generation: info.generation,
        fingerprint: info.fingerprint,
        corrupt: info.corrupt,
      });
    },
  );
}
