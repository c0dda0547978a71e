import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DocumentAssistant } from "../services/documentAssistant.js";
import { UpdateResult } from "../services/knowledgeBaseManager.js";
import { describeError } from "../utils/logger.js";
import { decodeBase64, normalizeFilename } from "./payload.js";
import { errorCode, jsonResult } from "./response.js";

interface FailedUpload {
  path: string;
  reason: string;
  code: string;
}

export function registerUploadDocumentsTool(server: McpServer, assistant: DocumentAssistant) {
  server.registerTool(
    "upload_documents",
    {
      title: "Upload Documents",
      description:
        "Indexes .md, .txt, .csv or .pdf documents, each into its own index. Re-uploading a known filename with new content rebuilds its index.",
      inputSchema: {
        paths: z.array(z.string()).optional().describe("Local file paths to index"),
        documents: z
          .array(
            z.object({
              filename: z.string().describe("File name including extension"),
              content_base64: z.string().describe("Raw file bytes, base64 encoded"),
            }),
          )
          .optional()
          .describe("Uploaded file payloads"),
      },
    },
    async ({ paths, documents }) => {
      const results: UpdateResult[] = [];
      const failed: FailedUpload[] = [];

      for (const filePath of paths ?? []) {
        try {
          results.push(await assistant.uploadFromPath(filePath));
        } catch (error) {
          failed.push({ path: filePath, reason: describeError(error), code: errorCode(error) });
        }
      }

      for (const [index, item] of (documents ?? []).entries()) {
        const filename = normalizeFilename(item.filename, index);
        try {
          results.push(await assistant.uploadDocument(filename, decodeBase64(item.content_base64)));
        } catch (error) {
          failed.push({ path: filename, reason: describeError(error), code: errorCode(error) });
        }
      }

      return jsonResult({
        indexed_count: results.filter((result) => result.status === "created" || result.status === "rebuilt").length,
        unchanged_count: results.filter((result) => result.status === "unchanged").length,
        results,
        failed,
      });
    },
  );
}
