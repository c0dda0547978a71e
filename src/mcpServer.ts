import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DocumentAssistant } from "./services/documentAssistant.js";
import { registerAskTool } from "./tools/ask.js";
import { registerConversationTools } from "./tools/conversation.js";
import { registerDeleteDocumentTool } from "./tools/deleteDocument.js";
import { registerListDocumentsTool } from "./tools/listDocuments.js";
import { jsonResult } from "./tools/response.js";
import { registerUpdateDocumentTool } from "./tools/updateDocument.js";
import { registerUploadDocumentsTool } from "./tools/uploadDocuments.js";

export const SERVER_NAME = "doc-memory";
export const SERVER_VERSION = "0.1.0";

export function createMcpServer(assistant: DocumentAssistant): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns server status and knowledge base counters.",
      inputSchema: {
        name: z.string().optional().describe("Optional caller name"),
      },
    },
    async ({ name }) => {
      const who = name?.trim() || "anonymous";
      return jsonResult({
        message: `${SERVER_NAME} is running. hello ${who}`,
        status: await assistant.getStatus(),
      });
    },
  );

  registerUploadDocumentsTool(server, assistant);
  registerUpdateDocumentTool(server, assistant);
  registerDeleteDocumentTool(server, assistant);
  registerListDocumentsTool(server, assistant);
  registerAskTool(server, assistant);
  registerConversationTools(server, assistant);

  return server;
}
