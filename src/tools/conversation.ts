import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DocumentAssistant } from "../services/documentAssistant.js";
import { jsonResult } from "./response.js";

export function registerConversationTools(server: McpServer, assistant: DocumentAssistant) {
  server.registerTool(
    "clear_conversation",
    {
      title: "Clear Conversation",
      description: "Forgets the recent turns of a session.",
      inputSchema: {
        session_id: z.string().min(1).optional().describe("Conversation session"),
      },
    },
    async ({ session_id }) => {
      const previousTurns = assistant.getConversation(session_id).length;
      const cleared = assistant.clearConversation(session_id);
      return jsonResult({ cleared, previous_turns: previousTurns });
    },
  );
}
