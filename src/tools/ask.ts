import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { MAX_FALLBACK_RATIO, MIN_FALLBACK_RATIO } from "../services/relevanceEvaluator.js";
import { DocumentAssistant } from "../services/documentAssistant.js";
import { errorResult, jsonResult } from "./response.js";

export function registerAskTool(server: McpServer, assistant: DocumentAssistant) {
  server.registerTool(
    "ask",
    {
      title: "Ask",
      description:
        "Answers a question from one document or from every document, with citations. Follow-up questions in the same session see the recent turns.",
      inputSchema: {
        question: z.string().min(1).describe("Question for the indexed documents"),
        document: z.string().optional().describe("Filename or key to restrict retrieval to one document"),
        mode: z
          .enum(["fast", "intelligent"])
          .optional()
          .describe("fast skips relevance filtering; defaults to fast for one document and intelligent for all"),
        top_k: z.number().int().min(1).max(50).optional().describe("Candidate count"),
        fallback_ratio: z
          .number()
          .min(MIN_FALLBACK_RATIO)
          .max(MAX_FALLBACK_RATIO)
          .optional()
          .describe("Share of top_k kept when no candidate is confirmed relevant"),
        session_id: z.string().min(1).optional().describe("Conversation session"),
      },
    },
    async ({ question, document, mode, top_k, fallback_ratio, session_id }) => {
      try {
        const result = await assistant.ask(question, {
          document,
          mode,
          topK: top_k,
          fallbackRatio: fallback_ratio,
          sessionId: session_id,
        });
        if (result.status === "not_found") {
          return jsonResult(result);
        }
        return jsonResult({
          status: result.status,
          answer: result.answer,
          citations: result.citations,
          answer_source: result.answerSource,
          answer_generation_mode: result.answerMode,
          retrieval: result.retrieval,
          session_id: result.sessionId,
          latency_ms: result.latencyMs,
        });
      } catch (error) {
        return errorResult(error);
      }
    },
  );
}
