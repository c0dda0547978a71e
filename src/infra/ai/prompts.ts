import { ConversationTurn } from "../../domain/types.js";
import { truncate } from "../../utils/text.js";
import { RetrievedContext } from "./types.js";

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

const HISTORY_ANSWER_CHARS = 400;

export function buildAnswerMessages(
  question: string,
  contexts: RetrievedContext[],
  history: readonly ConversationTurn[],
): ChatMessage[] {
  const preferredLanguage = detectPreferredLanguage(question);
  const contextBlock = contexts
    .map((context, idx) => `[${idx + 1}] source=${context.source}#${context.chunkIndex}\n${context.snippet}`)
    .join("\n\n");

  const messages: ChatMessage[] = [
    {
      role: "system",
      content: [
        "You are a strict document assistant.",
        "Answer only from provided context.",
        "If context is insufficient, say it clearly.",
        `Respond only in ${preferredLanguage.label}. Do not mix other languages.`,
        "Keep the answer concise and include citations like [1], [2].",
      ].join(" "),
    },
  ];

  for (const turn of history) {
    messages.push({ role: "user", content: turn.question });
    messages.push({ role: "assistant", content: truncate(turn.answer, HISTORY_ANSWER_CHARS) });
  }

  messages.push({
    role: "user",
    content: `Question:\n${question}\n\nContext:\n${contextBlock}\n\nOutput rules:\n1) Use only ${preferredLanguage.label}.\n2) Cite evidence as [1], [2].\n3) If unsure, explicitly say you do not have enough context.`,
  });
  return messages;
}

export function buildRewriteMessages(question: string, history: readonly ConversationTurn[]): ChatMessage[] {
  const transcript = history
    .map((turn) => `User: ${turn.question}\nAssistant: ${truncate(turn.answer, HISTORY_ANSWER_CHARS)}`)
    .join("\n\n");

  return [
    {
      role: "system",
      content:
        "Rewrite the user's latest question into one standalone search query that needs no conversation to understand. Keep names, years and numbers. Return only the query.",
    },
    {
      role: "user",
      content: `Conversation:\n${transcript}\n\nLatest question:\n${question}`,
    },
  ];
}

export function detectPreferredLanguage(question: string): { code: string; label: string } {
  if (/[ㄱ-ㆎ가-힣]/.test(question)) {
    return { code: "ko", label: "Korean" };
  }
  if (/[぀-ゟ゠-ヿ]/.test(question)) {
    return { code: "ja", label: "Japanese" };
  }
  if (/[一-鿿]/.test(question)) {
    return { code: "zh", label: "Chinese" };
  }
  if (/[¿¡áéíóúñü]/i.test(question)) {
    return { code: "es", label: "Spanish" };
  }
  return { code: "en", label: "English" };
}
