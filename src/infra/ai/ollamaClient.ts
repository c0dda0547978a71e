import { z } from "zod";
import { mapWithConcurrency } from "../../utils/concurrency.js";
import { ChatOptions } from "./openAiClient.js";
import { ChatMessage } from "./prompts.js";

interface OllamaClientOptions {
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
}

const embeddingsResponseSchema = z.object({
  embedding: z.array(z.number()).optional(),
});

const chatResponseSchema = z.object({
  message: z
    .object({
      content: z.string().optional(),
    })
    .optional(),
});

const EMBEDDING_CONCURRENCY = 4;

export class OllamaClient {
  private readonly baseUrl: string;

  constructor(private readonly options: OllamaClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
  }

  async embedTexts(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    return mapWithConcurrency(texts, EMBEDDING_CONCURRENCY, (text) => this.embedQuery(text, signal));
  }

  async embedQuery(query: string, signal?: AbortSignal): Promise<number[]> {
    const response = await fetch(`${this.baseUrl}/api/embeddings`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.embeddingModel,
        prompt: query,
      }),
      signal,
    });

    if (!response.ok) {
      throw new Error(`Ollama embeddings failed (${response.status}): ${await response.text()}`);
    }

    const data = embeddingsResponseSchema.parse(await response.json());
    if (!data.embedding || data.embedding.length === 0) {
      throw new Error("Ollama embeddings returned empty vector.");
    }
    return data.embedding;
  }

  async chat(messages: ChatMessage[], options: ChatOptions = {}): Promise<string> {
    const response = await fetch(`${this.baseUrl}/api/chat`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.chatModel,
        stream: false,
        keep_alive: "30m",
        options: {
          temperature: options.temperature ?? 0.1,
          num_predict: options.maxTokens ?? 400,
          top_p: 0.9,
        },
        messages,
      }),
      signal: options.signal,
    });

    if (!response.ok) {
      throw new Error(`Ollama chat failed (${response.status}): ${await response.text()}`);
    }

    const data = chatResponseSchema.parse(await response.json());
    return data.message?.content?.trim() ?? "";
  }
}
