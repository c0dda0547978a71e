import { z } from "zod";
import { ChatMessage } from "./prompts.js";

interface OpenAiClientOptions {
  apiKey: string | null;
  baseUrl: string;
  embeddingModel: string;
  chatModel: string;
}

export interface ChatOptions {
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int(),
    }),
  ),
});

const chatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable().optional(),
      }),
    }),
  ),
});

/** Minimal client for any OpenAI-compatible endpoint. */
export class OpenAiClient {
  private readonly baseUrl: string;

  constructor(private readonly options: OpenAiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
  }

  isConfigured(): boolean {
    return Boolean(this.options.apiKey);
  }

  async embedTexts(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    const apiKey = this.requireApiKey();

    const response = await fetch(`${this.baseUrl}/embeddings`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.embeddingModel,
        input: texts,
      }),
      signal,
    });

    if (!response.ok) {
      throw new Error(`OpenAI embeddings failed (${response.status}): ${await response.text()}`);
    }

    const data = embeddingResponseSchema.parse(await response.json());
    if (data.data.length !== texts.length) {
      throw new Error(`OpenAI embeddings returned ${data.data.length} vectors for ${texts.length} inputs.`);
    }
    return [...data.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }

  async embedQuery(query: string, signal?: AbortSignal): Promise<number[]> {
    const [embedding] = await this.embedTexts([query], signal);
    if (!embedding || embedding.length === 0) {
      throw new Error("OpenAI embeddings returned empty vector.");
    }
    return embedding;
  }

  async chat(messages: ChatMessage[], options: ChatOptions = {}): Promise<string> {
    const apiKey = this.requireApiKey();

    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.chatModel,
        temperature: options.temperature ?? 0.2,
        ...(options.maxTokens ? { max_tokens: options.maxTokens } : {}),
        messages,
      }),
      signal: options.signal,
    });

    if (!response.ok) {
      throw new Error(`OpenAI chat failed (${response.status}): ${await response.text()}`);
    }

    const data = chatResponseSchema.parse(await response.json());
    return data.choices[0]?.message.content?.trim() ?? "";
  }

  private requireApiKey(): string {
    if (!this.options.apiKey) {
      throw new Error("OPENAI_API_KEY is required for OpenAI operations.");
    }
    return this.options.apiKey;
  }
}
