import { AppConfig } from "../../config/env.js";
import { ConversationTurn } from "../../domain/types.js";
import { EmbeddingServiceError, JudgeServiceError, isAbortError } from "../../domain/errors.js";
import { buildRelevancePrompt, parseRelevanceVerdict } from "../../pipelines/relevance.js";
import { Logger, createLogger, describeError } from "../../utils/logger.js";
import { withRetry } from "../../utils/retry.js";
import { OllamaClient } from "./ollamaClient.js";
import { ChatOptions, OpenAiClient } from "./openAiClient.js";
import { ChatMessage, buildAnswerMessages, buildRewriteMessages } from "./prompts.js";
import {
  AiCapabilities,
  AnswerGenerator,
  AnswerMode,
  Embedder,
  QueryRewriter,
  RelevanceJudge,
  RelevanceVerdict,
  RetrievedContext,
} from "./types.js";

type EmbeddingProvider = AppConfig["embeddingProvider"];

export interface RetryPolicy {
  attempts: number;
  delayMs: number;
}

/**
 * Routes each capability to the configured provider and retries transient
 * failures with exponential backoff.
 */
export class DefaultAiClient implements Embedder, RelevanceJudge, AnswerGenerator, QueryRewriter {
  private readonly openAi: OpenAiClient;

  private readonly ollama: OllamaClient;

  private readonly embeddingProvider: EmbeddingProvider;

  private readonly answerMode: AnswerMode;

  private readonly retry: RetryPolicy;

  private readonly logger: Logger;

  constructor(config: AppConfig, logger: Logger = createLogger("ai")) {
    this.openAi = new OpenAiClient({
      apiKey: config.openaiApiKey,
      baseUrl: config.openaiBaseUrl,
      embeddingModel: config.embeddingModel,
      chatModel: config.openaiChatModel,
    });
    this.ollama = new OllamaClient({
      baseUrl: config.ollamaBaseUrl,
      chatModel: config.ollamaChatModel,
      embeddingModel: config.ollamaEmbeddingModel,
    });
    this.embeddingProvider = config.embeddingProvider;
    this.answerMode = config.answerMode;
    this.retry = { attempts: config.retryAttempts, delayMs: config.retryDelayMs };
    this.logger = logger;
  }

  isEmbeddingConfigured(): boolean {
    if (this.embeddingProvider === "none") {
      return false;
    }
    if (this.embeddingProvider === "openai") {
      return this.openAi.isConfigured();
    }
    return true;
  }

  isChatConfigured(): boolean {
    if (this.answerMode === "client_llm") {
      return false;
    }
    if (this.answerMode === "openai") {
      return this.openAi.isConfigured();
    }
    return true;
  }

  getAnswerMode(): AnswerMode {
    return this.answerMode;
  }

  async embedTexts(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    return this.callEmbedding("embed texts", signal, () =>
      this.embeddingProvider === "openai"
        ? this.openAi.embedTexts(texts, signal)
        : this.ollama.embedTexts(texts, signal),
    );
  }

  async embedQuery(query: string, signal?: AbortSignal): Promise<number[]> {
    return this.callEmbedding("embed query", signal, () =>
      this.embeddingProvider === "openai"
        ? this.openAi.embedQuery(query, signal)
        : this.ollama.embedQuery(query, signal),
    );
  }

  async judge(question: string, chunkText: string, signal?: AbortSignal): Promise<RelevanceVerdict> {
    let output: string;
    try {
      output = await this.withServiceRetry(
        () =>
          this.chat([{ role: "user", content: buildRelevancePrompt(question, chunkText) }], {
            temperature: 0,
            maxTokens: 4,
            signal,
          }),
        signal,
      );
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      throw new JudgeServiceError(`Relevance judge failed: ${describeError(error)}`, { cause: error });
    }
    return parseRelevanceVerdict(output);
  }

  async generateAnswer(
    question: string,
    contexts: RetrievedContext[],
    history: readonly ConversationTurn[],
    signal?: AbortSignal,
  ): Promise<string | null> {
    if (contexts.length === 0) {
      return null;
    }
    const answer = await this.withServiceRetry(
      () => this.chat(buildAnswerMessages(question, contexts, history), { temperature: 0.1, signal }),
      signal,
    );
    return answer || null;
  }

  async rewrite(question: string, history: readonly ConversationTurn[], signal?: AbortSignal): Promise<string> {
    if (history.length === 0) {
      return question;
    }
    const rewritten = await this.withServiceRetry(
      () => this.chat(buildRewriteMessages(question, history), { temperature: 0, maxTokens: 120, signal }),
      signal,
    );
    return rewritten.split("\n")[0]?.trim() || question;
  }

  private chat(messages: ChatMessage[], options: ChatOptions): Promise<string> {
    if (this.answerMode === "openai") {
      return this.openAi.chat(messages, options);
    }
    if (this.answerMode === "ollama") {
      return this.ollama.chat(messages, options);
    }
    throw new Error("No chat model is configured (ANSWER_MODE=client_llm).");
  }

  private async callEmbedding<T>(
    operation: string,
    signal: AbortSignal | undefined,
    task: () => Promise<T>,
  ): Promise<T> {
    if (!this.isEmbeddingConfigured()) {
      throw new EmbeddingServiceError("Embedding provider is disabled.");
    }
    try {
      return await this.withServiceRetry(task, signal);
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      throw new EmbeddingServiceError(`Failed to ${operation}: ${describeError(error)}`, { cause: error });
    }
  }

  private withServiceRetry<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return withRetry(task, {
      attempts: this.retry.attempts,
      delayMs: this.retry.delayMs,
      signal,
      onRetry: (error, attempt, nextDelayMs) => {
        this.logger.warn("service call failed, retrying", {
          attempt,
          nextDelayMs,
          error: describeError(error),
        });
      },
    });
  }
}

export function createAiCapabilities(config: AppConfig, logger?: Logger): AiCapabilities {
  const client = new DefaultAiClient(config, logger);
  const chat = client.isChatConfigured();
  return {
    answerMode: client.getAnswerMode(),
    embedder: client.isEmbeddingConfigured() ? client : null,
    judge: chat ? client : null,
    answerGenerator: chat ? client : null,
    queryRewriter: chat ? client : null,
  };
}
