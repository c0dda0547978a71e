import { AppConfig } from "./config/env.js";
import { IndexStore } from "./domain/indexStore.js";
import { createAiCapabilities } from "./infra/ai/defaultAiClient.js";
import { AiCapabilities } from "./infra/ai/types.js";
import { createIndexStore } from "./infra/store/createIndexStore.js";
import { createReranker } from "./pipelines/reranking.js";
import { ConversationSessions } from "./services/conversationContext.js";
import { DocumentAssistant } from "./services/documentAssistant.js";
import { KnowledgeBaseManager, TextExtractor } from "./services/knowledgeBaseManager.js";
import { RelevanceCache } from "./services/relevanceCache.js";
import { RelevanceEvaluator } from "./services/relevanceEvaluator.js";
import { RetrievalPipeline } from "./services/retrievalPipeline.js";
import { createLogger, setLogLevel } from "./utils/logger.js";

/** Collaborators a caller may supply instead of the ones built from config. */
export interface AppOverrides {
  store?: IndexStore;
  capabilities?: AiCapabilities;
  extract?: TextExtractor;
}

export interface App {
  config: AppConfig;
  assistant: DocumentAssistant;
  manager: KnowledgeBaseManager;
  close(): Promise<void>;
}

/** Builds every piece of process-scoped state. `close` tears all of it down. */
export async function createApp(config: AppConfig, overrides: AppOverrides = {}): Promise<App> {
  setLogLevel(config.logLevel);
  const logger = createLogger("app");

  const store = overrides.store ?? (await createIndexStore(config));
  const capabilities = overrides.capabilities ?? createAiCapabilities(config, logger.child("ai"));

  const manager = new KnowledgeBaseManager({
    store,
    embedder: capabilities.embedder,
    extract: overrides.extract,
    chunking: { chunkSize: config.chunkSize, overlap: config.chunkOverlap },
    deleteGraceMs: config.deleteGraceMs,
    logger: logger.child("knowledge-base"),
  });
  await manager.open();

  const cache = new RelevanceCache({
    maxEntries: config.relevanceCacheSize,
    ttlMs: config.relevanceCacheTtlMs,
  });
  const evaluator = new RelevanceEvaluator({
    judge: capabilities.judge,
    cache,
    concurrency: config.judgeConcurrency,
    timeoutMs: config.judgeTimeoutMs,
    defaultFallbackRatio: config.fallbackRatio,
    logger: logger.child("relevance"),
  });
  const pipeline = new RetrievalPipeline({
    manager,
    evaluator,
    embedder: capabilities.embedder,
    rewriter: capabilities.queryRewriter,
    reranker: createReranker(config.reranker),
    weights: { semantic: config.semanticWeight, lexical: config.lexicalWeight },
    defaultTopK: config.topK,
    logger: logger.child("retrieval"),
  });
  const sessions = new ConversationSessions({
    historyTurns: config.historyTurns,
    maxSessions: config.maxSessions,
  });

  const assistant = new DocumentAssistant({
    manager,
    pipeline,
    store,
    cache,
    sessions,
    answerMode: capabilities.answerMode,
    answerGenerator: capabilities.answerGenerator,
    embeddingEnabled: capabilities.embedder !== null,
    judgeEnabled: capabilities.judge !== null,
    logger: logger.child("assistant"),
  });

  logger.info("app ready", {
    store: config.store,
    answerMode: capabilities.answerMode,
    embeddings: capabilities.embedder !== null,
  });

  return {
    config,
    assistant,
    manager,
    close: async () => {
      await manager.close();
      cache.clear();
    },
  };
}
