import { z } from "zod";
import type { AnswerMode } from "../infra/ai/types.js";
import type { RerankerName } from "../pipelines/reranking.js";
import type { LogLevel } from "../utils/logger.js";

const ratio = (min: number, max: number) => z.coerce.number().min(min).max(max);

const envSchema = z.object({
  KB_STORE: z.enum(["memory", "file", "postgres"]).default("file"),
  KB_STORAGE_DIR: z.string().default(".data/knowledge-base"),
  DATABASE_URL: z.string().optional(),
  MAX_INDEX_BYTES: z.coerce.number().int().positive().default(20 * 1024 * 1024),
  CHUNK_SIZE: z.coerce.number().int().min(50).default(600),
  CHUNK_OVERLAP: z.coerce.number().int().min(0).default(150),
  RETRIEVAL_TOP_K: z.coerce.number().int().min(1).max(100).default(10),
  FALLBACK_RATIO: ratio(0.2, 0.8).default(0.5),
  HYBRID_SEMANTIC_WEIGHT: ratio(0, 1).default(0.5),
  HYBRID_LEXICAL_WEIGHT: ratio(0, 1).default(0.5),
  RERANKER: z.enum(["none", "overlap"]).default("none"),
  JUDGE_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  JUDGE_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(8),
  RELEVANCE_CACHE_SIZE: z.coerce.number().int().min(1).default(2048),
  RELEVANCE_CACHE_TTL_MS: z.coerce.number().int().positive().default(3_600_000),
  DELETE_GRACE_MS: z.coerce.number().int().min(0).default(500),
  HISTORY_TURNS: z.coerce.number().int().min(1).max(50).default(3),
  MAX_SESSIONS: z.coerce.number().int().min(1).default(100),
  SERVICE_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  SERVICE_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().default("https://api.openai.com/v1"),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  EMBEDDING_PROVIDER: z.enum(["none", "openai", "ollama"]).optional(),
  ANSWER_MODE: z.enum(["client_llm", "openai", "ollama"]).default("client_llm"),
  OLLAMA_BASE_URL: z.string().default("http://127.0.0.1:11434"),
  OLLAMA_CHAT_MODEL: z.string().default("qwen2.5:7b-instruct"),
  OLLAMA_EMBEDDING_MODEL: z.string().default("nomic-embed-text"),
  MCP_TRANSPORT: z.enum(["stdio", "http"]).default("stdio"),
  MCP_HOST: z.string().default("0.0.0.0"),
  MCP_PORT: z.coerce.number().int().positive().default(3000),
  MCP_MAX_BODY_BYTES: z.coerce.number().int().positive().default(64 * 1024 * 1024),
  MCP_SESSION_IDLE_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export type EnvInput = Record<string, string | undefined>;

export interface AppConfig {
  store: "memory" | "file" | "postgres";
  storageDir: string;
  databaseUrl: string | null;
  maxIndexBytes: number;
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
  fallbackRatio: number;
  semanticWeight: number;
  lexicalWeight: number;
  reranker: RerankerName;
  judgeTimeoutMs: number;
  judgeConcurrency: number;
  relevanceCacheSize: number;
  relevanceCacheTtlMs: number;
  deleteGraceMs: number;
  historyTurns: number;
  maxSessions: number;
  retryAttempts: number;
  retryDelayMs: number;
  openaiApiKey: string | null;
  openaiBaseUrl: string;
  embeddingModel: string;
  openaiChatModel: string;
  embeddingProvider: "none" | "openai" | "ollama";
  answerMode: AnswerMode;
  ollamaBaseUrl: string;
  ollamaChatModel: string;
  ollamaEmbeddingModel: string;
  transport: "stdio" | "http";
  host: string;
  port: number;
  maxBodyBytes: number;
  sessionIdleMs: number;
  logLevel: LogLevel;
}

export function loadConfig(env: EnvInput = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  if (parsed.KB_STORE === "postgres" && !parsed.DATABASE_URL) {
    throw new Error("KB_STORE=postgres requires DATABASE_URL.");
  }
  if (parsed.CHUNK_OVERLAP >= parsed.CHUNK_SIZE) {
    throw new Error("CHUNK_OVERLAP must be smaller than CHUNK_SIZE.");
  }
  if (parsed.HYBRID_SEMANTIC_WEIGHT + parsed.HYBRID_LEXICAL_WEIGHT <= 0) {
    throw new Error("HYBRID_SEMANTIC_WEIGHT and HYBRID_LEXICAL_WEIGHT cannot both be 0.");
  }

  const embeddingProvider = parsed.EMBEDDING_PROVIDER ?? (parsed.OPENAI_API_KEY ? "openai" : "none");
  if ((embeddingProvider === "openai" || parsed.ANSWER_MODE === "openai") && !parsed.OPENAI_API_KEY) {
    throw new Error("OpenAI embeddings or answers require OPENAI_API_KEY.");
  }

  return {
    store: parsed.KB_STORE,
    storageDir: parsed.KB_STORAGE_DIR,
    databaseUrl: parsed.DATABASE_URL ?? null,
    maxIndexBytes: parsed.MAX_INDEX_BYTES,
    chunkSize: parsed.CHUNK_SIZE,
    chunkOverlap: parsed.CHUNK_OVERLAP,
    topK: parsed.RETRIEVAL_TOP_K,
    fallbackRatio: parsed.FALLBACK_RATIO,
    semanticWeight: parsed.HYBRID_SEMANTIC_WEIGHT,
    lexicalWeight: parsed.HYBRID_LEXICAL_WEIGHT,
    reranker: parsed.RERANKER,
    judgeTimeoutMs: parsed.JUDGE_TIMEOUT_MS,
    judgeConcurrency: parsed.JUDGE_CONCURRENCY,
    relevanceCacheSize: parsed.RELEVANCE_CACHE_SIZE,
    relevanceCacheTtlMs: parsed.RELEVANCE_CACHE_TTL_MS,
    deleteGraceMs: parsed.DELETE_GRACE_MS,
    historyTurns: parsed.HISTORY_TURNS,
    maxSessions: parsed.MAX_SESSIONS,
    retryAttempts: parsed.SERVICE_RETRY_ATTEMPTS,
    retryDelayMs: parsed.SERVICE_RETRY_DELAY_MS,
    openaiApiKey: parsed.OPENAI_API_KEY ?? null,
    openaiBaseUrl: parsed.OPENAI_BASE_URL,
    embeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
    openaiChatModel: parsed.OPENAI_CHAT_MODEL,
    embeddingProvider,
    answerMode: parsed.ANSWER_MODE,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL,
    ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
    ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
    transport: parsed.MCP_TRANSPORT,
    host: parsed.MCP_HOST,
    port: parsed.MCP_PORT,
    maxBodyBytes: parsed.MCP_MAX_BODY_BYTES,
    sessionIdleMs: parsed.MCP_SESSION_IDLE_MS,
    logLevel: parsed.LOG_LEVEL,
  };
}
