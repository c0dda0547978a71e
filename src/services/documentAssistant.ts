import { IndexStorageInfo, IndexStore } from "../domain/indexStore.js";
import { ConversationTurn, DocumentRecord } from "../domain/types.js";
import { AnswerGenerator, AnswerMode } from "../infra/ai/types.js";
import { detectFormat, loadDocumentFile } from "../infra/parsers/documentLoader.js";
import { Citation, buildAnswerWithCitations, buildCitations, toRetrievedContexts } from "../pipelines/answering.js";
import { Logger, createLogger, describeError } from "../utils/logger.js";
import { ConversationSessions, DEFAULT_SESSION_ID } from "./conversationContext.js";
import { DeleteResult, DocumentInfo, KnowledgeBaseManager, UpdateResult } from "./knowledgeBaseManager.js";
import { RelevanceCache, RelevanceCacheStats } from "./relevanceCache.js";
import { RetrievalMode, RetrievalPipeline, RetrievalReport, RetrievalScope } from "./retrievalPipeline.js";

export interface AskOptions {
  /** Filename or key of the one document to search; every document when omitted. */
  document?: string;
  mode?: RetrievalMode;
  topK?: number;
  fallbackRatio?: number;
  sessionId?: string;
  signal?: AbortSignal;
}

export type AskResult =
  | {
      status: "ok";
      answer: string;
      citations: Citation[];
      answerSource: "generated" | "extractive";
      answerMode: AnswerMode;
      retrieval: RetrievalSummary;
      sessionId: string;
      latencyMs: number;
    }
  | { status: "not_found"; document: string };

export type RetrievalSummary = Omit<RetrievalReport, "status" | "chunks">;

export interface AssistantStatus {
  documents: number;
  rebuilding: number;
  corrupt: number;
  pendingDeletions: number;
  inflightBuilds: number;
  storage: IndexStorageInfo;
  answerMode: AnswerMode;
  embeddingEnabled: boolean;
  judgeEnabled: boolean;
  relevanceCache: RelevanceCacheStats;
  sessions: number;
}

export interface DocumentAssistantOptions {
  manager: KnowledgeBaseManager;
  pipeline: RetrievalPipeline;
  store: IndexStore;
  cache: RelevanceCache;
  sessions: ConversationSessions;
  answerMode: AnswerMode;
  answerGenerator?: AnswerGenerator | null;
  embeddingEnabled: boolean;
  judgeEnabled: boolean;
  logger?: Logger;
}

/** Caller-facing API over the knowledge base, retrieval and conversation state. */
export class DocumentAssistant {
  private readonly manager: KnowledgeBaseManager;

  private readonly pipeline: RetrievalPipeline;

  private readonly store: IndexStore;

  private readonly cache: RelevanceCache;

  private readonly sessions: ConversationSessions;

  private readonly answerGenerator: AnswerGenerator | null;

  private readonly logger: Logger;

  constructor(private readonly options: DocumentAssistantOptions) {
    this.manager = options.manager;
    this.pipeline = options.pipeline;
    this.store = options.store;
    this.cache = options.cache;
    this.sessions = options.sessions;
    this.answerGenerator = options.answerGenerator ?? null;
    this.logger = options.logger ?? createLogger("assistant");
  }

  async uploadDocument(filename: string, bytes: Buffer, signal?: AbortSignal): Promise<UpdateResult> {
    const format = detectFormat(filename);
    return this.manager.ingest({ filename, bytes, format }, signal);
  }

  async uploadFromPath(filePath: string, signal?: AbortSignal): Promise<UpdateResult> {
    const input = await loadDocumentFile(filePath);
    return this.manager.ingest(input, signal);
  }

  async updateDocument(
    filename: string,
    bytes: Buffer,
    options: { force?: boolean; signal?: AbortSignal } = {},
  ): Promise<UpdateResult> {
    const format = detectFormat(filename);
    return this.manager.update(filename, { filename, bytes, format }, options);
  }

  async deleteDocument(filenameOrKey: string): Promise<DeleteResult> {
    const key = this.manager.findByFilename(filenameOrKey)?.key ?? filenameOrKey;
    return this.manager.delete(key);
  }

  listDocuments(): DocumentRecord[] {
    return [...this.manager.list()];
  }

  getDocumentInfo(filenameOrKey: string): DocumentInfo | null {
    return this.manager.getDocumentInfo(filenameOrKey);
  }

  async ask(question: string, options: AskOptions = {}): Promise<AskResult> {
    const startedAt = Date.now();
    const sessionId = options.sessionId ?? DEFAULT_SESSION_ID;
    const context = this.sessions.get(sessionId);
    const history = context.window();

    let scope: RetrievalScope = { kind: "all" };
    if (options.document !== undefined) {
      const document = this.manager.findByFilename(options.document);
      scope = { kind: "document", key: document?.key ?? options.document };
    }

    const retrieval = await this.pipeline.retrieve({
      question,
      scope,
      mode: options.mode,
      topK: options.topK,
      fallbackRatio: options.fallbackRatio,
      history,
      signal: options.signal,
    });
    if (retrieval.status === "not_found") {
      return { status: "not_found", document: options.document ?? retrieval.key };
    }

    const chunks = retrieval.chunks;
    let answer: string | null = null;
    if (this.answerGenerator && chunks.length > 0) {
      try {
        answer = await this.answerGenerator.generateAnswer(
          retrieval.question,
          toRetrievedContexts(chunks),
          history,
          options.signal,
        );
      } catch (error) {
        if (options.signal?.aborted) {
          throw error;
        }
        this.logger.warn("answer generation failed; using extractive answer", { error: describeError(error) });
      }
    }

    const answerSource = answer ? "generated" : "extractive";
    const citations = buildCitations(chunks);
    const finalAnswer = answer ?? buildAnswerWithCitations(retrieval.question, chunks, retrieval.intent).answer;

    const turn: ConversationTurn = {
      question: retrieval.question,
      answer: finalAnswer,
      timestamp: new Date().toISOString(),
      citedChunkIds: chunks.map((chunk) => chunk.chunkId),
    };
    context.append(turn);

    return {
      status: "ok",
      answer: finalAnswer,
      citations,
      answerSource,
      answerMode: this.options.answerMode,
      retrieval: summarizeRetrieval(retrieval),
      sessionId,
      latencyMs: Date.now() - startedAt,
    };
  }

  clearConversation(sessionId: string = DEFAULT_SESSION_ID): boolean {
    return this.sessions.clear(sessionId);
  }

  getConversation(sessionId: string = DEFAULT_SESSION_ID): readonly ConversationTurn[] {
    return this.sessions.peek(sessionId);
  }

  async getStatus(): Promise<AssistantStatus> {
    const stats = this.manager.stats();
    return {
      documents: stats.documents,
      rebuilding: stats.rebuilding,
      corrupt: stats.corrupt,
      pendingDeletions: stats.pendingDeletions,
      inflightBuilds: stats.inflightBuilds,
      storage: await this.store.getStorageInfo(),
      answerMode: this.options.answerMode,
      embeddingEnabled: this.options.embeddingEnabled,
      judgeEnabled: this.options.judgeEnabled,
      relevanceCache: this.cache.stats(),
      sessions: this.sessions.size,
    };
  }
}

function summarizeRetrieval(report: RetrievalReport): RetrievalSummary {
  return {
    question: report.question,
    retrievalQuery: report.retrievalQuery,
    scope: report.scope,
    mode: report.mode,
    intent: report.intent,
    topK: report.topK,
    candidateCount: report.candidateCount,
    evaluation: report.evaluation,
    fallbackUsed: report.fallbackUsed,
    degraded: report.degraded,
    failures: report.failures,
    timings: report.timings,
  };
}
