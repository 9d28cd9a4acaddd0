import type {
  AnsweredQuery,
  ChunkStore,
  ConversationTurn,
  Document,
  DocumentChunk,
  ExportFormat,
  ExtractedMetric,
  IngestionReport,
  MetricSpec,
  RetrievalFilter,
  SourceDocument,
  VectorIndex
} from "@finscope/shared";
import { DocumentNotFoundError } from "../errors.js";
import { Chunker } from "../pipeline/Chunker.js";
import { Indexer } from "../pipeline/Indexer.js";
import { IngestionPipeline, type IngestionPipelineDeps } from "../pipeline/IngestionPipeline.js";
import type { ChunkerOptions, IndexerOptions, IngestionInput, RunOptions } from "../pipeline/types.js";
import type { DocumentParser } from "../parsers/types.js";
import { Retriever } from "../retrieval/Retriever.js";
import { logger } from "../utils/logger.js";
import { AnswerSynthesizer, type AnswerSynthesizerOptions } from "./AnswerSynthesizer.js";
import type { LLMServiceLike } from "./llmTypes.js";
import { toCsv, toExportRows, toJson } from "./metricExport.js";
import { MetricExtractor, type MetricExtractorOptions } from "./MetricExtractor.js";
import { QueryRewriter } from "./QueryRewriter.js";
import { QueryService, type AskInput } from "./QueryService.js";

export interface FinScopeCoreOptions {
  chunker: Partial<ChunkerOptions>;
  indexer: Partial<IndexerOptions>;
  synthesizer: Partial<AnswerSynthesizerOptions>;
  ingestConcurrency?: number;
  retrievalTopK?: number;
  parsers?: Partial<Record<IngestionInput["fileType"], DocumentParser>>;
}

export interface AskOptions extends RunOptions {
  k?: number;
}

/**
 * Entry point over the whole pipeline. Stores and providers are injected, so one
 * process can host several cores over different indexes.
 */
export class FinScopeCore {
  readonly pipeline: IngestionPipeline;
  readonly retriever: Retriever;
  readonly queryService: QueryService;
  readonly extractor: MetricExtractor;

  constructor(
    private readonly store: ChunkStore,
    private readonly vectorIndex: VectorIndex,
    llm: LLMServiceLike,
    options: Partial<FinScopeCoreOptions> = {}
  ) {
    const indexer = new Indexer(llm, vectorIndex, options.indexer);
    const pipelineDeps: IngestionPipelineDeps = {
      chunker: new Chunker(options.chunker)
    };
    if (options.parsers) {
      pipelineDeps.parsers = options.parsers;
    }
    this.pipeline = new IngestionPipeline(
      store,
      vectorIndex,
      indexer,
      options.ingestConcurrency === undefined ? {} : { concurrency: options.ingestConcurrency },
      pipelineDeps
    );

    this.retriever = new Retriever(
      llm,
      vectorIndex,
      store,
      options.retrievalTopK === undefined ? {} : { defaultTopK: options.retrievalTopK }
    );
    const synthesizer = new AnswerSynthesizer(llm, options.synthesizer);
    this.queryService = new QueryService(
      this.retriever,
      synthesizer,
      new QueryRewriter(llm, options.synthesizer?.historyTokenBudget),
      vectorIndex
    );

    const extractorOptions: Partial<MetricExtractorOptions> = {};
    if (options.retrievalTopK !== undefined) {
      extractorOptions.topK = options.retrievalTopK;
    }
    if (options.synthesizer?.minRelevanceScore !== undefined) {
      extractorOptions.minRelevanceScore = options.synthesizer.minRelevanceScore;
    }
    this.extractor = new MetricExtractor(this.retriever, llm, extractorOptions);
  }

  ingest(input: IngestionInput, runOptions: RunOptions = {}): Promise<IngestionReport> {
    return this.pipeline.ingest(input, runOptions);
  }

  ingestDocument(source: SourceDocument, runOptions: RunOptions = {}): Promise<IngestionReport> {
    return this.pipeline.ingestDocument(source, runOptions);
  }

  ingestBatch(inputs: IngestionInput[], runOptions: RunOptions = {}): Promise<IngestionReport[]> {
    return this.pipeline.ingestBatch(inputs, runOptions);
  }

  ask(
    query: string,
    filter: RetrievalFilter = {},
    history: ConversationTurn[] = [],
    options: AskOptions = {}
  ): Promise<AnsweredQuery> {
    const input: AskInput = { query, filter, history };
    if (options.k !== undefined) {
      input.k = options.k;
    }
    return this.queryService.ask(input, options);
  }

  extractMetrics(documentIds: string[], specs: MetricSpec[], runOptions: RunOptions = {}): Promise<ExtractedMetric[]> {
    return this.extractor.extract(documentIds, specs, runOptions);
  }

  async exportMetrics(metrics: ExtractedMetric[], format: ExportFormat): Promise<string> {
    const rows = toExportRows(metrics, await this.documentTitles());
    return format === "csv" ? toCsv(rows) : toJson(rows);
  }

  listDocuments(): Promise<Document[]> {
    return this.store.getDocuments();
  }

  getDocument(documentId: string): Promise<Document | null> {
    return this.store.getDocumentById(documentId);
  }

  getChunks(documentId: string): Promise<DocumentChunk[]> {
    return this.store.getChunksByDocument(documentId);
  }

  async documentTitles(): Promise<Map<string, string>> {
    const documents = await this.store.getDocuments();
    return new Map(documents.map((document) => [document.id, document.filename] as const));
  }

  /** Removes the document, its chunks and every index record derived from them. */
  async deleteDocument(documentId: string): Promise<void> {
    const document = await this.store.getDocumentById(documentId);
    if (!document) {
      throw new DocumentNotFoundError(documentId);
    }

    const chunkIds = await this.store.deleteDocument(documentId);
    await this.vectorIndex.delete(chunkIds);
    logger.info({ documentId, removedChunks: chunkIds.length }, "Document deleted");
  }
}
