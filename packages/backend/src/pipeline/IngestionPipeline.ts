import { createHash } from "node:crypto";
import { EventEmitter } from "node:events";
import type { ChunkStore, Document, IngestionReport, SourceDocument, VectorIndex } from "@finscope/shared";
import { appConfig } from "../config.js";
import { ConfigurationError, DocumentParseError, errorMessage, isFatalError, throwIfCancelled } from "../errors.js";
import { PDFParser } from "../parsers/PDFParser.js";
import { TextParser } from "../parsers/TextParser.js";
import type { DocumentParser } from "../parsers/types.js";
import { CITABLE_ID_PATTERN } from "../services/citationParser.js";
import { logger } from "../utils/logger.js";
import { Chunker } from "./Chunker.js";
import { Indexer } from "./Indexer.js";
import type {
  IngestionInput,
  IngestionPipelineOptions,
  PipelinePhase,
  PipelineStatusEvent,
  RunOptions
} from "./types.js";

const defaultOptions: IngestionPipelineOptions = {
  concurrency: appConfig.INGEST_CONCURRENCY
};

export interface IngestionPipelineDeps {
  chunker?: Chunker;
  parsers?: Partial<Record<IngestionInput["fileType"], DocumentParser>>;
  eventEmitter?: EventEmitter;
}

/** Stable id: the file name slug plus the first 12 hex chars of the SHA-256 of the bytes. */
export function computeDocumentId(filename: string, buffer: Buffer): string {
  const digest = createHash("sha256").update(buffer).digest("hex").slice(0, 12);
  const slug = filename
    .toLowerCase()
    .replace(/\.[^.]+$/, "")
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 48);
  return `${slug.length > 0 ? slug : "document"}-${digest}`;
}

export class IngestionPipeline {
  private readonly eventEmitter: EventEmitter;
  private readonly options: IngestionPipelineOptions;
  private readonly chunker: Chunker;
  private readonly indexer: Indexer;
  private readonly parsers: Record<IngestionInput["fileType"], DocumentParser>;

  constructor(
    private readonly store: ChunkStore,
    private readonly vectorIndex: VectorIndex,
    indexer: Indexer,
    options: Partial<IngestionPipelineOptions> = {},
    deps: IngestionPipelineDeps = {}
  ) {
    this.indexer = indexer;
    this.eventEmitter = deps.eventEmitter ?? new EventEmitter();
    this.options = {
      ...defaultOptions,
      ...options
    };
    this.chunker = deps.chunker ?? new Chunker();
    this.parsers = {
      pdf: deps.parsers?.pdf ?? new PDFParser(),
      txt: deps.parsers?.txt ?? new TextParser()
    };
  }

  onStatus(listener: (event: PipelineStatusEvent) => void): void {
    this.eventEmitter.on("status", listener);
  }

  offStatus(listener: (event: PipelineStatusEvent) => void): void {
    this.eventEmitter.off("status", listener);
  }

  /**
   * Parses, chunks and indexes one uploaded file. Parse failures produce a `failed`
   * report; configuration errors and cancellation are rethrown.
   */
  async ingest(input: IngestionInput, runOptions: RunOptions = {}): Promise<IngestionReport> {
    const documentId = computeDocumentId(input.filename, input.buffer);
    const document: Document = {
      id: documentId,
      filename: input.filename,
      fileType: input.fileType,
      fileSize: input.buffer.length,
      status: "parsing",
      uploadedAt: new Date(),
      metadata: {}
    };

    try {
      throwIfCancelled(runOptions.signal);
      this.emitStatus(documentId, "parsing", 0);
      await this.store.saveDocument(document);

      let source: SourceDocument;
      try {
        const parsed = await this.parsers[input.fileType].parse(input.buffer);
        source = { id: documentId, title: input.filename, pages: parsed.pages };
        document.metadata.pageCount = parsed.metadata.pageCount;
      } catch (error) {
        if (error instanceof DocumentParseError) {
          throw error;
        }
        throw new DocumentParseError(`Unable to parse ${input.filename}: ${errorMessage(error)}`, {
          cause: error
        });
      }

      return await this.ingestSource(document, source, runOptions);
    } catch (error) {
      return this.fail(document, error);
    }
  }

  /** Runs an already-extracted document through chunking and indexing. */
  async ingestDocument(source: SourceDocument, runOptions: RunOptions = {}): Promise<IngestionReport> {
    if (!CITABLE_ID_PATTERN.test(source.id)) {
      throw new ConfigurationError(
        `Document id "${source.id}" may only contain letters, digits, ".", "_", ":" and "-"`
      );
    }

    const document: Document = {
      id: source.id,
      filename: source.title,
      fileType: "txt",
      fileSize: source.pages.reduce((total, page) => total + page.text.length, 0),
      status: "chunking",
      uploadedAt: new Date(),
      metadata: { pageCount: source.pages.length }
    };

    try {
      await this.store.saveDocument(document);
      return await this.ingestSource(document, source, runOptions);
    } catch (error) {
      return this.fail(document, error);
    }
  }

  /** Ingests several files with bounded parallelism; one failure never affects the others. */
  async ingestBatch(inputs: IngestionInput[], runOptions: RunOptions = {}): Promise<IngestionReport[]> {
    const reports: IngestionReport[] = [];

    await runWithConcurrency(inputs, this.options.concurrency, async (input, index) => {
      reports[index] = await this.ingest(input, runOptions);
    });

    return reports;
  }

  private async ingestSource(
    document: Document,
    source: SourceDocument,
    runOptions: RunOptions
  ): Promise<IngestionReport> {
    const documentId = document.id;
    throwIfCancelled(runOptions.signal);

    this.emitStatus(documentId, "chunking", 30);
    await this.store.saveDocument({ ...document, status: "chunking" });
    const { chunks, warnings } = this.chunker.chunk(source);
    for (const warning of warnings) {
      logger.warn({ documentId, warning }, "Chunking warning");
    }

    const previous = await this.store.getChunksByDocument(documentId);
    await this.store.saveChunks(chunks);

    throwIfCancelled(runOptions.signal);
    this.emitStatus(documentId, "indexing", 60);
    await this.store.saveDocument({ ...document, status: "indexing" });
    const indexing = await this.indexer.index(chunks, runOptions);

    // Replacement: new records are in place, so stale ids from the prior run can go.
    const currentIds = new Set(chunks.map((chunk) => chunk.id));
    const stale = previous.map((chunk) => chunk.id).filter((id) => !currentIds.has(id));
    if (stale.length > 0) {
      await this.vectorIndex.delete(stale);
      await this.store.deleteChunks(stale);
    }
    // Chunks that failed to embed must not keep a vector from an earlier ingestion.
    if (indexing.unindexed.length > 0) {
      await this.vectorIndex.delete(indexing.unindexed);
    }

    const allWarnings = [...warnings, ...indexing.warnings];
    const report: IngestionReport = {
      documentId,
      title: source.title,
      chunksCreated: chunks.length,
      indexed: indexing.indexed.length,
      unindexed: indexing.unindexed,
      warnings: allWarnings,
      status: indexing.unindexed.length > 0 ? "partial" : "success"
    };

    await this.store.saveDocument({
      ...document,
      status: "completed",
      ingestedAt: new Date(),
      metadata: {
        ...document.metadata,
        chunkCount: chunks.length,
        unindexedCount: indexing.unindexed.length,
        warningCount: allWarnings.length
      }
    });

    this.emitStatus(documentId, "completed", 100, undefined, report);
    logger.info(
      {
        documentId,
        chunks: chunks.length,
        indexed: report.indexed,
        unindexed: report.unindexed.length,
        warnings: allWarnings.length
      },
      "Document ingested"
    );
    return report;
  }

  private async fail(document: Document, error: unknown): Promise<IngestionReport> {
    if (isFatalError(error)) {
      this.emitStatus(document.id, "error", 100, errorMessage(error));
      throw error;
    }

    const message = errorMessage(error);
    logger.error({ documentId: document.id, err: error }, "Document ingestion failed");

    try {
      await this.store.saveDocument({ ...document, status: "error", errorMessage: message });
    } catch (saveError) {
      logger.error({ documentId: document.id, err: saveError }, "Failed to persist errored document status");
    }

    const report: IngestionReport = {
      documentId: document.id,
      title: document.filename,
      chunksCreated: 0,
      indexed: 0,
      unindexed: [],
      warnings: [],
      status: "failed",
      error: message
    };
    this.emitStatus(document.id, "error", 100, message, report);
    return report;
  }

  private emitStatus(
    documentId: string,
    phase: PipelinePhase,
    progress: number,
    message?: string,
    report?: IngestionReport
  ): void {
    const payload: PipelineStatusEvent = {
      documentId,
      phase,
      progress
    };
    if (message !== undefined) {
      payload.message = message;
    }
    if (report !== undefined) {
      payload.report = report;
    }

    this.eventEmitter.emit("status", payload);
  }
}

export async function runWithConcurrency<T>(
  items: T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>
): Promise<void> {
  if (items.length === 0) {
    return;
  }

  const safeConcurrency = Math.max(1, concurrency);
  let current = 0;

  const runners = Array.from({ length: Math.min(safeConcurrency, items.length) }, async () => {
    while (true) {
      const index = current;
      current += 1;
      if (index >= items.length) {
        break;
      }

      const item = items[index];
      if (item === undefined) {
        break;
      }
      await worker(item, index);
    }
  });

  await Promise.all(runners);
}
