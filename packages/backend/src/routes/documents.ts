import { EventEmitter } from "node:events";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import type { Request, RequestHandler, Response } from "express";
import { Router } from "express";
import multer from "multer";
import { z } from "zod";
import type {
  DocumentStatus,
  DocumentStatusResponse,
  GetDocumentResponse,
  IngestionReport,
  ListDocumentChunksResponse,
  ListDocumentsResponse,
  UploadDocumentResponse
} from "@finscope/shared";
import { appConfig } from "../config.js";
import { validate } from "../middleware/validator.js";
import { FileValidationError, validateUploadedFile } from "../parsers/fileValidator.js";
import { computeDocumentId } from "../pipeline/IngestionPipeline.js";
import type { PipelinePhase, PipelineStatusEvent } from "../pipeline/types.js";
import { ensureDocumentStoreConnected, getCoreSingleton } from "../runtime/coreRuntime.js";
import type { FinScopeCore } from "../services/FinScopeCore.js";
import { logger } from "../utils/logger.js";

const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: appConfig.MAX_UPLOAD_SIZE
  }
});

const documentStatuses = ["uploading", "parsing", "chunking", "indexing", "completed", "error"] as const;

const documentParamsSchema = z.object({
  id: z.string().min(1)
});

const listDocumentsQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).max(100).default(20),
  status: z.enum(documentStatuses).optional()
});

interface DocumentStatusSnapshot {
  id: string;
  status: DocumentStatus;
  phase?: PipelinePhase;
  progress?: number;
  message?: string;
  report?: IngestionReport;
  updatedAt: string;
}

export interface CreateDocumentsRouterOptions {
  core?: FinScopeCore;
  ensureStoreConnected?: () => Promise<void>;
  uploadsDir?: string;
}

function phaseToDocumentStatus(phase: PipelinePhase): DocumentStatus {
  switch (phase) {
    case "parsing":
      return "parsing";
    case "chunking":
      return "chunking";
    case "indexing":
      return "indexing";
    case "completed":
      return "completed";
    default:
      return "error";
  }
}

function isTerminal(status: DocumentStatus): boolean {
  return status === "completed" || status === "error";
}

function wantsSse(req: Request): boolean {
  const accepts = req.headers.accept ?? "";
  const streamFlag = req.query.stream;
  const streamRequested = typeof streamFlag === "string" && streamFlag.toLowerCase() === "true";
  return accepts.includes("text/event-stream") || streamRequested;
}

function sendSseEvent(res: Response, eventName: string, payload: unknown): void {
  res.write(`event: ${eventName}\n`);
  res.write(`data: ${JSON.stringify(payload)}\n\n`);
}

export function createDocumentsRouter(options: CreateDocumentsRouterOptions = {}): Router {
  const core = options.core ?? getCoreSingleton();
  const ensureStoreConnected = options.ensureStoreConnected ?? (() => ensureDocumentStoreConnected());
  const uploadsDir = resolve(options.uploadsDir ?? appConfig.UPLOADS_DIR);

  const statusSnapshots = new Map<string, DocumentStatusSnapshot>();
  const jobs = new Map<string, Promise<void>>();
  const statusEventBus = new EventEmitter();

  const rememberStatus = (snapshot: DocumentStatusSnapshot): void => {
    statusSnapshots.set(snapshot.id, snapshot);
    statusEventBus.emit("status", snapshot);
  };

  core.pipeline.onStatus((event: PipelineStatusEvent) => {
    const snapshot: DocumentStatusSnapshot = {
      id: event.documentId,
      status: phaseToDocumentStatus(event.phase),
      phase: event.phase,
      progress: event.progress,
      updatedAt: new Date().toISOString()
    };
    if (event.message !== undefined) {
      snapshot.message = event.message;
    }
    if (event.report !== undefined) {
      snapshot.report = event.report;
    }
    rememberStatus(snapshot);
  });

  const getCurrentStatus = async (documentId: string): Promise<DocumentStatusSnapshot | null> => {
    const cached = statusSnapshots.get(documentId);
    if (cached) {
      return cached;
    }

    const document = await core.getDocument(documentId);
    if (!document) {
      return null;
    }

    return {
      id: documentId,
      status: document.status,
      updatedAt: new Date().toISOString()
    };
  };

  const runIngestionInBackground = (
    documentId: string,
    input: Parameters<FinScopeCore["ingest"]>[0]
  ): void => {
    const task = (async () => {
      try {
        await core.ingest(input);
      } catch (error) {
        const message = error instanceof Error ? error.message : "Unknown error during document ingestion";
        logger.error({ documentId, err: error }, "Document ingestion aborted");
        rememberStatus({
          id: documentId,
          status: "error",
          phase: "error",
          progress: 100,
          message,
          updatedAt: new Date().toISOString()
        });
      } finally {
        jobs.delete(documentId);
      }
    })();

    jobs.set(documentId, task);
  };

  const connectOrRespond = async (res: Response): Promise<boolean> => {
    try {
      await ensureStoreConnected();
      return true;
    } catch (error) {
      logger.error({ err: error }, "Document store connection failed");
      res.status(503).json({ error: "Document store unavailable" });
      return false;
    }
  };

  const documentsRouter = Router();

  const handleUpload: RequestHandler = (req, res, next) => {
    upload.single("file")(req, res, (err: unknown) => {
      if (err) {
        const message =
          err instanceof multer.MulterError
            ? err.code === "LIMIT_FILE_SIZE"
              ? `File too large. Maximum allowed size is ${Math.round(appConfig.MAX_UPLOAD_SIZE / 1024 / 1024)}MB`
              : err.message
            : err instanceof Error
              ? err.message
              : "File upload failed";
        return res.status(400).json({ error: message });
      }
      next();
    });
  };

  documentsRouter.post("/upload", handleUpload, async (req, res) => {
    if (!req.file) {
      return res.status(400).json({ error: "No file uploaded" });
    }

    if (!(await connectOrRespond(res))) {
      return;
    }

    let validatedFile: Awaited<ReturnType<typeof validateUploadedFile>>;
    try {
      validatedFile = await validateUploadedFile(req.file, {
        maxSizeBytes: appConfig.MAX_UPLOAD_SIZE
      });
    } catch (error) {
      return res.status(400).json({
        error: error instanceof FileValidationError ? error.message : "File validation failed"
      });
    }

    const documentId = computeDocumentId(validatedFile.sanitizedFilename, req.file.buffer);
    if (jobs.has(documentId)) {
      return res.status(409).json({ error: "Document is already being ingested" });
    }

    const documentUploadDir = resolve(uploadsDir, documentId);
    try {
      await mkdir(documentUploadDir, { recursive: true });
      await writeFile(resolve(documentUploadDir, validatedFile.sanitizedFilename), req.file.buffer);
    } catch (error) {
      await rm(documentUploadDir, { recursive: true, force: true });
      logger.error({ err: error }, "Failed to persist uploaded file");
      return res.status(500).json({ error: "Failed to store uploaded file" });
    }

    rememberStatus({
      id: documentId,
      status: "uploading",
      progress: 0,
      updatedAt: new Date().toISOString()
    });
    runIngestionInBackground(documentId, {
      filename: validatedFile.sanitizedFilename,
      fileType: validatedFile.fileType,
      buffer: req.file.buffer
    });

    const response: UploadDocumentResponse = {
      message: "File upload accepted",
      documentId,
      file: {
        originalName: req.file.originalname,
        mimeType: validatedFile.mimeType,
        size: req.file.size
      }
    };

    res.setHeader("x-document-id", documentId);
    return res.status(202).json(response);
  });

  documentsRouter.get("/", validate({ query: listDocumentsQuerySchema }), async (req, res) => {
    if (!(await connectOrRespond(res))) {
      return;
    }

    const { page, pageSize, status } = listDocumentsQuerySchema.parse(req.query);
    const offset = (page - 1) * pageSize;

    const allDocuments = await core.listDocuments();
    const filtered =
      status === undefined ? allDocuments : allDocuments.filter((document) => document.status === status);
    const documents = filtered.slice(offset, offset + pageSize);

    res.setHeader("x-total-count", String(filtered.length));
    res.setHeader("x-page", String(page));
    res.setHeader("x-page-size", String(pageSize));

    const response: ListDocumentsResponse = { documents };
    return res.json(response);
  });

  documentsRouter.get("/:id", validate({ params: documentParamsSchema }), async (req, res) => {
    if (!(await connectOrRespond(res))) {
      return;
    }

    const document = await core.getDocument(req.params.id ?? "");
    if (!document) {
      return res.status(404).json({ error: "Document not found" });
    }

    const response: GetDocumentResponse = { document };
    return res.json(response);
  });

  documentsRouter.get("/:id/chunks", validate({ params: documentParamsSchema }), async (req, res) => {
    if (!(await connectOrRespond(res))) {
      return;
    }

    const documentId = req.params.id ?? "";
    const document = await core.getDocument(documentId);
    if (!document) {
      return res.status(404).json({ error: "Document not found" });
    }

    const chunks = await core.getChunks(documentId);
    const response: ListDocumentChunksResponse = {
      documentId,
      chunks: [...chunks].sort((a, b) => a.index - b.index)
    };
    return res.json(response);
  });

  documentsRouter.delete("/:id", validate({ params: documentParamsSchema }), async (req, res) => {
    if (!(await connectOrRespond(res))) {
      return;
    }

    const documentId = req.params.id ?? "";
    const document = await core.getDocument(documentId);
    if (!document) {
      return res.status(404).json({ error: "Document not found" });
    }

    if (jobs.has(documentId)) {
      return res.status(409).json({
        error: "Document is currently being ingested and cannot be deleted"
      });
    }

    await core.deleteDocument(documentId);
    await rm(resolve(uploadsDir, documentId), { recursive: true, force: true });
    statusSnapshots.delete(documentId);

    return res.status(204).send();
  });

  documentsRouter.get("/:id/status", validate({ params: documentParamsSchema }), async (req, res) => {
    if (!(await connectOrRespond(res))) {
      return;
    }

    const documentId = req.params.id ?? "";
    const snapshot = await getCurrentStatus(documentId);
    if (!snapshot) {
      return res.status(404).json({ error: "Document not found" });
    }

    if (!wantsSse(req)) {
      const response: DocumentStatusResponse = {
        id: snapshot.id,
        status: snapshot.status
      };
      if (snapshot.report !== undefined) {
        response.report = snapshot.report;
      }
      return res.json(response);
    }

    res.setHeader("Content-Type", "text/event-stream; charset=utf-8");
    res.setHeader("Cache-Control", "no-cache, no-transform");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders();

    sendSseEvent(res, "status", snapshot);
    if (isTerminal(snapshot.status)) {
      return res.end();
    }
    const heartbeat = setInterval(() => {
      res.write(": heartbeat\n\n");
    }, 15_000);

    const onStatus = (eventSnapshot: DocumentStatusSnapshot): void => {
      if (eventSnapshot.id !== documentId) {
        return;
      }
      sendSseEvent(res, "status", eventSnapshot);
      if (isTerminal(eventSnapshot.status)) {
        clearInterval(heartbeat);
        statusEventBus.off("status", onStatus);
        res.end();
      }
    };

    statusEventBus.on("status", onStatus);
    req.on("close", () => {
      clearInterval(heartbeat);
      statusEventBus.off("status", onStatus);
    });
  });

  return documentsRouter;
}
