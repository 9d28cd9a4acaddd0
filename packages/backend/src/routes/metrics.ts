import { Router } from "express";
import { z } from "zod";
import { METRIC_KINDS, type ExtractMetricsResponse, type ExportFormat } from "@finscope/shared";
import { ConfigurationError } from "../errors.js";
import { validate } from "../middleware/validator.js";
import { ensureDocumentStoreConnected, getCoreSingleton } from "../runtime/coreRuntime.js";
import type { FinScopeCore } from "../services/FinScopeCore.js";
import { toExportRows } from "../services/metricExport.js";
import { logger } from "../utils/logger.js";

const metricSpecSchema = z
  .object({
    name: z.string().trim().min(1).max(200),
    kind: z.enum(METRIC_KINDS),
    period: z.string().trim().min(1).optional(),
    description: z.string().trim().min(1).optional(),
    bounds: z
      .object({
        min: z.number().finite().optional(),
        max: z.number().finite().optional()
      })
      .refine((bounds) => bounds.min === undefined || bounds.max === undefined || bounds.min <= bounds.max, {
        message: "bounds.min must not exceed bounds.max"
      })
      .optional(),
    unit: z.string().trim().min(1).optional()
  })
  .strict();

const extractBodySchema = z.object({
  documentIds: z.array(z.string().min(1)).min(1).max(50),
  metrics: z.array(metricSpecSchema).min(1).max(50)
});

const citationSchema = z.object({
  documentId: z.string(),
  documentTitle: z.string(),
  pageNumber: z.number().int(),
  chunkId: z.string(),
  quote: z.string().optional()
});

const normalizedValueSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("number"), value: z.number(), unit: z.string() }),
  z.object({ type: z.literal("date"), value: z.string() }),
  z.object({ type: z.literal("string"), value: z.string() })
]);

const metricStatusSchema = z.enum([
  "valid",
  "unverified",
  "rejected:type_mismatch",
  "rejected:out_of_range",
  "rejected:ungrounded",
  "rejected:not_found"
]);

const extractedMetricSchema = z.object({
  id: z.string(),
  documentId: z.string(),
  metric: z.string(),
  kind: z.enum(METRIC_KINDS),
  period: z.string().optional(),
  rawValue: z.string().nullable(),
  normalized: normalizedValueSchema.nullable(),
  citations: z.array(citationSchema),
  status: metricStatusSchema,
  notes: z.array(z.string())
});

const exportBodySchema = z.object({
  metrics: z.array(extractedMetricSchema)
});

const exportQuerySchema = z.object({
  format: z.enum(["csv", "json"]).default("csv")
});

const EXPORT_CONTENT_TYPES: Record<ExportFormat, string> = {
  csv: "text/csv; charset=utf-8",
  json: "application/json; charset=utf-8"
};

export interface CreateMetricsRouterOptions {
  core?: FinScopeCore;
  ensureStoreConnected?: () => Promise<void>;
}

export function createMetricsRouter(options: CreateMetricsRouterOptions = {}): Router {
  const core = options.core ?? getCoreSingleton();
  const ensureStoreConnected = options.ensureStoreConnected ?? (() => ensureDocumentStoreConnected());

  const metricsRouter = Router();

  metricsRouter.post("/extract", validate({ body: extractBodySchema }), async (req, res) => {
    try {
      await ensureStoreConnected();
    } catch (error) {
      logger.error({ err: error }, "Document store connection failed");
      return res.status(503).json({ error: "Document store unavailable" });
    }

    const { documentIds, metrics: specs } = extractBodySchema.parse(req.body);

    try {
      const metrics = await core.extractMetrics(documentIds, specs);
      const response: ExtractMetricsResponse = {
        metrics,
        rows: toExportRows(metrics, await core.documentTitles())
      };
      return res.json(response);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        logger.error({ err: error }, "Metric extraction rejected by configuration check");
        return res.status(500).json({ error: error.message });
      }

      logger.error({ err: error }, "Metric extraction failed");
      return res.status(500).json({ error: "Failed to extract metrics" });
    }
  });

  metricsRouter.post(
    "/export",
    validate({ body: exportBodySchema, query: exportQuerySchema }),
    async (req, res) => {
      try {
        await ensureStoreConnected();
      } catch (error) {
        logger.error({ err: error }, "Document store connection failed");
        return res.status(503).json({ error: "Document store unavailable" });
      }

      const { metrics } = exportBodySchema.parse(req.body);
      const { format } = exportQuerySchema.parse(req.query);

      try {
        const body = await core.exportMetrics(metrics, format);
        res.setHeader("Content-Type", EXPORT_CONTENT_TYPES[format]);
        res.setHeader("Content-Disposition", `attachment; filename="metrics.${format}"`);
        return res.send(body);
      } catch (error) {
        logger.error({ err: error }, "Metric export failed");
        return res.status(500).json({ error: "Failed to export metrics" });
      }
    }
  );

  return metricsRouter;
}
