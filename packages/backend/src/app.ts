import cors from "cors";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { appConfig } from "./config.js";
import { requestLogger } from "./middleware/logger.js";
import { apiRateLimiter, modelRateLimiter } from "./middleware/rateLimiter.js";
import { createChatRouter, type CreateChatRouterOptions } from "./routes/chat.js";
import { createDocumentsRouter, type CreateDocumentsRouterOptions } from "./routes/documents.js";
import { createHealthRouter, type CreateHealthRouterOptions } from "./routes/health.js";
import { createMetricsRouter, type CreateMetricsRouterOptions } from "./routes/metrics.js";
import { createQueryRouter, type CreateQueryRouterOptions } from "./routes/query.js";
import { logger } from "./utils/logger.js";

export interface AppOptions {
  documents?: CreateDocumentsRouterOptions;
  query?: CreateQueryRouterOptions;
  chat?: CreateChatRouterOptions;
  metrics?: CreateMetricsRouterOptions;
  health?: CreateHealthRouterOptions;
}

export function createApp(options: AppOptions = {}): Express {
  const app = express();

  app.use(requestLogger);
  app.use(
    cors({
      origin: appConfig.CORS_ORIGIN,
      exposedHeaders: ["x-document-id", "x-total-count", "x-page", "x-page-size"]
    })
  );
  app.use(express.json({ limit: "2mb" }));
  app.use(express.urlencoded({ extended: true }));
  app.use(apiRateLimiter);

  app.use("/api/documents", createDocumentsRouter(options.documents));
  app.use("/api/query", modelRateLimiter, createQueryRouter(options.query));
  app.use("/api/chat/sessions/:id/messages", modelRateLimiter);
  app.use("/api/chat", createChatRouter(options.chat));
  app.use("/api/metrics/extract", modelRateLimiter);
  app.use("/api/metrics", createMetricsRouter(options.metrics));
  app.use("/api/health", createHealthRouter(options.health));

  app.use((_req, res) => {
    res.status(404).json({ error: "Route not found" });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error({ err }, "Unhandled error");
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
