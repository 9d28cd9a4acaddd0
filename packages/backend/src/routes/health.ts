import { Router } from "express";
import type { DocumentStore, HealthResponse, ServiceConnectionStatus } from "@finscope/shared";
import { checkLlmConnection, checkStoreConnection, type StoreConnectionOptions } from "../runtime/connectivity.js";
import type { LLMServiceLike } from "../services/llmTypes.js";

export interface CreateHealthRouterOptions {
  store?: DocumentStore;
  llmService?: LLMServiceLike;
  ensureStoreConnected?: () => Promise<void>;
  checkStore?: () => Promise<ServiceConnectionStatus>;
  checkLlm?: () => Promise<ServiceConnectionStatus>;
  startTime?: number;
}

export function createHealthRouter(options: CreateHealthRouterOptions = {}): Router {
  const checkStore =
    options.checkStore ??
    (() => {
      const storeOptions: StoreConnectionOptions = {};
      if (options.store) {
        storeOptions.store = options.store;
      }
      if (options.ensureStoreConnected) {
        storeOptions.ensureStoreConnected = options.ensureStoreConnected;
      }
      return checkStoreConnection(storeOptions);
    });
  const checkLlm =
    options.checkLlm ??
    (() => checkLlmConnection(options.llmService ? { llmService: options.llmService } : {}));
  const startTime = options.startTime ?? Date.now();

  const healthRouter = Router();

  healthRouter.get("/", async (_req, res) => {
    const [vectorStore, llm] = await Promise.all([checkStore(), checkLlm()]);
    const status: HealthResponse["status"] = vectorStore === "failed" || llm === "failed" ? "degraded" : "ok";

    const mem = process.memoryUsage();
    const response: HealthResponse = {
      status,
      timestamp: new Date().toISOString(),
      uptimeSec: Math.max(0, Math.floor((Date.now() - startTime) / 1000)),
      checks: {
        vectorStore,
        llm
      },
      memoryUsage: {
        rss: mem.rss,
        heapUsed: mem.heapUsed,
        heapTotal: mem.heapTotal
      }
    };
    res.json(response);
  });

  return healthRouter;
}
