import { Router } from "express";
import { z } from "zod";
import type { AskResponse } from "@finscope/shared";
import { ConfigurationError } from "../errors.js";
import { validate } from "../middleware/validator.js";
import { ensureDocumentStoreConnected, getCoreSingleton } from "../runtime/coreRuntime.js";
import type { FinScopeCore } from "../services/FinScopeCore.js";
import { logger } from "../utils/logger.js";

export const conversationTurnSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string().min(1)
});

const askBodySchema = z.object({
  query: z.string().trim().min(1).max(4000),
  documentIds: z.array(z.string().min(1)).optional(),
  history: z.array(conversationTurnSchema).max(100).default([]),
  k: z.coerce.number().int().min(1).max(20).optional()
});

export interface CreateQueryRouterOptions {
  core?: FinScopeCore;
  ensureStoreConnected?: () => Promise<void>;
}

export function createQueryRouter(options: CreateQueryRouterOptions = {}): Router {
  const core = options.core ?? getCoreSingleton();
  const ensureStoreConnected = options.ensureStoreConnected ?? (() => ensureDocumentStoreConnected());

  const queryRouter = Router();

  queryRouter.post("/", validate({ body: askBodySchema }), async (req, res) => {
    try {
      await ensureStoreConnected();
    } catch (error) {
      logger.error({ err: error }, "Document store connection failed");
      return res.status(503).json({ error: "Document store unavailable" });
    }

    const body = askBodySchema.parse(req.body);
    const filter = body.documentIds === undefined ? {} : { documentIds: body.documentIds };

    try {
      const askOptions = body.k === undefined ? {} : { k: body.k };
      const result = await core.ask(body.query, filter, body.history, askOptions);
      const response: AskResponse = { result };
      return res.json(response);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        logger.error({ err: error }, "Query rejected by configuration check");
        return res.status(500).json({ error: error.message });
      }

      logger.error({ err: error }, "Query failed");
      return res.status(500).json({ error: "Failed to answer query" });
    }
  });

  return queryRouter;
}
