import { Router } from "express";
import { z } from "zod";
import type {
  ChatSessionDetailResponse,
  CreateChatMessageResponse,
  CreateChatSessionResponse,
  ListChatSessionsResponse
} from "@finscope/shared";
import { ChatSessionNotFoundError, ConfigurationError } from "../errors.js";
import { validate } from "../middleware/validator.js";
import { getChatStoreSingleton } from "../runtime/chatRuntime.js";
import { ensureDocumentStoreConnected, getCoreSingleton } from "../runtime/coreRuntime.js";
import type { ChatStoreLike } from "../services/ChatStore.js";
import { ChatService, type QueryAnswerer } from "../services/ChatService.js";
import { logger } from "../utils/logger.js";

const sessionParamsSchema = z.object({
  id: z.string().min(1)
});

const createSessionBodySchema = z.object({
  title: z.string().min(1).max(120).optional(),
  documentIds: z.array(z.string().min(1)).max(50).optional()
});

const createMessageBodySchema = z.object({
  content: z.string().trim().min(1).max(4000),
  k: z.coerce.number().int().min(1).max(20).optional()
});

const listSessionsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(100)
});

export interface CreateChatRouterOptions {
  chatStore?: ChatStoreLike;
  answerer?: QueryAnswerer;
  chatService?: ChatService;
  ensureStoreConnected?: () => Promise<void>;
}

export function createChatRouter(options: CreateChatRouterOptions = {}): Router {
  const chatService =
    options.chatService ??
    new ChatService(
      options.chatStore ?? getChatStoreSingleton(),
      options.answerer ?? getCoreSingleton().queryService
    );
  const ensureStoreConnected = options.ensureStoreConnected ?? (() => ensureDocumentStoreConnected());

  const chatRouter = Router();

  chatRouter.post("/sessions", validate({ body: createSessionBodySchema }), (req, res) => {
    const body = createSessionBodySchema.parse(req.body);
    const input: { title: string; documentIds?: string[] } = {
      title: body.title ?? "New Session"
    };
    if (body.documentIds !== undefined) {
      input.documentIds = body.documentIds;
    }

    const response: CreateChatSessionResponse = { session: chatService.createSession(input) };
    res.status(201).json(response);
  });

  chatRouter.get("/sessions", validate({ query: listSessionsQuerySchema }), (req, res) => {
    const { limit } = listSessionsQuerySchema.parse(req.query);
    const response: ListChatSessionsResponse = {
      sessions: chatService.listSessions(limit)
    };
    res.json(response);
  });

  chatRouter.get("/sessions/:id", validate({ params: sessionParamsSchema }), (req, res) => {
    const sessionWithMessages = chatService.getSessionWithMessages(req.params.id ?? "");
    if (!sessionWithMessages) {
      return res.status(404).json({ error: "Session not found" });
    }

    const response: ChatSessionDetailResponse = {
      session: {
        ...sessionWithMessages.session,
        messages: sessionWithMessages.messages
      }
    };
    return res.json(response);
  });

  chatRouter.delete("/sessions/:id", validate({ params: sessionParamsSchema }), (req, res) => {
    const deleted = chatService.deleteSession(req.params.id ?? "");
    if (!deleted) {
      return res.status(404).json({ error: "Session not found" });
    }

    return res.status(204).send();
  });

  chatRouter.post(
    "/sessions/:id/messages",
    validate({
      params: sessionParamsSchema,
      body: createMessageBodySchema
    }),
    async (req, res) => {
      try {
        await ensureStoreConnected();
      } catch (error) {
        logger.error({ err: error }, "Document store connection failed");
        return res.status(503).json({ error: "Document store unavailable" });
      }

      const sessionId = req.params.id ?? "";
      const body = createMessageBodySchema.parse(req.body);
      const input: { sessionId: string; content: string; k?: number } = {
        sessionId,
        content: body.content
      };
      if (body.k !== undefined) {
        input.k = body.k;
      }

      try {
        const { message, result } = await chatService.sendMessage(input);
        const response: CreateChatMessageResponse = { sessionId, message, result };
        return res.status(201).json(response);
      } catch (error) {
        if (error instanceof ChatSessionNotFoundError) {
          return res.status(404).json({ error: "Session not found" });
        }
        if (error instanceof ConfigurationError) {
          logger.error({ err: error, sessionId }, "Chat message rejected by configuration check");
          return res.status(500).json({ error: error.message });
        }

        logger.error({ err: error, sessionId }, "Chat completion failed");
        return res.status(500).json({ error: "Failed to process chat message" });
      }
    }
  );

  return chatRouter;
}
