import type { DocumentStore, ServiceConnectionStatus } from "@finscope/shared";
import { appConfig } from "../config.js";
import type { LLMServiceLike } from "../services/llmTypes.js";
import { logger } from "../utils/logger.js";
import { ensureDocumentStoreConnected, getDocumentStoreSingleton, getLLMServiceSingleton } from "./coreRuntime.js";

export function isNeo4jConfigured(): boolean {
  return (
    appConfig.NEO4J_URI.trim().length > 0 &&
    appConfig.NEO4J_USER.trim().length > 0 &&
    appConfig.NEO4J_PASSWORD.trim().length > 0
  );
}

export function isLlmConfigured(): boolean {
  return appConfig.OPENAI_API_KEY.trim().length > 0;
}

export interface StoreConnectionOptions {
  store?: DocumentStore;
  ensureStoreConnected?: () => Promise<void>;
}

interface LlmConnectionOptions {
  llmService?: LLMServiceLike;
  checkText?: string;
}

export async function checkStoreConnection(
  options: StoreConnectionOptions = {}
): Promise<ServiceConnectionStatus> {
  if (!options.store && appConfig.VECTOR_STORE === "neo4j" && !isNeo4jConfigured()) {
    return "not_configured";
  }

  const store = options.store ?? getDocumentStoreSingleton();
  const ensureStoreConnected =
    options.ensureStoreConnected ??
    (options.store ? () => store.connect() : () => ensureDocumentStoreConnected(store));

  try {
    await ensureStoreConnected();
    const healthy = await store.healthCheck();
    return healthy ? "ok" : "failed";
  } catch (error) {
    logger.warn({ err: error }, "Document store health check failed");
    return "failed";
  }
}

export async function checkLlmConnection(
  options: LlmConnectionOptions = {}
): Promise<ServiceConnectionStatus> {
  if (!options.llmService && !isLlmConfigured()) {
    return "not_configured";
  }

  const llmService = options.llmService ?? getLLMServiceSingleton();

  try {
    await llmService.embed(options.checkText ?? "ping");
    return "ok";
  } catch (error) {
    logger.warn({ err: error }, "Language model health check failed");
    return "failed";
  }
}
