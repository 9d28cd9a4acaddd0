import type { DocumentStore } from "@finscope/shared";
import { appConfig } from "../config.js";
import { FinScopeCore } from "../services/FinScopeCore.js";
import type { LLMServiceLike } from "../services/llmTypes.js";
import { LLMService } from "../services/LLMService.js";
import { InMemoryStore } from "../store/InMemoryStore.js";
import { Neo4jStore } from "../store/Neo4jStore.js";

let documentStoreSingleton: DocumentStore | null = null;
let llmServiceSingleton: LLMServiceLike | null = null;
let coreSingleton: FinScopeCore | null = null;
let connectPromise: Promise<void> | null = null;

export function getDocumentStoreSingleton(): DocumentStore {
  if (!documentStoreSingleton) {
    documentStoreSingleton = appConfig.VECTOR_STORE === "neo4j" ? Neo4jStore.fromEnv() : new InMemoryStore();
  }

  return documentStoreSingleton;
}

export function getLLMServiceSingleton(): LLMServiceLike {
  if (!llmServiceSingleton) {
    llmServiceSingleton = LLMService.fromEnv();
  }

  return llmServiceSingleton;
}

export function getCoreSingleton(): FinScopeCore {
  if (!coreSingleton) {
    const store = getDocumentStoreSingleton();
    coreSingleton = new FinScopeCore(store, store, getLLMServiceSingleton());
  }

  return coreSingleton;
}

export async function ensureDocumentStoreConnected(
  store: DocumentStore = getDocumentStoreSingleton()
): Promise<void> {
  if (connectPromise) {
    return connectPromise;
  }

  connectPromise = store.connect().catch((error: unknown) => {
    connectPromise = null;
    throw error;
  });

  return connectPromise;
}
