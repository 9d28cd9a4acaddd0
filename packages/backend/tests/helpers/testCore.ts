import { FinScopeCore } from "../../src/services/FinScopeCore.js";
import { InMemoryStore } from "../../src/store/InMemoryStore.js";
import { FakeLLMService } from "./FakeLLMService.js";

export interface TestCore {
  core: FinScopeCore;
  store: InMemoryStore;
  llm: FakeLLMService;
}

/** In-process core: every chunk counts as evidence and failed batches are not retried. */
export function createTestCore(llm = new FakeLLMService()): TestCore {
  const store = new InMemoryStore();
  const core = new FinScopeCore(store, store, llm, {
    indexer: { maxAttempts: 1, retryDelayMs: 1 },
    synthesizer: { minRelevanceScore: -1 },
    ingestConcurrency: 2
  });
  return { core, store, llm };
}

export async function waitFor(predicate: () => Promise<boolean>, timeoutMs = 1500): Promise<void> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    if (await predicate()) {
      return;
    }
    await sleep(20);
  }
  throw new Error("Timed out waiting for expected condition");
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolvePromise) => {
    setTimeout(resolvePromise, ms);
  });
}
