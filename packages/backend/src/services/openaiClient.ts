import OpenAI from "openai";
import type { OpenAICompatibleClient } from "./llmTypes.js";

export function createOpenAIClient(apiKey: string, baseURL: string): OpenAICompatibleClient {
  const openai = new OpenAI({ apiKey, baseURL, maxRetries: 0 });

  return {
    chat: {
      completions: {
        create: (body, options) =>
          openai.chat.completions.create({ ...body, stream: false }, { signal: options?.signal })
      }
    },
    embeddings: {
      create: (body, options) => openai.embeddings.create(body, { signal: options?.signal })
    }
  };
}
