import type { ConversationTurn } from "@finscope/shared";
import { appConfig } from "../config.js";
import { errorMessage, isFatalError } from "../errors.js";
import type { RunOptions } from "../pipeline/types.js";
import { buildQueryRewritePrompt, QUERY_REWRITE_SYSTEM_PROMPT } from "../prompts/rewrite.js";
import { logger } from "../utils/logger.js";
import type { LanguageModel } from "./llmTypes.js";
import { estimateTokens, fitHistoryToBudget } from "./tokenBudget.js";

export interface RewriteResult {
  query: string;
  rewritten: boolean;
  warnings: string[];
}

const MAX_REWRITE_TOKENS = 200;

export class QueryRewriter {
  constructor(
    private readonly llm: LanguageModel,
    private readonly historyTokenBudget: number = appConfig.HISTORY_TOKEN_BUDGET
  ) {}

  async rewrite(question: string, history: ConversationTurn[], runOptions: RunOptions = {}): Promise<RewriteResult> {
    if (history.length === 0) {
      return { query: question, rewritten: false, warnings: [] };
    }

    const estimator = (text: string): number => this.llm.estimateTokens?.(text) ?? estimateTokens(text);
    const context = fitHistoryToBudget(history, this.historyTokenBudget, estimator);

    let output: string;
    try {
      output = await this.llm.complete(
        {
          system: QUERY_REWRITE_SYSTEM_PROMPT,
          messages: [{ role: "user", content: buildQueryRewritePrompt(context, question) }]
        },
        { maxOutputTokens: MAX_REWRITE_TOKENS, responseFormat: "text" },
        { signal: runOptions.signal, phase: "rewrite" }
      );
    } catch (error) {
      if (isFatalError(error)) {
        throw error;
      }
      logger.warn({ err: error }, "Query rewrite failed; using the original question");
      return {
        query: question,
        rewritten: false,
        warnings: [`query rewrite failed: ${errorMessage(error)}`]
      };
    }

    const rewritten = cleanRewrite(output);
    if (rewritten.length === 0) {
      return { query: question, rewritten: false, warnings: ["query rewrite returned nothing; using the original question"] };
    }

    return { query: rewritten, rewritten: rewritten !== question, warnings: [] };
  }
}

function cleanRewrite(output: string): string {
  const firstLine = output.trim().split("\n")[0] ?? "";
  return firstLine
    .replace(/^(standalone\s+)?(search\s+)?query:\s*/i, "")
    .replace(/^["'“]+|["'”]+$/g, "")
    .trim();
}
