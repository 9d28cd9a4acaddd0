import type { AnsweredQuery, ConversationTurn, RetrievalFilter, RetrievedChunk, VectorIndex } from "@finscope/shared";
import { errorMessage, isFatalError, throwIfCancelled } from "../errors.js";
import type { RunOptions } from "../pipeline/types.js";
import type { Retriever } from "../retrieval/Retriever.js";
import { logger } from "../utils/logger.js";
import { degradedAnswer, type AnswerSynthesizer } from "./AnswerSynthesizer.js";
import type { QueryRewriter } from "./QueryRewriter.js";

export interface AskInput {
  query: string;
  filter?: RetrievalFilter;
  history?: ConversationTurn[];
  k?: number;
}

export class QueryService {
  constructor(
    private readonly retriever: Retriever,
    private readonly synthesizer: AnswerSynthesizer,
    private readonly rewriter: QueryRewriter,
    private readonly vectorIndex: VectorIndex
  ) {}

  async ask(input: AskInput, runOptions: RunOptions = {}): Promise<AnsweredQuery> {
    const history = input.history ?? [];
    throwIfCancelled(runOptions.signal);

    // With nothing indexed there is no evidence to find, so no model call is made at all.
    const { recordCount } = await this.vectorIndex.describe();
    const rewrite =
      recordCount > 0
        ? await this.rewriter.rewrite(input.query, history, runOptions)
        : { query: input.query, rewritten: false, warnings: [] };

    let retrieved: RetrievedChunk[];
    try {
      retrieved = await this.retriever.retrieve(rewrite.query, input.filter ?? {}, input.k, runOptions);
    } catch (error) {
      if (isFatalError(error)) {
        throw error;
      }
      logger.warn({ err: error }, "Retrieval failed; returning degraded answer");
      const degraded = degradedAnswer(input.query, [
        ...rewrite.warnings,
        `retrieval unavailable: ${errorMessage(error)}`
      ]);
      if (rewrite.rewritten) {
        degraded.rewrittenQuery = rewrite.query;
      }
      return degraded;
    }
    throwIfCancelled(runOptions.signal);

    const result = await this.synthesizer.answer(input.query, retrieved, history, runOptions);
    if (rewrite.rewritten) {
      result.rewrittenQuery = rewrite.query;
    }
    result.warnings = [...rewrite.warnings, ...result.warnings];

    logger.info(
      {
        status: result.status,
        retrieved: retrieved.length,
        citations: result.citations.length,
        groundingViolation: result.groundingViolation
      },
      "Query answered"
    );
    return result;
  }
}
