import type { AnsweredQuery, ConversationTurn, DocumentChunk, RetrievedChunk } from "@finscope/shared";
import { appConfig } from "../config.js";
import { errorMessage, isFatalError } from "../errors.js";
import { buildAnswerSystemPrompt, buildAnswerUserPrompt } from "../prompts/answer.js";
import type { RunOptions } from "../pipeline/types.js";
import { logger } from "../utils/logger.js";
import { groundReferences, parseCitedAnswer } from "./citationParser.js";
import type { LanguageModel, PromptMessage } from "./llmTypes.js";
import { estimateTokens, fitHistoryToBudget } from "./tokenBudget.js";

export interface AnswerSynthesizerOptions {
  minRelevanceScore: number;
  historyTokenBudget: number;
  maxOutputTokens: number;
}

const defaultOptions: AnswerSynthesizerOptions = {
  minRelevanceScore: appConfig.MIN_RELEVANCE_SCORE,
  historyTokenBudget: appConfig.HISTORY_TOKEN_BUDGET,
  maxOutputTokens: appConfig.ANSWER_MAX_TOKENS
};

export const INSUFFICIENT_EVIDENCE_ANSWER =
  "The indexed documents do not contain enough evidence to answer this question.";
export const DEGRADED_ANSWER = "The answer could not be generated because a model provider is unavailable.";
export const UNGROUNDED_WARNING = "answer withheld: no verifiable citation";

/** A provider failure turned into a result with no prose and no citations. */
export function degradedAnswer(query: string, warnings: string[]): AnsweredQuery {
  return {
    query,
    answer: DEGRADED_ANSWER,
    citations: [],
    scores: [],
    status: "degraded",
    groundingViolation: false,
    droppedReferences: [],
    warnings
  };
}

export class AnswerSynthesizer {
  private readonly options: AnswerSynthesizerOptions;

  constructor(
    private readonly llm: LanguageModel,
    options: Partial<AnswerSynthesizerOptions> = {}
  ) {
    this.options = {
      ...defaultOptions,
      ...options
    };
  }

  selectEvidence(retrieved: RetrievedChunk[]): DocumentChunk[] {
    return retrieved
      .filter((result) => result.score >= this.options.minRelevanceScore)
      .map((result) => result.chunk);
  }

  async answer(
    query: string,
    retrieved: RetrievedChunk[],
    history: ConversationTurn[] = [],
    runOptions: RunOptions = {}
  ): Promise<AnsweredQuery> {
    const scores = retrieved.map((result) => ({
      chunkId: result.chunk.id,
      documentId: result.chunk.documentId,
      pageNumber: result.chunk.pageNumber,
      score: result.score
    }));
    const base: AnsweredQuery = {
      query,
      answer: INSUFFICIENT_EVIDENCE_ANSWER,
      citations: [],
      scores,
      status: "insufficient_evidence",
      groundingViolation: false,
      droppedReferences: [],
      warnings: []
    };

    const evidence = this.selectEvidence(retrieved);
    if (evidence.length === 0) {
      return base;
    }

    const estimator = (text: string): number => this.llm.estimateTokens?.(text) ?? estimateTokens(text);
    const budgetedHistory = fitHistoryToBudget(history, this.options.historyTokenBudget, estimator);
    if (budgetedHistory.length < history.length) {
      base.warnings.push(`history truncated: ${history.length - budgetedHistory.length} earlier turn(s) dropped`);
    }

    const messages: PromptMessage[] = [
      ...budgetedHistory.map((turn): PromptMessage => ({ role: turn.role, content: turn.content })),
      { role: "user", content: buildAnswerUserPrompt(query) }
    ];

    let raw: string;
    try {
      raw = await this.llm.complete(
        { system: buildAnswerSystemPrompt(evidence), messages },
        {
          maxOutputTokens: this.options.maxOutputTokens,
          responseFormat: "text",
          citeEvidenceIds: evidence.map((chunk) => chunk.id)
        },
        { signal: runOptions.signal, phase: "answer" }
      );
    } catch (error) {
      if (isFatalError(error)) {
        throw error;
      }
      logger.warn({ err: error }, "Answer synthesis failed; returning degraded answer");
      return {
        ...degradedAnswer(query, [...base.warnings, `language model unavailable: ${errorMessage(error)}`]),
        scores
      };
    }

    const parsed = parseCitedAnswer(raw);
    if (parsed.insufficientEvidence) {
      return base;
    }

    const grounded = groundReferences(parsed.references, evidence);
    const warnings = [...base.warnings];
    if (parsed.malformedCount > 0) {
      warnings.push(`${parsed.malformedCount} malformed citation marker(s) removed`);
    }
    if (grounded.groundingViolation) {
      logger.warn({ dropped: grounded.droppedReferences }, "Dropped citations outside the evidence set");
    }

    if (parsed.text.length === 0) {
      return {
        ...base,
        groundingViolation: grounded.groundingViolation,
        droppedReferences: grounded.droppedReferences,
        warnings: [...warnings, "model returned no answer text"]
      };
    }
    // Prose without a single surviving citation is never returned as an answer.
    if (grounded.citations.length === 0) {
      logger.warn({ dropped: grounded.droppedReferences }, "Withholding answer without verifiable citations");
      return {
        ...base,
        groundingViolation: grounded.groundingViolation,
        droppedReferences: grounded.droppedReferences,
        warnings: [...warnings, UNGROUNDED_WARNING]
      };
    }

    return {
      ...base,
      answer: parsed.text,
      citations: grounded.citations,
      status: "answered",
      groundingViolation: grounded.groundingViolation,
      droppedReferences: grounded.droppedReferences,
      warnings
    };
  }
}
