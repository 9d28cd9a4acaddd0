import type { ConversationTurn } from "@finscope/shared";

export type TokenEstimator = (text: string) => number;

export const estimateTokens: TokenEstimator = (text) => Math.ceil(text.length / 4);

/**
 * Keeps the most recent contiguous run of turns whose estimated size fits the budget.
 * Turns are dropped whole, earliest first; a single turn larger than the budget is
 * dropped along with everything before it.
 */
export function fitHistoryToBudget(
  history: ConversationTurn[],
  budgetTokens: number,
  estimator: TokenEstimator = estimateTokens
): ConversationTurn[] {
  if (budgetTokens <= 0) {
    return [];
  }

  const kept: ConversationTurn[] = [];
  let used = 0;
  for (let index = history.length - 1; index >= 0; index -= 1) {
    const turn = history[index];
    if (!turn) {
      continue;
    }
    const cost = estimator(turn.content);
    if (used + cost > budgetTokens) {
      break;
    }
    used += cost;
    kept.unshift(turn);
  }

  return kept;
}
