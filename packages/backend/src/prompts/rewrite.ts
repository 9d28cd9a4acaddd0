import type { ConversationTurn } from "@finscope/shared";

export const QUERY_REWRITE_SYSTEM_PROMPT = `
Rewrite the user's latest question into a single standalone search query.
Resolve pronouns and references using the conversation so far.
Keep company names, metrics, periods and figures unchanged.
Return only the rewritten query on one line, without quotes or explanation.
`.trim();

export function buildQueryRewritePrompt(history: ConversationTurn[], question: string): string {
  const transcript = history.map((turn) => `${turn.role}: ${turn.content}`).join("\n");
  return `
Conversation:
${transcript}

Latest question: ${question}
`.trim();
}
