import type { DocumentChunk } from "@finscope/shared";
import { INSUFFICIENT_EVIDENCE_TOKEN } from "../services/citationParser.js";

export function formatEvidenceBlock(chunk: DocumentChunk): string {
  return [
    `<<chunk:${chunk.id}>>`,
    `document: ${chunk.documentTitle} | page: ${chunk.pageNumber}`,
    chunk.content,
    "<</chunk>>"
  ].join("\n");
}

export function buildAnswerSystemPrompt(evidence: DocumentChunk[]): string {
  return `
You answer questions about financial and legal reports using only the evidence below.

Evidence:
${evidence.map(formatEvidenceBlock).join("\n\n")}

Rules:
1. Use only the evidence. Do not rely on outside knowledge or earlier answers.
2. Tag every factual claim with the chunk it comes from: [cite:<chunk-id>]
3. When quoting, copy the text exactly from the chunk: [cite:<chunk-id> "exact quote"]
4. Cite only chunk ids that appear in the evidence above.
5. If the evidence does not answer the question, reply with exactly ${INSUFFICIENT_EVIDENCE_TOKEN} and nothing else.
6. Keep figures, units and periods exactly as written in the evidence.
`.trim();
}

export function buildAnswerUserPrompt(question: string): string {
  return `Question: ${question}`;
}
