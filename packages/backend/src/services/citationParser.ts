import type { Citation, DocumentChunk } from "@finscope/shared";

export const INSUFFICIENT_EVIDENCE_TOKEN = "INSUFFICIENT_EVIDENCE";

/** Characters a chunk id, and so a document id, may use and still be cited. */
export const CITABLE_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;

// [cite:<chunk-id>] or [cite:<chunk-id> "verbatim quote"]
const CITATION_PATTERN = /\[cite:([A-Za-z0-9._:-]+)(?:\s+["“]([^"”\]]*)["”])?\s*\]/g;
// Anything left that still opens a citation marker, up to its bracket or the end of the line.
const MALFORMED_PATTERN = /\[cite\b[^\]\n]*\]?/gi;

export interface CitationReference {
  chunkId: string;
  quote?: string;
}

export interface ParsedAnswer {
  text: string;
  references: CitationReference[];
  malformedCount: number;
  insufficientEvidence: boolean;
}

export interface GroundedCitations {
  citations: Citation[];
  droppedReferences: string[];
  groundingViolation: boolean;
}

export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/**
 * Splits a model response into prose and citation references. Only well-formed
 * markers become references; any other `[cite` fragment is removed and counted.
 */
export function parseCitedAnswer(raw: string): ParsedAnswer {
  const trimmed = raw.trim();
  if (trimmed === INSUFFICIENT_EVIDENCE_TOKEN) {
    return { text: "", references: [], malformedCount: 0, insufficientEvidence: true };
  }

  const references: CitationReference[] = [];
  const withoutCitations = trimmed.replace(CITATION_PATTERN, (_match, chunkId: string, quote?: string) => {
    const reference: CitationReference = { chunkId };
    if (quote !== undefined && normalizeWhitespace(quote).length > 0) {
      reference.quote = quote;
    }
    references.push(reference);
    return "";
  });

  let malformedCount = 0;
  const withoutFragments = withoutCitations.replace(MALFORMED_PATTERN, () => {
    malformedCount += 1;
    return "";
  });

  return {
    text: tidyProse(withoutFragments),
    references,
    malformedCount,
    insufficientEvidence: false
  };
}

/**
 * Keeps references that point into the evidence and whose quote (if any) occurs in
 * the cited chunk. Citations come back deduplicated and in evidence (retrieval) order.
 */
export function groundReferences(references: CitationReference[], evidence: DocumentChunk[]): GroundedCitations {
  const rankById = new Map(evidence.map((chunk, rank) => [chunk.id, rank] as const));
  const chunkById = new Map(evidence.map((chunk) => [chunk.id, chunk] as const));
  const accepted = new Map<string, Citation>();
  const droppedReferences: string[] = [];

  for (const reference of references) {
    const chunk = chunkById.get(reference.chunkId);
    if (!chunk) {
      droppedReferences.push(reference.chunkId);
      continue;
    }
    if (reference.quote !== undefined && !quoteAppearsIn(reference.quote, chunk.content)) {
      droppedReferences.push(`${reference.chunkId} "${normalizeWhitespace(reference.quote)}"`);
      continue;
    }

    const existing = accepted.get(chunk.id);
    if (existing) {
      if (existing.quote === undefined && reference.quote !== undefined) {
        existing.quote = normalizeWhitespace(reference.quote);
      }
      continue;
    }

    const citation: Citation = {
      documentId: chunk.documentId,
      documentTitle: chunk.documentTitle,
      pageNumber: chunk.pageNumber,
      chunkId: chunk.id
    };
    if (reference.quote !== undefined) {
      citation.quote = normalizeWhitespace(reference.quote);
    }
    accepted.set(chunk.id, citation);
  }

  const citations = [...accepted.values()].sort(
    (a, b) => (rankById.get(a.chunkId) ?? 0) - (rankById.get(b.chunkId) ?? 0)
  );

  return {
    citations,
    droppedReferences,
    groundingViolation: droppedReferences.length > 0
  };
}

export function quoteAppearsIn(quote: string, content: string): boolean {
  const needle = normalizeWhitespace(quote);
  return needle.length > 0 && normalizeWhitespace(content).includes(needle);
}

function tidyProse(text: string): string {
  return text
    .split("\n")
    .map((line) =>
      line
        .replace(/[ \t]{2,}/g, " ")
        .replace(/[ \t]+([.,;:!?)])/g, "$1")
        .trimEnd()
    )
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}
