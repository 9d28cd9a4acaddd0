import type { DocumentChunk, SourceDocument } from "@finscope/shared";

export function makeChunk(overrides: Partial<DocumentChunk> & Pick<DocumentChunk, "id" | "content">): DocumentChunk {
  return {
    documentId: "doc-a",
    documentTitle: "Annual Report A",
    pageNumber: 1,
    kind: "text",
    index: 0,
    start: 0,
    end: overrides.content.length,
    length: overrides.content.length,
    ...overrides
  };
}

export const annualReport: SourceDocument = {
  id: "acme-2023",
  title: "Acme Annual Report 2023",
  pages: [
    {
      pageNumber: 1,
      text: "Acme Corp reported total revenue of $4.2 billion for fiscal year 2023, up 8% from the prior year."
    },
    {
      pageNumber: 2,
      text: "Operating margin improved to 14.5% as freight costs declined. Headcount reached 12,400 employees."
    }
  ]
};
