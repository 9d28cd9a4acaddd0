import type { Page } from "@finscope/shared";

export interface ParsedDocumentResult {
  pages: Page[];
  metadata: {
    pageCount: number;
    wordCount: number;
    tableCount: number;
  };
}

/** Turns raw file bytes into ordered, 1-indexed pages. */
export interface DocumentParser {
  parse(buffer: Buffer): Promise<ParsedDocumentResult>;
}

export function countWords(input: string): number {
  const normalized = input.trim();
  if (normalized.length === 0) {
    return 0;
  }

  return normalized.split(/\s+/).length;
}

export function summarizePages(pages: Page[]): ParsedDocumentResult {
  return {
    pages,
    metadata: {
      pageCount: pages.length,
      wordCount: pages.reduce((total, page) => total + countWords(page.text), 0),
      tableCount: pages.reduce((total, page) => total + (page.tables?.length ?? 0), 0)
    }
  };
}
