import type { DocumentChunk, Page, PageTable, SourceDocument } from "@finscope/shared";
import { appConfig } from "../config.js";
import { ConfigurationError } from "../errors.js";
import type { ChunkerOptions, ChunkingResult } from "./types.js";

interface Span {
  start: number;
  end: number;
}

interface TablePiece extends Span {
  content: string;
}

const defaultOptions: ChunkerOptions = {
  chunkSize: appConfig.CHUNK_SIZE,
  chunkOverlap: appConfig.CHUNK_OVERLAP
};

// Ordered from most to least natural; each level is tried before falling back to the next.
const boundaryLevels: string[][] = [["\n\n"], ["\n"], [". ", "? ", "! ", "; "], [" ", "\t"]];

const CELL_SEPARATOR = " | ";

export class Chunker {
  private readonly options: ChunkerOptions;

  constructor(options: Partial<ChunkerOptions> = {}) {
    this.options = {
      ...defaultOptions,
      ...options
    };

    const { chunkSize, chunkOverlap } = this.options;
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new ConfigurationError(`Chunk size must be a positive integer, got ${chunkSize}`);
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
      throw new ConfigurationError(
        `Chunk overlap must be an integer in [0, ${chunkSize}), got ${chunkOverlap}`
      );
    }
  }

  getOptions(): ChunkerOptions {
    return { ...this.options };
  }

  chunk(document: SourceDocument): ChunkingResult {
    const chunks: DocumentChunk[] = [];
    const warnings: string[] = [];

    const pages = [...document.pages].sort((a, b) => a.pageNumber - b.pageNumber);
    for (const page of pages) {
      const pageChunks = this.chunkPage(document, page, chunks.length);
      if (pageChunks.length === 0) {
        warnings.push(`page ${page.pageNumber}: no extractable text`);
        continue;
      }
      chunks.push(...pageChunks);
    }

    if (pages.length === 0) {
      warnings.push("document has no pages");
    }

    return { chunks, warnings };
  }

  private chunkPage(document: SourceDocument, page: Page, firstIndex: number): DocumentChunk[] {
    const chunks: DocumentChunk[] = [];
    let index = firstIndex;

    const spans = splitIntoWindows(page.text, this.options.chunkSize, this.options.chunkOverlap);
    spans.forEach((span, position) => {
      const content = page.text.slice(span.start, span.end);
      chunks.push({
        id: `${document.id}:p${page.pageNumber}:c${position}`,
        documentId: document.id,
        documentTitle: document.title,
        pageNumber: page.pageNumber,
        kind: "text",
        index,
        start: span.start,
        end: span.end,
        content,
        length: content.length
      });
      index += 1;
    });

    (page.tables ?? []).forEach((table, tableIndex) => {
      const pieces = this.splitTable(table);
      pieces.forEach((piece, part) => {
        const suffix = pieces.length === 1 ? "" : `.${part}`;
        chunks.push({
          id: `${document.id}:p${page.pageNumber}:t${tableIndex}${suffix}`,
          documentId: document.id,
          documentTitle: document.title,
          pageNumber: page.pageNumber,
          kind: "table",
          index,
          start: piece.start,
          end: piece.end,
          content: piece.content,
          length: piece.content.length,
          tableIndex
        });
        index += 1;
      });
    });

    return chunks;
  }

  /**
   * Offsets of table pieces refer to the serialized table (see serializeTable).
   * Pieces after the first repeat the header row, so their content is the header
   * line followed by the serialized slice [start, end).
   */
  private splitTable(table: PageTable): TablePiece[] {
    const lines = table.rows.filter(hasContent).map(serializeRow);
    if (lines.length === 0) {
      return [];
    }

    const serialized = lines.join("\n");
    const maxLength = this.options.chunkSize;
    if (serialized.length <= maxLength) {
      return [{ start: 0, end: serialized.length, content: serialized }];
    }

    const lineStarts: number[] = [];
    let offset = 0;
    for (const line of lines) {
      lineStarts.push(offset);
      offset += line.length + 1;
    }

    const header = lines[0] ?? "";
    const pieces: TablePiece[] = [];
    let group: number[] = [];

    const flush = (): void => {
      const first = group[0];
      const last = group[group.length - 1];
      if (first === undefined || last === undefined) {
        return;
      }
      const start = lineStarts[first] ?? 0;
      const end = (lineStarts[last] ?? 0) + (lines[last] ?? "").length;
      const body = serialized.slice(start, end);
      const content = first === 0 ? body : `${header}\n${body}`;
      pieces.push({ start, end, content });
      group = [];
    };

    const groupLength = (rows: number[]): number => {
      const first = rows[0];
      const bodyLength = rows.reduce((sum, row) => sum + (lines[row] ?? "").length, 0) + rows.length - 1;
      return first === 0 ? bodyLength : header.length + 1 + bodyLength;
    };

    for (let row = 0; row < lines.length; row += 1) {
      const line = lines[row] ?? "";
      if (groupLength([...group, row]) <= maxLength) {
        group.push(row);
        continue;
      }

      flush();
      if (groupLength([row]) <= maxLength) {
        group.push(row);
        continue;
      }

      // A row that cannot fit next to the header: emit it alone, window-split if it still overflows.
      const rowStart = lineStarts[row] ?? 0;
      if (line.length <= maxLength) {
        pieces.push({ start: rowStart, end: rowStart + line.length, content: line });
        continue;
      }
      for (const span of splitIntoWindows(line, maxLength, this.options.chunkOverlap)) {
        pieces.push({
          start: rowStart + span.start,
          end: rowStart + span.end,
          content: line.slice(span.start, span.end)
        });
      }
    }
    flush();

    return pieces;
  }
}

export function serializeRow(row: string[]): string {
  return row.map((cell) => cell.replace(/\s+/g, " ").trim()).join(CELL_SEPARATOR);
}

function hasContent(row: string[]): boolean {
  return row.some((cell) => cell.trim().length > 0);
}

export function serializeTable(table: PageTable): string {
  return table.rows.filter(hasContent).map(serializeRow).join("\n");
}

/**
 * Sliding window over `text`. Each window ends on the most natural boundary found
 * in its second half (past the overlap), and the next window starts exactly
 * `overlap` characters before the previous end. Whitespace-only windows are skipped.
 */
export function splitIntoWindows(text: string, size: number, overlap: number): Span[] {
  if (text.trim().length === 0) {
    return [];
  }

  const spans: Span[] = [];
  const minAdvance = Math.max(overlap + 1, Math.floor(size / 2));
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + size, text.length);
    if (end < text.length) {
      end = findBoundary(text, start + minAdvance, end);
    }

    if (text.slice(start, end).trim().length > 0) {
      spans.push({ start, end });
    }
    if (end >= text.length) {
      break;
    }
    start = end - overlap;
  }

  return spans;
}

function findBoundary(text: string, lower: number, upper: number): number {
  for (const separators of boundaryLevels) {
    let best = -1;
    for (const separator of separators) {
      const position = text.lastIndexOf(separator, upper - separator.length);
      if (position < 0) {
        continue;
      }
      const end = position + separator.length;
      if (end >= lower && end <= upper && end > best) {
        best = end;
      }
    }
    if (best > 0) {
      return best;
    }
  }

  return upper;
}
