import { createRequire } from "node:module";
import type pdfParse from "pdf-parse";
import type { Page, PageTable } from "@finscope/shared";
import { DocumentParseError } from "../errors.js";
import { summarizePages, type DocumentParser, type ParsedDocumentResult } from "./types.js";

interface PdfTextItem {
  str: string;
  x: number;
  y: number;
  width: number;
}

interface PdfPageLike {
  pageNumber?: unknown;
  getTextContent(options?: {
    normalizeWhitespace?: boolean;
    disableCombineTextItems?: boolean;
  }): Promise<{ items: unknown[] }>;
}

interface PdfLine {
  cells: string[];
}

export interface PDFParserOptions {
  /** Items whose baselines differ by at most this many units share a line. */
  lineTolerance: number;
  /** A horizontal gap wider than this starts a new cell. */
  columnGap: number;
  /** Consecutive multi-cell lines needed before they are read as a table. */
  minTableRows: number;
}

export type PdfParseFn = typeof pdfParse;

const require = createRequire(import.meta.url);

// pdf-parse runs its bundled self-test when it is loaded without a parent module.
function loadPdfParse(): PdfParseFn {
  const loaded: PdfParseFn = require("pdf-parse");
  return loaded;
}

const defaultOptions: PDFParserOptions = {
  lineTolerance: 2,
  columnGap: 12,
  minTableRows: 2
};

export class PDFParser implements DocumentParser {
  private readonly options: PDFParserOptions;
  private parsePdf: PdfParseFn | null;

  constructor(options: Partial<PDFParserOptions> = {}, deps: { parsePdf?: PdfParseFn } = {}) {
    this.options = { ...defaultOptions, ...options };
    this.parsePdf = deps.parsePdf ?? null;
  }

  async parse(buffer: Buffer): Promise<ParsedDocumentResult> {
    // pdf-parse renders pages one after another; each render is collected here and
    // awaited once the whole document has been walked.
    const renders: Promise<Page>[] = [];
    if (!this.parsePdf) {
      this.parsePdf = loadPdfParse();
    }
    const parsePdf = this.parsePdf;

    try {
      await parsePdf(buffer, {
        pagerender: (pageData: unknown) => {
          const pageNumber = renders.length + 1;
          renders.push(this.renderPage(pageData, pageNumber));
          return "";
        }
      });
    } catch (error) {
      await Promise.allSettled(renders);
      throw new DocumentParseError("Unable to read PDF document", { cause: error });
    }

    let pages: Page[];
    try {
      pages = await Promise.all(renders);
    } catch (error) {
      throw new DocumentParseError("Unable to extract PDF page text", { cause: error });
    }

    return summarizePages(pages);
  }

  private async renderPage(pageData: unknown, fallbackNumber: number): Promise<Page> {
    if (!isPdfPage(pageData)) {
      return { pageNumber: fallbackNumber, text: "" };
    }

    const pageNumber =
      typeof pageData.pageNumber === "number" && Number.isInteger(pageData.pageNumber)
        ? pageData.pageNumber
        : fallbackNumber;

    const content = await pageData.getTextContent({
      normalizeWhitespace: false,
      disableCombineTextItems: false
    });
    const items = content.items
      .map((item) => toTextItem(item))
      .filter((item): item is PdfTextItem => item !== null);

    const lines = this.groupLines(items);
    const { textLines, tables } = this.detectTables(lines);

    const page: Page = {
      pageNumber,
      text: textLines.join("\n")
    };
    if (tables.length > 0) {
      page.tables = tables;
    }
    return page;
  }

  private groupLines(items: PdfTextItem[]): PdfLine[] {
    // PDF user space grows upwards, so the top of the page has the largest y.
    const sorted = [...items].sort((a, b) => b.y - a.y || a.x - b.x);
    const rows: PdfTextItem[][] = [];

    for (const item of sorted) {
      const current = rows[rows.length - 1];
      const anchor = current?.[0];
      if (current && anchor && Math.abs(anchor.y - item.y) <= this.options.lineTolerance) {
        current.push(item);
      } else {
        rows.push([item]);
      }
    }

    return rows
      .map((row) => this.toCells([...row].sort((a, b) => a.x - b.x)))
      .filter((line) => line.cells.length > 0);
  }

  private toCells(row: PdfTextItem[]): PdfLine {
    const cells: string[] = [];
    let cell = "";
    let previousEnd: number | null = null;

    for (const item of row) {
      const gap = previousEnd === null ? 0 : item.x - previousEnd;
      if (previousEnd !== null && gap > this.options.columnGap) {
        cells.push(cell.trim());
        cell = "";
      } else if (gap > 1 && cell.length > 0 && !/\s$/.test(cell) && !/^\s/.test(item.str)) {
        cell += " ";
      }
      cell += item.str;
      previousEnd = item.x + item.width;
    }
    cells.push(cell.trim());

    return { cells: cells.filter((value) => value.length > 0) };
  }

  private detectTables(lines: PdfLine[]): { textLines: string[]; tables: PageTable[] } {
    const textLines: string[] = [];
    const tables: PageTable[] = [];
    let run: PdfLine[] = [];

    const flush = (): void => {
      if (run.length >= this.options.minTableRows) {
        tables.push({ rows: run.map((line) => line.cells) });
      } else {
        textLines.push(...run.map((line) => line.cells.join(" ")));
      }
      run = [];
    };

    for (const line of lines) {
      if (line.cells.length >= 2) {
        run.push(line);
        continue;
      }
      flush();
      textLines.push(line.cells.join(" "));
    }
    flush();

    return { textLines, tables };
  }
}

function isPdfPage(value: unknown): value is PdfPageLike {
  return (
    typeof value === "object" &&
    value !== null &&
    "getTextContent" in value &&
    typeof value.getTextContent === "function"
  );
}

function toTextItem(value: unknown): PdfTextItem | null {
  if (typeof value !== "object" || value === null) {
    return null;
  }
  if (!("str" in value) || typeof value.str !== "string" || value.str.length === 0) {
    return null;
  }
  if (!("transform" in value) || !Array.isArray(value.transform)) {
    return null;
  }

  const x = value.transform[4];
  const y = value.transform[5];
  if (typeof x !== "number" || typeof y !== "number") {
    return null;
  }

  const width = "width" in value && typeof value.width === "number" ? value.width : 0;
  return { str: value.str, x, y, width };
}
