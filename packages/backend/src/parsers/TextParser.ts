import type { Page } from "@finscope/shared";
import { summarizePages, type DocumentParser, type ParsedDocumentResult } from "./types.js";

const PAGE_BREAK = "\f";

export class TextParser implements DocumentParser {
  async parse(buffer: Buffer): Promise<ParsedDocumentResult> {
    const text = buffer.toString("utf8").replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
    const segments = text.split(PAGE_BREAK);
    // A trailing form feed closes the last page rather than opening an empty one.
    if (segments.length > 1 && segments[segments.length - 1] === "") {
      segments.pop();
    }

    const pages: Page[] = segments.map((segment, index) => ({
      pageNumber: index + 1,
      text: segment
    }));
    return summarizePages(pages);
  }
}
