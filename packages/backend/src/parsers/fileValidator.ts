import { basename, extname } from "node:path";
import { fileTypeFromBuffer } from "file-type";

import type { DocumentFileType } from "@finscope/shared";

export interface UploadedFileLike {
  originalname: string;
  mimetype: string;
  size: number;
  buffer: Buffer;
}

export interface FileValidationOptions {
  maxSizeBytes?: number;
}

export interface ValidatedFile {
  fileType: DocumentFileType;
  sanitizedFilename: string;
  mimeType: string;
  size: number;
}

interface FileTypeRule {
  mime: string;
  /** Content check run after the MIME checks; returns a rejection reason or null. */
  inspect: (buffer: Buffer) => string | null;
}

const PDF_MAGIC = Buffer.from("%PDF-", "latin1");
// Encryption dictionaries live near the trailer; scanning the tail is enough.
const PDF_TRAILER_SCAN_BYTES = 4096;

const rules: Record<DocumentFileType, FileTypeRule> = {
  pdf: {
    mime: "application/pdf",
    inspect: (buffer) => {
      if (buffer.indexOf(PDF_MAGIC) !== 0) {
        return "File does not start with a PDF header.";
      }
      const tail = buffer.subarray(Math.max(0, buffer.length - PDF_TRAILER_SCAN_BYTES)).toString("latin1");
      return tail.includes("/Encrypt") ? "Encrypted PDFs are not supported." : null;
    }
  },
  txt: {
    mime: "text/plain",
    inspect: (buffer) => {
      if (buffer.includes(0)) {
        return "Text file contains binary data.";
      }
      try {
        new TextDecoder("utf-8", { fatal: true }).decode(buffer);
        return null;
      } catch {
        return "Text file is not valid UTF-8.";
      }
    }
  }
};

function fileTypeFor(extension: string): DocumentFileType | undefined {
  switch (extension) {
    case ".pdf":
      return "pdf";
    case ".txt":
      return "txt";
    default:
      return undefined;
  }
}

export class FileValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FileValidationError";
  }
}

/**
 * Checks an upload before it reaches a parser: extension, size, declared and
 * sniffed MIME type, then a per-type look at the bytes themselves.
 */
export async function validateUploadedFile(
  file: UploadedFileLike,
  options: FileValidationOptions = {}
): Promise<ValidatedFile> {
  const extension = extname(file.originalname).toLowerCase();
  const fileType = fileTypeFor(extension);
  if (!fileType) {
    throw new FileValidationError("Unsupported file extension. Only .pdf and .txt are allowed.");
  }

  if (options.maxSizeBytes !== undefined && file.size > options.maxSizeBytes) {
    throw new FileValidationError(`File is too large. Maximum size is ${options.maxSizeBytes} bytes.`);
  }
  if (file.size === 0 || file.buffer.length === 0) {
    throw new FileValidationError("File is empty.");
  }

  const rule = rules[fileType];
  const declared = file.mimetype.toLowerCase();
  // Browsers often send octet-stream for .txt uploads; that says nothing about the content.
  if (declared && declared !== "application/octet-stream" && declared !== rule.mime) {
    throw new FileValidationError(`MIME type mismatch for ${extension}. Received ${declared}.`);
  }

  const detected = await fileTypeFromBuffer(file.buffer);
  if (detected && detected.mime.toLowerCase() !== rule.mime) {
    throw new FileValidationError(`Binary signature mismatch for ${extension}. Detected ${detected.mime}.`);
  }

  const rejection = rule.inspect(file.buffer);
  if (rejection) {
    throw new FileValidationError(rejection);
  }

  return {
    fileType,
    sanitizedFilename: sanitizeFilename(file.originalname),
    mimeType: rule.mime,
    size: file.size
  };
}

export function sanitizeFilename(filename: string): string {
  const cleanBase = basename(filename).replace(/[^\w.-]/g, "_");
  return cleanBase.length > 0 ? cleanBase : "file";
}
