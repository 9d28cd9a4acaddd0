export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class ProviderTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Provider request timeout after ${timeoutMs}ms`);
    this.name = "ProviderTimeoutError";
  }
}

export class OperationCancelledError extends Error {
  constructor(message = "Operation was cancelled") {
    super(message);
    this.name = "OperationCancelledError";
  }
}

export class DocumentNotFoundError extends Error {
  constructor(documentId: string) {
    super(`Document does not exist: ${documentId}`);
    this.name = "DocumentNotFoundError";
  }
}

export class ChatSessionNotFoundError extends Error {
  constructor(sessionId: string) {
    super(`Chat session does not exist: ${sessionId}`);
    this.name = "ChatSessionNotFoundError";
  }
}

export class DocumentParseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DocumentParseError";
  }
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new OperationCancelledError();
  }
}

/** Errors that must surface immediately instead of degrading the result. */
export function isFatalError(error: unknown): boolean {
  return error instanceof ConfigurationError || error instanceof OperationCancelledError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
