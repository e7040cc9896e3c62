export type ErrorKind =
  | "invalid_input"
  | "not_found"
  | "backpressure_drop"
  | "closed"
  | "policy_denied"
  | "transport_failure"
  | "parse_failure"
  | "storage_failure"
  | "timeout";

export class MemoryError extends Error {
  readonly kind: ErrorKind;
  readonly code: string | undefined;

  constructor(kind: ErrorKind, message: string, options?: { code?: string; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "MemoryError";
    this.kind = kind;
    this.code = options?.code;
  }
}

export function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return error.name === "AbortError" || error.name === "TimeoutError";
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new MemoryError("timeout", "operation cancelled", { cause: signal.reason });
  }
}

/**
 * Classifies an arbitrary failure. Errors raised by the SQLite driver become
 * `storage_failure`; aborts become `timeout`.
 */
export function toMemoryError(error: unknown, fallback: ErrorKind = "storage_failure"): MemoryError {
  if (error instanceof MemoryError) return error;
  if (isAbortError(error)) {
    return new MemoryError("timeout", "operation cancelled", { cause: error });
  }
  if (error instanceof Error) {
    const kind = error.name === "SqliteError" ? "storage_failure" : fallback;
    return new MemoryError(kind, error.message, { cause: error });
  }
  return new MemoryError(fallback, String(error));
}

export interface ErrorDocument {
  error: {
    kind: ErrorKind;
    code?: string;
    message: string;
  };
}

export function errorDocument(error: unknown): ErrorDocument {
  const normalized = toMemoryError(error);
  return {
    error: {
      kind: normalized.kind,
      ...(normalized.code ? { code: normalized.code } : {}),
      message: normalized.message,
    },
  };
}
