/**
 * Error taxonomy. Every error the pipeline raises carries a stable `code`
 * so the summary and the CLI can report it without matching on messages.
 */

export type ErrorCode =
  | "VALIDATION"
  | "UNKNOWN_PLACEHOLDER"
  | "CONFIG"
  | "RATE_LIMITED"
  | "TRANSIENT_SERVICE"
  | "PERMANENT_SERVICE"
  | "FILESYSTEM"
  | "UNDO_CONFLICT"
  | "LEDGER_WRITE"
  | "CANCELLED";

export class MedianameError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad pattern or unusable input, raised before any mutation. */
export class ValidationError extends MedianameError {
  constructor(message: string, code: ErrorCode = "VALIDATION") {
    super(code, message);
  }
}

export class UnknownPlaceholder extends ValidationError {
  readonly placeholder: string;

  constructor(placeholder: string) {
    super(`Unknown placeholder: {${placeholder}}`, "UNKNOWN_PLACEHOLDER");
    this.placeholder = placeholder;
  }
}

export class ConfigError extends MedianameError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG", message, options);
  }
}

export class RateLimitedError extends MedianameError {
  readonly retryAfterMs: number | undefined;

  constructor(message: string, retryAfterMs?: number) {
    super("RATE_LIMITED", message);
    this.retryAfterMs = retryAfterMs;
  }
}

export class TransientServiceError extends MedianameError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("TRANSIENT_SERVICE", message, options);
  }
}

export class PermanentServiceError extends MedianameError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PERMANENT_SERVICE", message, options);
  }
}

export class FilesystemError extends MedianameError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super("FILESYSTEM", message, options);
    this.path = path;
  }
}

export class UndoConflict extends MedianameError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super("UNDO_CONFLICT", `Cannot undo ${path}: ${reason}`);
    this.path = path;
  }
}

export class LedgerWriteError extends MedianameError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("LEDGER_WRITE", message, options);
  }
}

export class CancelledError extends MedianameError {
  constructor(message = "Batch cancelled.") {
    super("CANCELLED", message);
  }
}

export function isRetryable(err: unknown): err is RateLimitedError | TransientServiceError {
  return err instanceof RateLimitedError || err instanceof TransientServiceError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
