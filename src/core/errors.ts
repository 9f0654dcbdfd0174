/**
 * Typed errors for the parsing, cleaning and merge pipeline.
 *
 * Structural failures (missing file, unknown extension, unreadable container)
 * propagate to the caller. MalformedTableError and DecodeFailureError are
 * recovered inside the extractors and only ever surface as warnings.
 */

export type ErrorCode =
  | "DOCMERGE_ERROR"
  | "FILE_NOT_FOUND"
  | "UNSUPPORTED_FORMAT"
  | "MALFORMED_TABLE"
  | "DECODE_FAILURE"
  | "MERGE_FAILURE";

export class DocMergeError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, options?: { code?: ErrorCode; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "DocMergeError";
    this.code = options?.code ?? "DOCMERGE_ERROR";

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class FileNotFoundError extends DocMergeError {
  readonly path: string;

  constructor(path: string) {
    super(`File not found: ${path}`, { code: "FILE_NOT_FOUND" });
    this.name = "FileNotFoundError";
    this.path = path;
  }
}

export class UnsupportedFormatError extends DocMergeError {
  readonly extension: string;
  /** Every extension the dispatcher recognizes */
  readonly supported: readonly string[];

  constructor(extension: string, supported: readonly string[]) {
    super(
      `Unsupported file format: ${extension || "(none)"}\n` +
        `Supported formats: ${supported.join(", ")}`,
      { code: "UNSUPPORTED_FORMAT" }
    );
    this.name = "UnsupportedFormatError";
    this.extension = extension;
    this.supported = supported;
  }
}

export class MalformedTableError extends DocMergeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { code: "MALFORMED_TABLE", ...options });
    this.name = "MalformedTableError";
  }
}

export class DecodeFailureError extends DocMergeError {
  readonly encoding: string;

  constructor(encoding: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Could not decode as ${encoding}${reason}`, { code: "DECODE_FAILURE", ...options });
    this.name = "DecodeFailureError";
    this.encoding = encoding;
  }
}

export class MergeFailureError extends DocMergeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { code: "MERGE_FAILURE", ...options });
    this.name = "MergeFailureError";
  }
}

/** Message of anything thrown, for one-line logging */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
