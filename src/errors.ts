import type { VariableKind } from "./types.js";

export type ErrorKind =
  | "ValidationError"
  | "UnsupportedVariableError"
  | "NetworkError"
  | "HttpStatusError"
  | "MalformedResponseError"
  | "IncompleteDataError"
  | "DataIntegrityError"
  | "StorageError"
  | "CorruptFileError";

export abstract class PipelineError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad input detected before any I/O. */
export class ValidationError extends PipelineError {
  readonly kind = "ValidationError";
}

export class UnsupportedVariableError extends PipelineError {
  readonly kind = "UnsupportedVariableError";

  constructor(readonly variable: string) {
    super(`Unsupported weather variable "${variable}"`);
  }
}

export class NetworkError extends PipelineError {
  readonly kind = "NetworkError";
}

export class HttpStatusError extends PipelineError {
  readonly kind = "HttpStatusError";

  constructor(readonly code: number, reason?: string) {
    super(
      reason
        ? `Weather API responded ${code}: ${reason}`
        : `Weather API responded ${code}`
    );
  }
}

export class MalformedResponseError extends PipelineError {
  readonly kind = "MalformedResponseError";
}

export class IncompleteDataError extends PipelineError {
  readonly kind = "IncompleteDataError";

  constructor(readonly variable: VariableKind) {
    super(`Response is missing requested variable "${variable}"`);
  }
}

export class DataIntegrityError extends PipelineError {
  readonly kind = "DataIntegrityError";
}

export type StorageErrorReason =
  | "unwritable-path"
  | "disk-full"
  | "concurrent-modification"
  | "invalid-record"
  | "io-error";

export class StorageError extends PipelineError {
  readonly kind = "StorageError";

  constructor(
    readonly reason: StorageErrorReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class CorruptFileError extends PipelineError {
  readonly kind = "CorruptFileError";

  constructor(readonly path: string, detail: string) {
    super(`${path} is not a valid weather table: ${detail}`);
  }
}

export type FetchError =
  | ValidationError
  | UnsupportedVariableError
  | NetworkError
  | HttpStatusError
  | MalformedResponseError;

export type StorageFailure = StorageError | CorruptFileError;

export function describeError(error: PipelineError): string {
  return `${error.kind}: ${error.message}`;
}
