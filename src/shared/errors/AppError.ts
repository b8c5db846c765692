/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 * A comparison run meets two kinds of errors:
 *
 *   1. Row-scoped errors — a malformed geohash or a provider that failed for one
 *      pair. These degrade that row's record and the batch continues.
 *      DecodeError and ProviderError live here; they never escape the comparator.
 *
 *   2. Fatal errors — the input can't be read or understood, or the output
 *      can't be written. These abort the run with a non-zero exit code.
 *
 * `isOperational` separates expected failures (print the message) from
 * programmer errors (print the stack). `exitCode` is what the CLI hands back
 * to the shell.
 *
 * Why `Object.setPrototypeOf(this, new.target.prototype)`?
 *   When you `extends Error`, the prototype chain can break in some compilation
 *   targets, making `instanceof DecodeError` return false. This line fixes the
 *   chain so every `instanceof` check below works.
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly exitCode: number;

  constructor(message: string, code = 'APP_ERROR', isOperational = true, exitCode = 1) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.isOperational = isOperational;
    this.exitCode = exitCode;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Malformed geohash. Row-scoped: the record is emitted with an error marker. */
export class DecodeError extends AppError {
  constructor(geohash: string, reason: string) {
    super(`Invalid geohash "${geohash}": ${reason}`, 'DECODE_ERROR');
  }
}

/**
 * Provider call failed (network, timeout, HTTP status or provider status).
 * Row-scoped: `status` becomes the ProviderResult status.
 */
export class ProviderError extends AppError {
  constructor(
    public readonly provider: string,
    public readonly status: string,
    detail?: string,
    /** Response body as received, when the failure came with one. */
    public readonly rawResponse?: string,
  ) {
    super(`${provider} request failed: ${detail ?? status}`, 'PROVIDER_ERROR');
  }
}

/** No recognised geohash column pair, or an unsupported file type. Fatal before any row runs. */
export class InputFormatError extends AppError {
  constructor(message: string) {
    super(message, 'INPUT_FORMAT_ERROR');
  }
}

/** Output path could not be written. Fatal after processing. */
export class WriteError extends AppError {
  constructor(path: string, reason: string) {
    super(`Cannot write ${path}: ${reason}`, 'WRITE_ERROR');
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier: string) {
    super(`${resource} not found: ${identifier}`, 'NOT_FOUND');
  }
}

/** Bad command-line usage. Exit code 2, the usual convention for usage errors. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', true, 2);
  }
}
