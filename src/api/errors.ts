/**
 * Error taxonomy for the directory client
 *
 * Every failure a façade operation can report is one of these classes.
 * `status` is carried on all of them (0 when no response was received) so
 * callers can branch on it without inspecting the error type.
 */

import type { ODataError } from './odata.js';

/**
 * Base class for client errors
 */
export abstract class DirectoryClientError extends Error {
  /** HTTP status of the response that caused the error, 0 if none */
  public readonly status: number;
  /** Operation that produced the error, e.g. `applications.update` */
  public operation?: string;

  protected constructor(message: string, status: number, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.status = status;
  }
}

/**
 * A required identifier or argument was missing; no request was made
 */
export class PreconditionError extends DirectoryClientError {
  constructor(message: string) {
    super(message, 0);
    this.name = 'PreconditionError';
  }
}

/**
 * The request could not be sent or its body could not be read
 */
export class TransportError extends DirectoryClientError {
  public readonly timedOut: boolean;

  constructor(message: string, options: { cause?: unknown; timedOut?: boolean; status?: number } = {}) {
    super(message, options.status ?? 0, options.cause);
    this.name = 'TransportError';
    this.timedOut = options.timedOut ?? false;
  }
}

/**
 * Encoding a payload or decoding a response failed
 */
export class CodecError extends DirectoryClientError {
  public readonly step: 'marshal' | 'unmarshal';

  constructor(step: 'marshal' | 'unmarshal', message: string, options: { cause?: unknown; status?: number } = {}) {
    super(`${step}: ${message}`, options.status ?? 0, options.cause);
    this.name = 'CodecError';
    this.step = step;
  }
}

/**
 * The caller's AbortSignal fired; no further attempts were made
 */
export class CancelledError extends DirectoryClientError {
  constructor(message = 'Operation cancelled', cause?: unknown) {
    super(message, 0, cause);
    this.name = 'CancelledError';
  }
}

/**
 * The directory answered with a status the operation does not accept
 */
export class ApiRequestError extends DirectoryClientError {
  public readonly code?: string;
  public readonly odataError?: ODataError;
  public readonly retryAfter?: number;
  /** Set when the consistency policy asked for this response to be retried */
  public readonly consistencyFailure: boolean;

  constructor(
    message: string,
    status: number,
    options: {
      odataError?: ODataError;
      retryAfter?: number;
      consistencyFailure?: boolean;
      cause?: unknown;
    } = {}
  ) {
    super(message, status, options.cause);
    this.name = 'ApiRequestError';
    this.odataError = options.odataError;
    this.code = options.odataError?.code;
    this.retryAfter = options.retryAfter;
    this.consistencyFailure = options.consistencyFailure ?? false;
  }

  isNotFound(): boolean {
    return this.status === 404;
  }
}

/**
 * Union of every error a façade operation may return
 */
export type DirectoryError =
  | PreconditionError
  | TransportError
  | CodecError
  | CancelledError
  | ApiRequestError;

/**
 * Narrow an unknown thrown value to the client taxonomy
 */
export function isDirectoryError(error: unknown): error is DirectoryError {
  return (
    error instanceof PreconditionError ||
    error instanceof TransportError ||
    error instanceof CodecError ||
    error instanceof CancelledError ||
    error instanceof ApiRequestError
  );
}
