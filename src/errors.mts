// @author lockerdb contributors
// @date 2026-10-19
/**
 * Error taxonomy for the record store.
 * Every layer throws one of these; the CLI, REST API and web UI map the `kind`
 * to an exit code, an HTTP status or an inline message.
 */

export type StoreErrorKind =
  | 'AlreadyExists'
  | 'NotFound'
  | 'InvalidEncoding'
  | 'AuthenticationFailure'
  | 'MalformedEnvelope'
  | 'IOError'
  | 'InvalidName';

export abstract class StoreError extends Error {
  abstract readonly kind: StoreErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class AlreadyExistsError extends StoreError {
  readonly kind = 'AlreadyExists';
}

export class NotFoundError extends StoreError {
  readonly kind = 'NotFound';
}

export class InvalidEncodingError extends StoreError {
  readonly kind = 'InvalidEncoding';
}

export class AuthenticationFailureError extends StoreError {
  readonly kind = 'AuthenticationFailure';
}

export class MalformedEnvelopeError extends StoreError {
  readonly kind = 'MalformedEnvelope';
}

export class StorageIOError extends StoreError {
  readonly kind = 'IOError';
}

export class InvalidNameError extends StoreError {
  readonly kind = 'InvalidName';
}

export function isStoreError(error: unknown): error is StoreError {
  return error instanceof StoreError;
}

/**
 * Extracts error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * True for Node-style "no such file or directory" errors, from `node:fs` or the in-memory file system.
 */
export function isEnoentError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * HTTP status used by the REST API and the web UI for each error kind.
 */
export function httpStatusFor(error: unknown): number {
  if (!isStoreError(error)) return 500;
  switch (error.kind) {
    case 'AlreadyExists':
      return 409;
    case 'NotFound':
      return 404;
    case 'InvalidEncoding':
    case 'InvalidName':
      return 400;
    case 'AuthenticationFailure':
    case 'MalformedEnvelope':
    case 'IOError':
      return 500;
  }
}
