export type ErrorKind =
  | 'network'
  | 'bad-status'
  | 'parse'
  | 'invalid-base-url'
  | 'missing-selector'
  | 'cancelled'
  | 'profile-validation'
  | 'source-not-found'
  | 'invalid-source-name';

export abstract class ArchiverError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NetworkError extends ArchiverError {
  readonly kind = 'network';

  constructor(cause: unknown) {
    super(`Network error: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export class BadStatus extends ArchiverError {
  readonly kind = 'bad-status';

  constructor(readonly status: number) {
    super(`Unexpected HTTP status ${status}`);
  }
}

export class ParseError extends ArchiverError {
  readonly kind = 'parse';

  constructor(message = 'Could not decode or parse response body') {
    super(message);
  }
}

export class InvalidBaseURL extends ArchiverError {
  readonly kind = 'invalid-base-url';

  constructor(readonly url: string) {
    super(`Invalid start URL: "${url}"`);
  }
}

export class MissingSelector extends ArchiverError {
  readonly kind = 'missing-selector';

  constructor(readonly selector: string) {
    super(`Missing ${selector} selector`);
  }
}

export class Cancelled extends ArchiverError {
  readonly kind = 'cancelled';

  constructor() {
    super('Operation cancelled');
  }
}

export class ProfileValidationError extends ArchiverError {
  readonly kind = 'profile-validation';
}

export class SourceNotFound extends ArchiverError {
  readonly kind = 'source-not-found';

  constructor(readonly ref: string) {
    super(`No source matches "${ref}"`);
  }
}

export class InvalidSourceName extends ArchiverError {
  readonly kind = 'invalid-source-name';

  constructor(readonly sourceName: string) {
    super(`"${sourceName}" cannot be used as a download folder name`);
  }
}

/** True for our own {@link Cancelled} and for DOM-style `AbortError`s. */
export function isCancellation(error: unknown): boolean {
  if (error instanceof Cancelled) return true;
  return error instanceof Error && error.name === 'AbortError';
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new Cancelled();
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
