export type SyncErrorKind =
  | "SourceUnavailable"
  | "SubmissionFailed"
  | "StateStoreError"
  | "ConfigError";

export abstract class SyncError extends Error {
  abstract readonly kind: SyncErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The GoodLinks store could not be read. Always aborts the run before anything is sent. */
export class SourceUnavailableError extends SyncError {
  readonly kind = "SourceUnavailable";
}

/** A single link was not accepted. Recorded against the item; the run continues. */
export class SubmissionFailedError extends SyncError {
  readonly kind = "SubmissionFailed";

  constructor(
    message: string,
    public readonly retryable: boolean,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * Instapaper refused the credentials. Every further submission would fail
 * the same way, so the engine stops sending for the rest of the run.
 */
export class AuthenticationFailedError extends SubmissionFailedError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, false, 403, options);
  }
}

export class StateStoreError extends SyncError {
  readonly kind = "StateStoreError";
}

export class ConfigError extends SyncError {
  readonly kind = "ConfigError";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
