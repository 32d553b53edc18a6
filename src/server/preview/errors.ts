/**
 * Error taxonomy for the preview lifecycle.
 *
 * Every error carries a stable `code` and the HTTP status the API maps it to.
 */

export class PreviewError extends Error {
  readonly code: string;

  readonly httpStatus: number;

  constructor(code: string, message: string, httpStatus: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.httpStatus = httpStatus;
  }
}

export class ValidationError extends PreviewError {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super('VALIDATION_ERROR', message, 400);
    this.details = details;
  }
}

export class NotFoundError extends PreviewError {
  constructor(previewId: string) {
    super('NOT_FOUND', `Preview ${previewId} not found`, 404);
  }
}

export class ConflictError extends PreviewError {
  constructor(message: string) {
    super('CONFLICT', message, 409);
  }
}

export class InvalidStateError extends PreviewError {
  constructor(message: string) {
    super('INVALID_STATE', message, 409);
  }
}

/** Infra hiccup worth retrying: daemon unreachable, 5xx, timeouts */
export class ProvisionerTransientError extends PreviewError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PROVISIONER_TRANSIENT', message, 503, options);
  }
}

/** Infra refusal that a retry cannot fix: bad image, rejected config */
export class ProvisionerPermanentError extends PreviewError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PROVISIONER_PERMANENT', message, 502, options);
  }
}

export class CreationFailedError extends PreviewError {
  readonly previewId: string;

  readonly rolledBack: boolean;

  constructor(previewId: string, rolledBack: boolean, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const suffix = rolledBack
      ? 'all resources were rolled back'
      : 'rollback failed, preview left as failed for out-of-band cleanup';
    super('CREATION_FAILED', `Failed to create preview ${previewId}: ${reason} (${suffix})`, 500, { cause });
    this.previewId = previewId;
    this.rolledBack = rolledBack;
  }
}

/** Internal: raised inside a cleanup attempt, never to the caller of the worker */
export class TeardownFailedError extends PreviewError {
  constructor(previewId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('TEARDOWN_FAILED', `Teardown of preview ${previewId} failed: ${reason}`, 500, { cause });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
