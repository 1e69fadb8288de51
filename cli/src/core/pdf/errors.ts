/**
 * Error taxonomy for the merge/split engines.
 *
 * Per-item failures are recorded on the batch outcome; these classes describe
 * the failure of an item or of the whole batch.
 */

export type FolioErrorCode =
  | 'OPEN_FAILED'
  | 'SAVE_FAILED'
  | 'INVALID_ARGUMENT'
  | 'NO_PAGES'
  | 'NOT_FOUND'
  | 'CANCELLED';

export class FolioError extends Error {
  readonly code: FolioErrorCode;

  constructor(code: FolioErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FolioError';
    this.code = code;
  }
}

/** Source missing, unreadable or not a parseable PDF. */
export class PdfOpenError extends FolioError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super('OPEN_FAILED', message, options);
    this.name = 'PdfOpenError';
    this.path = path;
  }
}

/** Output could not be serialized or written. */
export class PdfSaveError extends FolioError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super('SAVE_FAILED', message, options);
    this.name = 'PdfSaveError';
    this.path = path;
  }
}

export class InvalidArgumentError extends FolioError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
    this.name = 'InvalidArgumentError';
  }
}

export class NoPagesError extends FolioError {
  constructor(message = 'No pages could be copied from the given sources') {
    super('NO_PAGES', message);
    this.name = 'NoPagesError';
  }
}

export class NotFoundError extends FolioError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super('NOT_FOUND', message, options);
    this.name = 'NotFoundError';
    this.path = path;
  }
}

export class CancelledError extends FolioError {
  constructor(message = 'Operation cancelled') {
    super('CANCELLED', message);
    this.name = 'CancelledError';
  }
}

/** Message of any thrown value. */
export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
