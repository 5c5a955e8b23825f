export type TallyErrorCode = 'MISSING_FIELD' | 'INVALID_ARGUMENT' | 'IO_ERROR' | 'ARXIV_API';

/**
 * Base class for errors surfaced to callers of the tally and arXiv modules.
 * Malformed cells are never reported through here; they contribute no values.
 */
export class TallyError extends Error {
  readonly code: TallyErrorCode;

  constructor(code: TallyErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TallyError';
    this.code = code;
  }
}

export class MissingFieldError extends TallyError {
  readonly field: string;

  constructor(field: string, columns: readonly string[]) {
    super('MISSING_FIELD', `Field "${field}" is not a column of the table (columns: ${columns.join(', ') || 'none'})`);
    this.name = 'MissingFieldError';
    this.field = field;
  }
}

export class InvalidArgumentError extends TallyError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
    this.name = 'InvalidArgumentError';
  }
}

export class IOError extends TallyError {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super('IO_ERROR', message, { cause });
    this.name = 'IOError';
    this.path = path;
  }
}

export class ArxivApiError extends TallyError {
  readonly status?: number;

  constructor(message: string, status?: number, cause?: unknown) {
    super('ARXIV_API', message, { cause });
    this.name = 'ArxivApiError';
    this.status = status;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
