/**
 * ShelfPort error types
 */

export class ImportError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ImportError';
  }
}

export interface RowProblem {
  row: number;              // 1-based data row (header excluded)
  missing: string[];
}

/** Source file or row unusable; raised before anything is persisted */
export class ValidationError extends ImportError {
  readonly problems: RowProblem[];

  constructor(message: string, problems: RowProblem[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.problems = problems;
  }
}

/** Book not found or ambiguous; recorded on the item, never fatal to the job */
export class ResolutionFailure extends ImportError {
  constructor(message: string) {
    super(message);
    this.name = 'ResolutionFailure';
  }
}

/** Storage write failed */
export class PersistenceError extends ImportError {
  constructor(message: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(`${message}${detail}`, { cause });
    this.name = 'PersistenceError';
  }
}

/** Remote catalog circuit is open; callers skip the remote lookup */
export class CatalogUnavailableError extends ImportError {
  constructor(source: string) {
    super(`${source} circuit breaker is open`);
    this.name = 'CatalogUnavailableError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
