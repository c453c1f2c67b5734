export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export class ListingWatchError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The upstream listing service could not be reached or answered with something unusable. */
export class FetchFailure extends ListingWatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('FETCH_FAILED', message, options);
  }
}

export type StoreFailureCode = 'INVALID_BATCH' | 'DUPLICATE_KEY' | 'WRITE_FAILED' | 'READ_FAILED';

export class StoreFailure extends ListingWatchError {
  declare readonly code: StoreFailureCode;

  constructor(code: StoreFailureCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
  }
}

export type DiffFailureCode = 'UNKNOWN_COMPLEX' | 'INVALID_RANGE';

export class DiffFailure extends ListingWatchError {
  declare readonly code: DiffFailureCode;

  constructor(code: DiffFailureCode, message: string) {
    super(code, message);
  }
}
