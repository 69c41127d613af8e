// Ledger error types

/** Rejected input; raised before either store is touched. */
export class LedgerValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LedgerValidationError';
  }
}

/** The search index refused a batch. The ledger has not been written. */
export class IngestionError extends Error {
  constructor(
    message: string,
    public readonly batchSize: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'IngestionError';
  }
}

export class IndexTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Search index query timed out after ${timeoutMs}ms`);
    this.name = 'IndexTimeoutError';
  }
}
