/**
 * Lookup of a transaction (or other addressable resource) that does not exist.
 * Produced by the service layer; the store itself only reports absence.
 */
export class NotFoundError extends Error {
  constructor(
    message: string,
    public readonly resource: string,
    public readonly resourceId: string
  ) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class InvalidPaginationError extends Error {
  constructor(
    message: string,
    public readonly page: number,
    public readonly limit: number
  ) {
    super(message);
    this.name = 'InvalidPaginationError';
  }
}

export class InvalidSearchFiltersError extends Error {
  constructor(
    message: string,
    public readonly issues: { message: string; path: string }[] = []
  ) {
    super(message);
    this.name = 'InvalidSearchFiltersError';
  }
}

/**
 * The data source could not be read at all (missing file, no header row).
 * Aborts the whole load; a previously loaded store stays in place.
 */
export class DataLoadError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DataLoadError';
  }
}

/**
 * A single source row failed to parse. Recovered by the loader (row skipped).
 */
export class InvalidRecordDataError extends Error {
  constructor(
    message: string,
    public readonly rowNumber: number,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'InvalidRecordDataError';
  }
}
