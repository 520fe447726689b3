/**
 * Errors raised while ingesting a snapshot. All of them are scoped to a
 * single ingestion call and leave previously stored state untouched.
 */
export class IngestError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A field required for identity (listing id, suburb/state/postcode) is
 * missing, or the source is not known. The snapshot is rejected wholesale.
 */
export class NormalizationError extends IngestError {
  constructor(
    public readonly sourceId: string,
    public readonly field: string,
    message = `${sourceId} payload is missing ${field}`
  ) {
    super(message);
  }
}

/**
 * Applying the snapshot would break an aggregate invariant.
 */
export class InvalidStateError extends IngestError {
  constructor(
    message: string,
    public readonly listingId?: string
  ) {
    super(message);
  }
}

/**
 * The store could not apply the commit atomically because another writer
 * got there first, or the store itself failed. Safe to retry from a fresh
 * load.
 */
export class ConflictError extends IngestError {
  constructor(
    public readonly listingId: string,
    message = `Concurrent write detected for listing ${listingId}`,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}
