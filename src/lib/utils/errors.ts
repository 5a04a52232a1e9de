/**
 * Custom error classes for the retrieval pipeline
 */

/**
 * Error thrown for caller-fixable configuration problems
 * (chunk sizes, k <= 0, unparsable settings). Never retried.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Error thrown when a document has no text to ingest
 */
export class EmptyDocumentError extends Error {
  constructor(message: string, public documentPath?: string) {
    super(message);
    this.name = 'EmptyDocumentError';
    Object.setPrototypeOf(this, EmptyDocumentError.prototype);
  }
}

/**
 * Error thrown when a query is empty or whitespace only
 */
export class EmptyQueryError extends Error {
  constructor(message = 'Query must be a non-empty string') {
    super(message);
    this.name = 'EmptyQueryError';
    Object.setPrototypeOf(this, EmptyQueryError.prototype);
  }
}

/**
 * Error thrown when an upstream API rate limit is exceeded
 */
export class RateLimitError extends Error {
  constructor(message: string, public retryAfter?: number) {
    super(message);
    this.name = 'RateLimitError';
    Object.setPrototypeOf(this, RateLimitError.prototype);
  }
}

/**
 * Error thrown for transient upstream failures (5xx, connection resets, upstream timeouts)
 */
export class ServiceUnavailableError extends Error {
  constructor(
    message: string,
    public status?: number,
    public originalError?: Error
  ) {
    super(message);
    this.name = 'ServiceUnavailableError';
    Object.setPrototypeOf(this, ServiceUnavailableError.prototype);
  }
}

/**
 * Error thrown when an operation exceeds its caller-supplied deadline
 */
export class TimeoutError extends Error {
  constructor(
    message: string,
    public operation: string,
    public timeoutMs: number
  ) {
    super(message);
    this.name = 'TimeoutError';
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

/**
 * Error thrown when embedding generation fails permanently for a whole request
 */
export class EmbeddingError extends Error {
  constructor(
    message: string,
    public originalError?: Error,
    public status?: number
  ) {
    super(message);
    this.name = 'EmbeddingError';
    Object.setPrototypeOf(this, EmbeddingError.prototype);
  }
}

/**
 * Error reported per input when the provider refuses a single text
 * (blank, oversized or otherwise malformed)
 */
export class EmbeddingRejectedError extends Error {
  public fingerprint?: string;
  public originalError?: Error;

  constructor(
    message: string,
    details: { fingerprint?: string; originalError?: Error } = {}
  ) {
    super(message);
    this.name = 'EmbeddingRejectedError';
    this.fingerprint = details.fingerprint;
    this.originalError = details.originalError;
    Object.setPrototypeOf(this, EmbeddingRejectedError.prototype);
  }
}

/**
 * Error thrown when the embedding provider stays unavailable after all retries.
 *
 * `partial` holds every vector (keyed by fingerprint) that was available to the
 * failed call, so callers can persist what succeeded.
 */
export class EmbeddingProviderUnavailableError extends Error {
  constructor(
    message: string,
    public partial: ReadonlyMap<string, readonly number[]> = new Map(),
    public originalError?: Error
  ) {
    super(message);
    this.name = 'EmbeddingProviderUnavailableError';
    Object.setPrototypeOf(this, EmbeddingProviderUnavailableError.prototype);
  }

  get succeededFingerprints(): string[] {
    return [...this.partial.keys()];
  }
}

/**
 * Error thrown when a vector's length disagrees with its collection's dimension
 */
export class DimensionMismatchError extends Error {
  constructor(
    public collection: string,
    public expected: number,
    public actual: number
  ) {
    super(
      `Vector dimension ${actual} does not match collection "${collection}" dimension ${expected}`
    );
    this.name = 'DimensionMismatchError';
    Object.setPrototypeOf(this, DimensionMismatchError.prototype);
  }
}

/**
 * Error thrown when a collection name is taken with a different dimension or metric
 */
export class CollectionAlreadyExistsError extends Error {
  constructor(public collection: string, message: string) {
    super(message);
    this.name = 'CollectionAlreadyExistsError';
    Object.setPrototypeOf(this, CollectionAlreadyExistsError.prototype);
  }
}

/**
 * Error thrown when a collection does not exist in the vector store
 */
export class CollectionNotFoundError extends Error {
  constructor(public collection: string) {
    super(`Collection not found: ${collection}`);
    this.name = 'CollectionNotFoundError';
    Object.setPrototypeOf(this, CollectionNotFoundError.prototype);
  }
}

/**
 * Error thrown when a full rebuild exceeds its wall-clock budget.
 * The collection is left in the optimizing state.
 */
export class RebuildTimeoutError extends Error {
  constructor(
    public collection: string,
    public budgetMs: number
  ) {
    super(`Full rebuild of "${collection}" did not complete within ${budgetMs}ms`);
    this.name = 'RebuildTimeoutError';
    Object.setPrototypeOf(this, RebuildTimeoutError.prototype);
  }
}

/**
 * Error thrown when a full rebuild cleared a collection but could not
 * write every exported record back
 */
export class RebuildIncompleteError extends Error {
  constructor(
    public collection: string,
    public restored: number,
    public expected: number,
    public missingDocuments: string[],
    public originalError?: Error
  ) {
    super(
      `Full rebuild of "${collection}" restored ${restored} of ${expected} records` +
        (originalError ? `: ${originalError.message}` : '')
    );
    this.name = 'RebuildIncompleteError';
    Object.setPrototypeOf(this, RebuildIncompleteError.prototype);
  }
}

/**
 * Error thrown when vector store operations fail
 */
export class VectorDatabaseError extends Error {
  constructor(message: string, public originalError?: Error) {
    super(message);
    this.name = 'VectorDatabaseError';
    Object.setPrototypeOf(this, VectorDatabaseError.prototype);
  }
}

/**
 * Normalizes an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function isEmptyDocumentError(error: unknown): error is EmptyDocumentError {
  return error instanceof EmptyDocumentError;
}

export function isEmptyQueryError(error: unknown): error is EmptyQueryError {
  return error instanceof EmptyQueryError;
}

/**
 * Type guard to check if an error is a RateLimitError
 */
export function isRateLimitError(error: unknown): error is RateLimitError {
  return error instanceof RateLimitError;
}

export function isServiceUnavailableError(
  error: unknown
): error is ServiceUnavailableError {
  return error instanceof ServiceUnavailableError;
}

export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError;
}

/**
 * Type guard to check if an error is an EmbeddingError
 */
export function isEmbeddingError(error: unknown): error is EmbeddingError {
  return error instanceof EmbeddingError;
}

export function isEmbeddingProviderUnavailableError(
  error: unknown
): error is EmbeddingProviderUnavailableError {
  return error instanceof EmbeddingProviderUnavailableError;
}

export function isDimensionMismatchError(
  error: unknown
): error is DimensionMismatchError {
  return error instanceof DimensionMismatchError;
}

export function isCollectionAlreadyExistsError(
  error: unknown
): error is CollectionAlreadyExistsError {
  return error instanceof CollectionAlreadyExistsError;
}

export function isCollectionNotFoundError(
  error: unknown
): error is CollectionNotFoundError {
  return error instanceof CollectionNotFoundError;
}

export function isRebuildTimeoutError(error: unknown): error is RebuildTimeoutError {
  return error instanceof RebuildTimeoutError;
}

/**
 * Type guard to check if an error is a VectorDatabaseError
 */
export function isVectorDatabaseError(
  error: unknown
): error is VectorDatabaseError {
  return error instanceof VectorDatabaseError;
}
