/**
 * Error taxonomy shared by every loader and store.
 *
 * Callers branch on `isNotFound()` (or `instanceof NotFoundError`) without
 * knowing which backend produced the error.
 */

export type ConfigStoreErrorCode =
  | 'NOT_FOUND'
  | 'USAGE'
  | 'SERIALIZATION'
  | 'BACKEND'
  | 'AGGREGATE';

/**
 * Base error class for all config store errors
 */
export class ConfigStoreError extends Error {
  constructor(
    message: string,
    public readonly code: ConfigStoreErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ConfigStoreError';
    Object.setPrototypeOf(this, ConfigStoreError.prototype);
  }
}

/**
 * Thrown when an entry is absent on read, delete or format-specific unmarshal.
 */
export class NotFoundError extends ConfigStoreError {
  public readonly scope: string;
  public readonly entry: string;

  constructor(scope: string, entry: string, options?: { cause?: unknown }) {
    super(`config entry not found: ${scope ? `${scope}/` : ''}${entry}`, 'NOT_FOUND', options);
    this.name = 'NotFoundError';
    this.scope = scope;
    this.entry = entry;
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * Programmer errors: missing descriptor, unknown descriptor kind,
 * unknown backend/mode/format, invalid option values.
 */
export class UsageError extends ConfigStoreError {
  constructor(message: string) {
    super(`API usage error - ${message}`, 'USAGE');
    this.name = 'UsageError';
    Object.setPrototypeOf(this, UsageError.prototype);
  }
}

/**
 * A payload could not be encoded or decoded in the selected format.
 */
export class SerializationError extends ConfigStoreError {
  public readonly key: string;
  public readonly format: string;
  public readonly backend: string;

  constructor(
    details: { operation: 'marshal' | 'unmarshal'; key: string; format: string; backend: string },
    options?: { cause?: unknown },
  ) {
    const reason = describeCause(options?.cause);
    super(
      `could not ${details.operation} "${details.key}" as ${details.format} (${details.backend} backend)${reason ? `: ${reason}` : ''}`,
      'SERIALIZATION',
      options,
    );
    this.name = 'SerializationError';
    this.key = details.key;
    this.format = details.format;
    this.backend = details.backend;
    Object.setPrototypeOf(this, SerializationError.prototype);
  }
}

/**
 * Filesystem, database or network failure, wrapped with the operation context.
 * `retryable` marks lock contention (the library itself never retries).
 */
export class BackendError extends ConfigStoreError {
  public readonly backend: string;
  public readonly operation: string;
  public readonly scope: string;
  public readonly entry: string | undefined;
  public readonly retryable: boolean;

  constructor(
    details: { backend: string; operation: string; scope: string; entry?: string; retryable?: boolean },
    options?: { cause?: unknown },
  ) {
    const target = details.entry !== undefined ? `${details.scope}/${details.entry}` : details.scope;
    const reason = describeCause(options?.cause);
    super(
      `${details.backend} ${details.operation} failed for ${target}${reason ? `: ${reason}` : ''}`,
      'BACKEND',
      options,
    );
    this.name = 'BackendError';
    this.backend = details.backend;
    this.operation = details.operation;
    this.scope = details.scope;
    this.entry = details.entry;
    this.retryable = details.retryable ?? false;
    Object.setPrototypeOf(this, BackendError.prototype);
  }
}

/**
 * Several independent failures from one multi-format delete.
 */
export class AggregateStoreError extends ConfigStoreError {
  public readonly errors: readonly Error[];

  constructor(errors: readonly Error[]) {
    super(
      `${errors.length} errors: ${errors.map((error) => error.message).join('; ')}`,
      'AGGREGATE',
    );
    this.name = 'AggregateStoreError';
    this.errors = errors;
    Object.setPrototypeOf(this, AggregateStoreError.prototype);
  }
}

export function isNotFound(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

export function isUsageError(error: unknown): error is UsageError {
  return error instanceof UsageError;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function describeCause(cause: unknown): string {
  if (cause === undefined) return '';
  return cause instanceof Error ? cause.message : String(cause);
}
