export class InjectorError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'InjectorError';
  }
}

export class DecodeError extends InjectorError {
  constructor(
    message: string,
    public readonly topic: string,
    public readonly field?: string,
    cause?: unknown,
  ) {
    super(message, 'DECODE_ERROR', cause);
    this.name = 'DecodeError';
  }
}

export class InvalidTimestampError extends InjectorError {
  constructor(public readonly value: unknown) {
    super(`Invalid timestamp: ${JSON.stringify(value)}`, 'INVALID_TIMESTAMP');
    this.name = 'InvalidTimestampError';
  }
}

export class TimestampOutOfWindowError extends InjectorError {
  constructor(
    public readonly timestamp: Date,
    public readonly windowStart: Date,
    public readonly windowEnd: Date,
  ) {
    super(
      `Timestamp ${timestamp.toISOString()} is outside the accepted window ` +
        `[${windowStart.toISOString()}, ${windowEnd.toISOString()}]`,
      'TIMESTAMP_OUT_OF_WINDOW',
    );
    this.name = 'TimestampOutOfWindowError';
  }
}

export class EntityNotFoundError extends InjectorError {
  constructor(public readonly entityId: string) {
    super(
      `Entity not found in recorder and creation is disabled: ${entityId}`,
      'ENTITY_NOT_FOUND',
    );
    this.name = 'EntityNotFoundError';
  }
}

export class EntityCreationFailedError extends InjectorError {
  constructor(
    public readonly entityId: string,
    public readonly attempts: number,
    cause?: unknown,
  ) {
    super(
      `Failed to create entity ${entityId} after ${attempts} attempt(s): ${describeCause(cause)}`,
      'ENTITY_CREATION_FAILED',
      cause,
    );
    this.name = 'EntityCreationFailedError';
  }
}

export class StoreWriteError extends InjectorError {
  constructor(message: string, cause?: unknown) {
    super(message, 'STORE_WRITE_FAILED', cause);
    this.name = 'StoreWriteError';
  }
}

export class StoreTimeoutError extends StoreWriteError {
  constructor(public readonly timeoutMs: number) {
    super(`Store transaction exceeded its ${timeoutMs}ms deadline`);
    this.name = 'StoreTimeoutError';
  }
}

export class FatalSchemaMismatchError extends InjectorError {
  constructor(
    message: string,
    public readonly schemaVersion: number | null,
    public readonly missing: string[] = [],
  ) {
    super(message, 'FATAL_SCHEMA_MISMATCH');
    this.name = 'FatalSchemaMismatchError';
  }
}

export class ConfigurationError extends InjectorError {
  constructor(
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

/**
 * Process-level errors halt ingestion; everything else is isolated to the
 * record or message that raised it.
 */
export function isFatalError(error: unknown): boolean {
  return error instanceof FatalSchemaMismatchError || error instanceof ConfigurationError;
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return 'unknown error';
  return String(cause);
}
