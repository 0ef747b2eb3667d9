/**
 * Error classes raised by the structure accessors
 *
 * Absence (missing field, empty queue, pop timeout) is never an error: it is
 * reported as `undefined`. Everything below is a real failure.
 */

export type StructureErrorCode =
  | 'CONNECTION_FAILED'
  | 'DESERIALIZATION_FAILED'
  | 'OPERATION_ABORTED'
  | 'INVALID_CONFIG';

/**
 * Base error for all structure failures
 */
export class StructureError extends Error {
  constructor(
    message: string,
    public readonly code: StructureErrorCode,
    options?: {cause?: unknown}
  ) {
    super(message, options);
    this.name = 'StructureError';
    Object.setPrototypeOf(this, StructureError.prototype);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
    };
  }
}

/**
 * A command could not be delivered to, or was rejected by, the Redis server
 */
export class ConnectionFailureError extends StructureError {
  constructor(
    public readonly command: string,
    public readonly key: string | undefined,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      key === undefined
        ? `Redis ${command} failed: ${reason}`
        : `Redis ${command} on "${key}" failed: ${reason}`,
      'CONNECTION_FAILED',
      {cause}
    );
    this.name = 'ConnectionFailureError';
    Object.setPrototypeOf(this, ConnectionFailureError.prototype);
  }
}

/**
 * A stored value is not valid JSON
 */
export class DeserializationError extends StructureError {
  constructor(
    public readonly raw: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Stored value is not valid JSON: ${reason}`, 'DESERIALIZATION_FAILED', {
      cause,
    });
    this.name = 'DeserializationError';
    Object.setPrototypeOf(this, DeserializationError.prototype);
  }
}

/**
 * A blocking pop was cancelled through its AbortSignal
 */
export class OperationAbortedError extends StructureError {
  constructor(
    public readonly command: string,
    public readonly key: string
  ) {
    super(`Redis ${command} on "${key}" was aborted`, 'OPERATION_ABORTED');
    this.name = 'OperationAbortedError';
    Object.setPrototypeOf(this, OperationAbortedError.prototype);
  }
}

export class ConfigurationError extends StructureError {
  constructor(
    public readonly variable: string,
    message: string
  ) {
    super(`Invalid ${variable}: ${message}`, 'INVALID_CONFIG');
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}
