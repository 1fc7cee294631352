// packages/core/src/errors.ts
// Error taxonomy shared by every package. `code` is stable and is what
// callers (and the HTTP layer) branch on.

export const ErrorCodes = {
  SCHEMA_INFERENCE: 'DB_SCHEMA_INFERENCE',
  PARTITIONING: 'DB_PARTITIONING',
  CONNECTION: 'DB_CONNECTION',
  TRANSIENT_IO: 'DB_TRANSIENT_IO',
  VALIDATION: 'DB_VALIDATION',
  CONVERSION: 'DB_CONVERSION'
} as const;
export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class DocbridgeError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class SchemaInferenceError extends DocbridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCodes.SCHEMA_INFERENCE, message, options);
  }
}

export class PartitioningError extends DocbridgeError {
  constructor(message: string, public readonly details: Record<string, unknown> = {}) {
    super(ErrorCodes.PARTITIONING, message);
  }
}

export type ConnectionFailure = 'auth' | 'unreachable' | 'closed';

/** Not retried automatically: needs an operator, not a second attempt. */
export class ConnectionError extends DocbridgeError {
  constructor(
    public readonly reason: ConnectionFailure,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(ErrorCodes.CONNECTION, message, options);
  }
}

export class TransientIOError extends DocbridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCodes.TRANSIENT_IO, message, options);
  }
}

export interface ValidationIssue {
  path: string;
  msg: string;
  code?: string;
}

export class ValidationError extends DocbridgeError {
  constructor(message: string, public readonly issues: ValidationIssue[] = []) {
    super(ErrorCodes.VALIDATION, message);
  }
}

// Non-fatal: the field resolves to null and the row is still produced.
export interface ConversionWarning {
  code: typeof ErrorCodes.CONVERSION;
  path: string;
  expected: string;
  actual: string;
}

export type WarningHandler = (warning: ConversionWarning) => void;

export function isDocbridgeError(e: unknown): e is DocbridgeError {
  return e instanceof DocbridgeError;
}
