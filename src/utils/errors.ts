/**
 * Error types and codes for layergate.
 * All errors thrown by the gate extend GateError.
 */

/**
 * Base error class for all layergate errors.
 */
export class GateError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GateError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Invalid invocation: bad config file, nonexistent root, unknown option value.
 * Raised before any file is scanned and aborts the whole run.
 */
export class ConfigurationError extends GateError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * A syntax adapter could not extract a file (read error, budget exceeded).
 * Always caught at the adapter boundary and turned into a parse failure.
 */
export class AdapterError extends GateError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'AdapterError';
  }
}

/**
 * The gate itself broke: a rule evaluator threw, or a stage left its
 * state machine. Distinct from a violation found in the scanned code.
 */
export class EngineFaultError extends GateError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'EngineFaultError';
  }
}

export const ErrorCodes = {
  // Configuration (C001-C005)
  CONFIG_LOAD: 'C001',
  CONFIG_INVALID: 'C002',
  ROOT_NOT_FOUND: 'C003',
  UNKNOWN_DIALECT: 'C004',
  INVALID_ARGUMENT: 'C005',

  // Adapter (A001-A004)
  READ_FAILED: 'A001',
  FILE_TOO_LARGE: 'A002',
  TIME_BUDGET_EXCEEDED: 'A003',
  ADAPTER_CRASHED: 'A004',

  // Engine
  STAGE_TRANSITION: 'F001',

  // System
  PARSE_ERROR: 'S001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Render an unknown thrown value as a message.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : 'Unknown error';
}
