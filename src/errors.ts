export type ErrorCode =
  | "EXECUTION_FAILED"
  | "TRANSACTION_CONTROL_FAILED"
  | "CONNECTION_FAILED"
  | "INVALID_CONFIG"
  | "QUERY_CANCELLED";

export class SqlrunError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A statement failed inside the driver. The message is the driver's own,
 * so the user sees exactly what the database reported.
 */
export class ExecutionError extends SqlrunError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("EXECUTION_FAILED", message, options);
  }

  static from(error: unknown): ExecutionError {
    if (error instanceof ExecutionError) return error;
    return new ExecutionError(getErrorMessage(error), { cause: error });
  }
}

export type TransactionCommand = "BEGIN" | "COMMIT" | "ROLLBACK";

export class TransactionControlError extends SqlrunError {
  readonly command: TransactionCommand;

  constructor(command: TransactionCommand, cause: unknown) {
    super("TRANSACTION_CONTROL_FAILED", `${command} failed: ${getErrorMessage(cause)}`, { cause });
    this.command = command;
  }
}

export class ConnectionError extends SqlrunError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONNECTION_FAILED", message, options);
  }
}

export class ConfigError extends SqlrunError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INVALID_CONFIG", message, options);
  }
}

export class QueryCancelledError extends SqlrunError {
  constructor(message = "Query was cancelled") {
    super("QUERY_CANCELLED", message);
  }
}

/**
 * Coerces an unknown thrown value to an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function getErrorMessage(error: unknown): string {
  return toError(error).message;
}
