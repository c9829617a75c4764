/**
 * easy-pg - Error Types
 *
 * Every failure surfaced by the helper is a DataAccessError. The subclasses
 * narrow where it happened; callers that do not care catch the base class.
 */

/**
 * Base error class for easy-pg
 */
export class DataAccessError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "DataAccessError";
  }
}

/**
 * Database connection error
 */
export class ConnectionError extends DataAccessError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, "CONNECTION_ERROR", details, options);
    this.name = "ConnectionError";
  }
}

/**
 * Connection pool error (acquire failed, pool closed)
 */
export class PoolError extends DataAccessError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, "POOL_ERROR", details, options);
    this.name = "PoolError";
  }
}

/**
 * Query execution error
 */
export class QueryError extends DataAccessError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, "QUERY_ERROR", details, options);
    this.name = "QueryError";
  }
}

/**
 * COMMIT failed after the statement itself succeeded. `details.ambiguous`
 * is true unless the caller knows the outcome: when COMMIT errors the
 * server may or may not have applied the change, but a COMMIT answered
 * with ROLLBACK applied nothing.
 */
export class CommitError extends DataAccessError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, "COMMIT_FAILED", { ambiguous: true, ...details }, options);
    this.name = "CommitError";
  }
}

/**
 * Validation error for input parameters and configuration
 */
export class ValidationError extends DataAccessError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", details);
    this.name = "ValidationError";
  }
}

/**
 * Extract a message from anything that was thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return "Unknown error";
}

/**
 * PostgreSQL SQLSTATE carried by driver errors, if any
 */
export function sqlStateOf(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}
