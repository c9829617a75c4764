/**
 * easy-pg - Database Types
 *
 * Core configuration, row and query result types.
 */

/**
 * Value a column may carry or a parameter may bind
 */
export type SqlValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | Buffer
  | Date;

/**
 * A result row: column name to value, in result-set column order
 */
export type Row = Record<string, SqlValue>;

/**
 * SQL text plus its ordered bound parameters
 */
export interface QueryDescriptor {
  text: string;
  values: SqlValue[];
}

/**
 * Outcome of executeQuery: either a result set or an affected-row count
 */
export type ExecuteResult<R extends Row = Row> =
  | {
      type: "rows";
      rows: readonly Readonly<R>[];
      rowCount: number;
    }
  | {
      type: "affected";
      /** Command tag reported by the server (INSERT, UPDATE, ...) */
      command: string;
      rowsAffected: number;
    };

export interface ExecuteOptions {
  /** Commit the statement. When false the transaction is rolled back. */
  commit?: boolean;
}

/**
 * Raw result of one statement on a pooled connection
 */
export interface StatementResult<R extends Row = Row> {
  rows: R[];
  rowCount: number;
  command: string;
  /** Result-set column names; empty for statements that return no rows */
  fields: string[];
}

/**
 * A connection checked out of the pool
 */
export interface PooledConnection {
  query<R extends Row = Row>(
    sql: string,
    params?: readonly SqlValue[],
  ): Promise<StatementResult<R>>;
}

/**
 * Anything that can hand out and take back connections
 */
export interface ConnectionProvider {
  acquire(): Promise<PooledConnection>;

  /**
   * Return a connection. Passing the error that ended its use tells the
   * pool to destroy it instead of reusing it.
   */
  release(connection: PooledConnection, error?: Error): void;

  getStats(): PoolStats;
  checkHealth(): Promise<HealthStatus>;
  shutdown(): Promise<void>;
}

/**
 * Connection pool statistics
 */
export interface PoolStats {
  /** Total connections in pool */
  total: number;

  /** Active connections (in use) */
  active: number;

  /** Idle connections (available) */
  idle: number;

  /** Waiting requests in queue */
  waiting: number;

  /** Total statements executed */
  totalQueries: number;
}

/**
 * Database connection health status
 */
export interface HealthStatus {
  connected: boolean;
  latencyMs?: number | undefined;
  version?: string | undefined;
  poolStats?: PoolStats | undefined;
  details?: Record<string, unknown> | undefined;
  error?: string | undefined;
}
