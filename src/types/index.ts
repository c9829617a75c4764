/**
 * easy-pg - Type Definitions
 */

export type {
  SqlValue,
  Row,
  QueryDescriptor,
  ExecuteResult,
  ExecuteOptions,
  StatementResult,
  PooledConnection,
  ConnectionProvider,
  PoolStats,
  HealthStatus,
} from "./database.js";

export {
  DataAccessError,
  ConnectionError,
  PoolError,
  QueryError,
  CommitError,
  ValidationError,
  errorMessage,
  sqlStateOf,
} from "./errors.js";
