/**
 * easy-pg - CRUD helpers over a pooled PostgreSQL connection
 *
 * @module easy-pg
 */

// Export types
export * from "./types/index.js";

// Export helper
export { DataAccessHelper } from "./helper/DataAccessHelper.js";
export {
  buildSelect,
  buildInsert,
  buildUpdateField,
  buildDelete,
} from "./helper/queries.js";

// Export configuration
export {
  DataAccessConfigSchema,
  parseConfig,
  parseConnectionString,
  configFromEnv,
} from "./config/config.js";
export type {
  DataAccessConfig,
  DataAccessConfigInput,
} from "./config/config.js";

// Export utilities
export { ConnectionPool, PgConnection } from "./pool/ConnectionPool.js";
export {
  InvalidIdentifierError,
  validateIdentifier,
  sanitizeIdentifier,
  sanitizeTableName,
  createColumnList,
} from "./utils/identifiers.js";
export { logger } from "./utils/logger.js";
export type { LogLevel, LogModule, LogContext } from "./utils/logger.js";
