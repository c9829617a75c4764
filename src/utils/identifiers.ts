/**
 * easy-pg - Identifier Sanitization Utilities
 *
 * Table and column names cannot be bound as parameters, so they are
 * interpolated into SQL text. Every interpolated name passes through here.
 *
 * PostgreSQL identifier rules enforced:
 * - Must start with a letter (a-z) or underscore (_)
 * - Can contain letters, digits (0-9), underscores, and dollar signs ($)
 * - Maximum length: 63 bytes (NAMEDATALEN - 1)
 */

import { DataAccessError } from "../types/errors.js";

const IDENTIFIER_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_$]*$/;

/**
 * Maximum identifier length in PostgreSQL (NAMEDATALEN - 1)
 */
const MAX_IDENTIFIER_LENGTH = 63;

/**
 * Error thrown when an identifier is invalid
 */
export class InvalidIdentifierError extends DataAccessError {
  constructor(
    public readonly identifier: string,
    public readonly reason: string,
  ) {
    super(`Invalid identifier "${identifier}": ${reason}`, "INVALID_IDENTIFIER", {
      identifier,
    });
    this.name = "InvalidIdentifierError";
  }
}

/**
 * Validate a PostgreSQL identifier
 *
 * @throws InvalidIdentifierError if the identifier is invalid
 */
export function validateIdentifier(name: string): void {
  if (name.length === 0) {
    throw new InvalidIdentifierError(
      name,
      "Identifier must be a non-empty string",
    );
  }

  if (name.length > MAX_IDENTIFIER_LENGTH) {
    throw new InvalidIdentifierError(
      name,
      `Identifier exceeds maximum length of ${String(MAX_IDENTIFIER_LENGTH)} characters`,
    );
  }

  if (!IDENTIFIER_PATTERN.test(name)) {
    throw new InvalidIdentifierError(
      name,
      "Identifier contains invalid characters. Must start with a letter or underscore and contain only letters, digits, underscores, or dollar signs",
    );
  }
}

/**
 * Validate and double-quote an identifier for interpolation
 *
 * @example
 * sanitizeIdentifier('users') // Returns: "users"
 * sanitizeIdentifier('User"Data') // Throws: InvalidIdentifierError
 */
export function sanitizeIdentifier(name: string): string {
  validateIdentifier(name);
  return `"${name}"`;
}

/**
 * Sanitize a table name, optionally schema-qualified
 *
 * @example
 * sanitizeTableName('users') // Returns: "users"
 * sanitizeTableName('audit.events') // Returns: "audit"."events"
 */
export function sanitizeTableName(table: string): string {
  const parts = table.split(".");
  if (parts.length > 2) {
    throw new InvalidIdentifierError(
      table,
      "Table names may have at most one schema qualifier",
    );
  }
  return parts.map(sanitizeIdentifier).join(".");
}

export function sanitizeIdentifiers(names: readonly string[]): string[] {
  return names.map(sanitizeIdentifier);
}

/**
 * Comma-separated list of quoted column names
 *
 * @example
 * createColumnList(['id', 'name']) // Returns: "id", "name"
 */
export function createColumnList(columns: readonly string[]): string {
  return sanitizeIdentifiers(columns).join(", ");
}
