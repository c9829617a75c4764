/**
 * easy-pg - Query Builders
 *
 * Turn CRUD intents into query descriptors. Names are sanitized and
 * interpolated; values only ever travel as $n parameters.
 */

import type { QueryDescriptor, SqlValue } from '../types/index.js';
import { ValidationError } from '../types/index.js';
import { createColumnList, sanitizeIdentifier, sanitizeTableName } from '../utils/identifiers.js';

function placeholders(count: number): string {
    return Array.from({ length: count }, (_, i) => `$${String(i + 1)}`).join(', ');
}

export function buildSelect(table: string, key: string, value: SqlValue, limit?: number): QueryDescriptor {
    let text = `SELECT * FROM ${sanitizeTableName(table)} WHERE ${sanitizeIdentifier(key)} = $1`;
    if (limit !== undefined) {
        if (!Number.isInteger(limit) || limit < 1) {
            throw new ValidationError(`Invalid row limit: ${String(limit)}`);
        }
        text += ` LIMIT ${String(limit)}`;
    }
    return { text, values: [value] };
}

/**
 * Columns come from the mapping's keys in insertion order.
 */
export function buildInsert(table: string, keyValue: Readonly<Record<string, SqlValue>>): QueryDescriptor {
    const columns = Object.keys(keyValue);
    if (columns.length === 0) {
        throw new ValidationError(`Cannot insert an empty row into ${table}`, { table });
    }

    return {
        text: `INSERT INTO ${sanitizeTableName(table)} (${createColumnList(columns)}) VALUES (${placeholders(columns.length)})`,
        values: Object.values(keyValue)
    };
}

export function buildUpdateField(
    table: string,
    matchKey: string,
    matchValue: SqlValue,
    field: string,
    newValue: SqlValue
): QueryDescriptor {
    return {
        text: `UPDATE ${sanitizeTableName(table)} SET ${sanitizeIdentifier(field)} = $1 WHERE ${sanitizeIdentifier(matchKey)} = $2`,
        values: [newValue, matchValue]
    };
}

export function buildDelete(table: string, key: string, value: SqlValue): QueryDescriptor {
    return {
        text: `DELETE FROM ${sanitizeTableName(table)} WHERE ${sanitizeIdentifier(key)} = $1`,
        values: [value]
    };
}
