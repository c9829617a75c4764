/**
 * easy-pg - Data Access Helper
 *
 * CRUD convenience methods over a pooled PostgreSQL connection. Every call
 * checks out one connection, runs one statement and gives the connection
 * back, whatever the outcome.
 */

import { configFromEnv, parseConfig } from '../config/config.js';
import type { DataAccessConfig, DataAccessConfigInput } from '../config/config.js';
import { ConnectionPool } from '../pool/ConnectionPool.js';
import type {
    ConnectionProvider,
    ExecuteOptions,
    ExecuteResult,
    HealthStatus,
    PooledConnection,
    PoolStats,
    QueryDescriptor,
    Row,
    SqlValue,
    StatementResult
} from '../types/index.js';
import {
    CommitError,
    DataAccessError,
    PoolError,
    QueryError,
    errorMessage,
    sqlStateOf
} from '../types/index.js';
import { logger } from '../utils/logger.js';
import { buildDelete, buildInsert, buildSelect, buildUpdateField } from './queries.js';

const log = logger.forModule('QUERY');

/** Longest SQL prefix written to logs */
const SQL_LOG_LENGTH = 100;

export class DataAccessHelper {
    readonly config: DataAccessConfig;
    private readonly provider: ConnectionProvider;
    private closed = false;

    /**
     * @param config - connection settings, validated on construction
     * @param provider - connection source; defaults to a pg-backed ConnectionPool
     */
    constructor(config: DataAccessConfigInput, provider?: ConnectionProvider) {
        this.config = parseConfig(config);
        this.provider = provider ?? new ConnectionPool(this.config);
    }

    /**
     * Build a helper from DATABASE_URL or the PG* environment variables
     */
    static fromEnv(env: NodeJS.ProcessEnv = process.env): DataAccessHelper {
        return new DataAccessHelper(configFromEnv(env));
    }

    // =========================================================================
    // CRUD helpers
    // =========================================================================

    /**
     * All rows where `key` equals `value`. Zero matches yield an empty array.
     */
    async getMultiple<R extends Row = Row>(table: string, key: string, value: SqlValue): Promise<readonly Readonly<R>[]> {
        const query = buildSelect(table, key, value);
        const result = await this.run('getMultiple', (conn) => this.statement<R>(conn, 'getMultiple', query));
        return freezeRows(result.rows);
    }

    /**
     * First row where `key` equals `value`, or null when there is none.
     */
    async getSingle<R extends Row = Row>(table: string, key: string, value: SqlValue): Promise<Readonly<R> | null> {
        const query = buildSelect(table, key, value, 1);
        const result = await this.run('getSingle', (conn) => this.statement<R>(conn, 'getSingle', query));
        const row = result.rows[0];
        return row === undefined ? null : Object.freeze(row);
    }

    /**
     * Insert one row built from `keyValue`. True when exactly one row was written.
     */
    async addEntry(table: string, keyValue: Readonly<Record<string, SqlValue>>): Promise<boolean> {
        const query = buildInsert(table, keyValue);
        const result = await this.run('addEntry', (conn) => this.transaction(conn, 'addEntry', query, true));
        return result.rowCount === 1;
    }

    async updateSingleField(
        table: string,
        matchKey: string,
        matchValue: SqlValue,
        field: string,
        newValue: SqlValue
    ): Promise<boolean> {
        const query = buildUpdateField(table, matchKey, matchValue, field, newValue);
        const result = await this.run('updateSingleField', (conn) => this.transaction(conn, 'updateSingleField', query, true));
        return result.rowCount > 0;
    }

    async deleteEntry(table: string, key: string, value: SqlValue): Promise<boolean> {
        const query = buildDelete(table, key, value);
        const result = await this.run('deleteEntry', (conn) => this.transaction(conn, 'deleteEntry', query, true));
        return result.rowCount > 0;
    }

    /**
     * Run an arbitrary parameterized statement. It executes inside a
     * transaction that is committed only when `options.commit` is true.
     *
     * Never build `sql` from user input; pass values through `params`.
     */
    async executeQuery<R extends Row = Row>(
        sql: string,
        params: readonly SqlValue[] = [],
        options: ExecuteOptions = {}
    ): Promise<ExecuteResult<R>> {
        const query: QueryDescriptor = { text: sql, values: [...params] };
        const commit = options.commit ?? false;
        const result = await this.run('executeQuery', (conn) => this.transaction<R>(conn, 'executeQuery', query, commit));

        if (result.fields.length > 0) {
            return { type: 'rows', rows: freezeRows(result.rows), rowCount: result.rows.length };
        }
        return { type: 'affected', command: result.command, rowsAffected: result.rowCount };
    }

    /**
     * Check out one connection for several statements. It is released when
     * `fn` settles; a rejection discards it rather than returning it to the pool.
     */
    async withConnection<T>(fn: (connection: PooledConnection) => Promise<T>): Promise<T> {
        return this.run('withConnection', async (conn) => {
            try {
                return await fn(conn);
            } catch (error) {
                throw toDataAccessError(error, 'withConnection');
            }
        });
    }

    // =========================================================================
    // Pool lifecycle
    // =========================================================================

    getStats(): PoolStats {
        return this.provider.getStats();
    }

    async checkHealth(): Promise<HealthStatus> {
        if (this.closed) {
            return { connected: false, error: 'Helper is closed' };
        }
        return this.provider.checkHealth();
    }

    /**
     * Shut the pool down. Later calls fail with PoolError.
     */
    async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        await this.provider.shutdown();
    }

    // =========================================================================
    // Internals
    // =========================================================================

    /**
     * Acquire, run, release. The connection goes back on every path; on
     * failure it is handed back with the error so the pool drops it.
     */
    private async run<T>(operation: string, fn: (conn: PooledConnection) => Promise<T>): Promise<T> {
        if (this.closed) {
            throw new PoolError('Helper is closed', { operation });
        }

        const conn = await this.acquire(operation);
        try {
            const result = await fn(conn);
            this.provider.release(conn);
            return result;
        } catch (error) {
            const wrapped = toDataAccessError(error, operation);
            this.provider.release(conn, wrapped);
            throw wrapped;
        }
    }

    private async acquire(operation: string): Promise<PooledConnection> {
        try {
            return await this.provider.acquire();
        } catch (error) {
            if (error instanceof DataAccessError) throw error;
            throw new PoolError(`Failed to acquire connection: ${errorMessage(error)}`, { operation }, { cause: error });
        }
    }

    private async statement<R extends Row = Row>(
        conn: PooledConnection,
        operation: string,
        query: QueryDescriptor
    ): Promise<StatementResult<R>> {
        const startTime = Date.now();
        try {
            const result = await conn.query<R>(query.text, query.values);
            log.debug('Query executed', {
                operation,
                sql: query.text.substring(0, SQL_LOG_LENGTH),
                rowCount: result.rowCount,
                durationMs: Date.now() - startTime
            });
            return result;
        } catch (error) {
            const message = errorMessage(error);
            log.error('Query failed', {
                code: 'PG_QUERY_FAILED',
                operation,
                sql: query.text.substring(0, SQL_LOG_LENGTH),
                error: message
            });
            if (error instanceof DataAccessError) throw error;
            throw new QueryError(`Query failed: ${message}`, queryDetails(query, error), { cause: error });
        }
    }

    /**
     * BEGIN, the statement, then COMMIT or ROLLBACK.
     */
    private async transaction<R extends Row = Row>(
        conn: PooledConnection,
        operation: string,
        query: QueryDescriptor,
        commit: boolean
    ): Promise<StatementResult<R>> {
        await this.statement(conn, operation, { text: 'BEGIN', values: [] });
        const result = await this.statement<R>(conn, operation, query);

        if (!commit) {
            await this.statement(conn, operation, { text: 'ROLLBACK', values: [] });
            return result;
        }

        let commitResult: StatementResult;
        try {
            commitResult = await conn.query('COMMIT');
        } catch (error) {
            const message = errorMessage(error);
            log.error('Commit failed after successful statement', {
                code: 'PG_COMMIT_FAILED',
                operation,
                sql: query.text.substring(0, SQL_LOG_LENGTH),
                error: message
            });
            throw new CommitError(`Commit failed: ${message}`, queryDetails(query, error), { cause: error });
        }

        // A transaction that failed server-side answers COMMIT with ROLLBACK;
        // nothing was applied
        if (commitResult.command === 'ROLLBACK') {
            log.error('Commit answered with rollback', { code: 'PG_COMMIT_ROLLED_BACK', operation });
            throw new CommitError(
                'Commit failed: transaction was rolled back by the server',
                { sql: query.text, ambiguous: false }
            );
        }

        return result;
    }
}

function freezeRows<R extends Row>(rows: R[]): readonly Readonly<R>[] {
    return Object.freeze(rows.map(row => Object.freeze(row)));
}

function queryDetails(query: QueryDescriptor, error: unknown): Record<string, unknown> {
    const sqlState = sqlStateOf(error);
    return sqlState === undefined ? { sql: query.text } : { sql: query.text, sqlState };
}

function toDataAccessError(error: unknown, operation: string): DataAccessError {
    if (error instanceof DataAccessError) return error;
    const sqlState = sqlStateOf(error);
    return new QueryError(
        `Query failed: ${errorMessage(error)}`,
        sqlState === undefined ? { operation } : { operation, sqlState },
        { cause: error }
    );
}
