/**
 * easy-pg - Connection Pool Manager
 *
 * Wraps pg connection pooling with statistics tracking, health checks
 * and graceful shutdown.
 */

import pg from 'pg';
import type { PoolClient, QueryConfig } from 'pg';
import type { DataAccessConfig } from '../config/config.js';
import type {
    ConnectionProvider,
    HealthStatus,
    PooledConnection,
    PoolStats,
    Row,
    SqlValue,
    StatementResult
} from '../types/index.js';
import { ConnectionError, PoolError, QueryError, errorMessage } from '../types/index.js';
import { logger } from '../utils/logger.js';

const log = logger.forModule('POOL');

/**
 * A checked-out pg client
 *
 * Statements always go over the extended protocol, which accepts exactly
 * one statement per call. Under the simple protocol (pg's choice when no
 * values are bound) `SELECT 1; COMMIT` would run both statements.
 */
export class PgConnection implements PooledConnection {
    constructor(readonly client: PoolClient, private readonly onQuery: () => void = () => { }) { }

    async query<R extends Row = Row>(sql: string, params?: readonly SqlValue[]): Promise<StatementResult<R>> {
        this.onQuery();
        const config: QueryConfig<SqlValue[]> & { queryMode: 'extended' } = {
            text: sql,
            values: params === undefined ? [] : [...params],
            queryMode: 'extended'
        };
        const result = await this.client.query<R, SqlValue[]>(config);
        if (Array.isArray(result)) {
            throw new QueryError('Multiple statements in one query are not supported', { sql });
        }
        return {
            rows: result.rows,
            rowCount: result.rowCount ?? 0,
            command: result.command,
            fields: result.fields.map(f => f.name)
        };
    }
}

/**
 * Connection pool wrapper with statistics and health monitoring
 */
export class ConnectionPool implements ConnectionProvider {
    private pool: pg.Pool | null;
    private readonly config: DataAccessConfig;
    private stats: PoolStats = {
        total: 0,
        active: 0,
        idle: 0,
        waiting: 0,
        totalQueries: 0
    };
    private shuttingDown = false;

    constructor(config: DataAccessConfig) {
        this.config = config;
        this.pool = this.createPool();
    }

    private createPool(): pg.Pool {
        const poolConfig: pg.PoolConfig = {
            host: this.config.host,
            port: this.config.port,
            user: this.config.user,
            password: this.config.password,
            database: this.config.database,
            max: this.config.poolSize,
            idleTimeoutMillis: this.config.idleTimeoutMillis,
            connectionTimeoutMillis: this.config.connectionTimeoutMillis,
            allowExitOnIdle: true,
            application_name: this.config.applicationName ?? `${this.config.database}_pool`
        };

        if (this.config.ssl === true) {
            poolConfig.ssl = { rejectUnauthorized: false };
        } else if (this.config.ssl !== undefined && this.config.ssl !== false) {
            poolConfig.ssl = this.config.ssl;
        }

        if (this.config.statementTimeout !== undefined && this.config.statementTimeout > 0) {
            poolConfig.statement_timeout = this.config.statementTimeout;
        }

        const pool = new pg.Pool(poolConfig);

        // Idle clients that lose their server connection emit here; without a
        // listener pg would crash the process.
        pool.on('error', (err) => {
            log.error('Idle client error', { code: 'PG_IDLE_CLIENT_ERROR', error: err.message });
        });

        log.info('Connection pool created', {
            host: this.config.host,
            port: this.config.port,
            database: this.config.database,
            max: this.config.poolSize
        });

        return pool;
    }

    /**
     * Probe the server once. Not required before use; pg connects lazily.
     */
    async initialize(): Promise<void> {
        const pool = this.requirePool();

        try {
            const client = await pool.connect();
            try {
                const result = await client.query<{ version?: string }>('SELECT version()');
                log.info('PostgreSQL reachable', { version: result.rows[0]?.version ?? 'unknown' });
            } finally {
                client.release();
            }
        } catch (error) {
            const message = errorMessage(error);
            log.error('Failed to connect', { code: 'PG_CONNECT_FAILED', error: message });
            throw new ConnectionError(`Failed to connect to PostgreSQL: ${message}`, undefined, { cause: error });
        }
    }

    async acquire(): Promise<PooledConnection> {
        const pool = this.requirePool();

        try {
            const client = await pool.connect();
            return new PgConnection(client, () => { this.stats.totalQueries++; });
        } catch (error) {
            const message = errorMessage(error);
            log.error('Failed to acquire connection', { code: 'PG_ACQUIRE_FAILED', error: message });
            throw new PoolError(`Failed to acquire connection: ${message}`, undefined, { cause: error });
        }
    }

    release(connection: PooledConnection, error?: Error): void {
        if (!(connection instanceof PgConnection)) {
            log.warn('Ignoring release of a connection this pool did not hand out');
            return;
        }

        try {
            // release(err) destroys the client instead of returning it
            connection.client.release(error);
        } catch (releaseError) {
            log.warn('Error releasing connection', { error: errorMessage(releaseError) });
        }
    }

    getStats(): PoolStats {
        if (this.pool !== null) {
            this.stats.total = this.pool.totalCount;
            this.stats.idle = this.pool.idleCount;
            this.stats.waiting = this.pool.waitingCount;
            this.stats.active = this.stats.total - this.stats.idle;
        }
        return { ...this.stats };
    }

    async checkHealth(): Promise<HealthStatus> {
        if (this.pool === null || this.shuttingDown) {
            return {
                connected: false,
                error: 'Pool is shutting down'
            };
        }

        const startTime = Date.now();

        try {
            const result = await this.pool.query<{ version?: string; current_database?: string }>(
                'SELECT version(), current_database()'
            );
            const row = result.rows[0];

            return {
                connected: true,
                latencyMs: Date.now() - startTime,
                version: row?.version,
                poolStats: this.getStats(),
                details: {
                    database: row?.current_database
                }
            };
        } catch (error) {
            return {
                connected: false,
                error: errorMessage(error),
                latencyMs: Date.now() - startTime
            };
        }
    }

    /**
     * Gracefully shutdown the pool. Idempotent.
     */
    async shutdown(): Promise<void> {
        if (this.pool === null) {
            return;
        }

        log.info('Shutting down connection pool...');
        this.shuttingDown = true;

        try {
            await this.pool.end();
            this.pool = null;
            this.stats = { ...this.stats, total: 0, active: 0, idle: 0, waiting: 0 };
            log.info('Connection pool shut down successfully');
        } catch (error) {
            log.error('Error during pool shutdown', { error: errorMessage(error) });
            throw new PoolError(`Failed to shut down pool: ${errorMessage(error)}`, undefined, { cause: error });
        }
    }

    isClosing(): boolean {
        return this.shuttingDown;
    }

    private requirePool(): pg.Pool {
        if (this.pool === null || this.shuttingDown) {
            throw new PoolError('Connection pool is closed');
        }
        return this.pool;
    }
}
