/**
 * easy-pg - Connection Pool Mocks
 *
 * A ConnectionProvider over the in-memory database, plus a pg PoolClient
 * mock for exercising ConnectionPool without a server.
 */

import { vi } from "vitest";
import type {
  ConnectionProvider,
  HealthStatus,
  PooledConnection,
  PoolStats,
} from "../../types/index.js";
import { FakeConnection, FakeDatabase } from "./database.js";

/**
 * Create a mock pg PoolClient
 */
export function createMockPoolClient(): {
  query: ReturnType<typeof vi.fn>;
  release: ReturnType<typeof vi.fn>;
} {
  return {
    query: vi.fn().mockResolvedValue({
      rows: [],
      rowCount: 0,
      command: "SELECT",
      fields: [],
    }),
    release: vi.fn(),
  };
}

/**
 * Provider handing out connections to a FakeDatabase. Records every
 * acquire and release so tests can check the one-connection-per-call rule.
 */
export class FakeConnectionProvider implements ConnectionProvider {
  readonly acquired: FakeConnection[] = [];
  readonly released: { connection: PooledConnection; error?: Error }[] = [];

  /** When set, acquire() rejects with this error */
  unreachable: Error | null = null;
  shutDown = false;

  constructor(readonly db: FakeDatabase = new FakeDatabase()) {}

  async acquire(): Promise<PooledConnection> {
    await Promise.resolve();
    if (this.unreachable) throw this.unreachable;
    const connection = this.db.connect();
    this.acquired.push(connection);
    return connection;
  }

  release(connection: PooledConnection, error?: Error): void {
    if (connection instanceof FakeConnection && error !== undefined) {
      connection.discard();
    }
    this.released.push(error === undefined ? { connection } : { connection, error });
  }

  /** Connections acquired but not yet released */
  get outstanding(): number {
    return this.acquired.length - this.released.length;
  }

  getStats(): PoolStats {
    return {
      total: this.acquired.length,
      active: this.outstanding,
      idle: 0,
      waiting: 0,
      totalQueries: this.acquired.reduce((n, c) => n + c.statements.length, 0),
    };
  }

  async checkHealth(): Promise<HealthStatus> {
    await Promise.resolve();
    if (this.unreachable) {
      return { connected: false, error: this.unreachable.message };
    }
    return { connected: true, latencyMs: 0, poolStats: this.getStats() };
  }

  async shutdown(): Promise<void> {
    await Promise.resolve();
    this.shutDown = true;
  }
}
