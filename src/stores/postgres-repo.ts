/**
 * @fileoverview PostgreSQL Revocation Repository
 *
 * Persists blacklisted token ids or banned subjects in a single-column
 * table. Use one table per list.
 *
 * @module stores/postgres-repo
 * @requires pg - PostgreSQL client (supplied by the host)
 *
 * @example
 * ```typescript
 * import { Pool } from 'pg';
 * import { PostgresRevocationRepo } from 'warden-jwt';
 *
 * const pool = new Pool({ connectionString: process.env.DATABASE_URL });
 * const banlist = new PostgresRevocationRepo({ pool, tableName: 'warden_banned' });
 * await banlist.initialize();
 * ```
 */

import { RevocationRepo, WardenError, WARDEN_ERRORS } from '../types';

/**
 * Minimal pg-compatible pool contract.
 */
export interface PgPool {
  query<T = unknown>(text: string, values?: unknown[]): Promise<{ rows: T[]; rowCount: number | null }>;
  end(): Promise<void>;
}

export interface PostgresRevocationRepoOptions {
  /** PostgreSQL connection pool instance. */
  pool: PgPool;
  /**
   * Table holding the keys. Created by {@link PostgresRevocationRepo.initialize}.
   * @default 'warden_revocations'
   */
  tableName?: string;
  /** @default 'public' */
  schema?: string;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function assertIdentifier(kind: string, value: string): string {
  if (!IDENTIFIER.test(value)) {
    throw new WardenError(WARDEN_ERRORS.INVALID_CONFIG, `Invalid ${kind} name: ${value}`);
  }
  return value;
}

/**
 * PostgreSQL revocation repository.
 */
export class PostgresRevocationRepo implements RevocationRepo {
  private pool: PgPool;
  private tableName: string;
  private schema: string;

  constructor(options: PostgresRevocationRepoOptions) {
    this.pool = options.pool;
    this.tableName = assertIdentifier('table', options.tableName ?? 'warden_revocations');
    this.schema = assertIdentifier('schema', options.schema ?? 'public');
  }

  /** Fully qualified table name. */
  private get table(): string {
    return `${this.schema}.${this.tableName}`;
  }

  /**
   * Create the table if it does not exist. Safe to call on every start.
   */
  async initialize(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS ${this.table} (
        key VARCHAR(512) PRIMARY KEY,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
  }

  async exists(key: string): Promise<boolean> {
    const result = await this.pool.query(
      `SELECT 1 FROM ${this.table} WHERE key = $1 LIMIT 1`,
      [key]
    );
    return result.rows.length > 0;
  }

  async insert(key: string): Promise<void> {
    await this.pool.query(
      `INSERT INTO ${this.table} (key) VALUES ($1) ON CONFLICT (key) DO NOTHING`,
      [key]
    );
  }

  async delete(key: string): Promise<void> {
    await this.pool.query(`DELETE FROM ${this.table} WHERE key = $1`, [key]);
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Close the pool. The repository is unusable afterwards.
   */
  async close(): Promise<void> {
    await this.pool.end();
  }
}
