/**
 * Database Adapter Interface
 *
 * One async surface over both backends (postgres for remote, better-sqlite3
 * for local) so callers never branch on the engine. This is the storage
 * handle the rest of the process holds.
 */

export type DriverKind = "remote" | "local";

export type SqlParam = string | number | bigint | boolean | null | Buffer | Date;

export type Row = Record<string, unknown>;

export interface QueryResult {
  lastInsertRowid: bigint | number | null;
  changes: number;
}

export interface DatabaseAdapter {
  readonly kind: DriverKind;

  /**
   * Get all rows from a query.
   * Placeholders follow the engine: `$1` for remote, `?` for local.
   */
  query<T extends Row = Row>(sql: string, params?: SqlParam[]): Promise<T[]>;

  /**
   * Get a single row from a query
   */
  get<T extends Row = Row>(sql: string, params?: SqlParam[]): Promise<T | null>;

  /**
   * Execute a single statement (INSERT, UPDATE, DELETE, DDL)
   */
  execute(sql: string, params?: SqlParam[]): Promise<QueryResult>;

  /**
   * Execute raw SQL (multiple statements, no results returned)
   */
  exec(sql: string): Promise<void>;

  /**
   * Execute multiple statements in a transaction.
   * All succeed or all fail.
   */
  batch(statements: Array<{ sql: string; params?: SqlParam[] }>): Promise<void>;

  /**
   * Liveness check (`SELECT 1`)
   */
  ping(): Promise<void>;

  /**
   * Release the connection or pool. Safe to call more than once.
   */
  close(): Promise<void>;
}
