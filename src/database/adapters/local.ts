/**
 * Local Database Adapter
 *
 * Wraps better-sqlite3 with the Promise-based adapter interface.
 * better-sqlite3 is synchronous, so every method resolves immediately.
 */

import type BetterSqlite3 from "better-sqlite3";
import type { DatabaseAdapter, QueryResult, Row, SqlParam } from "../adapter.js";

type BoundParam = string | number | bigint | Buffer | null;

/**
 * better-sqlite3 rejects booleans and Dates; store them the way SQLite would.
 */
function toBound(params: SqlParam[] | undefined): BoundParam[] {
  return (params ?? []).map((param) => {
    if (typeof param === "boolean") return param ? 1 : 0;
    if (param instanceof Date) return param.toISOString();
    return param;
  });
}

export class LocalAdapter implements DatabaseAdapter {
  readonly kind = "local" as const;

  constructor(
    private readonly db: BetterSqlite3.Database,
    readonly path: string,
  ) {}

  async query<T extends Row = Row>(sql: string, params?: SqlParam[]): Promise<T[]> {
    return this.db.prepare<BoundParam[], T>(sql).all(...toBound(params));
  }

  async get<T extends Row = Row>(sql: string, params?: SqlParam[]): Promise<T | null> {
    return this.db.prepare<BoundParam[], T>(sql).get(...toBound(params)) ?? null;
  }

  async execute(sql: string, params?: SqlParam[]): Promise<QueryResult> {
    const result = this.db.prepare<BoundParam[]>(sql).run(...toBound(params));
    return {
      lastInsertRowid: result.lastInsertRowid,
      changes: result.changes,
    };
  }

  async exec(sql: string): Promise<void> {
    this.db.exec(sql);
  }

  async batch(statements: Array<{ sql: string; params?: SqlParam[] }>): Promise<void> {
    const apply = this.db.transaction(() => {
      for (const stmt of statements) {
        this.db.prepare<BoundParam[]>(stmt.sql).run(...toBound(stmt.params));
      }
    });
    apply();
  }

  async ping(): Promise<void> {
    this.db.prepare("SELECT 1 AS ok").get();
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }
}
