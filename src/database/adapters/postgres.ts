/**
 * PostgreSQL Adapter
 *
 * Uses the `postgres` npm package (porsager/postgres) for connection pooling.
 * Queries go through `sql.unsafe()` so callers can pass plain SQL with `$n`
 * placeholders; the adapter never interpolates values itself.
 */

import postgres from "postgres";
import { createLogger } from "../../lib/logger.js";
import type { DatabaseAdapter, QueryResult, Row, SqlParam } from "../adapter.js";

const log = createLogger("postgres");

export type PostgresClient = postgres.Sql;

export interface PostgresPoolOptions {
  /** Maximum pooled connections */
  max?: number;
  /** Seconds before an idle connection is closed */
  idleTimeout?: number;
  /** Seconds to wait for a connection to open */
  connectTimeout?: number;
}

export const POOL_DEFAULTS: Required<PostgresPoolOptions> = {
  max: 10,
  idleTimeout: 30,
  connectTimeout: 10,
};

type WireParam = string | number | boolean | null | Buffer | Date;

function toWire(params: SqlParam[] | undefined): WireParam[] {
  return (params ?? []).map((param) => (typeof param === "bigint" ? param.toString() : param));
}

/**
 * Open a pooled client. Connections are established lazily on first query.
 */
export function createPostgresClient(url: string, options: PostgresPoolOptions = {}): PostgresClient {
  return postgres(url, {
    max: options.max ?? POOL_DEFAULTS.max,
    idle_timeout: options.idleTimeout ?? POOL_DEFAULTS.idleTimeout,
    connect_timeout: options.connectTimeout ?? POOL_DEFAULTS.connectTimeout,
    transform: {
      undefined: null,
    },
    // ADD COLUMN IF NOT EXISTS raises a notice; keep it out of stdout
    onnotice: (notice) => log.debug("Server notice", { message: notice.message }),
  });
}

export class PostgresAdapter implements DatabaseAdapter {
  readonly kind = "remote" as const;
  private closed = false;

  constructor(private readonly sql: PostgresClient) {}

  async query<T extends Row = Row>(text: string, params?: SqlParam[]): Promise<T[]> {
    const rows = await this.sql.unsafe<T[]>(text, toWire(params));
    return Array.from(rows);
  }

  async get<T extends Row = Row>(text: string, params?: SqlParam[]): Promise<T | null> {
    const rows = await this.query<T>(text, params);
    return rows[0] ?? null;
  }

  async execute(text: string, params?: SqlParam[]): Promise<QueryResult> {
    const result = await this.sql.unsafe(text, toWire(params));
    return {
      lastInsertRowid: null,
      changes: result.count,
    };
  }

  async exec(text: string): Promise<void> {
    // No parameters: postgres uses the simple protocol, which allows several statements
    await this.sql.unsafe(text);
  }

  async batch(statements: Array<{ sql: string; params?: SqlParam[] }>): Promise<void> {
    await this.sql.begin(async (tx) => {
      for (const stmt of statements) {
        await tx.unsafe(stmt.sql, toWire(stmt.params));
      }
    });
  }

  async ping(): Promise<void> {
    await this.sql.unsafe("SELECT 1 AS ok");
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.sql.end({ timeout: 5 });
  }
}
