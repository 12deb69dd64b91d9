/**
 * Driver registry: how each backend opens an adapter.
 *
 * The tester and the store factory only ever open connections through a
 * DriverSet, so tests can swap the remote driver for an in-process stand-in.
 */

import Database from "better-sqlite3";
import type { DatabaseAdapter } from "./adapter.js";
import { LocalAdapter } from "./adapters/local.js";
import { createPostgresClient, PostgresAdapter, type PostgresPoolOptions } from "./adapters/postgres.js";

export interface LocalOpenOptions {
  /** Fail instead of creating the file */
  fileMustExist?: boolean;
}

export interface DriverSet {
  openRemote(url: string, options?: PostgresPoolOptions): Promise<DatabaseAdapter>;
  openLocal(path: string, options?: LocalOpenOptions): Promise<LocalHandle>;
}

export interface LocalHandle {
  adapter: DatabaseAdapter;
  db: Database.Database;
}

export const defaultDrivers: DriverSet = {
  async openRemote(url, options) {
    return new PostgresAdapter(createPostgresClient(url, options));
  },

  async openLocal(path, options = {}) {
    const db = new Database(path, { fileMustExist: options.fileMustExist ?? false });
    return { adapter: new LocalAdapter(db, path), db };
  },
};
