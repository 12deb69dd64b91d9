/**
 * Remote schema reconciliation tests
 */

import Database from "better-sqlite3";
import { describe, expect, test } from "vitest";
import { LocalAdapter } from "../../src/database/adapters/local.js";
import { addColumnSql, compileRequirements, reconcileSchema } from "../../src/database/schema/reconciler.js";
import { REQUIREMENTS_VERSION, SCHEMA_COLUMN_REQUIREMENTS } from "../../src/database/schema/requirements.js";
import type { SchemaColumnRequirement } from "../../src/database/types.js";
import { ConfigurationError } from "../../src/utils/errors.js";
import { FakePostgresServer, legacyTables } from "../helpers/fake-postgres.js";

const ALL_STEPS = ["devices.facebook_uuid", "devices.lid_migration_ts", "pre_keys.key"];

describe("addColumnSql", () => {
  test("builds an idempotent ADD COLUMN", () => {
    expect(addColumnSql(SCHEMA_COLUMN_REQUIREMENTS[1])).toBe(
      'ALTER TABLE "devices" ADD COLUMN IF NOT EXISTS "lid_migration_ts" BIGINT DEFAULT 0',
    );
  });

  test("omits DEFAULT when there is none", () => {
    expect(addColumnSql(SCHEMA_COLUMN_REQUIREMENTS[0])).toBe(
      'ALTER TABLE "devices" ADD COLUMN IF NOT EXISTS "facebook_uuid" UUID',
    );
  });

  test("rejects identifiers that would need escaping", () => {
    const req: SchemaColumnRequirement = {
      table: "devices",
      column: 'x"; DROP TABLE devices; --',
      sqlType: "TEXT",
      defaultExpression: null,
      since: 3,
    };
    expect(() => addColumnSql(req)).toThrow(ConfigurationError);
  });
});

describe("compileRequirements", () => {
  test("orders steps by the version that introduced them", () => {
    const reqs: SchemaColumnRequirement[] = [
      { table: "pre_keys", column: "key", sqlType: "BYTEA", defaultExpression: null, since: 2 },
      { table: "devices", column: "facebook_uuid", sqlType: "UUID", defaultExpression: null, since: 1 },
    ];
    expect(compileRequirements(reqs).map((step) => step.id)).toEqual(["devices.facebook_uuid", "pre_keys.key"]);
  });

  test("the shipped list is at version 2", () => {
    expect(REQUIREMENTS_VERSION).toBe(2);
  });
});

describe("reconcileSchema", () => {
  test("adds every missing column", async () => {
    const server = new FakePostgresServer({ tables: legacyTables() });
    const db = await server.connect("postgres://fake");

    const report = await reconcileSchema(db);

    expect(report).toEqual({ applied: ALL_STEPS, alreadyPresent: [], failed: [] });
    expect(server.hasColumn("devices", "facebook_uuid")).toBe(true);
    expect(server.hasColumn("devices", "lid_migration_ts")).toBe(true);
    expect(server.hasColumn("pre_keys", "key")).toBe(true);
  });

  test("is a no-op the second time", async () => {
    const server = new FakePostgresServer({ tables: legacyTables() });
    const db = await server.connect("postgres://fake");

    await reconcileSchema(db);
    const second = await reconcileSchema(db);

    expect(second).toEqual({ applied: [], alreadyPresent: ALL_STEPS, failed: [] });
    expect(server.executed).toHaveLength(3);
  });

  test("leaves present columns alone", async () => {
    const tables = legacyTables();
    tables.devices.push("facebook_uuid");
    const server = new FakePostgresServer({ tables });
    const db = await server.connect("postgres://fake");

    const report = await reconcileSchema(db);

    expect(report.alreadyPresent).toEqual(["devices.facebook_uuid"]);
    expect(report.applied).toEqual(["devices.lid_migration_ts", "pre_keys.key"]);
  });

  test("records a failed step as drift and continues", async () => {
    const server = new FakePostgresServer({ tables: legacyTables(), failAlter: ["devices.facebook_uuid"] });
    const db = await server.connect("postgres://fake");

    const report = await reconcileSchema(db);

    expect(report.failed).toEqual([
      { code: "SCHEMA_DRIFT", step: "devices.facebook_uuid", message: "permission denied for table devices" },
    ]);
    expect(report.applied).toEqual(["devices.lid_migration_ts", "pre_keys.key"]);
  });

  test("reports a missing table as drift", async () => {
    const server = new FakePostgresServer({ tables: { devices: ["jid"] } });
    const db = await server.connect("postgres://fake");

    const report = await reconcileSchema(db);

    expect(report.failed).toEqual([
      { code: "SCHEMA_DRIFT", step: "pre_keys.key", message: 'relation "pre_keys" does not exist' },
    ]);
  });

  test("does nothing on the local backend", async () => {
    const sqlite = new Database(":memory:");
    const db = new LocalAdapter(sqlite, ":memory:");

    expect(await reconcileSchema(db)).toEqual({ applied: [], alreadyPresent: [], failed: [] });
    await db.close();
  });
});
