/**
 * Database config resolution tests
 */

import { existsSync, writeFileSync } from "node:fs";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  LOCAL_MIGRATIONS_LOCATION,
  REMOTE_MIGRATIONS_LOCATION,
  resolveDatabaseConfig,
  resolveLocalConfig,
} from "../../src/database/config-resolver.js";
import { ConfigurationError } from "../../src/utils/errors.js";
import { createTempDir, type TempDir } from "../helpers/temp-dir.js";

describe("resolveDatabaseConfig", () => {
  let tmp: TempDir;
  let storePath: string;

  beforeEach(() => {
    tmp = createTempDir();
    storePath = tmp.file("store", "bridge.db");
  });

  afterEach(() => tmp.cleanup());

  test("uses the local store when DATABASE_URL is absent", () => {
    const config = resolveDatabaseConfig({}, { storePath });

    expect(config).toEqual({
      driverKind: "local",
      connectionAddress: storePath,
      migrationsLocation: LOCAL_MIGRATIONS_LOCATION,
    });
    expect(existsSync(tmp.file("store"))).toBe(true);
  });

  test("treats an empty DATABASE_URL as absent", () => {
    expect(resolveDatabaseConfig({ DATABASE_URL: "" }, { storePath }).driverKind).toBe("local");
    expect(resolveDatabaseConfig({ DATABASE_URL: "  " }, { storePath }).driverKind).toBe("local");
  });

  test.each(["postgres", "postgresql"])("selects remote for %s://", (scheme) => {
    const url = `${scheme}://bridge:test-secret@db.internal:5432/whatsapp`;
    const config = resolveDatabaseConfig({ DATABASE_URL: url }, { storePath });

    expect(config).toEqual({
      driverKind: "remote",
      connectionAddress: url,
      migrationsLocation: REMOTE_MIGRATIONS_LOCATION,
    });
    expect(Object.isFrozen(config)).toBe(true);
    expect(existsSync(tmp.file("store"))).toBe(false);
  });

  test("rejects any other scheme before touching the filesystem", () => {
    expect(() => resolveDatabaseConfig({ DATABASE_URL: "ftp://files.internal/db" }, { storePath })).toThrow(
      ConfigurationError,
    );
    expect(existsSync(tmp.file("store"))).toBe(false);
  });

  test("selects remote for a socket URL with credentials", () => {
    const url = "postgresql://bridge:test-secret@/whatsapp?host=/var/run/postgresql";
    expect(resolveDatabaseConfig({ DATABASE_URL: url }, { storePath }).driverKind).toBe("remote");
  });

  test("rejects a URL without a host", () => {
    expect(() => resolveDatabaseConfig({ DATABASE_URL: "postgres:///whatsapp" }, { storePath })).toThrow(
      "DATABASE_URL has no host",
    );
  });
});

describe("resolveLocalConfig", () => {
  let tmp: TempDir;

  beforeEach(() => {
    tmp = createTempDir();
  });

  afterEach(() => tmp.cleanup());

  test("is fatal when the store directory cannot be created", () => {
    writeFileSync(tmp.file("blocker"), "not a directory");
    const storePath = tmp.file("blocker", "bridge.db");

    expect(() => resolveLocalConfig({ storePath })).toThrow(ConfigurationError);
    expect(() => resolveLocalConfig({ storePath })).toThrow(/^Cannot create local store directory /);
  });

  test("accepts an existing directory", () => {
    const storePath = tmp.file("bridge.db");
    expect(resolveLocalConfig({ storePath }).connectionAddress).toBe(storePath);
  });
});
