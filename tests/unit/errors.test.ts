/**
 * Error types and Result helpers
 */

import { describe, expect, test } from "vitest";
import {
  ConfigurationError,
  ConnectivityError,
  ContextError,
  err,
  errorMessage,
  isErr,
  isOk,
  ok,
  schemaDriftWarning,
  StoreCreationError,
  unwrap,
  unwrapOr,
} from "../../src/utils/errors.js";

describe("ContextError", () => {
  test("carries code and context", () => {
    const error = new ContextError("boom", "DB_QUERY_ERROR", { table: "devices" });
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe("DB_QUERY_ERROR");
    expect(error.context).toEqual({ table: "devices" });
  });

  test("toJSON produces an error envelope", () => {
    const error = new ContextError("boom", "UNKNOWN_ERROR");
    expect(error.toJSON()).toEqual({ success: false, error: "boom", code: "UNKNOWN_ERROR", context: undefined });
  });
});

describe("storage errors", () => {
  test("ConfigurationError is a ContextError", () => {
    const error = new ConfigurationError("bad scheme", { scheme: "ftp" });
    expect(error).toBeInstanceOf(ContextError);
    expect(error.name).toBe("ConfigurationError");
    expect(error.code).toBe("CONFIGURATION_ERROR");
  });

  test("ConnectivityError keeps both causes", () => {
    const error = new ConnectivityError("no backend", "connection refused", "disk I/O error");
    expect(error.code).toBe("DB_CONNECTION_ERROR");
    expect(error.remoteError).toBe("connection refused");
    expect(error.localError).toBe("disk I/O error");
    expect(error.context).toEqual({ remoteError: "connection refused", localError: "disk I/O error" });
  });

  test("StoreCreationError has its own code", () => {
    const error = new StoreCreationError("cannot open");
    expect(error).toBeInstanceOf(StoreCreationError);
    expect(error.code).toBe("STORE_CREATION_ERROR");
  });

  test("schemaDriftWarning wraps the failure message", () => {
    expect(schemaDriftWarning("devices.facebook_uuid", new Error("permission denied"))).toEqual({
      code: "SCHEMA_DRIFT",
      step: "devices.facebook_uuid",
      message: "permission denied",
    });
  });

  test("errorMessage handles non-Error values", () => {
    expect(errorMessage(new Error("x"))).toBe("x");
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage(42)).toBe("42");
  });
});

describe("Result helpers", () => {
  test("ok and err narrow", () => {
    const good = ok(1);
    const bad = err(new Error("nope"));
    expect(isOk(good)).toBe(true);
    expect(isErr(bad)).toBe(true);
  });

  test("unwrap returns the value or throws the error", () => {
    expect(unwrap(ok("value"))).toBe("value");
    expect(() => unwrap(err(new Error("nope")))).toThrow("nope");
  });

  test("unwrapOr falls back on error", () => {
    expect(unwrapOr(err(new Error("nope")), 7)).toBe(7);
    expect(unwrapOr(ok(3), 7)).toBe(3);
  });
});
