/**
 * Error handling utilities
 * Structured errors for storage bootstrap plus Result helpers
 */

// ============================================================================
// Error Types
// ============================================================================

export type ErrorCode =
  | "CONFIGURATION_ERROR"
  | "DB_CONNECTION_ERROR"
  | "DB_QUERY_ERROR"
  | "SCHEMA_DRIFT"
  | "STORE_CREATION_ERROR"
  | "UNKNOWN_ERROR";

export class ContextError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "ContextError";
    Object.setPrototypeOf(this, ContextError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Malformed connection string, unsupported scheme, or an unusable local
 * storage directory. Always fatal.
 */
export class ConfigurationError extends ContextError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIGURATION_ERROR", context);
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * No backend could be reached. Carries the remote cause (when a remote
 * backend was attempted) alongside the local one.
 */
export class ConnectivityError extends ContextError {
  constructor(
    message: string,
    public readonly remoteError: string | null,
    public readonly localError: string | null,
  ) {
    super(message, "DB_CONNECTION_ERROR", { remoteError, localError });
    this.name = "ConnectivityError";
    Object.setPrototypeOf(this, ConnectivityError.prototype);
  }
}

/**
 * The engine accepted a probe but could not allocate the long-lived handle.
 */
export class StoreCreationError extends ContextError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "STORE_CREATION_ERROR", context);
    this.name = "StoreCreationError";
    Object.setPrototypeOf(this, StoreCreationError.prototype);
  }
}

/**
 * Non-fatal: an expected column is missing and adding it failed.
 * Reported, never thrown.
 */
export interface SchemaDriftWarning {
  code: "SCHEMA_DRIFT";
  step: string;
  message: string;
}

export function schemaDriftWarning(step: string, error: unknown): SchemaDriftWarning {
  return { code: "SCHEMA_DRIFT", step, message: errorMessage(error) };
}

// ============================================================================
// Helpers
// ============================================================================

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

// ============================================================================
// Result Type Helpers
// ============================================================================

export type Result<T, E = ContextError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is { ok: false; error: E } {
  return !result.ok;
}

export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error;
}

export function unwrapOr<T, E>(result: Result<T, E>, defaultValue: T): T {
  if (result.ok) {
    return result.value;
  }
  return defaultValue;
}
