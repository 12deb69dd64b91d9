/**
 * PostgreSQL connection URL parsing and redaction.
 */

import { ConfigurationError, err, ok, type Result } from "../utils/errors.js";

export const ACCEPTED_SCHEMES = ["postgres", "postgresql"] as const;

export type PostgresScheme = (typeof ACCEPTED_SCHEMES)[number];

export const SECRET_MASK = "***";

const SECRET_QUERY_PARAMS = new Set(["password", "sslpassword"]);

const DEFAULT_PORT = 5432;

export interface ParsedConnectionUrl {
  scheme: PostgresScheme;
  host: string;
  port: number;
  user: string | null;
  hasPassword: boolean;
  database: string | null;
  /** Host and port as written in the URL; empty for socket URLs */
  authority: string;
  url: URL;
}

function isAcceptedScheme(value: string): value is PostgresScheme {
  return ACCEPTED_SCHEMES.some((scheme) => scheme === value);
}

/**
 * Read the scheme without parsing the rest, so error messages never need
 * to echo the (credential-bearing) URL.
 */
export function extractScheme(raw: string): string | null {
  const match = /^([a-zA-Z][a-zA-Z0-9+.-]*):\/\//.exec(raw);
  return match ? match[1].toLowerCase() : null;
}

/** `user:pass@/db?host=/socket`: WHATWG rejects an empty host after credentials */
const EMPTY_HOST_AFTER_CREDENTIALS = /^([a-zA-Z][a-zA-Z0-9+.-]*:\/\/[^/?#]*@)(?=[/?#]|$)/;
const PLACEHOLDER_HOST = "localhost";

function parseUrl(raw: string): URL | null {
  try {
    return new URL(raw);
  } catch {
    return null;
  }
}

function decode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

export function parseConnectionUrl(raw: string): Result<ParsedConnectionUrl, ConfigurationError> {
  const scheme = extractScheme(raw);
  if (scheme === null) {
    return err(new ConfigurationError("DATABASE_URL has no scheme; expected postgres:// or postgresql://"));
  }
  if (!isAcceptedScheme(scheme)) {
    return err(
      new ConfigurationError(`Unsupported DATABASE_URL scheme "${scheme}"; expected postgres:// or postgresql://`, {
        scheme,
      }),
    );
  }

  const url = parseUrl(raw) ?? parseUrl(raw.replace(EMPTY_HOST_AFTER_CREDENTIALS, `$1${PLACEHOLDER_HOST}`));
  if (url === null) {
    return err(new ConfigurationError("DATABASE_URL is not a valid URL", { scheme }));
  }

  const authority = EMPTY_HOST_AFTER_CREDENTIALS.test(raw) ? "" : url.host;

  // Unix-socket URLs carry the host as a query parameter
  const host = (authority === "" ? "" : url.hostname) || url.searchParams.get("host") || "";
  if (host === "") {
    return err(new ConfigurationError("DATABASE_URL has no host", { scheme }));
  }

  let port = DEFAULT_PORT;
  if (url.port !== "") {
    port = Number(url.port);
  }

  const database = decode(url.pathname.replace(/^\//, ""));

  return ok({
    scheme,
    host,
    port,
    user: url.username ? decode(url.username) : null,
    hasPassword: url.password !== "",
    database: database === "" ? null : database,
    authority,
    url,
  });
}

export interface RedactOptions {
  /** Mask the user name as well as the password */
  hideUser?: boolean;
}

export function redactParsedUrl(parsed: ParsedConnectionUrl, options: RedactOptions = {}): string {
  const { url } = parsed;

  let credentials = "";
  if (options.hideUser && (url.username || parsed.hasPassword)) {
    credentials = `${SECRET_MASK}@`;
  } else if (url.username || parsed.hasPassword) {
    credentials = `${url.username}${parsed.hasPassword ? `:${SECRET_MASK}` : ""}@`;
  }

  const search = new URLSearchParams();
  for (const [key, value] of url.searchParams) {
    search.append(key, SECRET_QUERY_PARAMS.has(key.toLowerCase()) ? SECRET_MASK : value);
  }
  const query = search.toString();

  return `${parsed.scheme}://${credentials}${parsed.authority}${url.pathname}${query ? `?${query}` : ""}`;
}

/**
 * Redact a raw connection string. Anything that does not parse is masked
 * whole rather than echoed.
 */
export function redactConnectionUrl(raw: string, options: RedactOptions = {}): string {
  const parsed = parseConnectionUrl(raw);
  if (!parsed.ok) return SECRET_MASK;
  return redactParsedUrl(parsed.value, options);
}
