/**
 * Remote schema requirements.
 *
 * Columns the device store reads that older remote schemas may lack.
 * Append new entries with a higher `since`; never edit or remove one.
 */

import type { SchemaColumnRequirement } from "../types.js";

/** Table whose presence proves the remote schema was migrated */
export const REQUIRED_TABLE = "devices";

export const SCHEMA_COLUMN_REQUIREMENTS: readonly SchemaColumnRequirement[] = Object.freeze([
  { table: "devices", column: "facebook_uuid", sqlType: "UUID", defaultExpression: null, since: 1 },
  { table: "devices", column: "lid_migration_ts", sqlType: "BIGINT", defaultExpression: "0", since: 1 },
  { table: "pre_keys", column: "key", sqlType: "BYTEA", defaultExpression: null, since: 2 },
]);

export const REQUIREMENTS_VERSION = SCHEMA_COLUMN_REQUIREMENTS.reduce((max, req) => Math.max(max, req.since), 0);
