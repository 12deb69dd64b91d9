/**
 * Schema reconciliation for the remote backend.
 *
 * Requirements compile to check-then-apply steps run by a small runner.
 * Steps are additive only and safe to repeat; a failed step is reported
 * as drift and the remaining steps still run.
 */

import { createLogger } from "../../lib/logger.js";
import { ConfigurationError, schemaDriftWarning } from "../../utils/errors.js";
import type { DatabaseAdapter } from "../adapter.js";
import type { ReconcileReport, SchemaColumnRequirement } from "../types.js";
import { SCHEMA_COLUMN_REQUIREMENTS } from "./requirements.js";

const log = createLogger("schema-reconciler");

export const COLUMN_EXISTS_SQL = `SELECT EXISTS (
  SELECT 1 FROM information_schema.columns
  WHERE table_schema = current_schema() AND table_name = $1 AND column_name = $2
) AS present`;

const IDENTIFIER = /^[a-z_][a-z0-9_]*$/;
const SQL_TYPE = /^[A-Za-z][A-Za-z0-9_ ]*(\(\d+(,\s*\d+)?\))?(\[\])?$/;

export interface SchemaStep {
  id: string;
  /** True when the database already satisfies the step */
  check(db: DatabaseAdapter): Promise<boolean>;
  apply(db: DatabaseAdapter): Promise<void>;
}

function quoteIdentifier(name: string): string {
  if (!IDENTIFIER.test(name)) {
    throw new ConfigurationError(`Invalid SQL identifier "${name}"`, { name });
  }
  return `"${name}"`;
}

export function addColumnSql(req: SchemaColumnRequirement): string {
  if (!SQL_TYPE.test(req.sqlType)) {
    throw new ConfigurationError(`Invalid SQL type "${req.sqlType}"`, { table: req.table, column: req.column });
  }
  const defaultClause = req.defaultExpression === null ? "" : ` DEFAULT ${req.defaultExpression}`;
  return `ALTER TABLE ${quoteIdentifier(req.table)} ADD COLUMN IF NOT EXISTS ${quoteIdentifier(req.column)} ${req.sqlType}${defaultClause}`;
}

export function columnStep(req: SchemaColumnRequirement): SchemaStep {
  return {
    id: `${req.table}.${req.column}`,
    async check(db) {
      const row = await db.get<{ present: boolean | number | string }>(COLUMN_EXISTS_SQL, [req.table, req.column]);
      return row?.present === true || row?.present === 1 || row?.present === "t";
    },
    async apply(db) {
      await db.exec(addColumnSql(req));
    },
  };
}

export function compileRequirements(requirements: readonly SchemaColumnRequirement[]): SchemaStep[] {
  return [...requirements].sort((a, b) => a.since - b.since).map(columnStep);
}

export async function runSchemaSteps(db: DatabaseAdapter, steps: readonly SchemaStep[]): Promise<ReconcileReport> {
  const report: ReconcileReport = { applied: [], alreadyPresent: [], failed: [] };

  for (const step of steps) {
    try {
      if (await step.check(db)) {
        report.alreadyPresent.push(step.id);
        continue;
      }

      log.info("Adding missing column", { step: step.id });
      await step.apply(db);
      report.applied.push(step.id);
    } catch (error) {
      const warning = schemaDriftWarning(step.id, error);
      log.warn("Schema correction failed", { step: step.id, error: warning.message });
      report.failed.push(warning);
    }
  }

  return report;
}

export async function reconcileSchema(
  db: DatabaseAdapter,
  requirements: readonly SchemaColumnRequirement[] = SCHEMA_COLUMN_REQUIREMENTS,
): Promise<ReconcileReport> {
  if (db.kind !== "remote") {
    return { applied: [], alreadyPresent: [], failed: [] };
  }
  return runSchemaSteps(db, compileRequirements(requirements));
}
