/**
 * Silent catch helpers: structured debug logging for intentional suppression.
 *
 * Usage: `.catch(silentCatch("probe:close"))`
 */

import { createLogger } from "../lib/logger.js";

const log = createLogger("catch");

const catchCounts = new Map<string, number>();

export function silentCatch(context: string): (error: unknown) => void {
  return (error: unknown) => {
    const count = (catchCounts.get(context) ?? 0) + 1;
    catchCounts.set(context, count);
    log.debug(`[${context}] suppressed (${count}x): ${error instanceof Error ? error.message : String(error)}`);
  };
}

export function getCatchCounts(): Record<string, number> {
  return Object.fromEntries(catchCounts);
}

export function resetCatchCounts(): void {
  catchCounts.clear();
}
