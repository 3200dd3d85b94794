/**
 * Check command — lint, format, import sort and test, in that order.
 */

import { runQualityChecks } from "@devprep/core";
import { withPipeline, type CommandDeps } from "./run-context.js";

/**
 * Run every quality check and return 0 only if all of them passed.
 */
export function runChecks(deps: CommandDeps = {}): Promise<number> {
  return withPipeline(deps, runQualityChecks);
}

export async function startChecks(): Promise<void> {
  const exitCode = await runChecks();
  process.exit(exitCode);
}
