/**
 * Setup command — bootstrap the local development environment.
 */

import { runProvisioning } from "@devprep/core";
import { withPipeline, type CommandDeps } from "./run-context.js";

export interface SetupCommandOptions {
  follow?: boolean;
}

/**
 * Run the provisioning pipeline and return its exit code.
 */
export function runSetup(options: SetupCommandOptions, deps: CommandDeps = {}): Promise<number> {
  return withPipeline(deps, (ctx) => runProvisioning(ctx, { follow: options.follow === true }));
}

export async function startSetup(options: SetupCommandOptions): Promise<void> {
  const exitCode = await runSetup(options);
  process.exit(exitCode);
}
