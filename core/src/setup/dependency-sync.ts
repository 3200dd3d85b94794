import { failed, success } from "../pipeline/outcome.js";
import type { Step } from "../pipeline/types.js";

/**
 * Sync all project dependencies, extras included. Tool output is inherited.
 */
export function createDependencySyncStep(): Step {
  return {
    name: "Sync dependencies",
    haltsOnFailure: true,
    async run(ctx) {
      const { command, syncArgs } = ctx.config.packageManager;
      ctx.reporter.info(`Setting up project environment with ${command}...`);

      const result = await ctx.runner.run(command, syncArgs);
      if (result.exitCode !== 0) {
        return failed("Failed to install dependencies", result.exitCode);
      }
      return success("Dependencies installed successfully");
    },
  };
}
