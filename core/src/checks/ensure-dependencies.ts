import { failed, success } from "../pipeline/outcome.js";
import type { Step } from "../pipeline/types.js";

/**
 * Quiet dependency sync. When the quiet attempt fails, sync again with
 * inherited output so the user sees the tool's own error.
 */
export function createEnsureDependenciesStep(): Step {
  return {
    name: "Ensure dependencies",
    haltsOnFailure: false,
    section: "🔍 Checking development dependencies...",
    async run(ctx) {
      const { command, syncArgs } = ctx.config.packageManager;

      const quiet = await ctx.runner.run(command, syncArgs, { stdio: "ignore" });
      if (quiet.exitCode !== 0) {
        ctx.reporter.warn("Syncing dependencies...");
        const verbose = await ctx.runner.run(command, syncArgs);
        if (verbose.exitCode !== 0) {
          return failed("Failed to sync development dependencies", verbose.exitCode);
        }
      }
      return success("Development dependencies are installed");
    },
  };
}
