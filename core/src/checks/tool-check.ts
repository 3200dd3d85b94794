import { failed, success } from "../pipeline/outcome.js";
import type { Step } from "../pipeline/types.js";

/**
 * The package manager must already be installed; `check` never installs it.
 */
export function createToolCheckStep(): Step {
  return {
    name: "Check package manager",
    haltsOnFailure: true,
    async run(ctx) {
      const { command } = ctx.config.packageManager;
      const result = await ctx.probe.probe(command);
      if (!result.available) {
        return failed(`${command} is not installed. Please run devprep setup first`);
      }
      return success(`Using ${result.version ?? command}`);
    },
  };
}
