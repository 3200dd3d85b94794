import { success } from "../pipeline/outcome.js";
import type { Step } from "../pipeline/types.js";

/**
 * Render a command line for display, quoting arguments that contain spaces.
 */
export function formatCommandLine(command: string, args: readonly string[]): string {
  return [command, ...args].map((part) => (/\s/.test(part) ? `"${part}"` : part)).join(" ");
}

/**
 * Print next-step hints once the environment is ready.
 */
export function createSetupSummaryStep(): Step {
  return {
    name: "Summarize setup",
    haltsOnFailure: true,
    async run(ctx) {
      const { command, runArgs } = ctx.config.packageManager;

      ctx.reporter.plain("");
      ctx.reporter.info("To run tests:");
      ctx.reporter.plain(`    ${formatCommandLine(command, [...runArgs, ...ctx.config.checks.test])}`);
      ctx.reporter.info("To run code quality checks:");
      ctx.reporter.plain("    devprep check");
      ctx.reporter.plain("");

      return success("Setup complete!");
    },
  };
}
