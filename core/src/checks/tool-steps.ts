/**
 * Quality tool steps: each runs one project tool through the package
 * manager and passes or fails on its exit status alone.
 */

import type { ChecksConfig } from "../config/config.js";
import { failed, success } from "../pipeline/outcome.js";
import type { Step } from "../pipeline/types.js";

export interface ToolStepDefinition {
  name: string;
  section: string;
  /** Which argv from `config.checks` to run. */
  check: keyof ChecksConfig;
  successMessage: string;
  failureMessage: string;
}

export const TOOL_STEPS: readonly ToolStepDefinition[] = [
  {
    name: "Lint",
    section: "🔍 Running linter (auto-fix)...",
    check: "lint",
    successMessage: "Linting passed!",
    failureMessage: "Linting failed",
  },
  {
    name: "Format",
    section: "🎨 Running formatter...",
    check: "format",
    successMessage: "Formatting applied!",
    failureMessage: "Formatting failed",
  },
  {
    name: "Import sort",
    section: "📦 Running import sorting...",
    check: "importSort",
    successMessage: "Import sorting completed!",
    failureMessage: "Import sorting failed",
  },
  {
    name: "Test",
    section: "🧪 Running unit tests...",
    check: "test",
    successMessage: "All tests passed!",
    failureMessage: "Some tests failed",
  },
];

export function createToolStep(definition: ToolStepDefinition): Step {
  return {
    name: definition.name,
    haltsOnFailure: false,
    section: definition.section,
    async run(ctx) {
      const { command, runArgs } = ctx.config.packageManager;
      const args = [...runArgs, ...ctx.config.checks[definition.check]];

      const result = await ctx.runner.run(command, args);
      if (result.exitCode !== 0) {
        return failed(`${definition.failureMessage} (exit code ${result.exitCode})`, result.exitCode);
      }
      return success(definition.successMessage);
    },
  };
}
