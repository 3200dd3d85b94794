/**
 * Package manager presence check, with a one-time install when missing.
 */

import { expandHome } from "../config/config.js";
import { failed, success } from "../pipeline/outcome.js";
import type { Step } from "../pipeline/types.js";

/** Single-quote a value for `sh`. */
function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function buildInstallCommand(installScriptUrl: string): string {
  return `curl -LsSf ${shellQuote(installScriptUrl)} | sh`;
}

export function createInstallerStep(): Step {
  return {
    name: "Install package manager",
    haltsOnFailure: true,
    async run(ctx) {
      const { command, installScriptUrl, installDir } = ctx.config.packageManager;

      const existing = await ctx.probe.probe(command);
      if (existing.available) {
        return success(`${command} is already installed (${existing.version ?? "unknown version"})`);
      }

      ctx.reporter.info(`${command} not found. Installing ${command}...`);
      const install = await ctx.runner.run(buildInstallCommand(installScriptUrl), [], {
        shell: true,
      });
      if (install.exitCode !== 0) {
        return failed(`Failed to install ${command} from ${installScriptUrl}`, install.exitCode);
      }

      // The runner's PATH already includes installDir
      const installed = await ctx.probe.probe(command);
      if (!installed.available) {
        return failed(
          `${command} was installed but is not on PATH (expected in ${expandHome(installDir)})`,
        );
      }

      return success(`${command} installed successfully (${installed.version ?? "unknown version"})`);
    },
  };
}
