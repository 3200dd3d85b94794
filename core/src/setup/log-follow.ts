/**
 * Optional log follow: the last, blocking step of `setup --follow`.
 *
 * Runs until the run's AbortSignal fires (Ctrl+C).
 */

import { join } from "path";
import { FOLLOW_LOGS_HINT } from "../constants.js";
import { failed, skipped, success } from "../pipeline/outcome.js";
import type { Step } from "../pipeline/types.js";
import { CommandCancelledError } from "../process/errors.js";
import type { RunConfig } from "./types.js";

export function createLogFollowStep(runConfig: RunConfig): Step {
  return {
    name: "Follow logs",
    haltsOnFailure: true,
    async run(ctx) {
      if (!runConfig.follow) {
        ctx.reporter.info(`To follow logs, run: ${FOLLOW_LOGS_HINT}`);
        return skipped("Log follow not requested");
      }

      const { dir, primary } = ctx.config.logs;
      const logPath = join(dir, primary);
      ctx.reporter.info("Following logs (Ctrl+C to stop)...");

      try {
        const result = await ctx.runner.run("tail", ["-f", logPath], { timeoutMs: null });
        if (result.exitCode !== 0) {
          return failed(`tail exited with code ${result.exitCode}`, result.exitCode);
        }
        return success(`Stopped following ${logPath}`);
      } catch (err) {
        if (err instanceof CommandCancelledError) {
          return success(`Stopped following ${logPath}`);
        }
        throw err;
      }
    },
  };
}
