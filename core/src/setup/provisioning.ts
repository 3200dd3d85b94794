/**
 * Provisioning pipeline (`devprep setup`).
 *
 * Installer → dependency sync → config file → log files → summary → follow.
 * Every step halts the run on failure.
 */

import { runPipeline } from "../pipeline/pipeline.js";
import type { PipelineResult, Step, StepContext } from "../pipeline/types.js";
import { createDependencySyncStep } from "./dependency-sync.js";
import { createEnvFileStep } from "./env-file.js";
import { createInstallerStep } from "./installer.js";
import { createLogFilesStep } from "./log-files.js";
import { createLogFollowStep } from "./log-follow.js";
import { createSetupSummaryStep } from "./summary.js";
import type { RunConfig } from "./types.js";

export function createProvisioningSteps(runConfig: RunConfig): Step[] {
  return [
    createInstallerStep(),
    createDependencySyncStep(),
    createEnvFileStep(),
    createLogFilesStep(),
    createSetupSummaryStep(),
    createLogFollowStep(runConfig),
  ];
}

export async function runProvisioning(
  ctx: StepContext,
  runConfig: RunConfig,
): Promise<PipelineResult> {
  ctx.reporter.info("🚀 devprep setup");
  ctx.reporter.plain("");

  const result = await runPipeline(createProvisioningSteps(runConfig), ctx);

  if (result.aborted && !result.cancelled) {
    const last = result.entries[result.entries.length - 1];
    ctx.reporter.error(`Setup aborted at "${last?.step ?? "start"}" (exit code ${result.exitCode})`);
  }
  return result;
}
