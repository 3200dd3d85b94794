/**
 * Quality pipeline (`devprep check`).
 *
 * Only the tool check halts; every later failure is accumulated and the
 * run ends with a single pass/fail banner.
 */

import { runPipeline } from "../pipeline/pipeline.js";
import type { PipelineResult, Step, StepContext } from "../pipeline/types.js";
import { createEnsureDependenciesStep } from "./ensure-dependencies.js";
import { createToolCheckStep } from "./tool-check.js";
import { TOOL_STEPS, createToolStep } from "./tool-steps.js";

export const QUALITY_PASSED_MESSAGE = "All quality checks passed! 🎉";
export const QUALITY_FAILED_MESSAGE = "Some quality checks failed. Please fix the issues above.";

export function createQualitySteps(): Step[] {
  return [
    createToolCheckStep(),
    createEnsureDependenciesStep(),
    ...TOOL_STEPS.map(createToolStep),
  ];
}

export async function runQualityChecks(ctx: StepContext): Promise<PipelineResult> {
  ctx.reporter.header("🔍 Running code quality checks");

  const result = await runPipeline(createQualitySteps(), ctx);

  // A missing package manager ends the run before any check
  if (!result.aborted) {
    const passed = result.status === "success";
    ctx.reporter.banner(passed, passed ? QUALITY_PASSED_MESSAGE : QUALITY_FAILED_MESSAGE);
  }
  return result;
}
