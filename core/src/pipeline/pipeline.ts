/**
 * Pipeline driver
 *
 * Runs steps strictly in order. A failing step with `haltsOnFailure` ends
 * the run; any other failure is recorded and the next step runs anyway.
 */

import { ExitCode } from "../constants.js";
import { isFailure } from "./outcome.js";
import { executeStep } from "./step-executor.js";
import type { Outcome, PipelineEntry, PipelineResult, Step, StepContext } from "./types.js";

/**
 * Exit status for a finished run: 130 when cancelled, 0 when every step
 * succeeded, the halting command's own exit code when it had one, else 1.
 */
export function resolveExitCode(
  status: PipelineResult["status"],
  cancelled: boolean,
  haltingFailure: Outcome | null,
): number {
  if (cancelled) return ExitCode.CANCELLED;
  if (status === "success") return ExitCode.SUCCESS;
  if (haltingFailure?.kind === "failed" && haltingFailure.exitCode !== undefined && haltingFailure.exitCode > 0) {
    return haltingFailure.exitCode;
  }
  return ExitCode.FAILURE;
}

export async function runPipeline(steps: readonly Step[], ctx: StepContext): Promise<PipelineResult> {
  const entries: PipelineEntry[] = [];
  let haltingFailure: Outcome | null = null;
  let aborted = false;

  for (const step of steps) {
    if (ctx.signal?.aborted) {
      aborted = true;
      break;
    }

    const outcome = await executeStep(step, ctx);
    entries.push({ step: step.name, outcome });

    if (isFailure(outcome) && step.haltsOnFailure) {
      haltingFailure = outcome;
      aborted = true;
      break;
    }
  }

  const cancelled = ctx.signal?.aborted ?? false;
  if (cancelled) aborted = aborted || entries.length < steps.length;

  const status = entries.some((entry) => isFailure(entry.outcome)) ? "failed" : "success";

  return {
    entries,
    status,
    aborted,
    cancelled,
    exitCode: resolveExitCode(status, cancelled, haltingFailure),
  };
}
