/**
 * Runs a single step and prints its status line.
 */

import { getErrorMessage } from "../logging/error-utils.js";
import type { StatusReporter } from "../logging/status-reporter.js";
import { failed } from "./outcome.js";
import type { Outcome, Step, StepContext } from "./types.js";

export function reportOutcome(reporter: StatusReporter, outcome: Outcome): void {
  switch (outcome.kind) {
    case "success":
      reporter.success(outcome.message);
      break;
    case "skipped":
      reporter.success(outcome.reason);
      break;
    case "failed":
      reporter.error(outcome.message);
      break;
  }
}

/**
 * Execute `step` and return its outcome. Never rejects: anything the step
 * throws becomes a `failed` outcome.
 */
export async function executeStep(step: Step, ctx: StepContext): Promise<Outcome> {
  if (step.section) {
    ctx.reporter.section(step.section);
  }

  let outcome: Outcome;
  try {
    outcome = await step.run(ctx);
  } catch (err) {
    outcome = failed(`${step.name} failed: ${getErrorMessage(err)}`);
  }

  reportOutcome(ctx.reporter, outcome);
  return outcome;
}
