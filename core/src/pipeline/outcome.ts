import type { Outcome } from "./types.js";

export function success(message: string): Outcome {
  return { kind: "success", message };
}

export function skipped(reason: string): Outcome {
  return { kind: "skipped", reason };
}

/**
 * @param exitCode Exit status of the external command behind the failure, if any.
 */
export function failed(message: string, exitCode?: number): Outcome {
  return exitCode === undefined
    ? { kind: "failed", message }
    : { kind: "failed", message, exitCode };
}

/** True only for `failed`; `skipped` counts as success. */
export function isFailure(outcome: Outcome): outcome is Extract<Outcome, { kind: "failed" }> {
  return outcome.kind === "failed";
}
