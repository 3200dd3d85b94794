/**
 * Types for the step/pipeline engine.
 *
 * Shared by the provisioning (`setup`) and quality (`check`) pipelines.
 */

import type { DevprepConfig } from "../config/config.js";
import type { StatusReporter } from "../logging/status-reporter.js";
import type { CommandRunner } from "../process/command-runner.js";
import type { CommandProbe } from "../process/probe.js";

export type Outcome =
  | { kind: "success"; message: string }
  | { kind: "skipped"; reason: string }
  | { kind: "failed"; message: string; exitCode?: number };

/**
 * Everything a step may touch. Built once per invocation.
 */
export interface StepContext {
  cwd: string;
  config: Readonly<DevprepConfig>;
  reporter: StatusReporter;
  runner: CommandRunner;
  probe: CommandProbe;
  /** Fires on SIGINT/SIGTERM. */
  signal?: AbortSignal;
}

export interface Step {
  name: string;
  /** Stop the pipeline when this step fails. */
  haltsOnFailure: boolean;
  /** Title printed above the step's output, if any. */
  section?: string;
  /**
   * Perform the step. Preconditions are re-checked on every call;
   * an already-satisfied step returns `skipped`.
   */
  run(ctx: StepContext): Promise<Outcome>;
}

export interface PipelineEntry {
  step: string;
  outcome: Outcome;
}

export interface PipelineResult {
  /** Executed steps, in order. */
  entries: PipelineEntry[];
  status: "success" | "failed";
  /** A halting step failed or the run was cancelled; later steps never ran. */
  aborted: boolean;
  cancelled: boolean;
  exitCode: number;
}
