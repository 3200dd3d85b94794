export type {
  Outcome,
  Step,
  StepContext,
  PipelineEntry,
  PipelineResult,
} from "./types.js";
export { success, skipped, failed, isFailure } from "./outcome.js";
export { executeStep, reportOutcome } from "./step-executor.js";
export { runPipeline, resolveExitCode } from "./pipeline.js";
