/**
 * Checks module — the quality pipeline behind `devprep check`.
 */

export {
  createQualitySteps,
  runQualityChecks,
  QUALITY_PASSED_MESSAGE,
  QUALITY_FAILED_MESSAGE,
} from "./quality.js";
export { createToolCheckStep } from "./tool-check.js";
export { createEnsureDependenciesStep } from "./ensure-dependencies.js";
export type { ToolStepDefinition } from "./tool-steps.js";
export { TOOL_STEPS, createToolStep } from "./tool-steps.js";
