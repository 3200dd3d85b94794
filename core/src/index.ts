/**
 * @devprep/core — step/pipeline engine and the two devprep pipelines.
 */

export { ExitCode, COLORS, GLYPHS, CONFIG_FILE_NAME, FOLLOW_LOGS_HINT, RESERVED_FLAG_FILES } from "./constants.js";
export * from "./config/index.js";
export * from "./logging/index.js";
export * from "./process/index.js";
export * from "./pipeline/index.js";
export * from "./setup/index.js";
export * from "./checks/index.js";
export type { CreateStepContextOptions } from "./context.js";
export { createStepContext } from "./context.js";
