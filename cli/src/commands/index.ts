export { startSetup, runSetup, type SetupCommandOptions } from "./setup.js";
export { startChecks, runChecks } from "./check.js";
export type { CommandDeps, ContextFactory } from "./run-context.js";
