/**
 * Setup module — the provisioning pipeline behind `devprep setup`.
 */

export type { RunConfig } from "./types.js";
export { createProvisioningSteps, runProvisioning } from "./provisioning.js";
export { createInstallerStep, buildInstallCommand } from "./installer.js";
export { createDependencySyncStep } from "./dependency-sync.js";
export { createEnvFileStep } from "./env-file.js";
export { createLogFilesStep, ensureLogFile } from "./log-files.js";
export { createSetupSummaryStep, formatCommandLine } from "./summary.js";
export { createLogFollowStep } from "./log-follow.js";
