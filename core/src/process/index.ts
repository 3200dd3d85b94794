export type {
  StdioMode,
  RunOptions,
  CommandResult,
  CommandRunner,
  CommandRunnerOptions,
} from "./command-runner.js";
export { createCommandRunner, prependToPath } from "./command-runner.js";
export type { ProbeResult, CommandProbe } from "./probe.js";
export { createCommandProbe, PROBE_TIMEOUT_MS } from "./probe.js";
export {
  CommandNotFoundError,
  CommandTimeoutError,
  CommandCancelledError,
} from "./errors.js";
