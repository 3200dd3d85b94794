/**
 * Builds the StepContext for one CLI invocation: config, status reporter,
 * command runner and probe, all sharing one AbortSignal.
 */

import { expandHome, loadConfig } from "./config/config.js";
import { createDebugLogger, createLogger } from "./logging/logger.js";
import { createStatusReporter, shouldUseColor } from "./logging/status-reporter.js";
import { createCommandRunner, prependToPath } from "./process/command-runner.js";
import { createCommandProbe } from "./process/probe.js";
import type { StepContext } from "./pipeline/types.js";

export interface CreateStepContextOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  /** Whether the status stream is a terminal; decides color output. */
  isTTY?: boolean;
}

export function createStepContext(options: CreateStepContextOptions = {}): StepContext {
  const { cwd = process.cwd(), env = process.env, signal, isTTY = process.stderr.isTTY } = options;
  const debug = createDebugLogger(env);

  const reporter = createStatusReporter({
    logger: createLogger({ silent: false, stream: "stderr" }),
    color: shouldUseColor({ isTTY }, env),
  });

  const { config, source, warning } = loadConfig(cwd);
  if (warning) {
    reporter.warn(warning);
  }
  debug.log(source ? `Loaded settings from ${source}` : "Using default settings");

  const runner = createCommandRunner({
    cwd,
    env: prependToPath(env, expandHome(config.packageManager.installDir)),
    signal,
    timeoutMs: config.commandTimeoutMs,
    logger: debug,
  });

  return {
    cwd,
    config,
    reporter,
    runner,
    probe: createCommandProbe(runner),
    signal,
  };
}
