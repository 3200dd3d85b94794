/**
 * Command Runner
 *
 * Spawns external tools for pipeline steps. Output is inherited by default
 * so tool errors reach the terminal verbatim.
 *
 * @module process/command-runner
 */

import { spawn } from "child_process";
import { delimiter } from "path";
import { createLogger, type Logger } from "../logging/logger.js";
import { getErrorMessage, isNotFoundError } from "../logging/error-utils.js";
import {
  CommandCancelledError,
  CommandNotFoundError,
  CommandTimeoutError,
} from "./errors.js";

export type StdioMode = "inherit" | "ignore" | "pipe";

export interface RunOptions {
  /** Default "inherit". Only "pipe" captures stdout/stderr into the result. */
  stdio?: StdioMode;
  /** Run `command` through the system shell (args are appended verbatim). */
  shell?: boolean;
  /**
   * Kill the command after this many milliseconds. Omitted: the runner's
   * default applies. null: no limit.
   */
  timeoutMs?: number | null;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>;
}

export interface CommandRunnerOptions {
  cwd: string;
  env?: NodeJS.ProcessEnv;
  /** Aborting kills the running child and rejects with CommandCancelledError. */
  signal?: AbortSignal;
  /** Default timeout for every command; RunOptions.timeoutMs overrides it. */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Return a copy of `env` with `dir` at the front of PATH.
 */
export function prependToPath(env: NodeJS.ProcessEnv, dir: string): NodeJS.ProcessEnv {
  const current = env.PATH ?? "";
  const entries = current.split(delimiter).filter((entry) => entry !== "" && entry !== dir);
  return { ...env, PATH: [dir, ...entries].join(delimiter) };
}

/** A child that closes on one of these was interrupted, not failed. */
const INTERRUPT_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

/**
 * Create a runner backed by child_process.spawn.
 *
 * Shell commands run in their own process group so that a timeout or an
 * abort also stops the processes of a pipeline like `curl ... | sh`.
 */
export function createCommandRunner(options: CommandRunnerOptions): CommandRunner {
  const { cwd, env = process.env, signal, timeoutMs: defaultTimeoutMs } = options;
  const logger = options.logger ?? createLogger();

  return {
    run(command, args, runOptions = {}) {
      const { stdio = "inherit", shell = false } = runOptions;
      const timeoutMs =
        runOptions.timeoutMs === undefined ? defaultTimeoutMs : runOptions.timeoutMs ?? undefined;
      const ownGroup = shell && process.platform !== "win32";

      logger.log(`$ ${[command, ...args].join(" ")}`);

      return new Promise<CommandResult>((resolve, reject) => {
        if (signal?.aborted) {
          reject(new CommandCancelledError(command));
          return;
        }

        const child = spawn(command, [...args], { cwd, env, stdio, shell, detached: ownGroup });

        let stdout = "";
        let stderr = "";
        child.stdout?.on("data", (chunk: Buffer) => {
          stdout += chunk.toString();
        });
        child.stderr?.on("data", (chunk: Buffer) => {
          stderr += chunk.toString();
        });

        const stop = (): void => {
          const { pid } = child;
          if (ownGroup && pid !== undefined) {
            try {
              process.kill(-pid, "SIGTERM");
              return;
            } catch (err) {
              logger.log(`Could not signal process group ${pid}: ${getErrorMessage(err)}`);
            }
          }
          child.kill("SIGTERM");
        };

        let timedOut = false;
        const timer =
          timeoutMs !== undefined
            ? setTimeout(() => {
                timedOut = true;
                stop();
              }, timeoutMs)
            : undefined;

        let cancelled = false;
        const onAbort = (): void => {
          cancelled = true;
          stop();
        };
        signal?.addEventListener("abort", onAbort, { once: true });

        const cleanup = (): void => {
          clearTimeout(timer);
          signal?.removeEventListener("abort", onAbort);
        };

        child.on("error", (err) => {
          cleanup();
          if (isNotFoundError(err)) {
            reject(new CommandNotFoundError(command));
          } else {
            reject(err);
          }
        });

        child.on("close", (code, closeSignal) => {
          cleanup();
          if (timedOut && timeoutMs !== undefined) {
            reject(new CommandTimeoutError(command, timeoutMs));
            return;
          }
          const interrupted = closeSignal !== null && INTERRUPT_SIGNALS.includes(closeSignal);
          if (cancelled || signal?.aborted || interrupted) {
            reject(new CommandCancelledError(command));
            return;
          }
          resolve({ exitCode: code ?? 1, stdout, stderr });
        });
      });
    },
  };
}
