/**
 * Capability probe: is a command on PATH, and which version is it?
 */

import type { CommandRunner } from "./command-runner.js";
import { CommandCancelledError } from "./errors.js";

export const PROBE_TIMEOUT_MS = 5000;

export interface ProbeResult {
  available: boolean;
  /** First line of `<command> --version`, when the command printed one. */
  version?: string;
}

export interface CommandProbe {
  probe(command: string): Promise<ProbeResult>;
}

export function createCommandProbe(runner: CommandRunner): CommandProbe {
  return {
    async probe(command) {
      try {
        const result = await runner.run(command, ["--version"], {
          stdio: "pipe",
          timeoutMs: PROBE_TIMEOUT_MS,
        });
        if (result.exitCode !== 0) {
          return { available: false };
        }
        const output = result.stdout.trim() || result.stderr.trim();
        const version = output.split("\n")[0]?.trim();
        return version ? { available: true, version } : { available: true };
      } catch (err) {
        if (err instanceof CommandCancelledError) throw err;
        // Not found, timed out, or not executable
        return { available: false };
      }
    },
  };
}
