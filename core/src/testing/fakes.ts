/**
 * In-process stand-ins for running commands, probing tools and capturing
 * status output. Nothing here spawns a process.
 */

import { getDefaultConfig, freezeConfig, type DevprepConfig } from "../config/config.js";
import type { Logger } from "../logging/logger.js";
import { createStatusReporter } from "../logging/status-reporter.js";
import type { StepContext } from "../pipeline/types.js";
import type { CommandResult, CommandRunner, RunOptions } from "../process/command-runner.js";
import type { CommandProbe, ProbeResult } from "../process/probe.js";

export interface RecordedCall {
  command: string;
  args: string[];
  options: RunOptions;
}

export type FakeResponder = (call: RecordedCall) => CommandResult | Promise<CommandResult>;

export function exitWith(exitCode: number, stdout = "", stderr = ""): CommandResult {
  return { exitCode, stdout, stderr };
}

export class FakeCommandRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly responder: FakeResponder = () => exitWith(0)) {}

  async run(command: string, args: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
    const call: RecordedCall = { command, args: [...args], options };
    this.calls.push(call);
    return this.responder(call);
  }

  /** Each call as a single "command arg arg" string. */
  commandLines(): string[] {
    return this.calls.map((call) => [call.command, ...call.args].join(" "));
  }
}

/**
 * Answers probes from a queue; the last answer repeats once the queue is
 * drained.
 */
export class FakeCommandProbe implements CommandProbe {
  readonly probed: string[] = [];
  private readonly answers: ProbeResult[];

  constructor(...answers: ProbeResult[]) {
    this.answers = answers.length > 0 ? answers : [{ available: true, version: "uv 0.4.0" }];
  }

  async probe(command: string): Promise<ProbeResult> {
    this.probed.push(command);
    const next = this.answers.length > 1 ? this.answers.shift() : this.answers[0];
    return next ?? { available: false };
  }
}

/**
 * A Logger that collects every line, regardless of level, in call order.
 */
export function createCapturingLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const push = (...args: unknown[]) => {
    lines.push(args.map(String).join(" "));
  };
  return { logger: { log: push, warn: push, error: push }, lines };
}

export interface TestContextOptions {
  cwd: string;
  runner?: CommandRunner;
  probe?: CommandProbe;
  config?: DevprepConfig;
  signal?: AbortSignal;
}

/**
 * A StepContext with uncolored, captured status output.
 */
export function createTestContext(options: TestContextOptions): { ctx: StepContext; lines: string[] } {
  const { logger, lines } = createCapturingLogger();
  const ctx: StepContext = {
    cwd: options.cwd,
    config: freezeConfig(options.config ?? getDefaultConfig()),
    reporter: createStatusReporter({ logger, color: false }),
    runner: options.runner ?? new FakeCommandRunner(),
    probe: options.probe ?? new FakeCommandProbe(),
    signal: options.signal,
  };
  return { ctx, lines };
}
