/**
 * Shared plumbing for commands that run a pipeline.
 */

import {
  ExitCode,
  createStepContext,
  getErrorMessage,
  type PipelineResult,
  type StepContext,
} from "@devprep/core";
import { createInterruptController } from "../utils/interrupt.js";

export type ContextFactory = (signal: AbortSignal) => StepContext;

export interface CommandDeps {
  /** Override how the StepContext is built (tests). */
  createContext?: ContextFactory;
}

const defaultContextFactory: ContextFactory = (signal) => createStepContext({ signal });

/**
 * Build a context, run `pipeline`, and map the result to an exit code.
 * Unexpected errors are reported and become ExitCode.FAILURE.
 */
export async function withPipeline(
  deps: CommandDeps,
  pipeline: (ctx: StepContext) => Promise<PipelineResult>,
): Promise<number> {
  const interrupt = createInterruptController();
  const createContext = deps.createContext ?? defaultContextFactory;

  try {
    const ctx = createContext(interrupt.signal);
    try {
      const result = await pipeline(ctx);
      return result.exitCode;
    } catch (err) {
      ctx.reporter.error(getErrorMessage(err));
      return ExitCode.FAILURE;
    }
  } catch (err) {
    console.error(`Error: ${getErrorMessage(err)}`);
    return ExitCode.FAILURE;
  } finally {
    interrupt.dispose();
  }
}
