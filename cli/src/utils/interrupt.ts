/**
 * Turn SIGINT/SIGTERM into an AbortSignal for the running pipeline.
 *
 * While the handlers are installed Node's default "exit on Ctrl+C" is
 * suppressed; the pipeline stops the running child and exits with 130.
 */

export interface InterruptController {
  signal: AbortSignal;
  dispose(): void;
}

type InterruptSignal = "SIGINT" | "SIGTERM";

/** The slice of `process` this module listens on. */
export interface SignalSource {
  once(event: InterruptSignal, listener: () => void): unknown;
  removeListener(event: InterruptSignal, listener: () => void): unknown;
}

export function createInterruptController(source: SignalSource = process): InterruptController {
  const controller = new AbortController();
  const onSignal = () => controller.abort();

  source.once("SIGINT", onSignal);
  source.once("SIGTERM", onSignal);

  return {
    signal: controller.signal,
    dispose: () => {
      source.removeListener("SIGINT", onSignal);
      source.removeListener("SIGTERM", onSignal);
    },
  };
}
