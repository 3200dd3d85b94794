/**
 * Errors raised while running external commands.
 */

export class CommandNotFoundError extends Error {
  constructor(readonly command: string) {
    super(`${command}: command not found`);
    this.name = "CommandNotFoundError";
  }
}

export class CommandTimeoutError extends Error {
  constructor(
    readonly command: string,
    readonly timeoutMs: number,
  ) {
    super(`${command} did not finish within ${timeoutMs}ms and was stopped`);
    this.name = "CommandTimeoutError";
  }
}

export class CommandCancelledError extends Error {
  constructor(readonly command: string) {
    super(`${command} was cancelled`);
    this.name = "CommandCancelledError";
  }
}
