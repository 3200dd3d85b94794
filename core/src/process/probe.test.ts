/**
 * Tests for probe.ts
 */

import { describe, it, expect } from "@jest/globals";
import { FakeCommandRunner, exitWith } from "../testing/fakes.js";
import { CommandCancelledError, CommandNotFoundError } from "./errors.js";
import { PROBE_TIMEOUT_MS, createCommandProbe } from "./probe.js";

describe("createCommandProbe", () => {
  it("reports the first line of --version output", async () => {
    const runner = new FakeCommandRunner(() => exitWith(0, "uv 0.4.0\nextra\n"));

    const result = await createCommandProbe(runner).probe("uv");

    expect(result).toEqual({ available: true, version: "uv 0.4.0" });
    expect(runner.calls).toEqual([
      { command: "uv", args: ["--version"], options: { stdio: "pipe", timeoutMs: PROBE_TIMEOUT_MS } },
    ]);
  });

  it("falls back to stderr for the version", async () => {
    const runner = new FakeCommandRunner(() => exitWith(0, "", "tool 1.2\n"));
    expect(await createCommandProbe(runner).probe("tool")).toEqual({ available: true, version: "tool 1.2" });
  });

  it("is available without a version when nothing is printed", async () => {
    const runner = new FakeCommandRunner(() => exitWith(0));
    expect(await createCommandProbe(runner).probe("tool")).toEqual({ available: true });
  });

  it("is unavailable on a non-zero exit", async () => {
    const runner = new FakeCommandRunner(() => exitWith(127));
    expect(await createCommandProbe(runner).probe("uv")).toEqual({ available: false });
  });

  it("is unavailable when the command is missing", async () => {
    const runner = new FakeCommandRunner(() => {
      throw new CommandNotFoundError("uv");
    });
    expect(await createCommandProbe(runner).probe("uv")).toEqual({ available: false });
  });

  it("propagates cancellation", async () => {
    const runner = new FakeCommandRunner(() => {
      throw new CommandCancelledError("uv");
    });
    await expect(createCommandProbe(runner).probe("uv")).rejects.toBeInstanceOf(CommandCancelledError);
  });
});
