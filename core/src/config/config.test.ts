/**
 * Tests for config.ts
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import { promises as fs } from "fs";
import * as os from "os";
import * as path from "path";
import { expandHome, getDefaultConfig, loadConfig, mergeConfig } from "./config.js";

describe("getDefaultConfig", () => {
  it("targets uv with all extras", () => {
    const config = getDefaultConfig();
    expect(config.packageManager.command).toBe("uv");
    expect(config.packageManager.syncArgs).toEqual(["sync", "--all-extras"]);
    expect(config.envFile).toEqual({ path: ".env", template: ".env.example" });
    expect(config.commandTimeoutMs).toBeUndefined();
  });

  it("excludes integration tests", () => {
    expect(getDefaultConfig().checks.test).toEqual([
      "pytest",
      "tests/",
      "-v",
      "-m",
      "not integration",
      "--tb=short",
    ]);
  });
});

describe("mergeConfig", () => {
  it("overrides individual fields and keeps the rest", () => {
    const config = mergeConfig({
      packageManager: { command: "pdm" },
      checks: { test: ["pytest", "-x"] },
      commandTimeoutMs: 60000,
    });

    expect(config.packageManager.command).toBe("pdm");
    expect(config.packageManager.syncArgs).toEqual(["sync", "--all-extras"]);
    expect(config.checks.test).toEqual(["pytest", "-x"]);
    expect(config.checks.lint).toEqual(["ruff", "check", ".", "--fix"]);
    expect(config.commandTimeoutMs).toBe(60000);
  });

  it("keeps defaults for values of the wrong type", () => {
    const config = mergeConfig({
      logs: { dir: 5, primary: "" },
      checks: { lint: ["ruff", 3] },
      commandTimeoutMs: -1,
    });

    expect(config.logs.dir).toBe("logs");
    expect(config.logs.primary).toBe("server.log");
    expect(config.checks.lint).toEqual(["ruff", "check", ".", "--fix"]);
    expect(config.commandTimeoutMs).toBeUndefined();
  });

  it("returns defaults for non-objects", () => {
    expect(mergeConfig("uv")).toEqual(getDefaultConfig());
    expect(mergeConfig(null)).toEqual(getDefaultConfig());
  });
});

describe("expandHome", () => {
  it("expands a leading ~/", () => {
    expect(expandHome("~/.local/bin", "/home/dev")).toBe(path.join("/home/dev", ".local/bin"));
  });

  it("expands a bare ~", () => {
    expect(expandHome("~", "/home/dev")).toBe("/home/dev");
  });

  it("leaves other paths alone", () => {
    expect(expandHome("/opt/bin", "/home/dev")).toBe("/opt/bin");
    expect(expandHome("bin/~", "/home/dev")).toBe("bin/~");
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "devprep-config-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("uses defaults when devprep.json is absent", () => {
    const loaded = loadConfig(dir);
    expect(loaded.source).toBeNull();
    expect(loaded.warning).toBeUndefined();
    expect(loaded.config).toEqual(getDefaultConfig());
  });

  it("merges devprep.json over the defaults", async () => {
    const configPath = path.join(dir, "devprep.json");
    await fs.writeFile(configPath, JSON.stringify({ logs: { primary: "app.log" } }));

    const loaded = loadConfig(dir);

    expect(loaded.source).toBe(configPath);
    expect(loaded.config.logs).toEqual({ dir: "logs", primary: "app.log", secondary: "activity.log" });
  });

  it("freezes the loaded config", async () => {
    const loaded = loadConfig(dir);
    expect(Object.isFrozen(loaded.config)).toBe(true);
    expect(Object.isFrozen(loaded.config.logs)).toBe(true);
  });

  it("warns and falls back on invalid JSON", async () => {
    await fs.writeFile(path.join(dir, "devprep.json"), "{ not json");

    const loaded = loadConfig(dir);

    expect(loaded.source).toBeNull();
    expect(loaded.config).toEqual(getDefaultConfig());
    expect(loaded.warning).toMatch(/^Could not read devprep\.json \(.+\); using defaults$/);
  });

  it("warns when the file holds something other than an object", async () => {
    await fs.writeFile(path.join(dir, "devprep.json"), "[1, 2]");

    expect(loadConfig(dir).warning).toBe("devprep.json must contain a JSON object; using defaults");
  });
});
