/**
 * devprep configuration read/merge
 *
 * Every field has a default; an optional devprep.json in the project root
 * overrides individual fields.
 */

import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { CONFIG_FILE_NAME } from "../constants.js";
import { getErrorMessage } from "../logging/error-utils.js";

export interface PackageManagerConfig {
  /** Executable name, probed with `--version`. */
  command: string;
  /** Shell install script, piped to `sh` when the command is missing. */
  installScriptUrl: string;
  /** Where the installer puts the binary; prepended to PATH. */
  installDir: string;
  syncArgs: string[];
  /** Prefix for running project tools, e.g. `uv run <tool>`. */
  runArgs: string[];
}

export interface EnvFileConfig {
  path: string;
  template: string;
}

export interface LogsConfig {
  dir: string;
  /** Followed by `setup --follow`. */
  primary: string;
  secondary: string;
}

export interface ChecksConfig {
  lint: string[];
  format: string[];
  importSort: string[];
  test: string[];
}

export interface DevprepConfig {
  packageManager: PackageManagerConfig;
  envFile: EnvFileConfig;
  logs: LogsConfig;
  checks: ChecksConfig;
  /** Upper bound for each external command; unset means wait indefinitely. */
  commandTimeoutMs?: number;
}

export interface LoadedConfig {
  config: Readonly<DevprepConfig>;
  /** Absolute path of the file that was merged in, or null for defaults. */
  source: string | null;
  /** Set when a config file existed but could not be used. */
  warning?: string;
}

export function getDefaultConfig(): DevprepConfig {
  return {
    packageManager: {
      command: "uv",
      installScriptUrl: "https://astral.sh/uv/install.sh",
      installDir: "~/.local/bin",
      syncArgs: ["sync", "--all-extras"],
      runArgs: ["run"],
    },
    envFile: {
      path: ".env",
      template: ".env.example",
    },
    logs: {
      dir: "logs",
      primary: "server.log",
      secondary: "activity.log",
    },
    checks: {
      lint: ["ruff", "check", ".", "--fix"],
      format: ["black", "."],
      importSort: ["isort", "."],
      test: ["pytest", "tests/", "-v", "-m", "not integration", "--tb=short"],
    },
  };
}

/**
 * Expand a leading `~/` to the home directory.
 */
export function expandHome(pathValue: string, home = homedir()): string {
  if (pathValue === "~") return home;
  if (pathValue.startsWith("~/")) return join(home, pathValue.slice(2));
  return pathValue;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readSection(parsed: Record<string, unknown>, key: string): Record<string, unknown> {
  const section = parsed[key];
  return isRecord(section) ? section : {};
}

function readString(section: Record<string, unknown>, key: string, fallback: string): string {
  const value = section[key];
  return typeof value === "string" && value.length > 0 ? value : fallback;
}

function readArgs(section: Record<string, unknown>, key: string, fallback: string[]): string[] {
  const value = section[key];
  if (Array.isArray(value) && value.every((item): item is string => typeof item === "string")) {
    return [...value];
  }
  return fallback;
}

/**
 * Merge a parsed config object over the defaults, field by field.
 * Fields with the wrong type keep their default.
 */
export function mergeConfig(parsed: unknown): DevprepConfig {
  const defaults = getDefaultConfig();
  if (!isRecord(parsed)) return defaults;

  const pm = readSection(parsed, "packageManager");
  const envFile = readSection(parsed, "envFile");
  const logs = readSection(parsed, "logs");
  const checks = readSection(parsed, "checks");
  const timeout = parsed.commandTimeoutMs;

  const config: DevprepConfig = {
    packageManager: {
      command: readString(pm, "command", defaults.packageManager.command),
      installScriptUrl: readString(pm, "installScriptUrl", defaults.packageManager.installScriptUrl),
      installDir: readString(pm, "installDir", defaults.packageManager.installDir),
      syncArgs: readArgs(pm, "syncArgs", defaults.packageManager.syncArgs),
      runArgs: readArgs(pm, "runArgs", defaults.packageManager.runArgs),
    },
    envFile: {
      path: readString(envFile, "path", defaults.envFile.path),
      template: readString(envFile, "template", defaults.envFile.template),
    },
    logs: {
      dir: readString(logs, "dir", defaults.logs.dir),
      primary: readString(logs, "primary", defaults.logs.primary),
      secondary: readString(logs, "secondary", defaults.logs.secondary),
    },
    checks: {
      lint: readArgs(checks, "lint", defaults.checks.lint),
      format: readArgs(checks, "format", defaults.checks.format),
      importSort: readArgs(checks, "importSort", defaults.checks.importSort),
      test: readArgs(checks, "test", defaults.checks.test),
    },
  };

  if (typeof timeout === "number" && Number.isFinite(timeout) && timeout > 0) {
    config.commandTimeoutMs = timeout;
  }

  return config;
}

/**
 * Freeze the config and each of its sections.
 */
export function freezeConfig(config: DevprepConfig): Readonly<DevprepConfig> {
  Object.freeze(config.packageManager);
  Object.freeze(config.envFile);
  Object.freeze(config.logs);
  Object.freeze(config.checks);
  return Object.freeze(config);
}

/**
 * Load devprep.json from `cwd`, falling back to defaults when it is absent
 * or unreadable.
 */
export function loadConfig(cwd: string): LoadedConfig {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    return { config: freezeConfig(getDefaultConfig()), source: null };
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    const parsed: unknown = JSON.parse(content);
    if (!isRecord(parsed)) {
      return {
        config: freezeConfig(getDefaultConfig()),
        source: null,
        warning: `${CONFIG_FILE_NAME} must contain a JSON object; using defaults`,
      };
    }
    return { config: freezeConfig(mergeConfig(parsed)), source: configPath };
  } catch (err) {
    return {
      config: freezeConfig(getDefaultConfig()),
      source: null,
      warning: `Could not read ${CONFIG_FILE_NAME} (${getErrorMessage(err)}); using defaults`,
    };
  }
}
