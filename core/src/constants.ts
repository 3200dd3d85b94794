/**
 * Process-wide constants for devprep.
 *
 * Colors are plain ANSI sequences; the status reporter drops them when
 * color output is disabled.
 */

// Exit codes
export const ExitCode = {
  SUCCESS: 0,
  FAILURE: 1,
  CANCELLED: 130, // 128 + SIGINT
} as const;

// Terminal palette
export const COLORS = {
  green: "\x1b[0;32m",
  yellow: "\x1b[1;33m",
  red: "\x1b[0;31m",
  blue: "\x1b[0;34m",
  reset: "\x1b[0m",
} as const;

export type ColorName = Exclude<keyof typeof COLORS, "reset">;

// Status glyphs
export const GLYPHS = {
  success: "✓",
  error: "✗",
  warning: "⚠",
  info: "ℹ",
} as const;

export const HEADER_RULE = "=".repeat(49);
export const SECTION_RULE = "-".repeat(40);

/** Project-level settings file, looked up in the working directory. */
export const CONFIG_FILE_NAME = "devprep.json";

/** Hint shown when `setup` runs without `--follow`. */
export const FOLLOW_LOGS_HINT = "devprep setup -f";

/**
 * Marker files reserved for one-time cleanup and desktop-client setup.
 * Nothing reads or writes them yet.
 */
export const RESERVED_FLAG_FILES = {
  dockerCleaned: ".docker_cleaned",
  desktopConfigured: ".desktop_configured",
} as const;
