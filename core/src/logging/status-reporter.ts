/**
 * Status Reporter
 *
 * One-line, glyph-prefixed status output for pipeline runs. Everything is
 * routed through a Logger so the caller decides where it lands (stderr in
 * the CLI, an in-memory buffer in tests).
 */

import {
  COLORS,
  GLYPHS,
  HEADER_RULE,
  SECTION_RULE,
  type ColorName,
} from "../constants.js";
import type { Logger } from "./logger.js";

export type StatusLevel = "success" | "error" | "warning" | "info";

export interface StatusReporter {
  success(message: string): void;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  /** Unprefixed line, e.g. an indented command hint. */
  plain(message: string): void;
  header(title: string): void;
  section(title: string): void;
  /** Closing summary framed by rules. */
  banner(passed: boolean, message: string): void;
}

export interface StatusReporterOptions {
  logger: Logger;
  color: boolean;
}

const LEVEL_STYLE: Record<StatusLevel, { glyph: string; color: ColorName | null }> = {
  success: { glyph: GLYPHS.success, color: "green" },
  error: { glyph: GLYPHS.error, color: "red" },
  warning: { glyph: GLYPHS.warning, color: "yellow" },
  info: { glyph: GLYPHS.info, color: null },
};

export function paint(text: string, color: ColorName | null, enabled: boolean): string {
  if (!enabled || color === null) return text;
  return `${COLORS[color]}${text}${COLORS.reset}`;
}

/**
 * Format one status line: colored glyph, a space, then the message.
 */
export function formatStatusLine(level: StatusLevel, message: string, color: boolean): string {
  const style = LEVEL_STYLE[level];
  return `${paint(style.glyph, style.color, color)} ${message}`;
}

/**
 * Decide whether a stream should receive ANSI colors.
 *
 * NO_COLOR (any non-empty value) always wins.
 */
export function shouldUseColor(
  stream: { isTTY?: boolean },
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  if (env.NO_COLOR) return false;
  return stream.isTTY === true;
}

export function createStatusReporter({ logger, color }: StatusReporterOptions): StatusReporter {
  return {
    success: (message) => logger.log(formatStatusLine("success", message, color)),
    error: (message) => logger.error(formatStatusLine("error", message, color)),
    warn: (message) => logger.warn(formatStatusLine("warning", message, color)),
    info: (message) => logger.log(formatStatusLine("info", message, color)),
    plain: (message) => logger.log(message),
    header: (title) => {
      logger.log("");
      logger.log(paint(title, "blue", color));
      logger.log(HEADER_RULE);
    },
    section: (title) => {
      logger.log("");
      logger.log(paint(title, "blue", color));
      logger.log(SECTION_RULE);
    },
    banner: (passed, message) => {
      logger.log("");
      logger.log(HEADER_RULE);
      if (passed) {
        logger.log(formatStatusLine("success", message, color));
      } else {
        logger.error(formatStatusLine("error", message, color));
      }
      logger.log(HEADER_RULE);
    },
  };
}
