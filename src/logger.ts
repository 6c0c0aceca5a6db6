/**
 * Unified logging abstraction for berth.
 *
 * Centralizes all console output with consistent styling and log levels.
 * Uses picocolors for terminal styling.
 *
 * IMPORTANT: All berth output MUST go through this module.
 * Never use console.log/console.error directly in other modules.
 */

import pc from "picocolors";

/** Log levels in order of verbosity (debug is most verbose). */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

/** Logger configuration. */
interface LoggerConfig {
  level: LogLevel;
  /** If true, suppress ALL output including errors */
  quiet: boolean;
}

/** Global logger configuration. */
const config: LoggerConfig = {
  level: LogLevel.INFO,
  quiet: false,
};

/**
 * Check if output is allowed at current level.
 */
function canOutput(level: LogLevel): boolean {
  return !config.quiet && config.level <= level;
}

/**
 * Enable quiet mode: suppress ALL output.
 * Only exit codes communicate success/failure.
 */
export function enableQuietMode(): void {
  config.quiet = true;
  config.level = LogLevel.SILENT;
}

/**
 * Set the minimum log level. Messages below this level are suppressed.
 */
export function setLogLevel(level: LogLevel): void {
  config.level = level;
}

/**
 * Logger object with level-aware methods.
 *
 * debug, warn and error write to stderr; the rest to stdout. Build progress
 * does not go through here: the renderer owns its stream.
 */
export const log = {
  /**
   * Debug-level message (shown only when level <= DEBUG).
   * Styled: dim gray, stderr
   */
  debug(message: string): void {
    if (canOutput(LogLevel.DEBUG)) {
      console.error(pc.dim(message));
    }
  },

  /**
   * Info-level message (default level).
   */
  info(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(message);
    }
  },

  /**
   * Warning-level message.
   * Styled: yellow, outputs to stderr
   */
  warn(message: string): void {
    if (canOutput(LogLevel.WARN)) {
      console.warn(pc.yellow(message));
    }
  },

  /**
   * Error-level message.
   * Styled: red, outputs to stderr
   */
  error(message: string): void {
    if (canOutput(LogLevel.ERROR)) {
      console.error(pc.red(message));
    }
  },

  /**
   * Success message (info level).
   * Styled: green
   */
  success(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.green(message));
    }
  },

  /**
   * Dim/subtle message (info level).
   */
  dim(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.dim(message));
    }
  },
};

/**
 * Styled string builders (for complex compositions).
 * These return styled strings without printing.
 *
 * Usage:
 *   out.write(`${style.blue("DONE")} ${style.dim("0.4s")}`)
 */
export const style = {
  dim: (text: string) => pc.dim(text),
  bold: (text: string) => pc.bold(text),
  red: (text: string) => pc.red(text),
  blue: (text: string) => pc.blue(text),
  cyan: (text: string) => pc.cyan(text),
};
