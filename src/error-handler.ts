/**
 * Error reporting for the berth CLI.
 *
 * Turns failures and container exit codes into user-facing messages.
 */

import {
  BerthError,
  ConfigError,
  DockerNotRunningError,
  EngineError,
  extractErrorDetails,
  ValidationError,
} from "./errors.js";
import { log } from "./logger.js";

/** Known container exit codes with their meanings. */
export interface ExitCodeInfo {
  code: number;
  description: string;
  suggestion?: string;
  severity: "info" | "warn" | "error";
}

const EXIT_CODES: Record<number, ExitCodeInfo> = {
  0: { code: 0, description: "Container exited successfully", severity: "info" },
  126: {
    code: 126,
    description: "Command not executable",
    suggestion: "Check file permissions inside the image",
    severity: "error",
  },
  127: {
    code: 127,
    description: "Command not found",
    suggestion: "Verify the command exists in the image's PATH",
    severity: "error",
  },
  130: { code: 130, description: "Interrupted by Ctrl+C", severity: "info" },
  137: { code: 137, description: "Container was killed (OOM or manual stop)", severity: "warn" },
  139: { code: 139, description: "Container crashed (segmentation fault)", severity: "error" },
  143: { code: 143, description: "Container terminated by signal", severity: "info" },
};

/**
 * Get information about an exit code.
 */
export function getExitCodeInfo(code: number): ExitCodeInfo {
  return EXIT_CODES[code] ?? { code, description: `Container exited with code ${code}`, severity: "warn" };
}

/**
 * Check if an exit code indicates user-initiated termination (not an error).
 */
export function isUserTermination(code: number): boolean {
  return code === 130 || code === 143; // SIGINT (Ctrl+C) or SIGTERM
}

/**
 * Log a container exit code with appropriate styling and suggestions.
 */
export function logExitCode(code: number, context?: string): void {
  if (code === 0) {
    return;
  }
  const info = getExitCodeInfo(code);

  if (isUserTermination(code)) {
    log.dim(info.description);
    return;
  }

  const contextStr = context ? ` (${context})` : "";
  switch (info.severity) {
    case "error":
      log.error(`${info.description}${contextStr}`);
      break;
    case "warn":
      log.warn(`${info.description}${contextStr}`);
      break;
    default:
      log.dim(`${info.description}${contextStr}`);
  }

  if (info.suggestion) {
    log.dim(info.suggestion);
  }
}

/** One-line message for a failed command. */
export function formatCommandError(error: unknown): string {
  const details = extractErrorDetails(error);
  if (error instanceof EngineError) {
    return `Build failed: ${details}`;
  }
  if (error instanceof ConfigError || error instanceof ValidationError) {
    return `Configuration error: ${details}`;
  }
  if (error instanceof DockerNotRunningError) {
    return `${details}\nCheck DOCKER_HOST or start Docker.`;
  }
  return details;
}

/**
 * Report a failed command.
 *
 * @returns Exit code for the process.
 */
export function reportCommandError(error: unknown): number {
  log.error(formatCommandError(error));
  if (error instanceof Error && error.stack && !(error instanceof BerthError)) {
    log.debug(error.stack);
  }
  return 1;
}
