/**
 * Unified exception hierarchy for berth.
 *
 * All custom exceptions inherit from BerthError for consistent error handling.
 * The CLI catches these and converts them to user-friendly messages.
 *
 * Dependency direction:
 *   This module has NO internal dependencies (leaf module).
 *   It may be imported by: all other berth modules.
 *   It should NOT import from any other berth modules.
 */

/**
 * Base exception for all berth errors.
 *
 * All berth-specific exceptions should inherit from this class.
 */
export class BerthError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BerthError";
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Configuration-related errors.
 *
 * Examples:
 *   - Unknown image or backdrop name
 *   - Wrong value type for a key
 *   - Config file parse errors
 */
export class ConfigError extends BerthError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Input validation errors (CLI arguments, env var syntax). */
export class ValidationError extends BerthError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Docker operation errors.
 *
 * Base class for all Docker-related exceptions.
 */
export class DockerError extends BerthError {
  constructor(message: string) {
    super(message);
    this.name = "DockerError";
  }
}

/** Raised when the Docker daemon cannot be reached. */
export class DockerNotRunningError extends DockerError {
  constructor(message = "Docker daemon is not running") {
    super(message);
    this.name = "DockerNotRunningError";
  }
}

/** Raised when an image pull reports an error. */
export class ImagePullError extends DockerError {
  constructor(message: string) {
    super(message);
    this.name = "ImagePullError";
  }
}

/** Raised when container operations fail. */
export class ContainerError extends DockerError {
  constructor(message: string) {
    super(message);
    this.name = "ContainerError";
  }
}

/** The build status stream could not be decoded (invalid or truncated JSON). */
export class DecodeError extends BerthError {
  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

/**
 * Fatal error reported by the engine inside the status stream.
 *
 * The message is the engine's, unchanged.
 */
export class EngineError extends BerthError {
  readonly code: number | undefined;

  constructor(message: string, code?: number) {
    super(message);
    this.name = "EngineError";
    this.code = code;
  }
}

/** An aux payload could not be parsed. Never leaves the decoder. */
export class AuxParseError extends BerthError {
  constructor(message: string) {
    super(message);
    this.name = "AuxParseError";
  }
}

/** The build finished cleanly but never reported an image id. */
export class MissingResultError extends BerthError {
  constructor(message = "build finished without reporting an image id") {
    super(message);
    this.name = "MissingResultError";
  }
}

/** The build session tunnel could not be opened or served. */
export class SessionError extends BerthError {
  constructor(message: string) {
    super(message);
    this.name = "SessionError";
  }
}

/** The image dependency graph is unusable (e.g. a cycle). */
export class DependencyError extends BerthError {
  constructor(message: string) {
    super(message);
    this.name = "DependencyError";
  }
}

/**
 * Extract error details from an unknown error for user-friendly messages.
 *
 * Handles execa-style errors with stderr/shortMessage, plus standard Error objects.
 * Truncates output to maxLength to avoid overwhelming log output.
 *
 * @param error - Unknown error to extract details from.
 * @param maxLength - Maximum length of returned string (default: 1000).
 */
export function extractErrorDetails(error: unknown, maxLength = 1000): string {
  if (!(error instanceof Error)) {
    return String(error).slice(0, maxLength);
  }

  if ("stderr" in error && typeof error.stderr === "string" && error.stderr) {
    return error.stderr.slice(0, maxLength);
  }
  if ("shortMessage" in error && typeof error.shortMessage === "string" && error.shortMessage) {
    return error.shortMessage.slice(0, maxLength);
  }
  return error.message.slice(0, maxLength);
}
