/**
 * Input validation utilities for berth.
 *
 * Centralized validation functions for environment variables and other inputs.
 *
 * Dependency direction:
 *   This module imports from: errors.ts
 *   It should NOT import from: cli, build/, docker/
 */

import { ValidationError } from "./errors.js";

/** POSIX environment variable key pattern: [A-Za-z_][A-Za-z0-9_]* */
const ENV_VAR_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Validate an environment variable key.
 *
 * @param key - Environment variable key to validate.
 * @returns True if valid.
 */
export function isValidEnvVarKey(key: string): boolean {
  return ENV_VAR_KEY_PATTERN.test(key);
}

/**
 * Validate environment variable key and throw if invalid.
 *
 * @throws ValidationError if key is invalid.
 */
export function validateEnvVarKey(key: string): void {
  if (!isValidEnvVarKey(key)) {
    throw new ValidationError(
      `Invalid env var key '${key}'. Must be alphanumeric/underscore, starting with letter or underscore.`
    );
  }
}

/**
 * Remove newlines and null bytes from an environment value.
 */
export function sanitizeEnvValue(value: string): string {
  // eslint-disable-next-line no-control-regex
  return value.replace(/[\r\n\x00]/g, "");
}

/**
 * Parse and validate environment variable, throwing on invalid format.
 *
 * @param envVar - String in KEY=VALUE format.
 * @throws ValidationError if format is invalid.
 */
export function parseEnvVarStrict(envVar: string): { key: string; value: string } {
  const eqIdx = envVar.indexOf("=");
  if (eqIdx <= 0) {
    throw new ValidationError(`Invalid env format '${envVar}'. Expected KEY=VALUE`);
  }

  const key = envVar.slice(0, eqIdx);
  validateEnvVarKey(key);

  return { key, value: sanitizeEnvValue(envVar.slice(eqIdx + 1)) };
}

/**
 * Validate a bind mount specification (host:container[:mode]).
 *
 * @throws ValidationError if the format is invalid.
 */
export function validateVolume(spec: string): string {
  const parts = spec.split(":");
  const [host, container, mode] = parts;
  if (parts.length < 2 || parts.length > 3 || !host || !container) {
    throw new ValidationError(`Invalid volume '${spec}'. Expected host:container[:mode]`);
  }
  if (mode !== undefined && mode !== "ro" && mode !== "rw") {
    throw new ValidationError(`Invalid volume mode '${mode}' in '${spec}'. Expected ro or rw`);
  }
  return spec;
}
