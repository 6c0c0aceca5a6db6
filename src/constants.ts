/**
 * Constants module for berth.
 *
 * Shared names, wire tags and defaults are defined here (SSOT).
 */

import { readFileSync } from "node:fs";
import { homedir, tmpdir } from "node:os";
import { join } from "node:path";

// === Version (SSOT: package.json) ===
function readPackageVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
    return raw.version;
  }
  return "0.0.0";
}
export const VERSION: string = readPackageVersion();

// === Naming (SSOT) ===
const BERTH_PREFIX = "berth";

// === Docker Engine API ===
export const DEFAULT_API_VERSION = "1.39";
export const DEFAULT_DOCKER_SOCKET = "/var/run/docker.sock";
export const DEFAULT_DOCKERFILE = "Dockerfile";

// === Build status stream tags ===
// Aux payload ids emitted by the engine on the build response stream.
export const AUX_IMAGE_ID = "moby.image.id";
export const AUX_BUILDKIT_TRACE = "moby.buildkit.trace";

// === BuildKit session ===
export const SESSION_PROTO = "h2c";
export const SESSION_HEADER = {
  UUID: "X-Docker-Expose-Session-Uuid",
  NAME: "X-Docker-Expose-Session-Name",
  SHARED_KEY: "X-Docker-Expose-Session-Sharedkey",
  GRPC_METHOD: "X-Docker-Expose-Session-Grpc-Method",
} as const;
export const GRPC_HEALTH_CHECK = "/grpc.health.v1.Health/Check";

// === Progress display ===
export const PROGRESS_REFRESH_INTERVAL = 100; // Milliseconds between repaints
export const PROGRESS_MAX_LOG_LINES = 6; // Tail of logs shown per running vertex

// === Config file locations ===
export const PROJECT_CONFIG_FILES = ["berth.yaml", "berth.yml", ".berth.yaml"];

/** Get the global config file path. */
export function getGlobalConfigPath(): string {
  return join(homedir(), `.${BERTH_PREFIX}`, "config.yaml");
}

/** Get the Docker CLI config file (credentials). */
export function getDockerConfigPath(): string {
  const dir = process.env.DOCKER_CONFIG ?? join(homedir(), ".docker");
  return join(dir, "config.json");
}

// === Temp Paths (SSOT) ===
/** Get base temp directory for berth. */
export function getBerthTempDir(): string {
  return join(tmpdir(), BERTH_PREFIX);
}
