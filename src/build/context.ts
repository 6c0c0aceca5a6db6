/**
 * Build context preparation.
 *
 * A build context is either a remote reference the engine fetches itself
 * (git or http URL) or a local directory streamed as a tar archive. Inline
 * Dockerfile steps are written to a temporary file and added to the
 * archive under a generated name.
 */

import { randomBytes } from "node:crypto";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";

import tar from "tar-fs";

import { DEFAULT_DOCKERFILE, getBerthTempDir } from "../constants.js";
import { ConfigError } from "../errors.js";
import { log } from "../logger.js";
import type { ImageConfig } from "../config.js";

/** Prepared build context. Call cleanup() on every exit path. */
export interface ContextData {
  /** Remote context reference (engine fetches it); undefined for local contexts. */
  remote?: string;
  /** Dockerfile path inside the context. */
  dockerfileName: string;
  /** Fresh tar stream of a local context; undefined for remote contexts. */
  tarball?: () => NodeJS.ReadableStream;
  /** Remove temporary files. Idempotent. */
  cleanup: () => void;
}

const REMOTE_PREFIXES = ["http://", "https://", "git://", "git@", "github.com/"];

/** True if the context is fetched by the engine rather than sent by us. */
export function isRemoteContext(context: string): boolean {
  return REMOTE_PREFIXES.some((prefix) => context.startsWith(prefix));
}

/** Render inline steps as a Dockerfile. */
export function renderDockerfile(steps: readonly string[]): string {
  return `${steps.join("\n")}\n`;
}

/**
 * Prepare the context for an image build.
 *
 * @throws ConfigError if the context is unusable.
 */
export function prepareContext(config: ImageConfig): ContextData {
  const context = config.context ?? ".";
  const steps = config.steps ?? [];

  if (isRemoteContext(context)) {
    if (steps.length > 0) {
      throw new ConfigError(`Image '${config.name}': inline steps cannot be used with remote context ${context}`);
    }
    return {
      remote: context,
      dockerfileName: config.dockerfile ?? DEFAULT_DOCKERFILE,
      cleanup: () => {},
    };
  }

  const contextDir = resolve(context);
  if (!existsSync(contextDir) || !statSync(contextDir).isDirectory()) {
    throw new ConfigError(`Image '${config.name}': build context ${contextDir} is not a directory`);
  }

  if (steps.length === 0) {
    return {
      dockerfileName: config.dockerfile ?? DEFAULT_DOCKERFILE,
      tarball: () => tar.pack(contextDir),
      cleanup: () => {},
    };
  }

  mkdirSync(getBerthTempDir(), { recursive: true });
  const tempDir = mkdtempSync(join(getBerthTempDir(), "build-"));
  const dockerfileName = `${DEFAULT_DOCKERFILE}.berth-${randomBytes(4).toString("hex")}`;
  const dockerfilePath = join(tempDir, DEFAULT_DOCKERFILE);
  try {
    writeFileSync(dockerfilePath, renderDockerfile(steps), { encoding: "utf-8" });
  } catch (error: unknown) {
    rmSync(tempDir, { recursive: true, force: true });
    throw error;
  }

  let cleaned = false;
  return {
    dockerfileName,
    tarball: () =>
      tar.pack(contextDir, {
        finalize: false,
        finish: (pack) => {
          pack.entry({ name: dockerfileName }, readFileSync(dockerfilePath));
          pack.finalize();
        },
      }),
    cleanup: () => {
      if (cleaned) {return;}
      cleaned = true;
      try {
        rmSync(tempDir, { recursive: true, force: true });
      } catch (e) {
        log.debug(`Cleanup error: ${String(e)}`);
      }
    },
  };
}
