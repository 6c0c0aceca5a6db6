/**
 * Configuration model for berth.
 *
 * Images describe how to build (or which tag to use); backdrops describe
 * the containers that commands run in.
 *
 * Dependency direction:
 *   This module imports from: errors.ts
 *   It should NOT import from: cli, build/, docker/
 */

import { ConfigError } from "./errors.js";

/** How to obtain one image. */
export interface ImageConfig {
  /** Entry name in the config file (used for dependencies and messages). */
  name: string;
  /** Image tag; when empty the image is always built. */
  imageName?: string;
  /** Local directory (absolute) or remote URL. */
  context?: string;
  /** Dockerfile path inside the context. */
  dockerfile?: string;
  /** Inline Dockerfile lines. */
  steps?: string[];
  /** Build arguments; undefined values are taken from the environment. */
  args: Record<string, string | undefined>;
  noCache: boolean;
  forcePull: boolean;
  forceRebuild: boolean;
  /** Images that must exist first, in build order. */
  dependencies: string[];
}

/** A container to run commands in. */
export interface BackdropConfig {
  name: string;
  /** Image tag to pull, or an image to build. */
  image: string | ImageConfig;
  containerName?: string;
  entrypoint?: string[];
  command?: string[];
  /** KEY=VALUE entries. */
  environment: string[];
  /** host:container[:mode] bind mounts. */
  volumes: string[];
  workingDir?: string;
  user?: string;
  /** Always pull a tagged image, even if present. */
  pull: boolean;
}

export interface BerthConfig {
  images: Record<string, ImageConfig>;
  backdrops: Record<string, BackdropConfig>;
}

/** Empty configuration. */
export function emptyConfig(): BerthConfig {
  return { images: {}, backdrops: {} };
}

/** Default values for an image entry. */
export function createImageConfig(name: string, overrides: Partial<ImageConfig> = {}): ImageConfig {
  return {
    name,
    args: {},
    noCache: false,
    forcePull: false,
    forceRebuild: false,
    dependencies: [],
    ...overrides,
  };
}

/**
 * Look up an image entry by name.
 *
 * @throws ConfigError if there is no such image.
 */
export function loadImageConfig(config: BerthConfig, name: string): ImageConfig {
  const image = config.images[name];
  if (!image) {
    throw new ConfigError(`No image named '${name}' in configuration`);
  }
  return { ...image, args: { ...image.args }, dependencies: [...image.dependencies] };
}

/**
 * Look up a backdrop entry by name.
 *
 * @throws ConfigError if there is no such backdrop.
 */
export function loadBackdropConfig(config: BerthConfig, name: string): BackdropConfig {
  const backdrop = config.backdrops[name];
  if (!backdrop) {
    const known = Object.keys(config.backdrops);
    const hint = known.length > 0 ? ` (known: ${known.join(", ")})` : "";
    throw new ConfigError(`No backdrop named '${name}' in configuration${hint}`);
  }
  return backdrop;
}
