/**
 * Image build orchestration.
 *
 * An Image resolves a configured image to an id: it reuses a tagged image
 * when one exists, and otherwise builds it (dependencies first) through
 * the engine with BuildKit. A build runs three cooperating tasks:
 *
 *   1. the session tunnel the engine calls back into,
 *   2. the progress renderer (rebuilds on a terminal only),
 *   3. submit-and-decode, which waits for the tunnel, submits the build
 *      and reads the status stream to its end.
 *
 * The first task to fail cancels the others and its error is the result.
 *
 * Dependency direction:
 *   This module imports from: build/*, docker/engine.ts, docker/auth.ts, utils/*, config.ts, errors.ts, logger.ts
 *   It should NOT import from: cli, commands/
 */

import { randomBytes } from "node:crypto";

import type { ImageConfig } from "../config.js";
import type { RegistryCredentials } from "../docker/auth.js";
import type { BuildEngine, BuildRequest } from "../docker/engine.js";
import { DependencyError, MissingResultError } from "../errors.js";
import { log } from "../logger.js";
import { isTerminal } from "../platform/terminal.js";
import { Channel } from "../utils/channel.js";
import { TaskGroup } from "../utils/task-group.js";
import { prepareContext, type ContextData } from "./context.js";
import { decodeBuildResult } from "./messages.js";
import { displaySolveStatus, type ProgressOutput } from "./progress.js";
import { Session } from "./session.js";
import type { SolveEvent } from "./trace.js";

export type SolveStatusDisplay = (
  events: Channel<SolveEvent>,
  out: ProgressOutput,
  signal: AbortSignal
) => Promise<void>;

/** Collaborators of an image build. Everything but the engine has a default. */
export interface ImageDependencies {
  engine: BuildEngine;
  /** Looks up dependency images by name. */
  loadImageConfig: (name: string) => ImageConfig;
  credentials?: RegistryCredentials;
  /** Where the progress display paints; defaults to stderr. */
  progressOutput?: ProgressOutput & { isTTY?: boolean };
  display?: SolveStatusDisplay;
  createSession?: (config: ImageConfig) => Session;
  /** Process environment for build arguments without a value. */
  env?: NodeJS.ProcessEnv;
  /** Cancels a running build. */
  signal?: AbortSignal;
}

/**
 * Final build arguments: arguments without a value take it from the
 * environment, and are dropped if the environment has none.
 */
export function resolveBuildArgs(
  args: Record<string, string | undefined>,
  env: NodeJS.ProcessEnv = process.env
): Record<string, string> {
  const resolved: Record<string, string> = {};
  for (const [key, value] of Object.entries(args)) {
    const final = value ?? env[key];
    if (final !== undefined) {
      resolved[key] = final;
    }
  }
  return resolved;
}

/** Random 64-hex-digit build id. */
function randomBuildId(): string {
  return randomBytes(32).toString("hex");
}

export class Image {
  /**
   * @param config - Image to resolve.
   * @param deps - Engine and other collaborators.
   * @param chain - Images whose build is waiting on this one (cycle detection).
   */
  constructor(
    private readonly config: ImageConfig,
    private readonly deps: ImageDependencies,
    private readonly chain: readonly string[] = []
  ) {}

  /**
   * Id of the image, building it if needed.
   *
   * An untagged image, or one marked for rebuild, is always built. A failed
   * lookup is treated as "not present".
   */
  async get(): Promise<string> {
    const { imageName, forceRebuild } = this.config;
    if (!imageName || forceRebuild) {
      return this.build();
    }

    try {
      const [existing] = await this.deps.engine.listImages(imageName);
      if (existing) {
        log.debug(`Using existing image ${imageName} (${existing.id})`);
        return existing.id;
      }
    } catch (error: unknown) {
      log.debug(`Image lookup for ${imageName} failed: ${error instanceof Error ? error.message : String(error)}`);
    }
    return this.build();
  }

  /**
   * Build the image and return the id the engine reports.
   *
   * @throws The first error of the build: a dependency's own error,
   *   ConfigError, SessionError, EngineError, DecodeError, or
   *   MissingResultError when the engine reported no id.
   */
  async build(): Promise<string> {
    await this.buildDependencies();

    const context = prepareContext(this.config);
    try {
      return await this.runBuild(context);
    } finally {
      context.cleanup();
    }
  }

  private async buildDependencies(): Promise<void> {
    const chain = [...this.chain, this.config.name];
    for (const name of this.config.dependencies) {
      if (chain.includes(name)) {
        throw new DependencyError(`Image dependency cycle: ${[...chain, name].join(" -> ")}`);
      }
      const config = this.deps.loadImageConfig(name);
      if (this.config.forceRebuild) {
        config.forceRebuild = true;
      }
      await new Image(config, this.deps, chain).get();
    }
  }

  private async runBuild(context: ContextData): Promise<string> {
    const { engine } = this.deps;
    const session = this.deps.createSession?.(this.config) ?? new Session({ sharedKey: this.config.context ?? "" });
    const out = this.deps.progressOutput ?? process.stderr;
    const display = this.deps.display ?? displaySolveStatus;
    const trace = this.config.forceRebuild && isTerminal(out) ? new Channel<SolveEvent>() : undefined;

    const group = new TaskGroup(this.deps.signal);

    group.go((signal) => session.run((proto, meta, dialSignal) => engine.dialSession(proto, meta, dialSignal), signal));

    if (trace) {
      group.go((signal) => display(trace, out, signal));
    }

    const result = group.go(async (signal) => {
      try {
        await session.whenReady(signal);
        const stream = await engine.imageBuild(this.buildRequest(context, session), signal);
        return await decodeBuildResult(stream, { trace });
      } finally {
        trace?.close();
        session.close();
      }
    });

    await group.wait();

    const imageId = result.value;
    if (!imageId) {
      throw new MissingResultError();
    }
    log.debug(`Built ${this.config.imageName ?? this.config.name}: ${imageId}`);
    return imageId;
  }

  private buildRequest(context: ContextData, session: Session): BuildRequest {
    return {
      tags: this.config.imageName ? [this.config.imageName] : [],
      buildArgs: resolveBuildArgs(this.config.args, this.deps.env),
      noCache: this.config.noCache,
      forcePull: this.config.forcePull,
      dockerfile: context.dockerfileName,
      context: context.tarball?.(),
      remote: context.remote,
      sessionId: session.id,
      buildId: randomBuildId(),
      credentials: this.deps.credentials ?? {},
    };
  }
}
