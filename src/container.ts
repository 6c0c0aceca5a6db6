/**
 * Backdrop containers.
 *
 * A Container runs one backdrop: it obtains the image (pull a tag or build
 * an inline image), creates the container and either leaves it running in
 * the background or attaches to it until it exits.
 *
 * Dependency direction:
 *   This module imports from: build/image.ts, docker/*, config.ts, errors.ts, logger.ts, platform/terminal.ts
 *   It should NOT import from: cli, commands/
 */

import { randomBytes } from "node:crypto";
import type { Readable, Writable } from "node:stream";

import { Image, type ImageDependencies } from "./build/image.js";
import type { BackdropConfig, ImageConfig } from "./config.js";
import type { RegistryCredentials } from "./docker/auth.js";
import type { BuildEngine, ContainerEngine, PullEngine } from "./docker/engine.js";
import { pullImage } from "./docker/pull.js";
import { log } from "./logger.js";
import { isTerminal } from "./platform/terminal.js";

export interface ContainerIO {
  stdin: Readable & { isTTY?: boolean; setRawMode?: (mode: boolean) => unknown };
  stdout: Writable & { isTTY?: boolean; columns?: number; rows?: number };
  stderr: Writable & { isTTY?: boolean; columns?: number };
}

export interface ContainerDependencies {
  engine: BuildEngine & PullEngine & ContainerEngine;
  loadImageConfig: (name: string) => ImageConfig;
  credentials: RegistryCredentials;
  io?: ContainerIO;
  /** Session factory for inline image builds. */
  createSession?: ImageDependencies["createSession"];
  /** Cancels image resolution (pull or build). */
  signal?: AbortSignal;
}

export interface ContainerOptions {
  /** Start in the background instead of attaching. */
  daemon?: boolean;
  /** Rebuild the backdrop's image (and its dependencies). */
  forceRebuild?: boolean;
  noCache?: boolean;
  forcePull?: boolean;
  /** Replaces the backdrop's command when non-empty. */
  command?: string[];
}

function defaultIO(): ContainerIO {
  return { stdin: process.stdin, stdout: process.stdout, stderr: process.stderr };
}

/** Container name: the backdrop name for daemons, otherwise configured or generated. */
export function containerName(config: BackdropConfig, daemon: boolean): string {
  if (daemon) {
    return config.name;
  }
  return config.containerName || `${config.name}-${randomBytes(4).toString("hex")}`;
}

export class Container {
  readonly name: string;
  private readonly io: ContainerIO;

  constructor(
    private readonly config: BackdropConfig,
    private readonly deps: ContainerDependencies,
    private readonly options: ContainerOptions = {}
  ) {
    this.name = containerName(config, options.daemon ?? false);
    this.io = deps.io ?? defaultIO();
  }

  /** Image to create the container from: a pulled tag or a built image id. */
  async getImage(): Promise<string> {
    const { image } = this.config;
    if (typeof image === "string") {
      return pullImage(this.deps.engine, image, {
        force: this.config.pull || (this.options.forcePull ?? false),
        credentials: this.deps.credentials,
      });
    }

    const config: ImageConfig = {
      ...image,
      forceRebuild: image.forceRebuild || (this.options.forceRebuild ?? false),
      noCache: image.noCache || (this.options.noCache ?? false),
      forcePull: image.forcePull || (this.options.forcePull ?? false),
    };
    const deps: ImageDependencies = {
      engine: this.deps.engine,
      loadImageConfig: this.deps.loadImageConfig,
      credentials: this.deps.credentials,
      progressOutput: this.io.stderr,
      createSession: this.deps.createSession,
      signal: this.deps.signal,
    };
    return new Image(config, deps).get();
  }

  /**
   * Run the backdrop.
   *
   * @param resolvedImage - Image from an earlier getImage(); resolved here when omitted.
   * @returns The container's exit code (0 for daemons once started).
   */
  async run(resolvedImage?: string): Promise<number> {
    const image = resolvedImage ?? (await this.getImage());
    this.deps.signal?.throwIfAborted();
    const daemon = this.options.daemon ?? false;
    const tty = !daemon && isTerminal(this.io.stdin) && isTerminal(this.io.stdout);
    const command = this.options.command && this.options.command.length > 0 ? this.options.command : this.config.command;

    const id = await this.deps.engine.createContainer({
      name: this.name,
      image,
      entrypoint: this.config.entrypoint,
      command,
      environment: this.config.environment,
      volumes: this.config.volumes,
      workingDir: this.config.workingDir,
      user: this.config.user,
      tty,
    });

    if (daemon) {
      await this.deps.engine.startContainer(id);
      log.success(`Started ${this.name}`);
      return 0;
    }

    try {
      return await this.attachAndWait(id, tty);
    } finally {
      await this.deps.engine.removeContainer(id, true);
    }
  }

  private async attachAndWait(id: string, tty: boolean): Promise<number> {
    const { engine } = this.deps;
    const { stdin, stdout, stderr } = this.io;

    const detach = await engine.attachContainer(id, { stdin, stdout, stderr, tty });

    const resize = (): void => {
      if (stdout.rows && stdout.columns) {
        engine.resizeContainer(id, stdout.rows, stdout.columns).catch((error: unknown) => {
          log.debug(`Resize failed: ${String(error)}`);
        });
      }
    };

    try {
      await engine.startContainer(id);
      if (tty) {
        stdin.setRawMode?.(true);
        resize();
        stdout.on("resize", resize);
      }
      return await engine.waitContainer(id);
    } finally {
      if (tty) {
        stdout.off("resize", resize);
        stdin.setRawMode?.(false);
      }
      detach();
    }
  }

  /** Stop and remove the container. */
  async stop(): Promise<void> {
    await this.deps.engine.stopContainer(this.name);
    await this.deps.engine.removeContainer(this.name);
    log.success(`Stopped ${this.name}`);
  }

  /** Force-remove the container. */
  async remove(): Promise<void> {
    await this.deps.engine.removeContainer(this.name, true);
    log.success(`Removed ${this.name}`);
  }
}
