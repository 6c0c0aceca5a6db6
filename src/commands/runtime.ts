/**
 * Shared setup for CLI commands: configuration, engine and credentials.
 */

import { loadBackdropConfig, loadImageConfig, type BackdropConfig, type BerthConfig, type ImageConfig } from "../config.js";
import { loadBerthConfig } from "../config-file.js";
import { loadCredentials, type RegistryCredentials } from "../docker/auth.js";
import { connectionFromEnv } from "../docker/client.js";
import { DockerEngine } from "../docker/engine.js";

export interface GlobalOptions {
  config?: string;
  quiet?: boolean;
  debug?: boolean;
}

export interface Runtime {
  config: BerthConfig;
  engine: DockerEngine;
  credentials: RegistryCredentials;
  image: (name: string) => ImageConfig;
  backdrop: (name: string) => BackdropConfig;
}

/** Load everything a command needs. */
export async function createRuntime(options: GlobalOptions, cwd: string = process.cwd()): Promise<Runtime> {
  const config = loadBerthConfig(cwd, { configFile: options.config });
  return {
    config,
    engine: new DockerEngine(connectionFromEnv()),
    credentials: await loadCredentials(),
    image: (name) => loadImageConfig(config, name),
    backdrop: (name) => loadBackdropConfig(config, name),
  };
}

/**
 * Run `task` with a signal that aborts on Ctrl+C.
 *
 * The handler is removed afterwards so an attached container gets
 * the terminal's interrupts again.
 */
export async function withInterrupt<T>(task: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort(new Error("interrupted"));
  process.once("SIGINT", onInterrupt);
  try {
    return await task(controller.signal);
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}
