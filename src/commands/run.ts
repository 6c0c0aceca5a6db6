/**
 * Backdrop commands: run, stop and remove.
 */

import { Container } from "../container.js";
import { logExitCode } from "../error-handler.js";
import { createRuntime, withInterrupt, type GlobalOptions, type Runtime } from "./runtime.js";

export interface RunCommandOptions {
  rebuild?: boolean;
  cache?: boolean;
  pull?: boolean;
  daemon?: boolean;
}

function containerFor(
  runtime: Runtime,
  backdrop: string,
  options: RunCommandOptions & { command?: string[] },
  signal?: AbortSignal
): Container {
  return new Container(
    runtime.backdrop(backdrop),
    { engine: runtime.engine, loadImageConfig: runtime.image, credentials: runtime.credentials, signal },
    {
      daemon: options.daemon,
      forceRebuild: options.rebuild,
      noCache: options.cache === false,
      forcePull: options.pull,
      command: options.command,
    }
  );
}

/**
 * Run a command in a backdrop.
 *
 * Ctrl+C cancels while the image is resolved; once the container is
 * attached, interrupts belong to it.
 *
 * @returns The container's exit code.
 */
export async function runCommand(
  backdrop: string,
  command: string[],
  options: RunCommandOptions,
  globals: GlobalOptions
): Promise<number> {
  const runtime = await createRuntime(globals);
  const { container, image } = await withInterrupt(async (signal) => {
    const target = containerFor(runtime, backdrop, { ...options, command }, signal);
    return { container: target, image: await target.getImage() };
  });
  const exitCode = await container.run(image);
  logExitCode(exitCode, backdrop);
  return exitCode;
}

/** Stop and remove a daemon backdrop. */
export async function stopCommand(backdrop: string, globals: GlobalOptions): Promise<number> {
  const runtime = await createRuntime(globals);
  await containerFor(runtime, backdrop, { daemon: true }).stop();
  return 0;
}

/** Force-remove a daemon backdrop. */
export async function removeCommand(backdrop: string, globals: GlobalOptions): Promise<number> {
  const runtime = await createRuntime(globals);
  await containerFor(runtime, backdrop, { daemon: true }).remove();
  return 0;
}
