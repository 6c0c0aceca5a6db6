/**
 * Build command: resolve one configured image.
 */

import { Image } from "../build/image.js";
import { log } from "../logger.js";
import { createRuntime, withInterrupt, type GlobalOptions } from "./runtime.js";

export interface BuildCommandOptions {
  rebuild?: boolean;
  cache?: boolean;
  pull?: boolean;
}

/**
 * Build (or reuse) the named image and print its id.
 *
 * @returns Process exit code.
 */
export async function buildCommand(
  name: string,
  options: BuildCommandOptions,
  globals: GlobalOptions
): Promise<number> {
  const runtime = await createRuntime(globals);
  const config = runtime.image(name);
  config.forceRebuild = config.forceRebuild || (options.rebuild ?? false);
  config.noCache = config.noCache || options.cache === false;
  config.forcePull = config.forcePull || (options.pull ?? false);

  const imageId = await withInterrupt((signal) =>
    new Image(config, {
      engine: runtime.engine,
      loadImageConfig: runtime.image,
      credentials: runtime.credentials,
      signal,
    }).get()
  );

  log.success(`Image ${config.imageName ?? name} ready`);
  log.info(imageId);
  return 0;
}
