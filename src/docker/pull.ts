/**
 * Image pull for tagged backdrop images.
 */

import { ImagePullError } from "../errors.js";
import { log } from "../logger.js";
import { envelopeError, readMessages, type JSONMessage } from "../build/messages.js";
import { credentialFor, type RegistryCredentials } from "./auth.js";
import type { PullEngine } from "./engine.js";

export interface PullOptions {
  /** Pull even if the image is already present. */
  force: boolean;
  credentials: RegistryCredentials;
}

/** One human-readable line for a pull progress message, or null to skip it. */
export function formatPullMessage(message: JSONMessage): string | null {
  if (!message.status) {
    return null;
  }
  const parts = message.id ? [`${message.id}: ${message.status}`] : [message.status];
  if (message.progress) {
    parts.push(message.progress);
  }
  return parts.join(" ");
}

/**
 * Make sure an image tag is available locally.
 *
 * @returns The tag, ready to be used as a container image.
 * @throws ImagePullError if the registry reports an error.
 */
export async function pullImage(engine: PullEngine, reference: string, options: PullOptions): Promise<string> {
  if (!options.force) {
    try {
      const existing = await engine.listImages(reference);
      if (existing.length > 0) {
        log.debug(`Using existing image ${reference}`);
        return reference;
      }
    } catch (error: unknown) {
      log.debug(`Image lookup for ${reference} failed, pulling: ${String(error)}`);
    }
  }

  log.dim(`Pulling ${reference}...`);
  const stream = await engine.pullImage(reference, credentialFor(options.credentials, reference));

  for await (const message of readMessages(stream)) {
    const error = envelopeError(message);
    if (error) {
      throw new ImagePullError(`Failed to pull ${reference}: ${error.message}`);
    }
    const line = formatPullMessage(message);
    if (line) {
      log.dim(line);
    }
  }
  return reference;
}
