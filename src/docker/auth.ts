/**
 * Registry credentials from the docker CLI configuration.
 *
 * Reads ~/.docker/config.json (or $DOCKER_CONFIG/config.json). Inline
 * `auths` entries are used directly; registries managed by a credential
 * helper are resolved by running `docker-credential-<helper> get`.
 */

import { existsSync, readFileSync } from "node:fs";

import { execa } from "execa";

import { getDockerConfigPath } from "../constants.js";
import { log } from "../logger.js";

export interface RegistryCredential {
  username: string;
  password: string;
  serveraddress: string;
}

/** Credentials keyed by registry address, as the engine expects them. */
export type RegistryCredentials = Record<string, RegistryCredential>;

/** Runs a credential helper; returns its stdout, or null if it failed. */
export type CredentialHelperRunner = (helper: string, registry: string) => Promise<string | null>;

const HELPER_TIMEOUT = 10_000;

const DOCKER_HUB_ALIASES = ["https://index.docker.io/v1/", "index.docker.io", "docker.io", "registry-1.docker.io"];

type Fields = Record<string, unknown>;

function isFields(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Run `docker-credential-<helper> get` with the registry on stdin. */
export const runCredentialHelper: CredentialHelperRunner = async (helper, registry) => {
  const result = await execa(`docker-credential-${helper}`, ["get"], {
    input: registry,
    timeout: HELPER_TIMEOUT,
    reject: false,
  });
  if (result.failed || result.exitCode !== 0) {
    log.debug(`docker-credential-${helper} failed for ${registry}: ${result.stderr || `exit code ${String(result.exitCode)}`}`);
    return null;
  }
  return result.stdout;
};

function decodeAuth(auth: string): { username: string; password: string } | null {
  const decoded = Buffer.from(auth, "base64").toString("utf-8");
  const sep = decoded.indexOf(":");
  if (sep <= 0) {
    return null;
  }
  return { username: decoded.slice(0, sep), password: decoded.slice(sep + 1) };
}

/** Read one inline `auths` entry. */
export function parseAuthEntry(registry: string, entry: unknown): RegistryCredential | null {
  if (!isFields(entry)) {
    return null;
  }
  if (typeof entry.auth === "string" && entry.auth) {
    const pair = decodeAuth(entry.auth);
    return pair ? { ...pair, serveraddress: registry } : null;
  }
  if (typeof entry.username === "string" && typeof entry.password === "string" && entry.username) {
    return { username: entry.username, password: entry.password, serveraddress: registry };
  }
  return null;
}

/** Parse credential helper output: {"ServerURL", "Username", "Secret"}. */
export function parseHelperOutput(registry: string, output: string): RegistryCredential | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(output);
  } catch (error: unknown) {
    log.debug(`Invalid credential helper output for ${registry}: ${String(error)}`);
    return null;
  }
  if (!isFields(parsed) || typeof parsed.Username !== "string" || typeof parsed.Secret !== "string") {
    return null;
  }
  return { username: parsed.Username, password: parsed.Secret, serveraddress: registry };
}

/**
 * Load every credential the docker configuration knows about.
 *
 * Missing or unreadable configuration yields an empty set.
 */
export async function loadCredentials(
  configPath: string = getDockerConfigPath(),
  runHelper: CredentialHelperRunner = runCredentialHelper
): Promise<RegistryCredentials> {
  if (!existsSync(configPath)) {
    return {};
  }

  let config: unknown;
  try {
    config = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error: unknown) {
    log.debug(`Ignoring unreadable docker config ${configPath}: ${String(error)}`);
    return {};
  }
  if (!isFields(config)) {
    return {};
  }

  const credentials: RegistryCredentials = {};
  const auths = isFields(config.auths) ? config.auths : {};
  const helpers: Record<string, string> = {};

  const credsStore = typeof config.credsStore === "string" ? config.credsStore : "";
  if (credsStore) {
    for (const registry of Object.keys(auths)) {
      helpers[registry] = credsStore;
    }
  }
  if (isFields(config.credHelpers)) {
    for (const [registry, helper] of Object.entries(config.credHelpers)) {
      if (typeof helper === "string" && helper) {
        helpers[registry] = helper;
      }
    }
  }

  for (const [registry, entry] of Object.entries(auths)) {
    const credential = parseAuthEntry(registry, entry);
    if (credential) {
      credentials[registry] = credential;
    }
  }

  for (const [registry, helper] of Object.entries(helpers)) {
    if (credentials[registry]) {
      continue;
    }
    const output = await runHelper(helper, registry);
    const credential = output ? parseHelperOutput(registry, output) : null;
    if (credential) {
      credentials[registry] = credential;
    }
  }

  return credentials;
}

/**
 * Registry host of an image reference.
 *
 * The first path component is a registry when it looks like a host name
 * (contains "." or ":" or is "localhost"); otherwise the image lives on Docker Hub.
 */
export function registryOf(reference: string): string {
  const slash = reference.indexOf("/");
  if (slash < 0) {
    return "docker.io";
  }
  const first = reference.slice(0, slash);
  if (first.includes(".") || first.includes(":") || first === "localhost") {
    return first;
  }
  return "docker.io";
}

function normalizeRegistry(address: string): string {
  return address.replace(/^https?:\/\//, "").replace(/\/.*$/, "").toLowerCase();
}

/** Find the credential that applies to an image reference, if any. */
export function credentialFor(credentials: RegistryCredentials, reference: string): RegistryCredential | undefined {
  const registry = registryOf(reference);
  const hub = registry === "docker.io";
  for (const [address, credential] of Object.entries(credentials)) {
    const host = normalizeRegistry(address);
    if (host === registry || (hub && DOCKER_HUB_ALIASES.some((alias) => normalizeRegistry(alias) === host))) {
      return credential;
    }
  }
  return undefined;
}
