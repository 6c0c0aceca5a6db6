/**
 * Docker Engine connection settings.
 *
 * Read from the same environment variables the docker CLI honours.
 */

import { readFileSync } from "node:fs";
import { join } from "node:path";

import Docker from "dockerode";

import { DEFAULT_API_VERSION, DEFAULT_DOCKER_SOCKET } from "../constants.js";
import { ConfigError } from "../errors.js";

export interface ConnectionOptions {
  /** Unix socket (or named pipe); set for local daemons. */
  socketPath?: string;
  host?: string;
  port?: number;
  protocol: "http" | "https";
  /** API version without the leading "v". */
  apiVersion: string;
  ca?: Buffer;
  cert?: Buffer;
  key?: Buffer;
}

/**
 * Resolve connection settings.
 *
 * DOCKER_HOST: unix:///path, npipe:////./pipe/name or tcp://host:port.
 * DOCKER_TLS_VERIFY + DOCKER_CERT_PATH select https with client certificates.
 *
 * @throws ConfigError for an unsupported DOCKER_HOST.
 */
export function connectionFromEnv(env: NodeJS.ProcessEnv = process.env): ConnectionOptions {
  const apiVersion = env.DOCKER_API_VERSION || DEFAULT_API_VERSION;
  const dockerHost = env.DOCKER_HOST;

  if (!dockerHost) {
    return { socketPath: DEFAULT_DOCKER_SOCKET, protocol: "http", apiVersion };
  }
  if (dockerHost.startsWith("unix://")) {
    return { socketPath: dockerHost.slice("unix://".length), protocol: "http", apiVersion };
  }
  if (dockerHost.startsWith("npipe://")) {
    return { socketPath: dockerHost.slice("npipe://".length), protocol: "http", apiVersion };
  }

  const match = /^(?:tcp|https?):\/\/([^:/]+)(?::(\d+))?\/?$/.exec(dockerHost);
  if (!match?.[1]) {
    throw new ConfigError(
      `Unsupported DOCKER_HOST: ${dockerHost} (use unix://, npipe:// or tcp://; ssh:// is not supported)`
    );
  }

  const tls = Boolean(env.DOCKER_TLS_VERIFY) && env.DOCKER_TLS_VERIFY !== "0";
  const options: ConnectionOptions = {
    host: match[1],
    port: match[2] ? Number(match[2]) : tls ? 2376 : 2375,
    protocol: tls ? "https" : "http",
    apiVersion,
  };
  if (tls) {
    const certPath = env.DOCKER_CERT_PATH;
    if (!certPath) {
      throw new ConfigError("DOCKER_TLS_VERIFY is set but DOCKER_CERT_PATH is not");
    }
    options.ca = readFileSync(join(certPath, "ca.pem"));
    options.cert = readFileSync(join(certPath, "cert.pem"));
    options.key = readFileSync(join(certPath, "key.pem"));
  }
  return options;
}

/** Create a dockerode client for the given connection. */
export function createDockerClient(connection: ConnectionOptions): Docker {
  return new Docker({
    socketPath: connection.socketPath,
    host: connection.host,
    port: connection.port,
    protocol: connection.protocol,
    ca: connection.ca,
    cert: connection.cert,
    key: connection.key,
    version: `v${connection.apiVersion}`,
  });
}
