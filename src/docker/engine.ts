/**
 * Docker Engine API adapter.
 *
 * The rest of berth talks to the engine through the narrow interfaces
 * below; DockerEngine implements them with dockerode. Tests substitute an
 * in-process fake.
 *
 * Dependency direction:
 *   This module imports from: docker/client.ts, docker/auth.ts, build/session.ts (types), errors.ts, logger.ts
 *   It should NOT import from: build/image, cli
 */

import { request as httpRequest, type ClientRequest, type OutgoingHttpHeaders } from "node:http";
import { request as httpsRequest } from "node:https";
import { Duplex, Readable, type Writable } from "node:stream";

import type Docker from "dockerode";

import type { SessionMetadata } from "../build/session.js";
import { ContainerError, DockerError, DockerNotRunningError, SessionError } from "../errors.js";
import { log } from "../logger.js";
import type { RegistryCredential, RegistryCredentials } from "./auth.js";
import { createDockerClient, type ConnectionOptions } from "./client.js";

/** Raw response body of a streaming engine call. */
export type ByteStream = AsyncIterable<Buffer | string>;

export interface ImageSummary {
  id: string;
  repoTags: string[];
}

/** Everything the engine needs to run one build. */
export interface BuildRequest {
  tags: string[];
  /** Build arguments with their final values. */
  buildArgs: Record<string, string>;
  noCache: boolean;
  forcePull: boolean;
  /** Dockerfile path inside the context. */
  dockerfile: string;
  /** Tar archive of a local context. */
  context?: NodeJS.ReadableStream;
  /** Remote context reference. */
  remote?: string;
  sessionId: string;
  buildId: string;
  credentials: RegistryCredentials;
}

export interface BuildEngine {
  /** Submit a build; resolves with the status stream once the engine accepts it. */
  imageBuild(request: BuildRequest, signal: AbortSignal): Promise<ByteStream>;
  /** Open a raw connection to the engine's session endpoint. */
  dialSession(proto: string, meta: SessionMetadata, signal: AbortSignal): Promise<Duplex>;
  listImages(reference: string): Promise<ImageSummary[]>;
}

export interface PullEngine {
  listImages(reference: string): Promise<ImageSummary[]>;
  pullImage(reference: string, credential?: RegistryCredential): Promise<ByteStream>;
}

export interface ContainerSpec {
  name: string;
  image: string;
  entrypoint?: string[];
  command?: string[];
  environment: string[];
  volumes: string[];
  workingDir?: string;
  user?: string;
  /** Allocate a TTY and keep stdin open. */
  tty: boolean;
}

export interface AttachedStreams {
  stdin: Readable;
  stdout: Writable;
  stderr: Writable;
  tty: boolean;
}

export interface ContainerEngine {
  createContainer(spec: ContainerSpec): Promise<string>;
  startContainer(id: string): Promise<void>;
  /** Wire the container's stdio to ours; returns a function that detaches. */
  attachContainer(id: string, streams: AttachedStreams): Promise<() => void>;
  /** Wait for the container to exit; resolves with its exit code. */
  waitContainer(id: string): Promise<number>;
  resizeContainer(id: string, rows: number, columns: number): Promise<void>;
  stopContainer(id: string): Promise<void>;
  removeContainer(id: string, force?: boolean): Promise<void>;
}

function isFields(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isByteStream(value: unknown): value is Readable {
  return value instanceof Readable;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function hasStatusCode(error: unknown, code: number): boolean {
  return isFields(error) && error.statusCode === code;
}

/** Map connection failures to DockerNotRunningError. */
function wrapEngineError(error: unknown, action: string): Error {
  if (isFields(error) && (error.code === "ENOENT" || error.code === "ECONNREFUSED")) {
    return new DockerNotRunningError(`Cannot connect to the Docker daemon (${action}): ${errorMessage(error)}`);
  }
  if (error instanceof Error && error.name === "AbortError") {
    return error;
  }
  return new DockerError(`${action} failed: ${errorMessage(error)}`);
}

/** Query options for POST /build. BuildKit is selected with version "2". */
export function toBuildOptions(request: BuildRequest, signal: AbortSignal): Docker.ImageBuildOptions & {
  version: "1" | "2";
  session: string;
  buildid: string;
  abortSignal: AbortSignal;
} {
  const registryconfig: Record<string, { username: string; password: string }> = {};
  for (const [address, credential] of Object.entries(request.credentials)) {
    registryconfig[address] = { username: credential.username, password: credential.password };
  }
  return {
    t: request.tags[0],
    buildargs: request.buildArgs,
    nocache: request.noCache,
    pull: request.forcePull,
    dockerfile: request.dockerfile,
    remote: request.remote,
    rm: true,
    forcerm: true,
    version: "2",
    registryconfig,
    session: request.sessionId,
    buildid: request.buildId,
    abortSignal: signal,
  };
}

export class DockerEngine implements BuildEngine, PullEngine, ContainerEngine {
  private readonly docker: Docker;

  constructor(private readonly connection: ConnectionOptions) {
    this.docker = createDockerClient(connection);
  }

  async imageBuild(request: BuildRequest, signal: AbortSignal): Promise<ByteStream> {
    const body = request.context ?? Readable.from([]);
    let response: unknown;
    try {
      response = await this.docker.buildImage(body, toBuildOptions(request, signal));
    } catch (error: unknown) {
      throw wrapEngineError(error, "image build");
    }
    if (!isByteStream(response)) {
      throw new DockerError("image build: engine returned no status stream");
    }
    return response;
  }

  /**
   * POST /session with an Upgrade header; the engine answers 101 and the
   * socket becomes the session transport.
   */
  dialSession(proto: string, meta: SessionMetadata, signal: AbortSignal): Promise<Duplex> {
    return new Promise((resolve, reject) => {
      const headers: OutgoingHttpHeaders = { Connection: "Upgrade", Upgrade: proto };
      for (const [key, values] of Object.entries(meta)) {
        headers[key] = values;
      }
      const path = `/v${this.connection.apiVersion}/session`;

      let req: ClientRequest;
      if (this.connection.socketPath) {
        req = httpRequest({ socketPath: this.connection.socketPath, path, method: "POST", headers, signal });
      } else if (this.connection.protocol === "https") {
        req = httpsRequest({
          host: this.connection.host,
          port: this.connection.port,
          ca: this.connection.ca,
          cert: this.connection.cert,
          key: this.connection.key,
          path,
          method: "POST",
          headers,
          signal,
        });
      } else {
        req = httpRequest({ host: this.connection.host, port: this.connection.port, path, method: "POST", headers, signal });
      }

      req.on("upgrade", (_res, socket, head) => {
        if (head.length > 0) {
          socket.unshift(head);
        }
        resolve(socket);
      });
      req.on("response", (res) => {
        res.resume();
        reject(new SessionError(`engine refused session upgrade: HTTP ${String(res.statusCode)}`));
      });
      req.on("error", (error) => reject(wrapEngineError(error, "session dial")));
      req.end();
    });
  }

  async listImages(reference: string): Promise<ImageSummary[]> {
    try {
      const images = await this.docker.listImages({ filters: { reference: [reference] } });
      return images.map((image) => ({ id: image.Id, repoTags: image.RepoTags ?? [] }));
    } catch (error: unknown) {
      throw wrapEngineError(error, "image list");
    }
  }

  async pullImage(reference: string, credential?: RegistryCredential): Promise<ByteStream> {
    let response: unknown;
    try {
      response = await this.docker.pull(reference, credential ? { authconfig: credential } : {});
    } catch (error: unknown) {
      throw wrapEngineError(error, `pull ${reference}`);
    }
    if (!isByteStream(response)) {
      throw new DockerError(`pull ${reference}: engine returned no status stream`);
    }
    return response;
  }

  async createContainer(spec: ContainerSpec): Promise<string> {
    try {
      const container = await this.docker.createContainer({
        name: spec.name,
        Image: spec.image,
        Entrypoint: spec.entrypoint,
        Cmd: spec.command,
        Env: spec.environment,
        WorkingDir: spec.workingDir,
        User: spec.user,
        Tty: spec.tty,
        OpenStdin: true,
        StdinOnce: true,
        AttachStdin: true,
        AttachStdout: true,
        AttachStderr: true,
        HostConfig: { Binds: spec.volumes },
      });
      log.debug(`Created container ${container.id.slice(0, 12)} (${spec.name})`);
      return container.id;
    } catch (error: unknown) {
      throw new ContainerError(`Failed to create container ${spec.name}: ${errorMessage(error)}`);
    }
  }

  async startContainer(id: string): Promise<void> {
    try {
      await this.docker.getContainer(id).start();
    } catch (error: unknown) {
      throw new ContainerError(`Failed to start container ${id}: ${errorMessage(error)}`);
    }
  }

  async attachContainer(id: string, streams: AttachedStreams): Promise<() => void> {
    let stream: unknown;
    try {
      stream = await this.docker.getContainer(id).attach({
        stream: true,
        stdin: true,
        stdout: true,
        stderr: true,
        hijack: true,
      });
    } catch (error: unknown) {
      throw new ContainerError(`Failed to attach to container ${id}: ${errorMessage(error)}`);
    }
    // A hijacked attach hands back the raw socket.
    if (!(stream instanceof Duplex)) {
      throw new ContainerError(`Failed to attach to container ${id}: no stream returned`);
    }
    const socket = stream;

    if (streams.tty) {
      socket.pipe(streams.stdout);
    } else {
      this.docker.modem.demuxStream(socket, streams.stdout, streams.stderr);
    }
    streams.stdin.pipe(socket);

    return () => {
      streams.stdin.unpipe(socket);
      socket.end();
    };
  }

  async waitContainer(id: string): Promise<number> {
    let result: unknown;
    try {
      result = await this.docker.getContainer(id).wait();
    } catch (error: unknown) {
      throw new ContainerError(`Failed waiting for container ${id}: ${errorMessage(error)}`);
    }
    return isFields(result) && typeof result.StatusCode === "number" ? result.StatusCode : 1;
  }

  async resizeContainer(id: string, rows: number, columns: number): Promise<void> {
    try {
      await this.docker.getContainer(id).resize({ h: rows, w: columns });
    } catch (error: unknown) {
      log.debug(`Resize of ${id} failed: ${errorMessage(error)}`);
    }
  }

  async stopContainer(id: string): Promise<void> {
    try {
      await this.docker.getContainer(id).stop();
    } catch (error: unknown) {
      // 304: already stopped
      if (hasStatusCode(error, 304)) {
        return;
      }
      throw new ContainerError(`Failed to stop container ${id}: ${errorMessage(error)}`);
    }
  }

  async removeContainer(id: string, force = false): Promise<void> {
    try {
      await this.docker.getContainer(id).remove({ force });
    } catch (error: unknown) {
      if (hasStatusCode(error, 404)) {
        log.debug(`Container ${id} already removed`);
        return;
      }
      throw new ContainerError(`Failed to remove container ${id}: ${errorMessage(error)}`);
    }
  }
}
