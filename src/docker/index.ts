/**
 * Docker operations for berth.
 *
 * Facade module that re-exports from specialized sub-modules:
 * - client.ts: Connection settings (connectionFromEnv, createDockerClient)
 * - engine.ts: Engine interfaces and the dockerode adapter (DockerEngine)
 * - auth.ts: Registry credentials (loadCredentials, credentialFor)
 * - pull.ts: Tagged image pulls (pullImage)
 */

// Client
export { type ConnectionOptions, connectionFromEnv, createDockerClient } from "./client.js";

// Engine
export {
  type AttachedStreams,
  type BuildEngine,
  type BuildRequest,
  type ByteStream,
  type ContainerEngine,
  type ContainerSpec,
  type ImageSummary,
  type PullEngine,
  DockerEngine,
  toBuildOptions,
} from "./engine.js";

// Credentials
export {
  type CredentialHelperRunner,
  type RegistryCredential,
  type RegistryCredentials,
  credentialFor,
  loadCredentials,
  registryOf,
} from "./auth.js";

// Pull
export { type PullOptions, formatPullMessage, pullImage } from "./pull.js";
