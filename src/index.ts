/**
 * berth - Run commands in Docker containers built on demand with BuildKit.
 *
 * This is the main entry point for the berth npm package.
 */

// Re-export main types and functions
export { VERSION } from "./constants.js";
export {
  type BackdropConfig,
  type BerthConfig,
  type ImageConfig,
  createImageConfig,
  emptyConfig,
  loadBackdropConfig,
  loadImageConfig,
} from "./config.js";
export { type LoadConfigOptions, loadBerthConfig, mergeConfigs, parseConfigDocument } from "./config-file.js";
export {
  BerthError,
  ConfigError,
  ValidationError,
  DockerError,
  DockerNotRunningError,
  ImagePullError,
  ContainerError,
  DecodeError,
  EngineError,
  MissingResultError,
  SessionError,
  DependencyError,
} from "./errors.js";

// Builds
export { Image, type ImageDependencies, resolveBuildArgs } from "./build/image.js";
export { type ContextData, prepareContext } from "./build/context.js";
export { type DecodeOptions, type JSONMessage, decodeBuildResult, readMessages } from "./build/messages.js";
export { type SolveEvent, type Vertex, type VertexLog, type VertexStatus, decodeStatusResponse, translateStatus } from "./build/trace.js";
export { Session, type SessionDialer, type SessionOptions } from "./build/session.js";
export { ProgressDisplay, displaySolveStatus } from "./build/progress.js";

// Containers
export { Container, type ContainerDependencies, type ContainerOptions } from "./container.js";
export * from "./docker/index.js";

// Concurrency
export { Channel } from "./utils/channel.js";
export { TaskGroup, type TaskResult } from "./utils/task-group.js";
