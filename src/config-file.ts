/**
 * Configuration file support for berth.
 *
 * Loads image and backdrop definitions from YAML files.
 *
 * Config file locations (later entries override earlier ones by name):
 *   1. ~/.berth/config.yaml (global)
 *   2. ./berth.yaml, ./berth.yml or ./.berth.yaml (project, first found)
 *   3. --config <file> (replaces the project file)
 *
 * Dependency direction:
 *   This module imports from: config.ts, constants.ts, errors.ts, logger.ts, validation.ts, build/context.ts
 *   It should NOT import from: cli, build/image, docker/
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, isAbsolute, join, resolve } from "node:path";

import { load as loadYaml } from "js-yaml";

import { createImageConfig, emptyConfig, type BackdropConfig, type BerthConfig, type ImageConfig } from "./config.js";
import { getGlobalConfigPath, PROJECT_CONFIG_FILES } from "./constants.js";
import { ConfigError, ValidationError } from "./errors.js";
import { log } from "./logger.js";
import { isRemoteContext } from "./build/context.js";
import { parseEnvVarStrict, sanitizeEnvValue, validateEnvVarKey, validateVolume } from "./validation.js";

type Fields = Record<string, unknown>;

function isFields(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectFields(value: unknown, path: string): Fields {
  if (!isFields(value)) {
    throw new ConfigError(`${path}: expected a mapping`);
  }
  return value;
}

function optionalString(fields: Fields, key: string, path: string): string | undefined {
  const value = fields[key];
  if (value === undefined || value === null) {return undefined;}
  if (typeof value === "string") {return value;}
  if (typeof value === "number") {return String(value);}
  throw new ConfigError(`${path}.${key}: expected a string`);
}

function optionalBoolean(fields: Fields, key: string, path: string): boolean {
  const value = fields[key];
  if (value === undefined || value === null) {return false;}
  if (typeof value !== "boolean") {
    throw new ConfigError(`${path}.${key}: expected true or false`);
  }
  return value;
}

function stringList(fields: Fields, key: string, path: string): string[] {
  const value = fields[key];
  if (value === undefined || value === null) {return [];}
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new ConfigError(`${path}.${key}: expected a list of strings`);
  }
  return value;
}

/** A command given as a single string runs through the shell. */
function commandList(fields: Fields, key: string, path: string): string[] | undefined {
  const value = fields[key];
  if (value === undefined || value === null) {return undefined;}
  if (typeof value === "string") {return ["/bin/sh", "-c", value];}
  return stringList(fields, key, path);
}

function rethrowAsConfig<T>(path: string, fn: () => T): T {
  try {
    return fn();
  } catch (error: unknown) {
    if (error instanceof ValidationError) {
      throw new ConfigError(`${path}: ${error.message}`);
    }
    throw error;
  }
}

function parseArgs(fields: Fields, path: string): Record<string, string | undefined> {
  const value = fields.args;
  if (value === undefined || value === null) {return {};}
  const args: Record<string, string | undefined> = {};
  for (const [key, raw] of Object.entries(expectFields(value, `${path}.args`))) {
    if (raw === null) {
      args[key] = undefined;
    } else if (typeof raw === "string" || typeof raw === "number" || typeof raw === "boolean") {
      args[key] = String(raw);
    } else {
      throw new ConfigError(`${path}.args.${key}: expected a scalar or null`);
    }
  }
  return args;
}

function parseEnvironment(fields: Fields, path: string): string[] {
  const value = fields.environment;
  if (value === undefined || value === null) {return [];}
  if (Array.isArray(value)) {
    return stringList(fields, "environment", path).map((entry) =>
      rethrowAsConfig(`${path}.environment`, () => {
        const { key, value: envValue } = parseEnvVarStrict(entry);
        return `${key}=${envValue}`;
      })
    );
  }
  return Object.entries(expectFields(value, `${path}.environment`)).map(([key, raw]) => {
    rethrowAsConfig(`${path}.environment`, () => validateEnvVarKey(key));
    const text = raw === null || raw === undefined ? "" : String(raw);
    return `${key}=${sanitizeEnvValue(text)}`;
  });
}

function resolveContext(context: string | undefined, baseDir: string): string {
  if (context === undefined) {return baseDir;}
  if (isRemoteContext(context) || isAbsolute(context)) {return context;}
  return resolve(baseDir, context);
}

/** Parse one image block. */
export function parseImageConfig(name: string, value: unknown, baseDir: string, path: string): ImageConfig {
  const fields = expectFields(value, path);
  const steps = stringList(fields, "steps", path);
  return createImageConfig(name, {
    imageName: optionalString(fields, "name", path),
    context: resolveContext(optionalString(fields, "context", path), baseDir),
    dockerfile: optionalString(fields, "dockerfile", path),
    steps: steps.length > 0 ? steps : undefined,
    args: parseArgs(fields, path),
    noCache: optionalBoolean(fields, "no_cache", path),
    forcePull: optionalBoolean(fields, "pull", path),
    dependencies: stringList(fields, "dependencies", path),
  });
}

/** Parse one backdrop block. */
export function parseBackdropConfig(name: string, value: unknown, baseDir: string, path: string): BackdropConfig {
  const fields = expectFields(value, path);

  const rawImage = fields.image;
  let image: string | ImageConfig;
  if (typeof rawImage === "string" && rawImage) {
    image = rawImage;
  } else if (isFields(rawImage)) {
    image = parseImageConfig(name, rawImage, baseDir, `${path}.image`);
  } else {
    throw new ConfigError(`${path}.image: expected an image tag or an image block`);
  }

  return {
    name,
    image,
    containerName: optionalString(fields, "container_name", path),
    entrypoint: commandList(fields, "entrypoint", path),
    command: commandList(fields, "command", path),
    environment: parseEnvironment(fields, path),
    volumes: stringList(fields, "volumes", path).map((spec) =>
      rethrowAsConfig(`${path}.volumes`, () => validateVolume(spec))
    ),
    workingDir: optionalString(fields, "working_dir", path),
    user: optionalString(fields, "user", path),
    pull: optionalBoolean(fields, "pull", path),
  };
}

/**
 * Parse a configuration document.
 *
 * @param text - YAML source.
 * @param baseDir - Directory that relative contexts resolve against.
 * @param source - File name used in error messages.
 * @throws ConfigError on invalid YAML or wrong value types.
 */
export function parseConfigDocument(text: string, baseDir: string, source: string): BerthConfig {
  let document: unknown;
  try {
    document = loadYaml(text, { filename: source });
  } catch (error: unknown) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to parse ${source}: ${msg}`);
  }

  const config = emptyConfig();
  if (document === undefined || document === null) {
    return config;
  }

  const root = expectFields(document, source);
  if (root.images !== undefined && root.images !== null) {
    for (const [name, block] of Object.entries(expectFields(root.images, "images"))) {
      config.images[name] = parseImageConfig(name, block, baseDir, `images.${name}`);
    }
  }
  if (root.backdrops !== undefined && root.backdrops !== null) {
    for (const [name, block] of Object.entries(expectFields(root.backdrops, "backdrops"))) {
      config.backdrops[name] = parseBackdropConfig(name, block, baseDir, `backdrops.${name}`);
    }
  }
  return config;
}

/**
 * Load configuration from file.
 */
function loadConfigFile(path: string): BerthConfig | null {
  if (!existsSync(path)) {
    return null;
  }
  const config = parseConfigDocument(readFileSync(path, "utf-8"), dirname(path), path);
  log.debug(`Loaded config: ${path}`);
  return config;
}

/**
 * Find and load project-specific config file.
 */
function loadProjectConfig(projectPath: string): BerthConfig | null {
  for (const filename of PROJECT_CONFIG_FILES) {
    const config = loadConfigFile(join(projectPath, filename));
    if (config) {
      return config;
    }
  }
  return null;
}

/**
 * Merge configurations with proper precedence.
 * Entries are replaced whole, by name; later configs win.
 */
export function mergeConfigs(...configs: (BerthConfig | null)[]): BerthConfig {
  const result = emptyConfig();
  for (const config of configs) {
    if (!config) {continue;}
    Object.assign(result.images, config.images);
    Object.assign(result.backdrops, config.backdrops);
  }
  return result;
}

export interface LoadConfigOptions {
  /** Explicit config file; replaces the project config. */
  configFile?: string;
  /** Override the global config location (tests). */
  globalConfigPath?: string;
}

/**
 * Load berth configuration.
 *
 * @param projectPath - Directory searched for a project config file.
 * @throws ConfigError if an explicit config file is missing or any file is invalid.
 */
export function loadBerthConfig(projectPath: string, options: LoadConfigOptions = {}): BerthConfig {
  const globalConfig = loadConfigFile(options.globalConfigPath ?? getGlobalConfigPath());

  let projectConfig: BerthConfig | null;
  if (options.configFile) {
    const explicit = resolve(projectPath, options.configFile);
    projectConfig = loadConfigFile(explicit);
    if (!projectConfig) {
      throw new ConfigError(`Config file not found: ${explicit}`);
    }
  } else {
    projectConfig = loadProjectConfig(projectPath);
  }

  return mergeConfigs(globalConfig, projectConfig);
}
