#!/usr/bin/env node
/**
 * CLI entry point for berth.
 *
 * Commander.js-based CLI with all commands and options.
 */

import { Command } from "commander";

import { buildCommand, type BuildCommandOptions } from "./commands/build.js";
import { removeCommand, runCommand, stopCommand, type RunCommandOptions } from "./commands/run.js";
import type { GlobalOptions } from "./commands/runtime.js";
import { VERSION } from "./constants.js";
import { reportCommandError } from "./error-handler.js";
import { enableQuietMode, LogLevel, setLogLevel } from "./logger.js";

const program = new Command();

function globals(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

/** Run a command body and record its exit code. */
async function execute(body: () => Promise<number>): Promise<void> {
  try {
    process.exitCode = await body();
  } catch (error: unknown) {
    process.exitCode = reportCommandError(error);
  }
}

program
  .name("berth")
  .description("Run commands in Docker containers built from YAML backdrops")
  .version(VERSION)
  .option("-c, --config <file>", "Config file (replaces berth.yaml in the current directory)")
  .option("-q, --quiet", "Suppress all output (exit code only)")
  .option("--debug", "Show debug output")
  .enablePositionalOptions()
  .hook("preAction", (thisCommand) => {
    // Apply output settings before any command runs
    const opts = thisCommand.opts<GlobalOptions>();
    if (opts.quiet) {
      enableQuietMode();
    } else if (opts.debug) {
      setLogLevel(LogLevel.DEBUG);
    }
  });

program
  .command("run", { isDefault: true })
  .description("Run a command in a backdrop (default command)")
  .argument("<backdrop>", "Backdrop name")
  .argument("[command...]", "Command to run instead of the backdrop's")
  .option("--rebuild", "Rebuild the backdrop image and its dependencies")
  .option("--no-cache", "Do not use the build cache")
  .option("--pull", "Always pull base images")
  .option("-d, --daemon", "Start in the background (container named after the backdrop)")
  .passThroughOptions()
  .action(async (backdrop: string, command: string[], options: RunCommandOptions) => {
    await execute(() => runCommand(backdrop, command, options, globals()));
  });

program
  .command("build")
  .description("Build an image from the configuration")
  .argument("<image>", "Image name")
  .option("--rebuild", "Build even if the image exists")
  .option("--no-cache", "Do not use the build cache")
  .option("--pull", "Always pull base images")
  .action(async (image: string, options: BuildCommandOptions) => {
    await execute(() => buildCommand(image, options, globals()));
  });

program
  .command("stop")
  .description("Stop and remove a daemon backdrop")
  .argument("<backdrop>", "Backdrop name")
  .action(async (backdrop: string) => {
    await execute(() => stopCommand(backdrop, globals()));
  });

program
  .command("remove")
  .alias("rm")
  .description("Force-remove a daemon backdrop")
  .argument("<backdrop>", "Backdrop name")
  .action(async (backdrop: string) => {
    await execute(() => removeCommand(backdrop, globals()));
  });

// Parse and run (async for proper error handling in async actions)
program.parseAsync().catch((error: unknown) => {
  process.exitCode = reportCommandError(error);
});
