#!/usr/bin/env node

import { Command } from "commander";
import { runOnce, type RunOptions } from "../core/runner";
import { watchSites } from "../core/watcher";
import { loadConfig } from "../core/config-loader";
import { cleanBuild } from "../core/clean";
import { defaultLogger, type Logger } from "../util/logger";
import type { Profile } from "../schema";

interface BaseCliOptions {
  config?: string;
  prod?: boolean;
  watch?: boolean;
  sync?: boolean;
  quiet?: boolean;
  debug?: boolean;
}

/**
 * Create a logger with the appropriate level from CLI flags.
 */
function createCliLogger(opts: { quiet?: boolean; debug?: boolean }): Logger {
  if (opts.quiet) {
    defaultLogger.setLevel("silent");
  } else if (opts.debug) {
    defaultLogger.setLevel("debug");
  }
  return defaultLogger.child("[cli]");
}

async function handleBuildCommand(cwd: string, baseOpts: BaseCliOptions, forceProd = false) {
  const logger = createCliLogger(baseOpts);
  const profile: Profile = forceProd || baseOpts.prod ? "prod" : "dev";

  logger.debug(
    `Starting build (cwd=${cwd}, config=${baseOpts.config ?? "auto"}, profile=${profile}, watch=${baseOpts.watch ? "yes" : "no"})`,
  );

  const runnerOptions: RunOptions = {
    configPath: baseOpts.config,
    profile,
    sync: forceProd ? true : baseOpts.sync,
  };

  if (baseOpts.watch) {
    // Watch mode – keeps the process alive
    watchSites(cwd, runnerOptions);
  } else {
    await runOnce(cwd, runnerOptions);
  }
}

function handleCleanCommand(cwd: string, baseOpts: BaseCliOptions) {
  const logger = createCliLogger(baseOpts);
  const config = loadConfig(cwd, { configPath: baseOpts.config });
  logger.debug(`Cleaning build directory of ${config.dataRoot}`);
  cleanBuild(config.dataRoot);
}

async function main() {
  const cwd = process.cwd();

  const program = new Command();

  program
    .name("sitewright")
    .description("sitewright – incremental builder for a family of static sites")
    .option("-c, --config <path>", "Path to sitewright.config.json")
    .option("--prod", "Use the production profile")
    .option("-w, --watch", "Rebuild when content, templates, static files or config change")
    .option("--no-sync", "Do not sync the build to the profile's targetRoot")
    .option("--quiet", "Silence logs")
    .option("--debug", "Enable debug logging");

  program
    .command("build")
    .description("Build all sites (default command)")
    .action(async (_opts: object, cmd: Command) => {
      const baseOpts = cmd.parent?.opts<BaseCliOptions>() ?? {};
      await handleBuildCommand(cwd, baseOpts);
    });

  program
    .command("deploy")
    .description("Build with the production profile and sync to its targetRoot")
    .action(async (_opts: object, cmd: Command) => {
      const baseOpts = cmd.parent?.opts<BaseCliOptions>() ?? {};
      await handleBuildCommand(cwd, { ...baseOpts, watch: false }, true);
    });

  program
    .command("clean")
    .description("Remove everything inside <dataRoot>/build")
    .action((_opts: object, cmd: Command) => {
      const baseOpts = cmd.parent?.opts<BaseCliOptions>() ?? {};
      handleCleanCommand(cwd, baseOpts);
    });

  // Base command: build once or in watch mode
  program.action(async (opts: BaseCliOptions) => {
    await handleBuildCommand(cwd, opts);
  });

  await program.parseAsync(process.argv);
}

// Run and handle errors
main().catch((err) => {
  defaultLogger.error(err);
  process.exit(1);
});
