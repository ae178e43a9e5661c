#!/usr/bin/env node
/**
 * CLI entry point for sortie.
 *
 *   sortie sort   [--config conf/sortie.ini]
 *   sortie launch [--image name] [--mount-dir dir] [--dockerfile path] [--no-rebuild]
 */
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { Command } from 'commander';

import { SETTINGS_PATH } from './config.js';
import { SortieError } from './errors.js';
import { createS3Client } from './infrastructure/aws.js';
import { S3TrackStore } from './interfaces/s3-track-store.js';
import { ContainerLauncher, defaultLaunchOptions } from './launcher.js';
import { createRunLogger, logger, type Logger } from './logger.js';
import { loadSettings } from './settings.js';
import { Sorter, type RunSummary } from './sorter.js';

export const VERSION = '1.0.0';

export async function runSortCommand(configPath: string): Promise<RunSummary> {
  const settings = loadSettings(configPath);
  const runLogger = createRunLogger(settings.logging);
  const client = await createS3Client(settings.aws.profile, settings.aws.region);
  runLogger.debug({ profile: settings.aws.profile }, 'AWS session initiated');

  const store = new S3TrackStore({ client, bucket: settings.bucket, logger: runLogger });
  try {
    return await new Sorter(settings, { store, logger: runLogger }).run();
  } finally {
    client.destroy();
  }
}

export interface LaunchCommandOptions {
  image?: string;
  mountDir?: string;
  dockerfile?: string;
  rebuild: boolean;
}

export async function runLaunchCommand(
  opts: LaunchCommandOptions,
  launcher: ContainerLauncher = new ContainerLauncher(),
): Promise<number> {
  const defaults = defaultLaunchOptions();
  return launcher.launch({
    ...defaults,
    imageName: opts.image ?? defaults.imageName,
    mountDir: opts.mountDir ?? defaults.mountDir,
    dockerfile: opts.dockerfile ? path.resolve(opts.dockerfile) : defaults.dockerfile,
    rebuild: opts.rebuild,
  });
}

/** Log a failure and return the process exit code for it. */
export function reportError(err: unknown, log: Logger = logger): number {
  if (err instanceof SortieError) {
    log.fatal({ category: err.category, details: err.details }, err.message);
  } else {
    log.fatal({ err }, 'Unexpected failure');
  }
  return 1;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('sortie')
    .description('Sort MP3 objects in an S3 bucket by their ID3 tags')
    .version(VERSION);

  program
    .command('sort')
    .description('Run one sorting pass against the configured bucket')
    .option('-c, --config <path>', 'Settings file (INI)', SETTINGS_PATH)
    .action(async (options: { config: string }) => {
      await runSortCommand(options.config);
    });

  program
    .command('launch')
    .description('Rebuild the container image and run a sort inside it')
    .option('--image <name>', 'Image name to build and run')
    .option('--mount-dir <dir>', 'Where the project is mounted in the container')
    .option('--dockerfile <path>', 'Dockerfile to build from')
    .option('--no-rebuild', 'Run the existing image without removing and rebuilding it')
    .action(async (options: LaunchCommandOptions) => {
      process.exitCode = await runLaunchCommand(options);
    });

  return program;
}

// Guard: only run when executed directly, not when imported by tests
const isDirectRun =
  process.argv[1] !== undefined &&
  fs.existsSync(process.argv[1]) &&
  fs.realpathSync(process.argv[1]) === fileURLToPath(import.meta.url);

if (isDirectRun) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      process.exit(reportError(err));
    });
}
