/**
 * Container launcher: rebuild the local image and run one sort inside it
 * with the project directory and AWS credentials mounted.
 */
import path from 'path';

import {
  AWS_CONFIG_DIR,
  CONTAINER_AWS_DIR,
  CONTAINER_IMAGE,
  CONTAINER_MOUNT_DIR,
  DOCKERFILE_PATH,
  PROJECT_ROOT,
} from './config.js';
import { logger } from './logger.js';
import type { IContainerRuntime } from './interfaces/container-runtime.js';
import type { IMountFactory } from './interfaces/mount-factory.js';
import { DockerRuntime } from './interfaces/docker-runtime.js';
import { DefaultMountFactory } from './interfaces/default-mount-factory.js';

export interface LaunchOptions {
  projectDir: string;
  imageName: string;
  mountDir: string;
  dockerfile: string;
  awsDir: string;
  entrypoint: string;
  /** Arguments after the image; defaults to a sort against the mounted config. */
  command?: string[];
  rebuild: boolean;
  tty: boolean;
}

export interface ContainerLauncherDeps {
  runtime?: IContainerRuntime;
  mountFactory?: IMountFactory;
}

export function defaultLaunchOptions(): LaunchOptions {
  return {
    projectDir: PROJECT_ROOT,
    imageName: CONTAINER_IMAGE,
    mountDir: CONTAINER_MOUNT_DIR,
    dockerfile: DOCKERFILE_PATH,
    awsDir: AWS_CONFIG_DIR,
    entrypoint: 'node',
    rebuild: true,
    tty: Boolean(process.stdin.isTTY),
  };
}

/** `node <mount>/dist/cli.js sort --config <mount>/conf/sortie.ini` */
export function defaultContainerCommand(mountDir: string): string[] {
  return [
    path.posix.join(mountDir, 'dist', 'cli.js'),
    'sort',
    '--config',
    path.posix.join(mountDir, 'conf', 'sortie.ini'),
  ];
}

export class ContainerLauncher {
  private readonly runtime: IContainerRuntime;
  private readonly mountFactory: IMountFactory;

  constructor(deps?: ContainerLauncherDeps) {
    this.runtime = deps?.runtime ?? new DockerRuntime();
    this.mountFactory = deps?.mountFactory ?? new DefaultMountFactory();
  }

  /** Resolves the container's exit code. */
  async launch(options: LaunchOptions): Promise<number> {
    logger.info({ projectDir: options.projectDir }, 'Project directory');

    this.runtime.ensureRunning();

    if (options.rebuild) {
      this.runtime.removeImage(options.imageName);
      await this.runtime.buildImage(
        options.imageName,
        options.dockerfile,
        path.dirname(options.dockerfile),
      );
    }

    const mounts = this.mountFactory.buildMounts({
      projectDir: options.projectDir,
      mountDir: options.mountDir,
      awsDir: options.awsDir,
      containerAwsDir: CONTAINER_AWS_DIR,
    });

    logger.info(
      {
        image: options.imageName,
        mounts: mounts.map((m) => `${m.hostPath} -> ${m.containerPath}`),
      },
      'Starting container',
    );

    const exitCode = await this.runtime.run({
      image: options.imageName,
      mounts,
      entrypoint: options.entrypoint,
      command: options.command ?? defaultContainerCommand(options.mountDir),
      tty: options.tty,
    });

    logger.info({ exitCode }, 'Container exited');
    return exitCode;
  }
}
