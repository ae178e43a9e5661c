/**
 * DockerRuntime — Docker implementation of IContainerRuntime.
 */
import { execFileSync, execSync, spawn } from 'child_process';

import { ContainerBuildError, ContainerRuntimeError } from '../errors.js';
import { logger } from '../logger.js';
import type { IContainerRuntime, RunSpec } from './container-runtime.js';
import type { VolumeMount } from './mount-factory.js';

const CONTAINER_RUNTIME_BIN = 'docker';

function spawnInherit(bin: string, args: string[]): Promise<number | null> {
  return new Promise((resolve, reject) => {
    const child = spawn(bin, args, { stdio: 'inherit' });
    child.on('error', reject);
    child.on('close', (code) => resolve(code));
  });
}

export class DockerRuntime implements IContainerRuntime {
  get bin(): string {
    return CONTAINER_RUNTIME_BIN;
  }

  mountArgs(mount: VolumeMount): string[] {
    const options: string[] = [];
    if (mount.readonly) options.push('ro');
    if (mount.relabel) options.push('Z');
    const suffix = options.length > 0 ? `:${options.join(',')}` : '';
    return ['-v', `${mount.hostPath}:${mount.containerPath}${suffix}`];
  }

  ensureRunning(): void {
    try {
      execSync(`${CONTAINER_RUNTIME_BIN} info`, { stdio: 'pipe', timeout: 10000 });
      logger.debug('Container runtime already running');
    } catch (err) {
      logger.error({ err }, 'Failed to reach container runtime');
      throw new ContainerRuntimeError(
        'Container runtime is not reachable. Ensure Docker is installed and running (`docker info`).',
        err,
      );
    }
  }

  removeImage(name: string): void {
    try {
      execFileSync(CONTAINER_RUNTIME_BIN, ['image', 'rm', '--force', name], { stdio: 'pipe' });
      logger.info({ image: name }, 'Removed existing image');
    } catch (err) {
      logger.debug({ image: name, err }, 'No image removed');
    }
  }

  async buildImage(tag: string, dockerfile: string, contextDir: string): Promise<void> {
    const args = ['build', '-t', tag, '-f', dockerfile, contextDir];
    logger.info({ tag, dockerfile, contextDir }, 'Building image');
    const code = await spawnInherit(CONTAINER_RUNTIME_BIN, args);
    if (code !== 0) {
      throw new ContainerBuildError(tag, code);
    }
  }

  buildRunArgs(spec: RunSpec): string[] {
    const args = ['run', '--rm', spec.tty ? '-it' : '-i'];
    for (const mount of spec.mounts) {
      args.push(...this.mountArgs(mount));
    }
    if (spec.entrypoint) {
      args.push(`--entrypoint=${spec.entrypoint}`);
    }
    args.push(spec.image, ...spec.command);
    return args;
  }

  async run(spec: RunSpec): Promise<number> {
    const args = this.buildRunArgs(spec);
    logger.debug({ args: args.join(' ') }, 'Running container');
    const code = await spawnInherit(CONTAINER_RUNTIME_BIN, args);
    // null means the container process was killed by a signal
    return code ?? 1;
  }
}
