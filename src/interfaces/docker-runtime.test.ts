import { EventEmitter } from 'events';
import { describe, it, expect, vi, beforeEach } from 'vitest';

// Mock logger before imports
vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

// Mock child_process
const mockExecSync = vi.fn();
const mockExecFileSync = vi.fn();
const mockSpawn = vi.fn();
vi.mock('child_process', () => ({
  execSync: (...args: unknown[]) => mockExecSync(...args),
  execFileSync: (...args: unknown[]) => mockExecFileSync(...args),
  spawn: (...args: unknown[]) => mockSpawn(...args),
}));

import { ContainerBuildError, ContainerRuntimeError } from '../errors.js';
import { DockerRuntime } from './docker-runtime.js';
import type { RunSpec } from './container-runtime.js';

/** A child process stand-in that exits with the given code on the next tick. */
function exitingProcess(code: number | null): EventEmitter {
  const proc = new EventEmitter();
  setImmediate(() => proc.emit('close', code));
  return proc;
}

const spec: RunSpec = {
  image: 'sortie:latest',
  mounts: [
    { hostPath: '/home/me/sortie', containerPath: '/opt/sortie', readonly: false, relabel: true },
    { hostPath: '/home/me/.aws', containerPath: '/root/.aws', readonly: true, relabel: false },
  ],
  entrypoint: 'node',
  command: ['/opt/sortie/dist/cli.js', 'sort'],
  tty: true,
};

describe('DockerRuntime', () => {
  let runtime: DockerRuntime;

  beforeEach(() => {
    vi.clearAllMocks();
    runtime = new DockerRuntime();
  });

  describe('bin', () => {
    it('returns "docker"', () => {
      expect(runtime.bin).toBe('docker');
    });
  });

  describe('mountArgs', () => {
    it('adds no suffix for a plain read-write mount', () => {
      expect(
        runtime.mountArgs({ hostPath: '/h', containerPath: '/c', readonly: false, relabel: false }),
      ).toEqual(['-v', '/h:/c']);
    });

    it('adds :Z for relabelled mounts', () => {
      expect(
        runtime.mountArgs({ hostPath: '/h', containerPath: '/c', readonly: false, relabel: true }),
      ).toEqual(['-v', '/h:/c:Z']);
    });

    it('combines ro and Z', () => {
      expect(
        runtime.mountArgs({ hostPath: '/h', containerPath: '/c', readonly: true, relabel: true }),
      ).toEqual(['-v', '/h:/c:ro,Z']);
    });
  });

  describe('ensureRunning', () => {
    it('succeeds when docker info succeeds', () => {
      mockExecSync.mockReturnValueOnce('');
      expect(() => runtime.ensureRunning()).not.toThrow();
      expect(mockExecSync).toHaveBeenCalledWith('docker info', { stdio: 'pipe', timeout: 10000 });
    });

    it('throws ContainerRuntimeError when docker info fails', () => {
      mockExecSync.mockImplementationOnce(() => {
        throw new Error('Cannot connect to the Docker daemon');
      });
      expect(() => runtime.ensureRunning()).toThrow(ContainerRuntimeError);
    });
  });

  describe('removeImage', () => {
    it('force-removes the image', () => {
      mockExecFileSync.mockReturnValueOnce('');
      runtime.removeImage('sortie:latest');
      expect(mockExecFileSync).toHaveBeenCalledWith(
        'docker',
        ['image', 'rm', '--force', 'sortie:latest'],
        { stdio: 'pipe' },
      );
      expect(mockExecSync).not.toHaveBeenCalled();
    });

    it('passes the image name as a single argument, not through a shell', () => {
      mockExecFileSync.mockReturnValueOnce('');
      runtime.removeImage('sortie:latest; rm -rf /tmp/x');
      expect(mockExecFileSync).toHaveBeenCalledWith(
        'docker',
        ['image', 'rm', '--force', 'sortie:latest; rm -rf /tmp/x'],
        { stdio: 'pipe' },
      );
    });

    it('tolerates a failed removal', () => {
      mockExecFileSync.mockImplementationOnce(() => {
        throw new Error('No such image');
      });
      expect(() => runtime.removeImage('sortie:latest')).not.toThrow();
    });
  });

  describe('buildImage', () => {
    it('builds with the tag and Dockerfile, streaming output', async () => {
      mockSpawn.mockReturnValueOnce(exitingProcess(0));

      await runtime.buildImage('sortie:latest', '/p/container/Dockerfile', '/p/container');

      expect(mockSpawn).toHaveBeenCalledWith(
        'docker',
        ['build', '-t', 'sortie:latest', '-f', '/p/container/Dockerfile', '/p/container'],
        { stdio: 'inherit' },
      );
    });

    it('throws ContainerBuildError on a non-zero exit', async () => {
      mockSpawn.mockReturnValueOnce(exitingProcess(2));

      const error = await runtime
        .buildImage('sortie:latest', '/p/Dockerfile', '/p')
        .catch((err: unknown) => err);
      expect(error).toBeInstanceOf(ContainerBuildError);
      expect(error).toHaveProperty('message', "Building image 'sortie:latest' failed with exit code 2");
    });
  });

  describe('buildRunArgs', () => {
    it('mounts, overrides the entrypoint and appends the command', () => {
      expect(runtime.buildRunArgs(spec)).toEqual([
        'run',
        '--rm',
        '-it',
        '-v',
        '/home/me/sortie:/opt/sortie:Z',
        '-v',
        '/home/me/.aws:/root/.aws:ro',
        '--entrypoint=node',
        'sortie:latest',
        '/opt/sortie/dist/cli.js',
        'sort',
      ]);
    });

    it('omits the terminal flag without a tty', () => {
      expect(runtime.buildRunArgs({ ...spec, tty: false }).slice(0, 3)).toEqual([
        'run',
        '--rm',
        '-i',
      ]);
    });
  });

  describe('run', () => {
    it('resolves the container exit code', async () => {
      mockSpawn.mockReturnValueOnce(exitingProcess(3));
      await expect(runtime.run(spec)).resolves.toBe(3);
      expect(mockSpawn).toHaveBeenCalledWith('docker', runtime.buildRunArgs(spec), {
        stdio: 'inherit',
      });
    });

    it('reports 1 when the container is killed by a signal', async () => {
      mockSpawn.mockReturnValueOnce(exitingProcess(null));
      await expect(runtime.run(spec)).resolves.toBe(1);
    });

    it('rejects when docker cannot be spawned', async () => {
      const proc = new EventEmitter();
      setImmediate(() => proc.emit('error', new Error('spawn docker ENOENT')));
      mockSpawn.mockReturnValueOnce(proc);
      await expect(runtime.run(spec)).rejects.toThrow('spawn docker ENOENT');
    });
  });
});
