/**
 * IContainerRuntime — abstraction over the container CLI (Docker, Podman, ...).
 * Consumers depend on this interface; implementations live in separate files.
 */
import type { VolumeMount } from './mount-factory.js';

export interface RunSpec {
  image: string;
  mounts: VolumeMount[];
  /** Overrides the image's entrypoint. */
  entrypoint?: string;
  /** Arguments passed after the image name. */
  command: string[];
  /** Attach a terminal (`-t`) in addition to stdin. */
  tty: boolean;
}

export interface IContainerRuntime {
  /** The container runtime binary name (e.g. 'docker'). */
  readonly bin: string;

  /** Returns CLI args for one bind mount. */
  mountArgs(mount: VolumeMount): string[];

  /** Throws ContainerRuntimeError when the runtime cannot be reached. */
  ensureRunning(): void;

  /** Force-remove a local image. Never throws. */
  removeImage(name: string): void;

  /** Build an image, streaming output to the terminal. */
  buildImage(tag: string, dockerfile: string, contextDir: string): Promise<void>;

  /** Run a container in the foreground and resolve its exit code. */
  run(spec: RunSpec): Promise<number>;
}
