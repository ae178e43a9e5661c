// Interfaces
export type { IContainerRuntime, RunSpec } from './container-runtime.js';
export type { IMountFactory, MountPlan, VolumeMount } from './mount-factory.js';
export type { ITrackStore } from './track-store.js';

// Implementations
export { DockerRuntime } from './docker-runtime.js';
export { DefaultMountFactory } from './default-mount-factory.js';
export { S3TrackStore } from './s3-track-store.js';
