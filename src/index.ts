/**
 * sortie — sort MP3 objects in an S3 bucket into a tag-based key layout.
 */
export { Sorter, type RunSummary, type SorterDeps } from './sorter.js';
export { loadSettings, parseBoolean, type Settings, type Ingestion, type IngestionMode } from './settings.js';
export {
  SortieError,
  ConfigFileNotFoundError,
  ConfigMissingKeyError,
  AwsProfileNotFoundError,
  InvalidPermissionsError,
  InvalidValueError,
  ContainerRuntimeError,
  ContainerBuildError,
} from './errors.js';
export { createRunLogger, levelForVerbosity, logger } from './logger.js';
export { createS3Client, listProfiles, assertProfileExists } from './infrastructure/aws.js';
export { TrackCache } from './tracks/TrackCache.js';
export { listTracks, readTrackListFile } from './tracks/TrackLister.js';
export { convertTrack, readTags, renderTargetKey } from './tracks/TrackConverter.js';
export type { SortedTrack, TrackTags } from './tracks/types.js';
export { ContainerLauncher, defaultLaunchOptions, defaultContainerCommand, type LaunchOptions } from './launcher.js';
export * from './interfaces/index.js';
