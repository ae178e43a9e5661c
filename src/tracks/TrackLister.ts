/**
 * Decides which tracks a run processes, depending on the ingestion mode:
 *   track_list — keys named in a JSON file ({ "input": [...] })
 *   dynamic    — every track key in the bucket
 *   cache      — whatever is already in the local cache
 */
import fs from 'fs';

import { TRACK_EXTENSION } from '../config.js';
import { InvalidValueError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import type { ITrackStore } from '../interfaces/track-store.js';
import type { Ingestion } from '../settings.js';
import { safeParseJson } from '../safe-parse.js';
import type { TrackCache } from './TrackCache.js';

export interface TrackListerDeps {
  store: ITrackStore;
  cache: TrackCache;
  logger?: Logger;
}

function isTrack(name: string): boolean {
  return name.endsWith(TRACK_EXTENSION);
}

export function readTrackListFile(filePath: string): string[] {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new InvalidValueError(`Track list file cannot be read: ${filePath}`, {
      filePath,
      reason: err instanceof Error ? err.message : String(err),
    });
  }

  const data = safeParseJson(raw);
  const input = typeof data === 'object' && data !== null && 'input' in data ? data.input : undefined;
  if (!Array.isArray(input)) {
    throw new InvalidValueError(
      `Track list file must be JSON with an "input" array: ${filePath}`,
      { filePath },
    );
  }

  return input.filter((item): item is string => typeof item === 'string' && isTrack(item));
}

export async function listStoreTracks(store: ITrackStore, log: Logger): Promise<string[]> {
  const contents = await store.listKeys();
  log.debug({ contents }, 'S3 contents found');
  return contents.filter((key) => !key.endsWith('/') && isTrack(key));
}

export async function listTracks(ingestion: Ingestion, deps: TrackListerDeps): Promise<string[]> {
  const log = (deps.logger ?? rootLogger).child({ component: 'TrackLister' });
  log.debug({ mode: ingestion.mode }, `Using track listing mode '${ingestion.mode}'`);

  let tracks: string[];
  switch (ingestion.mode) {
    case 'track_list':
      tracks = readTrackListFile(ingestion.trackList);
      break;
    case 'dynamic':
      tracks = await listStoreTracks(deps.store, log);
      break;
    case 'cache':
      tracks = deps.cache.list();
      break;
  }

  log.info({ count: tracks.length, tracks }, 'Tracks found');
  return tracks;
}
