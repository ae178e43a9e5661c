/**
 * Turns a cached track's tags into the key it is re-uploaded under.
 * Masks use {{ tag }} placeholders, e.g. "{{ artist }}/{{ album }}/{{ title }}.mp3".
 */
import path from 'path';
import Mustache from 'mustache';
import { parseFile } from 'music-metadata';

import { InvalidValueError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import type { SortedTrack, TrackTags } from './types.js';

export const UNKNOWN_ARTIST = 'Unknown Artist';
export const UNKNOWN_ALBUM = 'Unknown Album';

export async function readTags(filePath: string): Promise<TrackTags> {
  const { common } = await parseFile(filePath, { duration: false, skipCovers: true });
  return {
    artist: common.artist ?? null,
    album: common.album ?? null,
    title: common.title ?? null,
    albumartist: common.albumartist ?? null,
    year: common.year ?? null,
    track: common.track.no ?? null,
    genre: common.genre?.[0] ?? null,
    filename: path.basename(filePath, path.extname(filePath)),
  };
}

// Tag values must not introduce extra key segments
function segmentSafe(value: string | number | null): string {
  if (value === null) return '';
  return String(value).replace(/[/\\]/g, '-').trim();
}

export function renderTargetKey(mask: string, tags: TrackTags): string {
  const view = {
    artist: segmentSafe(tags.artist) || UNKNOWN_ARTIST,
    album: segmentSafe(tags.album) || UNKNOWN_ALBUM,
    title: segmentSafe(tags.title) || segmentSafe(tags.filename),
    albumartist: segmentSafe(tags.albumartist),
    year: segmentSafe(tags.year),
    track: segmentSafe(tags.track),
    genre: segmentSafe(tags.genre),
    filename: segmentSafe(tags.filename),
  };

  const rendered = Mustache.render(mask, view, {}, { escape: (value: unknown) => String(value) });
  const key = rendered
    .split('/')
    .filter((segment) => segment.length > 0)
    .join('/');

  if (!key) {
    throw new InvalidValueError(`Sort mask '${mask}' rendered an empty key`, { mask });
  }
  return key;
}

export interface TrackConverterDeps {
  logger?: Logger;
  tagReader?: (filePath: string) => Promise<TrackTags>;
}

export async function convertTrack(
  localPath: string,
  mask: string,
  deps?: TrackConverterDeps,
): Promise<SortedTrack> {
  const log = (deps?.logger ?? rootLogger).child({ component: 'TrackConverter' });
  const tags = await (deps?.tagReader ?? readTags)(localPath);
  log.debug({ localPath, tags }, `Tags found for '${localPath}'`);

  const targetKey = renderTargetKey(mask, tags);
  log.info({ localPath, targetKey }, `Target path: ${targetKey}`);
  return { localPath, targetKey, tags };
}
