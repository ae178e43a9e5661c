/**
 * Sorter — one pass over a bucket: list, cache, tag, re-upload, clean up.
 */
import path from 'path';

import { logger as rootLogger, type Logger } from './logger.js';
import type { ITrackStore } from './interfaces/track-store.js';
import type { IngestionMode, Settings } from './settings.js';
import { TrackCache } from './tracks/TrackCache.js';
import { convertTrack } from './tracks/TrackConverter.js';
import { listTracks } from './tracks/TrackLister.js';
import type { SortedTrack, TrackTags } from './tracks/types.js';

export interface RunSummary {
  mode: IngestionMode;
  listed: number;
  downloaded: number;
  /** Target keys, in upload order. */
  uploaded: string[];
  deleted: number;
  cacheCleared: boolean;
}

export interface SorterDeps {
  store: ITrackStore;
  logger?: Logger;
  cache?: TrackCache;
  tagReader?: (filePath: string) => Promise<TrackTags>;
}

export class Sorter {
  private readonly store: ITrackStore;
  private readonly logger: Logger;
  private readonly log: Logger;
  private readonly cache: TrackCache;
  private readonly tagReader?: (filePath: string) => Promise<TrackTags>;

  constructor(
    private readonly settings: Settings,
    deps: SorterDeps,
  ) {
    this.store = deps.store;
    this.logger = deps.logger ?? rootLogger;
    this.log = this.logger.child({ component: 'sortie' });
    this.cache = deps.cache ?? new TrackCache(settings.cache.directory, this.logger);
    this.tagReader = deps.tagReader;
  }

  async run(): Promise<RunSummary> {
    const { ingestion, targeting, cache: cacheSettings } = this.settings;
    this.log.info({ bucket: this.store.bucket, mode: ingestion.mode }, 'new run started');

    this.cache.ensure();

    const sources = await listTracks(ingestion, {
      store: this.store,
      cache: this.cache,
      logger: this.logger,
    });

    let downloaded = 0;
    if (ingestion.mode !== 'cache') {
      for (const key of sources) {
        await this.store.download(key, this.cache.localPathFor(key));
        downloaded++;
      }
    }

    const sorted = await this.convertCache(targeting.sortMask);

    const uploaded: string[] = [];
    for (const track of sorted) {
      await this.store.upload(track.localPath, track.targetKey);
      uploaded.push(track.targetKey);
    }

    let deleted = 0;
    if (targeting.cleanUp && ingestion.mode !== 'cache') {
      const targets = new Set(uploaded);
      for (const key of sources) {
        // already at its sorted location; deleting it would drop the upload
        if (targets.has(key)) {
          this.log.debug({ key }, 'source is its own target, kept');
          continue;
        }
        await this.store.delete(key);
        deleted++;
      }
    }

    const cacheCleared = !cacheSettings.persistent;
    if (cacheCleared) {
      this.cache.clear();
    }

    this.log.info({ uploaded: uploaded.length, deleted }, 'run completed');

    return {
      mode: ingestion.mode,
      listed: sources.length,
      downloaded,
      uploaded,
      deleted,
      cacheCleared,
    };
  }

  /** Everything in the local cache, converted to its target key. */
  private async convertCache(mask: string): Promise<SortedTrack[]> {
    const sorted: SortedTrack[] = [];
    for (const relative of this.cache.list()) {
      this.log.info({ track: relative }, `Cache Found: ${relative}`);
      const localPath = path.join(this.cache.directory, relative);
      sorted.push(
        await convertTrack(localPath, mask, { logger: this.logger, tagReader: this.tagReader }),
      );
    }
    return sorted;
  }
}
