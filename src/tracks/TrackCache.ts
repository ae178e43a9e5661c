import fs from 'fs';
import path from 'path';
import { v5 as uuidv5 } from 'uuid';

import { TRACK_EXTENSION } from '../config.js';
import { logger as rootLogger, type Logger } from '../logger.js';

/** RFC 4122 namespace for ISO OIDs. */
export const OID_NAMESPACE = '6ba7b812-9dad-11d1-80b4-00c04fd430c8';

/**
 * Local working directory for downloaded tracks. Files are named by a
 * name-based UUID of their S3 key, so re-downloading a key overwrites the
 * same file and nested keys land flat in the directory.
 */
export class TrackCache {
  private readonly log: Logger;

  constructor(
    readonly directory: string,
    logger: Logger = rootLogger,
  ) {
    this.log = logger.child({ component: 'TrackCache' });
  }

  ensure(): void {
    fs.mkdirSync(this.directory, { recursive: true });
  }

  localPathFor(key: string): string {
    return path.join(this.directory, `${uuidv5(key, OID_NAMESPACE)}${TRACK_EXTENSION}`);
  }

  /** Track files under the cache, as sorted paths relative to it. */
  list(): string[] {
    if (!fs.existsSync(this.directory)) return [];
    const found: string[] = [];
    const walk = (dir: string): void => {
      for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
        const full = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          walk(full);
        } else if (entry.isFile() && entry.name.endsWith(TRACK_EXTENSION)) {
          found.push(path.relative(this.directory, full));
        }
      }
    };
    walk(this.directory);
    return found.sort();
  }

  clear(): void {
    this.log.warn({ directory: this.directory }, `erasing cache directory '${this.directory}'`);
    fs.rmSync(this.directory, { recursive: true, force: true });
  }
}
