import fs from 'fs';
import os from 'os';
import path from 'path';
import pino from 'pino';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { InvalidValueError } from '../errors.js';
import type { ITrackStore } from '../interfaces/track-store.js';
import { TrackCache } from './TrackCache.js';
import { listTracks, readTrackListFile } from './TrackLister.js';

const silent = pino({ level: 'silent' });

function createMockStore(keys: string[] = []): ITrackStore {
  return {
    bucket: 'test-bucket',
    listKeys: vi.fn(async () => keys),
    download: vi.fn(async () => undefined),
    upload: vi.fn(async () => undefined),
    delete: vi.fn(async () => undefined),
  };
}

let tmpDir: string;
let cache: TrackCache;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sortie-lister-'));
  cache = new TrackCache(path.join(tmpDir, 'cache'), silent);
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('readTrackListFile', () => {
  it('keeps only .mp3 entries from the input array', () => {
    const file = path.join(tmpDir, 'tracks.json');
    fs.writeFileSync(
      file,
      JSON.stringify({ input: ['in/a.mp3', 'in/notes.txt', 'in/b.mp3', 'in/c.MP3', 42] }),
    );
    expect(readTrackListFile(file)).toEqual(['in/a.mp3', 'in/b.mp3']);
  });

  it('rejects JSON without an input array', () => {
    const file = path.join(tmpDir, 'tracks.json');
    fs.writeFileSync(file, JSON.stringify({ tracks: ['a.mp3'] }));
    expect(() => readTrackListFile(file)).toThrow(
      `Track list file must be JSON with an "input" array: ${file}`,
    );
  });

  it('rejects malformed JSON', () => {
    const file = path.join(tmpDir, 'tracks.json');
    fs.writeFileSync(file, '{ "input": [');
    expect(() => readTrackListFile(file)).toThrow(InvalidValueError);
  });

  it('rejects a missing file', () => {
    const file = path.join(tmpDir, 'missing.json');
    expect(() => readTrackListFile(file)).toThrow(`Track list file cannot be read: ${file}`);
  });
});

describe('listTracks', () => {
  it('reads the track list file in track_list mode', async () => {
    const file = path.join(tmpDir, 'tracks.json');
    fs.writeFileSync(file, JSON.stringify({ input: ['in/a.mp3'] }));
    const store = createMockStore();

    const tracks = await listTracks(
      { mode: 'track_list', trackList: file },
      { store, cache, logger: silent },
    );

    expect(tracks).toEqual(['in/a.mp3']);
    expect(store.listKeys).not.toHaveBeenCalled();
  });

  it('lists track keys from the store in dynamic mode', async () => {
    const store = createMockStore([
      'incoming/',
      'incoming/a.mp3',
      'incoming/cover.jpg',
      'b.mp3',
      'odd.mp3/',
    ]);

    const tracks = await listTracks({ mode: 'dynamic' }, { store, cache, logger: silent });

    expect(tracks).toEqual(['incoming/a.mp3', 'b.mp3']);
    expect(store.listKeys).toHaveBeenCalledTimes(1);
  });

  it('lists cached files in cache mode', async () => {
    cache.ensure();
    fs.writeFileSync(path.join(cache.directory, 'x.mp3'), '');
    fs.writeFileSync(path.join(cache.directory, 'x.txt'), '');
    const store = createMockStore(['ignored.mp3']);

    const tracks = await listTracks({ mode: 'cache' }, { store, cache, logger: silent });

    expect(tracks).toEqual(['x.mp3']);
    expect(store.listKeys).not.toHaveBeenCalled();
  });
});
