/**
 * ITrackStore — the remote side of a sort run: one bucket of objects.
 * The sorter depends on this interface; S3TrackStore is the real one.
 */
export interface ITrackStore {
  /** Name of the bucket (or equivalent) this store works on. */
  readonly bucket: string;

  /** Every object key in the bucket. */
  listKeys(): Promise<string[]>;

  /** Fetch an object into a local file. */
  download(key: string, localPath: string): Promise<void>;

  /** Store a local file under the given key. */
  upload(localPath: string, key: string): Promise<void>;

  /** Remove an object. */
  delete(key: string): Promise<void>;
}
