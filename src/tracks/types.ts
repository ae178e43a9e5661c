/** Tag values read from a track. Absent tags are null. */
export interface TrackTags {
  artist: string | null;
  album: string | null;
  title: string | null;
  albumartist: string | null;
  year: number | null;
  track: number | null;
  genre: string | null;
  /** File name without directory or extension. */
  filename: string;
}

/** A cached track and the key it will be stored under. */
export interface SortedTrack {
  localPath: string;
  targetKey: string;
  tags: TrackTags;
}
