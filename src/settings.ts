/**
 * Settings file loader. The file is INI with the sections
 * [aws] [bucket] [logging] [ingestion] [cache] [targeting].
 */
import fs from 'fs';
import path from 'path';
import ini from 'ini';

import {
  ConfigFileNotFoundError,
  ConfigMissingKeyError,
  InvalidValueError,
} from './errors.js';

export const INGESTION_MODES = ['track_list', 'dynamic', 'cache'] as const;
export type IngestionMode = (typeof INGESTION_MODES)[number];

export type Ingestion =
  | { mode: 'track_list'; trackList: string }
  | { mode: 'dynamic' }
  | { mode: 'cache' };

/** Verbosity channels: 1 fatal, 2 info, 3 warn, 4 debug. */
export type Verbosity = 1 | 2 | 3 | 4;

export interface LoggingSettings {
  logToFile: boolean;
  level: Verbosity;
  logFile: string | null;
}

export interface Settings {
  path: string;
  aws: { profile: string; region: string | null };
  bucket: string;
  logging: LoggingSettings;
  ingestion: Ingestion;
  cache: { directory: string; persistent: boolean };
  targeting: { sortMask: string; cleanUp: boolean };
}

const TRUE_VALUES = new Set(['y', 'yes', 't', 'true', 'on', '1']);
const FALSE_VALUES = new Set(['n', 'no', 'f', 'false', 'off', '0']);

export function parseBoolean(value: string, label = 'value'): boolean {
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  throw new InvalidValueError(`Invalid boolean for ${label}: '${value}'`, { label, value });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isIngestionMode(value: string): value is IngestionMode {
  const modes: readonly string[] = INGESTION_MODES;
  return modes.includes(value);
}

function isVerbosity(value: number): value is Verbosity {
  return value === 1 || value === 2 || value === 3 || value === 4;
}

/** Typed access to a parsed INI document that fails loudly on missing keys. */
class IniReader {
  constructor(
    private readonly doc: Record<string, unknown>,
    private readonly filePath: string,
  ) {}

  get(section: string, key: string): string {
    const value = this.optional(section, key);
    if (value === null) {
      throw new ConfigMissingKeyError(section, key, this.filePath);
    }
    return value;
  }

  optional(section: string, key: string): string | null {
    const block = this.doc[section];
    if (!isRecord(block)) return null;
    const value = block[key];
    // ini turns bare true/false into booleans
    if (typeof value === 'boolean') return String(value);
    if (typeof value === 'string') return value;
    return null;
  }

  bool(section: string, key: string): boolean {
    return parseBoolean(this.get(section, key), `${section}.${key}`);
  }

  path(section: string, key: string): string {
    return path.resolve(path.dirname(this.filePath), this.get(section, key));
  }
}

export function loadSettings(filePath: string): Settings {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    throw new ConfigFileNotFoundError(resolved);
  }

  const doc: unknown = ini.parse(fs.readFileSync(resolved, 'utf-8'));
  const reader = new IniReader(isRecord(doc) ? doc : {}, resolved);

  const profile = reader.get('aws', 'environment');
  const bucket = reader.get('bucket', 'name');
  const logToFile = reader.bool('logging', 'log_to_file');
  const rawLevel = reader.get('logging', 'logging_level');
  const level = Number(rawLevel);
  if (!Number.isInteger(level) || !isVerbosity(level)) {
    throw new InvalidValueError(
      `logging.logging_level must be an integer from 1 to 4, got '${rawLevel}'`,
      { value: rawLevel },
    );
  }

  const mode = reader.get('ingestion', 'mode');
  let ingestion: Ingestion;
  if (!isIngestionMode(mode)) {
    throw new InvalidValueError(
      `Unknown ingestion mode '${mode}'. Expected one of: ${INGESTION_MODES.join(', ')}`,
      { mode },
    );
  } else if (mode === 'track_list') {
    ingestion = { mode, trackList: reader.path('ingestion', 'track_list') };
  } else {
    ingestion = { mode };
  }

  return {
    path: resolved,
    aws: {
      profile,
      region: reader.optional('aws', 'region'),
    },
    bucket,
    logging: {
      logToFile,
      level,
      logFile: logToFile ? reader.path('logging', 'log_file') : null,
    },
    ingestion,
    cache: {
      directory: reader.path('cache', 'directory'),
      persistent: reader.bool('cache', 'persistent'),
    },
    targeting: {
      sortMask: reader.get('targeting', 'sort_mask'),
      cleanUp: reader.bool('targeting', 'clean_up'),
    },
  };
}
