import pino from 'pino';

import { LOG_LEVEL } from './config.js';
import type { LoggingSettings, Verbosity } from './settings.js';

export type Logger = pino.Logger;

export const logger: Logger = pino({
  level: LOG_LEVEL,
  base: { app: 'sortie' },
  timestamp: pino.stdTimeFunctions.isoTime,
});

// Standard pino levels are kept so every component shares the plain Logger
// type; with them, warnings pass from verbosity 2 up.
const VERBOSITY_LEVELS: Record<Verbosity, pino.Level> = {
  1: 'fatal',
  2: 'info',
  3: 'info',
  4: 'debug',
};

export function levelForVerbosity(verbosity: Verbosity): pino.Level {
  return VERBOSITY_LEVELS[verbosity];
}

/**
 * Logger for a sort run: stdout always, plus an appended log file when the
 * settings ask for one.
 */
export function createRunLogger(settings: LoggingSettings): Logger {
  const level = levelForVerbosity(settings.level);
  const streams: pino.StreamEntry[] = [{ level, stream: process.stdout }];

  if (settings.logToFile && settings.logFile) {
    streams.push({
      level,
      stream: pino.destination({
        dest: settings.logFile,
        append: true,
        mkdir: true,
        sync: true,
      }),
    });
  }

  return pino(
    {
      level,
      base: { app: 'sortie' },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.multistream(streams),
  );
}
