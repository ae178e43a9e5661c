import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';

import { readEnvFile } from './env.js';

// Read config values from .env (falls back to process.env).
const envConfig = readEnvFile([
  'SORTIE_CONFIG',
  'CONTAINER_IMAGE',
  'CONTAINER_MOUNT_DIR',
  'LOG_LEVEL',
]);

// The project root is one level above src/ (or dist/ once built).
export const PROJECT_ROOT = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '..',
);
const HOME_DIR = process.env.HOME || os.homedir();

export const LOG_LEVEL = process.env.LOG_LEVEL || envConfig.LOG_LEVEL || 'info';

export const SETTINGS_PATH = path.resolve(
  process.env.SORTIE_CONFIG ||
    envConfig.SORTIE_CONFIG ||
    path.join(PROJECT_ROOT, 'conf', 'sortie.ini'),
);

export const CONTAINER_IMAGE =
  process.env.CONTAINER_IMAGE || envConfig.CONTAINER_IMAGE || 'sortie:latest';
export const CONTAINER_MOUNT_DIR =
  process.env.CONTAINER_MOUNT_DIR || envConfig.CONTAINER_MOUNT_DIR || '/opt/sortie';
export const DOCKERFILE_PATH = path.join(PROJECT_ROOT, 'container', 'Dockerfile');
export const AWS_CONFIG_DIR = path.join(HOME_DIR, '.aws');
export const CONTAINER_AWS_DIR = '/root/.aws';

export const TRACK_EXTENSION = '.mp3';

/** Upload retry policy (lib-storage already retries individual parts). */
export const UPLOAD_RETRY = {
  maxRetries: 3,
  delay: 1000,
  backoff: 2,
} as const;
