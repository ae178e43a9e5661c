/**
 * S3TrackStore — S3 implementation of ITrackStore.
 */
import fs from 'fs';
import path from 'path';
import {
  DeleteObjectCommand,
  GetObjectCommand,
  S3Client,
  S3ServiceException,
  paginateListObjectsV2,
} from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';

import { UPLOAD_RETRY } from '../config.js';
import { InvalidPermissionsError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import { retry } from '../retry.js';
import type { ITrackStore } from './track-store.js';

export interface S3TrackStoreOptions {
  client: S3Client;
  bucket: string;
  logger?: Logger;
}

export class S3TrackStore implements ITrackStore {
  readonly bucket: string;
  private readonly client: S3Client;
  private readonly log: Logger;

  constructor(opts: S3TrackStoreOptions) {
    this.client = opts.client;
    this.bucket = opts.bucket;
    this.log = (opts.logger ?? rootLogger).child({ component: 'S3 Orchestrator' });
    this.log.debug({ bucket: this.bucket }, 's3 client initialized');
  }

  async listKeys(): Promise<string[]> {
    const keys: string[] = [];
    try {
      const pages = paginateListObjectsV2({ client: this.client }, { Bucket: this.bucket });
      for await (const page of pages) {
        for (const item of page.Contents ?? []) {
          if (item.Key) keys.push(item.Key);
        }
      }
    } catch (err) {
      if (err instanceof S3ServiceException) {
        throw new InvalidPermissionsError(
          `Your user doesn't have access to list objects in S3 bucket '${this.bucket}'`,
          'ListObjectsV2',
          err,
        );
      }
      throw err;
    }
    return keys;
  }

  async download(key: string, localPath: string): Promise<void> {
    this.log.info(
      { key, bucket: this.bucket, localPath },
      `Downloading '${key}' from S3 bucket '${this.bucket}' to '${localPath}'`,
    );

    let bytes: Uint8Array;
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: key }),
      );
      if (!response.Body) {
        throw new Error(`S3 returned no body for '${key}'`);
      }
      bytes = await response.Body.transformToByteArray();
    } catch (err) {
      if (err instanceof S3ServiceException) {
        throw new InvalidPermissionsError(
          `Your user doesn't have access to download '${key}' from the S3 bucket '${this.bucket}'`,
          'GetObject',
          err,
        );
      }
      throw err;
    }

    await fs.promises.mkdir(path.dirname(localPath), { recursive: true });
    await fs.promises.writeFile(localPath, bytes);
  }

  async upload(localPath: string, key: string): Promise<void> {
    this.log.info(
      { localPath, bucket: this.bucket, key },
      `Uploading '${localPath}' to S3 bucket '${this.bucket}' with path '${key}'`,
    );

    await retry(
      async () => {
        // one stream per attempt; a failed attempt must not hold its descriptor open
        const body = fs.createReadStream(localPath);
        try {
          const upload = new Upload({
            client: this.client,
            params: { Bucket: this.bucket, Key: key, Body: body },
          });
          await upload.done();
        } finally {
          body.destroy();
        }
      },
      {
        ...UPLOAD_RETRY,
        // service errors are final
        shouldRetry: (err) => !(err instanceof S3ServiceException),
        logger: this.log,
      },
    );
  }

  async delete(key: string): Promise<void> {
    this.log.warn(
      { key, bucket: this.bucket },
      `Deleting file '${key}' from S3 bucket '${this.bucket}'`,
    );
    await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }));
  }
}
