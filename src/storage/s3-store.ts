import { createReadStream, createWriteStream } from 'node:fs';
import { stat, writeFile } from 'node:fs/promises';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import {
  GetObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import {
  NotFoundError,
  StorageUnavailableError,
  describeError,
} from '../errors/index.js';
import type { StorageLocator } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { formatLocator } from './locator.js';
import type { RequestOptions, ObjectStore } from './types.js';

const log = createLogger('storage:s3');

const NOT_FOUND_NAMES = new Set(['NoSuchKey', 'NotFound', 'NoSuchBucket']);

export interface S3ObjectStoreOptions {
  client?: S3Client;
  region?: string;
  endpoint?: string;
  forcePathStyle?: boolean;
}

function httpStatusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('$metadata' in error)) {
    return undefined;
  }
  const metadata = error.$metadata;
  if (typeof metadata !== 'object' || metadata === null || !('httpStatusCode' in metadata)) {
    return undefined;
  }
  return typeof metadata.httpStatusCode === 'number' ? metadata.httpStatusCode : undefined;
}

/**
 * Map an SDK failure onto the storage error taxonomy. Aborts pass through
 * untouched so cancellation is not mistaken for an outage.
 */
export function toStorageError(error: unknown, reference: string): Error {
  if (error instanceof Error && error.name === 'AbortError') {
    return error;
  }
  if ((error instanceof Error && NOT_FOUND_NAMES.has(error.name)) || httpStatusOf(error) === 404) {
    return new NotFoundError(reference, error);
  }
  return new StorageUnavailableError(reference, describeError(error), error);
}

/**
 * Amazon S3 (or S3-compatible) backend.
 */
export class S3ObjectStore implements ObjectStore {
  readonly scheme = 's3';
  private readonly client: S3Client;

  constructor(options: S3ObjectStoreOptions = {}) {
    if (options.client) {
      this.client = options.client;
      return;
    }

    const config: S3ClientConfig = {
      region: options.region ?? process.env['AWS_REGION'] ?? 'us-east-1',
    };
    if (options.endpoint) {
      config.endpoint = options.endpoint;
      config.forcePathStyle = options.forcePathStyle ?? true;
    } else if (options.forcePathStyle !== undefined) {
      config.forcePathStyle = options.forcePathStyle;
    }
    this.client = new S3Client(config);
  }

  async download(locator: StorageLocator, destPath: string, options?: RequestOptions): Promise<void> {
    const uri = formatLocator(locator);
    log.debug({ uri, destPath }, 'Downloading object');

    const signal = options?.signal;
    const requestOptions = signal ? { abortSignal: signal } : {};

    try {
      signal?.throwIfAborted();
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: locator.bucket, Key: locator.key }),
        requestOptions
      );
      const body = response.Body;
      if (!body) {
        throw new NotFoundError(uri);
      }
      if (body instanceof Readable) {
        await pipeline(body, createWriteStream(destPath), signal ? { signal } : {});
      } else {
        // Non-Node runtimes hand back a web stream or blob
        await writeFile(destPath, await body.transformToByteArray(), signal ? { signal } : {});
      }
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw error;
      }
      throw toStorageError(error, uri);
    }
  }

  async upload(sourcePath: string, locator: StorageLocator): Promise<void> {
    const uri = formatLocator(locator);
    const { size } = await stat(sourcePath);
    log.debug({ uri, sourcePath, size }, 'Uploading object');

    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: locator.bucket,
          Key: locator.key,
          Body: createReadStream(sourcePath),
          ContentLength: size,
        })
      );
    } catch (error) {
      throw toStorageError(error, uri);
    }
  }

  async list(prefix: StorageLocator, options?: RequestOptions): Promise<StorageLocator[]> {
    const results: StorageLocator[] = [];
    const requestOptions = options?.signal ? { abortSignal: options.signal } : {};
    let continuationToken: string | undefined;

    try {
      do {
        const response = await this.client.send(
          new ListObjectsV2Command({
            Bucket: prefix.bucket,
            Prefix: prefix.key,
            ...(continuationToken ? { ContinuationToken: continuationToken } : {}),
          }),
          requestOptions
        );
        for (const object of response.Contents ?? []) {
          if (object.Key) {
            results.push({ scheme: this.scheme, bucket: prefix.bucket, key: object.Key });
          }
        }
        continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
      } while (continuationToken);
    } catch (error) {
      throw toStorageError(error, formatLocator(prefix));
    }

    return results;
  }
}
