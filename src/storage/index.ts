import type { StorageConfig } from '../config/index.js';
import { StorageAdapter } from './adapter.js';
import { S3ObjectStore } from './s3-store.js';

export { StorageAdapter } from './adapter.js';
export { MemoryObjectStore } from './memory-store.js';
export { S3ObjectStore, toStorageError, type S3ObjectStoreOptions } from './s3-store.js';
export * from './locator.js';
export type { ObjectStore, StoreResult, RequestOptions } from './types.js';

/**
 * Adapter wired with the S3 backend from configuration.
 */
export function createStorageAdapter(config: StorageConfig): StorageAdapter {
  return new StorageAdapter([
    new S3ObjectStore({
      region: config.region,
      ...(config.forcePathStyle ? { forcePathStyle: true } : {}),
      ...(config.endpoint ? { endpoint: config.endpoint } : {}),
    }),
  ]);
}
