/**
 * Storage Adapter
 *
 * Uniform fetch/store/list over the local filesystem and object storage.
 * The only component that touches a physical storage backend.
 */

import { copyFile, mkdir, rm } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import type { Logger } from 'pino';
import {
  InvalidLocatorError,
  RelocationFailedError,
  StorageUnavailableError,
} from '../errors/index.js';
import type { Location, StorageLocator } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { childLocator, formatLocation, formatLocator, locatorBasename } from './locator.js';
import type { RequestOptions, ObjectStore, StoreResult } from './types.js';

export class StorageAdapter {
  private readonly stores = new Map<string, ObjectStore>();
  private readonly logger: Logger = createLogger('storage');

  constructor(stores: ObjectStore[] = []) {
    for (const store of stores) {
      this.register(store);
    }
  }

  register(store: ObjectStore): void {
    this.stores.set(store.scheme.toLowerCase(), store);
  }

  /**
   * Download an object into a directory, keeping its base name.
   * Every call reaches the backend; nothing is cached.
   */
  async fetch(locator: StorageLocator, intoDir: string, options?: RequestOptions): Promise<string> {
    const uri = formatLocator(locator);
    const name = locatorBasename(locator);
    if (!name) {
      throw new InvalidLocatorError(uri, 'key does not name an object');
    }

    const store = this.storeFor(locator);
    await mkdir(intoDir, { recursive: true });
    const destPath = join(intoDir, name);

    const startTime = Date.now();
    try {
      await store.download(locator, destPath, options);
    } catch (error) {
      // Drop any partial file; the caller sees only the original failure
      await rm(destPath, { force: true });
      throw error;
    }

    this.logger.info({ uri, destPath, durationMs: Date.now() - startTime }, 'Fetched object');
    return destPath;
  }

  /**
   * Place a local file under a destination directory or prefix, preserving
   * only its base name. Never throws.
   */
  async store(localPath: string, destination: Location): Promise<StoreResult> {
    const fileName = basename(localPath);
    const target = this.targetFor(fileName, destination);

    try {
      if (destination.kind === 'local') {
        await mkdir(destination.path, { recursive: true });
        if (resolve(localPath) !== resolve(target)) {
          await copyFile(localPath, target);
        }
      } else {
        const locator = childLocator(destination.locator, fileName);
        await this.storeFor(locator).upload(localPath, locator);
      }
    } catch (error) {
      const failure = new RelocationFailedError(fileName, target, error);
      this.logger.warn({ fileName, destination: target, err: error }, 'Failed to store file');
      return { success: false, destination: target, error: failure.message };
    }

    this.logger.info({ fileName, destination: target }, 'Stored file');
    return { success: true, destination: target, error: null };
  }

  /**
   * List objects under a prefix. Diagnostics only.
   */
  async list(prefix: StorageLocator, options?: RequestOptions): Promise<StorageLocator[]> {
    return this.storeFor(prefix).list(prefix, options);
  }

  private targetFor(fileName: string, destination: Location): string {
    if (destination.kind === 'local') {
      return join(destination.path, fileName);
    }
    return formatLocation({ kind: 'storage', locator: childLocator(destination.locator, fileName) });
  }

  private storeFor(locator: StorageLocator): ObjectStore {
    const store = this.stores.get(locator.scheme);
    if (!store) {
      throw new StorageUnavailableError(
        formatLocator(locator),
        `no backend registered for scheme "${locator.scheme}"`
      );
    }
    return store;
  }
}
