/**
 * In-process object store.
 *
 * Serves a URI scheme from a Map; used for dry runs and as the test stand-in
 * for S3.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { NotFoundError, StorageUnavailableError } from '../errors/index.js';
import type { StorageLocator } from '../types/index.js';
import { formatLocator, parseLocator } from './locator.js';
import type { RequestOptions, ObjectStore } from './types.js';

export class MemoryObjectStore implements ObjectStore {
  readonly scheme: string;

  private readonly objects = new Map<string, Buffer>();
  private available = true;

  constructor(scheme = 's3') {
    this.scheme = scheme;
  }

  /**
   * Seed or overwrite an object.
   */
  put(uri: string, content: string | Buffer): void {
    const locator = parseLocator(uri);
    this.objects.set(formatLocator(locator), typeof content === 'string' ? Buffer.from(content) : content);
  }

  get(uri: string): Buffer | undefined {
    return this.objects.get(formatLocator(parseLocator(uri)));
  }

  keys(): string[] {
    return [...this.objects.keys()].sort();
  }

  /**
   * Simulate the backend going away (or coming back).
   */
  setAvailable(available: boolean): void {
    this.available = available;
  }

  async download(locator: StorageLocator, destPath: string, options?: RequestOptions): Promise<void> {
    const uri = this.ensureAvailable(locator);
    const content = this.objects.get(uri);
    if (!content) {
      throw new NotFoundError(uri);
    }
    await writeFile(destPath, content, options?.signal ? { signal: options.signal } : {});
  }

  async upload(sourcePath: string, locator: StorageLocator): Promise<void> {
    const uri = this.ensureAvailable(locator);
    const content = await readFile(sourcePath);
    this.objects.set(uri, content);
  }

  list(prefix: StorageLocator, options?: RequestOptions): Promise<StorageLocator[]> {
    try {
      options?.signal?.throwIfAborted();
      this.ensureAvailable(prefix);
    } catch (error) {
      return Promise.reject(error);
    }

    const matches = [...this.objects.keys()]
      .map((uri) => parseLocator(uri))
      .filter((locator) => locator.bucket === prefix.bucket && locator.key.startsWith(prefix.key))
      .sort((a, b) => a.key.localeCompare(b.key));

    return Promise.resolve(matches);
  }

  private ensureAvailable(locator: StorageLocator): string {
    const uri = formatLocator(locator);
    if (!this.available) {
      throw new StorageUnavailableError(uri, 'memory store is offline');
    }
    return uri;
  }
}
