/**
 * Storage Types
 *
 * Abstract interface for object-storage backends. The Storage Adapter routes
 * each locator to the backend registered for its scheme.
 */

import type { StorageLocator } from '../types/index.js';

export interface RequestOptions {
  /** Cooperative cancellation */
  signal?: AbortSignal;
}

/**
 * A single object-storage backend.
 *
 * Implementations throw NotFoundError for absent objects and
 * StorageUnavailableError when the backend cannot be reached.
 */
export interface ObjectStore {
  /** URI scheme served by this backend (e.g. "s3") */
  readonly scheme: string;

  /**
   * Write the object to a local file, replacing it if present.
   */
  download(locator: StorageLocator, destPath: string, options?: RequestOptions): Promise<void>;

  /**
   * Upload a local file as the object at the locator.
   */
  upload(sourcePath: string, locator: StorageLocator): Promise<void>;

  /**
   * List object locators whose keys start with the prefix key.
   */
  list(prefix: StorageLocator, options?: RequestOptions): Promise<StorageLocator[]>;
}

/**
 * Outcome of placing a file at a destination. Failures are values, not throws.
 */
export interface StoreResult {
  success: boolean;
  /** Canonical destination of the stored file */
  destination: string;
  error: string | null;
}
