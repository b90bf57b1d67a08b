import { posix, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { InvalidLocatorError } from '../errors/index.js';
import type { Location, StorageLocator } from '../types/index.js';

export const DEFAULT_SCHEME = 's3';

const URI_PATTERN = /^([a-z][a-z0-9+.-]*):\/\/([^/]*)(?:\/(.*))?$/i;

/**
 * Whether a value is an object-storage URI. file:// URIs are local paths.
 */
export function isStorageUri(value: string): boolean {
  const match = URI_PATTERN.exec(value);
  return match !== null && match[1]?.toLowerCase() !== 'file';
}

/**
 * Parse scheme://bucket/key. The canonical form has a lowercase scheme and
 * no trailing slash after a bare bucket.
 */
export function parseLocator(uri: string): StorageLocator {
  const match = URI_PATTERN.exec(uri.trim());
  if (!match) {
    throw new InvalidLocatorError(uri, 'expected scheme://bucket/key');
  }

  const [, scheme = '', bucket = '', key = ''] = match;
  if (scheme.toLowerCase() === 'file') {
    throw new InvalidLocatorError(uri, 'file URIs are local paths');
  }
  if (!bucket) {
    throw new InvalidLocatorError(uri, 'missing bucket');
  }

  return Object.freeze({ scheme: scheme.toLowerCase(), bucket, key });
}

export function formatLocator(locator: StorageLocator): string {
  const base = `${locator.scheme}://${locator.bucket}`;
  return locator.key ? `${base}/${locator.key}` : base;
}

/**
 * Build a locator from a caller-supplied key: either a full URI, or a bare
 * key combined with a bucket.
 */
export function locatorFromKey(
  key: string,
  bucket: string | undefined,
  scheme: string = DEFAULT_SCHEME
): StorageLocator {
  if (isStorageUri(key)) {
    return parseLocator(key);
  }
  if (!bucket) {
    throw new InvalidLocatorError(key, 'a bare key requires a bucket');
  }
  const trimmed = key.replace(/^\/+/, '');
  if (!trimmed) {
    throw new InvalidLocatorError(key, 'empty key');
  }
  return Object.freeze({ scheme, bucket, key: trimmed });
}

/**
 * Last path segment of the key, or null when the key names a "directory".
 */
export function locatorBasename(locator: StorageLocator): string | null {
  if (!locator.key || locator.key.endsWith('/')) {
    return null;
  }
  const name = posix.basename(locator.key);
  return name === '.' || name === '..' ? null : name;
}

/**
 * Locator for a file placed under a prefix, preserving only its base name.
 */
export function childLocator(prefix: StorageLocator, fileName: string): StorageLocator {
  let key: string;
  if (!prefix.key) {
    key = fileName;
  } else if (prefix.key.endsWith('/')) {
    key = `${prefix.key}${fileName}`;
  } else {
    key = `${prefix.key}/${fileName}`;
  }
  return Object.freeze({ scheme: prefix.scheme, bucket: prefix.bucket, key });
}

/**
 * Classify a destination or reference string once, at the boundary.
 */
export function parseLocation(value: string): Location {
  const trimmed = value.trim();
  if (isStorageUri(trimmed)) {
    return { kind: 'storage', locator: parseLocator(trimmed) };
  }
  if (/^file:\/\//i.test(trimmed)) {
    return { kind: 'local', path: fileURLToPath(trimmed) };
  }
  return { kind: 'local', path: resolve(trimmed) };
}

export function formatLocation(location: Location): string {
  return location.kind === 'storage' ? formatLocator(location.locator) : location.path;
}
