/**
 * Parsed form of a storage URI such as s3://bucket/path/to/key.
 */
export interface StorageLocator {
  readonly scheme: string;
  readonly bucket: string;
  /** Object key without a leading slash; empty for a bucket root */
  readonly key: string;
}

export interface LocalLocation {
  readonly kind: 'local';
  readonly path: string;
}

export interface StorageLocation {
  readonly kind: 'storage';
  readonly locator: StorageLocator;
}

/**
 * Where a file lives or should go. Decided once at the resolver boundary so
 * later stages never branch on "is this a URI".
 */
export type Location = LocalLocation | StorageLocation;
