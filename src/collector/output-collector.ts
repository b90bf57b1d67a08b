/**
 * Output Collector
 *
 * Finds the program's outputs directly under a search root and relocates
 * each one to the requested destination.
 */

import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import fg from 'fast-glob';
import { ConfigurationError } from '../errors/index.js';
import type { StorageAdapter } from '../storage/adapter.js';
import { formatLocation } from '../storage/locator.js';
import type { CollectedArtifact, Location } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('collector');

export const DEFAULT_OUTPUT_PATTERNS: readonly string[] = ['*_EntRemove*.xlsx'];

export interface CollectOptions {
  signal?: AbortSignal;
}

/**
 * File names directly under root matching any pattern, sorted.
 * Matching is case-sensitive and never descends into subdirectories.
 */
export async function findOutputs(root: string, patterns: readonly string[]): Promise<string[]> {
  const nested = patterns.filter((pattern) => pattern.includes('/'));
  if (nested.length > 0) {
    throw new ConfigurationError(nested.map((pattern) => `output pattern must not contain "/": ${pattern}`));
  }

  const names = await fg([...patterns], {
    cwd: root,
    deep: 1,
    onlyFiles: true,
    caseSensitiveMatch: true,
    followSymbolicLinks: false,
    dot: false,
  });
  return names.sort();
}

export class OutputCollector {
  constructor(private readonly storage: StorageAdapter) {}

  /**
   * Collect matching outputs. Without a destination they are reported as
   * local-only. Relocation failures are recorded per artifact and never
   * abort the rest of the batch.
   */
  async collect(
    searchRoot: string,
    patterns: readonly string[],
    destination: Location | null,
    options: CollectOptions = {}
  ): Promise<CollectedArtifact[]> {
    const names = await findOutputs(searchRoot, patterns);
    log.info({ searchRoot, patterns, matched: names.length }, 'Scanned for outputs');
    options.signal?.throwIfAborted();

    const artifacts: CollectedArtifact[] = [];
    if (names.length === 0) {
      return artifacts;
    }

    const collected = await Promise.all(
      names.map((fileName) => this.collectOne(join(searchRoot, fileName), fileName, destination))
    );
    artifacts.push(...collected);

    const failed = artifacts.filter((a) => !a.success).length;
    if (failed > 0) {
      log.warn(
        { destination: destination ? formatLocation(destination) : null, failed, total: artifacts.length },
        'Some artifacts could not be relocated'
      );
    }

    return artifacts;
  }

  private async collectOne(
    sourcePath: string,
    fileName: string,
    destination: Location | null
  ): Promise<CollectedArtifact> {
    const { size } = await stat(sourcePath);

    if (!destination) {
      return Object.freeze({
        fileName,
        sourcePath,
        destination: null,
        relocated: false,
        success: true,
        error: null,
        sizeBytes: size,
      });
    }

    const stored = await this.storage.store(sourcePath, destination);
    return Object.freeze({
      fileName,
      sourcePath,
      destination: stored.destination,
      relocated: stored.success,
      success: stored.success,
      error: stored.error,
      sizeBytes: size,
    });
  }
}
