/**
 * Input Resolver
 *
 * Binds every input slot of a run to a local file under the workspace.
 * Storage keys win over local paths unless the dual-source policy rejects
 * the ambiguity outright.
 */

import { constants } from 'node:fs';
import { access, copyFile, mkdir, stat } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import { AmbiguousInputError, MissingInputError, NotFoundError } from '../errors/index.js';
import type { StorageAdapter } from '../storage/adapter.js';
import { formatLocator, locatorFromKey } from '../storage/locator.js';
import {
  DualSourcePolicy,
  INPUT_SLOTS,
  InputProvenance,
  InputSlot,
  type Location,
  type ResolvedInput,
  type ResolvedInputs,
  type RunParameters,
  type SlotSource,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import type { Workspace } from '../workspace/manager.js';

const log = createLogger('resolver');

export interface InputResolverOptions {
  /** Whether the program contract demands a template */
  templateRequired: boolean;
  dualSourcePolicy: DualSourcePolicy;
  /** Copy local inputs into the workspace instead of binding them in place */
  stageLocalInputs: boolean;
}

/**
 * Pick the effective source of one slot, or null when none was given.
 */
export function selectSource(
  slot: InputSlot,
  source: SlotSource,
  bucket: string | undefined,
  policy: DualSourcePolicy
): Location | null {
  if (source.key !== undefined) {
    if (source.path !== undefined) {
      if (policy === DualSourcePolicy.REJECT) {
        throw new AmbiguousInputError(slot, source.path, source.key);
      }
      log.warn({ slot, path: source.path, key: source.key }, 'Both path and key given; using key');
    }
    return { kind: 'storage', locator: locatorFromKey(source.key, bucket) };
  }
  if (source.path !== undefined) {
    return { kind: 'local', path: resolve(source.path) };
  }
  return null;
}

export class InputResolver {
  constructor(
    private readonly storage: StorageAdapter,
    private readonly options: InputResolverOptions
  ) {}

  isRequired(slot: InputSlot): boolean {
    return slot !== InputSlot.TEMPLATE || this.options.templateRequired;
  }

  /**
   * Resolve all slots concurrently. All-or-nothing: the first failure aborts
   * the remaining fetches, and is rethrown once they have settled.
   */
  async resolve(params: RunParameters, workspace: Workspace, signal?: AbortSignal): Promise<ResolvedInputs> {
    // Selection never touches storage, so configuration errors surface before any fetch
    const selections: Array<[InputSlot, Location]> = [];
    for (const slot of INPUT_SLOTS) {
      const location = selectSource(slot, params[slot], params.bucket, this.options.dualSourcePolicy);
      if (location) {
        selections.push([slot, location]);
      } else if (this.isRequired(slot)) {
        throw new MissingInputError(slot);
      } else {
        log.debug({ slot }, 'Optional input not supplied');
      }
    }

    signal?.throwIfAborted();

    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    const failure: { failed: boolean; error?: unknown } = { failed: false };

    try {
      const settled = await Promise.allSettled(
        selections.map(async ([slot, location]) => {
          try {
            return await this.resolveSlot(slot, location, workspace, controller.signal);
          } catch (error) {
            if (!failure.failed) {
              failure.failed = true;
              failure.error = error;
              controller.abort();
            }
            throw error;
          }
        })
      );

      if (failure.failed) {
        log.warn({ err: failure.error }, 'Input resolution failed');
        throw failure.error;
      }

      const resolved: Partial<Record<InputSlot, ResolvedInput>> = {};
      for (const outcome of settled) {
        if (outcome.status === 'fulfilled') {
          resolved[outcome.value.slot] = outcome.value;
        }
      }
      return Object.freeze(resolved);
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private async resolveSlot(
    slot: InputSlot,
    location: Location,
    workspace: Workspace,
    signal: AbortSignal
  ): Promise<ResolvedInput> {
    const slotDir = join(workspace.inputsDir, slot);

    if (location.kind === 'storage') {
      const source = formatLocator(location.locator);
      const path = await this.storage.fetch(location.locator, slotDir, { signal });
      log.info({ slot, source, path }, 'Resolved input from storage');
      return Object.freeze({ slot, path, provenance: InputProvenance.STORAGE, source });
    }

    const source = location.path;
    await assertReadableFile(source);
    signal.throwIfAborted();

    let path = source;
    if (this.options.stageLocalInputs) {
      await mkdir(slotDir, { recursive: true });
      path = join(slotDir, basename(source));
      await copyFile(source, path);
    }

    log.info({ slot, source, path }, 'Resolved local input');
    return Object.freeze({ slot, path, provenance: InputProvenance.LOCAL, source });
  }
}

async function assertReadableFile(path: string): Promise<void> {
  try {
    await access(path, constants.R_OK);
    const stats = await stat(path);
    if (!stats.isFile()) {
      throw new NotFoundError(`${path} (not a regular file)`);
    }
  } catch (error) {
    if (error instanceof NotFoundError) {
      throw error;
    }
    throw new NotFoundError(path, error);
  }
}
