import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { InputResolver } from '../src/resolver/input-resolver.js';
import { StorageAdapter } from '../src/storage/adapter.js';
import { MemoryObjectStore } from '../src/storage/memory-store.js';
import { formatLocator } from '../src/storage/locator.js';
import type { ObjectStore } from '../src/storage/types.js';
import { WorkspaceManager, type Workspace } from '../src/workspace/manager.js';
import {
  AmbiguousInputError,
  InvalidLocatorError,
  MissingInputError,
  NotFoundError,
} from '../src/errors/index.js';
import {
  DualSourcePolicy,
  InputProvenance,
  parseRunParameters,
  type StorageLocator,
} from '../src/types/index.js';
import { TempDirs, writeText } from './helpers.js';

const defaults = {
  templateRequired: true,
  dualSourcePolicy: DualSourcePolicy.PREFER_STORAGE,
  stageLocalInputs: true,
};

/**
 * Store that fails one key and holds every other download until aborted.
 */
class GatedStore implements ObjectStore {
  readonly scheme = 's3';
  readonly aborted: string[] = [];

  constructor(private readonly missingKey: string) {}

  download(locator: StorageLocator, _destPath: string, options?: { signal?: AbortSignal }): Promise<void> {
    if (locator.key === this.missingKey) {
      return Promise.reject(new NotFoundError(formatLocator(locator)));
    }
    const signal = options?.signal;
    if (!signal) {
      return Promise.reject(new Error('download started without a signal'));
    }
    return new Promise((_resolve, reject) => {
      const onAbort = (): void => {
        this.aborted.push(locator.key);
        reject(new Error(`aborted ${locator.key}`));
      };
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
    });
  }

  upload(): Promise<void> {
    return Promise.reject(new Error('read-only'));
  }

  list(): Promise<StorageLocator[]> {
    return Promise.resolve([]);
  }
}

describe('InputResolver', () => {
  const temp = new TempDirs();
  let store: MemoryObjectStore;
  let storage: StorageAdapter;
  let workspace: Workspace;
  let localDir: string;

  beforeEach(async () => {
    store = new MemoryObjectStore();
    storage = new StorageAdapter([store]);
    workspace = await new WorkspaceManager(await temp.make()).acquire();
    localDir = await temp.make();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await temp.cleanup();
  });

  it('resolves local inputs without touching storage', async () => {
    const download = vi.spyOn(store, 'download');
    const manifest = await writeText(localDir, 'manifest.xlsx', 'M');
    const template = await writeText(localDir, 'template.xlsx', 'T');
    const entries = await writeText(localDir, 'entries.xlsx', 'E');

    const resolved = await new InputResolver(storage, defaults).resolve(
      parseRunParameters({ manifest_path: manifest, template_path: template, entries_path: entries }),
      workspace
    );

    expect(download).not.toHaveBeenCalled();
    expect(resolved.manifest).toEqual({
      slot: 'manifest',
      path: join(workspace.inputsDir, 'manifest', 'manifest.xlsx'),
      provenance: InputProvenance.LOCAL,
      source: manifest,
    });
    expect(await readFile(join(workspace.inputsDir, 'entries', 'entries.xlsx'), 'utf-8')).toBe('E');
  });

  it('binds local inputs in place when staging is off', async () => {
    const manifest = await writeText(localDir, 'manifest.xlsx', 'M');
    const entries = await writeText(localDir, 'entries.xlsx', 'E');

    const resolved = await new InputResolver(storage, {
      ...defaults,
      templateRequired: false,
      stageLocalInputs: false,
    }).resolve(parseRunParameters({ manifest_path: manifest, entries_path: entries }), workspace);

    expect(resolved.manifest?.path).toBe(manifest);
    expect(resolved.template).toBeUndefined();
  });

  it('prefers the storage key when both sources are given', async () => {
    store.put('s3://uploads/in/manifest.xlsx', 'from-storage');
    const manifest = await writeText(localDir, 'manifest.xlsx', 'from-disk');
    const template = await writeText(localDir, 'template.xlsx', 'T');
    const entries = await writeText(localDir, 'entries.xlsx', 'E');

    const resolved = await new InputResolver(storage, defaults).resolve(
      parseRunParameters({
        manifest_path: manifest,
        manifest_key: 'in/manifest.xlsx',
        template_path: template,
        entries_path: entries,
        s3_bucket: 'uploads',
      }),
      workspace
    );

    expect(resolved.manifest?.provenance).toBe(InputProvenance.STORAGE);
    expect(resolved.manifest?.source).toBe('s3://uploads/in/manifest.xlsx');
    expect(await readFile(join(workspace.inputsDir, 'manifest', 'manifest.xlsx'), 'utf-8')).toBe('from-storage');
  });

  it('rejects both sources under the reject policy before any fetch', async () => {
    const download = vi.spyOn(store, 'download');
    const params = parseRunParameters({
      manifest_path: '/data/manifest.xlsx',
      manifest_key: 'in/manifest.xlsx',
      template_key: 'in/template.xlsx',
      entries_key: 'in/entries.xlsx',
      s3_bucket: 'uploads',
    });

    await expect(
      new InputResolver(storage, { ...defaults, dualSourcePolicy: DualSourcePolicy.REJECT }).resolve(params, workspace)
    ).rejects.toBeInstanceOf(AmbiguousInputError);
    expect(download).not.toHaveBeenCalled();
  });

  it('raises MissingInput for an absent required slot', async () => {
    const params = parseRunParameters({ manifest_key: 'in/m.xlsx', entries_key: 'in/e.xlsx', s3_bucket: 'uploads' });

    await expect(new InputResolver(storage, defaults).resolve(params, workspace)).rejects.toThrow(
      new MissingInputError('template')
    );
  });

  it('raises NotFound for a local path that does not exist', async () => {
    const params = parseRunParameters({
      manifest_path: join(localDir, 'nope.xlsx'),
      entries_path: join(localDir, 'nope.xlsx'),
    });

    await expect(
      new InputResolver(storage, { ...defaults, templateRequired: false }).resolve(params, workspace)
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it('raises NotFound for a directory given as an input', async () => {
    const params = parseRunParameters({ manifest_path: localDir, entries_path: localDir });

    await expect(
      new InputResolver(storage, { ...defaults, templateRequired: false }).resolve(params, workspace)
    ).rejects.toThrow(`Not found: ${localDir} (not a regular file)`);
  });

  it('requires a bucket for bare keys', async () => {
    const params = parseRunParameters({ manifest_key: 'in/m.xlsx', template_key: 'in/t.xlsx', entries_key: 'in/e.xlsx' });

    await expect(new InputResolver(storage, defaults).resolve(params, workspace)).rejects.toBeInstanceOf(
      InvalidLocatorError
    );
  });

  it('aborts the other fetches after the first failure', async () => {
    const gated = new GatedStore('missing.xlsx');
    const params = parseRunParameters({
      manifest_key: 'in/m.xlsx',
      template_key: 'missing.xlsx',
      entries_key: 'in/e.xlsx',
      s3_bucket: 'uploads',
    });

    await expect(
      new InputResolver(new StorageAdapter([gated]), defaults).resolve(params, workspace)
    ).rejects.toBeInstanceOf(NotFoundError);
    expect([...gated.aborted].sort()).toEqual(['in/e.xlsx', 'in/m.xlsx']);
  });

  it('stops at once when the caller has already canceled', async () => {
    const download = vi.spyOn(store, 'download');
    const controller = new AbortController();
    controller.abort(new Error('stop'));
    const params = parseRunParameters({ manifest_key: 'm.xlsx', template_key: 't.xlsx', entries_key: 'e.xlsx', s3_bucket: 'b' });

    await expect(new InputResolver(storage, defaults).resolve(params, workspace, controller.signal)).rejects.toThrow(
      'stop'
    );
    expect(download).not.toHaveBeenCalled();
  });
});
