import { describe, it, expect, afterEach } from 'vitest';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Readable } from 'node:stream';
import { S3Client } from '@aws-sdk/client-s3';
import { InputResolver } from '../src/resolver/input-resolver.js';
import { StorageAdapter } from '../src/storage/adapter.js';
import { parseLocator } from '../src/storage/locator.js';
import { S3ObjectStore } from '../src/storage/s3-store.js';
import { WorkspaceManager } from '../src/workspace/manager.js';
import { NotFoundError } from '../src/errors/index.js';
import { DualSourcePolicy, parseRunParameters } from '../src/types/index.js';
import { TempDirs } from './helpers.js';

interface FakeResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: Readable;
}

/**
 * Client whose HTTP layer never leaves the process. GETs of `missingKey`
 * answer 404 at once; every other GET answers after `delayMs` unless the
 * request's abort signal fires first.
 */
function fakeS3(missingKey: string, delayMs: number) {
  const requested: string[] = [];
  const aborted: string[] = [];

  const requestHandler = {
    handle(
      request: { path: string },
      options?: { abortSignal?: AbortSignal }
    ): Promise<{ response: FakeResponse }> {
      requested.push(request.path);
      if (request.path.endsWith(`/${missingKey}`)) {
        return Promise.resolve({ response: { statusCode: 404, headers: {}, body: Readable.from([]) } });
      }

      const signal = options?.abortSignal;
      return new Promise((resolve, reject) => {
        const onAbort = (): void => {
          clearTimeout(timer);
          aborted.push(request.path);
          reject(Object.assign(new Error('Request aborted'), { name: 'AbortError' }));
        };
        const timer = setTimeout(() => {
          signal?.removeEventListener('abort', onAbort);
          resolve({
            response: {
              statusCode: 200,
              headers: { 'content-type': 'application/octet-stream' },
              body: Readable.from([Buffer.from(`bytes of ${request.path}`)]),
            },
          });
        }, delayMs);
        if (signal?.aborted) {
          onAbort();
        } else {
          signal?.addEventListener('abort', onAbort, { once: true });
        }
      });
    },
  };

  const client = new S3Client({
    region: 'us-east-1',
    endpoint: 'http://storage.test',
    forcePathStyle: true,
    maxAttempts: 1,
    credentials: { accessKeyId: 'test', secretAccessKey: 'test-secret' },
    requestHandler,
  });

  return { client, requested, aborted };
}

describe('S3ObjectStore', () => {
  const temp = new TempDirs();

  afterEach(async () => {
    await temp.cleanup();
  });

  it('streams an object body to the destination file', async () => {
    const { client } = fakeS3('missing.xlsx', 0);
    const dir = await temp.make();

    await new S3ObjectStore({ client }).download(parseLocator('s3://inputs/in/m.xlsx'), join(dir, 'm.xlsx'));

    expect(await readFile(join(dir, 'm.xlsx'), 'utf-8')).toBe('bytes of /inputs/in/m.xlsx');
  });

  it('maps a 404 to NotFound', async () => {
    const { client } = fakeS3('missing.xlsx', 0);
    const dir = await temp.make();

    await expect(
      new S3ObjectStore({ client }).download(parseLocator('s3://inputs/missing.xlsx'), join(dir, 'missing.xlsx'))
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it('hands the abort signal to the in-flight request', async () => {
    const { client, aborted } = fakeS3('missing.xlsx', 5000);
    const dir = await temp.make();
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 200);

    const error: unknown = await new S3ObjectStore({ client })
      .download(parseLocator('s3://inputs/in/m.xlsx'), join(dir, 'm.xlsx'), { signal: controller.signal })
      .catch((e: unknown) => e);

    expect(error).toHaveProperty('name', 'AbortError');
    expect(aborted).toEqual(['/inputs/in/m.xlsx']);
  });

  it('lets a failed slot cancel the sibling downloads promptly', async () => {
    const { client, requested } = fakeS3('missing.xlsx', 5000);
    const workspace = await new WorkspaceManager(await temp.make()).acquire();
    const resolver = new InputResolver(new StorageAdapter([new S3ObjectStore({ client })]), {
      templateRequired: true,
      dualSourcePolicy: DualSourcePolicy.PREFER_STORAGE,
      stageLocalInputs: true,
    });
    const params = parseRunParameters({
      manifest_key: 'in/m.xlsx',
      template_key: 'missing.xlsx',
      entries_key: 'in/e.xlsx',
      s3_bucket: 'inputs',
    });

    const startedAt = Date.now();
    await expect(resolver.resolve(params, workspace)).rejects.toBeInstanceOf(NotFoundError);
    const elapsed = Date.now() - startedAt;

    expect(elapsed).toBeLessThan(2000);
    expect(requested).toContain('/inputs/missing.xlsx');
  });
});
