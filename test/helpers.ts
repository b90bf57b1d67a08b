import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ProcessRunner, type ProcessRunnerOptions } from '../src/runner/process-runner.js';

export const FAKE_PROGRAM = fileURLToPath(new URL('../test-fixtures/fake-entry-remove.sh', import.meta.url));

/**
 * Temporary directories created by a test file, removed by cleanup().
 */
export class TempDirs {
  private readonly dirs: string[] = [];

  async make(prefix = 'entry-remove-test-'): Promise<string> {
    const dir = await mkdtemp(join(tmpdir(), prefix));
    this.dirs.push(dir);
    return dir;
  }

  async cleanup(): Promise<void> {
    await Promise.all(this.dirs.map((dir) => rm(dir, { recursive: true, force: true })));
    this.dirs.length = 0;
  }
}

export async function writeText(dir: string, name: string, content: string): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, content, 'utf-8');
  return path;
}

/**
 * Runner for the fake program under /bin/sh.
 */
export function fakeRunner(
  env: Record<string, string> = {},
  overrides: Partial<ProcessRunnerOptions> = {}
): ProcessRunner {
  return new ProcessRunner(
    { command: '/bin/sh', args: [FAKE_PROGRAM] },
    { timeoutMs: 10000, killGraceMs: 500, logTailBytes: 8000, env, ...overrides }
  );
}
