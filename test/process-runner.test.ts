import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ProcessRunner, buildArguments } from '../src/runner/process-runner.js';
import { ProgramLaunchError } from '../src/errors/index.js';
import { InputProvenance, type ResolvedInputs } from '../src/types/index.js';
import { WorkspaceManager, type Workspace } from '../src/workspace/manager.js';
import { FAKE_PROGRAM, TempDirs, fakeRunner, writeText } from './helpers.js';

const hasProcfs = existsSync('/proc/self/stat');

/**
 * Scheduler state letter from /proc/<pid>/stat, or null once the process is gone.
 */
async function processState(pid: number): Promise<string | null> {
  try {
    const stat = await readFile(`/proc/${pid}/stat`, 'utf-8');
    // The command name may contain spaces; the state follows its closing paren
    return stat.slice(stat.lastIndexOf(')') + 2).split(' ')[0] ?? null;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Poll until the process is gone or a zombie; returns its last observed state.
 */
async function waitForExit(pid: number, timeoutMs = 2000): Promise<string | null> {
  const deadline = Date.now() + timeoutMs;
  let state = await processState(pid);
  while (state !== null && state !== 'Z' && Date.now() < deadline) {
    await new Promise((resolve) => setTimeout(resolve, 25));
    state = await processState(pid);
  }
  return state;
}

async function readPid(pidFile: string): Promise<number> {
  return Number.parseInt((await readFile(pidFile, 'utf-8')).trim(), 10);
}

describe('buildArguments', () => {
  it('emits slot flags in manifest, template, entries order and skips absent slots', () => {
    const inputs: ResolvedInputs = {
      entries: { slot: 'entries', path: '/w/e.xlsx', provenance: InputProvenance.LOCAL, source: '/d/e.xlsx' },
      manifest: { slot: 'manifest', path: '/w/m.xlsx', provenance: InputProvenance.LOCAL, source: '/d/m.xlsx' },
    };

    expect(buildArguments(inputs, ['entry_remove.py'])).toEqual([
      'entry_remove.py',
      '-f',
      '/w/m.xlsx',
      '-e',
      '/w/e.xlsx',
    ]);
  });
});

describe('ProcessRunner', () => {
  const temp = new TempDirs();
  let workspace: Workspace;
  let inputs: ResolvedInputs;
  let manifest: string;
  let entries: string;

  beforeEach(async () => {
    workspace = await new WorkspaceManager(await temp.make()).acquire();
    manifest = await writeText(workspace.inputsDir, 'Site42.xlsx', 'manifest-bytes');
    entries = await writeText(workspace.inputsDir, 'entries.xlsx', 'entries-bytes');
    inputs = {
      manifest: { slot: 'manifest', path: manifest, provenance: InputProvenance.LOCAL, source: manifest },
      entries: { slot: 'entries', path: entries, provenance: InputProvenance.LOCAL, source: entries },
    };
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it('runs the program in the workspace and captures its output', async () => {
    const result = await fakeRunner().run(inputs, workspace);

    expect(result.command).toEqual(['/bin/sh', FAKE_PROGRAM, '-f', manifest, '-e', entries]);
    expect(result.exitCode).toBe(0);
    expect(result.timedOut).toBe(false);
    expect(result.canceled).toBe(false);
    expect(result.stdout.text).toBe(`manifest=${manifest}\ntemplate=\nentries=${entries}\n`);
    expect(result.stderr.text).toBe('');
    expect(await readFile(join(workspace.path, 'Site42_EntRemove20240101.xlsx'), 'utf-8')).toBe('manifest-bytes');
  });

  it('returns a non-zero exit instead of throwing', async () => {
    const result = await fakeRunner({ FAKE_EXIT_CODE: '3', FAKE_STDERR: 'sheet missing' }).run(inputs, workspace);

    expect(result.exitCode).toBe(3);
    expect(result.signal).toBeNull();
    expect(result.timedOut).toBe(false);
    expect(result.stderr.text).toBe('sheet missing\n');
  });

  it('terminates the program when the time limit passes', async () => {
    const result = await fakeRunner({ FAKE_SLEEP: '20' }, { timeoutMs: 300, killGraceMs: 200 }).run(
      inputs,
      workspace
    );

    expect(result.timedOut).toBe(true);
    expect(result.canceled).toBe(false);
    expect(result.exitCode).toBeNull();
    expect(result.durationMs).toBeLessThan(10000);
    expect(existsSync(join(workspace.path, 'Site42_EntRemove20240101.xlsx'))).toBe(false);
  });

  it('terminates the program when the caller cancels', async () => {
    const controller = new AbortController();
    const running = fakeRunner({ FAKE_SLEEP: '20' }).run(inputs, workspace, controller.signal);
    setTimeout(() => controller.abort(), 200);

    const result = await running;

    expect(result.canceled).toBe(true);
    expect(result.timedOut).toBe(false);
    expect(result.exitCode).toBeNull();
  });

  it.skipIf(!hasProcfs)('kills background children of a timed-out program', async () => {
    const pidFile = join(workspace.path, 'child.pid');

    const result = await fakeRunner(
      { FAKE_SLEEP: '20', FAKE_CHILD_PIDFILE: pidFile },
      { timeoutMs: 300, killGraceMs: 200 }
    ).run(inputs, workspace);
    const childPid = await readPid(pidFile);

    expect(result.timedOut).toBe(true);
    expect(Number.isInteger(childPid)).toBe(true);
    expect([null, 'Z']).toContain(await waitForExit(childPid));
  });

  it.skipIf(!hasProcfs)('kills background children of a canceled program', async () => {
    const pidFile = join(workspace.path, 'child.pid');
    const controller = new AbortController();
    const running = fakeRunner({ FAKE_SLEEP: '20', FAKE_CHILD_PIDFILE: pidFile }).run(
      inputs,
      workspace,
      controller.signal
    );
    setTimeout(() => controller.abort(), 300);

    const result = await running;
    const childPid = await readPid(pidFile);

    expect(result.canceled).toBe(true);
    expect([null, 'Z']).toContain(await waitForExit(childPid));
  });

  it('keeps only the tail of long output', async () => {
    const result = await fakeRunner({}, { logTailBytes: 16 }).run(inputs, workspace);
    const full = `manifest=${manifest}\ntemplate=\nentries=${entries}\n`;
    const dropped = Buffer.byteLength(full) - 16;

    expect(result.stdout.truncated).toBe(true);
    expect(result.stdout.totalBytes).toBe(Buffer.byteLength(full));
    expect(result.stdout.text).toBe(`[... ${dropped} earlier bytes discarded ...]\n${full.slice(-16)}`);
  });

  it('raises ProgramLaunchError when the program cannot start', async () => {
    const runner = new ProcessRunner(
      { command: join(workspace.path, 'no-such-program'), args: [] },
      { timeoutMs: 5000, killGraceMs: 100, logTailBytes: 8000 }
    );

    await expect(runner.run(inputs, workspace)).rejects.toBeInstanceOf(ProgramLaunchError);
  });
});
