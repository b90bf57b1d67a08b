/**
 * Workspace Manager Integration Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdir, utimes, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { WorkspaceManager } from '../src/workspace/manager.js';
import { WorkspaceError } from '../src/errors/index.js';
import { TempDirs } from './helpers.js';

describe('WorkspaceManager', () => {
  const temp = new TempDirs();

  afterEach(async () => {
    await temp.cleanup();
  });

  it('creates a workspace with an inputs directory', async () => {
    const manager = new WorkspaceManager(await temp.make());

    const workspace = await manager.acquire();

    expect(workspace.id).toMatch(/^run-/);
    expect(workspace.path).toBe(join(manager.root, workspace.id));
    expect(workspace.inputsDir).toBe(join(workspace.path, 'inputs'));
    expect(existsSync(workspace.inputsDir)).toBe(true);
    expect(workspace.createdAt).toBeInstanceOf(Date);
  });

  it('gives concurrent runs distinct directories', async () => {
    const manager = new WorkspaceManager(await temp.make());

    const workspaces = await Promise.all([manager.acquire(), manager.acquire(), manager.acquire()]);

    expect(new Set(workspaces.map((w) => w.path)).size).toBe(3);
  });

  it('removes everything on release, idempotently', async () => {
    const manager = new WorkspaceManager(await temp.make());
    const workspace = await manager.acquire();
    await writeFile(join(workspace.path, 'out_EntRemove.xlsx'), 'x');

    expect(await manager.release(workspace)).toBe(true);
    expect(existsSync(workspace.path)).toBe(false);
    expect(await manager.release(workspace)).toBe(true);
  });

  it('releases a workspace handed back by a different manager on the same root', async () => {
    const root = await temp.make();
    const workspace = await new WorkspaceManager(root).acquire();
    const other = new WorkspaceManager(root);

    expect(await other.release(workspace)).toBe(true);
    expect(await other.release(workspace)).toBe(true);
    expect(existsSync(workspace.path)).toBe(false);
  });

  it('releases the workspace when the callback throws', async () => {
    const manager = new WorkspaceManager(await temp.make());
    let seen = '';

    await expect(
      manager.withWorkspace(async (workspace) => {
        seen = workspace.path;
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(seen).not.toBe('');
    expect(existsSync(seen)).toBe(false);
  });

  it('refuses to remove directories outside its root', async () => {
    const manager = new WorkspaceManager(await temp.make());
    const outside = await temp.make();

    await expect(
      manager.release({ id: 'run-foreign', path: outside, inputsDir: join(outside, 'inputs'), createdAt: new Date() })
    ).rejects.toBeInstanceOf(WorkspaceError);
    expect(existsSync(outside)).toBe(true);
  });

  it('lists stale workspaces without removing them', async () => {
    const root = await temp.make();
    const manager = new WorkspaceManager(root);
    const stale = join(root, 'run-stale');
    await mkdir(stale);
    await mkdir(join(root, 'run-fresh'));
    const twoDaysAgo = new Date(Date.now() - 48 * 60 * 60 * 1000);
    await utimes(stale, twoDaysAgo, twoDaysAgo);

    expect(await manager.listStale(24 * 60 * 60 * 1000)).toEqual([stale]);
    expect(existsSync(stale)).toBe(true);
  });

  it('prunes only stale workspaces', async () => {
    const root = await temp.make();
    const manager = new WorkspaceManager(root);
    const stale = join(root, 'run-stale');
    const fresh = join(root, 'run-fresh');
    const unrelated = join(root, 'keep-me');
    await mkdir(stale);
    await mkdir(fresh);
    await mkdir(unrelated);
    const twoDaysAgo = new Date(Date.now() - 48 * 60 * 60 * 1000);
    await utimes(stale, twoDaysAgo, twoDaysAgo);
    await utimes(unrelated, twoDaysAgo, twoDaysAgo);

    const removed = await manager.cleanupStale(24 * 60 * 60 * 1000);

    expect(removed).toBe(1);
    expect(existsSync(stale)).toBe(false);
    expect(existsSync(fresh)).toBe(true);
    expect(existsSync(unrelated)).toBe(true);
  });

  it('lists nothing when the root does not exist yet', async () => {
    const manager = new WorkspaceManager(join(await temp.make(), 'absent'));
    expect(await manager.list()).toEqual([]);
  });
});
