/**
 * Workspace Manager
 *
 * Allocates one disposable directory per run under the configured work root
 * and removes it when the run ends.
 */

import { mkdir, readdir, rm, stat } from 'node:fs/promises';
import { join, resolve, sep } from 'node:path';
import { nanoid } from 'nanoid';
import { WorkspaceError } from '../errors/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('workspace');

const WORKSPACE_PREFIX = 'run-';
const INPUTS_DIR = 'inputs';

export interface Workspace {
  /** Run-unique identifier, also the directory name */
  readonly id: string;
  /** Absolute workspace directory; the program's working directory */
  readonly path: string;
  /** Directory receiving resolved inputs, one subdirectory per slot */
  readonly inputsDir: string;
  readonly createdAt: Date;
}

export class WorkspaceManager {
  readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  /**
   * Create a fresh workspace. The nanoid suffix keeps concurrent runs apart.
   */
  async acquire(): Promise<Workspace> {
    const id = `${WORKSPACE_PREFIX}${nanoid(12)}`;
    const path = join(this.root, id);
    const inputsDir = join(path, INPUTS_DIR);

    try {
      await mkdir(this.root, { recursive: true });
      // Non-recursive: fails with EEXIST rather than sharing a directory
      await mkdir(path);
      await mkdir(inputsDir);
    } catch (error) {
      throw new WorkspaceError(`Failed to create workspace ${path}`, error);
    }

    log.debug({ workspaceId: id, path }, 'Acquired workspace');
    return Object.freeze({ id, path, inputsDir, createdAt: new Date() });
  }

  /**
   * Remove the workspace and everything under it. Idempotent; removal errors
   * are logged and reported through the return value.
   */
  async release(workspace: Workspace): Promise<boolean> {
    this.assertOwned(workspace.path);

    try {
      // force: a directory that is already gone counts as released
      await rm(workspace.path, { recursive: true, force: true });
      log.debug({ workspaceId: workspace.id }, 'Released workspace');
      return true;
    } catch (error) {
      log.error({ workspaceId: workspace.id, path: workspace.path, err: error }, 'Failed to remove workspace');
      return false;
    }
  }

  /**
   * Run `fn` inside a fresh workspace, releasing it on every exit path.
   */
  async withWorkspace<T>(fn: (workspace: Workspace) => Promise<T>): Promise<T> {
    const workspace = await this.acquire();
    try {
      return await fn(workspace);
    } finally {
      await this.release(workspace);
    }
  }

  /**
   * Workspace directories under the root, including ones left by crashed runs.
   */
  async list(): Promise<string[]> {
    try {
      const entries = await readdir(this.root, { withFileTypes: true });
      return entries
        .filter((e) => e.isDirectory() && e.name.startsWith(WORKSPACE_PREFIX))
        .map((e) => join(this.root, e.name));
    } catch (error) {
      if (isMissing(error)) {
        return [];
      }
      throw error;
    }
  }

  /**
   * Workspace directories last modified more than maxAgeMs ago.
   */
  async listStale(maxAgeMs: number): Promise<string[]> {
    const dirs = await this.list();
    const now = Date.now();
    const stale: string[] = [];

    for (const dir of dirs) {
      try {
        const stats = await stat(dir);
        if (now - stats.mtimeMs > maxAgeMs) {
          stale.push(dir);
        }
      } catch (error) {
        log.warn({ dir, err: error }, 'Error checking workspace age');
      }
    }

    return stale;
  }

  /**
   * Remove workspaces older than maxAgeMs. Returns the number removed.
   */
  async cleanupStale(maxAgeMs: number): Promise<number> {
    let cleaned = 0;

    for (const dir of await this.listStale(maxAgeMs)) {
      try {
        await rm(dir, { recursive: true, force: true });
        cleaned++;
      } catch (error) {
        log.warn({ dir, err: error }, 'Failed to remove stale workspace');
      }
    }

    if (cleaned > 0) {
      log.info({ cleaned }, 'Cleaned up stale workspaces');
    }

    return cleaned;
  }

  private assertOwned(path: string): void {
    if (!resolve(path).startsWith(this.root + sep)) {
      throw new WorkspaceError(`Refusing to remove directory outside work root: ${path}`);
    }
  }
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
