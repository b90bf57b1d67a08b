/**
 * Report sinks: destinations for the run summary document.
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { StorageAdapter } from '../storage/adapter.js';
import { parseLocation } from '../storage/locator.js';
import type { RunSummary } from '../types/index.js';

export interface ReportSink {
  readonly name: string;
  publish(summary: RunSummary, markdown: string): Promise<void>;
}

/**
 * Writes <dir>/<runId>.md and <dir>/<runId>.json.
 */
export class FileReportSink implements ReportSink {
  readonly name = 'file';

  constructor(private readonly dir: string) {}

  async publish(summary: RunSummary, markdown: string): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    await writeFile(join(this.dir, `${summary.runId}.md`), markdown, 'utf-8');
    await writeFile(join(this.dir, `${summary.runId}.json`), JSON.stringify(summary, null, 2) + '\n', 'utf-8');
  }
}

/**
 * Uploads the markdown next to the relocated outputs, when the run had a
 * destination.
 */
export class StorageReportSink implements ReportSink {
  readonly name = 'storage';

  constructor(private readonly storage: StorageAdapter) {}

  async publish(summary: RunSummary, markdown: string): Promise<void> {
    if (!summary.destination) {
      return;
    }

    const scratch = await mkdtemp(join(tmpdir(), 'entry-remove-report-'));
    try {
      const file = join(scratch, `${summary.runId}_summary.md`);
      await writeFile(file, markdown, 'utf-8');
      const stored = await this.storage.store(file, parseLocation(summary.destination));
      if (!stored.success) {
        throw new Error(stored.error ?? `Failed to store summary at ${stored.destination}`);
      }
    } finally {
      await rm(scratch, { recursive: true, force: true });
    }
  }
}

/**
 * Hands the summary to a caller-supplied function (e.g. a scheduler hook).
 */
export class CallbackReportSink implements ReportSink {
  constructor(
    readonly name: string,
    private readonly callback: (summary: RunSummary, markdown: string) => Promise<void> | void
  ) {}

  async publish(summary: RunSummary, markdown: string): Promise<void> {
    await this.callback(summary, markdown);
  }
}
