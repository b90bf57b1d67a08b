/**
 * Run Reporter
 *
 * Delivers the run summary to every configured sink. Delivery is
 * best-effort: a failing sink is logged and recorded, never thrown.
 */

import { describeError } from '../errors/index.js';
import type { RunSummary } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import type { ReportSink } from './sinks.js';
import { renderMarkdown } from './summary.js';

const log = createLogger('reporter');

export interface ReportOutcome {
  summary: RunSummary;
  markdown: string;
  /** Names of sinks that accepted the report */
  delivered: string[];
  failures: Array<{ sink: string; error: string }>;
}

export class RunReporter {
  private readonly sinks: ReportSink[];

  constructor(sinks: ReportSink[] = []) {
    this.sinks = [...sinks];
  }

  async report(summary: RunSummary): Promise<ReportOutcome> {
    const markdown = renderMarkdown(summary);
    const outcome: ReportOutcome = { summary, markdown, delivered: [], failures: [] };

    for (const sink of this.sinks) {
      try {
        await sink.publish(summary, markdown);
        outcome.delivered.push(sink.name);
      } catch (error) {
        log.warn({ sink: sink.name, runId: summary.runId, err: error }, 'Report sink unavailable');
        outcome.failures.push({ sink: sink.name, error: describeError(error) });
      }
    }

    log.info(
      { runId: summary.runId, status: summary.status, delivered: outcome.delivered },
      'Run reported'
    );
    return outcome;
  }
}
