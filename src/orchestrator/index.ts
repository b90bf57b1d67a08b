import { OutputCollector } from '../collector/output-collector.js';
import type { OrchestratorConfig } from '../config/index.js';
import { RunReporter } from '../reporter/run-reporter.js';
import { FileReportSink, StorageReportSink, type ReportSink } from '../reporter/sinks.js';
import { InputResolver } from '../resolver/input-resolver.js';
import { ProcessRunner } from '../runner/process-runner.js';
import type { StorageAdapter } from '../storage/adapter.js';
import { createStorageAdapter } from '../storage/index.js';
import { WorkspaceManager } from '../workspace/manager.js';
import { Orchestrator } from './orchestrator.js';

export { Orchestrator, type OrchestratorDeps, type RunOptions, type RunOutcome } from './orchestrator.js';
export { RunStateMachine, canTransition, isTerminalState } from './state-machine.js';

export interface CreateOrchestratorOptions {
  /** Replaces the S3-backed adapter built from configuration */
  storage?: StorageAdapter;
  /** Sinks added after the configured ones */
  sinks?: ReportSink[];
  /** Extra environment for the external program */
  env?: Record<string, string>;
}

/**
 * Wire an orchestrator from configuration.
 */
export function createOrchestrator(
  config: OrchestratorConfig,
  options: CreateOrchestratorOptions = {}
): Orchestrator {
  const storage = options.storage ?? createStorageAdapter(config.storage);

  const sinks: ReportSink[] = [];
  if (config.reportDir) {
    sinks.push(new FileReportSink(config.reportDir));
  }
  if (config.publishSummary) {
    sinks.push(new StorageReportSink(storage));
  }
  sinks.push(...(options.sinks ?? []));

  return new Orchestrator({
    workspaces: new WorkspaceManager(config.workRoot),
    resolver: new InputResolver(storage, {
      templateRequired: config.templateRequired,
      dualSourcePolicy: config.dualSourcePolicy,
      stageLocalInputs: config.stageLocalInputs,
    }),
    runner: new ProcessRunner(
      { command: config.program, args: config.script ? [config.script] : [] },
      {
        timeoutMs: config.timeoutSeconds * 1000,
        killGraceMs: config.killGraceMs,
        logTailBytes: config.logTailBytes,
        ...(options.env ? { env: options.env } : {}),
      }
    ),
    collector: new OutputCollector(storage),
    reporter: new RunReporter(sinks),
    outputPatterns: config.outputPatterns,
    ...(config.outputRoot ? { outputRoot: config.outputRoot } : {}),
    ...(config.outputDir ? { defaultOutput: config.outputDir } : {}),
  });
}
