/**
 * Orchestrator
 *
 * Drives one run through resolve -> execute -> collect -> report, bracketed
 * by workspace acquisition and release.
 */

import { resolve } from 'node:path';
import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import type { OutputCollector } from '../collector/output-collector.js';
import { WorkspaceError } from '../errors/index.js';
import { buildSummary, statusForExecution } from '../reporter/summary.js';
import type { ReportOutcome, RunReporter } from '../reporter/run-reporter.js';
import type { InputResolver } from '../resolver/input-resolver.js';
import type { ProcessRunner } from '../runner/process-runner.js';
import { formatLocation, parseLocation } from '../storage/locator.js';
import {
  INPUT_SLOTS,
  RunState,
  RunStatus,
  type CollectedArtifact,
  type ExecutionResult,
  type Location,
  type ResolvedInput,
  type RunParameters,
  type RunSummary,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import type { Workspace, WorkspaceManager } from '../workspace/manager.js';
import { RunStateMachine } from './state-machine.js';

export interface OrchestratorDeps {
  workspaces: WorkspaceManager;
  resolver: InputResolver;
  runner: ProcessRunner;
  collector: OutputCollector;
  reporter: RunReporter;
  /** Output naming patterns, matched directly under the output root */
  outputPatterns: readonly string[];
  /** Directory scanned for outputs; relative paths resolve against the workspace */
  outputRoot?: string;
  /** Destination used when a run names none */
  defaultOutput?: string;
}

export interface RunOptions {
  /** Cancels the run; the program's process group is terminated */
  signal?: AbortSignal;
  runId?: string;
}

export interface RunOutcome {
  summary: RunSummary;
  markdown: string;
  /** Exit code for the orchestrator process */
  exitCode: number;
  /** Names of report sinks that accepted the summary */
  reportedTo: string[];
  states: readonly RunState[];
}

/**
 * Mutable record of what one run has produced so far.
 */
interface RunProgress {
  readonly runId: string;
  readonly startedAt: Date;
  readonly machine: RunStateMachine;
  workspace: Workspace | null;
  destination: Location | null;
  inputs: ResolvedInput[];
  execution: ExecutionResult | null;
  artifacts: CollectedArtifact[];
}

export class Orchestrator {
  private readonly log: Logger = createLogger('orchestrator');

  constructor(private readonly deps: OrchestratorDeps) {}

  /**
   * Execute one run. Never throws for run-level failures: every outcome,
   * including aborts, is returned as a summary.
   */
  async run(params: RunParameters, options: RunOptions = {}): Promise<RunOutcome> {
    const runId = options.runId ?? `run-${nanoid(10)}`;
    const progress: RunProgress = {
      runId,
      startedAt: new Date(),
      machine: new RunStateMachine(runId),
      workspace: null,
      destination: null,
      inputs: [],
      execution: null,
      artifacts: [],
    };
    const { machine } = progress;
    const log = this.log.child({ runId });

    let status: RunStatus;
    let failure: { error: unknown } | null = null;

    try {
      status = await this.advance(params, progress, options.signal);
    } catch (error) {
      failure = { error };
      status = this.classifyFailure(error, machine.state, options.signal);
      log.error({ err: error, state: machine.state, status }, 'Run aborted');
    }

    if (!failure) {
      machine.transition(RunState.REPORTING);
    }

    const summary = buildSummary({
      runId,
      status,
      startedAt: progress.startedAt,
      inputs: progress.inputs,
      execution: progress.execution,
      destination: progress.destination ? formatLocation(progress.destination) : null,
      artifacts: progress.artifacts,
      ...(failure ? { error: failure.error } : {}),
    });
    let report: ReportOutcome;
    try {
      report = await this.deps.reporter.report(summary);
    } finally {
      if (progress.workspace) {
        await this.deps.workspaces.release(progress.workspace);
      }
    }
    machine.transition(failure ? RunState.ABORTED : RunState.DONE);

    log.info({ status, exitCode: summary.exitCode, durationMs: summary.durationMs }, 'Run finished');

    return {
      summary,
      markdown: report.markdown,
      exitCode: summary.exitCode,
      reportedTo: report.delivered,
      states: [...machine.history],
    };
  }

  private async advance(
    params: RunParameters,
    progress: RunProgress,
    signal: AbortSignal | undefined
  ): Promise<RunStatus> {
    const { machine } = progress;

    const output = params.output ?? this.deps.defaultOutput;
    progress.destination = output ? parseLocation(output) : null;
    if (!progress.destination) {
      this.log.warn({ runId: progress.runId }, 'No output destination; artifacts are removed with the workspace');
    }

    const workspace = await this.deps.workspaces.acquire();
    progress.workspace = workspace;

    machine.transition(RunState.RESOLVING);
    const inputs = await this.deps.resolver.resolve(params, workspace, signal);
    progress.inputs = INPUT_SLOTS.flatMap((slot) => {
      const input = inputs[slot];
      return input ? [input] : [];
    });
    signal?.throwIfAborted();

    machine.transition(RunState.EXECUTING);
    const execution = await this.deps.runner.run(inputs, workspace, signal);
    progress.execution = execution;

    const status = statusForExecution(execution);
    machine.transition(status === RunStatus.SUCCESS ? RunState.EXECUTED_OK : RunState.COMPLETED_WITH_ISSUES);

    if (execution.timedOut || execution.canceled) {
      return status;
    }

    machine.transition(RunState.COLLECTING);
    const searchRoot = this.deps.outputRoot ? resolve(workspace.path, this.deps.outputRoot) : workspace.path;
    progress.artifacts = await this.deps.collector.collect(
      searchRoot,
      this.deps.outputPatterns,
      progress.destination,
      signal ? { signal } : {}
    );

    return status;
  }

  private classifyFailure(error: unknown, state: RunState, signal: AbortSignal | undefined): RunStatus {
    if (signal?.aborted) {
      return RunStatus.CANCELED;
    }
    if (state === RunState.RESOLVING) {
      return RunStatus.RESOLUTION_FAILED;
    }
    // Before the workspace exists only parameter errors can occur
    if (state === RunState.START && !(error instanceof WorkspaceError)) {
      return RunStatus.RESOLUTION_FAILED;
    }
    return RunStatus.FAILED;
  }
}
