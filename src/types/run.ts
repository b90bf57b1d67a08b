import type { CollectedArtifact } from './artifact.js';
import type { ExecutionResult, ResolvedInput } from './execution.js';

// Run State (State Machine States)
export const RunState = {
  START: 'start',
  RESOLVING: 'resolving',
  ABORTED: 'aborted',
  EXECUTING: 'executing',
  COMPLETED_WITH_ISSUES: 'completed_with_issues',
  EXECUTED_OK: 'executed_ok',
  COLLECTING: 'collecting',
  REPORTING: 'reporting',
  DONE: 'done',
} as const;

export type RunState = (typeof RunState)[keyof typeof RunState];

// Run Status (outcome reported to callers)
export const RunStatus = {
  SUCCESS: 'success',
  NON_ZERO_EXIT: 'non_zero_exit',
  TIMED_OUT: 'timed_out',
  RESOLUTION_FAILED: 'resolution_failed',
  CANCELED: 'canceled',
  FAILED: 'failed',
} as const;

export type RunStatus = (typeof RunStatus)[keyof typeof RunStatus];

// Orchestrator process exit codes for statuses that do not mirror the program
export const ExitCode = {
  SUCCESS: 0,
  USAGE: 64,
  RESOLUTION_FAILED: 66,
  STORAGE_UNAVAILABLE: 69,
  INTERNAL_ERROR: 70,
  CONFIGURATION: 78,
  TIMED_OUT: 124,
  CANCELED: 130,
} as const;

export interface RunError {
  code: string;
  message: string;
  retryable: boolean;
}

export interface RunSummary {
  runId: string;
  status: RunStatus;
  /** Exit code the orchestrator process should end with */
  exitCode: number;
  /** Exit code observed from the external program, if it ran to exit */
  programExitCode: number | null;
  startedAt: Date;
  completedAt: Date;
  durationMs: number;
  inputs: ResolvedInput[];
  execution: ExecutionResult | null;
  destination: string | null;
  artifacts: CollectedArtifact[];
  error: RunError | null;
}
