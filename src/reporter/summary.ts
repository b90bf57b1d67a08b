import { isOrchestratorError, describeError, ErrorCode } from '../errors/index.js';
import {
  ExitCode,
  RunStatus,
  type CapturedStream,
  type CollectedArtifact,
  type ExecutionResult,
  type ResolvedInput,
  type RunError,
  type RunSummary,
} from '../types/index.js';
import { formatBytes, formatDuration } from '../utils/format.js';
import { stripTruncationMarker, truncationMarker } from '../utils/tail-buffer.js';

/** Characters of each stream kept in the markdown document */
export const MARKDOWN_TAIL_CHARS = 8000;

export interface SummaryInput {
  runId: string;
  status: RunStatus;
  startedAt: Date;
  completedAt?: Date;
  inputs?: ResolvedInput[];
  execution?: ExecutionResult | null;
  destination?: string | null;
  artifacts?: CollectedArtifact[];
  error?: unknown;
}

/**
 * Status of a run whose program reached an exit.
 */
export function statusForExecution(execution: ExecutionResult): RunStatus {
  if (execution.timedOut) {
    return RunStatus.TIMED_OUT;
  }
  if (execution.canceled) {
    return RunStatus.CANCELED;
  }
  return execution.exitCode === 0 ? RunStatus.SUCCESS : RunStatus.NON_ZERO_EXIT;
}

/**
 * Orchestrator exit code. Mirrors the program's code once execution was
 * reached; other outcomes use fixed codes distinct from each other.
 */
export function exitCodeFor(
  status: RunStatus,
  execution: ExecutionResult | null,
  error: RunError | null
): number {
  switch (status) {
    case RunStatus.SUCCESS:
      return ExitCode.SUCCESS;
    case RunStatus.NON_ZERO_EXIT:
      // A program ended by a signal has no exit code of its own
      return execution?.exitCode ?? 1;
    case RunStatus.TIMED_OUT:
      return ExitCode.TIMED_OUT;
    case RunStatus.CANCELED:
      return ExitCode.CANCELED;
    case RunStatus.RESOLUTION_FAILED:
      return error?.code === ErrorCode.STORAGE_UNAVAILABLE
        ? ExitCode.STORAGE_UNAVAILABLE
        : ExitCode.RESOLUTION_FAILED;
    case RunStatus.FAILED:
      return ExitCode.INTERNAL_ERROR;
  }
}

export function toRunError(error: unknown): RunError {
  if (isOrchestratorError(error)) {
    return { code: error.code, message: error.message, retryable: error.retryable };
  }
  return { code: 'INTERNAL_ERROR', message: describeError(error), retryable: false };
}

export function buildSummary(input: SummaryInput): RunSummary {
  const completedAt = input.completedAt ?? new Date();
  const execution = input.execution ?? null;
  const error = input.error === undefined ? null : toRunError(input.error);

  return {
    runId: input.runId,
    status: input.status,
    exitCode: exitCodeFor(input.status, execution, error),
    programExitCode: execution?.exitCode ?? null,
    startedAt: input.startedAt,
    completedAt,
    durationMs: completedAt.getTime() - input.startedAt.getTime(),
    inputs: [...(input.inputs ?? [])],
    execution,
    destination: input.destination ?? null,
    artifacts: [...(input.artifacts ?? [])],
    error,
  };
}

const STATUS_LABELS: Record<RunStatus, string> = {
  [RunStatus.SUCCESS]: 'SUCCESS',
  [RunStatus.NON_ZERO_EXIT]: 'NON-ZERO EXIT',
  [RunStatus.TIMED_OUT]: 'TIMED OUT',
  [RunStatus.RESOLUTION_FAILED]: 'RESOLUTION FAILED',
  [RunStatus.CANCELED]: 'CANCELED',
  [RunStatus.FAILED]: 'FAILED',
};

export function statusLabel(status: RunStatus): string {
  return STATUS_LABELS[status];
}

/**
 * Last `maxChars` characters of a captured stream. Whenever anything before
 * them is missing, the result starts with a marker counting the dropped bytes.
 */
function streamTail(stream: CapturedStream, maxChars: number): string {
  const body = stream.truncated ? stripTruncationMarker(stream.text) : stream.text;
  if (!stream.truncated && body.length <= maxChars) {
    return body;
  }
  const tail = body.length > maxChars ? body.slice(-maxChars) : body;
  const dropped = Math.max(0, stream.totalBytes - Buffer.byteLength(tail, 'utf-8'));
  return `${truncationMarker(dropped)}\n${tail}`;
}

function fenced(text: string): string[] {
  const fence = text.includes('```') ? '~~~' : '```';
  return [fence, text.replace(/\n$/, ''), fence];
}

/**
 * Human-readable summary document for the reporting surface.
 */
export function renderMarkdown(summary: RunSummary, maxTailChars: number = MARKDOWN_TAIL_CHARS): string {
  const md: string[] = [
    '# Entry removal run summary',
    '',
    `**Run:** \`${summary.runId}\``,
    `**Status:** ${statusLabel(summary.status)}`,
    `**Exit code:** \`${summary.programExitCode ?? 'n/a'}\``,
    `**Duration:** ${formatDuration(summary.durationMs)}`,
  ];

  if (summary.execution?.signal) {
    md.push(`**Signal:** \`${summary.execution.signal}\``);
  }

  if (summary.error) {
    md.push('', '## Error', '', `\`${summary.error.code}\`: ${summary.error.message}`);
  }

  if (summary.inputs.length > 0) {
    md.push('', '## Inputs', '', '| Slot | Source | Provenance |', '| --- | --- | --- |');
    for (const input of summary.inputs) {
      md.push(`| ${input.slot} | \`${input.source}\` | ${input.provenance} |`);
    }
  }

  const execution = summary.execution;
  if (execution) {
    if (execution.stdout.text) {
      md.push('', '## Stdout', '', ...fenced(streamTail(execution.stdout, maxTailChars)));
    }
    if (execution.stderr.text) {
      md.push('', '## Stderr', '', ...fenced(streamTail(execution.stderr, maxTailChars)));
    }
  }

  md.push('', '## Artifacts', '');
  md.push(summary.destination ? `Destination: \`${summary.destination}\`` : 'Destination: none (local only)');
  md.push('');
  if (summary.artifacts.length === 0) {
    md.push('_No artifacts produced._');
  }
  for (const artifact of summary.artifacts) {
    const mark = artifact.success ? '[x]' : '[ ]';
    const target = artifact.destination ? ` -> \`${artifact.destination}\`` : '';
    const failure = artifact.error ? ` (FAILED: ${artifact.error})` : '';
    md.push(`- ${mark} \`${artifact.fileName}\`${target} (${formatBytes(artifact.sizeBytes)})${failure}`);
  }

  return md.join('\n') + '\n';
}
