import type { InputSlot } from './parameters.js';

export const InputProvenance = {
  STORAGE: 'storage',
  LOCAL: 'local',
} as const;

export type InputProvenance = (typeof InputProvenance)[keyof typeof InputProvenance];

/**
 * Local file a slot was bound to.
 */
export interface ResolvedInput {
  readonly slot: InputSlot;
  readonly path: string;
  readonly provenance: InputProvenance;
  /** Original reference: storage URI or caller-supplied path */
  readonly source: string;
}

export type ResolvedInputs = Readonly<Partial<Record<InputSlot, ResolvedInput>>>;

export interface CapturedStream {
  /** Retained tail, prefixed with a truncation marker when bytes were dropped */
  readonly text: string;
  /** Whether older output was discarded */
  readonly truncated: boolean;
  /** Total bytes written to the stream */
  readonly totalBytes: number;
}

export interface ExecutionResult {
  readonly command: readonly string[];
  /** Observed exit code; null when the process was ended by a signal */
  readonly exitCode: number | null;
  readonly signal: string | null;
  readonly timedOut: boolean;
  /** Terminated because the caller aborted the run */
  readonly canceled: boolean;
  readonly stdout: CapturedStream;
  readonly stderr: CapturedStream;
  readonly durationMs: number;
}
