/**
 * Process Runner
 *
 * Launches the external entry-removal program against resolved inputs,
 * in its own process group with the workspace as working directory.
 */

import { execa } from 'execa';
import { ProgramLaunchError } from '../errors/index.js';
import {
  INPUT_SLOTS,
  InputSlot,
  type ExecutionResult,
  type ResolvedInputs,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { TailBuffer } from '../utils/tail-buffer.js';
import type { Workspace } from '../workspace/manager.js';

const log = createLogger('runner');

/**
 * Program flag for each input slot. Fixed by the program's CLI contract.
 */
export const SLOT_FLAGS: Readonly<Record<InputSlot, string>> = Object.freeze({
  [InputSlot.MANIFEST]: '-f',
  [InputSlot.TEMPLATE]: '-t',
  [InputSlot.ENTRIES]: '-e',
});

export interface ProgramSpec {
  /** Executable, e.g. python3 */
  command: string;
  /** Arguments placed before the slot flags, e.g. the script path */
  args: readonly string[];
}

export interface ProcessRunnerOptions {
  timeoutMs: number;
  /** Delay between SIGTERM and SIGKILL when terminating */
  killGraceMs: number;
  /** Per-stream capture cap */
  logTailBytes: number;
  /** Extra environment for the program */
  env?: Record<string, string>;
}

type TerminationReason = 'timeout' | 'cancel';

/**
 * Program arguments for the resolved inputs, in slot order.
 */
export function buildArguments(inputs: ResolvedInputs, leadingArgs: readonly string[] = []): string[] {
  const args = [...leadingArgs];
  for (const slot of INPUT_SLOTS) {
    const input = inputs[slot];
    if (input) {
      args.push(SLOT_FLAGS[slot], input.path);
    }
  }
  return args;
}

function isNoSuchProcess(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ESRCH';
}

/**
 * Signal the whole process group so grandchildren are not orphaned.
 */
export function killProcessGroup(pid: number | undefined, signal: NodeJS.Signals): void {
  if (pid === undefined) {
    return;
  }
  try {
    process.kill(-pid, signal);
  } catch (error) {
    if (isNoSuchProcess(error)) {
      return;
    }
    log.warn({ pid, signal, err: error }, 'Process group kill failed; signalling the process');
    try {
      process.kill(pid, signal);
    } catch (fallbackError) {
      if (!isNoSuchProcess(fallbackError)) {
        throw fallbackError;
      }
    }
  }
}

export class ProcessRunner {
  constructor(
    private readonly program: ProgramSpec,
    private readonly options: ProcessRunnerOptions
  ) {}

  /**
   * Execute the program once. A non-zero exit is returned, never thrown;
   * only a program that cannot be started raises ProgramLaunchError.
   */
  async run(inputs: ResolvedInputs, workspace: Workspace, signal?: AbortSignal): Promise<ExecutionResult> {
    const args = buildArguments(inputs, this.program.args);
    const command = [this.program.command, ...args];
    const stdout = new TailBuffer(this.options.logTailBytes);
    const stderr = new TailBuffer(this.options.logTailBytes);

    log.info({ command: command.join(' '), cwd: workspace.path }, 'Running command');
    const startTime = Date.now();

    const subprocess = execa(this.program.command, args, {
      cwd: workspace.path,
      stdin: 'ignore',
      buffer: false,
      reject: false,
      detached: true,
      ...(this.options.env ? { env: this.options.env } : {}),
    });

    subprocess.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
    subprocess.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

    const state: { termination: TerminationReason | null; killTimer?: NodeJS.Timeout } = {
      termination: null,
    };

    const terminate = (reason: TerminationReason): void => {
      if (state.termination !== null) {
        return;
      }
      state.termination = reason;
      log.warn({ pid: subprocess.pid, reason }, 'Terminating program');
      killProcessGroup(subprocess.pid, 'SIGTERM');
      state.killTimer = setTimeout(() => killProcessGroup(subprocess.pid, 'SIGKILL'), this.options.killGraceMs);
    };

    const timeoutTimer = setTimeout(() => terminate('timeout'), this.options.timeoutMs);
    const onAbort = (): void => terminate('cancel');
    signal?.addEventListener('abort', onAbort, { once: true });
    if (signal?.aborted) {
      onAbort();
    }

    let result: Awaited<typeof subprocess>;
    try {
      result = await subprocess;
    } finally {
      clearTimeout(timeoutTimer);
      clearTimeout(state.killTimer);
      signal?.removeEventListener('abort', onAbort);
    }

    if (subprocess.pid === undefined) {
      const detail =
        'originalMessage' in result && typeof result.originalMessage === 'string'
          ? result.originalMessage
          : 'process did not start';
      throw new ProgramLaunchError(command, detail);
    }

    if (state.termination !== null) {
      // Stragglers that ignored SIGTERM
      killProcessGroup(subprocess.pid, 'SIGKILL');
    }

    const execution: ExecutionResult = Object.freeze({
      command,
      exitCode: typeof result.exitCode === 'number' ? result.exitCode : null,
      signal: result.signal ?? null,
      timedOut: state.termination === 'timeout',
      canceled: state.termination === 'cancel',
      stdout: stdout.snapshot(),
      stderr: stderr.snapshot(),
      durationMs: Date.now() - startTime,
    });

    log.info(
      {
        exitCode: execution.exitCode,
        signal: execution.signal,
        timedOut: execution.timedOut,
        durationMs: execution.durationMs,
      },
      'Program exited'
    );
    if (execution.stdout.text) {
      log.info({ stdout: execution.stdout.text }, 'Program stdout');
    }
    if (execution.stderr.text) {
      log.warn({ stderr: execution.stderr.text }, 'Program stderr');
    }

    return execution;
  }
}
