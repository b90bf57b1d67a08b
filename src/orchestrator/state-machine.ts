/**
 * State machine for a single orchestrated run.
 */

import { RunState } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('state-machine');

/**
 * State transition table.
 * Maps current state -> states reachable from it
 */
const transitions: Record<RunState, readonly RunState[]> = {
  [RunState.START]: [RunState.RESOLVING, RunState.ABORTED],
  [RunState.RESOLVING]: [RunState.EXECUTING, RunState.ABORTED],
  [RunState.EXECUTING]: [RunState.EXECUTED_OK, RunState.COMPLETED_WITH_ISSUES, RunState.ABORTED],
  [RunState.EXECUTED_OK]: [RunState.COLLECTING, RunState.ABORTED],
  // Timed-out and canceled programs skip collection
  [RunState.COMPLETED_WITH_ISSUES]: [RunState.COLLECTING, RunState.REPORTING, RunState.ABORTED],
  [RunState.COLLECTING]: [RunState.REPORTING, RunState.ABORTED],
  [RunState.REPORTING]: [RunState.DONE],
  // Terminal states - no transitions out
  [RunState.ABORTED]: [],
  [RunState.DONE]: [],
};

/**
 * Check if a state is terminal (no more transitions possible).
 */
export function isTerminalState(state: RunState): boolean {
  return state === RunState.ABORTED || state === RunState.DONE;
}

export function canTransition(from: RunState, to: RunState): boolean {
  return transitions[from].includes(to);
}

export class RunStateMachine {
  private current: RunState = RunState.START;
  private readonly visited: RunState[] = [RunState.START];

  constructor(private readonly runId: string) {}

  get state(): RunState {
    return this.current;
  }

  /**
   * States visited so far, starting with "start".
   */
  get history(): readonly RunState[] {
    return this.visited;
  }

  isTerminal(): boolean {
    return isTerminalState(this.current);
  }

  /**
   * Move to the next state or throw if the transition is invalid.
   */
  transition(to: RunState): void {
    if (!canTransition(this.current, to)) {
      const error = `Invalid transition: ${this.current} -> ${to}`;
      log.error({ runId: this.runId, from: this.current, to }, error);
      throw new Error(error);
    }

    log.debug({ runId: this.runId, from: this.current, to }, 'State transition');
    this.current = to;
    this.visited.push(to);
  }
}
