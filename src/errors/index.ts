/**
 * Error taxonomy for a single orchestrated run.
 *
 * Resolution and execution faults are exceptions; a program timeout or a
 * non-zero exit is a result state carried by ExecutionResult instead.
 */

import type { InputSlot } from '../types/index.js';

export const ErrorCode = {
  MISSING_INPUT: 'MISSING_INPUT',
  NOT_FOUND: 'NOT_FOUND',
  STORAGE_UNAVAILABLE: 'STORAGE_UNAVAILABLE',
  INVALID_LOCATOR: 'INVALID_LOCATOR',
  AMBIGUOUS_INPUT: 'AMBIGUOUS_INPUT',
  PROGRAM_LAUNCH_FAILED: 'PROGRAM_LAUNCH_FAILED',
  RELOCATION_FAILED: 'RELOCATION_FAILED',
  WORKSPACE_FAILED: 'WORKSPACE_FAILED',
  CONFIGURATION_INVALID: 'CONFIGURATION_INVALID',
  PARAMETER_FILE_INVALID: 'PARAMETER_FILE_INVALID',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class for every error raised by the orchestrator.
 */
export abstract class OrchestratorError extends Error {
  abstract readonly code: ErrorCode;
  /** Whether a caller may reasonably retry the whole run */
  readonly retryable: boolean = false;

  protected constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
  }
}

/**
 * A required slot had neither a local path nor a storage key.
 */
export class MissingInputError extends OrchestratorError {
  readonly name = 'MissingInputError';
  readonly code = ErrorCode.MISSING_INPUT;
  readonly slot: InputSlot;

  constructor(slot: InputSlot) {
    super(`Required input "${slot}" has no local path or storage key`);
    this.slot = slot;
    Object.setPrototypeOf(this, MissingInputError.prototype);
  }
}

/**
 * A referenced object or file does not exist (a configuration error).
 */
export class NotFoundError extends OrchestratorError {
  readonly name = 'NotFoundError';
  readonly code = ErrorCode.NOT_FOUND;
  readonly reference: string;

  constructor(reference: string, cause?: unknown) {
    super(`Not found: ${reference}`, cause);
    this.reference = reference;
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * The storage backend could not be reached. Not retried here.
 */
export class StorageUnavailableError extends OrchestratorError {
  readonly name = 'StorageUnavailableError';
  readonly code = ErrorCode.STORAGE_UNAVAILABLE;
  override readonly retryable = true;
  readonly reference: string;

  constructor(reference: string, detail: string, cause?: unknown) {
    super(`Storage unavailable for ${reference}: ${detail}`, cause);
    this.reference = reference;
    Object.setPrototypeOf(this, StorageUnavailableError.prototype);
  }
}

export class InvalidLocatorError extends OrchestratorError {
  readonly name = 'InvalidLocatorError';
  readonly code = ErrorCode.INVALID_LOCATOR;
  readonly value: string;

  constructor(value: string, reason: string) {
    super(`Invalid storage locator "${value}": ${reason}`);
    this.value = value;
    Object.setPrototypeOf(this, InvalidLocatorError.prototype);
  }
}

/**
 * Both a local path and a storage key were given for one slot while the
 * dual-source policy is "reject".
 */
export class AmbiguousInputError extends OrchestratorError {
  readonly name = 'AmbiguousInputError';
  readonly code = ErrorCode.AMBIGUOUS_INPUT;
  readonly slot: InputSlot;

  constructor(slot: InputSlot, path: string, key: string) {
    super(`Input "${slot}" is given both as path ${path} and as key ${key}`);
    this.slot = slot;
    Object.setPrototypeOf(this, AmbiguousInputError.prototype);
  }
}

export class ProgramLaunchError extends OrchestratorError {
  readonly name = 'ProgramLaunchError';
  readonly code = ErrorCode.PROGRAM_LAUNCH_FAILED;
  readonly command: string[];

  constructor(command: string[], detail: string, cause?: unknown) {
    super(`Failed to launch ${command[0] ?? '<empty command>'}: ${detail}`, cause);
    this.command = command;
    Object.setPrototypeOf(this, ProgramLaunchError.prototype);
  }
}

/**
 * A single artifact could not be relocated. Recorded on the artifact,
 * never thrown out of a collection batch.
 */
export class RelocationFailedError extends OrchestratorError {
  readonly name = 'RelocationFailedError';
  readonly code = ErrorCode.RELOCATION_FAILED;
  readonly fileName: string;
  readonly destination: string;

  constructor(fileName: string, destination: string, cause?: unknown) {
    super(`Failed to relocate ${fileName} to ${destination}: ${describeError(cause)}`, cause);
    this.fileName = fileName;
    this.destination = destination;
    Object.setPrototypeOf(this, RelocationFailedError.prototype);
  }
}

export class WorkspaceError extends OrchestratorError {
  readonly name = 'WorkspaceError';
  readonly code = ErrorCode.WORKSPACE_FAILED;

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    Object.setPrototypeOf(this, WorkspaceError.prototype);
  }
}

export class ConfigurationError extends OrchestratorError {
  readonly name = 'ConfigurationError';
  readonly code = ErrorCode.CONFIGURATION_INVALID;
  readonly validationErrors: string[];

  constructor(validationErrors: string[]) {
    super(`Configuration validation failed: ${validationErrors.join('; ')}`);
    this.validationErrors = validationErrors;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * A parameter file could not be read, parsed, or did not hold a mapping.
 */
export class ParameterFileError extends OrchestratorError {
  readonly name = 'ParameterFileError';
  readonly code = ErrorCode.PARAMETER_FILE_INVALID;
  readonly path: string;

  constructor(path: string, reason: string, cause?: unknown) {
    super(`Invalid parameter file ${path}: ${reason}`, cause);
    this.path = path;
    Object.setPrototypeOf(this, ParameterFileError.prototype);
  }
}

export function isOrchestratorError(error: unknown): error is OrchestratorError {
  return error instanceof OrchestratorError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
