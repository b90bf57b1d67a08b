/**
 * Entry-removal orchestrator library API
 *
 * Exports all public modules for programmatic usage.
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Configuration
export { getConfig, loadConfig, resetConfig, type OrchestratorConfig, type StorageConfig } from './config/index.js';

// Orchestrator (main entry point)
export {
  Orchestrator,
  createOrchestrator,
  RunStateMachine,
  canTransition,
  isTerminalState,
  type CreateOrchestratorOptions,
  type OrchestratorDeps,
  type RunOptions,
  type RunOutcome,
} from './orchestrator/index.js';

// Pipeline stages
export * as storage from './storage/index.js';
export * as workspace from './workspace/index.js';
export * as resolver from './resolver/index.js';
export * as runner from './runner/index.js';
export * as collector from './collector/index.js';
export * as reporter from './reporter/index.js';

// Control Plane
export * as controlPlane from './control-plane/index.js';

// Utilities
export { createLogger, logger, TailBuffer, truncationMarker, formatBytes, formatDuration } from './utils/index.js';
