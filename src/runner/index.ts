export {
  ProcessRunner,
  SLOT_FLAGS,
  buildArguments,
  killProcessGroup,
  type ProgramSpec,
  type ProcessRunnerOptions,
} from './process-runner.js';
