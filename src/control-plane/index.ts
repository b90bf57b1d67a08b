export {
  createProgram,
  runCli,
  createRunCommand,
  createLsCommand,
  createPruneCommand,
  mergeParameters,
  readParamsFile,
  loadRunParameters,
  applyOverrides,
} from './cli.js';

export {
  bold,
  dim,
  red,
  green,
  formatStatus,
  formatRunRecap,
  formatLocatorList,
  formatSuccess,
  formatError,
  formatJson,
  formatValidationErrors,
  print,
  printError,
} from './formatter.js';
