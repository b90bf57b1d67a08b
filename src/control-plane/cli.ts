import { Command } from 'commander';
import { createLsCommand } from './commands/ls.js';
import { createPruneCommand } from './commands/prune.js';
import { createRunCommand } from './commands/run.js';

/**
 * Package version - will be updated during build
 */
const VERSION = '0.1.0';

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('entry-remove-run')
    .description('Runs the entry-removal spreadsheet program against local or stored inputs')
    .version(VERSION, '-v, --version', 'Output the current version');

  program.addCommand(createRunCommand(), { isDefault: true });
  program.addCommand(createLsCommand());
  program.addCommand(createPruneCommand());

  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws on --help and --version
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' || error.code === 'commander.version')
    ) {
      return;
    }

    throw error;
  }
}

export {
  createRunCommand,
  mergeParameters,
  readParamsFile,
  loadRunParameters,
  applyOverrides,
} from './commands/run.js';
export { createLsCommand } from './commands/ls.js';
export { createPruneCommand } from './commands/prune.js';
