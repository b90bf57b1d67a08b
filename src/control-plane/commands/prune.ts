import { Command } from 'commander';
import { getConfig } from '../../config/index.js';
import { ExitCode } from '../../types/index.js';
import { WorkspaceManager } from '../../workspace/manager.js';
import { formatError, formatSuccess, print, printError } from '../formatter.js';

interface PruneCommandOptions {
  maxAge: string;
}

/**
 * Create the prune command.
 */
export function createPruneCommand(): Command {
  return new Command('prune')
    .description('Remove workspaces left behind by crashed runs')
    .option('--max-age <hours>', 'Only remove workspaces older than this', '24')
    .action(async (options: PruneCommandOptions) => {
      try {
        const hours = Number(options.maxAge);
        if (!Number.isFinite(hours) || hours < 0) {
          printError(formatError(`--max-age: expected a non-negative number of hours, got "${options.maxAge}"`));
          process.exitCode = ExitCode.USAGE;
          return;
        }
        const manager = new WorkspaceManager(getConfig().workRoot);
        const removed = await manager.cleanupStale(hours * 60 * 60 * 1000);
        print(formatSuccess(`Removed ${removed} stale workspace${removed === 1 ? '' : 's'} from ${manager.root}`));
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = ExitCode.INTERNAL_ERROR;
      }
    });
}
