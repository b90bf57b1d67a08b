import { Command } from 'commander';
import { getConfig } from '../../config/index.js';
import { isOrchestratorError } from '../../errors/index.js';
import { createStorageAdapter, locatorFromKey } from '../../storage/index.js';
import { ExitCode } from '../../types/index.js';
import { formatError, formatJson, formatLocatorList, print, printError } from '../formatter.js';

interface LsCommandOptions {
  bucket?: string;
  json?: boolean;
}

/**
 * Create the ls command.
 */
export function createLsCommand(): Command {
  return new Command('ls')
    .description('List stored objects under a prefix, e.g. earlier run outputs')
    .argument('<prefix>', 'Storage URI, or a key with --bucket')
    .option('-b, --bucket <bucket>', 'Bucket for a bare key prefix')
    .option('--json', 'Output as JSON', false)
    .action(async (prefix: string, options: LsCommandOptions) => {
      try {
        const locator = locatorFromKey(prefix, options.bucket);
        const objects = await createStorageAdapter(getConfig().storage).list(locator);
        print(options.json ? formatJson(objects) : formatLocatorList(objects));
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode =
          isOrchestratorError(error) && error.retryable ? ExitCode.STORAGE_UNAVAILABLE : ExitCode.INTERNAL_ERROR;
      }
    });
}
