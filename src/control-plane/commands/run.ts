import { Command } from 'commander';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';
import { getConfig, type OrchestratorConfig } from '../../config/index.js';
import { ConfigurationError, ParameterFileError, describeError } from '../../errors/index.js';
import { createOrchestrator } from '../../orchestrator/index.js';
import {
  DualSourcePolicy,
  ExitCode,
  parseRunParameters,
  type RunParameters,
} from '../../types/index.js';
import {
  formatError,
  formatJson,
  formatRunRecap,
  formatValidationErrors,
  print,
  printError,
} from '../formatter.js';

/**
 * Flags that set parameter-set keys.
 */
export interface ParameterFlagOptions {
  manifestPath?: string;
  manifestKey?: string;
  templatePath?: string;
  templateKey?: string;
  entriesPath?: string;
  entriesKey?: string;
  bucket?: string;
  outputPrefix?: string;
  outputDir?: string;
}

type ParameterFlag = keyof ParameterFlagOptions;

const PARAMETER_FLAGS: Record<ParameterFlag, string> = {
  manifestPath: 'manifest_path',
  manifestKey: 'manifest_key',
  templatePath: 'template_path',
  templateKey: 'template_key',
  entriesPath: 'entries_path',
  entriesKey: 'entries_key',
  bucket: 's3_bucket',
  outputPrefix: 'output_prefix',
  outputDir: 'output_dir',
};

function isParameterFlag(name: string): name is ParameterFlag {
  return Object.hasOwn(PARAMETER_FLAGS, name);
}

export interface RunCommandOptions extends ParameterFlagOptions {
  params?: string;
  program?: string;
  script?: string;
  timeout?: string;
  strictInputs?: boolean;
  reportDir?: string;
  json?: boolean;
}

const EXIT_CODE_HELP = `
Exit codes:
  0    the program succeeded
  N    the program exited with code N
  1    the program was ended by a signal
  64   invalid parameters or parameter file
  66   an input could not be resolved
  69   storage unavailable
  70   internal failure
  78   invalid configuration
  124  the program timed out
  130  the run was canceled

A program exit code equal to one of the fixed codes cannot be told apart by
exit status alone. The JSON summary (--json) always carries the program's own
code in programExitCode (null when the program never exited normally).
`;

/**
 * Create the run command.
 */
export function createRunCommand(): Command {
  return new Command('run')
    .description('Resolve inputs, run the entry-removal program and collect its outputs')
    .option('--manifest-path <path>', 'Local manifest workbook')
    .option('--manifest-key <key>', 'Manifest object key or storage URI')
    .option('--template-path <path>', 'Local template workbook')
    .option('--template-key <key>', 'Template object key or storage URI')
    .option('--entries-path <path>', 'Local workbook listing entries to remove')
    .option('--entries-key <key>', 'Entries object key or storage URI')
    .option('-b, --bucket <bucket>', 'Bucket for bare object keys')
    .option('--output-prefix <uri>', 'Storage prefix receiving outputs (wins over --output-dir)')
    .option('--output-dir <dir>', 'Local directory receiving outputs')
    .option('-p, --params <file>', 'JSON or YAML parameter file; flags override its values')
    .option('--program <command>', 'Interpreter or executable to launch')
    .option('--script <path>', 'First program argument; empty string for none')
    .option('--timeout <seconds>', 'Wall-clock limit for the program')
    .option('--strict-inputs', 'Reject slots given both a local path and a storage key', false)
    .option('--report-dir <dir>', 'Directory receiving the markdown and JSON summaries')
    .option('--json', 'Print the summary as JSON instead of markdown', false)
    .addHelpText('after', EXIT_CODE_HELP)
    .action(async (options: RunCommandOptions) => {
      try {
        await executeRun(options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = ExitCode.INTERNAL_ERROR;
      }
    });
}

/**
 * Read a parameter file. YAML is a superset of JSON, so one parser covers both.
 */
export async function readParamsFile(path: string): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ParameterFileError(path, describeError(error), error);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (error) {
    throw new ParameterFileError(path, describeError(error), error);
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ParameterFileError(path, 'expected a mapping of parameter names to values');
  }
  return { ...parsed };
}

/**
 * Merge file parameters with flags. Flags win key by key.
 */
export function mergeParameters(
  fromFile: Record<string, unknown>,
  options: RunCommandOptions
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...fromFile };
  for (const flag of Object.keys(PARAMETER_FLAGS).filter(isParameterFlag)) {
    const value = options[flag];
    if (value !== undefined) {
      merged[PARAMETER_FLAGS[flag]] = value;
    }
  }
  return merged;
}

/**
 * Build the run's parameter set from the optional file and the flags.
 * Throws ParameterFileError or ZodError, both usage errors.
 */
export async function loadRunParameters(options: RunCommandOptions): Promise<RunParameters> {
  const fromFile = options.params ? await readParamsFile(options.params) : {};
  return parseRunParameters(mergeParameters(fromFile, options));
}

/**
 * Apply command-line overrides on top of the environment configuration.
 */
export function applyOverrides(config: OrchestratorConfig, options: RunCommandOptions): OrchestratorConfig {
  const overridden: OrchestratorConfig = { ...config };

  if (options.program !== undefined) {
    overridden.program = options.program;
  }
  if (options.script !== undefined) {
    overridden.script = options.script.trim() ? resolve(options.script.trim()) : null;
  }
  if (options.timeout !== undefined) {
    const seconds = Number(options.timeout);
    if (!Number.isInteger(seconds) || seconds < 1) {
      throw new ConfigurationError([`--timeout: expected a positive whole number of seconds, got "${options.timeout}"`]);
    }
    overridden.timeoutSeconds = seconds;
  }
  if (options.strictInputs) {
    overridden.dualSourcePolicy = DualSourcePolicy.REJECT;
  }
  if (options.reportDir !== undefined) {
    overridden.reportDir = options.reportDir;
  }

  return overridden;
}

async function executeRun(options: RunCommandOptions): Promise<void> {
  let config: OrchestratorConfig;
  try {
    config = applyOverrides(getConfig(), options);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      printError(formatError(error.message));
      process.exitCode = ExitCode.CONFIGURATION;
      return;
    }
    throw error;
  }

  let params: RunParameters;
  try {
    params = await loadRunParameters(options);
  } catch (error) {
    if (error instanceof ParameterFileError) {
      printError(formatError(error.message));
      process.exitCode = ExitCode.USAGE;
      return;
    }
    if (error instanceof ZodError) {
      printError(
        formatValidationErrors(
          error.errors.map((e) => ({ path: e.path.join('.'), message: e.message }))
        )
      );
      process.exitCode = ExitCode.USAGE;
      return;
    }
    throw error;
  }

  const controller = new AbortController();
  const cancel = (signal: NodeJS.Signals): void => {
    printError(formatError(`Received ${signal}, canceling run`));
    controller.abort(new Error(`Canceled by ${signal}`));
  };
  process.once('SIGINT', cancel);
  process.once('SIGTERM', cancel);

  try {
    const outcome = await createOrchestrator(config).run(params, { signal: controller.signal });

    print(options.json ? formatJson(outcome.summary) : outcome.markdown);
    printError(formatRunRecap(outcome.summary));
    process.exitCode = outcome.exitCode;
  } finally {
    process.removeListener('SIGINT', cancel);
    process.removeListener('SIGTERM', cancel);
  }
}
