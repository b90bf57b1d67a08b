import { statusLabel } from '../reporter/summary.js';
import { formatLocator } from '../storage/locator.js';
import { RunStatus, type RunSummary, type StorageLocator } from '../types/index.js';
import { formatBytes, formatDuration } from '../utils/format.js';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  gray: '\x1b[90m',
} as const;

type Color = keyof typeof colors;

/**
 * Check if colors should be enabled.
 */
function useColors(): boolean {
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  // Run summaries go to stderr, so that is the stream checked
  return process.stderr.isTTY ?? false;
}

function colorize(text: string, color: Color): string {
  if (!useColors()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

export function bold(text: string): string {
  return colorize(text, 'bold');
}

export function dim(text: string): string {
  return colorize(text, 'dim');
}

export function red(text: string): string {
  return colorize(text, 'red');
}

export function green(text: string): string {
  return colorize(text, 'green');
}

const statusColors: Record<RunStatus, Color> = {
  [RunStatus.SUCCESS]: 'green',
  [RunStatus.NON_ZERO_EXIT]: 'red',
  [RunStatus.TIMED_OUT]: 'yellow',
  [RunStatus.RESOLUTION_FAILED]: 'red',
  [RunStatus.CANCELED]: 'gray',
  [RunStatus.FAILED]: 'red',
};

/**
 * Format a run status with appropriate color.
 */
export function formatStatus(status: RunStatus): string {
  return colorize(statusLabel(status), statusColors[status]);
}

/**
 * Short terminal recap of a finished run.
 */
export function formatRunRecap(summary: RunSummary): string {
  const lines: string[] = [];

  lines.push(`${bold('Run:')}       ${summary.runId}`);
  lines.push(`${bold('Status:')}    ${formatStatus(summary.status)}`);
  lines.push(`${bold('Exit code:')} ${summary.exitCode}`);
  lines.push(`${bold('Duration:')}  ${formatDuration(summary.durationMs)}`);

  if (summary.error) {
    lines.push(`${bold(red('Error:'))}     ${red(`${summary.error.code}: ${summary.error.message}`)}`);
  }

  for (const artifact of summary.artifacts) {
    const mark = artifact.success ? green('✓') : red('✗');
    const target = artifact.destination ?? dim('(local only)');
    lines.push(`  ${mark} ${artifact.fileName} ${dim('->')} ${target} ${dim(`(${formatBytes(artifact.sizeBytes)})`)}`);
  }

  return lines.join('\n');
}

/**
 * Format a storage listing, one locator per line.
 */
export function formatLocatorList(locators: readonly StorageLocator[]): string {
  if (locators.length === 0) {
    return dim('No objects found.');
  }
  return locators.map(formatLocator).join('\n');
}

export function formatSuccess(message: string): string {
  return `${green('✓')} ${message}`;
}

export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
}

/**
 * Format JSON output. Dates serialize as ISO strings.
 */
export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Format and print validation errors.
 */
export function formatValidationErrors(errors: Array<{ path: string; message: string }>): string {
  const lines = errors.map((e) => {
    const path = e.path ? `${bold(e.path)}: ` : '';
    return `  ${red('•')} ${path}${e.message}`;
  });

  return [formatError('Validation failed:'), ...lines].join('\n');
}

/**
 * Print to stdout.
 */
export function print(text: string): void {
  // eslint-disable-next-line no-console -- CLI output function
  console.log(text);
}

/**
 * Print to stderr.
 */
export function printError(text: string): void {
  // eslint-disable-next-line no-console -- CLI error output function
  console.error(text);
}
