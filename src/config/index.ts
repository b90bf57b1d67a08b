/**
 * Orchestrator Configuration Module
 *
 * Centralizes all configuration reading from environment variables
 * with validation and defaults.
 */

import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { z } from 'zod';
import { DualSourcePolicy } from '../types/index.js';
import { ConfigurationError } from '../errors/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

/**
 * Boolean environment flag. Unlike z.coerce.boolean(), "false" and "0" are false.
 */
function envFlag(fallback: boolean) {
  return z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === 'true' || value === '1' || value === 'yes'));
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Object storage client configuration
 */
const storageConfigSchema = z.object({
  region: z.string().min(1).default('us-east-1'),
  /** Custom endpoint for S3-compatible stores */
  endpoint: z.string().url().optional(),
  forcePathStyle: envFlag(false),
});

export type StorageConfig = z.infer<typeof storageConfigSchema>;

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // External program
  program: z.string().min(1).default('python3'),
  /** First program argument; resolved against the launch directory, empty disables */
  script: z
    .string()
    .default('entry_remove.py')
    .transform((value) => (value.trim() ? resolve(value.trim()) : null)),

  // Execution limits
  timeoutSeconds: z.coerce.number().int().min(1).max(86400).default(1800),
  killGraceMs: z.coerce.number().int().min(0).max(60000).default(5000),
  logTailBytes: z.coerce.number().int().min(256).max(1048576).default(8000),

  // Workspace
  workRoot: z.string().min(1).default(join(tmpdir(), 'entry-remove')),
  stageLocalInputs: envFlag(true),

  // Input resolution
  templateRequired: envFlag(true),
  dualSourcePolicy: z
    .enum([DualSourcePolicy.PREFER_STORAGE, DualSourcePolicy.REJECT])
    .default(DualSourcePolicy.PREFER_STORAGE),

  // Output collection
  outputPatterns: z
    .string()
    .default('*_EntRemove*.xlsx')
    .transform(splitList)
    .pipe(z.array(z.string()).min(1)),
  /** Where the program writes its outputs; relative to the workspace, which is the default */
  outputRoot: z.string().min(1).optional(),
  outputDir: z.string().min(1).optional(),
  reportDir: z.string().min(1).optional(),
  /** Upload the markdown summary next to relocated outputs */
  publishSummary: envFlag(false),

  storage: storageConfigSchema,
});

export type OrchestratorConfig = z.infer<typeof configSchema>;

/**
 * Load configuration from environment variables
 */
export function loadConfig(): OrchestratorConfig {
  const raw = {
    program: process.env['ENTRY_REMOVE_PROGRAM'],
    script: process.env['ENTRY_REMOVE_SCRIPT'],
    timeoutSeconds: process.env['ENTRY_REMOVE_TIMEOUT_SECONDS'],
    killGraceMs: process.env['ENTRY_REMOVE_KILL_GRACE_MS'],
    logTailBytes: process.env['ENTRY_REMOVE_LOG_TAIL_BYTES'],
    workRoot: process.env['ENTRY_REMOVE_WORK_ROOT'],
    stageLocalInputs: process.env['ENTRY_REMOVE_STAGE_LOCAL_INPUTS'],
    templateRequired: process.env['ENTRY_REMOVE_TEMPLATE_REQUIRED'],
    dualSourcePolicy: process.env['ENTRY_REMOVE_DUAL_SOURCE_POLICY'],
    outputPatterns: process.env['ENTRY_REMOVE_OUTPUT_PATTERNS'],
    outputRoot: process.env['ENTRY_REMOVE_OUTPUT_ROOT'],
    outputDir: process.env['ENTRY_REMOVE_OUTPUT_DIR'],
    reportDir: process.env['ENTRY_REMOVE_REPORT_DIR'],
    publishSummary: process.env['ENTRY_REMOVE_PUBLISH_SUMMARY'],
    storage: {
      region: process.env['AWS_REGION'],
      endpoint: process.env['AWS_ENDPOINT_URL'],
      forcePathStyle: process.env['AWS_S3_FORCE_PATH_STYLE'],
    },
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.errors.map(
      (issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`
    );
    log.error({ errors }, 'Invalid configuration');
    throw new ConfigurationError(errors);
  }

  log.debug(
    {
      program: result.data.program,
      script: result.data.script,
      timeoutSeconds: result.data.timeoutSeconds,
      workRoot: result.data.workRoot,
      dualSourcePolicy: result.data.dualSourcePolicy,
      outputPatterns: result.data.outputPatterns,
    },
    'Configuration loaded'
  );

  return result.data;
}

/**
 * Singleton configuration instance
 */
let configInstance: OrchestratorConfig | null = null;

/**
 * Get the configuration singleton
 */
export function getConfig(): OrchestratorConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
