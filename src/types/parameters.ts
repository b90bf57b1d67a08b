import { z } from 'zod';

// Logical input roles of the entry-removal program
export const InputSlot = {
  MANIFEST: 'manifest',
  TEMPLATE: 'template',
  ENTRIES: 'entries',
} as const;

export type InputSlot = (typeof InputSlot)[keyof typeof InputSlot];

export const INPUT_SLOTS: readonly InputSlot[] = [
  InputSlot.MANIFEST,
  InputSlot.TEMPLATE,
  InputSlot.ENTRIES,
];

// Precedence between a local path and a storage key given for the same slot
export const DualSourcePolicy = {
  PREFER_STORAGE: 'prefer-storage',
  REJECT: 'reject',
} as const;

export type DualSourcePolicy = (typeof DualSourcePolicy)[keyof typeof DualSourcePolicy];

export interface SlotSource {
  /** Local filesystem path */
  readonly path?: string;
  /** Object key or full storage URI */
  readonly key?: string;
}

export interface RunParameters {
  readonly manifest: SlotSource;
  readonly template: SlotSource;
  readonly entries: SlotSource;
  /** Bucket applied to bare (non-URI) keys */
  readonly bucket?: string;
  /** Local directory or storage prefix URI receiving the outputs */
  readonly output?: string;
}

/**
 * Blank strings count as absent: schedulers render unset parameters as "".
 */
const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

/**
 * Parameter set as supplied by a caller (scheduler form, params file, CLI).
 */
export const runParametersInputSchema = z
  .object({
    manifest_path: optionalText,
    manifest_key: optionalText,
    template_path: optionalText,
    template_key: optionalText,
    entries_path: optionalText,
    entries_key: optionalText,
    s3_bucket: optionalText,
    output_prefix: optionalText,
    output_dir: optionalText,
  })
  .strict();

export type RunParametersInput = z.input<typeof runParametersInputSchema>;

function slotSource(path: string | undefined, key: string | undefined): SlotSource {
  return Object.freeze({
    ...(path !== undefined ? { path } : {}),
    ...(key !== undefined ? { key } : {}),
  });
}

/**
 * Validate a raw parameter set and convert it to immutable RunParameters.
 * A storage output prefix wins over a local output directory.
 */
export function parseRunParameters(raw: unknown): RunParameters {
  const input = runParametersInputSchema.parse(raw);
  const output = input.output_prefix ?? input.output_dir;

  return Object.freeze({
    manifest: slotSource(input.manifest_path, input.manifest_key),
    template: slotSource(input.template_path, input.template_key),
    entries: slotSource(input.entries_path, input.entries_key),
    ...(input.s3_bucket !== undefined ? { bucket: input.s3_bucket } : {}),
    ...(output !== undefined ? { output } : {}),
  });
}
