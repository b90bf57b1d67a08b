/**
 * One output file matched by the collector.
 */
export interface CollectedArtifact {
  readonly fileName: string;
  readonly sourcePath: string;
  /** Canonical destination (URI or local path); null when left in place */
  readonly destination: string | null;
  readonly relocated: boolean;
  readonly success: boolean;
  readonly error: string | null;
  readonly sizeBytes: number;
}
