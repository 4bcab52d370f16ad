/**
 * Timing data attached to every report. Kept apart from the measured
 * fields so two runs over the same input compare equal on everything else.
 */
export interface ReportMetadata {
  generatedAt: string;
  durationMs: number;
}

export type OutputFormat = "table" | "json" | "markdown";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["table", "json", "markdown"];
