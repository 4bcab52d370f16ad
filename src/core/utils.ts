/**
 * Shared utility functions used across the codebase.
 */

/**
 * Truncate a string to `maxLength`, appending an ellipsis when trimmed.
 * Defaults to the unicode ellipsis `"…"` (1 char).  Pass `"..."` for the
 * three-dot ASCII variant.
 */
export function truncate(value: string, maxLength: number, ellipsis = "…"): string {
  if (value.length <= maxLength) {
    return value;
  }
  return `${value.slice(0, Math.max(0, maxLength - ellipsis.length))}${ellipsis}`;
}

/**
 * Type guard: returns `true` when `value` is a non-null object
 * (i.e.\ a `Record<string, unknown>`).
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/** Round to three decimals, the precision every score is reported at. */
export function roundScore(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * Integer percentage of `part` in `whole`, truncated toward zero.
 * Returns `undefined` when `whole` is zero.
 */
export function percentOf(part: number, whole: number): number | undefined {
  if (whole <= 0) {
    return undefined;
  }
  return Math.floor((part * 100) / whole);
}

/**
 * Split text into lines, accepting both LF and CRLF endings. A trailing
 * newline does not produce an extra empty line.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}
