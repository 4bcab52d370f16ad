import type { BuildscopeError, ReportMetadata } from "../core/index.js";

export type ErrorCategory =
  | "optional-chaining"
  | "type-conversion"
  | "missing-symbol"
  | "syntax"
  | "other";

/**
 * Per-category line counts. Categories are not exclusive: one line may be
 * counted under several of them, so the sum need not equal `totalErrors`.
 */
export type ErrorTally = Record<ErrorCategory, number>;

export type DiagnosticsStatus = "success" | "failure" | "configuration-error" | "timed-out";

/**
 * What to run. `command` is resolved on PATH; `args` are passed verbatim,
 * never through a shell.
 */
export interface BuildCommand {
  command: string;
  args: string[];
  cwd?: string;
}

export interface BuildInvocation {
  /** `null` when the process never produced an exit code. */
  exitCode: number | null;
  /** Interleaved stdout and stderr. */
  output: string;
  /** Set when the process was killed by a signal, e.g. `SIGKILL`. */
  signal?: string;
  timedOut: boolean;
  durationMs: number;
}

export interface BuildRunOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Runs a build to completion. Implementations must throw a
 * `BuildscopeError` when the command cannot be started, and must resolve
 * (never reject) for builds that ran but failed to compile.
 */
export type BuildRunner = (command: BuildCommand, options: BuildRunOptions) => Promise<BuildInvocation>;

export interface FileErrorCount {
  /** Base name shown to the user. */
  file: string;
  /** Path exactly as the compiler printed it. */
  path: string;
  count: number;
}

export interface RemediationStep {
  order: number;
  category: Exclude<ErrorCategory, "other">;
  count: number;
  label: string;
  hint: string;
}

export interface BuildClassification {
  totalErrors: number;
  totalWarnings: number;
  categories: ErrorTally;
  remediation: RemediationStep[];
  topFiles: FileErrorCount[];
  sampleErrors: string[];
}

export interface DiagnosticsReport extends BuildClassification {
  status: DiagnosticsStatus;
  command: BuildCommand;
  exitCode: number | null;
  /** Set when the status is `configuration-error` or `timed-out`. */
  error?: BuildscopeError;
  /**
   * Set on a `success` whose process still exited non-zero or was killed,
   * since the status only looks at printed error lines.
   */
  notice?: string;
  metadata: ReportMetadata;
}

export interface ClassifyOptions {
  topFileLimit?: number;
  sampleErrorLimit?: number;
}

export interface RunDiagnosticsOptions extends ClassifyOptions, BuildRunOptions {
  runner?: BuildRunner;
}
