import { BuildscopeError, buildError } from "../core/index.js";
import { classifyBuildOutput, emptyTally } from "./classifier.js";
import { execaBuildRunner } from "./runner.js";
import type {
  BuildClassification,
  BuildCommand,
  BuildInvocation,
  DiagnosticsReport,
  DiagnosticsStatus,
  RunDiagnosticsOptions,
} from "./types.js";

export const EXIT_SUCCESS = 0;
export const EXIT_BUILD_FAILURE = 1;
export const EXIT_CONFIG_ERROR = 2;
export const EXIT_TIMED_OUT = 3;

/**
 * Run the build once and triage its output. Compile errors are reported in
 * the result; only a broken runner (a non-`BuildscopeError` throw) rejects.
 */
export async function runDiagnostics(
  buildCommand: BuildCommand,
  options: RunDiagnosticsOptions = {},
): Promise<DiagnosticsReport> {
  const runner = options.runner ?? execaBuildRunner;
  const startedAt = Date.now();

  let invocation: Awaited<ReturnType<typeof runner>>;
  try {
    invocation = await runner(buildCommand, {
      timeoutMs: options.timeoutMs,
      signal: options.signal,
    });
  } catch (error) {
    if (!(error instanceof BuildscopeError)) {
      throw error;
    }

    return {
      ...unclassified(),
      status: "configuration-error",
      command: buildCommand,
      exitCode: null,
      error,
      metadata: { generatedAt: new Date().toISOString(), durationMs: Date.now() - startedAt },
    };
  }

  if (invocation.timedOut) {
    const reason =
      options.signal?.aborted === true
        ? "was cancelled"
        : `did not finish within ${String(options.timeoutMs)}ms`;

    return {
      ...unclassified(),
      status: "timed-out",
      command: buildCommand,
      exitCode: null,
      error: buildError("BUILD_TIMED_OUT", `Build ${reason}.`, {
        severity: "recoverable",
        context: { command: buildCommand.command, timeoutMs: options.timeoutMs },
      }),
      metadata: { generatedAt: new Date().toISOString(), durationMs: invocation.durationMs },
    };
  }

  const classification = classifyBuildOutput(invocation.output, {
    topFileLimit: options.topFileLimit,
    sampleErrorLimit: options.sampleErrorLimit,
  });

  const status: DiagnosticsStatus = classification.totalErrors === 0 ? "success" : "failure";
  const notice = status === "success" ? describeSilentFailure(invocation) : undefined;

  return {
    ...classification,
    status,
    command: buildCommand,
    exitCode: invocation.exitCode,
    ...(notice ? { notice } : {}),
    metadata: { generatedAt: new Date().toISOString(), durationMs: invocation.durationMs },
  };
}

/**
 * A build can die without printing `error:`, e.g. when the OOM killer sends
 * SIGKILL. The status stays `success`; the notice makes it visible.
 */
export function describeSilentFailure(invocation: BuildInvocation): string | undefined {
  if (invocation.signal) {
    return `Build was terminated by ${invocation.signal} without printing an error line.`;
  }
  if (invocation.exitCode === null) {
    return "Build ended without an exit code and without printing an error line.";
  }
  if (invocation.exitCode !== 0) {
    return `Build tool exited with code ${invocation.exitCode} without printing an error line.`;
  }
  return undefined;
}

export function exitCodeForStatus(status: DiagnosticsStatus): number {
  switch (status) {
    case "success":
      return EXIT_SUCCESS;
    case "failure":
      return EXIT_BUILD_FAILURE;
    case "configuration-error":
      return EXIT_CONFIG_ERROR;
    case "timed-out":
      return EXIT_TIMED_OUT;
  }
}

function unclassified(): BuildClassification {
  return {
    totalErrors: 0,
    totalWarnings: 0,
    categories: emptyTally(),
    remediation: [],
    topFiles: [],
    sampleErrors: [],
  };
}
