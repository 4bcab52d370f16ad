export type BuildscopeErrorSeverity = "fatal" | "recoverable" | "warning";

export const BUILD_ERROR_CODES = [
  "BUILD_TOOL_NOT_FOUND",
  "BUILD_TOOL_START_FAILED",
  "BUILD_TIMED_OUT",
] as const;

export const SCAN_ERROR_CODES = ["SOURCE_ROOT_UNREADABLE"] as const;

export const CONFIG_ERROR_CODES = ["CONFIG_INVALID", "CONFIG_SECRET_MISSING"] as const;

export const BUILDSCOPE_ERROR_CODES = [
  ...BUILD_ERROR_CODES,
  ...SCAN_ERROR_CODES,
  ...CONFIG_ERROR_CODES,
] as const;

export type BuildErrorCode = (typeof BUILD_ERROR_CODES)[number];
export type ScanErrorCode = (typeof SCAN_ERROR_CODES)[number];
export type ConfigErrorCode = (typeof CONFIG_ERROR_CODES)[number];
export type BuildscopeErrorCode = (typeof BUILDSCOPE_ERROR_CODES)[number];

export interface BuildscopeErrorOptions {
  severity?: BuildscopeErrorSeverity;
  context?: Record<string, unknown>;
  cause?: unknown;
}

export class BuildscopeError extends Error {
  public readonly code: BuildscopeErrorCode;
  public readonly severity: BuildscopeErrorSeverity;
  public readonly context?: Record<string, unknown>;
  public override readonly cause?: unknown;

  public constructor(
    message: string,
    code: BuildscopeErrorCode,
    severity: BuildscopeErrorSeverity,
    context?: Record<string, unknown>,
    cause?: unknown,
  ) {
    super(message);
    this.name = "BuildscopeError";
    this.code = code;
    this.severity = severity;
    this.context = context;
    this.cause = cause;
  }
}

function createError(
  code: BuildscopeErrorCode,
  message: string,
  defaultSeverity: BuildscopeErrorSeverity,
  options: BuildscopeErrorOptions = {},
): BuildscopeError {
  return new BuildscopeError(
    message,
    code,
    options.severity ?? defaultSeverity,
    options.context,
    options.cause,
  );
}

/**
 * Errors raised when the build tool itself is broken: not installed, not
 * startable or cut off by a timeout. Compile errors never go through here.
 */
export function buildError(
  code: BuildErrorCode,
  message: string,
  options: BuildscopeErrorOptions = {},
): BuildscopeError {
  return createError(code, message, "fatal", options);
}

export function scanError(
  code: ScanErrorCode,
  message: string,
  options: BuildscopeErrorOptions = {},
): BuildscopeError {
  return createError(code, message, "fatal", options);
}

export function configError(
  code: ConfigErrorCode,
  message: string,
  options: BuildscopeErrorOptions = {},
): BuildscopeError {
  return createError(code, message, "fatal", options);
}

/** True for errors that mean the tooling, not the code under test, is broken. */
export function isConfigurationError(error: unknown): error is BuildscopeError {
  return error instanceof BuildscopeError && error.severity === "fatal";
}
