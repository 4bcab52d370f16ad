import { execa } from "execa";

import { type BuildConfig, buildError, isRecord, toErrorMessage } from "../core/index.js";
import type { BuildCommand, BuildInvocation, BuildRunOptions, BuildRunner } from "./types.js";

/**
 * Default runner: spawns the build without a shell and captures stdout and
 * stderr interleaved, the way `2>&1` would.
 */
export const execaBuildRunner: BuildRunner = async (
  command: BuildCommand,
  options: BuildRunOptions,
): Promise<BuildInvocation> => {
  const startedAt = Date.now();

  let result: Awaited<ReturnType<typeof runBuildProcess>>;
  try {
    result = await runBuildProcess(command, options);
  } catch (error) {
    throw toStartError(command, error);
  }

  if (result.timedOut || result.isCanceled) {
    return {
      exitCode: null,
      output: "",
      timedOut: true,
      durationMs: Date.now() - startedAt,
    };
  }

  if (result.failed && typeof result.exitCode !== "number" && !result.isTerminated) {
    throw toStartError(command, result);
  }

  return {
    exitCode: typeof result.exitCode === "number" ? result.exitCode : null,
    output: typeof result.all === "string" ? result.all : "",
    signal: typeof result.signal === "string" ? result.signal : undefined,
    timedOut: false,
    durationMs: Date.now() - startedAt,
  };
};

function runBuildProcess(command: BuildCommand, options: BuildRunOptions) {
  return execa(command.command, command.args, {
    cwd: command.cwd,
    all: true,
    reject: false,
    stdin: "ignore",
    timeout: options.timeoutMs,
    cancelSignal: options.signal,
  });
}

function toStartError(command: BuildCommand, error: unknown) {
  const errorCode = isRecord(error) && typeof error.code === "string" ? error.code : undefined;
  const context = {
    command: command.command,
    args: command.args,
    cwd: command.cwd,
    errorCode,
  };

  if (errorCode === "ENOENT") {
    return buildError(
      "BUILD_TOOL_NOT_FOUND",
      `Build tool "${command.command}" is not installed or not in PATH.`,
      { context, cause: error },
    );
  }

  return buildError(
    "BUILD_TOOL_START_FAILED",
    `Build tool "${command.command}" could not be started: ${describeFailure(error)}`,
    { context, cause: error },
  );
}

function describeFailure(error: unknown): string {
  if (isRecord(error) && typeof error.message === "string") {
    return error.message;
  }
  return toErrorMessage(error);
}

/**
 * Turn the `build` config section into a command line:
 * `<command> -project <p> -scheme <s> -destination <d> ...extraArgs <action>`.
 */
export function buildCommandFromConfig(config: BuildConfig): BuildCommand {
  const args: string[] = [];
  if (config.project) {
    args.push("-project", config.project);
  }
  if (config.scheme) {
    args.push("-scheme", config.scheme);
  }
  if (config.destination) {
    args.push("-destination", config.destination);
  }
  args.push(...config.extraArgs, config.action);

  return { command: config.command, args, cwd: config.cwd };
}

export function formatBuildCommand(command: BuildCommand): string {
  return [command.command, ...command.args]
    .map((part) => (/[\s'"]/.test(part) ? JSON.stringify(part) : part))
    .join(" ");
}
