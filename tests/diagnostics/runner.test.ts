import { beforeEach, describe, expect, it, vi } from "vitest";

import { loadConfig } from "../../src/core/config.js";
import { BuildscopeError } from "../../src/core/errors.js";
import {
  buildCommandFromConfig,
  execaBuildRunner,
  formatBuildCommand,
} from "../../src/diagnostics/runner.js";
import type { BuildCommand } from "../../src/diagnostics/types.js";

const mockedExeca = vi.fn();

vi.mock("execa", () => ({
  execa: (...args: unknown[]) => mockedExeca(...args),
}));

const command: BuildCommand = { command: "xcodebuild", args: ["build"], cwd: "/work/app" };

function processResult(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    exitCode: 0,
    all: "",
    failed: false,
    timedOut: false,
    isCanceled: false,
    isTerminated: false,
    ...overrides,
  };
}

async function captureStartError(promise: Promise<unknown>): Promise<BuildscopeError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof BuildscopeError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected the runner to reject.");
}

beforeEach(() => {
  mockedExeca.mockReset();
});

describe("execaBuildRunner", () => {
  it("spawns without a shell and merges stdout with stderr", async () => {
    mockedExeca.mockResolvedValue(processResult());

    await execaBuildRunner(command, { timeoutMs: 5_000 });

    expect(mockedExeca).toHaveBeenCalledWith("xcodebuild", ["build"], {
      cwd: "/work/app",
      all: true,
      reject: false,
      stdin: "ignore",
      timeout: 5_000,
      cancelSignal: undefined,
    });
  });

  it("returns the exit code and the interleaved output of a failed build", async () => {
    mockedExeca.mockResolvedValue(
      processResult({ exitCode: 65, failed: true, all: "x.swift:1: error: boom\n** BUILD FAILED **" }),
    );

    const invocation = await execaBuildRunner(command, {});

    expect(invocation.exitCode).toBe(65);
    expect(invocation.output).toBe("x.swift:1: error: boom\n** BUILD FAILED **");
    expect(invocation.timedOut).toBe(false);
  });

  it("drops partial output when the timeout fires", async () => {
    mockedExeca.mockResolvedValue(
      processResult({ exitCode: undefined, failed: true, timedOut: true, isTerminated: true, all: "partial" }),
    );

    const invocation = await execaBuildRunner(command, { timeoutMs: 10 });

    expect(invocation).toMatchObject({ exitCode: null, output: "", timedOut: true });
  });

  it("keeps the signal of a build that was killed", async () => {
    mockedExeca.mockResolvedValue(
      processResult({
        exitCode: undefined,
        failed: true,
        isTerminated: true,
        signal: "SIGKILL",
        all: "Compiling...",
      }),
    );

    const invocation = await execaBuildRunner(command, {});

    expect(invocation).toMatchObject({
      exitCode: null,
      signal: "SIGKILL",
      output: "Compiling...",
      timedOut: false,
    });
  });

  it("treats cancellation like a timeout", async () => {
    mockedExeca.mockResolvedValue(
      processResult({ exitCode: undefined, failed: true, isCanceled: true, isTerminated: true }),
    );

    const invocation = await execaBuildRunner(command, { signal: new AbortController().signal });

    expect(invocation.timedOut).toBe(true);
  });

  it("reports a missing tool as BUILD_TOOL_NOT_FOUND", async () => {
    mockedExeca.mockResolvedValue(
      processResult({
        exitCode: undefined,
        failed: true,
        code: "ENOENT",
        message: "spawn xcodebuild ENOENT",
      }),
    );

    const error = await captureStartError(execaBuildRunner(command, {}));

    expect(error.code).toBe("BUILD_TOOL_NOT_FOUND");
    expect(error.message).toBe('Build tool "xcodebuild" is not installed or not in PATH.');
    expect(error.context).toMatchObject({ command: "xcodebuild", errorCode: "ENOENT" });
  });

  it("reports other spawn errors as BUILD_TOOL_START_FAILED", async () => {
    mockedExeca.mockRejectedValue(new Error("invalid cwd"));

    const error = await captureStartError(execaBuildRunner(command, {}));

    expect(error.code).toBe("BUILD_TOOL_START_FAILED");
    expect(error.message).toBe('Build tool "xcodebuild" could not be started: invalid cwd');
    expect(error.severity).toBe("fatal");
  });

  it("keeps the exit code of a build killed by a signal", async () => {
    mockedExeca.mockResolvedValue(
      processResult({ exitCode: undefined, failed: true, isTerminated: true, all: "Killed" }),
    );

    const invocation = await execaBuildRunner(command, {});

    expect(invocation).toMatchObject({ exitCode: null, output: "Killed", timedOut: false });
  });
});

describe("buildCommandFromConfig", () => {
  it("assembles the xcodebuild command line in a fixed order", () => {
    const config = loadConfig({
      build: {
        project: "App.xcodeproj",
        scheme: "App",
        extraArgs: ["-quiet"],
        cwd: "/work/app",
      },
    });

    expect(buildCommandFromConfig(config.build)).toEqual({
      command: "xcodebuild",
      args: [
        "-project",
        "App.xcodeproj",
        "-scheme",
        "App",
        "-destination",
        "platform=macOS",
        "-quiet",
        "build",
      ],
      cwd: "/work/app",
    });
  });

  it("omits project and scheme when they are not configured", () => {
    const config = loadConfig({ build: { action: "test" } });

    expect(buildCommandFromConfig(config.build).args).toEqual(["-destination", "platform=macOS", "test"]);
  });
});

describe("formatBuildCommand", () => {
  it("quotes arguments that contain whitespace", () => {
    expect(
      formatBuildCommand({
        command: "xcodebuild",
        args: ["-destination", "platform=iOS Simulator,name=iPhone 15", "build"],
      }),
    ).toBe('xcodebuild -destination "platform=iOS Simulator,name=iPhone 15" build');
  });
});
