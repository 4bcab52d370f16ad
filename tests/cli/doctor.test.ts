import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { Command } from "commander";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createDoctorCommand } from "../../src/cli/commands/doctor.js";

const mockedExeca = vi.fn();

vi.mock("execa", () => ({
  execa: (...args: unknown[]) => mockedExeca(...args),
}));

interface DoctorCheck {
  id: string;
  name: string;
  status: "pass" | "warn" | "fail";
  value: string;
  message?: string;
}

interface DoctorPayload {
  checks: DoctorCheck[];
  allPassed: boolean;
}

const originalNodeVersion = process.versions.node;
const XCODE_VERSION_OUTPUT = "Xcode 15.4\nBuild version 15F31d\n";

let tempDir: string | undefined;

function setNodeVersion(version: string): void {
  Object.defineProperty(process.versions, "node", {
    configurable: true,
    enumerable: true,
    value: version,
  });
}

function parsePayload(output: string): DoctorPayload {
  const payload: DoctorPayload = JSON.parse(output);
  return payload;
}

async function runDoctorJsonCommand(configPath = "missing.buildscope.json"): Promise<DoctorPayload> {
  const root = new Command()
    .option("--config <path>", "Config file path", "buildscope.config.json")
    .option("--verbose", "Enable verbose logging", false)
    .option("--json", "Output machine-readable JSON", false)
    .option("--no-color", "Disable ANSI colors");

  root.addCommand(createDoctorCommand());

  const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  await root.parseAsync(["node", "buildscope", "--json", "--config", configPath, "doctor"]);

  const output = logSpy.mock.calls.at(-1)?.[0];
  if (typeof output !== "string") {
    throw new Error("Doctor command did not emit JSON output.");
  }

  return parsePayload(output);
}

function getCheck(payload: DoctorPayload, id: string): DoctorCheck {
  const check = payload.checks.find((entry) => entry.id === id);
  if (!check) {
    throw new Error(`Missing check ${id}`);
  }
  return check;
}

async function writeTempConfig(contents: string): Promise<string> {
  tempDir = await mkdtemp(join(tmpdir(), "buildscope-doctor-"));
  const configPath = join(tempDir, "buildscope.config.json");
  await writeFile(configPath, contents, "utf8");
  return configPath;
}

beforeEach(() => {
  vi.restoreAllMocks();
  mockedExeca.mockReset();
  mockedExeca.mockResolvedValue({ exitCode: 0, stdout: XCODE_VERSION_OUTPUT, stderr: "" });
  setNodeVersion(originalNodeVersion);
  process.exitCode = 0;
});

afterEach(async () => {
  setNodeVersion(originalNodeVersion);
  if (tempDir) {
    await rm(tempDir, { recursive: true, force: true });
    tempDir = undefined;
  }
});

describe("createDoctorCommand", () => {
  it("returns a Commander Command instance", () => {
    const cmd = createDoctorCommand();
    expect(cmd.name()).toBe("doctor");
  });
});

describe("node version check", () => {
  const cases = [
    { version: "20.0.0", expected: true },
    { version: "20.11.1", expected: true },
    { version: "22.3.0", expected: true },
    { version: "19.9.9", expected: false },
    { version: "18.20.0", expected: false },
  ] as const;

  for (const testCase of cases) {
    it(`marks node ${testCase.version} against minimum 20.0.0 as ${testCase.expected ? "pass" : "fail"}`, async () => {
      setNodeVersion(testCase.version);

      const payload = await runDoctorJsonCommand();
      const nodeCheck = getCheck(payload, "node");

      expect(nodeCheck.status).toBe(testCase.expected ? "pass" : "fail");
      expect(nodeCheck.value).toBe(`v${testCase.version}`);
      expect(payload.allPassed).toBe(testCase.expected);
      expect(process.exitCode).toBe(testCase.expected ? 0 : 1);
    });
  }
});

describe("build tool check", () => {
  it("asks xcodebuild for its version and reports it", async () => {
    setNodeVersion("20.11.1");

    const payload = await runDoctorJsonCommand();
    const toolCheck = getCheck(payload, "build-tool");

    expect(mockedExeca).toHaveBeenCalledWith("xcodebuild", ["-version"], {
      reject: false,
      timeout: 30_000,
      stdin: "ignore",
    });
    expect(toolCheck).toMatchObject({ name: "xcodebuild", status: "pass", value: "v15.4" });
  });

  it("reports a missing tool", async () => {
    setNodeVersion("20.11.1");
    mockedExeca.mockRejectedValue(
      Object.assign(new Error("spawn xcodebuild ENOENT"), { code: "ENOENT" }),
    );

    const payload = await runDoctorJsonCommand();
    const toolCheck = getCheck(payload, "build-tool");

    expect(toolCheck.status).toBe("fail");
    expect(toolCheck.value).toBe("--");
    expect(toolCheck.message).toBe("xcodebuild is not installed or not in PATH.");
    expect(payload.allPassed).toBe(false);
    expect(process.exitCode).toBe(1);
  });

  it("falls back to stderr when the tool exits non-zero", async () => {
    setNodeVersion("20.11.1");
    mockedExeca.mockResolvedValue({
      exitCode: 1,
      stdout: "",
      stderr: "xcode-select: error: tool 'xcodebuild' requires Xcode\n",
    });

    const payload = await runDoctorJsonCommand();

    expect(getCheck(payload, "build-tool").message).toBe(
      "xcode-select: error: tool 'xcodebuild' requires Xcode",
    );
  });
});

describe("config check", () => {
  it("uses defaults when no config file exists", async () => {
    setNodeVersion("20.11.1");

    const payload = await runDoctorJsonCommand();

    expect(getCheck(payload, "config")).toMatchObject({ status: "pass", value: "defaults" });
  });

  it("checks the tool named in a valid config", async () => {
    setNodeVersion("20.11.1");
    mockedExeca.mockResolvedValue({ exitCode: 0, stdout: "Swift version 5.10\n", stderr: "" });
    const configPath = await writeTempConfig(JSON.stringify({ build: { command: "swift" } }));

    const payload = await runDoctorJsonCommand(configPath);

    expect(getCheck(payload, "config")).toMatchObject({ status: "pass", value: configPath });
    expect(mockedExeca).toHaveBeenCalledWith("swift", ["--version"], expect.any(Object));
    expect(getCheck(payload, "build-tool").value).toBe("v5.10");
  });

  it("warns about an invalid config without failing", async () => {
    setNodeVersion("20.11.1");
    const configPath = await writeTempConfig(JSON.stringify({ build: { command: 5 } }));

    const payload = await runDoctorJsonCommand(configPath);
    const configCheck = getCheck(payload, "config");

    expect(configCheck.status).toBe("warn");
    expect(configCheck.value).toBe("invalid");
    expect(configCheck.message).toBe(
      `Failed to load config at ${configPath}: Invalid buildscope configuration`,
    );
    expect(payload.allPassed).toBe(true);
  });
});
