import { basename } from "node:path";

import type { ChalkInstance } from "chalk";
import { Command } from "commander";

import { isRecord, loadConfig } from "../../core/index.js";
import { loadOptionalConfigFile } from "../config-loader.js";
import { createUi, getGlobalOptions } from "../helpers.js";

type DoctorStatus = "pass" | "warn" | "fail";

interface DoctorCheck {
  id: string;
  name: string;
  requirement: string;
  value: string;
  status: DoctorStatus;
  message?: string;
}

interface CommandResult {
  ok: boolean;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  errorCode?: string;
  errorMessage?: string;
}

const MINIMUM_NODE_VERSION = "20.0.0";

export function createDoctorCommand(): Command {
  const command = new Command("doctor");

  command.description("Check local environment readiness").action(async (_options, cmd: Command) => {
    const globalOptions = getGlobalOptions(cmd);
    const ui = createUi(globalOptions);

    const checks = await runDoctorChecks(globalOptions.config);
    const allPassed = checks.every((check) => check.status !== "fail");

    if (globalOptions.json) {
      console.log(
        JSON.stringify(
          {
            checks,
            allPassed,
          },
          null,
          2,
        ),
      );
    } else {
      renderDoctorOutput(ui, checks, allPassed);
    }

    if (!allPassed) {
      process.exitCode = 1;
    }
  });

  return command;
}

async function runDoctorChecks(configPath: string): Promise<DoctorCheck[]> {
  const checks: DoctorCheck[] = [];

  const nodeVersion = process.versions.node;
  checks.push({
    id: "node",
    name: "Node.js",
    requirement: `>= ${MINIMUM_NODE_VERSION}`,
    value: `v${nodeVersion}`,
    status: isVersionAtLeast(nodeVersion, MINIMUM_NODE_VERSION) ? "pass" : "fail",
    message: `Node.js ${MINIMUM_NODE_VERSION}+ is required.`,
  });

  const configWarnings: string[] = [];
  const loaded = await loadOptionalConfigFile(configPath, {
    onWarning: (message) => configWarnings.push(message),
  });
  checks.push({
    id: "config",
    name: "Config",
    requirement: "valid or absent",
    value: loaded ? configPath : configWarnings.length > 0 ? "invalid" : "defaults",
    status: configWarnings.length > 0 ? "warn" : "pass",
    message: configWarnings[0],
  });

  const buildTool = (loaded ?? loadConfig({})).build.command;
  const toolResult = await runCommand(buildTool, versionArgs(buildTool));
  checks.push({
    id: "build-tool",
    name: basename(buildTool),
    requirement: "installed",
    value: extractVersion(toolResult.stdout) ?? "--",
    status: toolResult.ok ? "pass" : "fail",
    message: toolResult.ok ? undefined : explainCommandFailure(buildTool, toolResult),
  });

  return checks;
}

function versionArgs(tool: string): string[] {
  return basename(tool) === "xcodebuild" ? ["-version"] : ["--version"];
}

function renderDoctorOutput(ui: ChalkInstance, checks: DoctorCheck[], allPassed: boolean): void {
  console.log("Checking environment...");
  console.log("");

  for (const check of checks) {
    const iconMap = { pass: ui.green("[OK]"), warn: ui.yellow("[!]"), fail: ui.red("[X]") };
    const statusMap = { pass: ui.green("PASS"), warn: ui.yellow("WARN"), fail: ui.red("FAIL") };
    const icon = iconMap[check.status];
    const status = statusMap[check.status];

    const name = check.name.padEnd(12, " ");
    const requirement = check.requirement.padEnd(18, " ");
    const value = check.value.padEnd(24, " ");

    console.log(`  ${icon} ${name} ${requirement} ${value} ${status}`);

    if (check.status === "fail" && check.message) {
      console.log(`    ${ui.red(check.message)}`);
    }
    if (check.status === "warn" && check.message) {
      console.log(`    ${ui.yellow(check.message)}`);
    }
  }

  console.log("");
  if (allPassed) {
    console.log(ui.green("All checks passed."));
  } else {
    console.log(ui.red("Some checks failed."));
  }
}

function extractVersion(output: string): string | undefined {
  const match = output.match(/v?(\d+\.\d+(?:\.\d+)?)/i);
  if (!match) {
    return undefined;
  }

  return `v${match[1]}`;
}

function explainCommandFailure(commandName: string, result: CommandResult): string {
  if (result.errorCode === "ENOENT") {
    return `${commandName} is not installed or not in PATH.`;
  }

  if (result.errorMessage) {
    return result.errorMessage;
  }

  if (result.stderr.trim().length > 0) {
    return result.stderr.trim();
  }

  return `${commandName} exited with code ${String(result.exitCode)}.`;
}

function isVersionAtLeast(version: string, minimum: string): boolean {
  const current = version.split(".").map((part) => Number.parseInt(part, 10));
  const required = minimum.split(".").map((part) => Number.parseInt(part, 10));
  const length = Math.max(current.length, required.length);

  for (let index = 0; index < length; index += 1) {
    const currentPart = current[index] ?? 0;
    const requiredPart = required[index] ?? 0;

    if (currentPart > requiredPart) {
      return true;
    }

    if (currentPart < requiredPart) {
      return false;
    }
  }

  return true;
}

async function runCommand(command: string, args: string[]): Promise<CommandResult> {
  try {
    const { execa } = await import("execa");
    const result = await execa(command, args, {
      reject: false,
      timeout: 30_000,
      stdin: "ignore",
    });
    const exitCode = typeof result.exitCode === "number" ? result.exitCode : null;
    return {
      ok: exitCode === 0,
      exitCode,
      stdout: typeof result.stdout === "string" ? result.stdout : "",
      stderr: typeof result.stderr === "string" ? result.stderr : "",
      errorCode: errorCodeOf(result),
    };
  } catch (error) {
    return {
      ok: false,
      exitCode: null,
      stdout: "",
      stderr: "",
      errorCode: errorCodeOf(error),
      errorMessage: error instanceof Error ? error.message : String(error),
    };
  }
}

function errorCodeOf(value: unknown): string | undefined {
  return isRecord(value) && typeof value.code === "string" ? value.code : undefined;
}
