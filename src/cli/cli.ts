import { readFileSync } from "node:fs";

import { Command } from "commander";

import { isRecord } from "../core/index.js";
import { createDiagnoseCommand } from "./commands/diagnose.js";
import { createDoctorCommand } from "./commands/doctor.js";
import { createQualityCommand } from "./commands/quality.js";
import { createReportCommand } from "./commands/report.js";
import { DEFAULT_CONFIG_PATH } from "./config-loader.js";

export interface GlobalCliOptions {
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
  json?: boolean;
  color?: boolean;
}

function registerCommands(program: Command): void {
  program.addCommand(createDiagnoseCommand());
  program.addCommand(createQualityCommand());
  program.addCommand(createReportCommand());
  program.addCommand(createDoctorCommand());
}

// src/cli and dist/cli both sit two levels below package.json.
function readPackageVersion(): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(new URL("../../package.json", import.meta.url), "utf8"));
  } catch {
    return "0.0.0";
  }

  return isRecord(parsed) && typeof parsed.version === "string" ? parsed.version : "0.0.0";
}

export async function createCliProgram(): Promise<Command> {
  const program = new Command();
  program
    .name("buildscope")
    .description("Build error triage and source quality scoring")
    .version(readPackageVersion())
    .option("--config <path>", "Config file path", DEFAULT_CONFIG_PATH)
    .option("--verbose", "Enable verbose logging", false)
    .option("--quiet", "Suppress non-error output", false)
    .option("--json", "Output machine-readable JSON", false)
    .option("--no-color", "Disable ANSI colors");

  registerCommands(program);

  program.addHelpText(
    "after",
    `\nGetting Started:\n  $ buildscope doctor      Verify the build tool is available\n  $ buildscope diagnose    Build once and triage the compiler errors\n  $ buildscope quality     Score the source tree and list next actions\n  $ buildscope report      Both, as one Markdown report\n`,
  );

  return program;
}

export async function runCli(argv: readonly string[] = process.argv): Promise<void> {
  const program = await createCliProgram();
  await program.parseAsync([...argv]);
}
