import type { ChalkInstance } from "chalk";
import { Command } from "commander";

import type { BuildscopeConfig, OutputFormat } from "../../core/index.js";
import {
  type BuildCommand,
  type DiagnosticsReport,
  buildCommandFromConfig,
  exitCodeForStatus,
  formatBuildCommand,
  runDiagnostics,
} from "../../diagnostics/index.js";
import { renderDiagnosticsMarkdown, renderJson } from "../../report/index.js";
import {
  createSpinner,
  createUi,
  getGlobalOptions,
  loadEffectiveConfig,
  normalizeOutputFormat,
  parseInteger,
  warn,
  writeOutputFile,
} from "../helpers.js";
import { renderDiagnosticsConsole } from "../render.js";

interface DiagnoseCommandOptions {
  timeout?: number;
  top?: number;
  format: string;
  output?: string;
}

export function createDiagnoseCommand(): Command {
  const command = new Command("diagnose");

  command
    .description("Run the build once and classify its compiler errors")
    .argument("[command...]", "Build command to run instead of the configured one (after --)")
    .option("--timeout <ms>", "Abort the build after this many milliseconds", parseInteger)
    .option("--top <n>", "Number of files to list by error count", parseInteger)
    .option("--format <format>", "Output format: table|json|markdown", "table")
    .option("--output <file>", "Write the report to a file instead of stdout")
    .action(async (commandParts: string[], options: DiagnoseCommandOptions, cmd: Command) => {
      const globalOptions = getGlobalOptions(cmd);
      const ui = createUi(globalOptions);
      const format: OutputFormat = globalOptions.json ? "json" : normalizeOutputFormat(options.format);

      if (options.timeout !== undefined && options.timeout <= 0) {
        throw new Error("--timeout must be a positive number of milliseconds.");
      }
      if (options.top !== undefined && options.top < 0) {
        throw new Error("--top must not be negative.");
      }

      const config = await loadEffectiveConfig(globalOptions, ui);
      const buildCommand = resolveBuildCommand(commandParts, config);

      const spinner = createSpinner(
        format !== "table" || globalOptions.quiet,
        `Building: ${formatBuildCommand(buildCommand)}`,
      );

      const report = await withInterruptSignal((signal) =>
        runDiagnostics(buildCommand, {
          timeoutMs: options.timeout ?? config.build.timeoutMs,
          topFileLimit: options.top ?? config.diagnostics.topFileLimit,
          sampleErrorLimit: config.diagnostics.sampleErrorLimit,
          signal,
        }),
      );

      if (report.status === "success") {
        spinner?.succeed("Build finished without errors");
      } else {
        spinner?.fail(`Build ${report.status}`);
      }
      reportBuildWarnings(ui, report);

      process.exitCode = exitCodeForStatus(report.status);

      const rendered = renderDiagnostics(report, format);
      if (options.output) {
        const writtenPath = await writeOutputFile(
          options.output,
          rendered ?? renderDiagnosticsMarkdown(report),
        );
        if (!globalOptions.quiet && format === "table") {
          console.log(ui.blue(`Report written to ${writtenPath}`));
        }
        return;
      }

      if (rendered !== undefined) {
        console.log(rendered);
      } else if (!globalOptions.quiet) {
        renderDiagnosticsConsole(ui, report);
      }
    });

  command.addHelpText(
    "after",
    `\nWithout a command, the build is assembled from the "build" section of the config.

Examples:
  $ buildscope diagnose
  $ buildscope diagnose --top 10 --format markdown --output build-report.md
  $ buildscope diagnose --timeout 600000 -- xcodebuild -scheme App build`,
  );

  return command;
}

export function resolveBuildCommand(commandParts: string[], config: BuildscopeConfig): BuildCommand {
  const [executable, ...args] = commandParts;
  if (executable === undefined) {
    return buildCommandFromConfig(config.build);
  }

  return { command: executable, args, cwd: config.build.cwd };
}

export function reportBuildWarnings(ui: ChalkInstance, report: DiagnosticsReport): void {
  if (report.notice) {
    warn(ui, report.notice);
  }
}

function renderDiagnostics(report: DiagnosticsReport, format: OutputFormat): string | undefined {
  switch (format) {
    case "json":
      return renderJson({ diagnostics: report });
    case "markdown":
      return renderDiagnosticsMarkdown(report);
    case "table":
      return undefined;
  }
}

/** Ctrl-C cancels the build rather than killing the CLI mid-report. */
export async function withInterruptSignal<T>(task: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once("SIGINT", onInterrupt);

  try {
    return await task(controller.signal);
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}
