import { Command } from "commander";

import { isConfigurationError } from "../../core/index.js";
import {
  type DiagnosticsReport,
  EXIT_BUILD_FAILURE,
  EXIT_CONFIG_ERROR,
  buildCommandFromConfig,
  exitCodeForStatus,
  runDiagnostics,
} from "../../diagnostics/index.js";
import { estimate } from "../../quality/index.js";
import {
  type ReportFailures,
  renderCombinedMarkdown,
  renderJson,
  serializeError,
} from "../../report/index.js";
import {
  createSpinner,
  createUi,
  getGlobalOptions,
  loadEffectiveConfig,
  parseInteger,
  warn,
  writeOutputFile,
} from "../helpers.js";
import { reportBuildWarnings, withInterruptSignal } from "./diagnose.js";
import { reportScanWarnings } from "./quality.js";

interface ReportCommandOptions {
  timeout?: number;
  output?: string;
}

export function createReportCommand(): Command {
  const command = new Command("report");

  command
    .description("Run the build and the quality scan together and write one report")
    .argument("[path]", "Source root to scan", ".")
    .option("--timeout <ms>", "Abort the build after this many milliseconds", parseInteger)
    .option("--output <file>", "Write the report to a file instead of stdout")
    .action(async (sourceRoot: string, options: ReportCommandOptions, cmd: Command) => {
      const globalOptions = getGlobalOptions(cmd);
      const ui = createUi(globalOptions);

      if (options.timeout !== undefined && options.timeout <= 0) {
        throw new Error("--timeout must be a positive number of milliseconds.");
      }

      const config = await loadEffectiveConfig(globalOptions, ui);
      const spinner = createSpinner(
        globalOptions.json || globalOptions.quiet,
        "Building and scanning...",
      );

      // A failed half is reported in place of its section.
      const [diagnosticsResult, qualityResult] = await withInterruptSignal((signal) =>
        Promise.allSettled([
          runDiagnostics(buildCommandFromConfig(config.build), {
            timeoutMs: options.timeout ?? config.build.timeoutMs,
            topFileLimit: config.diagnostics.topFileLimit,
            sampleErrorLimit: config.diagnostics.sampleErrorLimit,
            signal,
          }),
          estimate(sourceRoot, { config: config.quality, signal }),
        ]),
      );

      if (diagnosticsResult.status === "rejected" && qualityResult.status === "rejected") {
        spinner?.fail("Report failed");
        throw qualityResult.reason;
      }

      const diagnostics = diagnosticsResult.status === "fulfilled" ? diagnosticsResult.value : undefined;
      const quality = qualityResult.status === "fulfilled" ? qualityResult.value : undefined;
      const failures: ReportFailures = {
        ...(diagnosticsResult.status === "rejected"
          ? { diagnostics: serializeError(diagnosticsResult.reason) }
          : {}),
        ...(qualityResult.status === "rejected" ? { quality: serializeError(qualityResult.reason) } : {}),
      };

      if (diagnostics && quality) {
        spinner?.succeed(`Build ${diagnostics.status}, quality score ${quality.score.toFixed(3)}`);
      } else {
        spinner?.warn("Report is incomplete");
      }

      if (diagnostics) {
        reportBuildWarnings(ui, diagnostics);
      } else if (failures.diagnostics) {
        warn(ui, `Build could not be diagnosed: ${failures.diagnostics.message}`);
      }
      if (quality) {
        reportScanWarnings(ui, quality, globalOptions.verbose);
      } else if (failures.quality) {
        warn(ui, `Quality scan failed: ${failures.quality.message}`);
      }

      process.exitCode = exitCodeForReport(
        diagnostics,
        diagnosticsResult.status === "rejected" ? diagnosticsResult.reason : undefined,
        qualityResult.status === "rejected" ? qualityResult.reason : undefined,
      );

      const rendered = globalOptions.json
        ? renderJson({ diagnostics, quality, failures })
        : renderCombinedMarkdown({ diagnostics, quality, failures });

      if (options.output) {
        const writtenPath = await writeOutputFile(options.output, rendered);
        if (!globalOptions.quiet && !globalOptions.json) {
          console.log(ui.blue(`Report written to ${writtenPath}`));
        }
        return;
      }

      console.log(rendered);
    });

  command.addHelpText(
    "after",
    `\nThe build comes from the "build" section of the config. Output is Markdown,
or JSON with --json.

Examples:
  $ buildscope report Sources --output quality-report.md
  $ buildscope --json report .`,
  );

  return command;
}

/**
 * A failed scan decides the exit code (2 for an unreadable root); otherwise
 * the build status does.
 */
export function exitCodeForReport(
  diagnostics: DiagnosticsReport | undefined,
  diagnosticsError: unknown,
  qualityError: unknown,
): number {
  if (qualityError !== undefined) {
    return isConfigurationError(qualityError) ? EXIT_CONFIG_ERROR : EXIT_BUILD_FAILURE;
  }
  if (diagnostics) {
    return exitCodeForStatus(diagnostics.status);
  }
  return isConfigurationError(diagnosticsError) ? EXIT_CONFIG_ERROR : EXIT_BUILD_FAILURE;
}
