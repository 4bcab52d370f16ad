import type { ChalkInstance } from "chalk";
import { Command } from "commander";

import type { OutputFormat, QualityConfig } from "../../core/index.js";
import { type QualityReport, estimate } from "../../quality/index.js";
import { renderJson, renderQualityMarkdown } from "../../report/index.js";
import {
  createSpinner,
  createUi,
  getGlobalOptions,
  loadEffectiveConfig,
  normalizeOutputFormat,
  warn,
  writeOutputFile,
} from "../helpers.js";
import { renderQualityConsole } from "../render.js";
import { withInterruptSignal } from "./diagnose.js";

interface QualityCommandOptions {
  extension?: string;
  format: string;
  output?: string;
}

export function createQualityCommand(): Command {
  const command = new Command("quality");

  command
    .description("Estimate a weighted quality score for a source tree")
    .argument("[path]", "Source root to scan", ".")
    .option("--extension <ext>", "Source file extension to scan (default from config)")
    .option("--format <format>", "Output format: table|json|markdown", "table")
    .option("--output <file>", "Write the report to a file instead of stdout")
    .action(async (sourceRoot: string, options: QualityCommandOptions, cmd: Command) => {
      const globalOptions = getGlobalOptions(cmd);
      const ui = createUi(globalOptions);
      const format: OutputFormat = globalOptions.json ? "json" : normalizeOutputFormat(options.format);

      const config = await loadEffectiveConfig(globalOptions, ui);
      const qualityConfig = withExtension(config.quality, options.extension);

      const spinner = createSpinner(
        format !== "table" || globalOptions.quiet,
        `Scanning ${qualityConfig.extension} files in ${sourceRoot}`,
      );

      let report: QualityReport;
      try {
        report = await withInterruptSignal((signal) =>
          estimate(sourceRoot, { config: qualityConfig, signal }),
        );
      } catch (error) {
        spinner?.fail("Scan failed");
        throw error;
      }
      spinner?.succeed(`Scanned ${report.metrics.fileCount} file(s)`);

      reportScanWarnings(ui, report, globalOptions.verbose);

      const rendered = renderQuality(report, format);
      if (options.output) {
        const writtenPath = await writeOutputFile(options.output, rendered ?? renderQualityMarkdown(report));
        if (!globalOptions.quiet && format === "table") {
          console.log(ui.blue(`Report written to ${writtenPath}`));
        }
        return;
      }

      if (rendered !== undefined) {
        console.log(rendered);
      } else if (!globalOptions.quiet) {
        renderQualityConsole(ui, report);
      }
    });

  command.addHelpText(
    "after",
    `\nExamples:
  $ buildscope quality
  $ buildscope quality Sources --format markdown
  $ buildscope quality . --extension .kt --json`,
  );

  return command;
}

export function withExtension(config: QualityConfig, extension: string | undefined): QualityConfig {
  const trimmed = extension?.trim();
  if (!trimmed) {
    return config;
  }

  return { ...config, extension: trimmed.startsWith(".") ? trimmed : `.${trimmed}` };
}

export function reportScanWarnings(ui: ChalkInstance, report: QualityReport, verbose: boolean): void {
  if (report.degenerate) {
    warn(ui, `No ${report.extension} files found under ${report.sourceRoot}; every factor used its fallback score.`);
  }

  if (report.unreadable.length === 0) {
    return;
  }

  warn(ui, `${report.unreadable.length} path(s) could not be read and were skipped.`);
  if (verbose) {
    for (const path of report.unreadable) {
      warn(ui, `  unreadable: ${path}`);
    }
  }
}

function renderQuality(report: QualityReport, format: OutputFormat): string | undefined {
  switch (format) {
    case "json":
      return renderJson({ quality: report });
    case "markdown":
      return renderQualityMarkdown(report);
    case "table":
      return undefined;
  }
}
