import type { ChalkInstance } from "chalk";
import Table from "cli-table3";

import {
  CATEGORY_DISPLAY_ORDER,
  CATEGORY_LABELS,
  type DiagnosticsReport,
  type DiagnosticsStatus,
  formatBuildCommand,
} from "../diagnostics/index.js";
import type { QualityReport } from "../quality/index.js";
import { truncate } from "./helpers.js";

export function renderDiagnosticsConsole(ui: ChalkInstance, report: DiagnosticsReport): void {
  console.log(ui.bold("Build Diagnostics"));
  console.log(`  Command:  ${truncate(formatBuildCommand(report.command), 80)}`);
  console.log(`  Status:   ${colorStatus(ui, report.status)}`);
  console.log(`  Errors:   ${report.totalErrors}`);
  console.log(`  Warnings: ${report.totalWarnings}`);
  console.log(`  Duration: ${formatDuration(report.metadata.durationMs)}`);
  console.log("");

  if (report.error) {
    console.log(ui.red(`  ${report.error.message}`));
    return;
  }

  if (report.status === "success") {
    console.log(ui.green("No errors found."));
    return;
  }

  const categoryTable = new Table({ head: ["Category", "Count"] });
  for (const category of CATEGORY_DISPLAY_ORDER) {
    categoryTable.push([CATEGORY_LABELS[category], String(report.categories[category])]);
  }
  console.log(categoryTable.toString());
  console.log(ui.dim("Categories overlap; counts need not sum to the error total."));
  console.log("");

  if (report.remediation.length > 0) {
    console.log(ui.bold("Recommended fix order"));
    for (const step of report.remediation) {
      console.log(`  ${step.order}. ${step.label} (${step.count}): ${ui.dim(step.hint)}`);
    }
    console.log("");
  }

  if (report.topFiles.length > 0) {
    const fileTable = new Table({ head: ["File", "Errors"] });
    for (const file of report.topFiles) {
      fileTable.push([truncate(file.file, 60), String(file.count)]);
    }
    console.log(ui.bold("Files with most errors"));
    console.log(fileTable.toString());
  }
}

export function renderQualityConsole(ui: ChalkInstance, report: QualityReport): void {
  const { metrics } = report;
  const scoreText = report.score.toFixed(3);

  console.log(ui.bold("Code Quality"));
  console.log(`  Source root: ${report.sourceRoot}`);
  console.log(
    `  Files:       ${metrics.fileCount} ${report.extension} (${metrics.totalLines} lines, ${metrics.largeFileCount} large)`,
  );
  console.log(
    `  Functions:   ${metrics.functionCount} (${metrics.documentedFunctionCount} documented, ${metrics.testFunctionCount} tests)`,
  );
  console.log(`  Score:       ${report.meetsTarget ? ui.green(scoreText) : ui.yellow(scoreText)}`);
  console.log(`  Target:      ${report.targetScore.toFixed(2)}`);
  console.log("");

  const factorTable = new Table({ head: ["Factor", "Weight", "Score", "Points", "Detail"] });
  for (const factor of report.factors) {
    factorTable.push([
      factor.name,
      `${Math.round(factor.weight * 100)}%`,
      factor.score.toFixed(2),
      factor.contribution.toFixed(3),
      truncate(factor.summary, 50),
    ]);
  }
  console.log(factorTable.toString());

  if (report.meetsTarget) {
    console.log(ui.green(`Target of ${report.targetScore.toFixed(2)} reached.`));
    return;
  }

  console.log("");
  console.log(ui.bold(`Actions to close the ${report.gapToTarget.toFixed(3)} gap`));
  if (report.recommendations.length === 0) {
    console.log(ui.dim("  No single factor has a concrete action left."));
    return;
  }

  const actionTable = new Table({ head: ["#", "Action", "Impact", "Per item"] });
  for (const recommendation of report.recommendations) {
    actionTable.push([
      String(recommendation.priority),
      truncate(recommendation.action, 70),
      `+${recommendation.impact.toFixed(3)}`,
      recommendation.pointsPerItem.toFixed(4),
    ]);
  }
  console.log(actionTable.toString());
}

function colorStatus(ui: ChalkInstance, status: DiagnosticsStatus): string {
  switch (status) {
    case "success":
      return ui.green(status);
    case "failure":
      return ui.red(status);
    case "configuration-error":
      return ui.magenta(status);
    case "timed-out":
      return ui.yellow(status);
  }
}

function formatDuration(durationMs: number): string {
  if (durationMs < 1_000) {
    return `${durationMs}ms`;
  }

  return `${(durationMs / 1_000).toFixed(1)}s`;
}
