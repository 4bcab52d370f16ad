import {
  CATEGORY_DISPLAY_ORDER,
  CATEGORY_LABELS,
  type DiagnosticsReport,
  formatBuildCommand,
} from "../diagnostics/index.js";
import type { QualityReport } from "../quality/index.js";
import type { ReportFailures, SerializedError } from "./json.js";

export function renderDiagnosticsMarkdown(report: DiagnosticsReport): string {
  const lines: string[] = [];

  lines.push("## Build Diagnostics");
  lines.push("");
  lines.push(`- Command: \`${formatBuildCommand(report.command)}\``);
  lines.push(`- Status: **${report.status}**`);
  lines.push(`- Errors: ${report.totalErrors}`);
  lines.push(`- Warnings: ${report.totalWarnings}`);
  lines.push(`- Exit code: ${report.exitCode === null ? "n/a" : String(report.exitCode)}`);
  lines.push("");

  if (report.error) {
    lines.push(`> ${report.error.message}`);
    lines.push("");
    return lines.join("\n");
  }

  if (report.status === "success") {
    lines.push("No errors found.");
    lines.push("");
    if (report.notice) {
      lines.push(`> ${report.notice}`);
      lines.push("");
    }
    return lines.join("\n");
  }

  lines.push("### Error Categories");
  lines.push("");
  lines.push("| Category | Count |");
  lines.push("|----------|-------|");
  for (const category of CATEGORY_DISPLAY_ORDER) {
    lines.push(`| ${CATEGORY_LABELS[category]} | ${report.categories[category]} |`);
  }
  lines.push("");
  lines.push("_A line can match more than one category, so counts need not add up to the error total._");
  lines.push("");

  if (report.remediation.length > 0) {
    lines.push("### Recommended Fix Order");
    lines.push("");
    for (const step of report.remediation) {
      lines.push(`${step.order}. ${step.label} (${step.count}): ${step.hint}`);
    }
    lines.push("");
  }

  if (report.topFiles.length > 0) {
    lines.push("### Files With Most Errors");
    lines.push("");
    lines.push("| File | Errors |");
    lines.push("|------|--------|");
    for (const file of report.topFiles) {
      lines.push(`| ${file.file} | ${file.count} |`);
    }
    lines.push("");
  }

  return lines.join("\n");
}

export function renderQualityMarkdown(report: QualityReport): string {
  const lines: string[] = [];
  const { metrics } = report;

  lines.push("## Code Quality");
  lines.push("");
  lines.push(`**Score: ${report.score.toFixed(3)}** (target ${report.targetScore.toFixed(2)})`);
  lines.push("");
  lines.push(`- Source root: \`${report.sourceRoot}\``);
  lines.push(`- Files: ${metrics.fileCount} (${metrics.totalLines} lines, ${metrics.largeFileCount} large)`);
  lines.push(`- Functions: ${metrics.functionCount} (${metrics.documentedFunctionCount} documented)`);
  lines.push(`- Test functions: ${metrics.testFunctionCount}`);
  lines.push(`- Security flags: ${metrics.securityFlagCount}`);
  if (report.unreadable.length > 0) {
    lines.push(`- Unreadable: ${report.unreadable.length}`);
  }
  lines.push("");

  if (report.degenerate) {
    lines.push(`> No \`${report.extension}\` files were found; every factor used its fallback score.`);
    lines.push("");
  }

  lines.push("| Factor | Weight | Score | Detail |");
  lines.push("|--------|--------|-------|--------|");
  for (const factor of report.factors) {
    lines.push(
      `| ${factor.name} | ${Math.round(factor.weight * 100)}% | ${factor.score.toFixed(2)} | ${factor.summary} |`,
    );
  }
  lines.push("");

  if (report.meetsTarget) {
    lines.push(`Target of ${report.targetScore.toFixed(2)} reached.`);
    lines.push("");
    return lines.join("\n");
  }

  lines.push(`### Actions (gap to target: ${report.gapToTarget.toFixed(3)})`);
  lines.push("");
  if (report.recommendations.length === 0) {
    lines.push("No single factor has a concrete action left.");
  }
  for (const recommendation of report.recommendations) {
    lines.push(
      `${recommendation.priority}. ${recommendation.action} (+${recommendation.impact.toFixed(3)} points)`,
    );
  }
  lines.push("");

  return lines.join("\n");
}

export function renderCombinedMarkdown(payload: {
  diagnostics?: DiagnosticsReport;
  quality?: QualityReport;
  failures?: ReportFailures;
  generatedAt?: string;
}): string {
  const sections = ["# Buildscope Report", "", `Generated: ${payload.generatedAt ?? new Date().toISOString()}`, ""];

  if (payload.diagnostics) {
    sections.push(renderDiagnosticsMarkdown(payload.diagnostics));
  } else if (payload.failures?.diagnostics) {
    sections.push(renderFailedSection("Build Diagnostics", payload.failures.diagnostics));
  }
  if (payload.quality) {
    sections.push(renderQualityMarkdown(payload.quality));
  } else if (payload.failures?.quality) {
    sections.push(renderFailedSection("Code Quality", payload.failures.quality));
  }

  return sections.join("\n");
}

function renderFailedSection(title: string, error: SerializedError): string {
  return [`## ${title}`, "", `> Not available (\`${error.code}\`): ${error.message}`, ""].join("\n");
}
