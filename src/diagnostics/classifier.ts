import { basename, extname } from "node:path";

import { splitLines } from "../core/index.js";
import { CATEGORY_RULES, ERROR_MARKER, WARNING_MARKER } from "./categories.js";
import type {
  BuildClassification,
  ClassifyOptions,
  ErrorTally,
  FileErrorCount,
  RemediationStep,
} from "./types.js";

export const DEFAULT_TOP_FILE_LIMIT = 5;
export const DEFAULT_SAMPLE_ERROR_LIMIT = 5;

export function emptyTally(): ErrorTally {
  return {
    "optional-chaining": 0,
    "type-conversion": 0,
    "missing-symbol": 0,
    syntax: 0,
    other: 0,
  };
}

/**
 * Classify captured build output. Pure: the same text always yields the
 * same classification, whatever order its lines are in.
 */
export function classifyBuildOutput(
  output: string,
  options: ClassifyOptions = {},
): BuildClassification {
  const lines = splitLines(output);
  const errorLines = lines.filter((line) => line.includes(ERROR_MARKER));
  const totalWarnings = lines.filter((line) => line.includes(WARNING_MARKER)).length;

  if (errorLines.length === 0) {
    return {
      totalErrors: 0,
      totalWarnings,
      categories: emptyTally(),
      remediation: [],
      topFiles: [],
      sampleErrors: [],
    };
  }

  const categories = emptyTally();
  // Category rules run over the whole output, not only lines carrying the
  // error marker; notes and continuation lines count too.
  for (const line of lines) {
    for (const rule of CATEGORY_RULES) {
      if (rule.matches(line)) {
        categories[rule.category] += 1;
      }
    }
  }
  categories.other = errorLines.filter(
    (line) => !CATEGORY_RULES.some((rule) => rule.matches(line)),
  ).length;

  return {
    totalErrors: errorLines.length,
    totalWarnings,
    categories,
    remediation: buildRemediationPlan(categories),
    topFiles: rankErrorFiles(errorLines, options.topFileLimit ?? DEFAULT_TOP_FILE_LIMIT),
    sampleErrors: errorLines
      .slice(0, options.sampleErrorLimit ?? DEFAULT_SAMPLE_ERROR_LIMIT)
      .map((line) => line.trim()),
  };
}

export function buildRemediationPlan(categories: ErrorTally): RemediationStep[] {
  return [...CATEGORY_RULES]
    .sort((left, right) => left.priority - right.priority)
    .filter((rule) => categories[rule.category] > 0)
    .map((rule, index) => ({
      order: index + 1,
      category: rule.category,
      count: categories[rule.category],
      label: rule.label,
      hint: rule.hint,
    }));
}

export function rankErrorFiles(errorLines: readonly string[], limit: number): FileErrorCount[] {
  const counts = new Map<string, number>();

  for (const line of errorLines) {
    const path = extractErrorPath(line);
    if (path === undefined) {
      continue;
    }
    counts.set(path, (counts.get(path) ?? 0) + 1);
  }

  return [...counts.entries()]
    .sort(([leftPath, leftCount], [rightPath, rightCount]) => {
      const byCount = rightCount - leftCount;
      if (byCount !== 0) {
        return byCount;
      }
      return leftPath.localeCompare(rightPath);
    })
    .slice(0, Math.max(0, limit))
    .map(([path, count]) => ({ file: basename(path), path, count }));
}

/**
 * The location prefix of a compiler diagnostic: everything before the first
 * colon. Returns `undefined` when the line has no location, as in
 * `error: linker command failed`, or when the prefix names a tool rather
 * than a file, as in `xcodebuild: error: ...` (no separator, no extension).
 */
export function extractErrorPath(line: string): string | undefined {
  const colonIndex = line.indexOf(":");
  if (colonIndex < 0) {
    return undefined;
  }

  const markerIndex = line.indexOf(ERROR_MARKER);
  if (markerIndex >= 0 && colonIndex === markerIndex + ERROR_MARKER.length - 1) {
    return undefined;
  }

  const path = line.slice(0, colonIndex).trim();
  if (path.length === 0) {
    return undefined;
  }
  if (!path.includes("/") && !path.includes("\\") && extname(path) === "") {
    return undefined;
  }
  return path;
}
