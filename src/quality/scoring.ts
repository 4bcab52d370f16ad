import {
  type ArchitectureFactorConfig,
  type QualityConfig,
  type StepTable,
  percentOf,
  roundScore,
} from "../core/index.js";
import { FACTOR_NAMES, type FactorName, type FactorResult, type QualityMetrics } from "./types.js";

/**
 * Look a value up in a step table. Ascending tables reward higher values
 * (`value >= atLeast`), descending tables reward lower ones (`value < below`);
 * the first matching step wins and `otherwise` catches the rest.
 */
export function evaluateStepTable(table: StepTable, value: number): number {
  if (table.direction === "ascending") {
    const step = table.steps.find((candidate) => value >= candidate.atLeast);
    return step?.score ?? table.otherwise;
  }

  const step = table.steps.find((candidate) => value < candidate.below);
  return step?.score ?? table.otherwise;
}

export function evaluateArchitecture(
  factor: ArchitectureFactorConfig,
  patternUsage: Record<string, number>,
): number {
  const rule = factor.rules.find((candidate) =>
    Object.entries(candidate.minimums).every(
      ([name, minimum]) => (patternUsage[name] ?? 0) > minimum,
    ),
  );
  return rule?.score ?? factor.otherwise;
}

/**
 * The value each table factor is looked up by: large-file, documentation
 * and test percentages, and the raw security flag count.
 */
export function factorInputs(
  metrics: QualityMetrics,
): Record<Exclude<FactorName, "architecture">, number | undefined> {
  return {
    complexity: percentOf(metrics.largeFileCount, metrics.fileCount),
    documentation: percentOf(metrics.documentedFunctionCount, metrics.functionCount),
    testing: percentOf(metrics.testFunctionCount, metrics.functionCount),
    security: metrics.securityFlagCount,
  };
}

export function scoreFactors(metrics: QualityMetrics, config: QualityConfig): FactorResult[] {
  const inputs = factorInputs(metrics);

  return FACTOR_NAMES.map((name): FactorResult => {
    const weight = config.weights[name];

    if (name === "architecture") {
      const score = evaluateArchitecture(config.factors.architecture, metrics.patternUsage);
      return {
        name,
        score,
        weight,
        contribution: roundScore(score * weight),
        summary: describeUsage(metrics.patternUsage),
      };
    }

    const factor = config.factors[name];
    const input = inputs[name];
    const score = input === undefined ? factor.empty : evaluateStepTable(factor.table, input);

    return {
      name,
      score,
      weight,
      contribution: roundScore(score * weight),
      input,
      summary: describeInput(name, metrics),
    };
  });
}

/** Weighted sum of factor scores, rounded to three decimals and kept in [0,1]. */
export function compositeScore(factors: readonly FactorResult[]): number {
  const total = factors.reduce((sum, factor) => sum + factor.score * factor.weight, 0);
  return Math.min(1, Math.max(0, roundScore(total)));
}

function describeInput(name: Exclude<FactorName, "architecture">, metrics: QualityMetrics): string {
  switch (name) {
    case "complexity":
      return `${metrics.largeFileCount}/${metrics.fileCount} large files`;
    case "documentation":
      return `${metrics.documentedFunctionCount}/${metrics.functionCount} functions documented`;
    case "testing":
      return `${metrics.testFunctionCount} test functions for ${metrics.functionCount} functions`;
    case "security":
      return `${metrics.securityFlagCount} insecure patterns`;
  }
}

function describeUsage(patternUsage: Record<string, number>): string {
  const entries = Object.entries(patternUsage);
  if (entries.length === 0) {
    return "no patterns configured";
  }
  return entries.map(([name, count]) => `${name}: ${count}`).join(", ");
}
