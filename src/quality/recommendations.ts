import { type FactorConfig, type QualityConfig, roundScore } from "../core/index.js";
import type { FactorName, FactorResult, QualityMetrics, Recommendation } from "./types.js";

type ActionableFactor = Recommendation["factor"];

interface Plan {
  itemsNeeded: number;
  reachableScore: number;
}

const ACTIONABLE_FACTORS: readonly ActionableFactor[] = [
  "complexity",
  "documentation",
  "testing",
  "security",
];

/**
 * One recommendation per factor scoring under its target, ordered by the
 * factor's weight. Each names how many items move the factor to the least
 * demanding step that meets the target.
 */
export function buildRecommendations(
  factors: readonly FactorResult[],
  metrics: QualityMetrics,
  config: QualityConfig,
): Recommendation[] {
  const recommendations: Recommendation[] = [];

  for (const name of ACTIONABLE_FACTORS) {
    const result = factors.find((factor) => factor.name === name);
    const factor = config.factors[name];
    if (!result || result.input === undefined || result.score >= factor.target) {
      continue;
    }

    const plan = planFactor(name, factor, metrics);
    if (plan === undefined || plan.itemsNeeded === 0) {
      continue;
    }

    const impact = roundScore(result.weight * (plan.reachableScore - result.score));
    recommendations.push({
      priority: 0,
      factor: name,
      action: describeAction(name, plan.itemsNeeded, config),
      itemsNeeded: plan.itemsNeeded,
      currentScore: result.score,
      reachableScore: plan.reachableScore,
      impact,
      pointsPerItem: Math.round((impact / plan.itemsNeeded) * 10_000) / 10_000,
    });
  }

  recommendations.sort(
    (left, right) =>
      config.weights[right.factor] - config.weights[left.factor] ||
      ACTIONABLE_FACTORS.indexOf(left.factor) - ACTIONABLE_FACTORS.indexOf(right.factor),
  );
  recommendations.forEach((recommendation, index) => {
    recommendation.priority = index + 1;
  });

  return recommendations;
}

function planFactor(
  name: ActionableFactor,
  factor: FactorConfig,
  metrics: QualityMetrics,
): Plan | undefined {
  const { table, target } = factor;

  if (table.direction === "ascending") {
    if (name !== "documentation" && name !== "testing") {
      return undefined;
    }
    const reaching = table.steps.filter((step) => step.score >= target);
    const step = reaching[reaching.length - 1] ?? table.steps[0];
    if (!step) {
      return undefined;
    }

    const have =
      name === "testing" ? metrics.testFunctionCount : metrics.documentedFunctionCount;
    const required = Math.ceil((metrics.functionCount * step.atLeast) / 100);
    return { itemsNeeded: Math.max(0, required - have), reachableScore: step.score };
  }

  if (name !== "complexity" && name !== "security") {
    return undefined;
  }
  const reaching = table.steps.filter((step) => step.score >= target);
  const step = reaching[reaching.length - 1] ?? table.steps[0];
  if (!step) {
    return undefined;
  }

  if (name === "complexity") {
    // Percentages are truncated, so "below N%" allows ceil(files * N / 100) - 1 files.
    const allowed = Math.max(0, Math.ceil((metrics.fileCount * step.below) / 100) - 1);
    return {
      itemsNeeded: Math.max(0, metrics.largeFileCount - allowed),
      reachableScore: step.score,
    };
  }

  const allowed = Math.max(0, Math.ceil(step.below) - 1);
  return {
    itemsNeeded: Math.max(0, metrics.securityFlagCount - allowed),
    reachableScore: step.score,
  };
}

function describeAction(name: FactorName, itemsNeeded: number, config: QualityConfig): string {
  switch (name) {
    case "documentation":
      return `Add documentation comments to ${itemsNeeded} function(s)`;
    case "testing":
      return `Add ${itemsNeeded} test function(s)`;
    case "complexity":
      return `Split ${itemsNeeded} file(s) longer than ${config.largeFileLines} lines`;
    case "security":
      return `Fix ${itemsNeeded} insecure pattern(s) such as plain http:// URLs or credentials in TODO/FIXME notes`;
    case "architecture":
      return "Adopt modern framework patterns";
  }
}
