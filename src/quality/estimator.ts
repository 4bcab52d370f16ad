import { resolve } from "node:path";

import { loadConfig, roundScore } from "../core/index.js";
import { collectMetrics } from "./collector.js";
import { buildRecommendations } from "./recommendations.js";
import { compositeScore, scoreFactors } from "./scoring.js";
import type { EstimateOptions, QualityReport } from "./types.js";

/**
 * Scan `sourceRoot` and score it. Recomputed from scratch on every call;
 * nothing is cached or persisted between runs.
 */
export async function estimate(
  sourceRoot: string,
  options: EstimateOptions = {},
): Promise<QualityReport> {
  const startedAt = Date.now();
  const config = options.config ?? loadConfig({}).quality;

  const { metrics, unreadable } = await collectMetrics(sourceRoot, config, options.signal);
  const factors = scoreFactors(metrics, config);
  const score = compositeScore(factors);

  return {
    sourceRoot: resolve(sourceRoot),
    extension: config.extension,
    metrics,
    factors,
    score,
    targetScore: config.targetScore,
    gapToTarget: Math.max(0, roundScore(config.targetScore - score)),
    meetsTarget: score >= config.targetScore,
    recommendations: buildRecommendations(factors, metrics, config),
    degenerate: metrics.fileCount === 0,
    unreadable,
    metadata: {
      generatedAt: new Date().toISOString(),
      durationMs: Date.now() - startedAt,
    },
  };
}
