import type { QualityConfig, ReportMetadata } from "../core/index.js";

export type FactorName = "complexity" | "documentation" | "testing" | "security" | "architecture";

export const FACTOR_NAMES: readonly FactorName[] = [
  "complexity",
  "documentation",
  "testing",
  "security",
  "architecture",
];

export interface QualityMetrics {
  fileCount: number;
  functionCount: number;
  documentedFunctionCount: number;
  testFunctionCount: number;
  largeFileCount: number;
  securityFlagCount: number;
  totalLines: number;
  unreadableFileCount: number;
  /** Lines matching each named architecture pattern. */
  patternUsage: Record<string, number>;
}

export interface SourceScan {
  metrics: QualityMetrics;
  /** Relative paths that could not be read; directories end in `/`. */
  unreadable: string[];
}

export interface FactorResult {
  name: FactorName;
  score: number;
  weight: number;
  /** `score * weight`, rounded. */
  contribution: number;
  /**
   * The value fed to the step table: a percentage for ratio factors, a count
   * for security. `undefined` when there was nothing to measure.
   */
  input?: number;
  summary: string;
}

export interface Recommendation {
  priority: number;
  factor: Exclude<FactorName, "architecture">;
  action: string;
  /** Items to add, split or fix to reach the target step. */
  itemsNeeded: number;
  currentScore: number;
  reachableScore: number;
  /** Composite-score points gained by reaching `reachableScore`. */
  impact: number;
  pointsPerItem: number;
}

export interface QualityReport {
  sourceRoot: string;
  extension: string;
  metrics: QualityMetrics;
  factors: FactorResult[];
  score: number;
  targetScore: number;
  gapToTarget: number;
  meetsTarget: boolean;
  recommendations: Recommendation[];
  /** True when the root held no matching files and every factor fell back. */
  degenerate: boolean;
  unreadable: string[];
  metadata: ReportMetadata;
}

export interface EstimateOptions {
  config?: QualityConfig;
  signal?: AbortSignal;
}
