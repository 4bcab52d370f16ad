import { z } from "zod";

import { configError } from "./errors.js";

const ENV_VAR_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

const DEFAULT_QUALITY_EXCLUDE = [
  "build",
  "DerivedData",
  "Pods",
  "Carthage",
  ".build",
  "node_modules",
] as const;

const ScoreSchema = z.number().min(0).max(1);

const PatternSchema = z
  .string()
  .min(1)
  .refine(isCompilablePattern, { message: "Pattern is not a valid regular expression" });

export const AscendingStepTableSchema = z
  .object({
    direction: z.literal("ascending"),
    /** Evaluated top to bottom; the first step whose `atLeast` the value reaches wins. */
    steps: z.array(z.object({ atLeast: z.number(), score: ScoreSchema }).strict()).min(1),
    otherwise: ScoreSchema,
  })
  .strict();

export const DescendingStepTableSchema = z
  .object({
    direction: z.literal("descending"),
    /** Evaluated top to bottom; the first step whose `below` the value stays under wins. */
    steps: z.array(z.object({ below: z.number(), score: ScoreSchema }).strict()).min(1),
    otherwise: ScoreSchema,
  })
  .strict();

export const StepTableSchema = z
  .discriminatedUnion("direction", [AscendingStepTableSchema, DescendingStepTableSchema])
  .superRefine((table, ctx) => {
    const thresholds =
      table.direction === "ascending"
        ? table.steps.map((step) => -step.atLeast)
        : table.steps.map((step) => step.below);
    const scores = [...table.steps.map((step) => step.score), table.otherwise];

    for (let index = 1; index < thresholds.length; index += 1) {
      if ((thresholds[index] ?? 0) <= (thresholds[index - 1] ?? 0)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["steps", index],
          message: `Step thresholds must be strictly ${table.direction === "ascending" ? "decreasing" : "increasing"}`,
        });
      }
    }

    for (let index = 1; index < scores.length; index += 1) {
      if ((scores[index] ?? 0) > (scores[index - 1] ?? 0)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: index < table.steps.length ? ["steps", index, "score"] : ["otherwise"],
          message: "Step scores must not increase further down the table",
        });
      }
    }
  });

function factorSchema(defaults: {
  table: z.input<typeof StepTableSchema>;
  empty: number;
  target: number;
}) {
  return z
    .object({
      table: StepTableSchema.default(defaults.table),
      /** Score used when the factor's input is undefined (nothing to measure). */
      empty: ScoreSchema.default(defaults.empty),
      /** Score below which a recommendation is produced. */
      target: ScoreSchema.default(defaults.target),
    })
    .strict()
    .default({});
}

export const ArchitectureFactorSchema = z
  .object({
    rules: z
      .array(
        z
          .object({
            /** Every named pattern must be used on more lines than its minimum. */
            minimums: z.record(z.string(), z.number().int().min(0)),
            score: ScoreSchema,
          })
          .strict(),
      )
      .default([
        { minimums: { ui: 50, concurrency: 100 }, score: 0.95 },
        { minimums: { ui: 30, concurrency: 50 }, score: 0.9 },
      ]),
    otherwise: ScoreSchema.default(0.85),
  })
  .strict()
  .default({});

export const FactorsSchema = z
  .object({
    complexity: factorSchema({
      table: {
        direction: "descending",
        steps: [
          { below: 20, score: 0.95 },
          { below: 30, score: 0.9 },
          { below: 40, score: 0.85 },
        ],
        otherwise: 0.75,
      },
      empty: 0.85,
      target: 0.9,
    }),
    documentation: factorSchema({
      table: {
        direction: "ascending",
        steps: [
          { atLeast: 80, score: 1 },
          { atLeast: 60, score: 0.85 },
          { atLeast: 40, score: 0.7 },
          { atLeast: 20, score: 0.5 },
          { atLeast: 10, score: 0.3 },
        ],
        otherwise: 0.15,
      },
      empty: 0.1,
      target: 0.8,
    }),
    testing: factorSchema({
      table: {
        direction: "ascending",
        steps: [
          { atLeast: 50, score: 1 },
          { atLeast: 30, score: 0.8 },
          { atLeast: 15, score: 0.6 },
          { atLeast: 5, score: 0.4 },
        ],
        otherwise: 0.2,
      },
      empty: 0.2,
      target: 0.6,
    }),
    security: factorSchema({
      table: {
        direction: "descending",
        steps: [
          { below: 3, score: 0.95 },
          { below: 6, score: 0.9 },
          { below: 11, score: 0.8 },
        ],
        otherwise: 0.7,
      },
      empty: 0.95,
      target: 0.95,
    }),
    architecture: ArchitectureFactorSchema,
  })
  .strict()
  .default({});

export const WeightsSchema = z
  .object({
    complexity: ScoreSchema.default(0.3),
    documentation: ScoreSchema.default(0.25),
    testing: ScoreSchema.default(0.2),
    security: ScoreSchema.default(0.15),
    architecture: ScoreSchema.default(0.1),
  })
  .strict()
  .default({})
  .superRefine((weights, ctx) => {
    const total = Object.values(weights).reduce((sum, weight) => sum + weight, 0);
    if (Math.abs(total - 1) > 1e-9) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Factor weights must sum to 1 (got ${total})`,
      });
    }
  });

export const BuildSchema = z
  .object({
    command: z.string().min(1).default("xcodebuild"),
    project: z.string().min(1).optional(),
    scheme: z.string().min(1).optional(),
    destination: z.string().min(1).optional().default("platform=macOS"),
    action: z.string().min(1).default("build"),
    extraArgs: z.array(z.string()).default([]),
    cwd: z.string().min(1).optional(),
    /** Omitted means wait for the build indefinitely. */
    timeoutMs: z.number().int().positive().optional(),
  })
  .strict()
  .default({});

export const DiagnosticsSchema = z
  .object({
    topFileLimit: z.number().int().positive().default(5),
    sampleErrorLimit: z.number().int().min(0).default(5),
  })
  .strict()
  .default({});

export const QualitySchema = z
  .object({
    extension: z
      .string()
      .min(1)
      .default(".swift")
      .transform((value) => (value.startsWith(".") ? value : `.${value}`)),
    exclude: z.array(z.string().min(1)).default([...DEFAULT_QUALITY_EXCLUDE]),
    metadataFiles: z.array(z.string().min(1)).default(["Info.plist"]),
    largeFileLines: z.number().int().positive().default(500),
    functionPattern: PatternSchema.default("func "),
    documentationPattern: PatternSchema.default("/// "),
    testFilePattern: PatternSchema.default("Test"),
    testFunctionPattern: PatternSchema.default("func test"),
    securityPatterns: z.array(PatternSchema).default(["http://", "TODO.*password", "FIXME.*secret"]),
    architecturePatterns: z.record(z.string(), PatternSchema).default({
      ui: "SwiftUI",
      concurrency: "async|await",
      reactive: "Combine",
    }),
    factors: FactorsSchema,
    weights: WeightsSchema,
    targetScore: ScoreSchema.default(0.95),
  })
  .strict()
  .default({});

export const BuildscopeConfigSchema = z
  .object({
    build: BuildSchema,
    diagnostics: DiagnosticsSchema,
    quality: QualitySchema,
  })
  .strict();

export type BuildscopeConfig = z.output<typeof BuildscopeConfigSchema>;
export type BuildscopeConfigInput = z.input<typeof BuildscopeConfigSchema>;
export type BuildConfig = BuildscopeConfig["build"];
export type QualityConfig = BuildscopeConfig["quality"];
export type StepTable = z.output<typeof StepTableSchema>;
export type FactorConfig = QualityConfig["factors"]["documentation"];
export type ArchitectureFactorConfig = QualityConfig["factors"]["architecture"];
export type FactorWeights = QualityConfig["weights"];

export interface LoadConfigOptions {
  env?: Record<string, string | undefined>;
}

export function defineConfig(config: BuildscopeConfigInput): BuildscopeConfigInput {
  return config;
}

export function interpolateEnvVars(
  value: string,
  env: Record<string, string | undefined> = process.env,
  path: string[] = [],
): string {
  return value.replaceAll(ENV_VAR_PATTERN, (_, variableName: string) => {
    const interpolated = env[variableName];
    if (interpolated !== undefined) {
      return interpolated;
    }

    throw configError(
      "CONFIG_SECRET_MISSING",
      `Environment variable ${variableName} is referenced in config but not set`,
      {
        context: {
          variableName,
          path: path.length > 0 ? path.join(".") : "<root>",
        },
      },
    );
  });
}

export function loadConfig(config: unknown = {}, options: LoadConfigOptions = {}): BuildscopeConfig {
  const env = options.env ?? process.env;
  const interpolatedConfig = interpolateConfigEnvVars(config, env);
  const parsed = BuildscopeConfigSchema.safeParse(interpolatedConfig);

  if (parsed.success) {
    return parsed.data;
  }

  throw configError("CONFIG_INVALID", "Invalid buildscope configuration", {
    context: {
      issues: parsed.error.issues.map((issue) => ({
        code: issue.code,
        message: issue.message,
        path: issue.path.join("."),
      })),
    },
  });
}

function interpolateConfigEnvVars(
  value: unknown,
  env: Record<string, string | undefined>,
  path: string[] = [],
): unknown {
  if (typeof value === "string") {
    return interpolateEnvVars(value, env, path);
  }

  if (Array.isArray(value)) {
    return value.map((item, index) => interpolateConfigEnvVars(item, env, [...path, `${index}`]));
  }

  if (!isPlainObject(value)) {
    return value;
  }

  const interpolatedObject: Record<string, unknown> = {};

  for (const [key, nestedValue] of Object.entries(value)) {
    interpolatedObject[key] = interpolateConfigEnvVars(nestedValue, env, [...path, key]);
  }

  return interpolatedObject;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isCompilablePattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}
