import { describe, expect, it } from "vitest";

import {
  StepTableSchema,
  defineConfig,
  interpolateEnvVars,
  loadConfig,
} from "../../src/core/config.js";
import { BuildscopeError } from "../../src/core/errors.js";

function captureError(fn: () => unknown): BuildscopeError {
  try {
    fn();
  } catch (error) {
    if (error instanceof BuildscopeError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected a BuildscopeError to be thrown.");
}

describe("default config values", () => {
  it("produces a fully-populated build section from an empty object", () => {
    const config = loadConfig({});

    expect(config.build).toEqual({
      command: "xcodebuild",
      destination: "platform=macOS",
      action: "build",
      extraArgs: [],
    });
    expect(config.diagnostics).toEqual({ topFileLimit: 5, sampleErrorLimit: 5 });
  });

  it("has the documented quality defaults", () => {
    const { quality } = loadConfig({});

    expect(quality.extension).toBe(".swift");
    expect(quality.largeFileLines).toBe(500);
    expect(quality.targetScore).toBe(0.95);
    expect(quality.metadataFiles).toEqual(["Info.plist"]);
    expect(quality.securityPatterns).toEqual(["http://", "TODO.*password", "FIXME.*secret"]);
    expect(quality.weights).toEqual({
      complexity: 0.3,
      documentation: 0.25,
      testing: 0.2,
      security: 0.15,
      architecture: 0.1,
    });
    expect(quality.factors.documentation.table).toEqual({
      direction: "ascending",
      steps: [
        { atLeast: 80, score: 1 },
        { atLeast: 60, score: 0.85 },
        { atLeast: 40, score: 0.7 },
        { atLeast: 20, score: 0.5 },
        { atLeast: 10, score: 0.3 },
      ],
      otherwise: 0.15,
    });
    expect(quality.factors.documentation.empty).toBe(0.1);
    expect(quality.factors.architecture.otherwise).toBe(0.85);
  });

  it("prefixes an extension given without a dot", () => {
    expect(loadConfig({ quality: { extension: "kt" } }).quality.extension).toBe(".kt");
  });
});

describe("validation", () => {
  it("rejects unknown keys", () => {
    const error = captureError(() => loadConfig({ unknown: true }));

    expect(error.code).toBe("CONFIG_INVALID");
  });

  it("rejects weights that do not sum to one", () => {
    const error = captureError(() =>
      loadConfig({ quality: { weights: { complexity: 0.5 } } }),
    );

    expect(error.code).toBe("CONFIG_INVALID");
    expect(error.context?.issues).toEqual([
      expect.objectContaining({ message: expect.stringContaining("Factor weights must sum to 1") }),
    ]);
  });

  it("rejects an invalid regular expression", () => {
    const error = captureError(() => loadConfig({ quality: { functionPattern: "func(" } }));

    expect(error.context?.issues).toEqual([
      expect.objectContaining({
        message: "Pattern is not a valid regular expression",
        path: "quality.functionPattern",
      }),
    ]);
  });

  it("accepts a custom step table when it stays monotonic", () => {
    const config = loadConfig({
      quality: {
        factors: {
          testing: {
            table: {
              direction: "ascending",
              steps: [
                { atLeast: 40, score: 1 },
                { atLeast: 10, score: 0.5 },
              ],
              otherwise: 0.1,
            },
          },
        },
      },
    });

    expect(config.quality.factors.testing.table.steps).toHaveLength(2);
    expect(config.quality.factors.testing.target).toBe(0.6);
  });
});

describe("StepTableSchema", () => {
  it("rejects ascending thresholds that are not strictly decreasing", () => {
    const result = StepTableSchema.safeParse({
      direction: "ascending",
      steps: [
        { atLeast: 10, score: 1 },
        { atLeast: 20, score: 0.5 },
      ],
      otherwise: 0,
    });

    expect(result.success).toBe(false);
  });

  it("rejects scores that rise further down the table", () => {
    const result = StepTableSchema.safeParse({
      direction: "descending",
      steps: [
        { below: 3, score: 0.5 },
        { below: 6, score: 0.9 },
      ],
      otherwise: 0.1,
    });

    expect(result.success).toBe(false);
  });

  it("rejects an otherwise score above the last step", () => {
    const result = StepTableSchema.safeParse({
      direction: "descending",
      steps: [{ below: 3, score: 0.5 }],
      otherwise: 0.6,
    });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.path).toEqual(["otherwise"]);
  });
});

describe("env interpolation", () => {
  it("replaces placeholders from the provided env", () => {
    const config = loadConfig(
      { build: { scheme: "${APP_SCHEME}", project: "${APP_NAME}.xcodeproj" } },
      { env: { APP_SCHEME: "Demo", APP_NAME: "Demo" } },
    );

    expect(config.build.scheme).toBe("Demo");
    expect(config.build.project).toBe("Demo.xcodeproj");
  });

  it("throws CONFIG_SECRET_MISSING with the config path", () => {
    const error = captureError(() =>
      loadConfig({ build: { extraArgs: ["-token", "${MISSING_TOKEN}"] } }, { env: {} }),
    );

    expect(error.code).toBe("CONFIG_SECRET_MISSING");
    expect(error.context).toEqual({
      variableName: "MISSING_TOKEN",
      path: "build.extraArgs.1",
    });
  });

  it("reports <root> for a bare string", () => {
    const error = captureError(() => interpolateEnvVars("${NOPE}", {}));

    expect(error.context).toEqual({ variableName: "NOPE", path: "<root>" });
  });
});

describe("defineConfig", () => {
  it("returns its input unchanged", () => {
    const input = { build: { scheme: "App" } };

    expect(defineConfig(input)).toBe(input);
  });
});
