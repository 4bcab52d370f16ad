import { mkdir, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";

import chalk, { Chalk, type ChalkInstance } from "chalk";
import type { Command } from "commander";
import ora, { type Ora } from "ora";

import { type BuildscopeConfig, OUTPUT_FORMATS, type OutputFormat, loadConfig } from "../core/index.js";
import type { GlobalCliOptions } from "./cli.js";
import { DEFAULT_CONFIG_PATH, loadOptionalConfigFile } from "./config-loader.js";

export type { GlobalCliOptions } from "./cli.js";

// ── Global options ──────────────────────────────────────────

export function getGlobalOptions(command: Command): Required<GlobalCliOptions> {
  const options = command.optsWithGlobals<GlobalCliOptions>();

  return {
    config: options.config ?? DEFAULT_CONFIG_PATH,
    verbose: options.verbose === true,
    quiet: options.quiet === true,
    json: options.json === true,
    color: options.color !== false,
  };
}

// ── UI helpers ──────────────────────────────────────────────

export function createUi(options: Required<GlobalCliOptions>): ChalkInstance {
  const noColorEnv = Object.prototype.hasOwnProperty.call(process.env, "NO_COLOR");
  const colorEnabled = options.color && !noColorEnv;

  return new Chalk({ level: colorEnabled ? chalk.level : 0 });
}

/**
 * Creates a spinner when output is interactive (non-JSON / non-quiet).
 * Pass `true` to suppress the spinner (e.g. in JSON output or quiet mode).
 */
export function createSpinner(suppress: boolean, text: string): Ora | null {
  if (suppress) {
    return null;
  }

  return ora({ text, color: "blue" }).start();
}

export function warn(ui: ChalkInstance, message: string): void {
  console.warn(ui.yellow(`[buildscope] ${message}`));
}

// ── Parsing helpers ─────────────────────────────────────────

export function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Expected an integer but received "${value}".`);
  }

  return parsed;
}

export function normalizeOutputFormat(value: string): OutputFormat {
  const normalized = value.trim().toLowerCase();
  const match = OUTPUT_FORMATS.find((format) => format === normalized);
  if (match) {
    return match;
  }

  throw new Error(`Unsupported --format value "${value}". Use ${OUTPUT_FORMATS.join(", ")}.`);
}

export { truncate } from "../core/utils.js";

// ── Config helpers ──────────────────────────────────────────

/**
 * The config file when present and valid, defaults otherwise. Load
 * failures surface as warnings in verbose mode only.
 */
export async function loadEffectiveConfig(
  globalOptions: Required<GlobalCliOptions>,
  ui: ChalkInstance,
): Promise<BuildscopeConfig> {
  const loaded = await loadOptionalConfigFile(globalOptions.config, {
    onWarning: globalOptions.verbose ? (message) => warn(ui, message) : undefined,
  });

  return loaded ?? loadConfig({});
}

// ── Output helpers ──────────────────────────────────────────

export async function writeOutputFile(filePath: string, content: string): Promise<string> {
  const absolutePath = resolve(filePath);
  await mkdir(dirname(absolutePath), { recursive: true });
  await writeFile(absolutePath, content.endsWith("\n") ? content : `${content}\n`, "utf8");
  return absolutePath;
}
