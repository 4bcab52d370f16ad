import { constants as fsConstants } from "node:fs";
import { access, readFile } from "node:fs/promises";
import { extname, resolve } from "node:path";
import { pathToFileURL } from "node:url";

import { type BuildscopeConfig, loadConfig } from "../core/index.js";

export const DEFAULT_CONFIG_PATH = "buildscope.config.json";

export interface ConfigLoaderOptions {
  cwd?: string;
  onWarning?: (message: string) => void;
}

/**
 * Load a config file if one exists. `.json` files are parsed; `.js` and
 * `.mjs` files are imported and their default export used. Returns `null`
 * when the file is missing or fails to load, after reporting the failure
 * through `onWarning`.
 */
export async function loadOptionalConfigFile(
  configPath: string,
  options: ConfigLoaderOptions = {},
): Promise<BuildscopeConfig | null> {
  const absolutePath = resolve(options.cwd ?? process.cwd(), configPath);
  if (!(await pathExists(absolutePath))) {
    return null;
  }

  try {
    const candidate = await readConfigCandidate(absolutePath);
    return loadConfig(candidate);
  } catch (error) {
    options.onWarning?.(
      `Failed to load config at ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
    );
    return null;
  }
}

async function readConfigCandidate(absolutePath: string): Promise<unknown> {
  if (extname(absolutePath).toLowerCase() === ".json") {
    const source = await readFile(absolutePath, "utf8");
    const parsed: unknown = JSON.parse(source);
    return parsed;
  }

  const imported: unknown = await import(`${pathToFileURL(absolutePath).href}?t=${Date.now()}`);
  if (typeof imported === "object" && imported !== null && "default" in imported) {
    return imported.default;
  }
  return imported;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}
