import type { Dirent } from "node:fs";
import { readFile, readdir } from "node:fs/promises";
import { basename, extname, resolve, sep } from "node:path";

import { type QualityConfig, scanError, splitLines } from "../core/index.js";
import type { QualityMetrics, SourceScan } from "./types.js";

interface CompiledPatterns {
  functionPattern: RegExp;
  documentationPattern: RegExp;
  testFilePattern: RegExp;
  testFunctionPattern: RegExp;
  securityPatterns: RegExp[];
  architecturePatterns: Array<[string, RegExp]>;
}

/**
 * Walk `sourceRoot` and count code metrics line by line. Throws
 * `SOURCE_ROOT_UNREADABLE` when the root itself cannot be listed; anything
 * unreadable below it is skipped and reported.
 */
export async function collectMetrics(
  sourceRoot: string,
  config: QualityConfig,
  signal?: AbortSignal,
): Promise<SourceScan> {
  const rootPath = resolve(sourceRoot);
  const unreadable: string[] = [];
  const files = await collectSourceFiles(rootPath, config, unreadable, signal);
  const patterns = compilePatterns(config);

  const metrics: QualityMetrics = {
    fileCount: 0,
    functionCount: 0,
    documentedFunctionCount: 0,
    testFunctionCount: 0,
    largeFileCount: 0,
    securityFlagCount: 0,
    totalLines: 0,
    unreadableFileCount: 0,
    patternUsage: Object.fromEntries(patterns.architecturePatterns.map(([name]) => [name, 0])),
  };

  for (const filePath of files) {
    throwIfAborted(signal);

    let content: string;
    try {
      content = await readFile(resolve(rootPath, filePath), "utf8");
    } catch {
      unreadable.push(filePath);
      continue;
    }

    const lines = splitLines(content);
    const isTestFile = patterns.testFilePattern.test(basename(filePath));

    metrics.fileCount += 1;
    metrics.totalLines += lines.length;
    if (lines.length > config.largeFileLines) {
      metrics.largeFileCount += 1;
    }

    for (const line of lines) {
      if (patterns.functionPattern.test(line)) {
        metrics.functionCount += 1;
      }
      if (patterns.documentationPattern.test(line)) {
        metrics.documentedFunctionCount += 1;
      }
      if (isTestFile && patterns.testFunctionPattern.test(line)) {
        metrics.testFunctionCount += 1;
      }
      if (patterns.securityPatterns.some((pattern) => pattern.test(line))) {
        metrics.securityFlagCount += 1;
      }
      for (const [name, pattern] of patterns.architecturePatterns) {
        if (pattern.test(line)) {
          metrics.patternUsage[name] = (metrics.patternUsage[name] ?? 0) + 1;
        }
      }
    }
  }

  metrics.unreadableFileCount = unreadable.length;
  unreadable.sort((left, right) => left.localeCompare(right));

  return { metrics, unreadable };
}

async function collectSourceFiles(
  rootPath: string,
  config: QualityConfig,
  unreadable: string[],
  signal?: AbortSignal,
): Promise<string[]> {
  const files: string[] = [];
  const excludeMatchers = config.exclude.map(compileGlobMatcher);
  const metadataFiles = new Set(config.metadataFiles);
  const extension = config.extension.toLowerCase();

  let rootEntries: Dirent[];
  try {
    rootEntries = await readdir(rootPath, { withFileTypes: true, encoding: "utf8" });
  } catch (error) {
    throw scanError("SOURCE_ROOT_UNREADABLE", `Cannot read source root ${rootPath}`, {
      context: { sourceRoot: rootPath },
      cause: error,
    });
  }

  await walk("", rootEntries);

  async function walk(relativeDir: string, entries: Dirent[]): Promise<void> {
    throwIfAborted(signal);

    for (const entry of entries) {
      const entryName = String(entry.name);
      if (entryName.startsWith(".")) {
        continue;
      }

      const relativePath = normalizeRelativePath(
        relativeDir ? `${relativeDir}/${entryName}` : entryName,
      );

      if (excludeMatchers.some((matches) => matches(relativePath))) {
        continue;
      }

      if (entry.isDirectory()) {
        let children: Dirent[];
        try {
          children = await readdir(resolve(rootPath, relativePath), {
            withFileTypes: true,
            encoding: "utf8",
          });
        } catch {
          unreadable.push(`${relativePath}/`);
          continue;
        }
        await walk(relativePath, children);
        continue;
      }

      if (!entry.isFile() || metadataFiles.has(entryName)) {
        continue;
      }

      if (extname(entryName).toLowerCase() === extension) {
        files.push(relativePath);
      }
    }
  }

  files.sort((left, right) => left.localeCompare(right));
  return files;
}

function compilePatterns(config: QualityConfig): CompiledPatterns {
  return {
    functionPattern: new RegExp(config.functionPattern),
    documentationPattern: new RegExp(config.documentationPattern),
    testFilePattern: new RegExp(config.testFilePattern),
    testFunctionPattern: new RegExp(config.testFunctionPattern),
    securityPatterns: config.securityPatterns.map((pattern) => new RegExp(pattern)),
    architecturePatterns: Object.entries(config.architecturePatterns).map(
      ([name, pattern]): [string, RegExp] => [name, new RegExp(pattern)],
    ),
  };
}

export function compileGlobMatcher(pattern: string): (filePath: string) => boolean {
  const normalized = normalizeRelativePath(pattern.replace(/^!+/, "").trim());
  if (!normalized) {
    return () => false;
  }

  if (!normalized.includes("*")) {
    const prefix = normalized.endsWith("/") ? normalized : `${normalized}/`;
    return (filePath: string) =>
      filePath === normalized || filePath.startsWith(prefix) || filePath.endsWith(`/${normalized}`);
  }

  const escaped = normalized
    .replace(/[.+^${}()|[\]\\]/g, "\\$&")
    .replace(/\*\*/g, "__DOUBLE_STAR__")
    .replace(/\*/g, "[^/]*")
    .replace(/__DOUBLE_STAR__/g, ".*");

  const regex = new RegExp(`^${escaped}$`);
  return (filePath: string) => regex.test(filePath);
}

function normalizeRelativePath(filePath: string): string {
  return filePath.split(sep).join("/");
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new Error("Source scan aborted");
  }
}
