import { basename, dirname, resolve } from "node:path";
import { vi } from "vitest";

type EntryKind = "file" | "directory";

interface VirtualDirectoryEntry {
  name: string;
  kind: EntryKind;
}

export const SOURCE_ROOT = "/project";

const directories = new Map<string, VirtualDirectoryEntry[]>();
const files = new Map<string, string>();
const unreadablePaths = new Set<string>();

function errnoError(code: string, message: string): Error {
  return Object.assign(new Error(`${code}: ${message}`), { code });
}

function createDirent(name: string, kind: EntryKind) {
  return {
    name,
    isFile: () => kind === "file",
    isDirectory: () => kind === "directory",
    isSymbolicLink: () => false,
  };
}

/** Stand-in for `node:fs/promises`, backed by the maps above. */
export const fsPromisesMock = {
  readdir: vi.fn(async (directoryPath: string) => {
    const absolutePath = resolve(String(directoryPath));
    if (unreadablePaths.has(absolutePath)) {
      throw errnoError("EACCES", `permission denied, scandir '${absolutePath}'`);
    }

    const entries = directories.get(absolutePath);
    if (!entries) {
      throw errnoError("ENOENT", `no such file or directory, scandir '${absolutePath}'`);
    }
    return entries.map((entry) => createDirent(entry.name, entry.kind));
  }),
  readFile: vi.fn(async (filePath: string) => {
    const absolutePath = resolve(String(filePath));
    if (unreadablePaths.has(absolutePath)) {
      throw errnoError("EACCES", `permission denied, open '${absolutePath}'`);
    }

    const content = files.get(absolutePath);
    if (content === undefined) {
      throw errnoError("ENOENT", `no such file or directory, open '${absolutePath}'`);
    }
    return content;
  }),
};

export function resetVirtualFs(): void {
  directories.clear();
  files.clear();
  unreadablePaths.clear();
  fsPromisesMock.readdir.mockClear();
  fsPromisesMock.readFile.mockClear();
  ensureDirectory(SOURCE_ROOT);
}

export function addVirtualFile(relativePath: string, content: string): void {
  const absolutePath = resolve(SOURCE_ROOT, relativePath);
  ensureDirectory(dirname(absolutePath));
  addEntry(dirname(absolutePath), basename(absolutePath), "file");
  files.set(absolutePath, content);
}

export function addVirtualDirectory(relativePath: string): void {
  ensureDirectory(resolve(SOURCE_ROOT, relativePath));
}

export function markUnreadable(relativePath: string): void {
  unreadablePaths.add(resolve(SOURCE_ROOT, relativePath));
}

function addEntry(directoryPath: string, name: string, kind: EntryKind): void {
  const entries = directories.get(directoryPath);
  if (!entries || entries.some((entry) => entry.name === name)) {
    return;
  }

  entries.push({ name, kind });
  entries.sort((left, right) => left.name.localeCompare(right.name));
}

function ensureDirectory(absoluteDirectoryPath: string): void {
  const normalizedPath = resolve(absoluteDirectoryPath);
  if (directories.has(normalizedPath)) {
    return;
  }

  directories.set(normalizedPath, []);
  const parentPath = dirname(normalizedPath);
  if (parentPath !== normalizedPath) {
    ensureDirectory(parentPath);
    addEntry(parentPath, basename(normalizedPath), "directory");
  }
}
