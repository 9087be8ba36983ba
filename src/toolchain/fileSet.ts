import type { Stats } from "node:fs";
import { lstat, readdir, stat } from "node:fs/promises";
import path from "node:path";

import { errnoCode } from "../nodePrimitives.js";
import { assertRealPathWithin, resolveWorkspacePath, toWorkspaceRelative } from "../paths.js";
import { ToolError } from "../server/toolErrors.js";
import { ERROR_CODES } from "../types.js";

/** Inputs accepted by every file-set based tool. */
export interface FileSetRequest {
  /** Explicit files, included whatever their extension. */
  readonly files?: readonly string[];
  /** Files or directories scanned recursively; `["."]` when nothing is given. */
  readonly paths?: readonly string[];
  readonly extensions: readonly string[];
  readonly excludeDirectories: readonly string[];
}

function hasExtension(file: string, extensions: ReadonlySet<string>): boolean {
  return extensions.has(path.extname(file).toLowerCase());
}

async function walk(
  directory: string,
  extensions: ReadonlySet<string>,
  excluded: ReadonlySet<string>,
  into: string[],
): Promise<void> {
  const entries = await readdir(directory, { withFileTypes: true });
  for (const entry of entries) {
    // Symlinks are neither followed nor reported.
    if (entry.isSymbolicLink()) {
      continue;
    }
    const absolute = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      if (!excluded.has(entry.name)) {
        await walk(absolute, extensions, excluded, into);
      }
      continue;
    }
    if (entry.isFile() && hasExtension(entry.name, extensions)) {
      into.push(absolute);
    }
  }
}

/**
 * Resolves the request into sorted, de-duplicated, workspace-relative POSIX
 * paths. Every input must stay inside the workspace root.
 *
 * @throws {PathResolutionError} when an input escapes the root.
 * @throws {ToolError} `E-FILESET-MISSING` when inputs do not exist.
 */
export async function resolveFileSet(workspaceRoot: string, request: FileSetRequest): Promise<string[]> {
  const root = path.resolve(workspaceRoot);
  const extensions = new Set(request.extensions.map((extension) => extension.toLowerCase()));
  const excluded = new Set(request.excludeDirectories);
  const collected: string[] = [];
  const missing: string[] = [];

  for (const file of request.files ?? []) {
    const absolute = resolveWorkspacePath(root, file);
    try {
      const stats = await stat(absolute);
      await assertRealPathWithin(root, absolute, file);
      if (stats.isFile()) {
        collected.push(absolute);
      } else {
        missing.push(file);
      }
    } catch (error) {
      if (errnoCode(error) !== "ENOENT" && errnoCode(error) !== "ENOTDIR") {
        throw error;
      }
      missing.push(file);
    }
  }

  const scanRoots = request.paths ?? (request.files && request.files.length > 0 ? [] : ["."]);
  for (const scanRoot of scanRoots) {
    const absolute = resolveWorkspacePath(root, scanRoot);
    let stats: Stats;
    try {
      stats = await lstat(absolute);
    } catch (error) {
      if (errnoCode(error) !== "ENOENT" && errnoCode(error) !== "ENOTDIR") {
        throw error;
      }
      missing.push(scanRoot);
      continue;
    }
    await assertRealPathWithin(root, absolute, scanRoot);
    if (stats.isDirectory()) {
      await walk(absolute, extensions, excluded, collected);
    } else if (stats.isFile() && hasExtension(absolute, extensions)) {
      collected.push(absolute);
    }
  }

  if (missing.length > 0) {
    throw new ToolError(
      ERROR_CODES.FILESET_MISSING,
      `${missing.length === 1 ? "path does" : "paths do"} not exist in the workspace: ${missing.join(", ")}`,
      { hint: "paths are resolved against the workspace root" },
    );
  }

  const relative = new Set(collected.map((absolute) => toWorkspaceRelative(root, absolute)));
  return [...relative].sort();
}

/** Guards relative paths that would otherwise read as command-line options. */
export function toCommandPath(relativePath: string): string {
  return relativePath.startsWith("-") ? `./${relativePath}` : relativePath;
}

/** Splits {@link items} into consecutive chunks of at most {@link size}. */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    batches.push(items.slice(index, index + size));
  }
  return batches;
}
