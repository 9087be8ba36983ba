import { realpath } from 'node:fs/promises';
import path from 'node:path';

import { ERROR_CODES } from './types.js';

/**
 * Utilities dedicated to safe path management inside the workspace root.
 *
 * Every file-set argument comes from an untrusted caller; the helpers below
 * normalise the requested location and guarantee it cannot escape the root
 * the server was started with.
 */
export class PathResolutionError extends Error {
  /** Stable error code surfaced to clients when a path escapes the workspace. */
  public readonly code = ERROR_CODES.PATH_ESCAPE;
  public readonly hint = 'keep paths within the workspace root';
  /** Absolute path that the caller attempted to access. */
  public readonly attemptedPath: string;
  /** Root directory configured for the operation. */
  public readonly rootDirectory: string;
  public readonly details: { attemptedPath: string; rootDirectory: string };

  constructor(message: string, attemptedPath: string, rootDirectory: string) {
    super(message);
    this.name = 'PathResolutionError';
    this.attemptedPath = attemptedPath;
    this.rootDirectory = rootDirectory;
    this.details = { attemptedPath, rootDirectory };
  }
}

/**
 * Normalises a target path and ensures it stays within the provided root.
 *
 * @throws {PathResolutionError} When the resulting path escapes the root.
 */
export function resolveWithin(rootDir: string, ...segments: string[]): string {
  const absoluteRoot = path.resolve(rootDir);
  const targetPath = path.resolve(absoluteRoot, ...segments);
  const relative = path.relative(absoluteRoot, targetPath);

  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new PathResolutionError(`path "${segments.join(path.sep)}" escapes the workspace root`, targetPath, absoluteRoot);
  }

  return targetPath;
}

/**
 * Resolves an operator-provided path against the workspace root. Empty input
 * and NUL bytes are rejected alongside traversal attempts.
 */
export function resolveWorkspacePath(workspaceRoot: string, requestedPath: string): string {
  const root = path.resolve(workspaceRoot);
  const trimmed = requestedPath.trim();

  if (!trimmed || trimmed.includes('\u0000')) {
    throw new PathResolutionError('path must be a non-empty string', root, root);
  }

  return resolveWithin(root, trimmed);
}

/**
 * Checks where an existing path really lives once every symlink along it is
 * followed. {@link resolveWorkspacePath} only looks at the spelling, so a
 * symlinked directory earlier in the path would otherwise lead outside.
 *
 * @param requestedPath caller's spelling, used in the error message.
 * @throws {PathResolutionError} When the real location is outside the root.
 */
export async function assertRealPathWithin(
  workspaceRoot: string,
  absolutePath: string,
  requestedPath: string,
): Promise<void> {
  const [realRoot, realTarget] = await Promise.all([realpath(workspaceRoot), realpath(absolutePath)]);
  const relative = path.relative(realRoot, realTarget);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new PathResolutionError(`path "${requestedPath}" resolves outside the workspace root`, realTarget, realRoot);
  }
}

/**
 * Converts an absolute path into a workspace-relative POSIX path. Paths outside
 * the root are returned unchanged so findings from system headers keep their
 * original location.
 */
export function toWorkspaceRelative(workspaceRoot: string, absolutePath: string): string {
  const root = path.resolve(workspaceRoot);
  const relative = path.relative(root, path.resolve(root, absolutePath));
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    return absolutePath;
  }
  return relative.length === 0 ? '.' : relative.split(path.sep).join('/');
}
