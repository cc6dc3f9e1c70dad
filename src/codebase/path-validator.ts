/**
 * Path validation for codebase access
 * Keeps every read inside the codebase root, including through symlinks
 */
import { resolve, normalize, sep, posix } from "path";
import { stat, realpath } from "fs/promises";
import {
  FileReadError,
  FileReadFailure,
  IndexBuildError,
  toError,
} from "../errors/index.js";

/**
 * Check if a normalized path is within a base directory
 */
export function isPathWithinBase(
  normalizedTarget: string,
  normalizedBase: string
): boolean {
  return (
    normalizedTarget === normalizedBase ||
    normalizedTarget.startsWith(normalizedBase + sep)
  );
}

/**
 * Normalize a path as written by a user or a model into index form:
 * "/"-separated, relative, without "./" segments.
 *
 * @returns undefined for absolute paths and paths climbing above the root
 */
export function toIndexPath(input: string): string | undefined {
  const slashed = input.trim().replace(/\\/g, "/");
  if (slashed === "" || slashed.startsWith("/") || /^[a-zA-Z]:\//.test(slashed)) {
    return undefined;
  }

  const normalized = posix.normalize(slashed).replace(/\/+$/, "");
  if (normalized === ".." || normalized.startsWith("../")) {
    return undefined;
  }
  return normalized === "." ? "" : normalized;
}

/**
 * Resolve an index path to a real absolute path inside the root
 *
 * @param relativePath - Path in index form
 * @param realRoot - Root directory, already passed through realpath
 * @throws FileReadError OUTSIDE_ROOT when the path or its symlink target
 * leaves the root, NOT_FOUND when it does not exist
 */
export async function resolveWithinRoot(
  relativePath: string,
  realRoot: string
): Promise<string> {
  const indexPath = toIndexPath(relativePath);
  if (indexPath === undefined) {
    throw new FileReadError(
      `Path "${relativePath}" is outside the codebase root`,
      relativePath,
      FileReadFailure.OUTSIDE_ROOT
    );
  }

  const resolvedTarget = resolve(realRoot, indexPath);
  const normalizedBase = normalize(realRoot);

  let realTarget: string;
  try {
    realTarget = await realpath(resolvedTarget);
  } catch (error) {
    throw new FileReadError(
      `File not found: ${relativePath}`,
      relativePath,
      FileReadFailure.NOT_FOUND,
      toError(error)
    );
  }

  if (!isPathWithinBase(normalize(realTarget), normalizedBase)) {
    throw new FileReadError(
      `Path "${relativePath}" resolves outside the codebase root`,
      relativePath,
      FileReadFailure.OUTSIDE_ROOT
    );
  }

  return realTarget;
}

/**
 * Validate that the codebase root exists and is a directory
 *
 * @returns The real path of the root
 * @throws IndexBuildError if validation fails
 */
export async function validateProjectRoot(rootPath: string): Promise<string> {
  let realRoot: string;
  try {
    realRoot = await realpath(resolve(rootPath));
  } catch (error) {
    throw new IndexBuildError(
      `Codebase root does not exist: ${rootPath}`,
      rootPath,
      undefined,
      toError(error)
    );
  }

  const stats = await stat(realRoot);
  if (!stats.isDirectory()) {
    throw new IndexBuildError(
      `Codebase root is not a directory: ${rootPath}`,
      rootPath
    );
  }

  return realRoot;
}
