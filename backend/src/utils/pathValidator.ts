/** Validates paths handed to the API: null bytes, UNC, and escapes from allowed roots. */

import fs from 'node:fs';
import path from 'node:path';

export type PathValidationResult =
  | { valid: true; resolved: string }
  | { valid: false; reason: string };

/**
 * Resolves `rawPath` and checks that it lies inside one of `roots`.
 * Relative paths are resolved against the first root.
 */
export function validatePathWithin(rawPath: string, roots: readonly string[]): PathValidationResult {
  if (typeof rawPath !== 'string' || rawPath.length === 0) {
    return { valid: false, reason: 'Path must be a non-empty string' };
  }

  if (rawPath.includes('\0')) {
    return { valid: false, reason: 'Path contains null bytes' };
  }

  // Reject UNC paths (\\server\share)
  if (rawPath.startsWith('\\\\')) {
    return { valid: false, reason: 'UNC paths are not allowed' };
  }

  if (roots.length === 0) {
    return { valid: false, reason: 'No directories are available' };
  }

  // Symlinks are followed so a link inside a root cannot point outside it
  const resolved = realPath(path.resolve(roots[0], rawPath));
  for (const root of roots) {
    if (isInside(resolved, realPath(path.resolve(root)))) {
      return { valid: true, resolved };
    }
  }
  return { valid: false, reason: 'Path is outside the allowed directories' };
}

/** Resolves symlinks; a missing path keeps its name under its parent's real path. */
function realPath(resolved: string): string {
  try {
    return fs.realpathSync(resolved);
  } catch {
    try {
      return path.join(fs.realpathSync(path.dirname(resolved)), path.basename(resolved));
    } catch {
      return resolved;
    }
  }
}

/** True when `child` equals `parent` or lies somewhere below it. */
export function isInside(child: string, parent: string): boolean {
  const rel = path.relative(parent, child);
  return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}
