import * as path from 'path';
import { PathEscapeError } from './errors';

/**
 * Turn an externally supplied, store-relative identifier into an absolute path
 * under `root`.
 *
 * The identifier is normalized with POSIX rules (backslashes count as separators),
 * so `a/../b.json` becomes `b.json`. Anything that is absolute, empty, or still
 * climbs above the root after normalization is rejected. Symlinks are not
 * followed; a root containing links that point outside itself is a deployment
 * problem this check does not cover.
 */
export function resolveStorePath(root: string, relPath: string): string {
  const normalized = path.posix.normalize(relPath.replace(/\\/g, '/'));

  if (
    normalized === '.' ||
    normalized === '..' ||
    normalized.startsWith('../') ||
    path.posix.isAbsolute(normalized) ||
    path.win32.isAbsolute(relPath)
  ) {
    throw new PathEscapeError(relPath);
  }

  return path.resolve(root, normalized);
}

/**
 * Store-relative location for an absolute path, always with `/` separators
 */
export function toLocation(root: string, absolutePath: string): string {
  return path.relative(path.resolve(root), absolutePath).split(path.sep).join('/');
}
