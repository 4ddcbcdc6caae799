/**
 * Resolution of collaborator-supplied paths against a base directory.
 */

import * as path from 'node:path';
import { PathTraversalError } from '@devcrew/crew-contracts';

export function isWithin(base: string, target: string): boolean {
  const relative = path.relative(base, target);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

/**
 * Resolves `relPath` under `base` (optionally under `base/subDir`), stripping
 * a redundant leading `subDir/` prefix. Throws when the result escapes `base`.
 */
export function resolveWithin(base: string, relPath: string, subDir = ''): string {
  const root = path.resolve(base);
  let cleaned = relPath.replace(/\\/g, '/');
  if (subDir && cleaned.startsWith(`${subDir}/`)) {
    cleaned = cleaned.slice(subDir.length + 1);
  }
  const target = subDir ? path.resolve(root, subDir, cleaned) : path.resolve(root, cleaned);
  if (!isWithin(root, target)) {
    throw new PathTraversalError(relPath, root);
  }
  return target;
}

/**
 * Repository-style relative path (forward slashes).
 */
export function toRelative(base: string, target: string): string {
  return path.relative(base, target).split(path.sep).join('/');
}

/**
 * Source-relative form of a collaborator-suggested path: separators
 * normalized, leading `./` and a redundant `<source root name>/` dropped.
 */
export function toSourceRelative(sourceRoot: string, candidate: string): string {
  const rootName = path.basename(sourceRoot);
  const cleaned = candidate.trim().replace(/\\/g, '/').replace(/^\.\//, '');
  return cleaned.startsWith(`${rootName}/`) ? cleaned.slice(rootName.length + 1) : cleaned;
}
