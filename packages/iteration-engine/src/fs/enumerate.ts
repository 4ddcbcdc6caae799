/**
 * File enumeration by extension.
 */

import { glob } from 'glob';

export function extensionPattern(extensions: readonly string[]): string {
  const cleaned = [...new Set(extensions.map((ext) => ext.replace(/^\./, '')).filter(Boolean))];
  if (cleaned.length === 1) {
    return `**/*.${cleaned[0]}`;
  }
  return `**/*.{${cleaned.join(',')}}`;
}

/**
 * Lists files under `root` with one of `extensions`, as sorted
 * forward-slash paths relative to `root`.
 */
export async function listFiles(
  root: string,
  extensions: readonly string[],
  ignoreDirs: readonly string[] = []
): Promise<string[]> {
  if (extensions.length === 0) {
    return [];
  }
  const matches = await glob(extensionPattern(extensions), {
    cwd: root,
    nodir: true,
    absolute: false,
    dot: false,
    posix: true,
    ignore: ignoreDirs.map((dir) => `**/${dir}/**`),
  });
  return matches.map((match) => match.replace(/\\/g, '/')).sort();
}
