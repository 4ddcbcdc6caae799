/**
 * Filesystem primitives used by plan execution.
 *
 * Missing sources are skipped (return `false`), existing destinations and
 * file/directory mismatches throw. Parent directories are created as needed.
 */

import { promises as fs } from 'node:fs';
import type { Stats } from 'node:fs';
import * as path from 'node:path';
import { DevcrewError, hasErrorCode } from '@devcrew/crew-contracts';
import { resolveWithin } from './path-guard.js';

export async function statOrNull(target: string): Promise<Stats | null> {
  try {
    return await fs.stat(target);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return null;
    }
    throw error;
  }
}

export async function pathExists(target: string): Promise<boolean> {
  return (await statOrNull(target)) !== null;
}

export async function readTextOrNull(target: string): Promise<string | null> {
  try {
    return await fs.readFile(target, 'utf-8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return null;
    }
    throw error;
  }
}

export async function writeText(target: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, content, 'utf-8');
}

/**
 * Writes every `relative path → content` entry under `base`; paths escaping
 * `base` throw. Returns the absolute paths written, in entry order.
 */
export async function writeFileMap(base: string, files: Record<string, string>): Promise<string[]> {
  const written: string[] = [];
  for (const [relPath, content] of Object.entries(files)) {
    const target = resolveWithin(base, relPath);
    await writeText(target, content);
    written.push(target);
  }
  return written;
}

/**
 * Creates (or truncates) each file, creating parent directories.
 */
export async function writeEmptyFiles(targets: string[]): Promise<void> {
  for (const target of targets) {
    const stats = await statOrNull(target);
    if (stats?.isDirectory()) {
      throw new DevcrewError('NOT_A_FILE', `Cannot create file, a directory exists at ${target}`, { target });
    }
    await writeText(target, '');
  }
}

/**
 * Deletes files; missing ones are skipped. Returns the paths deleted.
 */
export async function deleteFiles(targets: string[]): Promise<string[]> {
  const deleted: string[] = [];
  for (const target of targets) {
    const stats = await statOrNull(target);
    if (!stats) {
      continue;
    }
    if (stats.isDirectory()) {
      throw new DevcrewError('NOT_A_FILE', `Cannot delete ${target}: is a directory`, { target });
    }
    await fs.unlink(target);
    deleted.push(target);
  }
  return deleted;
}

export async function createDirectories(targets: string[]): Promise<void> {
  for (const target of targets) {
    const stats = await statOrNull(target);
    if (stats && !stats.isDirectory()) {
      throw new DevcrewError('NOT_A_DIRECTORY', `Cannot create directory, a file exists at ${target}`, { target });
    }
    await fs.mkdir(target, { recursive: true });
  }
}

/**
 * Recursively deletes directories; missing ones are skipped.
 */
export async function deleteDirectories(targets: string[]): Promise<string[]> {
  const deleted: string[] = [];
  for (const target of targets) {
    const stats = await statOrNull(target);
    if (!stats) {
      continue;
    }
    if (!stats.isDirectory()) {
      throw new DevcrewError('NOT_A_DIRECTORY', `Cannot delete ${target}: not a directory`, { target });
    }
    await fs.rm(target, { recursive: true, force: true });
    deleted.push(target);
  }
  return deleted;
}

type TransferKind = 'rename' | 'move' | 'copy';

async function transfer(kind: TransferKind, source: string, destination: string): Promise<boolean> {
  const sourceStats = await statOrNull(source);
  if (!sourceStats) {
    return false;
  }
  if (sourceStats.isDirectory()) {
    throw new DevcrewError('NOT_A_FILE', `Cannot ${kind} ${source}: is a directory`, { source });
  }
  if (await pathExists(destination)) {
    throw new DevcrewError('DESTINATION_EXISTS', `Cannot ${kind} to ${destination}: destination exists`, {
      source,
      destination,
    });
  }
  await fs.mkdir(path.dirname(destination), { recursive: true });
  if (kind === 'copy') {
    await fs.copyFile(source, destination);
  } else {
    await fs.rename(source, destination);
  }
  return true;
}

export function renameFile(source: string, destination: string): Promise<boolean> {
  return transfer('rename', source, destination);
}

export function moveFile(source: string, destination: string): Promise<boolean> {
  return transfer('move', source, destination);
}

export function copyFile(source: string, destination: string): Promise<boolean> {
  return transfer('copy', source, destination);
}
