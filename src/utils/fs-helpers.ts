/**
 * Filesystem helpers shared by the validator, stores and cleanup.
 */

import type { Dirent } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isNotFound(error: unknown): boolean {
  return errorCode(error) === 'ENOENT';
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

export async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Every file below `root`, as POSIX paths relative to `root`, sorted.
 * A missing root yields an empty list.
 */
export async function listFilesRecursive(root: string): Promise<string[]> {
  const files: string[] = [];

  const walk = async (dir: string, prefix: string): Promise<void> => {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (isNotFound(error) && prefix === '') {
        return;
      }
      throw error;
    }

    for (const entry of entries) {
      const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        await walk(path.join(dir, entry.name), relative);
      } else if (entry.isFile()) {
        files.push(relative);
      }
    }
  };

  await walk(root, '');
  return files.sort();
}

/**
 * Copy the files of `source` below `destination`, creating directories.
 */
export async function copyTree(source: string, destination: string): Promise<number> {
  const files = await listFilesRecursive(source);
  for (const file of files) {
    const target = path.join(destination, ...file.split('/'));
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.copyFile(path.join(source, ...file.split('/')), target);
  }
  return files.length;
}

/**
 * Replace `destination` with `source` by rename, falling back to copy when
 * the two live on different devices.
 */
export async function moveDirectory(source: string, destination: string): Promise<void> {
  await fs.rm(destination, { recursive: true, force: true });
  await fs.mkdir(path.dirname(destination), { recursive: true });
  try {
    await fs.rename(source, destination);
  } catch (error) {
    if (errorCode(error) !== 'EXDEV') {
      throw error;
    }
    await copyTree(source, destination);
    await fs.rm(source, { recursive: true, force: true });
  }
}

export function formatSize(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let size = bytes;
  let unitIndex = 0;

  while (size >= 1024 && unitIndex < units.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  return `${size.toFixed(2)} ${units[unitIndex]}`;
}
