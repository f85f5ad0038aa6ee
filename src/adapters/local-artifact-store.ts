/**
 * Artifact store backed by a mounted directory (NFS share, shared volume,
 * or a plain local folder): `<root>/<ref>/<path>`.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { ArtifactStoreError, TransientNetworkError } from '../api/errors.js';
import { copyTree, errorCode, isDirectory, listFilesRecursive } from '../utils/fs-helpers.js';
import { matchesPrefix, normalizeStorePath, type ArtifactStore } from './artifact-store.js';

export class LocalDirectoryArtifactStore implements ArtifactStore {
  public readonly kind = 'directory';
  private readonly root: string;
  private readonly logger?: Logger;

  constructor(root: string, options: { logger?: Logger } = {}) {
    this.root = path.resolve(root);
    this.logger = options.logger;
  }

  public async list(ref: string, prefix = ''): Promise<string[]> {
    const base = this.refDir(ref);
    if (!(await this.guard('list', () => isDirectory(base)))) {
      throw new ArtifactStoreError('NOT_FOUND', `No artifacts under ${base}`, { ref });
    }

    const normalizedPrefix = normalizeStorePath(prefix);
    const files = await this.guard('list', () => listFilesRecursive(base));
    return files.filter((file) => matchesPrefix(file, normalizedPrefix));
  }

  public async download(ref: string, prefixes: readonly string[], localDir: string): Promise<string[]> {
    const base = this.refDir(ref);
    const files = (await this.list(ref)).filter((file) => prefixes.some((prefix) => matchesPrefix(file, prefix)));
    if (files.length === 0) {
      throw new ArtifactStoreError('NOT_FOUND', `Nothing under ${prefixes.join(', ')} in ${base}`, { ref });
    }

    await this.guard('download', async () => {
      for (const file of files) {
        const target = path.join(localDir, ...file.split('/'));
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.copyFile(path.join(base, ...file.split('/')), target);
      }
    });

    this.logger?.debug({ ref, files: files.length, localDir }, 'Downloaded artifacts from directory store');
    return files;
  }

  public async upload(ref: string, localDir: string, prefix: string): Promise<number> {
    const target = path.join(this.refDir(ref), ...normalizeStorePath(prefix).split('/'));
    const count = await this.guard('upload', async () => {
      await fs.rm(target, { recursive: true, force: true });
      return copyTree(localDir, target);
    });
    this.logger?.debug({ ref, prefix, files: count }, 'Uploaded artifacts to directory store');
    return count;
  }

  private refDir(ref: string): string {
    return path.join(this.root, ...normalizeStorePath(ref).split('/'));
  }

  /**
   * Permission problems are permanent; any other I/O failure on a mounted
   * share is treated as transient.
   */
  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof ArtifactStoreError) {
        throw error;
      }
      const code = errorCode(error);
      if (code === 'EACCES' || code === 'EPERM') {
        throw new ArtifactStoreError('PERMISSION', `${operation}: permission denied under ${this.root}`);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new TransientNetworkError(`directory ${operation}`, message, error);
    }
  }
}
