/**
 * Configuration Signature Engine
 *
 * Captures tracked parameters, signs them deterministically and persists the
 * build record that marks the last successful build.
 *
 * @module core/build-signature
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { captureSnapshot } from './tracked-parameters.js';
import { parseBuildRecord, serializeBuildRecord } from './build-record.js';
import { isNotFound } from '../utils/fs-helpers.js';
import {
  NO_SIGNATURE,
  TRACKED_PARAMETERS,
  type BuildSignature,
  type ConfigurationSnapshot,
  type ParameterSource,
  type PersistedBuildRecord,
} from '../types/build.js';

export type Hasher = (input: string) => string;

/**
 * SHA-256 hasher, or null when the runtime's crypto build lacks it.
 */
export function defaultHasher(): Hasher | null {
  if (!crypto.getHashes().includes('sha256')) {
    return null;
  }
  return (input) => crypto.createHash('sha256').update(input, 'utf8').digest('hex');
}

/**
 * Sorted `name=value` lines joined by newline.
 */
export function canonicalize(snapshot: ConfigurationSnapshot): string {
  return [...TRACKED_PARAMETERS]
    .sort()
    .map((name) => `${name}=${snapshot[name]}`)
    .join('\n');
}

/**
 * Signature equality. The sentinel never matches anything, itself included,
 * so an unverifiable build is always rebuilt.
 */
export function signaturesMatch(a: BuildSignature, b: BuildSignature): boolean {
  if (a === NO_SIGNATURE || b === NO_SIGNATURE || a === '' || b === '') {
    return false;
  }
  return a === b;
}

export class BuildSignatureEngine {
  private readonly hasher: Hasher | null;
  private readonly logger?: Logger;

  /**
   * @param hasher - Digest function; `null` forces the sentinel signature.
   *   Omitted means SHA-256 when available.
   */
  constructor(options: { hasher?: Hasher | null; logger?: Logger } = {}) {
    this.hasher = options.hasher === undefined ? defaultHasher() : options.hasher;
    this.logger = options.logger;
  }

  public capture(source: ParameterSource): ConfigurationSnapshot {
    return captureSnapshot(source);
  }

  public sign(snapshot: ConfigurationSnapshot): BuildSignature {
    if (!this.hasher) {
      this.logger?.warn('No hashing capability available; using sentinel signature');
      return NO_SIGNATURE;
    }
    return this.hasher(canonicalize(snapshot));
  }

  /**
   * Write the record atomically: temp file in the same directory, then rename.
   */
  public async persist(
    snapshot: ConfigurationSnapshot,
    signature: BuildSignature,
    recordPath: string,
    timestamp: string = new Date().toISOString()
  ): Promise<void> {
    const directory = path.dirname(recordPath);
    await fs.mkdir(directory, { recursive: true });

    const tempPath = path.join(
      directory,
      `.${path.basename(recordPath)}.${process.pid}.${crypto.randomBytes(4).toString('hex')}.tmp`
    );

    try {
      await fs.writeFile(tempPath, serializeBuildRecord(snapshot, signature, timestamp), 'utf8');
      await fs.rename(tempPath, recordPath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }

    this.logger?.info({ recordPath, signature }, 'Build record persisted');
  }

  /**
   * Read the record, or null when it is missing or unparseable.
   */
  public async readRecord(recordPath: string): Promise<PersistedBuildRecord | null> {
    let content: string;
    try {
      content = await fs.readFile(recordPath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }

    const record = parseBuildRecord(content);
    if (!record) {
      this.logger?.warn({ recordPath }, 'Build record is unreadable; treating as absent');
    }
    return record;
  }

  public async removeRecord(recordPath: string): Promise<void> {
    await fs.rm(recordPath, { force: true });
  }
}
