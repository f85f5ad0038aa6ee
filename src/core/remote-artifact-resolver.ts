/**
 * Remote Artifact Resolver
 *
 * Prefers a compatible prebuilt engine, then a checkpoint of the required
 * weight format, from the configured artifact store. Every store call is retried with backoff; a
 * store that stays unreachable means "build locally", never "artifact does
 * not exist".
 *
 * @module core/remote-artifact-resolver
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { None, Some, type Option } from 'ts-results';
import { toBuildCacheError } from '../api/errors.js';
import {
  checkpointDescriptor,
  checkpointPrefix,
  engineDescriptor,
  engineLabelsFromListing,
  rankEngineLabels,
} from './artifact-layout.js';
import { ArtifactValidator } from './artifact-validator.js';
import { moveDirectory } from '../utils/fs-helpers.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { attemptWithRetry, type RetryConfig } from '../utils/retry.js';
import type { ArtifactStore } from '../adapters/artifact-store.js';
import type { ArtifactExpectations, RemotePreference, ResolvedRemoteArtifact } from '../types/artifacts.js';
import type { ArchitectureDescriptor, WeightFormat } from '../types/hardware.js';
import type { LayoutSettings } from '../types/pipeline.js';

export interface RemoteResolveRequest {
  ref: string;
  architecture: ArchitectureDescriptor;
  preference: RemotePreference;
  preferredLabel?: string;
  engineKind: string;
  engineDir: string;
  checkpointDir: string;
  expected: ArtifactExpectations & { weightFormat: WeightFormat };
}

/**
 * A checkpoint published outside the build cache layout, such as the one a
 * pre-quantized model repository carries.
 */
export interface CheckpointFetchRequest {
  ref: string;
  prefix: string;
  architecture: ArchitectureDescriptor;
  checkpointDir: string;
  expected?: ArtifactExpectations;
}

export interface RemoteArtifactResolverOptions {
  store: ArtifactStore;
  layout: LayoutSettings;
  enginesPrefix: string;
  checkpointsPrefix: string;
  retry: Omit<RetryConfig, 'onRetry'>;
  validator?: ArtifactValidator;
  logger?: Logger;
}

type StoreCall<T> = { ok: true; value: T } | { ok: false; reason: string };

export class RemoteArtifactResolver {
  private readonly store: ArtifactStore;
  private readonly layout: LayoutSettings;
  private readonly enginesPrefix: string;
  private readonly checkpointsPrefix: string;
  private readonly retry: Omit<RetryConfig, 'onRetry'>;
  private readonly validator: ArtifactValidator;
  private readonly logger?: Logger;

  constructor(options: RemoteArtifactResolverOptions) {
    this.store = options.store;
    this.layout = options.layout;
    this.enginesPrefix = options.enginesPrefix;
    this.checkpointsPrefix = options.checkpointsPrefix;
    this.retry = options.retry;
    this.logger = options.logger;
    this.validator = options.validator ?? new ArtifactValidator({ logger: options.logger });
  }

  public async resolve(request: RemoteResolveRequest): Promise<Option<ResolvedRemoteArtifact>> {
    const listing = await this.call(`list ${request.ref}`, () => this.store.list(request.ref));
    if (!listing.ok) {
      this.logger?.warn({ ref: request.ref, reason: listing.reason }, 'Remote store unavailable; building locally');
      return None;
    }

    lazyLog(this.logger, 'debug', () => ({ ref: request.ref, files: listing.value.length }), 'Remote listing');

    if (request.preference !== 'checkpoints-only') {
      const engine = await this.resolveEngine(request, listing.value);
      if (engine.some) {
        return engine;
      }
    }

    if (request.preference !== 'engines-only') {
      const checkpoint = await this.resolveCheckpoint(request, listing.value);
      if (checkpoint.some) {
        return checkpoint;
      }
    }

    this.logger?.info({ ref: request.ref, preference: request.preference }, 'No usable remote artifact');
    return None;
  }

  /**
   * Fetch and validate the checkpoint under an arbitrary prefix of `ref`.
   */
  public async fetchCheckpoint(request: CheckpointFetchRequest): Promise<Option<ResolvedRemoteArtifact>> {
    const listing = await this.call(`list ${request.ref}`, () => this.store.list(request.ref, request.prefix));
    if (!listing.ok) {
      this.logger?.warn({ ref: request.ref, reason: listing.reason }, 'Checkpoint source unavailable');
      return None;
    }
    if (listing.value.length === 0) {
      return None;
    }
    return this.downloadCheckpoint(request);
  }

  private async resolveEngine(
    request: RemoteResolveRequest,
    listing: readonly string[]
  ): Promise<Option<ResolvedRemoteArtifact>> {
    const labels = engineLabelsFromListing(listing, this.enginesPrefix);
    if (labels.length === 0) {
      return None;
    }

    const candidates = rankEngineLabels(labels, {
      architecture: request.architecture,
      engineKind: request.engineKind,
      weightFormat: request.expected.weightFormat,
      toolchain: request.expected.toolchain,
      preferred: request.preferredLabel || undefined,
    });
    if (candidates.length === 0) {
      this.logger?.info({ labels, arch: request.architecture.code }, 'No remote engine matches this GPU');
      return None;
    }
    if (candidates.length > 1) {
      this.logger?.debug({ candidates }, 'Several remote engines match this GPU');
    }

    for (const label of candidates) {
      const engine = await this.tryEngine(request, label);
      if (engine.some) {
        return engine;
      }
    }
    return None;
  }

  private async tryEngine(request: RemoteResolveRequest, label: string): Promise<Option<ResolvedRemoteArtifact>> {
    const fetched = await this.fetchInto(request.ref, `${this.enginesPrefix}/${label}`, request.engineDir);
    if (!fetched) {
      return None;
    }

    const validation = await this.validator.validate(
      engineDescriptor(request.engineDir, this.layout, request.expected),
      request.architecture
    );
    if (validation.err) {
      this.logger?.warn(
        { label, code: validation.val.code, error: validation.val.message },
        'Remote engine rejected'
      );
      await fs.rm(request.engineDir, { recursive: true, force: true });
      return None;
    }

    this.logger?.info({ label, engineDir: request.engineDir }, 'Using prebuilt remote engine');
    return Some<ResolvedRemoteArtifact>({ kind: 'engine', directory: request.engineDir, label, report: validation.val });
  }

  private async resolveCheckpoint(
    request: RemoteResolveRequest,
    listing: readonly string[]
  ): Promise<Option<ResolvedRemoteArtifact>> {
    const prefix = checkpointPrefix(this.checkpointsPrefix, request.expected.weightFormat);
    if (!listing.some((file) => file.startsWith(`${prefix}/`))) {
      return None;
    }

    return this.downloadCheckpoint({
      ref: request.ref,
      prefix,
      architecture: request.architecture,
      checkpointDir: request.checkpointDir,
      expected: { precisionMode: request.expected.precisionMode, weightFormat: request.expected.weightFormat },
    });
  }

  private async downloadCheckpoint(request: CheckpointFetchRequest): Promise<Option<ResolvedRemoteArtifact>> {
    const fetched = await this.fetchInto(request.ref, request.prefix, request.checkpointDir);
    if (!fetched) {
      return None;
    }

    const validation = await this.validator.validate(
      checkpointDescriptor(request.checkpointDir, this.layout, request.expected),
      request.architecture
    );
    if (validation.err) {
      this.logger?.warn({ prefix: request.prefix, error: validation.val.message }, 'Remote checkpoint rejected');
      await fs.rm(request.checkpointDir, { recursive: true, force: true });
      return None;
    }

    this.logger?.info({ prefix: request.prefix, checkpointDir: request.checkpointDir }, 'Using prebuilt remote checkpoint');
    return Some<ResolvedRemoteArtifact>({ kind: 'checkpoint', directory: request.checkpointDir, report: validation.val });
  }

  /**
   * Download `prefix` into a staging directory beside `target`, then move
   * the prefix's contents into place.
   */
  private async fetchInto(ref: string, prefix: string, target: string): Promise<boolean> {
    const staging = `${target}.remote-staging`;
    await fs.rm(staging, { recursive: true, force: true });

    try {
      const download = await this.call(`download ${prefix}`, () => this.store.download(ref, [prefix], staging));
      if (!download.ok) {
        this.logger?.warn({ ref, prefix, reason: download.reason }, 'Remote download failed');
        return false;
      }
      await moveDirectory(path.join(staging, ...prefix.split('/')), target);
      return true;
    } finally {
      await fs.rm(staging, { recursive: true, force: true });
    }
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<StoreCall<T>> {
    const result = await attemptWithRetry(fn, {
      ...this.retry,
      onRetry: ({ attempt, delayMs, error }) => {
        this.logger?.warn(
          { operation, attempt, delayMs, error: error instanceof Error ? error.message : String(error) },
          'Remote store call failed; retrying'
        );
      },
    });

    if (result.ok) {
      return { ok: true, value: result.val };
    }

    const error = toBuildCacheError(result.val.error);
    const reason = result.val.exhausted
      ? `unavailable after ${result.val.attempts} attempts: ${error.message}`
      : `${error.code}: ${error.message}`;
    return { ok: false, reason };
  }
}
