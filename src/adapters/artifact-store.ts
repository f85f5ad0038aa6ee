/**
 * Artifact Store collaborator.
 *
 * Minimal contract the remote resolver and push step rely on: list files
 * under a prefix, download files under some prefixes, upload a directory.
 * All paths are POSIX strings relative to the store ref. No transactional
 * guarantees.
 *
 * Implementations throw TransientNetworkError for failures worth retrying
 * and ArtifactStoreError for permanent ones.
 */

import type { Logger } from 'pino';
import { HubArtifactStore } from './hub-artifact-store.js';
import { LocalDirectoryArtifactStore } from './local-artifact-store.js';
import { ArtifactStoreError } from '../api/errors.js';
import type { CommandRunner } from './tool-runner.js';
import type { RemoteSettings, ToolCommand } from '../types/pipeline.js';

export interface ArtifactStore {
  readonly kind: string;
  list(ref: string, prefix?: string): Promise<string[]>;
  /** Returns the downloaded relative paths */
  download(ref: string, prefixes: readonly string[], localDir: string): Promise<string[]>;
  /** Returns the number of uploaded files */
  upload(ref: string, localDir: string, prefix: string): Promise<number>;
}

export function normalizeStorePath(value: string): string {
  const trimmed = value.replace(/\\/g, '/').replace(/^\/+|\/+$/g, '');
  if (trimmed.split('/').some((segment) => segment === '..')) {
    throw new ArtifactStoreError('INVALID', `Store path may not contain '..': ${value}`);
  }
  return trimmed;
}

export function matchesPrefix(file: string, prefix: string): boolean {
  const normalized = normalizeStorePath(prefix);
  return normalized === '' || file === normalized || file.startsWith(`${normalized}/`);
}

export interface StoreFactoryOptions {
  hubCli: ToolCommand;
  runner?: CommandRunner;
  env?: Readonly<Record<string, string | undefined>>;
  logger?: Logger;
}

/**
 * Store for the configured remote kind, or null when remote is disabled.
 */
export function createArtifactStore(settings: RemoteSettings, options: StoreFactoryOptions): ArtifactStore | null {
  switch (settings.kind) {
    case 'none':
      return null;
    case 'directory':
      return new LocalDirectoryArtifactStore(settings.directoryRoot, { logger: options.logger });
    case 'hub':
      return new HubArtifactStore({
        endpoint: settings.hubEndpoint,
        cli: options.hubCli,
        runner: options.runner,
        token: (options.env ?? process.env)['HF_TOKEN'],
        logger: options.logger,
      });
  }
}

/**
 * The model hub itself, for repositories that publish checkpoints of their
 * own, whatever the configured remote kind.
 */
export function createModelHubStore(settings: RemoteSettings, options: StoreFactoryOptions): ArtifactStore {
  return new HubArtifactStore({
    endpoint: settings.hubEndpoint,
    cli: options.hubCli,
    runner: options.runner,
    token: (options.env ?? process.env)['HF_TOKEN'],
    logger: options.logger,
  });
}
