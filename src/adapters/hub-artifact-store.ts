/**
 * Artifact store backed by a model hub repository.
 *
 * Listing goes through the hub's HTTP tree API; transfers go through the
 * hub CLI so large files get its resumable download and upload handling.
 */

import * as fs from 'node:fs/promises';
import type { Logger } from 'pino';
import { z } from 'zod';
import { ArtifactStoreError, TransientNetworkError } from '../api/errors.js';
import { listFilesRecursive } from '../utils/fs-helpers.js';
import { matchesPrefix, normalizeStorePath, type ArtifactStore } from './artifact-store.js';
import { execaRunner, runTool, type CommandRunner } from './tool-runner.js';
import type { ToolCommand } from '../types/pipeline.js';

const TreeEntrySchema = z.object({
  type: z.string(),
  path: z.string(),
});

const TreeResponseSchema = z.array(TreeEntrySchema);

export interface HubArtifactStoreOptions {
  endpoint: string;
  cli: ToolCommand;
  runner?: CommandRunner;
  token?: string;
  revision?: string;
  fetch?: typeof fetch;
  logger?: Logger;
}

/**
 * `<https://hub/api/...?cursor=abc>; rel="next"` → the URL
 */
export function nextPageUrl(linkHeader: string | null): string | null {
  if (!linkHeader) {
    return null;
  }
  for (const part of linkHeader.split(',')) {
    const match = /<([^>]+)>\s*;\s*rel="next"/.exec(part.trim());
    if (match?.[1]) {
      return match[1];
    }
  }
  return null;
}

export class HubArtifactStore implements ArtifactStore {
  public readonly kind = 'hub';
  private readonly endpoint: string;
  private readonly cli: ToolCommand;
  private readonly runner: CommandRunner;
  private readonly token?: string;
  private readonly revision: string;
  private readonly fetchImpl?: typeof fetch;
  private readonly logger?: Logger;

  constructor(options: HubArtifactStoreOptions) {
    this.endpoint = options.endpoint.replace(/\/+$/, '');
    this.cli = options.cli;
    this.runner = options.runner ?? execaRunner;
    this.token = options.token || undefined;
    this.revision = options.revision ?? 'main';
    this.fetchImpl = options.fetch;
    this.logger = options.logger;
  }

  public async list(ref: string, prefix = ''): Promise<string[]> {
    const repo = normalizeStorePath(ref);
    const normalizedPrefix = normalizeStorePath(prefix);
    const pathPart = normalizedPrefix ? `/${normalizedPrefix.split('/').map(encodeURIComponent).join('/')}` : '';

    let url: string | null =
      `${this.endpoint}/api/models/${repo}/tree/${encodeURIComponent(this.revision)}${pathPart}?recursive=true`;
    const files: string[] = [];

    while (url) {
      const response = await this.request(url, repo);
      const body: unknown = await response.json();
      const parsed = TreeResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new TransientNetworkError('hub list', `unexpected tree response for ${repo}`);
      }
      for (const entry of parsed.data) {
        if (entry.type === 'file') {
          files.push(entry.path);
        }
      }
      url = nextPageUrl(response.headers.get('link'));
    }

    return files.filter((file) => matchesPrefix(file, normalizedPrefix)).sort();
  }

  public async download(ref: string, prefixes: readonly string[], localDir: string): Promise<string[]> {
    const repo = normalizeStorePath(ref);
    await fs.mkdir(localDir, { recursive: true });

    const includes = prefixes.flatMap((prefix) => ['--include', `${normalizeStorePath(prefix)}/*`]);
    const result = await runTool(
      'hub download',
      this.cli,
      ['download', repo, '--revision', this.revision, '--local-dir', localDir, ...includes],
      this.runner,
      { env: this.cliEnv() }
    );
    if (result.err) {
      throw new TransientNetworkError('hub download', result.val.message, result.val);
    }

    const files = (await listFilesRecursive(localDir)).filter((file) =>
      prefixes.some((prefix) => matchesPrefix(file, prefix))
    );
    if (files.length === 0) {
      throw new ArtifactStoreError('NOT_FOUND', `Nothing under ${prefixes.join(', ')} in ${repo}`, { ref: repo });
    }

    this.logger?.debug({ repo, files: files.length, localDir }, 'Downloaded artifacts from hub');
    return files;
  }

  public async upload(ref: string, localDir: string, prefix: string): Promise<number> {
    const repo = normalizeStorePath(ref);
    const files = await listFilesRecursive(localDir);
    const result = await runTool(
      'hub upload',
      this.cli,
      ['upload', repo, localDir, normalizeStorePath(prefix), '--revision', this.revision],
      this.runner,
      { env: this.cliEnv() }
    );
    if (result.err) {
      throw new TransientNetworkError('hub upload', result.val.message, result.val);
    }

    this.logger?.debug({ repo, prefix, files: files.length }, 'Uploaded artifacts to hub');
    return files.length;
  }

  private async request(url: string, repo: string): Promise<Response> {
    const doFetch = this.fetchImpl ?? globalThis.fetch;
    let response: Response;
    try {
      response = await doFetch(url, {
        headers: this.token ? { Authorization: `Bearer ${this.token}` } : {},
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TransientNetworkError('hub list', message, error);
    }

    if (response.ok) {
      return response;
    }
    if (response.status === 404) {
      throw new ArtifactStoreError('NOT_FOUND', `Repository ${repo} not found`, { ref: repo });
    }
    if (response.status === 401 || response.status === 403) {
      throw new ArtifactStoreError('PERMISSION', `Access to ${repo} denied (HTTP ${response.status})`, { ref: repo });
    }
    if (response.status === 429 || response.status >= 500) {
      throw new TransientNetworkError('hub list', `HTTP ${response.status} from ${url}`);
    }
    throw new ArtifactStoreError('INVALID', `HTTP ${response.status} listing ${repo}`, { ref: repo });
  }

  private cliEnv(): Record<string, string> | undefined {
    if (!this.token) {
      return undefined;
    }
    return { HF_TOKEN: this.token };
  }
}
