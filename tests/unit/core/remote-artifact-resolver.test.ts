/**
 * Remote Artifact Resolver Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { RemoteArtifactResolver, type RemoteResolveRequest } from '../../../src/core/remote-artifact-resolver.js';
import { LocalDirectoryArtifactStore } from '../../../src/adapters/local-artifact-store.js';
import type { ArtifactStore } from '../../../src/adapters/artifact-store.js';
import { TransientNetworkError } from '../../../src/api/errors.js';
import { pathExists } from '../../../src/utils/fs-helpers.js';
import {
  FAST_RETRY,
  arch,
  makeLayout,
  makeTempDir,
  silentLogger,
  writeCheckpointDir,
  writeEngineDir,
} from '../../helpers/fixtures.js';

const REF = 'acme/tiny';

/**
 * Fails the first `failures` list calls with a transient error.
 */
class FlakyStore implements ArtifactStore {
  public readonly kind = 'flaky';
  public listCalls = 0;

  constructor(
    private readonly inner: ArtifactStore,
    private failures: number
  ) {}

  async list(ref: string, prefix?: string): Promise<string[]> {
    this.listCalls++;
    if (this.failures > 0) {
      this.failures--;
      throw new TransientNetworkError('flaky list', 'connection reset');
    }
    return this.inner.list(ref, prefix);
  }

  download(ref: string, prefixes: readonly string[], localDir: string): Promise<string[]> {
    return this.inner.download(ref, prefixes, localDir);
  }

  upload(ref: string, localDir: string, prefix: string): Promise<number> {
    return this.inner.upload(ref, localDir, prefix);
  }
}

describe('RemoteArtifactResolver', () => {
  let testDir: string;
  let storeRoot: string;
  let request: RemoteResolveRequest;

  const createResolver = (store: ArtifactStore): RemoteArtifactResolver =>
    new RemoteArtifactResolver({
      store,
      layout: makeLayout(testDir),
      enginesPrefix: 'engines',
      checkpointsPrefix: 'checkpoints',
      retry: FAST_RETRY,
      logger: silentLogger,
    });

  beforeEach(async () => {
    testDir = await makeTempDir('resolver');
    storeRoot = path.join(testDir, 'store');
    request = {
      ref: REF,
      architecture: arch(89),
      preference: 'auto',
      engineKind: 'trt',
      engineDir: path.join(testDir, 'work', 'engine'),
      checkpointDir: path.join(testDir, 'work', 'ckpt'),
      expected: { precisionMode: 'compact', weightFormat: 'int4_awq' },
    };
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('downloads a compatible prebuilt engine', async () => {
    await writeEngineDir(path.join(storeRoot, REF, 'engines', 'sm89_trt_int4_awq'));
    await writeCheckpointDir(path.join(storeRoot, REF, 'checkpoints', 'int4_awq'));

    const result = await createResolver(new LocalDirectoryArtifactStore(storeRoot)).resolve(request);

    expect(result.some).toBe(true);
    expect(result.some && result.val.kind).toBe('engine');
    expect(result.some && result.val.label).toBe('sm89_trt_int4_awq');
    expect(result.some && result.val.report.compatibility).toBe('metadata');
    expect(await pathExists(path.join(request.engineDir, 'rank0.engine'))).toBe(true);
    expect(await pathExists(`${request.engineDir}.remote-staging`)).toBe(false);
    expect(await pathExists(request.checkpointDir)).toBe(false);
  });

  it('falls through to the checkpoint when the engine targets another GPU', async () => {
    await writeEngineDir(path.join(storeRoot, REF, 'engines', 'sm90_trt_int4_awq'), { smCode: 'sm90' });
    await writeCheckpointDir(path.join(storeRoot, REF, 'checkpoints', 'int4_awq'));

    const result = await createResolver(new LocalDirectoryArtifactStore(storeRoot)).resolve(request);

    expect(result.some && result.val.kind).toBe('checkpoint');
    expect(result.some && result.val.directory).toBe(request.checkpointDir);
    expect(await pathExists(request.engineDir)).toBe(false);
    expect(await pathExists(path.join(request.checkpointDir, 'rank0.safetensors'))).toBe(true);
  });

  it('falls through when the engine was built in another precision mode', async () => {
    await writeEngineDir(path.join(storeRoot, REF, 'engines', 'sm89_trt_fp8'), {
      precisionMode: 'base',
      weightFormat: 'fp8',
    });
    await writeCheckpointDir(path.join(storeRoot, REF, 'checkpoints', 'int4_awq'));

    const result = await createResolver(new LocalDirectoryArtifactStore(storeRoot)).resolve(request);

    expect(result.some && result.val.kind).toBe('checkpoint');
  });

  it('honours engines-only', async () => {
    await writeEngineDir(path.join(storeRoot, REF, 'engines', 'sm90_trt_int4_awq'), { smCode: 'sm90' });
    await writeCheckpointDir(path.join(storeRoot, REF, 'checkpoints', 'int4_awq'));

    const result = await createResolver(new LocalDirectoryArtifactStore(storeRoot)).resolve({
      ...request,
      preference: 'engines-only',
    });

    expect(result.none).toBe(true);
    expect(await pathExists(request.checkpointDir)).toBe(false);
  });

  it('honours checkpoints-only', async () => {
    await writeEngineDir(path.join(storeRoot, REF, 'engines', 'sm89_trt_int4_awq'));
    await writeCheckpointDir(path.join(storeRoot, REF, 'checkpoints', 'int4_awq'));

    const result = await createResolver(new LocalDirectoryArtifactStore(storeRoot)).resolve({
      ...request,
      preference: 'checkpoints-only',
    });

    expect(result.some && result.val.kind).toBe('checkpoint');
    expect(await pathExists(request.engineDir)).toBe(false);
  });

  it('uses the preferred label among several matching engines', async () => {
    await writeEngineDir(path.join(storeRoot, REF, 'engines', 'sm89_trt_a'));
    await writeEngineDir(path.join(storeRoot, REF, 'engines', 'sm89_trt_b'));

    const result = await createResolver(new LocalDirectoryArtifactStore(storeRoot)).resolve({
      ...request,
      preferredLabel: 'sm89_trt_b',
    });

    expect(result.some && result.val.label).toBe('sm89_trt_b');
  });

  it('narrows several GPU matches to the requested weight format', async () => {
    await writeEngineDir(path.join(storeRoot, REF, 'engines', 'sm89_trt_fp8'), {
      precisionMode: 'base',
      weightFormat: 'fp8',
    });
    await writeEngineDir(path.join(storeRoot, REF, 'engines', 'sm89_trt_int4_awq'));

    const result = await createResolver(new LocalDirectoryArtifactStore(storeRoot)).resolve(request);

    expect(result.some && result.val.kind).toBe('engine');
    expect(result.some && result.val.label).toBe('sm89_trt_int4_awq');
  });

  it('tries the next candidate when a download fails validation', async () => {
    // The exact label is tried first but has no engine file
    const broken = path.join(storeRoot, REF, 'engines', 'sm89_trt_int4_awq');
    await fs.mkdir(broken, { recursive: true });
    await fs.writeFile(path.join(broken, 'config.json'), '{}');
    await writeEngineDir(path.join(storeRoot, REF, 'engines', 'sm89_trt-0.11.0_int4_awq'));

    const result = await createResolver(new LocalDirectoryArtifactStore(storeRoot)).resolve(request);

    expect(result.some && result.val.label).toBe('sm89_trt-0.11.0_int4_awq');
    expect(await pathExists(path.join(request.engineDir, 'rank0.engine'))).toBe(true);
  });

  it('rejects an engine compiled with another toolchain release', async () => {
    await writeEngineDir(path.join(storeRoot, REF, 'engines', 'sm89_trt-0.11.0_cuda12.4_int4_awq'), {
      toolchainVersion: '0.11.0',
      cudaVersion: '12.4',
    });

    const result = await createResolver(new LocalDirectoryArtifactStore(storeRoot)).resolve({
      ...request,
      expected: { ...request.expected, toolchain: { engineVersion: '0.12.0', cudaVersion: '12.4' } },
    });

    expect(result.none).toBe(true);
    expect(await pathExists(request.engineDir)).toBe(false);
  });

  it('only fetches the checkpoint published for the requested weight format', async () => {
    await writeCheckpointDir(path.join(storeRoot, REF, 'checkpoints', 'fp8'), {
      precisionMode: 'base',
      weightFormat: 'fp8',
    });

    const result = await createResolver(new LocalDirectoryArtifactStore(storeRoot)).resolve(request);

    expect(result.none).toBe(true);
    expect(await pathExists(request.checkpointDir)).toBe(false);
  });

  it('rejects a checkpoint whose metadata names another weight format', async () => {
    await writeCheckpointDir(path.join(storeRoot, REF, 'checkpoints', 'int4_awq'), {
      precisionMode: 'base',
      weightFormat: 'fp8',
    });

    const result = await createResolver(new LocalDirectoryArtifactStore(storeRoot)).resolve(request);

    expect(result.none).toBe(true);
    expect(await pathExists(request.checkpointDir)).toBe(false);
  });

  it('fetches a checkpoint from an arbitrary prefix of a model repository', async () => {
    await writeCheckpointDir(path.join(storeRoot, 'acme', 'tiny-trt-awq', 'trt-llm', 'checkpoints'));

    const result = await createResolver(new LocalDirectoryArtifactStore(storeRoot)).fetchCheckpoint({
      ref: 'acme/tiny-trt-awq',
      prefix: 'trt-llm/checkpoints',
      architecture: arch(89),
      checkpointDir: request.checkpointDir,
    });

    expect(result.some && result.val.kind).toBe('checkpoint');
    expect(await pathExists(path.join(request.checkpointDir, 'rank0.safetensors'))).toBe(true);
  });

  it('retries a transient listing failure', async () => {
    await writeEngineDir(path.join(storeRoot, REF, 'engines', 'sm89_trt_int4_awq'));
    const store = new FlakyStore(new LocalDirectoryArtifactStore(storeRoot), 2);

    const result = await createResolver(store).resolve(request);

    expect(store.listCalls).toBe(3);
    expect(result.some && result.val.kind).toBe('engine');
  });

  it('builds locally when the store stays unreachable', async () => {
    await writeEngineDir(path.join(storeRoot, REF, 'engines', 'sm89_trt_int4_awq'));
    const store = new FlakyStore(new LocalDirectoryArtifactStore(storeRoot), 10);

    const result = await createResolver(store).resolve(request);

    expect(store.listCalls).toBe(FAST_RETRY.maxAttempts);
    expect(result.none).toBe(true);
  });

  it('does not retry a missing repository', async () => {
    const store = new FlakyStore(new LocalDirectoryArtifactStore(storeRoot), 0);

    const result = await createResolver(store).resolve(request);

    expect(store.listCalls).toBe(1);
    expect(result.none).toBe(true);
  });

  it('returns nothing when neither an engine nor a checkpoint is published', async () => {
    await fs.mkdir(path.join(storeRoot, REF, 'docs'), { recursive: true });
    await fs.writeFile(path.join(storeRoot, REF, 'docs', 'README.md'), '# tiny');

    const result = await createResolver(new LocalDirectoryArtifactStore(storeRoot)).resolve(request);

    expect(result.none).toBe(true);
  });
});
