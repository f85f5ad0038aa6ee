import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import {
  architecturePrefix,
  buildMetadataFor,
  checkpointMetadataFor,
  checkpointPrefix,
  defaultArtifactDirectories,
  engineLabel,
  engineLabelsFromListing,
  modelSlug,
  parseEngineLabel,
  rankEngineLabels,
  readBuildMetadata,
  writeBuildMetadataIfAbsent,
} from '../../../src/core/artifact-layout.js';
import { resolvePolicy } from '../../../src/core/quantization-policy.js';
import { arch, makeSnapshot, makeTempDir } from '../../helpers/fixtures.js';

describe('artifact layout', () => {
  describe('modelSlug', () => {
    it('uses the last path segment, lowercased and dash-separated', () => {
      expect(modelSlug('acme/Tiny-Model')).toBe('tiny-model');
      expect(modelSlug('org/Some.Model-7B')).toBe('some-model-7b');
      expect(modelSlug('local/path/weights/')).toBe('weights');
    });

    it('falls back to "model" when nothing usable remains', () => {
      expect(modelSlug('///')).toBe('model');
      expect(modelSlug('__')).toBe('model');
    });
  });

  it('derives mode-specific directory names', () => {
    expect(defaultArtifactDirectories('acme/Tiny-Model', 'compact', 'models')).toEqual({
      checkpointDir: path.join('models', 'tiny-model-ckpt-int4-awq'),
      engineDir: path.join('models', 'tiny-model-engine-int4-awq'),
    });
    expect(defaultArtifactDirectories('acme/Tiny-Model', 'base', '/srv/models')).toEqual({
      checkpointDir: '/srv/models/tiny-model-ckpt-8bit',
      engineDir: '/srv/models/tiny-model-engine-8bit',
    });
  });

  it('labels engines by architecture, engine kind and weight format', () => {
    expect(engineLabel(arch(89), ' TRT ', 'int4_awq')).toBe('sm89_trt_int4_awq');
    expect(engineLabel(arch(null), 'vllm', 'full_precision')).toBe('unknown_vllm_full_precision');
  });

  it('puts the toolchain in the label when it is known', () => {
    const toolchain = { engineVersion: '0.12.0', cudaVersion: '12.4' };

    expect(engineLabel(arch(90), 'trt', 'fp8', toolchain)).toBe('sm90_trt-0.12.0_cuda12.4_fp8');
    expect(engineLabel(arch(90), 'trt', 'fp8', { engineVersion: '0.12.0', cudaVersion: null })).toBe(
      'sm90_trt-0.12.0_fp8'
    );
    expect(engineLabel(arch(90), 'trt', 'fp8', { engineVersion: null, cudaVersion: null })).toBe('sm90_trt_fp8');
  });

  it('parses labels back into their parts', () => {
    expect(parseEngineLabel('sm90_trt-1.2.0rc5_cuda13.0_int4_awq')).toEqual({
      code: 'sm90',
      engineKind: 'trt',
      engineVersion: '1.2.0rc5',
      cudaVersion: '13.0',
      weightFormat: 'int4_awq',
    });
    expect(parseEngineLabel('SM89_vllm_full_precision')).toEqual({
      code: 'sm89',
      engineKind: 'vllm',
      engineVersion: null,
      cudaVersion: null,
      weightFormat: 'full_precision',
    });
    expect(parseEngineLabel('sm89_trt_int8_sq')).toBeNull();
    expect(parseEngineLabel('latest')).toBeNull();
  });

  it('keys checkpoint prefixes by weight format', () => {
    expect(checkpointPrefix('checkpoints', 'fp8')).toBe('checkpoints/fp8');
    expect(checkpointPrefix('checkpoints/', 'int4_awq')).toBe('checkpoints/int4_awq');
  });

  it('reads sm prefixes case-insensitively', () => {
    expect(architecturePrefix('SM90_trt_fp8')).toBe('sm90');
    expect(architecturePrefix('sm89')).toBeNull();
    expect(architecturePrefix('engine')).toBeNull();
  });

  it('collects distinct labels from a listing', () => {
    const listing = [
      'engines/sm90_trt_fp8/rank0.engine',
      'engines/sm89_trt_int4_awq/rank0.engine',
      'engines/sm89_trt_int4_awq/config.json',
      'engines/README.md',
      'checkpoints/config.json',
    ];

    expect(engineLabelsFromListing(listing, 'engines/')).toEqual(['sm89_trt_int4_awq', 'sm90_trt_fp8']);
    expect(engineLabelsFromListing(listing, 'prebuilt')).toEqual([]);
  });

  describe('rankEngineLabels', () => {
    const labels = ['sm80_trt_int4_awq', 'sm89_trt_fp8', 'sm89_trt_int4_awq', 'sm89_vllm_int4_awq'];
    const target = { engineKind: 'trt', weightFormat: 'int4_awq' as const };

    it('takes the preferred label alone when it exists', () => {
      expect(rankEngineLabels(labels, { ...target, architecture: arch(80), preferred: 'sm89_trt_fp8' })).toEqual([
        'sm89_trt_fp8',
      ]);
    });

    it('ignores a preferred label that is not listed', () => {
      expect(rankEngineLabels(labels, { ...target, architecture: arch(80), preferred: 'sm90_trt_fp8' })).toEqual([
        'sm80_trt_int4_awq',
      ]);
    });

    it('offers the only label regardless of architecture', () => {
      expect(rankEngineLabels(['sm90_trt_fp8'], { ...target, architecture: arch(89) })).toEqual(['sm90_trt_fp8']);
    });

    it('keeps only labels for this GPU, engine kind and weight format', () => {
      expect(rankEngineLabels(labels, { ...target, architecture: arch(89) })).toEqual(['sm89_trt_int4_awq']);
      expect(rankEngineLabels(labels, { ...target, architecture: arch(89), weightFormat: 'fp8' })).toEqual([
        'sm89_trt_fp8',
      ]);
    });

    it('puts the exact toolchain label first and keeps the other versions as fallbacks', () => {
      const versioned = [
        'sm89_trt-0.11.0_cuda12.4_int4_awq',
        'sm89_trt-0.12.0_cuda12.4_int4_awq',
        'sm89_trt_int4_awq',
        'sm89_trt-0.12.0_cuda12.4_fp8',
      ];

      expect(
        rankEngineLabels(versioned, {
          ...target,
          architecture: arch(89),
          toolchain: { engineVersion: '0.12.0', cudaVersion: '12.4' },
        })
      ).toEqual(['sm89_trt-0.12.0_cuda12.4_int4_awq', 'sm89_trt-0.11.0_cuda12.4_int4_awq', 'sm89_trt_int4_awq']);
    });

    it('returns nothing without a match or a detected GPU', () => {
      expect(rankEngineLabels(labels, { ...target, architecture: arch(90) })).toEqual([]);
      expect(rankEngineLabels(labels, { ...target, architecture: arch(null) })).toEqual([]);
    });
  });

  describe('build metadata', () => {
    let testDir: string;

    beforeEach(async () => {
      testDir = await makeTempDir('layout');
    });

    afterEach(async () => {
      await fs.rm(testDir, { recursive: true, force: true });
    });

    it('describes the build', () => {
      const architecture = arch(89);
      const metadata = buildMetadataFor(
        makeSnapshot({ INFERENCE_ENGINE: 'TRT' }),
        architecture,
        resolvePolicy(architecture, 'compact'),
        '2026-01-02T03:04:05.000Z',
        ['compile', '--fast']
      );

      expect(metadata).toEqual({
        sm_arch: 'sm89',
        precision_mode: 'compact',
        weight_format: 'int4_awq',
        kv_cache_dtype: 'int8',
        model_id: 'acme/Tiny-Model',
        inference_engine: 'trt',
        max_batch_size: 8,
        max_input_len: 1024,
        max_output_len: 512,
        gpu_name: architecture.deviceName,
        build_command: ['compile', '--fast'],
        built_at: '2026-01-02T03:04:05.000Z',
      });
    });

    it('records the toolchain the engine was compiled with', () => {
      const architecture = arch(90);
      const metadata = buildMetadataFor(
        makeSnapshot(),
        architecture,
        resolvePolicy(architecture, 'base'),
        '2026-01-02T03:04:05.000Z',
        undefined,
        { engineVersion: '0.12.0', cudaVersion: '12.4' }
      );

      expect(metadata.engine_toolchain_version).toBe('0.12.0');
      expect(metadata.cuda_version).toBe('12.4');
      expect(metadata.weight_format).toBe('fp8');
    });

    it('describes a checkpoint by its weight format', () => {
      const metadata = checkpointMetadataFor(
        makeSnapshot(),
        resolvePolicy(arch(89), 'base'),
        '2026-01-02T03:04:05.000Z',
        'quantized'
      );

      expect(metadata).toEqual({
        precision_mode: 'base',
        weight_format: 'fp8',
        kv_cache_dtype: 'fp8',
        model_id: 'acme/Tiny-Model',
        checkpoint_source: 'quantized',
        built_at: '2026-01-02T03:04:05.000Z',
      });
    });

    it('does not overwrite metadata the compiler wrote', async () => {
      const file = path.join(testDir, 'build_metadata.json');
      await fs.writeFile(file, '{"sm_arch":"sm90"}');

      const written = await writeBuildMetadataIfAbsent(file, { sm_arch: 'sm89' });

      expect(written).toBe(false);
      expect(await fs.readFile(file, 'utf8')).toBe('{"sm_arch":"sm90"}');
    });

    it('writes metadata that reads back', async () => {
      const file = path.join(testDir, 'build_metadata.json');

      expect(await writeBuildMetadataIfAbsent(file, { sm_arch: 'sm89', max_batch_size: 8 })).toBe(true);
      expect(await readBuildMetadata(file)).toEqual({
        status: 'ok',
        metadata: { sm_arch: 'sm89', max_batch_size: 8 },
      });
    });

    it('distinguishes absent from invalid metadata', async () => {
      const file = path.join(testDir, 'build_metadata.json');
      expect(await readBuildMetadata(file)).toEqual({ status: 'absent' });

      await fs.writeFile(file, JSON.stringify({ sm_arch: 89 }));
      const result = await readBuildMetadata(file);
      expect(result.status).toBe('invalid');
      expect(result.status === 'invalid' && result.reason.startsWith('sm_arch: ')).toBe(true);
    });
  });
});
