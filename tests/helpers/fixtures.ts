/**
 * Shared fixtures for build cache tests.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { tmpdir } from 'node:os';
import { pino, type Logger } from 'pino';
import { describeArchitecture } from '../../src/core/hardware-probe.js';
import { captureSnapshot } from '../../src/core/tracked-parameters.js';
import type { ConfigurationSnapshot, TrackedParameterName } from '../../src/types/build.js';
import type { ArchitectureDescriptor } from '../../src/types/hardware.js';
import type { LayoutSettings, PipelineConfig, RemoteRetrySettings } from '../../src/types/pipeline.js';

export const silentLogger: Logger = pino({ level: 'silent' });

export async function makeTempDir(label: string): Promise<string> {
  const dir = path.join(tmpdir(), `engine-build-${label}-${Date.now()}-${Math.random().toString(16).slice(2)}`);
  await fs.mkdir(dir, { recursive: true });
  return dir;
}

export function arch(sm: number | null, fp8MinSm?: number): ArchitectureDescriptor {
  return describeArchitecture(sm, 'override', { fp8MinSm });
}

export const BASE_PARAMETERS: Readonly<Record<TrackedParameterName, string>> = {
  MODEL_ID: 'acme/Tiny-Model',
  PRECISION_MODE: 'compact',
  INFERENCE_ENGINE: 'trt',
  CHECKPOINT_DIR: 'models/tiny-model-ckpt-int4-awq',
  ENGINE_DIR: 'models/tiny-model-engine-int4-awq',
  MAX_BATCH_SIZE: '8',
  MAX_INPUT_LEN: '1024',
  MAX_OUTPUT_LEN: '512',
  KV_FREE_GPU_FRAC: '0.9',
  KV_ENABLE_BLOCK_REUSE: '1',
  AWQ_BLOCK_SIZE: '128',
  CALIB_SIZE: '64',
  DEPLOY_MODE: 'both',
};

export function makeSnapshot(overrides: Partial<Record<TrackedParameterName, string>> = {}): ConfigurationSnapshot {
  return captureSnapshot({ ...BASE_PARAMETERS, ...overrides });
}

/** Retry settings with no delays so store failures resolve immediately */
export const FAST_RETRY: RemoteRetrySettings = {
  maxAttempts: 3,
  initialDelayMs: 0,
  maxDelayMs: 0,
  backoffMultiplier: 1,
  retryableErrors: ['TransientNetworkError', 'TRANSIENT_NETWORK'],
};

/** Engine primary files written by the fake compiler are at least this big */
export const TEST_ENGINE_MIN_BYTES = 16;

export function makeLayout(rootDir: string): LayoutSettings {
  return {
    rootDir,
    modelsDir: path.join(rootDir, 'models'),
    metadataFile: 'build_metadata.json',
    engine: { requiredFiles: ['rank0.engine', 'config.json'], primaryFile: 'rank0.engine', minPrimaryBytes: TEST_ENGINE_MIN_BYTES },
    checkpoint: { requiredFiles: ['config.json', 'rank*.safetensors'], primaryFile: 'rank0.safetensors', minPrimaryBytes: 0 },
  };
}

export function makePipelineConfig(rootDir: string, remote: Partial<PipelineConfig['remote']> = {}): PipelineConfig {
  return {
    layout: makeLayout(rootDir),
    recordPath: path.join(rootDir, '.run', 'build_record.env'),
    lockPath: path.join(rootDir, '.run', 'build.lock'),
    lockStaleAfterMs: 60_000,
    fp8MinSm: 89,
    remote: {
      kind: 'none',
      ref: '',
      preference: 'auto',
      engineLabel: '',
      enginesPrefix: 'engines',
      checkpointsPrefix: 'checkpoints',
      prequantizedPrefix: 'trt-llm/checkpoints',
      directoryRoot: '',
      hubEndpoint: 'https://hub.test',
      retry: FAST_RETRY,
      ...remote,
    },
    tools: {
      quantizer: { command: 'quantize', args: [] },
      compiler: { command: 'compile', args: [] },
      hubCli: { command: 'hub', args: [] },
    },
    engineStateDirs: { trt: ['.trt_cache'], vllm: ['.vllm_cache'] },
    engineVersionCommands: {},
  };
}

/**
 * Write a directory that passes engine validation for `smCode`.
 */
export async function writeEngineDir(
  dir: string,
  options: {
    smCode?: string;
    precisionMode?: string;
    weightFormat?: string;
    toolchainVersion?: string;
    cudaVersion?: string;
    bytes?: number;
    metadata?: boolean;
  } = {}
): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(path.join(dir, 'rank0.engine'), Buffer.alloc(options.bytes ?? 64, 1));
  await fs.writeFile(path.join(dir, 'config.json'), '{}');
  if (options.metadata !== false) {
    await fs.writeFile(
      path.join(dir, 'build_metadata.json'),
      JSON.stringify({
        sm_arch: options.smCode ?? 'sm89',
        precision_mode: options.precisionMode ?? 'compact',
        weight_format: options.weightFormat ?? 'int4_awq',
        engine_toolchain_version: options.toolchainVersion,
        cuda_version: options.cudaVersion,
      })
    );
  }
}

/**
 * Write a checkpoint; with `sidecar`, also the metadata naming its format.
 */
export async function writeCheckpointDir(
  dir: string,
  sidecar?: { precisionMode: string; weightFormat: string }
): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(path.join(dir, 'config.json'), '{}');
  await fs.writeFile(path.join(dir, 'rank0.safetensors'), Buffer.alloc(32, 2));
  if (sidecar) {
    await fs.writeFile(
      path.join(dir, 'build_metadata.json'),
      JSON.stringify({ precision_mode: sidecar.precisionMode, weight_format: sidecar.weightFormat })
    );
  }
}
