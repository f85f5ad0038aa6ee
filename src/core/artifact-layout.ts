/**
 * Artifact Layout
 *
 * Where checkpoints and engines live locally, how remote engine labels are
 * named and chosen, and the build metadata written beside an engine.
 *
 * Local layout (under models_dir):
 * ```
 * <slug>-ckpt-int4-awq/    compact checkpoint
 * <slug>-engine-int4-awq/  compact engine
 * <slug>-ckpt-8bit/        base checkpoint
 * <slug>-engine-8bit/      base engine
 * ```
 *
 * Remote layout (under a store ref):
 * ```
 * engines/<sm code>_<engine kind>-<version>_cuda<cuda>_<weight format>/...
 * engines/<sm code>_<engine kind>_<weight format>/...   toolchain unknown
 * checkpoints/<weight format>/...
 * ```
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { errorCode, isNotFound } from '../utils/fs-helpers.js';
import { BuildMetadataSchema, type BuildMetadata } from '../types/schemas/metadata.js';
import type { ConfigurationSnapshot, PrecisionMode } from '../types/build.js';
import { WEIGHT_FORMATS } from './quantization-policy.js';
import type {
  ArchitectureDescriptor,
  QuantizationPolicy,
  ToolchainInfo,
  WeightFormat,
} from '../types/hardware.js';
import type { ArtifactExpectations, ArtifactDescriptor } from '../types/artifacts.js';
import type { LayoutSettings } from '../types/pipeline.js';

const LAYOUT_TAGS: Readonly<Record<PrecisionMode, string>> = {
  compact: 'int4-awq',
  base: '8bit',
};

const ARCH_PREFIX = /^(sm\d+)_/i;

const LABEL_PATTERN = new RegExp(
  `^(sm\\d+|unknown)_([a-z0-9]+)(?:-([^_]+))?(?:_cuda([^_]+))?_(${WEIGHT_FORMATS.join('|')})$`
);

/**
 * `org/Some.Model-7B` → `some-model-7b`
 */
export function modelSlug(modelId: string): string {
  const base = modelId.replace(/[\\/]+$/, '').split(/[\\/]/).pop() ?? '';
  const slug = base.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '');
  return slug || 'model';
}

export interface ArtifactDirectories {
  checkpointDir: string;
  engineDir: string;
}

export function defaultArtifactDirectories(
  modelId: string,
  mode: PrecisionMode,
  modelsDir: string
): ArtifactDirectories {
  const slug = modelSlug(modelId);
  const tag = LAYOUT_TAGS[mode];
  return {
    checkpointDir: path.join(modelsDir, `${slug}-ckpt-${tag}`),
    engineDir: path.join(modelsDir, `${slug}-engine-${tag}`),
  };
}

export function engineLabel(
  architecture: ArchitectureDescriptor,
  engineKind: string,
  weightFormat: WeightFormat,
  toolchain?: ToolchainInfo
): string {
  const code = architecture.code || 'unknown';
  const version = toolchain?.engineVersion ? `-${toolchain.engineVersion}` : '';
  const cuda = toolchain?.cudaVersion ? `_cuda${toolchain.cudaVersion}` : '';
  return `${code}_${engineKind.trim().toLowerCase()}${version}${cuda}_${weightFormat}`;
}

export interface ParsedEngineLabel {
  code: string;
  engineKind: string;
  engineVersion: string | null;
  cudaVersion: string | null;
  weightFormat: WeightFormat;
}

function isWeightFormat(value: string): value is WeightFormat {
  return WEIGHT_FORMATS.some((format) => format === value);
}

/**
 * Inverse of {@link engineLabel}; null for labels that follow no known shape.
 */
export function parseEngineLabel(label: string): ParsedEngineLabel | null {
  const match = LABEL_PATTERN.exec(label.toLowerCase());
  if (!match) {
    return null;
  }
  const [, code = '', engineKind = '', engineVersion, cudaVersion, weightFormat = ''] = match;
  if (!isWeightFormat(weightFormat)) {
    return null;
  }
  return {
    code,
    engineKind,
    engineVersion: engineVersion ?? null,
    cudaVersion: cudaVersion ?? null,
    weightFormat,
  };
}

/**
 * Architecture code encoded as a `sm<digits>_` prefix, or null.
 */
export function architecturePrefix(name: string): string | null {
  const match = ARCH_PREFIX.exec(name);
  return match?.[1] ? match[1].toLowerCase() : null;
}

/**
 * Distinct engine labels present in a remote listing.
 */
export function engineLabelsFromListing(paths: readonly string[], enginesPrefix: string): string[] {
  const labels = new Set<string>();
  const prefix = `${enginesPrefix.replace(/\/+$/, '')}/`;
  for (const file of paths) {
    if (!file.startsWith(prefix)) continue;
    const parts = file.slice(prefix.length).split('/');
    if (parts.length >= 2 && parts[0]) {
      labels.add(parts[0]);
    }
  }
  return [...labels].sort();
}

export interface EngineLabelTarget {
  architecture: ArchitectureDescriptor;
  engineKind: string;
  weightFormat: WeightFormat;
  toolchain?: ToolchainInfo;
  /** Operator-pinned label; used alone when the listing has it */
  preferred?: string;
}

/**
 * Remote engine labels worth downloading, best first.
 *
 * A pinned label that is listed wins outright. A lone label is always
 * offered; validation decides. Otherwise only labels for this GPU, engine
 * kind and weight format qualify: the exact label for the current toolchain
 * first, then the rest in name order.
 */
export function rankEngineLabels(labels: readonly string[], target: EngineLabelTarget): string[] {
  if (target.preferred && labels.includes(target.preferred)) {
    return [target.preferred];
  }
  if (labels.length === 1) {
    return [...labels];
  }
  const code = target.architecture.code.toLowerCase();
  if (!code) {
    return [];
  }

  const kind = target.engineKind.trim().toLowerCase();
  const exact = engineLabel(target.architecture, kind, target.weightFormat, target.toolchain);
  const candidates = labels.filter((label) => {
    const parsed = parseEngineLabel(label);
    return (
      parsed !== null &&
      parsed.code === code &&
      parsed.engineKind === kind &&
      parsed.weightFormat === target.weightFormat
    );
  });

  const rank = (label: string): number => (label === exact ? 0 : 1);
  return [...candidates].sort((a, b) => rank(a) - rank(b) || (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Store prefix of the checkpoint published for one weight format.
 */
export function checkpointPrefix(checkpointsPrefix: string, weightFormat: WeightFormat): string {
  return `${checkpointsPrefix.replace(/\/+$/, '')}/${weightFormat}`;
}

export function engineDescriptor(
  directory: string,
  layout: LayoutSettings,
  expected?: ArtifactExpectations
): ArtifactDescriptor {
  return {
    kind: 'engine',
    directory,
    ...layout.engine,
    metadataFile: layout.metadataFile,
    expected,
  };
}

export function checkpointDescriptor(
  directory: string,
  layout: LayoutSettings,
  expected?: ArtifactExpectations
): ArtifactDescriptor {
  return {
    kind: 'checkpoint',
    directory,
    ...layout.checkpoint,
    metadataFile: layout.metadataFile,
    expected,
  };
}

export function buildMetadataFor(
  snapshot: ConfigurationSnapshot,
  architecture: ArchitectureDescriptor,
  policy: QuantizationPolicy,
  builtAt: string,
  buildCommand?: string[],
  toolchain?: ToolchainInfo
): BuildMetadata {
  return {
    sm_arch: architecture.code,
    precision_mode: policy.precisionMode,
    weight_format: policy.weightFormat,
    kv_cache_dtype: policy.kvCacheDtype,
    model_id: snapshot.MODEL_ID,
    inference_engine: snapshot.INFERENCE_ENGINE.trim().toLowerCase(),
    max_batch_size: Number(snapshot.MAX_BATCH_SIZE),
    max_input_len: Number(snapshot.MAX_INPUT_LEN),
    max_output_len: Number(snapshot.MAX_OUTPUT_LEN),
    gpu_name: architecture.deviceName,
    engine_toolchain_version: toolchain?.engineVersion ?? undefined,
    cuda_version: toolchain?.cudaVersion ?? undefined,
    build_command: buildCommand,
    built_at: builtAt,
  };
}

/**
 * Sidecar for a checkpoint, so another host can tell which weight format it
 * holds before compiling from it.
 */
export function checkpointMetadataFor(
  snapshot: ConfigurationSnapshot,
  policy: QuantizationPolicy,
  builtAt: string,
  source: 'quantized' | 'prequantized'
): BuildMetadata {
  return {
    precision_mode: policy.precisionMode,
    weight_format: policy.weightFormat,
    kv_cache_dtype: policy.kvCacheDtype,
    model_id: snapshot.MODEL_ID,
    checkpoint_source: source,
    built_at: builtAt,
  };
}

export type MetadataReadResult =
  | { status: 'absent' }
  | { status: 'invalid'; reason: string }
  | { status: 'ok'; metadata: BuildMetadata };

export async function readBuildMetadata(file: string): Promise<MetadataReadResult> {
  let content: string;
  try {
    content = await fs.readFile(file, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      return { status: 'absent' };
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    return { status: 'invalid', reason: error instanceof Error ? error.message : String(error) };
  }

  const parsed = BuildMetadataSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { status: 'invalid', reason: issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid metadata' };
  }
  return { status: 'ok', metadata: parsed.data };
}

/**
 * Write metadata unless the compiler already produced a file.
 * Returns true when a file was written.
 */
export async function writeBuildMetadataIfAbsent(file: string, metadata: BuildMetadata): Promise<boolean> {
  try {
    await fs.writeFile(file, `${JSON.stringify(metadata, null, 2)}\n`, { encoding: 'utf8', flag: 'wx' });
    return true;
  } catch (error) {
    if (errorCode(error) === 'EEXIST') {
      return false;
    }
    throw error;
  }
}
