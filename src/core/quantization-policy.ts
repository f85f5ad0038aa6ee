/**
 * Quantization Policy Resolver
 *
 * Pure mapping from (architecture, precision mode) to a quantization policy.
 * Weight format is chosen by mode and FP8 capability; attention backend and
 * token/batch limits come from one table keyed by (family, weight format).
 */

import { ConfigurationError } from '../api/errors.js';
import type { PrecisionMode } from '../types/build.js';
import type {
  ArchitectureDescriptor,
  ArchitectureFamily,
  AttentionBackend,
  KvCacheDtype,
  QuantizationPolicy,
  WeightFormat,
} from '../types/hardware.js';

export interface PolicyLimits {
  maxNumTokens: number;
  maxBatchSize: number;
}

export interface FamilyPolicyRow {
  attentionBackend: AttentionBackend;
  limits: Readonly<Record<WeightFormat, PolicyLimits>>;
}

export const ARCHITECTURE_FAMILIES: readonly ArchitectureFamily[] = [
  'blackwell',
  'hopper',
  'ada',
  'ampere',
  'turing',
  'volta',
  'unknown',
];

export const WEIGHT_FORMATS: readonly WeightFormat[] = ['int4_awq', 'fp8', 'full_precision'];

export const KV_CACHE_BY_FORMAT: Readonly<Record<WeightFormat, KvCacheDtype>> = {
  int4_awq: 'int8',
  fp8: 'fp8',
  full_precision: 'native',
};

export const POLICY_TABLE: Readonly<Record<ArchitectureFamily, FamilyPolicyRow>> = Object.freeze({
  blackwell: {
    attentionBackend: 'flashinfer',
    limits: {
      int4_awq: { maxNumTokens: 16384, maxBatchSize: 64 },
      fp8: { maxNumTokens: 16384, maxBatchSize: 64 },
      full_precision: { maxNumTokens: 8192, maxBatchSize: 32 },
    },
  },
  hopper: {
    attentionBackend: 'flashinfer',
    limits: {
      int4_awq: { maxNumTokens: 16384, maxBatchSize: 64 },
      fp8: { maxNumTokens: 16384, maxBatchSize: 64 },
      full_precision: { maxNumTokens: 8192, maxBatchSize: 32 },
    },
  },
  ada: {
    attentionBackend: 'flashinfer',
    limits: {
      int4_awq: { maxNumTokens: 8192, maxBatchSize: 32 },
      fp8: { maxNumTokens: 8192, maxBatchSize: 32 },
      full_precision: { maxNumTokens: 4096, maxBatchSize: 16 },
    },
  },
  ampere: {
    attentionBackend: 'flashinfer',
    limits: {
      int4_awq: { maxNumTokens: 8192, maxBatchSize: 32 },
      fp8: { maxNumTokens: 4096, maxBatchSize: 16 },
      full_precision: { maxNumTokens: 4096, maxBatchSize: 16 },
    },
  },
  turing: {
    attentionBackend: 'xformers',
    limits: {
      int4_awq: { maxNumTokens: 4096, maxBatchSize: 16 },
      fp8: { maxNumTokens: 2048, maxBatchSize: 8 },
      full_precision: { maxNumTokens: 2048, maxBatchSize: 8 },
    },
  },
  volta: {
    attentionBackend: 'xformers',
    limits: {
      int4_awq: { maxNumTokens: 4096, maxBatchSize: 16 },
      fp8: { maxNumTokens: 2048, maxBatchSize: 8 },
      full_precision: { maxNumTokens: 2048, maxBatchSize: 8 },
    },
  },
  unknown: {
    attentionBackend: 'xformers',
    limits: {
      int4_awq: { maxNumTokens: 2048, maxBatchSize: 8 },
      fp8: { maxNumTokens: 2048, maxBatchSize: 8 },
      full_precision: { maxNumTokens: 2048, maxBatchSize: 8 },
    },
  },
});

/**
 * compact → int4_awq everywhere; base → fp8 where supported, else full precision.
 */
export function selectWeightFormat(architecture: ArchitectureDescriptor, mode: PrecisionMode): WeightFormat {
  if (mode === 'compact') {
    return 'int4_awq';
  }
  return architecture.family !== 'unknown' && architecture.supportsFp8 ? 'fp8' : 'full_precision';
}

export interface PolicyOptions {
  /** Format fixed by the model itself, e.g. a pre-quantized checkpoint */
  weightFormat?: WeightFormat;
}

export function resolvePolicy(
  architecture: ArchitectureDescriptor,
  mode: PrecisionMode,
  options: PolicyOptions = {}
): QuantizationPolicy {
  const weightFormat = options.weightFormat ?? selectWeightFormat(architecture, mode);
  if (weightFormat === 'fp8' && !architecture.supportsFp8) {
    throw new ConfigurationError(
      'MODEL_ID',
      `fp8 weights need FP8 support; ${architecture.code || 'this GPU'} has none`
    );
  }
  const row = POLICY_TABLE[architecture.family];
  const limits = row.limits[weightFormat];

  return {
    precisionMode: mode,
    weightFormat,
    kvCacheDtype: KV_CACHE_BY_FORMAT[weightFormat],
    attentionBackend: row.attentionBackend,
    maxNumTokens: limits.maxNumTokens,
    maxBatchSize: limits.maxBatchSize,
    family: architecture.family,
    conservative: architecture.family === 'unknown',
  };
}

export function describePolicy(policy: QuantizationPolicy): string {
  const kv = policy.kvCacheDtype === 'native' ? 'native (no KV quantization)' : policy.kvCacheDtype;
  return (
    `${policy.precisionMode} → ${policy.weightFormat}, KV ${kv}, ${policy.attentionBackend}, ` +
    `max ${policy.maxNumTokens} tokens / batch ${policy.maxBatchSize}` +
    (policy.conservative ? ' (conservative)' : '')
  );
}

export interface PolicyTableEntry extends PolicyLimits {
  family: ArchitectureFamily;
  weightFormat: WeightFormat;
  attentionBackend: AttentionBackend;
  kvCacheDtype: KvCacheDtype;
}

/**
 * Flattened view of the table for display.
 */
export function listPolicyTable(): PolicyTableEntry[] {
  return ARCHITECTURE_FAMILIES.flatMap((family) =>
    WEIGHT_FORMATS.map((weightFormat) => ({
      family,
      weightFormat,
      attentionBackend: POLICY_TABLE[family].attentionBackend,
      kvCacheDtype: KV_CACHE_BY_FORMAT[weightFormat],
      ...POLICY_TABLE[family].limits[weightFormat],
    }))
  );
}
