/**
 * Hardware and Quantization Policy Types
 *
 * @module types/hardware
 */

import type { PrecisionMode } from './build.js';

export type ArchitectureFamily =
  | 'volta'
  | 'turing'
  | 'ampere'
  | 'ada'
  | 'hopper'
  | 'blackwell'
  | 'unknown';

export type ArchitectureSource = 'override' | 'compute-cap' | 'name-table' | 'none';

/**
 * Accelerator present on the host, probed once per invocation.
 */
export interface ArchitectureDescriptor {
  /** e.g. `sm89`; empty when undetectable */
  code: string;
  family: ArchitectureFamily;
  smVersion: number | null;
  supportsFp8: boolean;
  deviceName?: string;
  source: ArchitectureSource;
}

/**
 * Engine toolchain on the build host. Either part is null when it cannot be
 * determined; labels and compatibility checks then leave it out.
 */
export interface ToolchainInfo {
  /** Release of the engine compiler, e.g. `0.12.0` */
  engineVersion: string | null;
  /** CUDA toolkit as `major.minor` */
  cudaVersion: string | null;
}

export type WeightFormat = 'int4_awq' | 'fp8' | 'full_precision';

export type KvCacheDtype = 'int8' | 'fp8' | 'native';

export type AttentionBackend = 'flashinfer' | 'xformers';

/**
 * Resolved quantization policy for one architecture and precision mode.
 */
export interface QuantizationPolicy {
  precisionMode: PrecisionMode;
  weightFormat: WeightFormat;
  kvCacheDtype: KvCacheDtype;
  attentionBackend: AttentionBackend;
  maxNumTokens: number;
  maxBatchSize: number;
  family: ArchitectureFamily;
  /** Lowest-common-denominator row used for unknown hardware */
  conservative: boolean;
}
