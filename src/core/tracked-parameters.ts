/**
 * Tracked Parameters
 *
 * Captures the immutable ConfigurationSnapshot every pipeline component
 * receives, and checks it is complete before any expensive work starts.
 */

import { ConfigurationError } from '../api/errors.js';
import {
  INTEGER_PARAMETERS,
  PRECISION_MODES,
  REQUIRED_PARAMETERS,
  TRACKED_PARAMETERS,
  type ConfigurationSnapshot,
  type ParameterSource,
  type PrecisionMode,
  type TrackedParameterName,
} from '../types/build.js';

export function isTrackedParameter(name: string): name is TrackedParameterName {
  return TRACKED_PARAMETERS.some((candidate) => candidate === name);
}

/**
 * Build a record with one entry per tracked parameter. The literal keeps the
 * compiler checking that no parameter is left out.
 */
export function mapTrackedParameters<T>(
  read: (name: TrackedParameterName) => T
): Record<TrackedParameterName, T> {
  return {
    MODEL_ID: read('MODEL_ID'),
    PRECISION_MODE: read('PRECISION_MODE'),
    INFERENCE_ENGINE: read('INFERENCE_ENGINE'),
    CHECKPOINT_DIR: read('CHECKPOINT_DIR'),
    ENGINE_DIR: read('ENGINE_DIR'),
    MAX_BATCH_SIZE: read('MAX_BATCH_SIZE'),
    MAX_INPUT_LEN: read('MAX_INPUT_LEN'),
    MAX_OUTPUT_LEN: read('MAX_OUTPUT_LEN'),
    KV_FREE_GPU_FRAC: read('KV_FREE_GPU_FRAC'),
    KV_ENABLE_BLOCK_REUSE: read('KV_ENABLE_BLOCK_REUSE'),
    AWQ_BLOCK_SIZE: read('AWQ_BLOCK_SIZE'),
    CALIB_SIZE: read('CALIB_SIZE'),
    DEPLOY_MODE: read('DEPLOY_MODE'),
  };
}

/**
 * Read every tracked parameter from `source`. Missing values become ''.
 */
export function captureSnapshot(source: ParameterSource): ConfigurationSnapshot {
  return Object.freeze(mapTrackedParameters((name) => source[name] ?? ''));
}

/**
 * Copy of `snapshot` with some values replaced.
 */
export function withParameters(
  snapshot: ConfigurationSnapshot,
  overrides: Partial<Record<TrackedParameterName, string>>
): ConfigurationSnapshot {
  return captureSnapshot({ ...snapshot, ...overrides });
}

export function isPrecisionMode(value: string): value is PrecisionMode {
  return PRECISION_MODES.some((mode) => mode === value);
}

export function parsePrecisionMode(value: string): PrecisionMode {
  const normalized = value.trim().toLowerCase();
  if (!isPrecisionMode(normalized)) {
    throw new ConfigurationError(
      'PRECISION_MODE',
      `must be one of ${PRECISION_MODES.join(', ')} (got '${value}')`
    );
  }
  return normalized;
}

export function parsePositiveInteger(snapshot: ConfigurationSnapshot, name: TrackedParameterName): number {
  const raw = snapshot[name].trim();
  if (!/^\d+$/.test(raw) || Number(raw) <= 0) {
    throw new ConfigurationError(name, `must be a positive integer (got '${snapshot[name]}')`);
  }
  return Number(raw);
}

/**
 * Fail fast on anything the build cannot proceed without.
 */
export function assertBuildableSnapshot(snapshot: ConfigurationSnapshot): void {
  for (const name of REQUIRED_PARAMETERS) {
    if (snapshot[name].trim() === '') {
      throw new ConfigurationError(name, 'is required but not set');
    }
  }

  parsePrecisionMode(snapshot.PRECISION_MODE);

  for (const name of INTEGER_PARAMETERS) {
    if (snapshot[name].trim() !== '') {
      parsePositiveInteger(snapshot, name);
    }
  }
}
