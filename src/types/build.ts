/**
 * Build Cache Types
 *
 * Tracked parameters, configuration snapshots and the persisted build record.
 *
 * @module types/build
 */

/**
 * Every parameter whose change invalidates a built artifact.
 * Order here is display order only; signing always sorts by name.
 */
export const TRACKED_PARAMETERS = [
  'MODEL_ID',
  'PRECISION_MODE',
  'INFERENCE_ENGINE',
  'CHECKPOINT_DIR',
  'ENGINE_DIR',
  'MAX_BATCH_SIZE',
  'MAX_INPUT_LEN',
  'MAX_OUTPUT_LEN',
  'KV_FREE_GPU_FRAC',
  'KV_ENABLE_BLOCK_REUSE',
  'AWQ_BLOCK_SIZE',
  'CALIB_SIZE',
  'DEPLOY_MODE',
] as const;

export type TrackedParameterName = (typeof TRACKED_PARAMETERS)[number];

/**
 * Parameters the pipeline cannot build without.
 */
export const REQUIRED_PARAMETERS: readonly TrackedParameterName[] = [
  'MODEL_ID',
  'PRECISION_MODE',
  'INFERENCE_ENGINE',
  'CHECKPOINT_DIR',
  'ENGINE_DIR',
  'MAX_BATCH_SIZE',
  'MAX_INPUT_LEN',
  'MAX_OUTPUT_LEN',
];

/**
 * Parameters that must parse as positive integers when set.
 */
export const INTEGER_PARAMETERS: readonly TrackedParameterName[] = [
  'MAX_BATCH_SIZE',
  'MAX_INPUT_LEN',
  'MAX_OUTPUT_LEN',
  'AWQ_BLOCK_SIZE',
  'CALIB_SIZE',
];

/** Key namespace used in the record file */
export const RECORD_KEY_PREFIX = 'BUILD_';

/**
 * Immutable mapping of every tracked parameter to its value at capture time.
 * Missing values are the empty string, never absent.
 */
export type ConfigurationSnapshot = Readonly<Record<TrackedParameterName, string>>;

/**
 * Raw parameter source (environment, YAML defaults, test fixtures).
 */
export type ParameterSource = Readonly<Record<string, string | undefined>>;

/** Hex digest, or the sentinel when no hasher is available */
export type BuildSignature = string;

export const NO_SIGNATURE = 'no-signature';

/**
 * Last successful build, as read back from disk.
 */
export interface PersistedBuildRecord {
  parameters: Partial<Record<TrackedParameterName, string>>;
  signature: BuildSignature;
  timestamp: string;
}

export type PrecisionMode = 'compact' | 'base';

export const PRECISION_MODES: readonly PrecisionMode[] = ['compact', 'base'];

export type RebuildReason = 'no-record' | 'parameters-changed' | 'signature-mismatch' | 'up-to-date';

export interface RebuildDecision {
  rebuild: boolean;
  changedKeys: TrackedParameterName[];
  signatureMatches: boolean;
  reason: RebuildReason;
  /** Record the decision was made against (null on first run) */
  record: PersistedBuildRecord | null;
}

export interface ModeSwitchDecision {
  forcedFullWipe: boolean;
  previousKind: string | null;
  currentKind: string;
}

export interface BuildEvaluation {
  decision: RebuildDecision;
  modeSwitch: ModeSwitchDecision;
}
