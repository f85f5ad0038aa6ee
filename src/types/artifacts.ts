/**
 * Artifact Types
 *
 * Descriptors for checkpoints and engines, validation reports and remote
 * resolution results.
 *
 * @module types/artifacts
 */

import type { PrecisionMode } from './build.js';
import type { ToolchainInfo, WeightFormat } from './hardware.js';

export type ArtifactKind = 'engine' | 'checkpoint';

/**
 * Structural requirements for one kind of artifact.
 */
export interface ArtifactRequirements {
  /** Exact names, or a single-`*` pattern such as `rank*.safetensors` */
  requiredFiles: string[];
  primaryFile: string;
  minPrimaryBytes: number;
}

/**
 * What the current build needs; checked against recorded metadata only.
 */
export interface ArtifactExpectations {
  precisionMode?: PrecisionMode;
  weightFormat?: WeightFormat;
  toolchain?: ToolchainInfo;
}

export interface ArtifactDescriptor extends ArtifactRequirements {
  kind: ArtifactKind;
  directory: string;
  metadataFile?: string;
  expected?: ArtifactExpectations;
}

export type CompatibilityBasis = 'metadata' | 'heuristic' | 'unverified' | 'not-applicable';

export type ValidationWarningCode = 'PRIMARY_BELOW_MIN_SIZE' | 'METADATA_UNREADABLE';

export interface ValidationWarning {
  code: ValidationWarningCode;
  message: string;
}

export interface ValidationReport {
  kind: ArtifactKind;
  directory: string;
  primaryBytes: number;
  compatibility: CompatibilityBasis;
  /** True when only the path-naming convention vouched for the architecture */
  heuristicOnly: boolean;
  warnings: ValidationWarning[];
}

export type RemotePreference = 'engines-only' | 'checkpoints-only' | 'auto';

export interface ResolvedRemoteArtifact {
  kind: ArtifactKind;
  directory: string;
  label?: string;
  report: ValidationReport;
}
