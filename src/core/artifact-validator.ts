/**
 * Artifact Validator
 *
 * Pre-flight gate for checkpoints and engines. Checks run in order and stop
 * at the first failure:
 *
 * 1. required files exist
 * 2. primary file size (below minimum is a warning, not a failure)
 * 3. architecture compatibility for engines: embedded metadata first,
 *    directory-name prefix (`sm89_...`) when there is no metadata
 * 4. expected precision mode, weight format and toolchain against metadata,
 *    when asked; a side that is not recorded is not compared
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { Err, Ok, type Result } from 'ts-results';
import { ArtifactIncompatibleError, ArtifactMissingError } from '../api/errors.js';
import { architecturePrefix, readBuildMetadata } from './artifact-layout.js';
import { isDirectory, isNotFound } from '../utils/fs-helpers.js';
import type {
  ArtifactDescriptor,
  ArtifactExpectations,
  ValidationReport,
  ValidationWarning,
} from '../types/artifacts.js';
import type { ArchitectureDescriptor } from '../types/hardware.js';
import type { BuildMetadata } from '../types/schemas/metadata.js';

export type ArtifactValidationError = ArtifactMissingError | ArtifactIncompatibleError;

export type ValidationResult = Result<ValidationReport, ArtifactValidationError>;

/**
 * `rank*.safetensors` style matcher; names without `*` match exactly.
 */
export function matchesFilePattern(name: string, pattern: string): boolean {
  const star = pattern.indexOf('*');
  if (star < 0) {
    return name === pattern;
  }
  const prefix = pattern.slice(0, star);
  const suffix = pattern.slice(star + 1);
  return name.length >= prefix.length + suffix.length && name.startsWith(prefix) && name.endsWith(suffix);
}

async function fileSize(file: string): Promise<number | null> {
  try {
    const stats = await fs.stat(file);
    return stats.isFile() ? stats.size : null;
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

export class ArtifactValidator {
  private readonly logger?: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger;
  }

  public async validate(
    artifact: ArtifactDescriptor,
    architecture: ArchitectureDescriptor
  ): Promise<ValidationResult> {
    const directory = artifact.directory;

    if (!(await isDirectory(directory))) {
      return Err(new ArtifactMissingError(directory));
    }

    // 1. Required files
    const entries = await fs.readdir(directory);
    for (const required of artifact.requiredFiles) {
      if (!entries.some((name) => matchesFilePattern(name, required))) {
        return Err(new ArtifactMissingError(directory, required));
      }
    }

    // 2. Primary size
    const warnings: ValidationWarning[] = [];
    const primaryBytes = await fileSize(path.join(directory, artifact.primaryFile));
    if (primaryBytes === null) {
      return Err(new ArtifactMissingError(directory, artifact.primaryFile));
    }
    if (primaryBytes < artifact.minPrimaryBytes) {
      warnings.push({
        code: 'PRIMARY_BELOW_MIN_SIZE',
        message:
          `${artifact.primaryFile} is ${primaryBytes} bytes, below the expected minimum of ` +
          `${artifact.minPrimaryBytes}; it may be truncated`,
      });
    }

    const metadata = await this.loadMetadata(artifact, warnings);

    const report: ValidationReport = {
      kind: artifact.kind,
      directory,
      primaryBytes,
      compatibility: 'not-applicable',
      heuristicOnly: false,
      warnings,
    };

    // 3. Architecture compatibility (engines only; checkpoints are portable)
    if (artifact.kind === 'engine') {
      const compatibility = this.checkArchitecture(directory, metadata, architecture);
      if (compatibility.err) {
        return compatibility;
      }
      report.compatibility = compatibility.val;
      report.heuristicOnly = compatibility.val === 'heuristic';
    }

    // 4. Expected build shape
    if (artifact.expected && metadata) {
      const mismatch = this.checkExpectations(directory, artifact.expected, metadata);
      if (mismatch) {
        return Err(mismatch);
      }
    }

    for (const warning of warnings) {
      this.logger?.warn({ directory, code: warning.code }, warning.message);
    }
    if (report.heuristicOnly) {
      this.logger?.info({ directory }, 'Architecture compatibility inferred from directory name only');
    }

    return Ok(report);
  }

  private async loadMetadata(
    artifact: ArtifactDescriptor,
    warnings: ValidationWarning[]
  ): Promise<BuildMetadata | null> {
    if (!artifact.metadataFile) {
      return null;
    }

    const result = await readBuildMetadata(path.join(artifact.directory, artifact.metadataFile));
    switch (result.status) {
      case 'ok':
        return result.metadata;
      case 'invalid':
        warnings.push({
          code: 'METADATA_UNREADABLE',
          message: `${artifact.metadataFile} could not be parsed (${result.reason}); ignoring it`,
        });
        return null;
      case 'absent':
        return null;
    }
  }

  private checkExpectations(
    directory: string,
    expected: ArtifactExpectations,
    metadata: BuildMetadata
  ): ArtifactIncompatibleError | null {
    const pairs: Array<[string | null | undefined, string | undefined, string]> = [
      [expected.precisionMode, metadata.precision_mode, 'precision mode'],
      [expected.weightFormat, metadata.weight_format, 'weight format'],
      [expected.toolchain?.engineVersion, metadata.engine_toolchain_version, 'toolchain version'],
      [expected.toolchain?.cudaVersion, metadata.cuda_version, 'CUDA version'],
    ];
    for (const [wanted, recorded, subject] of pairs) {
      if (wanted && recorded && recorded.trim() !== wanted) {
        return new ArtifactIncompatibleError(directory, wanted, recorded.trim(), subject);
      }
    }
    return null;
  }

  private checkArchitecture(
    directory: string,
    metadata: BuildMetadata | null,
    architecture: ArchitectureDescriptor
  ): Result<ValidationReport['compatibility'], ArtifactIncompatibleError> {
    const current = architecture.code.toLowerCase();
    if (!current) {
      return Ok('unverified');
    }

    const recorded = metadata?.sm_arch?.trim().toLowerCase();
    if (recorded) {
      return recorded === current
        ? Ok('metadata')
        : Err(new ArtifactIncompatibleError(directory, current, recorded));
    }

    const resolved = path.resolve(directory);
    const hinted = architecturePrefix(path.basename(resolved)) ?? architecturePrefix(path.basename(path.dirname(resolved)));
    if (hinted && hinted !== current) {
      return Err(new ArtifactIncompatibleError(directory, current, hinted));
    }

    return Ok('heuristic');
  }
}
