/**
 * Build cache error utilities.
 *
 * Every failure surfaced by the pipeline is a BuildCacheError carrying a
 * stable code, so the CLI and callers can branch on the kind of failure and
 * operators can grep logs for it.
 */

import type { ZodError } from 'zod';

/**
 * Error codes surfaced to pipeline callers.
 */
export type BuildCacheErrorCode =
  | 'CONFIGURATION'
  | 'ARTIFACT_MISSING'
  | 'ARTIFACT_INCOMPATIBLE'
  | 'EXTERNAL_TOOL_FAILURE'
  | 'TRANSIENT_NETWORK'
  | 'ARTIFACT_STORE'
  | 'LOCK_HELD'
  | 'PIPELINE_STATE'
  | 'UNKNOWN';

/**
 * Plain shape of a build cache error (for JSON output and logs).
 */
export interface BuildCacheErrorShape {
  code: BuildCacheErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class BuildCacheError extends Error {
  public readonly code: BuildCacheErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: BuildCacheErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'BuildCacheError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape (for JSON responses/logs).
   */
  public toObject(): BuildCacheErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * A required parameter or config value is unset or malformed.
 * Raised before any GPU work starts.
 */
export class ConfigurationError extends BuildCacheError {
  public readonly parameter: string;

  constructor(parameter: string, message: string) {
    super('CONFIGURATION', `${parameter}: ${message}`, { parameter });
    this.name = 'ConfigurationError';
    this.parameter = parameter;
  }
}

export class ArtifactMissingError extends BuildCacheError {
  public readonly directory: string;
  public readonly file?: string;

  constructor(directory: string, file?: string) {
    super(
      'ARTIFACT_MISSING',
      file
        ? `Required file '${file}' not found in ${directory}`
        : `Artifact directory not found: ${directory}`,
      { directory, file }
    );
    this.name = 'ArtifactMissingError';
    this.directory = directory;
    this.file = file;
  }
}

export class ArtifactIncompatibleError extends BuildCacheError {
  public readonly directory: string;
  public readonly expected: string;
  public readonly actual: string;

  constructor(directory: string, expected: string, actual: string, subject = 'architecture') {
    super(
      'ARTIFACT_INCOMPATIBLE',
      `Artifact at ${directory} was built for ${subject} '${actual}', current ${subject} is '${expected}'`,
      { directory, expected, actual, subject }
    );
    this.name = 'ArtifactIncompatibleError';
    this.directory = directory;
    this.expected = expected;
    this.actual = actual;
  }
}

export class ExternalToolFailure extends BuildCacheError {
  public readonly tool: string;
  public readonly exitCode: number | null;
  public readonly stderrTail: string;

  constructor(tool: string, message: string, exitCode: number | null, stderrTail = '') {
    super('EXTERNAL_TOOL_FAILURE', `${tool} failed: ${message}`, { tool, exitCode, stderrTail });
    this.name = 'ExternalToolFailure';
    this.tool = tool;
    this.exitCode = exitCode;
    this.stderrTail = stderrTail;
  }
}

/**
 * Remote list/download/upload failure that is worth retrying.
 */
export class TransientNetworkError extends BuildCacheError {
  public readonly operation: string;

  constructor(operation: string, message: string, cause?: unknown) {
    super('TRANSIENT_NETWORK', `${operation}: ${message}`, { operation });
    this.name = 'TransientNetworkError';
    this.operation = operation;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export type ArtifactStoreFailureReason = 'NOT_FOUND' | 'PERMISSION' | 'INVALID';

/**
 * Permanent remote store failure. Never retried.
 */
export class ArtifactStoreError extends BuildCacheError {
  public readonly reason: ArtifactStoreFailureReason;

  constructor(reason: ArtifactStoreFailureReason, message: string, details?: Record<string, unknown>) {
    super('ARTIFACT_STORE', message, { reason, ...details });
    this.name = 'ArtifactStoreError';
    this.reason = reason;
  }
}

export class LockHeldError extends BuildCacheError {
  public readonly lockPath: string;
  public readonly holderPid: number | null;

  constructor(lockPath: string, holderPid: number | null) {
    super(
      'LOCK_HELD',
      `Another build holds ${lockPath}${holderPid !== null ? ` (pid ${holderPid})` : ''}`,
      { lockPath, holderPid }
    );
    this.name = 'LockHeldError';
    this.lockPath = lockPath;
    this.holderPid = holderPid;
  }
}

export class PipelineStateError extends BuildCacheError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('PIPELINE_STATE', message, details);
    this.name = 'PipelineStateError';
  }
}

/**
 * Map unknown errors into BuildCacheError instances.
 */
export function toBuildCacheError(error: unknown): BuildCacheError {
  if (error instanceof BuildCacheError) {
    return error;
  }

  if (error instanceof Error) {
    const wrapped = new BuildCacheError('UNKNOWN', error.message);
    wrapped.cause = error;
    return wrapped;
  }

  return new BuildCacheError('UNKNOWN', `Unknown error: ${String(error)}`);
}

/**
 * Convert a Zod validation error to a ConfigurationError naming the first
 * offending field.
 *
 * @example
 * ```typescript
 * const result = BuildConfigSchema.safeParse(raw);
 * if (!result.success) {
 *   throw zodErrorToConfigurationError(result.error);
 * }
 * // Throws: "remote.retry.max_attempts: must be >= 1"
 * ```
 */
export function zodErrorToConfigurationError(error: ZodError, root = 'config'): ConfigurationError {
  const firstIssue = error.issues[0];
  if (!firstIssue) {
    return new ConfigurationError(root, 'invalid configuration');
  }
  const field = firstIssue.path.length > 0 ? firstIssue.path.join('.') : root;
  const remaining = error.issues.length - 1;
  const suffix = remaining > 0 ? ` (and ${remaining} more issue${remaining === 1 ? '' : 's'})` : '';
  return new ConfigurationError(field, `${firstIssue.message}${suffix}`);
}
