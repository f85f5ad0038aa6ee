/**
 * Build Configuration Schemas
 *
 * Zod schemas for validating config/build.yaml.
 *
 * @module schemas/config
 */

import { z } from 'zod';

/**
 * Tracked parameter defaults. YAML may type them as numbers or booleans;
 * the loader stringifies them.
 */
export const ParameterDefaultsSchema = z.record(
  z.string(),
  z.union([z.string(), z.number(), z.boolean(), z.null()])
);

export const PathsConfigSchema = z.object({
  root_dir: z.string().min(1, 'cannot be empty'),
  models_dir: z.string().min(1, 'cannot be empty'),
  run_dir: z.string().min(1, 'cannot be empty'),
  record_file: z.string().min(1, 'cannot be empty'),
  lock_file: z.string().min(1, 'cannot be empty'),
});

export const PolicyConfigSchema = z.object({
  fp8_min_sm: z.number().int().positive('must be positive'),
});

export const ArtifactRequirementsSchema = z.object({
  required_files: z.array(z.string().min(1)).min(1, 'must list at least one file'),
  primary_file: z.string().min(1, 'cannot be empty'),
  min_primary_bytes: z.number().int().min(0, 'must be >= 0'),
});

export const ValidationConfigSchema = z.object({
  metadata_file: z.string().min(1, 'cannot be empty'),
  engine: ArtifactRequirementsSchema,
  checkpoint: ArtifactRequirementsSchema,
});

export const LockConfigSchema = z.object({
  stale_after_ms: z.number().int().positive('must be positive'),
});

/**
 * Remote Store Retry Configuration
 */
export const RemoteRetryConfigSchema = z.object({
  max_attempts: z.number().int().min(1, 'must be >= 1'),
  initial_delay_ms: z.number().int().min(0, 'must be >= 0'),
  max_delay_ms: z.number().int().min(0, 'must be >= 0'),
  backoff_multiplier: z.number().min(1, 'must be >= 1'),
  retryable_errors: z.array(z.string()),
  jitter: z.number().min(0).max(1).optional(),
}).refine(
  (data) => data.max_delay_ms >= data.initial_delay_ms,
  {
    message: 'must be >= initial_delay_ms',
    path: ['max_delay_ms'],
  }
);

export const RemoteConfigSchema = z.object({
  kind: z.enum(['none', 'directory', 'hub']),
  ref: z.string(),
  preference: z.enum(['engines-only', 'checkpoints-only', 'auto']),
  engine_label: z.string(),
  engines_prefix: z.string().min(1, 'cannot be empty'),
  checkpoints_prefix: z.string().min(1, 'cannot be empty'),
  prequantized_prefix: z.string().min(1, 'cannot be empty'),
  directory_root: z.string(),
  hub_endpoint: z.string().url('must be a URL'),
  retry: RemoteRetryConfigSchema,
}).refine(
  (data) => data.kind === 'none' || data.ref.length > 0,
  {
    message: 'must be set when remote.kind is not none',
    path: ['ref'],
  }
).refine(
  (data) => data.kind !== 'directory' || data.directory_root.length > 0,
  {
    message: 'must be set when remote.kind is directory',
    path: ['directory_root'],
  }
);

export const ToolCommandSchema = z.object({
  command: z.string().min(1, 'cannot be empty'),
  args: z.array(z.string()),
});

export const ToolsConfigSchema = z.object({
  quantizer: ToolCommandSchema,
  compiler: ToolCommandSchema,
  hub_cli: ToolCommandSchema,
});

export const EngineKindConfigSchema = z.object({
  state_dirs: z.array(z.string().min(1)),
  version_command: z.string().min(1).optional(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
});

/**
 * Complete build configuration (after environment overrides are applied)
 */
export const BuildConfigSchema = z.object({
  parameters: ParameterDefaultsSchema,
  paths: PathsConfigSchema,
  policy: PolicyConfigSchema,
  validation: ValidationConfigSchema,
  lock: LockConfigSchema,
  remote: RemoteConfigSchema,
  tools: ToolsConfigSchema,
  engine_kinds: z.record(z.string(), EngineKindConfigSchema),
  logging: LoggingConfigSchema,
});

export type BuildConfig = z.infer<typeof BuildConfigSchema>;
