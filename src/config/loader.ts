/**
 * Configuration Loader
 *
 * Loads config/build.yaml with environment-specific overrides, validates it,
 * and turns it into the camelCase settings and parameter source the
 * pipeline consumes.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, isAbsolute, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { ConfigurationError, zodErrorToConfigurationError } from '../api/errors.js';
import { defaultArtifactDirectories } from '../core/artifact-layout.js';
import { parsePrecisionMode } from '../core/tracked-parameters.js';
import { BuildConfigSchema, type BuildConfig } from '../types/schemas/config.js';
import { TRACKED_PARAMETERS, type ParameterSource } from '../types/build.js';
import type { PipelineConfig } from '../types/pipeline.js';

export type ConfigEnvironment = 'production' | 'development' | 'test';

type Env = Readonly<Record<string, string | undefined>>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two parsed YAML objects; arrays and scalars in `source` replace
 * those in `target`.
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const output: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = output[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
export function findPackageRoot(startDir: string = dirname(fileURLToPath(import.meta.url))): string {
  let currentDir = startDir;

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

/**
 * Directory holding build.yaml and gpu-architectures.json.
 */
export function configDirectory(): string {
  return join(findPackageRoot(), 'config');
}

export function resolveConfigPath(configPath?: string): string {
  if (configPath) {
    return resolve(configPath);
  }
  return join(configDirectory(), 'build.yaml');
}

function selectEnvironment(environment: string | undefined, env: Env): ConfigEnvironment {
  const name = environment ?? env['NODE_ENV'] ?? 'development';
  if (name === 'production' || name === 'test') {
    return name;
  }
  return 'development';
}

/**
 * Load configuration from YAML file
 */
export function loadConfig(configPath?: string, environment?: string, env: Env = process.env): BuildConfig {
  const finalPath = resolveConfigPath(configPath);

  let fileContents: string;
  try {
    fileContents = readFileSync(finalPath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(
      'config',
      `Configuration file not found or unreadable: ${finalPath} (${error instanceof Error ? error.message : String(error)})`
    );
  }

  let raw: unknown;
  try {
    raw = yaml.load(fileContents);
  } catch (error) {
    throw new ConfigurationError('config', `Invalid YAML in ${finalPath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!isPlainObject(raw)) {
    throw new ConfigurationError('config', `${finalPath} must contain a mapping`);
  }

  // Apply environment-specific overrides
  let merged: Record<string, unknown> = raw;
  const environments = raw['environments'];
  if (isPlainObject(environments)) {
    const overrides = environments[selectEnvironment(environment, env)];
    if (isPlainObject(overrides)) {
      merged = deepMerge(raw, overrides);
    }
  }

  const parsed = BuildConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw zodErrorToConfigurationError(parsed.error);
  }
  return parsed.data;
}

function absoluteFrom(base: string, target: string): string {
  return isAbsolute(target) ? target : resolve(base, target);
}

/**
 * Convert YAML config (snake_case) to PipelineConfig (camelCase, absolute
 * paths resolved against `baseDir`).
 */
export function getPipelineConfig(config: BuildConfig, baseDir: string = process.cwd()): PipelineConfig {
  const rootDir = absoluteFrom(baseDir, config.paths.root_dir);
  const runDir = absoluteFrom(rootDir, config.paths.run_dir);
  const toRequirements = (requirements: BuildConfig['validation']['engine']) => ({
    requiredFiles: [...requirements.required_files],
    primaryFile: requirements.primary_file,
    minPrimaryBytes: requirements.min_primary_bytes,
  });

  return {
    layout: {
      rootDir,
      modelsDir: absoluteFrom(rootDir, config.paths.models_dir),
      metadataFile: config.validation.metadata_file,
      engine: toRequirements(config.validation.engine),
      checkpoint: toRequirements(config.validation.checkpoint),
    },
    recordPath: absoluteFrom(runDir, config.paths.record_file),
    lockPath: absoluteFrom(runDir, config.paths.lock_file),
    lockStaleAfterMs: config.lock.stale_after_ms,
    fp8MinSm: config.policy.fp8_min_sm,
    remote: {
      kind: config.remote.kind,
      ref: config.remote.ref,
      preference: config.remote.preference,
      engineLabel: config.remote.engine_label,
      enginesPrefix: config.remote.engines_prefix,
      checkpointsPrefix: config.remote.checkpoints_prefix,
      prequantizedPrefix: config.remote.prequantized_prefix,
      directoryRoot: config.remote.directory_root ? absoluteFrom(rootDir, config.remote.directory_root) : '',
      hubEndpoint: config.remote.hub_endpoint,
      retry: {
        maxAttempts: config.remote.retry.max_attempts,
        initialDelayMs: config.remote.retry.initial_delay_ms,
        maxDelayMs: config.remote.retry.max_delay_ms,
        backoffMultiplier: config.remote.retry.backoff_multiplier,
        retryableErrors: [...config.remote.retry.retryable_errors],
        jitter: config.remote.retry.jitter,
      },
    },
    tools: {
      quantizer: { command: config.tools.quantizer.command, args: [...config.tools.quantizer.args] },
      compiler: { command: config.tools.compiler.command, args: [...config.tools.compiler.args] },
      hubCli: { command: config.tools.hub_cli.command, args: [...config.tools.hub_cli.args] },
    },
    engineStateDirs: Object.fromEntries(
      Object.entries(config.engine_kinds).map(([kind, settings]) => [kind.toLowerCase(), [...settings.state_dirs]])
    ),
    engineVersionCommands: Object.fromEntries(
      Object.entries(config.engine_kinds).flatMap(([kind, settings]): Array<[string, string]> =>
        settings.version_command ? [[kind.toLowerCase(), settings.version_command]] : []
      )
    ),
  };
}

/**
 * Tracked parameter values: environment variables over the YAML defaults.
 * YAML numbers and booleans are stringified; null becomes ''.
 */
export function collectParameterSource(config: BuildConfig, env: Env = process.env): Record<string, string> {
  const source: Record<string, string> = {};
  for (const name of TRACKED_PARAMETERS) {
    const fromEnv = env[name];
    if (fromEnv !== undefined) {
      source[name] = fromEnv;
      continue;
    }
    const fallback = config.parameters[name];
    source[name] = fallback === undefined || fallback === null ? '' : String(fallback);
  }
  return source;
}

/**
 * Fill CHECKPOINT_DIR / ENGINE_DIR from the model id and precision mode
 * when they are empty. Derived paths are relative to the build root.
 */
export function resolveArtifactDirectories(source: ParameterSource, config: BuildConfig): Record<string, string> {
  const resolved: Record<string, string> = {};
  for (const [name, value] of Object.entries(source)) {
    if (value !== undefined) {
      resolved[name] = value;
    }
  }

  const checkpointDir = resolved['CHECKPOINT_DIR']?.trim() ?? '';
  const engineDir = resolved['ENGINE_DIR']?.trim() ?? '';
  const modelId = resolved['MODEL_ID']?.trim() ?? '';
  if ((checkpointDir && engineDir) || !modelId) {
    return resolved;
  }

  const derived = defaultArtifactDirectories(
    modelId,
    parsePrecisionMode(resolved['PRECISION_MODE'] ?? ''),
    config.paths.models_dir
  );
  resolved['CHECKPOINT_DIR'] = checkpointDir || derived.checkpointDir;
  resolved['ENGINE_DIR'] = engineDir || derived.engineDir;
  return resolved;
}
