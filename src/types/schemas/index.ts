/**
 * Zod schema exports for engine-build-cache
 *
 * @example
 * ```typescript
 * import { BuildConfigSchema } from 'engine-build-cache/schemas';
 *
 * const result = BuildConfigSchema.safeParse(yaml.load(text));
 * if (!result.success) {
 *   console.error(result.error.issues);
 * }
 * ```
 */

// config/build.yaml
export * from './config.js';

// build_metadata.json beside an engine
export * from './metadata.js';
