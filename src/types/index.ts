/**
 * Main type exports for engine-build-cache
 */

export * from './build.js';
export * from './hardware.js';
export * from './artifacts.js';
export type { BuildMetadata } from './schemas/metadata.js';
export type { BuildConfig } from './schemas/config.js';
export * from './pipeline.js';
