/**
 * Artifact cleanup: stale-directory removal on rebuild and the full wipe on
 * an inference engine switch.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { PipelineStateError } from '../api/errors.js';
import { isNotFound } from '../utils/fs-helpers.js';
import type { ConfigurationSnapshot, ModeSwitchDecision, PersistedBuildRecord } from '../types/build.js';
import type { LayoutSettings, PipelineConfig } from '../types/pipeline.js';

export interface WipeSummary {
  previousKind: string | null;
  currentKind: string;
  removed: string[];
  recordRemoved: boolean;
}

/**
 * Absolute form of an artifact path; relative paths are taken from the
 * layout root.
 */
export function resolveArtifactPath(target: string, layout: LayoutSettings): string {
  return path.resolve(layout.rootDir, target);
}

/**
 * True when `inner` is `outer` or lies below it.
 */
function isWithin(inner: string, outer: string): boolean {
  const relative = path.relative(outer, inner);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

function isProtected(target: string, layout: LayoutSettings): boolean {
  if (target === path.parse(target).root) {
    return true;
  }
  // The root, the models dir, and anything above them
  return [layout.rootDir, layout.modelsDir].some((guarded) => isWithin(path.resolve(guarded), target));
}

/**
 * Remove one artifact directory. Returns false when there was nothing to
 * remove.
 */
export async function removeArtifactDirectory(target: string, layout: LayoutSettings): Promise<boolean> {
  const absolute = resolveArtifactPath(target, layout);
  if (isProtected(absolute, layout)) {
    throw new PipelineStateError(`Refusing to remove ${absolute}: it contains the build root or models directory`, {
      target: absolute,
    });
  }

  try {
    await fs.access(absolute);
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
  await fs.rm(absolute, { recursive: true, force: true });
  return true;
}

function artifactTargets(record: PersistedBuildRecord | null, snapshot: ConfigurationSnapshot): string[] {
  const targets = [
    record?.parameters.CHECKPOINT_DIR,
    record?.parameters.ENGINE_DIR,
    snapshot.CHECKPOINT_DIR,
    snapshot.ENGINE_DIR,
  ];
  return [...new Set(targets.filter((target): target is string => Boolean(target && target.trim())))];
}

/**
 * Remove the directories named by the previous record and by the current
 * targets.
 */
export async function removeStaleArtifacts(
  record: PersistedBuildRecord | null,
  snapshot: ConfigurationSnapshot,
  layout: LayoutSettings,
  logger?: Logger
): Promise<string[]> {
  const removed: string[] = [];
  for (const target of artifactTargets(record, snapshot)) {
    if (await removeArtifactDirectory(target, layout)) {
      removed.push(resolveArtifactPath(target, layout));
    }
  }
  if (removed.length > 0) {
    logger?.info({ removed }, 'Removed stale artifacts');
  }
  return removed;
}

/**
 * The models directory, unless emptying it would take the build root or the
 * run directory holding the record and lock with it.
 */
function clearableModelsDirectory(config: PipelineConfig): string {
  const directory = path.resolve(config.layout.modelsDir);
  const guarded = [config.layout.rootDir, path.dirname(config.recordPath), path.dirname(config.lockPath)];
  const clash = guarded.map((entry) => path.resolve(entry)).find((entry) => isWithin(entry, directory));
  if (directory === path.parse(directory).root || clash !== undefined) {
    throw new PipelineStateError(`Refusing to clear ${directory}: it contains ${clash ?? 'the filesystem root'}`, {
      target: directory,
    });
  }
  return directory;
}

async function clearDirectory(directory: string): Promise<string[]> {
  let names: string[];
  try {
    names = await fs.readdir(directory);
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw error;
  }

  const removed: string[] = [];
  for (const name of names.sort()) {
    const entry = path.join(directory, name);
    await fs.rm(entry, { recursive: true, force: true });
    removed.push(entry);
  }
  return removed;
}

export interface ModeSwitchWipeRequest {
  record: PersistedBuildRecord | null;
  snapshot: ConfigurationSnapshot;
  modeSwitch: ModeSwitchDecision;
  config: PipelineConfig;
  logger?: Logger;
}

/**
 * Everything cached for the previous inference engine goes: artifact
 * directories, the models directory contents, dependency state for both
 * kinds, and the record.
 */
export async function wipeForModeSwitch(request: ModeSwitchWipeRequest): Promise<WipeSummary> {
  const { record, snapshot, modeSwitch, config, logger } = request;
  const { layout } = config;
  const modelsDir = clearableModelsDirectory(config);

  const removed = await removeStaleArtifacts(record, snapshot, layout);
  removed.push(...(await clearDirectory(modelsDir)));

  const kinds = [modeSwitch.previousKind, modeSwitch.currentKind].filter((kind): kind is string => Boolean(kind));
  for (const kind of new Set(kinds)) {
    for (const stateDir of config.engineStateDirs[kind] ?? []) {
      if (await removeArtifactDirectory(stateDir, layout)) {
        removed.push(resolveArtifactPath(stateDir, layout));
      }
    }
  }

  let recordRemoved = false;
  try {
    await fs.unlink(config.recordPath);
    recordRemoved = true;
  } catch (error) {
    if (!isNotFound(error)) {
      throw error;
    }
  }

  const summary: WipeSummary = {
    previousKind: modeSwitch.previousKind,
    currentKind: modeSwitch.currentKind,
    removed: [...new Set(removed)],
    recordRemoved,
  };
  logger?.warn(
    { from: summary.previousKind, to: summary.currentKind, removed: summary.removed.length, recordRemoved },
    'Inference engine switched; wiped cached artifacts'
  );
  return summary;
}
