/**
 * Build lock.
 *
 * Single-flight guard around the artifact directories and the build record:
 * an exclusively created lock file holding the owner's pid. A lock whose
 * owner is gone, or which is older than `staleAfterMs`, is taken over. An
 * empty or unparseable lock counts as held until it is older than
 * `unreadableGraceMs`: its owner may not have written it yet.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { z } from 'zod';
import { LockHeldError } from '../api/errors.js';
import { errorCode, isNotFound } from '../utils/fs-helpers.js';

export const DEFAULT_UNREADABLE_GRACE_MS = 5_000;

const LockContentSchema = z.object({
  pid: z.number().int(),
  started_at: z.string(),
  started_ms: z.number(),
});

export interface BuildLockOptions {
  staleAfterMs: number;
  /** How long an empty or unparseable lock file is left alone */
  unreadableGraceMs?: number;
  /** How long to keep retrying while a live holder exists (default: fail immediately) */
  waitMs?: number;
  logger?: Logger;
  /** Liveness check, overridable for tests */
  isProcessAlive?: (pid: number) => boolean;
  now?: () => number;
}

export interface BuildLockHandle {
  readonly lockPath: string;
  release(): Promise<void>;
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: exists but owned by someone else
    return errorCode(error) === 'EPERM';
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function backoff(attempt: number): number {
  return Math.min(50 * 2 ** attempt, 1000);
}

type LockState =
  | { status: 'gone' }
  | { status: 'held'; pid: number; startedMs: number }
  | { status: 'unreadable'; modifiedMs: number };

async function readLockState(lockPath: string): Promise<LockState> {
  let content: string;
  let modifiedMs: number;
  try {
    modifiedMs = (await fs.stat(lockPath)).mtimeMs;
    content = await fs.readFile(lockPath, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      return { status: 'gone' };
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    // Still being written, or half-written by a crashed owner
    return { status: 'unreadable', modifiedMs };
  }
  const parsed = LockContentSchema.safeParse(raw);
  return parsed.success
    ? { status: 'held', pid: parsed.data.pid, startedMs: parsed.data.started_ms }
    : { status: 'unreadable', modifiedMs };
}

function staleReason(state: Exclude<LockState, { status: 'gone' }>, options: BuildLockOptions, now: number): string | null {
  if (state.status === 'unreadable') {
    const graceMs = options.unreadableGraceMs ?? DEFAULT_UNREADABLE_GRACE_MS;
    return now - state.modifiedMs > graceMs ? 'unreadable' : null;
  }
  const alive = options.isProcessAlive ?? isProcessAlive;
  if (!alive(state.pid)) {
    return 'owner-exited';
  }
  return now - state.startedMs > options.staleAfterMs ? 'expired' : null;
}

export async function acquireBuildLock(lockPath: string, options: BuildLockOptions): Promise<BuildLockHandle> {
  const now = options.now ?? Date.now;
  const started = now();
  let attempt = 0;

  await fs.mkdir(path.dirname(lockPath), { recursive: true });

  for (;;) {
    const token = `${process.pid}-${now()}-${attempt}`;
    try {
      const handle = await fs.open(lockPath, 'wx');
      try {
        await handle.writeFile(
          JSON.stringify({ pid: process.pid, started_at: new Date(now()).toISOString(), started_ms: now(), token }, null, 2)
        );
      } finally {
        await handle.close();
      }
      options.logger?.debug({ lockPath }, 'Build lock acquired');
      return createHandle(lockPath, token, options.logger);
    } catch (error) {
      if (errorCode(error) !== 'EEXIST') {
        throw error;
      }
    }

    const state = await readLockState(lockPath);
    if (state.status === 'gone') {
      continue;
    }

    const holderPid = state.status === 'held' ? state.pid : null;
    const reason = staleReason(state, options, now());
    if (reason) {
      options.logger?.warn({ lockPath, holderPid, reason }, 'Taking over stale build lock');
      await fs.rm(lockPath, { force: true });
      continue;
    }

    if (now() - started >= (options.waitMs ?? 0)) {
      throw new LockHeldError(lockPath, holderPid);
    }

    await sleep(backoff(attempt++));
  }
}

function createHandle(lockPath: string, token: string, logger?: Logger): BuildLockHandle {
  let released = false;
  return {
    lockPath,
    async release(): Promise<void> {
      if (released) {
        return;
      }
      released = true;

      // Only remove the file if it is still ours
      let content: string;
      try {
        content = await fs.readFile(lockPath, 'utf8');
      } catch (error) {
        if (isNotFound(error)) {
          return;
        }
        throw error;
      }
      if (content.includes(`"token": "${token}"`)) {
        await fs.rm(lockPath, { force: true });
        logger?.debug({ lockPath }, 'Build lock released');
      } else {
        logger?.warn({ lockPath }, 'Build lock was taken over by another process; leaving it in place');
      }
    },
  };
}
