/**
 * Rebuild Decision Engine
 *
 * Diffs the current snapshot against the persisted build record, confirms
 * the result with an independent signature comparison, and detects engine
 * kind switches that require a full wipe.
 *
 * @module core/rebuild-decision
 */

import type { Logger } from 'pino';
import { BuildSignatureEngine, signaturesMatch } from './build-signature.js';
import { lazyLog } from '../utils/logger-helpers.js';
import {
  TRACKED_PARAMETERS,
  type BuildEvaluation,
  type ConfigurationSnapshot,
  type ModeSwitchDecision,
  type PersistedBuildRecord,
  type RebuildDecision,
  type TrackedParameterName,
} from '../types/build.js';

function normalizeKind(value: string | undefined): string {
  return (value ?? '').trim().toLowerCase();
}

/**
 * Pure comparison of a snapshot against a record.
 */
export function diffAgainstRecord(
  snapshot: ConfigurationSnapshot,
  record: PersistedBuildRecord | null,
  currentSignature: string
): RebuildDecision {
  if (!record) {
    return { rebuild: true, changedKeys: [], signatureMatches: false, reason: 'no-record', record: null };
  }

  const changedKeys: TrackedParameterName[] = [...TRACKED_PARAMETERS]
    .sort()
    .filter((name) => snapshot[name] !== (record.parameters[name] ?? ''));

  const signatureMatches = signaturesMatch(currentSignature, record.signature);

  if (changedKeys.length > 0) {
    return { rebuild: true, changedKeys, signatureMatches, reason: 'parameters-changed', record };
  }

  if (!signatureMatches) {
    return { rebuild: true, changedKeys, signatureMatches, reason: 'signature-mismatch', record };
  }

  return { rebuild: false, changedKeys, signatureMatches, reason: 'up-to-date', record };
}

/**
 * Engine kind switch: only INFERENCE_ENGINE is compared. Without a recorded
 * previous kind there is nothing to switch from.
 */
export function detectModeSwitch(
  snapshot: ConfigurationSnapshot,
  record: PersistedBuildRecord | null
): ModeSwitchDecision {
  const currentKind = normalizeKind(snapshot.INFERENCE_ENGINE);
  const previous = normalizeKind(record?.parameters.INFERENCE_ENGINE);

  if (previous === '') {
    return { forcedFullWipe: false, previousKind: null, currentKind };
  }

  return { forcedFullWipe: previous !== currentKind, previousKind: previous, currentKind };
}

export class RebuildDecisionEngine {
  private readonly signer: BuildSignatureEngine;
  private readonly logger?: Logger;

  constructor(options: { signer?: BuildSignatureEngine; logger?: Logger } = {}) {
    this.logger = options.logger;
    this.signer = options.signer ?? new BuildSignatureEngine({ logger: options.logger });
  }

  public async needsRebuild(snapshot: ConfigurationSnapshot, recordPath: string): Promise<RebuildDecision> {
    const record = await this.signer.readRecord(recordPath);
    return this.decide(snapshot, record);
  }

  /**
   * Rebuild decision and mode-switch check from a single read of the record.
   */
  public async evaluate(snapshot: ConfigurationSnapshot, recordPath: string): Promise<BuildEvaluation> {
    const record = await this.signer.readRecord(recordPath);
    const modeSwitch = detectModeSwitch(snapshot, record);

    if (modeSwitch.forcedFullWipe) {
      this.logger?.warn(
        { previousKind: modeSwitch.previousKind, currentKind: modeSwitch.currentKind },
        'Inference engine changed; all cached artifacts will be wiped'
      );
    }

    return { decision: this.decide(snapshot, record), modeSwitch };
  }

  public decide(snapshot: ConfigurationSnapshot, record: PersistedBuildRecord | null): RebuildDecision {
    const decision = diffAgainstRecord(snapshot, record, this.signer.sign(snapshot));

    lazyLog(
      this.logger,
      'debug',
      () => ({
        reason: decision.reason,
        changedKeys: decision.changedKeys,
        changes: decision.changedKeys.map((name) => ({
          name,
          previous: record?.parameters[name] ?? '',
          current: snapshot[name],
        })),
      }),
      'Rebuild decision'
    );

    return decision;
  }
}
