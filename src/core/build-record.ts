/**
 * Build record file format.
 *
 * Plain `key=value` lines so operators can cat and diff it:
 *
 * ```
 * # engine-build record
 * BUILD_MODEL_ID=org/model
 * ...
 * signature=<sha256 hex>
 * timestamp=2026-01-01T00:00:00.000Z
 * ```
 */

import { isTrackedParameter } from './tracked-parameters.js';
import {
  RECORD_KEY_PREFIX,
  TRACKED_PARAMETERS,
  type BuildSignature,
  type ConfigurationSnapshot,
  type PersistedBuildRecord,
  type TrackedParameterName,
} from '../types/build.js';

const RECORD_HEADER = '# engine-build record';
const SIGNATURE_KEY = 'signature';
const TIMESTAMP_KEY = 'timestamp';

export function escapeRecordValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/\r/g, '\\r');
}

export function unescapeRecordValue(value: string): string {
  return value.replace(/\\([\\nr])/g, (_match, char: string) => {
    if (char === 'n') return '\n';
    if (char === 'r') return '\r';
    return '\\';
  });
}

export function serializeBuildRecord(
  snapshot: ConfigurationSnapshot,
  signature: BuildSignature,
  timestamp: string
): string {
  const lines = [RECORD_HEADER];
  const names = [...TRACKED_PARAMETERS].sort();
  for (const name of names) {
    lines.push(`${RECORD_KEY_PREFIX}${name}=${escapeRecordValue(snapshot[name])}`);
  }
  lines.push(`${SIGNATURE_KEY}=${signature}`);
  lines.push(`${TIMESTAMP_KEY}=${timestamp}`);
  return `${lines.join('\n')}\n`;
}

/**
 * Parse record file contents. Returns null when the content is not a
 * record (no signature line, or no parameter entries).
 */
export function parseBuildRecord(content: string): PersistedBuildRecord | null {
  const parameters: Partial<Record<TrackedParameterName, string>> = {};
  let signature: string | null = null;
  let timestamp = '';
  let entries = 0;

  for (const rawLine of content.split('\n')) {
    const line = rawLine.replace(/\r$/, '');
    if (line.trim() === '' || line.startsWith('#')) {
      continue;
    }

    const separator = line.indexOf('=');
    if (separator <= 0) {
      // Not key=value: the file is not ours or is truncated mid-line
      return null;
    }

    const key = line.slice(0, separator);
    const value = unescapeRecordValue(line.slice(separator + 1));

    if (key === SIGNATURE_KEY) {
      signature = value;
    } else if (key === TIMESTAMP_KEY) {
      timestamp = value;
    } else if (key.startsWith(RECORD_KEY_PREFIX)) {
      const name = key.slice(RECORD_KEY_PREFIX.length);
      if (isTrackedParameter(name)) {
        parameters[name] = value;
        entries += 1;
      }
    }
  }

  if (signature === null || signature === '' || entries === 0) {
    return null;
  }

  return { parameters, signature, timestamp };
}
