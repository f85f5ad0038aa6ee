/**
 * Pre-quantized Models
 *
 * Model repositories that already publish an engine-ready checkpoint are
 * recognised by name (`org/Model-trt-awq`, `org/Model-TRT-FP8`). Their weight
 * format comes from the name, and the build fetches the published checkpoint
 * instead of quantizing.
 */

import type { WeightFormat } from '../types/hardware.js';

export interface PrequantizedModel {
  modelId: string;
  weightFormat: WeightFormat;
}

const FORMAT_HINTS: ReadonlyArray<{ pattern: RegExp; format: WeightFormat }> = [
  { pattern: /awq/, format: 'int4_awq' },
  { pattern: /fp8|8-?bit/, format: 'fp8' },
];

/**
 * Weight format named in a model id, or null. Int8 smooth-quant names are
 * not a supported format and yield null.
 */
export function detectWeightFormatFromName(modelId: string): WeightFormat | null {
  const lower = modelId.toLowerCase();
  if (/int-?8/.test(lower)) {
    return null;
  }
  return FORMAT_HINTS.find((hint) => hint.pattern.test(lower))?.format ?? null;
}

const HUB_REPO_ID = /^[\w.-]+\/[\w.-]+$/;

/**
 * A hub repository id (`org/name`) that mentions `trt` and a weight format.
 * Local paths never qualify.
 */
export function classifyPrequantizedModel(modelId: string): PrequantizedModel | null {
  const trimmed = modelId.trim();
  if (!HUB_REPO_ID.test(trimmed) || trimmed.startsWith('.') || !/trt/i.test(trimmed)) {
    return null;
  }
  const weightFormat = detectWeightFormatFromName(trimmed);
  return weightFormat ? { modelId: trimmed, weightFormat } : null;
}
