import { describe, it, expect } from 'vitest';
import { classifyPrequantizedModel, detectWeightFormatFromName } from '../../../src/core/prequantized.js';

describe('detectWeightFormatFromName', () => {
  it.each([
    ['acme/Llama-3-8B-trt-AWQ', 'int4_awq'],
    ['acme/Llama-3-8B-TRT-FP8', 'fp8'],
    ['acme/llama-8bit-trt', 'fp8'],
    ['acme/llama-8-bit-trt', 'fp8'],
  ] as const)('reads %s as %s', (modelId, format) => {
    expect(detectWeightFormatFromName(modelId)).toBe(format);
  });

  it('has no format for int8 or plain names', () => {
    expect(detectWeightFormatFromName('acme/llama-trt-int8')).toBeNull();
    expect(detectWeightFormatFromName('acme/llama-trt-INT-8-bit')).toBeNull();
    expect(detectWeightFormatFromName('acme/llama-3-8b')).toBeNull();
  });
});

describe('classifyPrequantizedModel', () => {
  it('recognises a hub repository published for the engine', () => {
    expect(classifyPrequantizedModel(' acme/Tiny-TRT-FP8 ')).toEqual({
      modelId: 'acme/Tiny-TRT-FP8',
      weightFormat: 'fp8',
    });
  });

  it('needs the engine named in the repository', () => {
    expect(classifyPrequantizedModel('acme/Tiny-AWQ')).toBeNull();
    expect(classifyPrequantizedModel('acme/Tiny-trt')).toBeNull();
  });

  it('never treats a local path as pre-quantized', () => {
    expect(classifyPrequantizedModel('./trt-awq')).toBeNull();
    expect(classifyPrequantizedModel('/models/x-trt-awq')).toBeNull();
    expect(classifyPrequantizedModel('models/nested/x-trt-awq')).toBeNull();
  });
});
