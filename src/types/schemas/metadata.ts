/**
 * Build metadata written next to a compiled engine or a quantized checkpoint
 * (build_metadata.json).
 *
 * @module schemas/metadata
 */

import { z } from 'zod';

export const BuildMetadataSchema = z.object({
  sm_arch: z.string().optional(),
  precision_mode: z.string().optional(),
  weight_format: z.string().optional(),
  kv_cache_dtype: z.string().optional(),
  model_id: z.string().optional(),
  inference_engine: z.string().optional(),
  max_batch_size: z.number().int().optional(),
  max_input_len: z.number().int().optional(),
  max_output_len: z.number().int().optional(),
  gpu_name: z.string().optional(),
  engine_toolchain_version: z.string().optional(),
  cuda_version: z.string().optional(),
  checkpoint_source: z.enum(['quantized', 'prequantized']).optional(),
  build_command: z.array(z.string()).optional(),
  built_at: z.string().optional(),
}).passthrough();

export type BuildMetadata = z.infer<typeof BuildMetadataSchema>;
