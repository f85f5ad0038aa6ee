/**
 * Quantizer and compiler collaborators.
 *
 * The pipeline only sees the Quantizer / EngineCompiler interfaces; the
 * command-backed implementations pass resolved policy fields as discrete
 * arguments and report "exit success + expected output present" as success.
 */

import * as path from 'node:path';
import { Err, type Result } from 'ts-results';
import { ExternalToolFailure } from '../api/errors.js';
import { pathExists } from '../utils/fs-helpers.js';
import { runTool, execaRunner, type CommandRunner, type ToolRunOutput } from './tool-runner.js';
import type { ConfigurationSnapshot } from '../types/build.js';
import type { QuantizationPolicy } from '../types/hardware.js';
import type { ToolCommand } from '../types/pipeline.js';

export interface QuantizeRequest {
  snapshot: ConfigurationSnapshot;
  policy: QuantizationPolicy;
  outputDir: string;
}

export interface CompileRequest {
  snapshot: ConfigurationSnapshot;
  policy: QuantizationPolicy;
  checkpointDir: string;
  outputDir: string;
}

export type ToolResult = Result<ToolRunOutput, ExternalToolFailure>;

export interface Quantizer {
  quantize(request: QuantizeRequest): Promise<ToolResult>;
}

export interface EngineCompiler {
  compile(request: CompileRequest): Promise<ToolResult>;
}

export function quantizerArgs(request: QuantizeRequest): string[] {
  const { snapshot, policy, outputDir } = request;
  const args = [
    '--model', snapshot.MODEL_ID,
    '--output_dir', outputDir,
    '--qformat', policy.weightFormat,
    '--kv_cache_dtype', policy.kvCacheDtype,
  ];
  if (policy.weightFormat === 'int4_awq' && snapshot.AWQ_BLOCK_SIZE) {
    args.push('--awq_block_size', snapshot.AWQ_BLOCK_SIZE);
  }
  if (snapshot.CALIB_SIZE) {
    args.push('--calib_size', snapshot.CALIB_SIZE);
  }
  return args;
}

export function compilerArgs(request: CompileRequest): string[] {
  const { snapshot, policy } = request;
  const maxBatchSize = Math.min(Number(snapshot.MAX_BATCH_SIZE), policy.maxBatchSize);
  const maxSeqLen = Number(snapshot.MAX_INPUT_LEN) + Number(snapshot.MAX_OUTPUT_LEN);
  return [
    '--checkpoint_dir', request.checkpointDir,
    '--output_dir', request.outputDir,
    '--max_batch_size', String(maxBatchSize),
    '--max_input_len', snapshot.MAX_INPUT_LEN,
    '--max_seq_len', String(maxSeqLen),
    '--max_num_tokens', String(policy.maxNumTokens),
    '--kv_cache_dtype', policy.kvCacheDtype,
  ];
}

async function requireOutput(
  result: ToolResult,
  tool: string,
  expectedFile: string
): Promise<ToolResult> {
  if (result.err) {
    return result;
  }
  if (!(await pathExists(expectedFile))) {
    return Err(
      new ExternalToolFailure(tool, `exited successfully but did not produce ${expectedFile}`, 0, result.val.stderr)
    );
  }
  return result;
}

export class CommandQuantizer implements Quantizer {
  constructor(
    private readonly command: ToolCommand,
    private readonly runner: CommandRunner = execaRunner
  ) {}

  public async quantize(request: QuantizeRequest): Promise<ToolResult> {
    const result = await runTool('quantizer', this.command, quantizerArgs(request), this.runner);
    return requireOutput(result, 'quantizer', path.join(request.outputDir, 'config.json'));
  }
}

export class CommandEngineCompiler implements EngineCompiler {
  constructor(
    private readonly command: ToolCommand,
    private readonly primaryFile: string,
    private readonly runner: CommandRunner = execaRunner
  ) {}

  public async compile(request: CompileRequest): Promise<ToolResult> {
    const result = await runTool('compiler', this.command, compilerArgs(request), this.runner);
    return requireOutput(result, 'compiler', path.join(request.outputDir, this.primaryFile));
  }
}
