/**
 * Build Pipeline
 *
 * Drives one build from a configuration snapshot to a validated engine:
 *
 * ```
 * start → [wipe] → (cache check) → remote_resolve → {quantize | fetch_checkpoint}
 *       → {compile} → validate → persist_record → [push] → done
 * ```
 *
 * Models published already quantized take `fetch_checkpoint` from their own
 * repository instead of `quantize`.
 *
 * The record is written only after the engine validates, so an interrupted
 * run always leaves the next one a reason to rebuild.
 *
 * @module core/build-pipeline
 */

import * as path from 'node:path';
import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { ArtifactStoreError, ConfigurationError } from '../api/errors.js';
import {
  buildMetadataFor,
  checkpointDescriptor,
  checkpointMetadataFor,
  checkpointPrefix,
  engineDescriptor,
  engineLabel,
  writeBuildMetadataIfAbsent,
} from './artifact-layout.js';
import {
  removeArtifactDirectory,
  removeStaleArtifacts,
  resolveArtifactPath,
  wipeForModeSwitch,
  type WipeSummary,
} from './artifact-cleanup.js';
import { ArtifactValidator } from './artifact-validator.js';
import { acquireBuildLock } from './build-lock.js';
import { BuildSignatureEngine } from './build-signature.js';
import { classifyPrequantizedModel, type PrequantizedModel } from './prequantized.js';
import { describePolicy, resolvePolicy } from './quantization-policy.js';
import { RebuildDecisionEngine } from './rebuild-decision.js';
import { RemoteArtifactResolver } from './remote-artifact-resolver.js';
import { assertBuildableSnapshot, parsePrecisionMode } from './tracked-parameters.js';
import { attemptWithRetry } from '../utils/retry.js';
import type { ArtifactStore } from '../adapters/artifact-store.js';
import type { EngineCompiler, Quantizer, ToolResult } from '../adapters/build-tools.js';
import type { ToolRunOutput } from '../adapters/tool-runner.js';
import type {
  ArtifactExpectations,
  ResolvedRemoteArtifact,
  ValidationReport,
  ValidationWarning,
} from '../types/artifacts.js';
import type { BuildEvaluation, BuildSignature, ConfigurationSnapshot, RebuildDecision } from '../types/build.js';
import type { ArchitectureDescriptor, QuantizationPolicy, ToolchainInfo, WeightFormat } from '../types/hardware.js';
import type { PipelineConfig } from '../types/pipeline.js';

export type PipelineStage =
  | 'start'
  | 'wipe'
  | 'cache_check'
  | 'remote_resolve'
  | 'quantize'
  | 'fetch_checkpoint'
  | 'compile'
  | 'validate'
  | 'persist_record'
  | 'push'
  | 'done';

export type PipelineOutcome = 'cache-hit' | 'built' | 'remote-engine' | 'remote-checkpoint';

export interface BuildPipelineEvents {
  stage: (stage: PipelineStage) => void;
  decision: (evaluation: BuildEvaluation) => void;
  wipe: (summary: WipeSummary) => void;
  warning: (warning: ValidationWarning, directory: string) => void;
  remote: (artifact: ResolvedRemoteArtifact | null) => void;
  tool: (output: ToolRunOutput) => void;
}

export interface PipelineRequest {
  snapshot: ConfigurationSnapshot;
  architecture: ArchitectureDescriptor;
  /** Engine toolchain of this host; unknown parts are left out of labels and checks */
  toolchain?: ToolchainInfo;
  /** Skip the cache check and rebuild from scratch */
  force?: boolean;
  /** Upload locally built artifacts to the configured store */
  push?: boolean;
}

export interface PipelineResult {
  outcome: PipelineOutcome;
  stages: PipelineStage[];
  decision: RebuildDecision;
  policy: QuantizationPolicy;
  engineDir: string;
  checkpointDir: string;
  validation: ValidationReport;
  wiped: boolean;
  pushed: boolean;
  signature: BuildSignature;
}

export interface BuildPipelineDeps {
  config: PipelineConfig;
  logger: Logger;
  quantizer: Quantizer;
  compiler: EngineCompiler;
  store?: ArtifactStore | null;
  /** Hub holding model repositories, for pre-quantized checkpoints */
  modelStore?: ArtifactStore | null;
  validator?: ArtifactValidator;
  signer?: BuildSignatureEngine;
  decisions?: RebuildDecisionEngine;
  clock?: () => Date;
}

interface RunContext {
  request: PipelineRequest;
  stages: PipelineStage[];
  policy: QuantizationPolicy;
  engineDir: string;
  checkpointDir: string;
  toolchain: ToolchainInfo;
  prequantized: PrequantizedSource | null;
  expected: ArtifactExpectations & { weightFormat: WeightFormat };
}

interface PrequantizedSource {
  model: PrequantizedModel;
  store: ArtifactStore;
}

const UNKNOWN_TOOLCHAIN: ToolchainInfo = { engineVersion: null, cudaVersion: null };

export class BuildPipeline extends EventEmitter<BuildPipelineEvents> {
  private readonly config: PipelineConfig;
  private readonly logger: Logger;
  private readonly quantizer: Quantizer;
  private readonly compiler: EngineCompiler;
  private readonly store: ArtifactStore | null;
  private readonly modelStore: ArtifactStore | null;
  private readonly validator: ArtifactValidator;
  private readonly signer: BuildSignatureEngine;
  private readonly decisions: RebuildDecisionEngine;
  private readonly clock: () => Date;

  constructor(deps: BuildPipelineDeps) {
    super();
    this.config = deps.config;
    this.logger = deps.logger;
    this.quantizer = deps.quantizer;
    this.compiler = deps.compiler;
    this.store = deps.store ?? null;
    this.modelStore = deps.modelStore ?? null;
    this.validator = deps.validator ?? new ArtifactValidator({ logger: deps.logger });
    this.signer = deps.signer ?? new BuildSignatureEngine({ logger: deps.logger });
    this.decisions = deps.decisions ?? new RebuildDecisionEngine({ signer: this.signer, logger: deps.logger });
    this.clock = deps.clock ?? (() => new Date());
  }

  public async run(request: PipelineRequest): Promise<PipelineResult> {
    const stages: PipelineStage[] = [];
    this.enter(stages, 'start');

    const { snapshot, architecture } = request;
    assertBuildableSnapshot(snapshot);
    if (request.push && !this.store) {
      throw new ConfigurationError('remote.kind', '--push requires a configured artifact store');
    }

    const prequantized = this.prequantizedSource(snapshot.MODEL_ID);
    const policy = resolvePolicy(architecture, parsePrecisionMode(snapshot.PRECISION_MODE), {
      weightFormat: prequantized?.model.weightFormat,
    });
    const toolchain = request.toolchain ?? UNKNOWN_TOOLCHAIN;
    this.logger.info(
      { arch: architecture.code || 'unknown', family: architecture.family, policy: describePolicy(policy) },
      'Resolved quantization policy'
    );

    const lock = await acquireBuildLock(this.config.lockPath, {
      staleAfterMs: this.config.lockStaleAfterMs,
      logger: this.logger,
    });

    try {
      return await this.execute({
        request,
        stages,
        policy,
        engineDir: resolveArtifactPath(snapshot.ENGINE_DIR, this.config.layout),
        checkpointDir: resolveArtifactPath(snapshot.CHECKPOINT_DIR, this.config.layout),
        toolchain,
        prequantized,
        expected: { precisionMode: policy.precisionMode, weightFormat: policy.weightFormat, toolchain },
      });
    } finally {
      await lock.release();
    }
  }

  private async execute(ctx: RunContext): Promise<PipelineResult> {
    const { request, stages, policy, engineDir, checkpointDir } = ctx;
    const { snapshot, architecture } = request;
    const { layout, recordPath } = this.config;
    const force = request.force ?? false;

    const evaluation = await this.decisions.evaluate(snapshot, recordPath);
    let decision = evaluation.decision;
    let wiped = false;

    if (evaluation.modeSwitch.forcedFullWipe) {
      this.enter(stages, 'wipe');
      const summary = await wipeForModeSwitch({
        record: decision.record,
        snapshot,
        modeSwitch: evaluation.modeSwitch,
        config: this.config,
        logger: this.logger,
      });
      this.emit('wipe', summary);
      decision = this.decisions.decide(snapshot, null);
      wiped = true;
    }

    this.emit('decision', { decision, modeSwitch: evaluation.modeSwitch });
    this.logger.info(
      { reason: decision.reason, changedKeys: decision.changedKeys, force },
      decision.rebuild || force ? 'Rebuild required' : 'Build record is current'
    );

    const signature = this.signer.sign(snapshot);
    const engine = engineDescriptor(engineDir, layout, ctx.expected);
    const checkpoint = checkpointDescriptor(checkpointDir, layout, {
      precisionMode: policy.precisionMode,
      weightFormat: policy.weightFormat,
    });
    const base = { decision, policy, engineDir, checkpointDir, wiped, signature };

    if (!force && !decision.rebuild) {
      this.enter(stages, 'cache_check');
      const cached = await this.validator.validate(engine, architecture);
      if (cached.ok) {
        this.reportWarnings(cached.val);
        this.enter(stages, 'done');
        this.logger.info({ engineDir }, 'Cached engine is valid; nothing to build');
        return { ...base, outcome: 'cache-hit', stages, validation: cached.val, pushed: false };
      }
      this.logger.warn(
        { engineDir, code: cached.val.code, error: cached.val.message },
        'Cached engine failed validation; rebuilding it'
      );
      await removeArtifactDirectory(engineDir, layout);
    } else {
      await removeStaleArtifacts(decision.record, snapshot, layout, this.logger);
    }

    let outcome: PipelineOutcome = 'built';
    const remote = await this.resolveRemote(ctx);
    if (remote?.kind === 'engine') {
      outcome = 'remote-engine';
    } else if (remote?.kind === 'checkpoint') {
      outcome = 'remote-checkpoint';
    }

    let quantizedLocally = false;
    if (!remote) {
      const reusable = !force && !decision.rebuild && (await this.validator.validate(checkpoint, architecture)).ok;
      if (reusable) {
        this.logger.info({ checkpointDir }, 'Reusing existing checkpoint');
      } else if (ctx.prequantized) {
        this.enter(stages, 'fetch_checkpoint');
        await this.fetchPrequantizedCheckpoint(ctx, ctx.prequantized);
        await this.writeCheckpointMetadata(ctx, 'prequantized');
      } else {
        this.enter(stages, 'quantize');
        this.recordTool(await this.quantizer.quantize({ snapshot, policy, outputDir: checkpointDir }));
        quantizedLocally = true;

        const produced = await this.validator.validate(checkpoint, architecture);
        if (produced.err) {
          throw produced.val;
        }
        await this.writeCheckpointMetadata(ctx, 'quantized');
      }
    }

    if (outcome !== 'remote-engine') {
      this.enter(stages, 'compile');
      const output = this.recordTool(
        await this.compiler.compile({ snapshot, policy, checkpointDir, outputDir: engineDir })
      );
      const written = await writeBuildMetadataIfAbsent(
        path.join(engineDir, layout.metadataFile),
        buildMetadataFor(
          snapshot,
          architecture,
          policy,
          this.clock().toISOString(),
          [output.command, ...output.args],
          ctx.toolchain
        )
      );
      if (written) {
        this.logger.debug({ engineDir }, 'Wrote build metadata');
      }
    }

    this.enter(stages, 'validate');
    const validation = await this.validator.validate(engine, architecture);
    if (validation.err) {
      throw validation.val;
    }
    this.reportWarnings(validation.val);

    this.enter(stages, 'persist_record');
    await this.signer.persist(snapshot, signature, recordPath, this.clock().toISOString());

    let pushed = false;
    if (request.push && this.store && outcome !== 'remote-engine') {
      this.enter(stages, 'push');
      pushed = await this.push(this.store, ctx, quantizedLocally);
    }

    this.enter(stages, 'done');
    this.logger.info({ outcome, engineDir, pushed }, 'Build finished');
    return { ...base, outcome, stages, validation: validation.val, pushed };
  }

  private async resolveRemote(ctx: RunContext): Promise<ResolvedRemoteArtifact | null> {
    const { remote } = this.config;
    if (!this.store || !remote.ref) {
      return null;
    }

    this.enter(ctx.stages, 'remote_resolve');
    const resolved = await this.resolverFor(this.store).resolve({
      ref: remote.ref,
      architecture: ctx.request.architecture,
      preference: remote.preference,
      preferredLabel: remote.engineLabel || undefined,
      engineKind: ctx.request.snapshot.INFERENCE_ENGINE,
      engineDir: ctx.engineDir,
      checkpointDir: ctx.checkpointDir,
      expected: ctx.expected,
    });

    const artifact = resolved.some ? resolved.val : null;
    this.emit('remote', artifact);
    return artifact;
  }

  private prequantizedSource(modelId: string): PrequantizedSource | null {
    const model = classifyPrequantizedModel(modelId);
    if (!model) {
      return null;
    }
    if (!this.modelStore) {
      throw new ConfigurationError(
        'remote.hub_endpoint',
        `${model.modelId} is published pre-quantized; a model hub is needed to fetch it`
      );
    }
    this.logger.info({ model: model.modelId, weightFormat: model.weightFormat }, 'Model is pre-quantized');
    return { model, store: this.modelStore };
  }

  private async fetchPrequantizedCheckpoint(ctx: RunContext, source: PrequantizedSource): Promise<void> {
    const { model, store } = source;
    const prefix = this.config.remote.prequantizedPrefix;
    const fetched = await this.resolverFor(store).fetchCheckpoint({
      ref: model.modelId,
      prefix,
      architecture: ctx.request.architecture,
      checkpointDir: ctx.checkpointDir,
    });
    if (fetched.none) {
      throw new ArtifactStoreError('NOT_FOUND', `${model.modelId} has no usable checkpoint under ${prefix}`, {
        ref: model.modelId,
        prefix,
      });
    }
    this.logger.info({ model: model.modelId, checkpointDir: ctx.checkpointDir }, 'Fetched pre-quantized checkpoint');
  }

  private async writeCheckpointMetadata(ctx: RunContext, source: 'quantized' | 'prequantized'): Promise<void> {
    const written = await writeBuildMetadataIfAbsent(
      path.join(ctx.checkpointDir, this.config.layout.metadataFile),
      checkpointMetadataFor(ctx.request.snapshot, ctx.policy, this.clock().toISOString(), source)
    );
    if (written) {
      this.logger.debug({ checkpointDir: ctx.checkpointDir }, 'Wrote checkpoint metadata');
    }
  }

  private resolverFor(store: ArtifactStore): RemoteArtifactResolver {
    const { remote, layout } = this.config;
    return new RemoteArtifactResolver({
      store,
      layout,
      enginesPrefix: remote.enginesPrefix,
      checkpointsPrefix: remote.checkpointsPrefix,
      retry: remote.retry,
      validator: this.validator,
      logger: this.logger,
    });
  }

  /**
   * Upload failures are reported, not thrown: the record is already
   * persisted and the local build stands.
   */
  private async push(store: ArtifactStore, ctx: RunContext, includeCheckpoint: boolean): Promise<boolean> {
    const { remote } = this.config;
    const { snapshot, architecture } = ctx.request;
    const label = engineLabel(architecture, snapshot.INFERENCE_ENGINE, ctx.policy.weightFormat, ctx.toolchain);

    const uploads: Array<{ localDir: string; prefix: string }> = [
      { localDir: ctx.engineDir, prefix: `${remote.enginesPrefix}/${label}` },
    ];
    if (includeCheckpoint) {
      uploads.push({
        localDir: ctx.checkpointDir,
        prefix: checkpointPrefix(remote.checkpointsPrefix, ctx.policy.weightFormat),
      });
    }

    for (const upload of uploads) {
      const result = await attemptWithRetry(() => store.upload(remote.ref, upload.localDir, upload.prefix), {
        ...remote.retry,
        onRetry: ({ attempt, delayMs }) => {
          this.logger.warn({ prefix: upload.prefix, attempt, delayMs }, 'Upload failed; retrying');
        },
      });
      if (result.err) {
        const error = result.val.error;
        this.logger.error(
          { ref: remote.ref, prefix: upload.prefix, error: error instanceof Error ? error.message : String(error) },
          'Push failed; local build is kept'
        );
        return false;
      }
      this.logger.info({ ref: remote.ref, prefix: upload.prefix, files: result.val }, 'Pushed artifacts');
    }
    return true;
  }

  private recordTool(result: ToolResult): ToolRunOutput {
    if (result.err) {
      this.logger.error(
        { tool: result.val.tool, exitCode: result.val.exitCode, stderr: result.val.stderrTail },
        'External tool failed'
      );
      throw result.val;
    }
    this.emit('tool', result.val);
    this.logger.info({ tool: result.val.tool, durationMs: result.val.durationMs }, 'External tool finished');
    return result.val;
  }

  private reportWarnings(report: ValidationReport): void {
    for (const warning of report.warnings) {
      this.emit('warning', warning, report.directory);
    }
  }

  private enter(stages: PipelineStage[], stage: PipelineStage): void {
    stages.push(stage);
    this.emit('stage', stage);
    this.logger.debug({ stage }, 'Pipeline stage');
  }
}
