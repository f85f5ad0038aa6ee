/**
 * engine-build commands
 *
 * Argument parsing and the four commands behind the `engine-build` binary.
 * Human-readable output goes through `out`; logs go to stderr through pino.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { Logger } from 'pino';
import { BuildCacheError, ConfigurationError, toBuildCacheError } from '../api/errors.js';
import {
  collectParameterSource,
  configDirectory,
  findPackageRoot,
  getPipelineConfig,
  loadConfig,
  resolveArtifactDirectories,
} from '../config/loader.js';
import { checkpointDescriptor, engineDescriptor } from '../core/artifact-layout.js';
import { resolveArtifactPath } from '../core/artifact-cleanup.js';
import { ArtifactValidator } from '../core/artifact-validator.js';
import { BuildPipeline } from '../core/build-pipeline.js';
import { BuildSignatureEngine } from '../core/build-signature.js';
import { detectToolchain, loadGpuNameTable, printArchitecture, probeHardware } from '../core/hardware-probe.js';
import { classifyPrequantizedModel } from '../core/prequantized.js';
import { describePolicy, resolvePolicy } from '../core/quantization-policy.js';
import { RebuildDecisionEngine } from '../core/rebuild-decision.js';
import { captureSnapshot, parsePrecisionMode } from '../core/tracked-parameters.js';
import { createArtifactStore, createModelHubStore } from '../adapters/artifact-store.js';
import { CommandEngineCompiler, CommandQuantizer } from '../adapters/build-tools.js';
import { formatSize } from '../utils/fs-helpers.js';
import { createLogger, resolveLogLevel } from '../utils/logger-helpers.js';
import { TRACKED_PARAMETERS, type ConfigurationSnapshot } from '../types/build.js';
import type { ArchitectureDescriptor, ToolchainInfo } from '../types/hardware.js';
import type { PipelineConfig } from '../types/pipeline.js';
import type { BuildConfig } from '../types/schemas/config.js';

type Env = Readonly<Record<string, string | undefined>>;

export interface CliArgs {
  _: string[];
  force: boolean;
  push: boolean;
  json: boolean;
  help: boolean;
  version: boolean;
  config?: string;
  env?: string;
  mode?: string;
  kind?: string;
  dir?: string;
}

type ValueFlag = 'config' | 'env' | 'mode' | 'kind' | 'dir';
type BooleanFlag = 'force' | 'push' | 'json' | 'help' | 'version';

const VALUE_FLAGS: readonly ValueFlag[] = ['config', 'env', 'mode', 'kind', 'dir'];
const BOOLEAN_FLAGS: readonly BooleanFlag[] = ['force', 'push', 'json', 'help', 'version'];

function isValueFlag(name: string): name is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === name);
}

function isBooleanFlag(name: string): name is BooleanFlag {
  return BOOLEAN_FLAGS.some((flag) => flag === name);
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const result: CliArgs = { _: [], force: false, push: false, json: false, help: false, version: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (arg === '-h') {
      result.help = true;
      continue;
    }
    if (!arg.startsWith('--')) {
      result._.push(arg);
      continue;
    }

    const body = arg.slice(2);
    const separator = body.indexOf('=');
    const name = separator >= 0 ? body.slice(0, separator) : body;
    const inline = separator >= 0 ? body.slice(separator + 1) : undefined;
    if (isBooleanFlag(name)) {
      result[name] = true;
    } else if (isValueFlag(name)) {
      const value = inline ?? argv[i + 1];
      if (value === undefined || (inline === undefined && value.startsWith('--'))) {
        throw new ConfigurationError(`--${name}`, 'requires a value');
      }
      if (inline === undefined) {
        i++;
      }
      result[name] = value;
    } else {
      throw new ConfigurationError(`--${name}`, 'unknown option');
    }
  }

  return result;
}

export const HELP_TEXT = `
engine-build - Build, cache and validate GPU inference engines

USAGE:
  engine-build <command> [options]

COMMANDS:
  build                     Build the engine, reusing cached or remote artifacts
    --force                 Rebuild even when the cached engine is current
    --push                  Upload locally built artifacts to the remote store

  status                    Show tracked parameters, the build record and
                            whether the next build would rebuild

  policy                    Show the quantization policy for this GPU
    --mode <compact|base>   Precision mode (default: PRECISION_MODE)

  validate                  Validate an artifact directory against this GPU
    --kind <engine|checkpoint>
    --dir <path>            Directory (default: ENGINE_DIR / CHECKPOINT_DIR)

OPTIONS:
  --config <path>           Configuration file (default: config/build.yaml)
  --env <name>              Configuration environment (production|development|test)
  --json                    Output as JSON
  --help                    Show this help message
  --version                 Show version

ENVIRONMENT VARIABLES:
  MODEL_ID, PRECISION_MODE, INFERENCE_ENGINE, ...
                            Override the tracked parameters in the config file
  GPU_SM_ARCH               Override GPU detection (e.g. sm89)
  ENGINE_TOOLCHAIN_VERSION  Override the engine compiler release in engine labels
  CUDA_VERSION              Override the CUDA toolkit version (e.g. 12.4)
  HF_TOKEN                  Model hub token for the hub artifact store
  ENGINE_BUILD_LOG_LEVEL    Log level (trace|debug|info|warn|error|silent)
`;

export function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(join(findPackageRoot(), 'package.json'), 'utf8'));
  if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
    return raw.version;
  }
  return 'unknown';
}

export interface CliContext {
  args: CliArgs;
  config: BuildConfig;
  pipelineConfig: PipelineConfig;
  snapshot: ConfigurationSnapshot;
  architecture: ArchitectureDescriptor;
  /** Probed on first use; only builds need it */
  toolchain: () => ToolchainInfo;
  logger: Logger;
  env: Env;
  out: (line: string) => void;
}

export interface CliOptions {
  env?: Env;
  cwd?: string;
  out?: (line: string) => void;
  err?: (line: string) => void;
  /** Hardware probe; tests pass a fixed architecture */
  probe?: (config: PipelineConfig, env: Env) => ArchitectureDescriptor;
  toolchainDetector?: (config: PipelineConfig, env: Env, engineKind: string) => ToolchainInfo;
  logger?: Logger;
}

const defaultProbe = (config: PipelineConfig, env: Env): ArchitectureDescriptor =>
  probeHardware({ env, nameTable: loadGpuNameTable(configDirectory()), fp8MinSm: config.fp8MinSm });

const defaultToolchainDetector = (config: PipelineConfig, env: Env, engineKind: string): ToolchainInfo =>
  detectToolchain({ env, versionCommand: config.engineVersionCommands[engineKind.trim().toLowerCase()] });

function createContext(args: CliArgs, options: CliOptions): CliContext {
  const env = options.env ?? process.env;
  const config = loadConfig(args.config, args.env, env);
  const pipelineConfig = getPipelineConfig(config, options.cwd ?? process.cwd());
  const logger =
    options.logger ?? createLogger({ level: resolveLogLevel(config.logging.level, env), stderr: true });
  const snapshot = captureSnapshot(resolveArtifactDirectories(collectParameterSource(config, env), config));
  const architecture = (options.probe ?? defaultProbe)(pipelineConfig, env);
  const toolchainDetector = options.toolchainDetector ?? defaultToolchainDetector;
  let toolchain: ToolchainInfo | undefined;

  return {
    args,
    config,
    pipelineConfig,
    snapshot,
    architecture,
    toolchain: () => {
      toolchain ??= toolchainDetector(pipelineConfig, env, snapshot.INFERENCE_ENGINE);
      return toolchain;
    },
    logger,
    env,
    out: options.out ?? ((line) => console.log(line)),
  };
}

export async function buildCommand(ctx: CliContext): Promise<number> {
  const { pipelineConfig, logger } = ctx;
  const storeOptions = { hubCli: pipelineConfig.tools.hubCli, env: ctx.env, logger };
  const store = createArtifactStore(pipelineConfig.remote, storeOptions);
  const modelStore = classifyPrequantizedModel(ctx.snapshot.MODEL_ID)
    ? createModelHubStore(pipelineConfig.remote, storeOptions)
    : null;

  const pipeline = new BuildPipeline({
    config: pipelineConfig,
    logger,
    store,
    modelStore,
    quantizer: new CommandQuantizer(pipelineConfig.tools.quantizer),
    compiler: new CommandEngineCompiler(pipelineConfig.tools.compiler, pipelineConfig.layout.engine.primaryFile),
  });

  const result = await pipeline.run({
    snapshot: ctx.snapshot,
    architecture: ctx.architecture,
    toolchain: ctx.toolchain(),
    force: ctx.args.force,
    push: ctx.args.push,
  });

  if (ctx.args.json) {
    ctx.out(JSON.stringify(result, null, 2));
    return 0;
  }

  ctx.out(`Outcome:    ${result.outcome}`);
  ctx.out(`Reason:     ${result.decision.reason}${ctx.args.force ? ' (forced)' : ''}`);
  ctx.out(`Policy:     ${describePolicy(result.policy)}`);
  ctx.out(`Engine:     ${result.engineDir} (${formatSize(result.validation.primaryBytes)})`);
  ctx.out(`Checkpoint: ${result.checkpointDir}`);
  ctx.out(`Stages:     ${result.stages.join(' → ')}`);
  if (result.wiped) {
    ctx.out('Wiped:      yes (inference engine switched)');
  }
  if (ctx.args.push) {
    ctx.out(`Pushed:     ${result.pushed ? 'yes' : 'no'}`);
  }
  for (const warning of result.validation.warnings) {
    ctx.out(`Warning:    ${warning.message}`);
  }
  return 0;
}

export async function statusCommand(ctx: CliContext): Promise<number> {
  const signer = new BuildSignatureEngine({ logger: ctx.logger });
  const decisions = new RebuildDecisionEngine({ signer, logger: ctx.logger });
  const { decision, modeSwitch } = await decisions.evaluate(ctx.snapshot, ctx.pipelineConfig.recordPath);
  const signature = signer.sign(ctx.snapshot);

  if (ctx.args.json) {
    ctx.out(
      JSON.stringify(
        {
          snapshot: ctx.snapshot,
          signature,
          recordPath: ctx.pipelineConfig.recordPath,
          record: decision.record,
          rebuild: decision.rebuild,
          reason: decision.reason,
          changedKeys: decision.changedKeys,
          modeSwitch,
        },
        null,
        2
      )
    );
    return 0;
  }

  ctx.out('Tracked parameters:');
  for (const name of TRACKED_PARAMETERS) {
    const previous = decision.record?.parameters[name];
    const changed = decision.changedKeys.includes(name);
    ctx.out(`  ${name.padEnd(22)} ${ctx.snapshot[name] || '(unset)'}${changed ? `  (was: ${previous || '(unset)'})` : ''}`);
  }
  ctx.out('');
  ctx.out(`Signature:  ${signature}`);
  ctx.out(`Record:     ${decision.record ? `${ctx.pipelineConfig.recordPath} (${decision.record.timestamp})` : 'none'}`);
  ctx.out(`Rebuild:    ${decision.rebuild ? 'yes' : 'no'} (${decision.reason})`);
  if (modeSwitch.forcedFullWipe) {
    ctx.out(`Mode switch: ${modeSwitch.previousKind ?? '(none)'} → ${modeSwitch.currentKind}; cached artifacts will be wiped`);
  }
  return 0;
}

export function policyCommand(ctx: CliContext): number {
  const mode = parsePrecisionMode(ctx.args.mode ?? ctx.snapshot.PRECISION_MODE);
  const policy = resolvePolicy(ctx.architecture, mode);

  if (ctx.args.json) {
    ctx.out(JSON.stringify({ architecture: ctx.architecture, policy }, null, 2));
    return 0;
  }

  ctx.out(printArchitecture(ctx.architecture));
  ctx.out(`Policy:             ${describePolicy(policy)}`);
  if (policy.conservative) {
    ctx.out('Note:               GPU not recognised; using conservative limits');
  }
  return 0;
}

export async function validateCommand(ctx: CliContext): Promise<number> {
  const kind = ctx.args.kind ?? 'engine';
  if (kind !== 'engine' && kind !== 'checkpoint') {
    throw new ConfigurationError('--kind', `must be engine or checkpoint (got '${kind}')`);
  }

  const { layout } = ctx.pipelineConfig;
  const target = ctx.args.dir ?? (kind === 'engine' ? ctx.snapshot.ENGINE_DIR : ctx.snapshot.CHECKPOINT_DIR);
  if (!target) {
    throw new ConfigurationError(kind === 'engine' ? 'ENGINE_DIR' : 'CHECKPOINT_DIR', 'is required but not set');
  }
  const directory = resolveArtifactPath(target, layout);
  const descriptor = kind === 'engine' ? engineDescriptor(directory, layout) : checkpointDescriptor(directory, layout);

  const result = await new ArtifactValidator({ logger: ctx.logger }).validate(descriptor, ctx.architecture);

  if (ctx.args.json) {
    ctx.out(
      JSON.stringify(result.ok ? { valid: true, report: result.val } : { valid: false, error: result.val.toObject() }, null, 2)
    );
    return result.ok ? 0 : 1;
  }

  if (result.err) {
    ctx.out(`Invalid ${kind}: ${result.val.message}`);
    return 1;
  }

  ctx.out(`Valid ${kind}: ${directory}`);
  ctx.out(`Primary file:  ${formatSize(result.val.primaryBytes)}`);
  ctx.out(`Compatibility: ${result.val.compatibility}${result.val.heuristicOnly ? ' (path naming only)' : ''}`);
  for (const warning of result.val.warnings) {
    ctx.out(`Warning:       ${warning.message}`);
  }
  return 0;
}

const COMMANDS = {
  build: buildCommand,
  status: statusCommand,
  policy: policyCommand,
  validate: validateCommand,
} satisfies Record<string, (ctx: CliContext) => number | Promise<number>>;

function isCommand(name: string): name is keyof typeof COMMANDS {
  return Object.prototype.hasOwnProperty.call(COMMANDS, name);
}

/**
 * Run the CLI and return the process exit code.
 */
export async function runCli(argv: readonly string[], options: CliOptions = {}): Promise<number> {
  const out = options.out ?? ((line: string) => console.log(line));
  const err = options.err ?? ((line: string) => console.error(line));

  try {
    const args = parseArgs(argv);

    if (args.help) {
      out(HELP_TEXT);
      return 0;
    }
    if (args.version) {
      out(`engine-build v${readVersion()}`);
      return 0;
    }

    const command = args._[0];
    if (!command) {
      err('Error: No command specified');
      out(HELP_TEXT);
      return 1;
    }
    if (!isCommand(command)) {
      err(`Error: Unknown command '${command}'`);
      out(HELP_TEXT);
      return 1;
    }

    const ctx = createContext(args, { ...options, out });
    return await COMMANDS[command](ctx);
  } catch (error) {
    const failure: BuildCacheError = toBuildCacheError(error);
    err(`Error [${failure.code}]: ${failure.message}`);
    return 1;
  }
}
