export {
  BuildCacheError,
  ConfigurationError,
  ArtifactMissingError,
  ArtifactIncompatibleError,
  ExternalToolFailure,
  TransientNetworkError,
  ArtifactStoreError,
  LockHeldError,
  PipelineStateError,
  toBuildCacheError,
  type BuildCacheErrorCode,
} from './api/errors.js';

// Signature & rebuild decisions
export { BuildSignatureEngine, canonicalize, signaturesMatch, type Hasher } from './core/build-signature.js';
export { serializeBuildRecord, parseBuildRecord } from './core/build-record.js';
export { RebuildDecisionEngine, diffAgainstRecord, detectModeSwitch } from './core/rebuild-decision.js';
export { captureSnapshot, withParameters, assertBuildableSnapshot, parsePrecisionMode } from './core/tracked-parameters.js';

// Hardware & policy
export {
  probeHardware,
  detectToolchain,
  describeArchitecture,
  loadGpuNameTable,
  printArchitecture,
} from './core/hardware-probe.js';
export { resolvePolicy, describePolicy, listPolicyTable, POLICY_TABLE } from './core/quantization-policy.js';
export { classifyPrequantizedModel, detectWeightFormatFromName, type PrequantizedModel } from './core/prequantized.js';

// Artifacts
export { ArtifactValidator } from './core/artifact-validator.js';
export { RemoteArtifactResolver, type RemoteResolveRequest } from './core/remote-artifact-resolver.js';
export {
  defaultArtifactDirectories,
  engineLabel,
  parseEngineLabel,
  rankEngineLabels,
  checkpointPrefix,
} from './core/artifact-layout.js';
export { removeStaleArtifacts, wipeForModeSwitch, type WipeSummary } from './core/artifact-cleanup.js';
export { acquireBuildLock, type BuildLockHandle } from './core/build-lock.js';

// Pipeline
export {
  BuildPipeline,
  type BuildPipelineEvents,
  type PipelineRequest,
  type PipelineResult,
  type PipelineStage,
  type PipelineOutcome,
} from './core/build-pipeline.js';

// Adapters
export { createArtifactStore, createModelHubStore, type ArtifactStore } from './adapters/artifact-store.js';
export { LocalDirectoryArtifactStore } from './adapters/local-artifact-store.js';
export { HubArtifactStore } from './adapters/hub-artifact-store.js';
export {
  CommandQuantizer,
  CommandEngineCompiler,
  type Quantizer,
  type EngineCompiler,
  type QuantizeRequest,
  type CompileRequest,
} from './adapters/build-tools.js';
export { runTool, type CommandRunner, type ToolRunOutput } from './adapters/tool-runner.js';

// Configuration
export {
  loadConfig,
  getPipelineConfig,
  collectParameterSource,
  resolveArtifactDirectories,
} from './config/loader.js';

export * from './types/index.js';
