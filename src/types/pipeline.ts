/**
 * Pipeline Configuration Types
 *
 * camelCase view of config/build.yaml handed to the pipeline and its
 * collaborators. Paths are absolute.
 *
 * @module types/pipeline
 */

import type { ArtifactRequirements, RemotePreference } from './artifacts.js';

export interface ToolCommand {
  command: string;
  args: string[];
}

export interface RemoteRetrySettings {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  retryableErrors: string[];
  jitter?: number;
}

export type RemoteStoreKind = 'none' | 'directory' | 'hub';

export interface RemoteSettings {
  kind: RemoteStoreKind;
  ref: string;
  preference: RemotePreference;
  engineLabel: string;
  enginesPrefix: string;
  checkpointsPrefix: string;
  /** Where a pre-quantized model repository keeps its checkpoint */
  prequantizedPrefix: string;
  directoryRoot: string;
  hubEndpoint: string;
  retry: RemoteRetrySettings;
}

export interface LayoutSettings {
  rootDir: string;
  modelsDir: string;
  metadataFile: string;
  engine: ArtifactRequirements;
  checkpoint: ArtifactRequirements;
}

export interface PipelineConfig {
  layout: LayoutSettings;
  recordPath: string;
  lockPath: string;
  lockStaleAfterMs: number;
  fp8MinSm: number;
  remote: RemoteSettings;
  tools: {
    quantizer: ToolCommand;
    compiler: ToolCommand;
    hubCli: ToolCommand;
  };
  /** Dependency state directories per inference engine kind, wiped on a switch */
  engineStateDirs: Readonly<Record<string, string[]>>;
  /** Shell command printing the compiler release, per engine kind */
  engineVersionCommands: Readonly<Record<string, string>>;
}
