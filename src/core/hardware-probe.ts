/**
 * Hardware Probe
 *
 * Detects the NVIDIA GPU on the host and reduces it to an architecture code
 * (`sm89`), a typed family and the FP8 capability flag. Probing is
 * best-effort: every failure degrades to an empty code and the `unknown`
 * family, never an exception.
 *
 * The engine toolchain (compiler release and CUDA toolkit) is probed the
 * same way and feeds engine labels and build metadata.
 */

import { execSync } from 'node:child_process';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import type {
  ArchitectureDescriptor,
  ArchitectureFamily,
  ArchitectureSource,
  ToolchainInfo,
} from '../types/hardware.js';

export const SM_ARCH_ENV = 'GPU_SM_ARCH';
export const TOOLCHAIN_VERSION_ENV = 'ENGINE_TOOLCHAIN_VERSION';
export const CUDA_VERSION_ENV = 'CUDA_VERSION';
export const DEFAULT_FP8_MIN_SM = 89;

const NVIDIA_SMI_QUERY = 'nvidia-smi --query-gpu=compute_cap,name --format=csv,noheader';

const GpuNameTableSchema = z.object({
  byName: z.array(z.object({ match: z.string().min(1), code: z.string().regex(/^sm\d+$/) })),
});

export type GpuNameTable = z.infer<typeof GpuNameTableSchema>['byName'];

export type CommandExecutor = (command: string) => string;

export interface ProbeOptions {
  env?: Readonly<Record<string, string | undefined>>;
  exec?: CommandExecutor;
  nameTable?: GpuNameTable;
  fp8MinSm?: number;
}

const defaultExec: CommandExecutor = (command) =>
  execSync(command, { encoding: 'utf8', timeout: 5000, stdio: ['ignore', 'pipe', 'ignore'] });

/**
 * Load the GPU name → SM code fallback table.
 */
export function loadGpuNameTable(configDir: string): GpuNameTable {
  const raw: unknown = JSON.parse(readFileSync(join(configDir, 'gpu-architectures.json'), 'utf8'));
  return GpuNameTableSchema.parse(raw).byName;
}

/**
 * `8.9` → 89, `9.0` → 90, `12.0` → 120
 */
export function parseComputeCapability(value: string): number | null {
  const match = /^\s*(\d+)\.(\d)\s*$/.exec(value);
  if (!match) {
    return null;
  }
  return Number(match[1]) * 10 + Number(match[2]);
}

export function parseArchitectureCode(code: string): number | null {
  const match = /^sm(\d+)$/i.exec(code.trim());
  return match ? Number(match[1]) : null;
}

export function familyForSm(sm: number | null): ArchitectureFamily {
  if (sm === null) return 'unknown';
  if (sm >= 100) return 'blackwell';
  if (sm >= 90) return 'hopper';
  if (sm === 89) return 'ada';
  if (sm >= 80) return 'ampere';
  if (sm >= 75) return 'turing';
  if (sm >= 70) return 'volta';
  return 'unknown';
}

/**
 * Build a descriptor from an SM number (null when undetectable).
 */
export function describeArchitecture(
  sm: number | null,
  source: ArchitectureSource,
  options: { deviceName?: string; fp8MinSm?: number } = {}
): ArchitectureDescriptor {
  const fp8MinSm = options.fp8MinSm ?? DEFAULT_FP8_MIN_SM;
  return {
    code: sm === null ? '' : `sm${sm}`,
    family: familyForSm(sm),
    smVersion: sm,
    supportsFp8: sm !== null && sm >= fp8MinSm,
    deviceName: options.deviceName,
    source: sm === null ? 'none' : source,
  };
}

export function smFromGpuName(name: string, table: GpuNameTable): number | null {
  const lower = name.toLowerCase();
  const entry = table.find((candidate) => lower.includes(candidate.match));
  return entry ? parseArchitectureCode(entry.code) : null;
}

/**
 * Probe the host GPU: GPU_SM_ARCH override, then nvidia-smi compute
 * capability, then the GPU name table.
 */
export function probeHardware(options: ProbeOptions = {}): ArchitectureDescriptor {
  const env = options.env ?? process.env;
  const exec = options.exec ?? defaultExec;
  const fp8MinSm = options.fp8MinSm;

  const override = env[SM_ARCH_ENV]?.trim();
  if (override) {
    const sm = parseArchitectureCode(override);
    if (sm !== null) {
      return describeArchitecture(sm, 'override', { fp8MinSm });
    }
  }

  let firstLine: string;
  try {
    firstLine = exec(NVIDIA_SMI_QUERY).split('\n')[0]?.trim() ?? '';
  } catch {
    // No driver or no GPU
    return describeArchitecture(null, 'none', { fp8MinSm });
  }

  const separator = firstLine.indexOf(',');
  const capField = separator >= 0 ? firstLine.slice(0, separator) : firstLine;
  const deviceName = separator >= 0 ? firstLine.slice(separator + 1).trim() : undefined;

  const sm = parseComputeCapability(capField);
  if (sm !== null) {
    return describeArchitecture(sm, 'compute-cap', { deviceName, fp8MinSm });
  }

  if (deviceName && options.nameTable) {
    const fromName = smFromGpuName(deviceName, options.nameTable);
    return describeArchitecture(fromName, 'name-table', { deviceName, fp8MinSm });
  }

  return describeArchitecture(null, 'none', { deviceName, fp8MinSm });
}

/**
 * Human-readable architecture summary for the CLI and scripts.
 */
export function printArchitecture(architecture: ArchitectureDescriptor): string {
  return [
    `Device:             ${architecture.deviceName ?? 'unknown'}`,
    `Architecture:       ${architecture.code || 'undetected'} (${architecture.family})`,
    `FP8 support:        ${architecture.supportsFp8 ? 'yes' : 'no'}`,
    `Detected via:       ${architecture.source}`,
  ].join('\n');
}

export interface ToolchainDetectOptions {
  env?: Readonly<Record<string, string | undefined>>;
  exec?: CommandExecutor;
  /** Shell command whose last output line is the engine compiler release */
  versionCommand?: string;
}

/**
 * `12.4.1` → `12.4`; null when there is no `major.minor` in the text.
 */
export function parseCudaVersion(text: string): string | null {
  const match = /(\d+)\.(\d+)/.exec(text);
  return match ? `${match[1]}.${match[2]}` : null;
}

function tryExec(exec: CommandExecutor, command: string): string | null {
  try {
    return exec(command);
  } catch {
    // Tool missing on this host
    return null;
  }
}

function detectCudaVersion(env: ToolchainDetectOptions['env'], exec: CommandExecutor): string | null {
  const fromEnv = env?.[CUDA_VERSION_ENV]?.trim();
  if (fromEnv) {
    const parsed = parseCudaVersion(fromEnv);
    if (parsed) return parsed;
  }

  const nvcc = tryExec(exec, 'nvcc --version');
  const release = nvcc ? /release\s+(\d+\.\d+)/.exec(nvcc) : null;
  if (release?.[1]) {
    return release[1];
  }

  const smi = tryExec(exec, 'nvidia-smi');
  const driver = smi ? /CUDA Version:\s*(\d+\.\d+)/.exec(smi) : null;
  return driver?.[1] ?? null;
}

function detectEngineVersion(
  env: ToolchainDetectOptions['env'],
  exec: CommandExecutor,
  versionCommand: string | undefined
): string | null {
  const fromEnv = env?.[TOOLCHAIN_VERSION_ENV]?.trim();
  if (fromEnv) {
    return fromEnv;
  }
  if (!versionCommand) {
    return null;
  }
  const output = tryExec(exec, versionCommand);
  const lines = (output ?? '').split('\n').map((line) => line.trim()).filter(Boolean);
  const last = lines[lines.length - 1];
  return last && /^[\w.+]+$/.test(last) ? last : null;
}

/**
 * Detect the engine toolchain: ENGINE_TOOLCHAIN_VERSION or the configured
 * version command for the compiler, CUDA_VERSION, `nvcc --version` or the
 * driver's `nvidia-smi` banner for CUDA.
 */
export function detectToolchain(options: ToolchainDetectOptions = {}): ToolchainInfo {
  const env = options.env ?? process.env;
  const exec = options.exec ?? defaultExec;
  return {
    engineVersion: detectEngineVersion(env, exec, options.versionCommand),
    cudaVersion: detectCudaVersion(env, exec),
  };
}

export function printToolchain(toolchain: ToolchainInfo): string {
  return [
    `Engine toolchain:   ${toolchain.engineVersion ?? 'unknown'}`,
    `CUDA toolkit:       ${toolchain.cudaVersion ?? 'unknown'}`,
  ].join('\n');
}
