#!/usr/bin/env tsx
/**
 * GPU Detection & Quantization Policy
 *
 * Detects the NVIDIA GPU and prints the policy each precision mode would
 * resolve to, plus the full policy table.
 *
 * Usage:
 *   npx tsx scripts/hardware-check.ts
 *   npx tsx scripts/hardware-check.ts --json
 *   npx tsx scripts/hardware-check.ts --table
 */

import { configDirectory } from '../src/config/loader.js';
import {
  detectToolchain,
  loadGpuNameTable,
  printArchitecture,
  printToolchain,
  probeHardware,
} from '../src/core/hardware-probe.js';
import { describePolicy, listPolicyTable, resolvePolicy } from '../src/core/quantization-policy.js';
import { PRECISION_MODES } from '../src/types/build.js';

interface CliOptions {
  json: boolean;
  table: boolean;
}

function parseArgs(): CliOptions {
  const args = process.argv.slice(2);
  const options: CliOptions = {
    json: false,
    table: false,
  };

  for (const arg of args) {
    if (arg === '--json') {
      options.json = true;
    } else if (arg === '--table') {
      options.table = true;
    } else if (arg === '--help' || arg === '-h') {
      printHelp();
      process.exit(0);
    }
  }

  return options;
}

function printHelp(): void {
  console.log(`
GPU Detection Tool

Usage:
  npx tsx scripts/hardware-check.ts [options]

Options:
  --json              Output results in JSON format
  --table             Also print the full policy table
  --help, -h          Show this help message

Set GPU_SM_ARCH (e.g. sm90) to see the policy for another GPU, and
ENGINE_TOOLCHAIN_VERSION / CUDA_VERSION to pin the reported toolchain.
`);
}

function main(): void {
  const options = parseArgs();

  const architecture = probeHardware({ nameTable: loadGpuNameTable(configDirectory()) });
  const toolchain = detectToolchain();
  const policies = PRECISION_MODES.map((mode) => resolvePolicy(architecture, mode));

  if (options.json) {
    const output = {
      architecture,
      toolchain,
      policies,
      table: options.table ? listPolicyTable() : undefined,
      timestamp: new Date().toISOString(),
    };
    console.log(JSON.stringify(output, null, 2));
    return;
  }

  console.log(printArchitecture(architecture));
  console.log(printToolchain(toolchain));
  console.log('');
  for (const policy of policies) {
    console.log(`  ${describePolicy(policy)}`);
  }

  if (options.table) {
    console.log('\n' + '='.repeat(72));
    console.log('Policy table:');
    console.log('='.repeat(72));
    console.log(`  ${'family'.padEnd(10)} ${'format'.padEnd(15)} ${'kv'.padEnd(7)} ${'attention'.padEnd(11)} tokens  batch`);
    for (const row of listPolicyTable()) {
      console.log(
        `  ${row.family.padEnd(10)} ${row.weightFormat.padEnd(15)} ${row.kvCacheDtype.padEnd(7)} ` +
          `${row.attentionBackend.padEnd(11)} ${String(row.maxNumTokens).padEnd(7)} ${row.maxBatchSize}`
      );
    }
  }

  if (!architecture.code) {
    console.log('\nNo GPU detected; builds will use the conservative policy.');
  }
}

main();
