#!/usr/bin/env node

/**
 * Engine Build CLI
 *
 * Usage:
 *   engine-build build [--force] [--push]     # Build or reuse the engine
 *   engine-build status                       # Show whether a rebuild is due
 *   engine-build policy [--mode base]         # Show the quantization policy
 *   engine-build validate [--kind checkpoint] # Validate an artifact directory
 */

import { runCli } from './commands.js';

async function main(): Promise<void> {
  const exitCode = await runCli(process.argv.slice(2));
  process.exit(exitCode);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
