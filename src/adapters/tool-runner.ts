/**
 * External tool invocation.
 *
 * Every external command (quantizer, compiler, hub CLI) goes through
 * runTool, which never throws for a failed command: it returns a typed
 * Result carrying the captured output either way.
 */

import { execa } from 'execa';
import { Err, Ok, type Result } from 'ts-results';
import { ExternalToolFailure } from '../api/errors.js';
import { outputTail } from '../utils/result-helpers.js';
import type { ToolCommand } from '../types/pipeline.js';

export interface CommandOutcome {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Set when the process could not be started at all */
  spawnError?: string;
}

export interface RunOptions {
  cwd?: string;
  env?: Readonly<Record<string, string>>;
}

/**
 * Runs one command with discrete arguments (no shell).
 */
export type CommandRunner = (command: string, args: readonly string[], options: RunOptions) => Promise<CommandOutcome>;

export interface ToolRunOutput {
  tool: string;
  command: string;
  args: string[];
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
}

export const execaRunner: CommandRunner = async (command, args, options) => {
  const result = await execa(command, [...args], {
    cwd: options.cwd,
    env: options.env ? { ...options.env } : undefined,
    reject: false,
    stripFinalNewline: true,
  });

  const exitCode = Number.isInteger(result.exitCode) ? result.exitCode : null;
  return {
    exitCode,
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    spawnError: exitCode === null && result.failed ? `could not start '${command}'` : undefined,
  };
};

export async function runTool(
  tool: string,
  command: ToolCommand,
  extraArgs: readonly string[],
  runner: CommandRunner = execaRunner,
  options: RunOptions = {}
): Promise<Result<ToolRunOutput, ExternalToolFailure>> {
  const args = [...command.args, ...extraArgs];
  const started = Date.now();

  let outcome: CommandOutcome;
  try {
    outcome = await runner(command.command, args, options);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return Err(new ExternalToolFailure(tool, `could not start '${command.command}': ${message}`, null));
  }

  if (outcome.spawnError) {
    return Err(new ExternalToolFailure(tool, outcome.spawnError, null, outputTail(outcome.stderr)));
  }

  if (outcome.exitCode !== 0) {
    const tail = outputTail(outcome.stderr || outcome.stdout);
    return Err(
      new ExternalToolFailure(
        tool,
        `'${[command.command, ...args].join(' ')}' exited with code ${outcome.exitCode ?? 'unknown'}` +
          (tail ? `\n${tail}` : ''),
        outcome.exitCode,
        tail
      )
    );
  }

  return Ok({
    tool,
    command: command.command,
    args,
    exitCode: 0,
    stdout: outcome.stdout,
    stderr: outcome.stderr,
    durationMs: Date.now() - started,
  });
}
