/**
 * Result Helpers
 *
 * Shaping captured tool output into the failure side of a Result.
 *
 * Usage:
 * ```typescript
 * if (outcome.exitCode !== 0) {
 *   return Err(new ExternalToolFailure(tool, message, outcome.exitCode, outputTail(outcome.stderr)));
 * }
 * ```
 */

/**
 * Last `maxLines` non-empty lines of a tool's output, for error messages.
 */
export function outputTail(output: string, maxLines = 20): string {
  return output
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)
    .slice(-maxLines)
    .join('\n');
}
