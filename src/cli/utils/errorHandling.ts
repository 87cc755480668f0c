/**
 * Shared error handling utilities for CLI commands.
 *
 * Provides wrappers that standardize error handling across command
 * handlers, reducing code duplication.
 */

import { exitCodeFor, formatCliError } from '../errors.js';
import type { CliCommandResult, CliContext } from '../types.js';

/**
 * Runs a command handler and turns any error into printed output and an
 * exit code.
 *
 * - On success: returns the result's exit code
 * - On error: prints the message and suggestions to stderr and returns 1,
 *   or 2 for usage and settings errors
 *
 * @param context - The CLI context errors are printed to.
 * @param fn - The handler to run (sync or async).
 * @returns The exit code.
 */
export async function runWithErrorHandling(
  context: CliContext,
  fn: () => CliCommandResult | Promise<CliCommandResult>
): Promise<number> {
  try {
    const result = await fn();
    return result.exitCode;
  } catch (error) {
    for (const line of formatCliError(error)) {
      context.stderr(line);
    }
    return exitCodeFor(error);
  }
}

/**
 * Runs the CLI to completion and sets the process exit code.
 *
 * @param fn - Produces the exit code.
 */
export function withErrorHandling(fn: () => Promise<number>): void {
  void (async () => {
    try {
      process.exitCode = await fn();
    } catch (error) {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
    }
  })();
}
