/**
 * CLI types and interfaces for the schemacast CLI.
 */

import type { EnvRecord } from '../config/index.js';
import type { LogSink } from '../utils/logger.js';

/**
 * CLI command context.
 */
export interface CliContext {
  /**
   * Command-line arguments. `runCli` receives the command name first and
   * passes only the arguments after it to the command.
   */
  args: string[];

  /**
   * Environment to read SCHEMACAST_* settings from.
   */
  env: EnvRecord;

  /**
   * Writes one line of regular output.
   */
  stdout: (line: string) => void;

  /**
   * Writes one line of error output.
   */
  stderr: (line: string) => void;

  /**
   * Destination of structured log entries; stderr when omitted.
   */
  logSink?: LogSink | undefined;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, 1 for failed checks, 2 for usage errors).
   */
  exitCode: number;
}
