/**
 * Error reporting for the schemacast CLI.
 *
 * Maps known error types to exit codes and short suggestions that help
 * users fix the failing document or invocation.
 *
 * @packageDocumentation
 */

import { EnvCoercionError, SettingsError } from '../config/index.js';
import { DocumentParseError, SchemaDocumentError } from '../document/index.js';
import { ConstructionError } from '../schema/index.js';

/** Exit code for failed checks and unreadable files. */
export const EXIT_FAILURE = 1;

/** Exit code for invalid invocations. */
export const EXIT_USAGE = 2;

/**
 * Error class for invalid command lines.
 */
export class CliUsageError extends Error {
  /** Command whose usage was violated, if known. */
  public readonly command: string | undefined;

  constructor(message: string, command?: string) {
    super(message);
    this.name = 'CliUsageError';
    this.command = command;
  }
}

/**
 * Returns the exit code for an error raised by a command.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof CliUsageError || error instanceof EnvCoercionError || error instanceof SettingsError) {
    return EXIT_USAGE;
  }
  return EXIT_FAILURE;
}

/**
 * Suggestions for resolving an error; empty when there is nothing to add.
 */
export function suggestionsFor(error: unknown): string[] {
  if (error instanceof CliUsageError) {
    const topic = error.command !== undefined ? `help ${error.command}` : 'help';
    return [`Run "schemacast ${topic}" for usage information.`];
  }
  if (error instanceof EnvCoercionError) {
    return [`Unset ${error.envVar} or give it a valid value.`];
  }
  if (error instanceof ConstructionError) {
    switch (error.code) {
      case 'UNKNOWN_ARGUMENT':
        return ['Remove the key, or rerun with --ignore-unknown to skip unknown keys.'];
      case 'MISSING_REQUIRED_ARGUMENT':
        return ['Add the key, or rerun with --ignore-missing to leave it unset.'];
      case 'VALUE_NOT_AN_OPTION':
        return ['Use one of the listed values.'];
      default:
        return [];
    }
  }
  if (error instanceof DocumentParseError && error.format === undefined) {
    return ['Pass --format to choose yaml, json or toml explicitly.'];
  }
  if (error instanceof SchemaDocumentError && error.field !== undefined) {
    return [`Check the declaration of '${error.schemaName ?? ''}.${error.field}'.`];
  }
  return [];
}

/**
 * Formats an error as the lines printed on stderr.
 */
export function formatCliError(error: unknown): string[] {
  const message = error instanceof Error ? error.message : String(error);
  return [`Error: ${message}`, ...suggestionsFor(error).map((suggestion) => `  ${suggestion}`)];
}
