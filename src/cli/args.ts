/**
 * Command-line option parsing shared by the commands.
 */

import { FORMAT_SETTINGS, isFormatSetting } from '../config/index.js';
import type { PartialSettings } from '../config/index.js';
import { CliUsageError } from './errors.js';

/**
 * Options a command may accept.
 */
export type CliFlag = '--format' | '--ignore-unknown' | '--ignore-missing' | '--debug';

/**
 * Positional arguments and settings flags of one command line.
 */
export interface ParsedArgs {
  positionals: string[];
  flags: PartialSettings;
}

/**
 * Splits command arguments into positionals and settings flags.
 *
 * `--format` takes a value either as the next argument or after `=`.
 * Everything after `--` is positional.
 *
 * @param command - Command name, for error messages.
 * @param args - Arguments after the command name.
 * @param allowed - Flags this command accepts.
 * @throws CliUsageError for unknown flags and invalid values.
 */
export function parseCommandArgs(
  command: string,
  args: readonly string[],
  allowed: ReadonlySet<CliFlag>
): ParsedArgs {
  const positionals: string[] = [];
  const flags: PartialSettings = {};

  for (let index = 0; index < args.length; index++) {
    const arg = args[index] ?? '';

    if (arg === '--') {
      positionals.push(...args.slice(index + 1));
      break;
    }
    if (!arg.startsWith('-') || arg === '-') {
      positionals.push(arg);
      continue;
    }

    const [name, inlineValue] = splitFlag(arg);
    if (!isAllowed(name, allowed)) {
      throw new CliUsageError(`Unknown option '${name}' for '${command}'`, command);
    }
    if (name !== '--format' && inlineValue !== undefined) {
      throw new CliUsageError(`Option '${name}' takes no value`, command);
    }

    switch (name) {
      case '--format': {
        let value = inlineValue;
        if (value === undefined) {
          index += 1;
          value = args[index];
        }
        if (value === undefined) {
          throw new CliUsageError(`Option '--format' needs a value`, command);
        }
        if (!isFormatSetting(value)) {
          throw new CliUsageError(
            `Invalid --format '${value}': expected one of ${FORMAT_SETTINGS.join(', ')}`,
            command
          );
        }
        flags.format = value;
        break;
      }
      case '--ignore-unknown':
        flags.ignoreUnknownFields = true;
        break;
      case '--ignore-missing':
        flags.ignoreMissingFields = true;
        break;
      case '--debug':
        flags.debug = true;
        break;
    }
  }

  return { positionals, flags };
}

function splitFlag(arg: string): [string, string | undefined] {
  const equals = arg.indexOf('=');
  return equals === -1 ? [arg, undefined] : [arg.slice(0, equals), arg.slice(equals + 1)];
}

function isAllowed(name: string, allowed: ReadonlySet<CliFlag>): name is CliFlag {
  for (const flag of allowed) {
    if (flag === name) {
      return true;
    }
  }
  return false;
}
