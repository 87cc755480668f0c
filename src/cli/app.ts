/**
 * Command dispatch for the schemacast CLI.
 */

import { getEnvVarDocumentation } from '../config/index.js';
import { handleCheckCommand } from './commands/check.js';
import { handleDescribeCommand } from './commands/describe.js';
import { handleVersionCommand } from './commands/version.js';
import { EXIT_USAGE } from './errors.js';
import type { CliContext } from './types.js';
import { runWithErrorHandling } from './utils/errorHandling.js';

/**
 * Creates a CLI context bound to the current process.
 *
 * @param overrides - Fields to replace, e.g. captured output in tests.
 */
export function createCliContext(overrides: Partial<CliContext> = {}): CliContext {
  return {
    args: overrides.args ?? process.argv.slice(2),
    env: overrides.env ?? process.env,
    stdout:
      overrides.stdout ??
      ((line: string) => {
        process.stdout.write(`${line}\n`);
      }),
    stderr:
      overrides.stderr ??
      ((line: string) => {
        process.stderr.write(`${line}\n`);
      }),
    logSink: overrides.logSink,
  };
}

const HELP_TEXT = `schemacast: check YAML, JSON and TOML documents against declared schemas

USAGE:
  schemacast <command> [options]

COMMANDS:
  check       Validate a document against a schema document
  describe    List the schemas and fields of a schema document
  help        Show this help message
  version     Show version information

OPTIONS:
  --help, -h     Show help for a command
  --version, -v  Show version information

EXAMPLES:
  schemacast check server.schema.yaml server.yaml
  schemacast check server.schema.yaml server.json --ignore-unknown
  schemacast describe server.schema.yaml`;

const COMMAND_HELP: Readonly<Record<string, string>> = {
  check: `USAGE: schemacast check <schema-file> <document-file> [options]

Builds the root schema of <schema-file> and constructs it from
<document-file>. Prints the constructed instance, or the first error.

OPTIONS:
  --format <f>       Document format: auto, yaml, json or toml (default: auto)
  --ignore-unknown   Skip keys that match no field
  --ignore-missing   Leave missing required fields unset
  --debug            Emit debug log entries on stderr`,
  describe: `USAGE: schemacast describe <schema-file> [options]

Lists every schema in <schema-file> with each field's type, default,
alias and allowed values.

OPTIONS:
  --debug            Emit debug log entries on stderr`,
};

function showHelp(context: CliContext): void {
  context.stdout(HELP_TEXT);
  context.stdout('');
  context.stdout('ENVIRONMENT:');
  for (const [envVar, doc] of Object.entries(getEnvVarDocumentation())) {
    context.stdout(`  ${envVar.padEnd(26)}${doc.description}`);
  }
}

function showHelpForCommand(context: CliContext, commandName: string): number {
  const help = COMMAND_HELP[commandName];
  if (help === undefined) {
    context.stderr(`Error: Unknown command: ${commandName}`);
    context.stderr('\nRun "schemacast help" to see all available commands.');
    return EXIT_USAGE;
  }
  context.stdout(help);
  return 0;
}

/**
 * Runs one CLI invocation.
 *
 * @param context - Context whose `args` start with the command name.
 * @returns The exit code.
 */
export async function runCli(context: CliContext): Promise<number> {
  const [command = '', ...commandArgs] = context.args;
  const commandContext: CliContext = { ...context, args: commandArgs };
  const wantsHelp = commandArgs.includes('--help') || commandArgs.includes('-h');

  switch (command) {
    case '':
    case 'help':
    case '--help':
    case '-h': {
      const topic = commandArgs[0];
      if (topic !== undefined) {
        return showHelpForCommand(context, topic);
      }
      showHelp(context);
      return 0;
    }

    case 'version':
    case '--version':
    case '-v':
      return runWithErrorHandling(commandContext, () => handleVersionCommand(commandContext));

    case 'check':
      if (wantsHelp) {
        return showHelpForCommand(context, 'check');
      }
      return runWithErrorHandling(commandContext, () => handleCheckCommand(commandContext));

    case 'describe':
      if (wantsHelp) {
        return showHelpForCommand(context, 'describe');
      }
      return runWithErrorHandling(commandContext, () => handleDescribeCommand(commandContext));

    default:
      context.stderr(`Error: Unknown command: ${command}`);
      context.stderr('\nRun "schemacast help" for usage information.');
      return EXIT_USAGE;
  }
}
