/**
 * Check command: validates a document against the root schema of a schema
 * document and prints the constructed instance.
 */

import { resolveSettings } from '../../config/index.js';
import { loadConfig, loadSchemaFile } from '../../document/index.js';
import { ConstructionError } from '../../schema/index.js';
import { Logger } from '../../utils/logger.js';
import { parseCommandArgs } from '../args.js';
import type { CliFlag } from '../args.js';
import { CliUsageError, EXIT_FAILURE, suggestionsFor } from '../errors.js';
import type { CliCommandResult, CliContext } from '../types.js';

const CHECK_FLAGS: ReadonlySet<CliFlag> = new Set<CliFlag>([
  '--format',
  '--ignore-unknown',
  '--ignore-missing',
  '--debug',
]);

/**
 * Handles the check command.
 *
 * A document that fails the schema is an expected outcome: the error is
 * printed and the command exits with 1. Other failures propagate to the
 * error handler.
 *
 * @param context - The CLI context.
 * @returns A promise resolving to the command result.
 */
export async function handleCheckCommand(context: CliContext): Promise<CliCommandResult> {
  const { positionals, flags } = parseCommandArgs('check', context.args, CHECK_FLAGS);
  const [schemaPath, documentPath, ...extra] = positionals;
  if (schemaPath === undefined || documentPath === undefined || extra.length > 0) {
    throw new CliUsageError('check expects <schema-file> <document-file>', 'check');
  }

  const settings = resolveSettings({ flags, env: context.env });
  const logger = new Logger({ component: 'cli', debugMode: settings.debug, sink: context.logSink });
  const loaderLogger = logger.child('DocumentLoader');

  const schemas = await loadSchemaFile(schemaPath, {
    logger: loaderLogger,
    ignoreUnknownFields: settings.ignoreUnknownFields,
    ignoreMissingFields: settings.ignoreMissingFields,
  });
  const root = schemas.root;

  try {
    const instance = await loadConfig(documentPath, root, {
      format: settings.format,
      logger: loaderLogger,
    });
    logger.debug('check_passed', { schema: root.name, document: documentPath });
    context.stdout(root.render(instance));
    return { exitCode: 0 };
  } catch (error) {
    if (!(error instanceof ConstructionError)) {
      throw error;
    }
    logger.debug('check_failed', {
      schema: root.name,
      document: documentPath,
      code: error.code,
      field: error.field,
    });
    context.stderr(`Error: ${documentPath}: ${error.message}`);
    for (const suggestion of suggestionsFor(error)) {
      context.stderr(`  ${suggestion}`);
    }
    return { exitCode: EXIT_FAILURE };
  }
}
