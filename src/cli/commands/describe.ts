/**
 * Describe command: lists the schemas of a schema document with their fields.
 */

import { resolveSettings } from '../../config/index.js';
import { loadSchemaFile } from '../../document/index.js';
import type { DocumentSchema, SchemaSet } from '../../document/index.js';
import { describeValue, formatDescriptor } from '../../schema/index.js';
import type { FieldSpec } from '../../schema/index.js';
import { Logger } from '../../utils/logger.js';
import { parseCommandArgs } from '../args.js';
import type { CliFlag } from '../args.js';
import { CliUsageError } from '../errors.js';
import type { CliCommandResult, CliContext } from '../types.js';

const DESCRIBE_FLAGS: ReadonlySet<CliFlag> = new Set<CliFlag>(['--debug']);

/**
 * Handles the describe command.
 *
 * @param context - The CLI context.
 * @returns A promise resolving to the command result.
 */
export async function handleDescribeCommand(context: CliContext): Promise<CliCommandResult> {
  const { positionals, flags } = parseCommandArgs('describe', context.args, DESCRIBE_FLAGS);
  const [schemaPath, ...extra] = positionals;
  if (schemaPath === undefined || extra.length > 0) {
    throw new CliUsageError('describe expects <schema-file>', 'describe');
  }

  const settings = resolveSettings({ flags, env: context.env });
  const logger = new Logger({ component: 'DocumentLoader', debugMode: settings.debug, sink: context.logSink });
  const schemas = await loadSchemaFile(schemaPath, { logger });

  for (const line of describeSchemaSet(schemas)) {
    context.stdout(line);
  }
  return { exitCode: 0 };
}

/**
 * Renders every schema of a set in document order, the root marked
 * `(root)`, separated by blank lines.
 *
 * @example
 * ```
 * Server (root)
 *   host: str, required
 *   port: int, default 8080, options [80, 443, 8080]
 * ```
 */
export function describeSchemaSet(set: SchemaSet): string[] {
  const lines: string[] = [];
  for (const schema of set.schemas.values()) {
    if (lines.length > 0) {
      lines.push('');
    }
    lines.push(...describeSchema(schema, schema === set.root));
  }
  return lines;
}

/**
 * Renders one schema: a header line, then one line per field.
 */
export function describeSchema(schema: DocumentSchema, isRoot = false): string[] {
  const tags: string[] = [];
  if (schema.settings.ignoreUnknownFields) {
    tags.push('ignores unknown fields');
  }
  if (schema.settings.ignoreMissingFields) {
    tags.push('ignores missing fields');
  }
  const header =
    schema.name + (isRoot ? ' (root)' : '') + (tags.length > 0 ? ` [${tags.join(', ')}]` : '');
  return [header, ...schema.fields.map((spec) => `  ${describeField(spec)}`)];
}

function describeField(spec: FieldSpec): string {
  const parts = [`${spec.name}: ${formatDescriptor(spec.type)}`];
  if (spec.default === undefined) {
    parts.push('required');
  } else if (spec.default.kind === 'literal') {
    parts.push(`default ${JSON.stringify(spec.default.value)}`);
  } else {
    parts.push('default <factory>');
  }
  if (spec.alias !== spec.name) {
    parts.push(`alias ${JSON.stringify(spec.alias)}`);
  }
  if (spec.options !== undefined) {
    parts.push(`options ${describeValue(spec.options)}`);
  }
  return parts.join(', ');
}
