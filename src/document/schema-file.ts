/**
 * Schema documents: schemas declared in YAML, JSON or TOML instead of code.
 *
 * ```yaml
 * root: Server
 * schemas:
 *   Server:
 *     options:
 *       ignore_unknown_fields: true
 *     fields:
 *       host: str
 *       port: { type: int, default: 8080, options: [80, 443, 8080] }
 *       tls_cert: { type: str, alias: tls-cert, default: '' }
 *       routes: list[Route]
 *   Route:
 *     fields:
 *       path: str
 * ```
 *
 * The document itself is read through meta schemas built with the engine, so
 * its mistakes are reported like any other construction error.
 *
 * @packageDocumentation
 */

import {
  ConstructionError,
  SchemaRegistrationError,
  defineSchema,
  field,
  isMapping,
  mappingEntries,
  t,
} from '../schema/index.js';
import type {
  Constructible,
  DefaultFactory,
  DefaultLiteral,
  DocumentMapping,
  FieldDeclaration,
  FieldOptions,
  Schema,
  SchemaOptions,
  TypeDescriptor,
} from '../schema/index.js';
import { loadDocument } from './loader.js';
import type { LoadOptions } from './loader.js';
import { TypeNotationError, parseTypeNotation } from './notation.js';

/**
 * A schema built from a document. Field values are only known at run time.
 */
export type DocumentSchema = Schema<Record<string, unknown>>;

/**
 * The schemas a document declares.
 */
export interface SchemaSet {
  /** Every schema, in document order. */
  readonly schemas: ReadonlyMap<string, DocumentSchema>;
  /** The schema named by `root`. */
  readonly root: DocumentSchema;
}

/**
 * Tolerance forced onto every schema in a document, on top of the
 * document's own per-schema options.
 */
export type BuildOptions = SchemaOptions;

/**
 * Error class for schema documents that cannot be turned into schemas.
 */
export class SchemaDocumentError extends Error {
  /** Schema the error belongs to, if any. */
  public readonly schemaName: string | undefined;
  /** Field the error belongs to, if any. */
  public readonly field: string | undefined;
  /** The underlying error, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new SchemaDocumentError.
   *
   * @param message - Descriptive error message.
   * @param context - Schema, field and underlying error.
   */
  constructor(
    message: string,
    context: { schemaName?: string | undefined; field?: string | undefined; cause?: Error | undefined } = {}
  ) {
    super(message);
    this.name = 'SchemaDocumentError';
    this.schemaName = context.schemaName;
    this.field = context.field;
    this.cause = context.cause;
  }
}

const FieldEntry = defineSchema(
  'FieldEntry',
  {
    type: t.string(),
    alias: t.string(),
    default: t.any(),
    options: t.list(t.any()),
  },
  { ignoreMissingFields: true }
);

const SchemaOptionsEntry = defineSchema('SchemaOptions', {
  ignoreUnknownFields: field(t.boolean(), { alias: 'ignore_unknown_fields', default: false }),
  ignoreMissingFields: field(t.boolean(), { alias: 'ignore_missing_fields', default: false }),
});

const SchemaEntry = defineSchema('SchemaEntry', {
  options: field(t.nested(SchemaOptionsEntry), { default: () => ({}) }),
  fields: field(t.map(t.string(), t.any()), { default: () => ({}) }),
});

const SchemaDocument = defineSchema('SchemaDocument', {
  root: t.string(),
  schemas: t.map(t.string(), t.nested(SchemaEntry)),
});

type SchemaEntryInstance = ReturnType<typeof SchemaEntry.construct>;

/**
 * Builds schemas from a parsed schema document.
 *
 * Schemas are defined in dependency order, so a field may reference a schema
 * declared further down. Field declarations are either notation text or a
 * mapping with `type`, `alias`, `default` and `options`. List and mapping
 * defaults become factories that copy the declared value.
 *
 * @param document - Parsed document tree.
 * @param options - Tolerance forced onto every schema.
 * @throws SchemaDocumentError for malformed documents, unknown or cyclic
 *   schema references, and invalid field declarations.
 */
export function buildSchemas(document: DocumentMapping, options: BuildOptions = {}): SchemaSet {
  let parsed: ReturnType<typeof SchemaDocument.construct>;
  try {
    parsed = SchemaDocument.construct(document);
  } catch (error) {
    if (error instanceof ConstructionError) {
      throw new SchemaDocumentError(`Invalid schema document: ${error.message}`, { cause: error });
    }
    throw error;
  }

  const entries = new Map<string, SchemaEntryInstance>();
  for (const [name, entry] of parsed.schemas) {
    if (entry === null) {
      throw new SchemaDocumentError(`Schema '${name}' must be a mapping`, { schemaName: name });
    }
    entries.set(name, entry);
  }

  const defined = new Map<string, DocumentSchema>();

  const define = (name: string, stack: readonly string[]): DocumentSchema => {
    const existing = defined.get(name);
    if (existing !== undefined) {
      return existing;
    }
    if (stack.includes(name)) {
      throw new SchemaDocumentError(
        `Cyclic schema reference: ${[...stack, name].join(' -> ')}`,
        { schemaName: name }
      );
    }
    const entry = entries.get(name);
    if (entry === undefined) {
      throw new SchemaDocumentError(`Unknown schema '${name}'`, { schemaName: name });
    }

    const lookup = (ref: string): Constructible | undefined =>
      entries.has(ref) ? define(ref, [...stack, name]) : undefined;

    const declarations: Record<string, FieldDeclaration> = {};
    for (const [fieldName, raw] of entry.fields) {
      declarations[fieldName] = toDeclaration(name, fieldName, raw, lookup);
    }

    let schema: DocumentSchema;
    try {
      schema = defineSchema(name, declarations, {
        ignoreUnknownFields: entry.options.ignoreUnknownFields || options.ignoreUnknownFields === true,
        ignoreMissingFields: entry.options.ignoreMissingFields || options.ignoreMissingFields === true,
      });
    } catch (error) {
      if (error instanceof SchemaRegistrationError) {
        throw new SchemaDocumentError(error.message, {
          schemaName: name,
          field: error.field,
          cause: error,
        });
      }
      throw error;
    }
    defined.set(name, schema);
    return schema;
  };

  for (const name of entries.keys()) {
    define(name, []);
  }

  const root = defined.get(parsed.root);
  if (root === undefined) {
    throw new SchemaDocumentError(`Root schema '${parsed.root}' is not declared`, {
      schemaName: parsed.root,
    });
  }

  const ordered = new Map<string, DocumentSchema>();
  for (const name of entries.keys()) {
    const schema = defined.get(name);
    if (schema !== undefined) {
      ordered.set(name, schema);
    }
  }
  return { schemas: ordered, root };
}

/**
 * Reads a schema document file and builds its schemas.
 *
 * @param filePath - Schema document to read.
 * @param options - Format, logger and forced tolerance.
 * @throws DocumentParseError when the file cannot be read or parsed.
 * @throws SchemaDocumentError when the document does not declare valid schemas.
 */
export async function loadSchemaFile(
  filePath: string,
  options: LoadOptions & BuildOptions = {}
): Promise<SchemaSet> {
  const document = await loadDocument(filePath, options);
  return buildSchemas(document, options);
}

function toDeclaration(
  schemaName: string,
  fieldName: string,
  raw: unknown,
  lookup: (ref: string) => Constructible | undefined
): FieldDeclaration {
  const context = { schemaName, field: fieldName };

  if (typeof raw === 'string') {
    return parseNotation(schemaName, fieldName, raw, lookup);
  }
  if (!isMapping(raw)) {
    throw new SchemaDocumentError(
      `Field '${schemaName}.${fieldName}' must be type notation or a mapping`,
      context
    );
  }

  let entry: ReturnType<typeof FieldEntry.construct>;
  try {
    // An explicit null reads as an absent key, so `default: null` stays required.
    entry = FieldEntry.construct(new Map(mappingEntries(raw).filter(([, value]) => value !== null)));
  } catch (error) {
    if (error instanceof ConstructionError) {
      throw new SchemaDocumentError(
        `Invalid field '${schemaName}.${fieldName}': ${error.message}`,
        { ...context, cause: error }
      );
    }
    throw error;
  }

  if (entry.type === undefined) {
    throw new SchemaDocumentError(`Field '${schemaName}.${fieldName}' has no type`, context);
  }
  const type = parseNotation(schemaName, fieldName, entry.type, lookup);
  const fieldOptions: FieldOptions = {
    alias: entry.alias,
    default: toDefault(entry.default),
    options: entry.options,
  };
  return field(type, fieldOptions);
}

function parseNotation(
  schemaName: string,
  fieldName: string,
  notation: string,
  lookup: (ref: string) => Constructible | undefined
): TypeDescriptor {
  try {
    return parseTypeNotation(notation, lookup);
  } catch (error) {
    if (error instanceof TypeNotationError) {
      throw new SchemaDocumentError(`Invalid type for '${schemaName}.${fieldName}': ${error.message}`, {
        schemaName,
        field: fieldName,
        cause: error,
      });
    }
    throw error;
  }
}

/**
 * Containers in a document become factories so every instance gets its own
 * copy; anything else is passed on for `defineSchema` to check.
 */
function toDefault(value: unknown): DefaultLiteral | DefaultFactory | null | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value) || isMapping(value)) {
    return () => structuredClone(value);
  }
  return () => value;
}
