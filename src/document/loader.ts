/**
 * Document loading: YAML, JSON and TOML text to an untyped mapping tree.
 *
 * The schema engine only ever sees the parsed tree; this module owns the
 * parsers, file access and logging.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import TOML from '@iarna/toml';
import * as yaml from 'js-yaml';
import type { Constructible, DocumentMapping } from '../schema/index.js';
import { isMapping } from '../schema/index.js';
import { Logger } from '../utils/logger.js';
import { safeReadText } from '../utils/safe-fs.js';

/**
 * Supported document formats.
 */
export type DocumentFormat = 'yaml' | 'json' | 'toml';

/** File extensions by format. */
export const FORMAT_EXTENSIONS: Readonly<Record<DocumentFormat, readonly string[]>> = {
  yaml: ['.yaml', '.yml'],
  json: ['.json'],
  toml: ['.toml'],
};

/** Keys rejected anywhere in a document. */
const DANGEROUS_KEYS: ReadonlySet<string> = new Set(['__proto__', 'constructor', 'prototype']);

const defaultLogger = new Logger({ component: 'DocumentLoader' });

/**
 * Error class for documents that cannot be read or parsed.
 */
export class DocumentParseError extends Error {
  /** Format the document was parsed as, if known. */
  public readonly format: DocumentFormat | undefined;
  /** File the document came from, if any. */
  public readonly source: string | undefined;
  /** The original error that caused the failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new DocumentParseError.
   *
   * @param message - Descriptive error message.
   * @param context - Format, source file and underlying error.
   */
  constructor(
    message: string,
    context: { format?: DocumentFormat | undefined; source?: string | undefined; cause?: Error | undefined } = {}
  ) {
    super(message);
    this.name = 'DocumentParseError';
    this.format = context.format;
    this.source = context.source;
    this.cause = context.cause;
  }
}

/**
 * Options for {@link loadDocument} and {@link loadConfig}.
 */
export interface LoadOptions {
  /**
   * Format to parse as; `auto` picks it from the file extension.
   * @defaultValue 'auto'
   */
  readonly format?: DocumentFormat | 'auto' | undefined;
  /** Logger for load events. */
  readonly logger?: Logger | undefined;
}

/**
 * Picks a format from a file extension.
 *
 * @throws DocumentParseError for unrecognized extensions.
 */
export function detectFormat(filePath: string): DocumentFormat {
  const extension = path.extname(filePath).toLowerCase();
  for (const [format, extensions] of Object.entries(FORMAT_EXTENSIONS)) {
    if (extensions.includes(extension) && isDocumentFormat(format)) {
      return format;
    }
  }
  throw new DocumentParseError(
    `Cannot detect document format of '${filePath}': expected one of ` +
      `${Object.values(FORMAT_EXTENSIONS).flat().join(', ')}`,
    { source: filePath }
  );
}

/**
 * Checks whether a string names a supported format.
 */
export function isDocumentFormat(value: string): value is DocumentFormat {
  return value === 'yaml' || value === 'json' || value === 'toml';
}

/**
 * Parses document text into an untyped tree.
 *
 * YAML uses the core schema, so timestamps and other tagged scalars stay
 * strings. An empty YAML document parses to `null`.
 *
 * @param text - Raw document text.
 * @param format - Format to parse as.
 * @returns The parsed tree.
 * @throws DocumentParseError for invalid syntax or dangerous keys.
 *
 * @example
 * ```typescript
 * parseDocument('a: [1, 2]', 'yaml'); // { a: [1, 2] }
 * ```
 */
export function parseDocument(text: string, format: DocumentFormat): unknown {
  let parsed: unknown;
  try {
    switch (format) {
      case 'yaml':
        parsed = yaml.load(text, { schema: yaml.CORE_SCHEMA });
        break;
      case 'json':
        parsed = JSON.parse(text);
        break;
      case 'toml':
        parsed = TOML.parse(text);
        break;
    }
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new DocumentParseError(`Invalid ${format.toUpperCase()} syntax: ${cause.message}`, {
      format,
      cause,
    });
  }
  rejectDangerousKeys(parsed, format);
  return parsed;
}

/**
 * Parses document text whose root must be a mapping. An empty document is
 * an empty mapping.
 *
 * @throws DocumentParseError when the root is a list or scalar.
 */
export function parseMappingDocument(text: string, format: DocumentFormat): DocumentMapping {
  const parsed = parseDocument(text, format);
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isMapping(parsed)) {
    throw new DocumentParseError(
      `Document root must be a mapping, got ${Array.isArray(parsed) ? 'a list' : typeof parsed}`,
      { format }
    );
  }
  return parsed;
}

/**
 * Reads and parses a document file.
 *
 * @param filePath - File to read.
 * @param options - Format and logger.
 * @returns The root mapping.
 * @throws DocumentParseError when the file cannot be read or parsed.
 */
export async function loadDocument(
  filePath: string,
  options: LoadOptions = {}
): Promise<DocumentMapping> {
  const logger = options.logger ?? defaultLogger;
  const requested = options.format ?? 'auto';
  const format = requested === 'auto' ? detectFormat(filePath) : requested;

  let text: string;
  try {
    text = await safeReadText(filePath);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    logger.warn('document_read_failed', { file: filePath, error: cause.message });
    throw new DocumentParseError(`Cannot read '${filePath}': ${cause.message}`, {
      format,
      source: filePath,
      cause,
    });
  }

  try {
    const document = parseMappingDocument(text, format);
    logger.debug('document_loaded', { file: filePath, format, bytes: text.length });
    return document;
  } catch (error) {
    if (error instanceof DocumentParseError) {
      logger.warn('document_parse_failed', { file: filePath, format, error: error.message });
      throw new DocumentParseError(`${filePath}: ${error.message}`, {
        format,
        source: filePath,
        cause: error.cause ?? error,
      });
    }
    throw error;
  }
}

/**
 * Loads a document file and constructs an instance from it.
 *
 * @param filePath - File to read.
 * @param schema - Schema (or any constructible) to build.
 * @param options - Format and logger.
 * @throws DocumentParseError for unreadable documents.
 * @throws ConstructionError when the document does not fit the schema.
 *
 * @example
 * ```typescript
 * const server = await loadConfig('server.yaml', Server);
 * ```
 */
export async function loadConfig<T>(
  filePath: string,
  schema: Constructible<T>,
  options: LoadOptions = {}
): Promise<T> {
  const document = await loadDocument(filePath, options);
  return schema.construct(document);
}

function rejectDangerousKeys(
  data: unknown,
  format: DocumentFormat,
  visited: WeakSet<object> = new WeakSet()
): void {
  if (data === null || typeof data !== 'object' || visited.has(data)) {
    return;
  }
  visited.add(data);

  if (Array.isArray(data)) {
    for (const item of data) {
      rejectDangerousKeys(item, format, visited);
    }
    return;
  }

  for (const [key, value] of Object.entries(data)) {
    if (DANGEROUS_KEYS.has(key)) {
      throw new DocumentParseError(`Rejected dangerous key '${key}' in ${format.toUpperCase()} input`, {
        format,
      });
    }
    rejectDangerousKeys(value, format, visited);
  }
}
