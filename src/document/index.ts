/**
 * Document layer: parsing YAML, JSON and TOML files, type notation and
 * schema documents.
 *
 * @packageDocumentation
 */

export {
  DocumentParseError,
  FORMAT_EXTENSIONS,
  detectFormat,
  isDocumentFormat,
  loadConfig,
  loadDocument,
  parseDocument,
  parseMappingDocument,
} from './loader.js';
export type { DocumentFormat, LoadOptions } from './loader.js';
export { TypeNotationError, parseTypeNotation } from './notation.js';
export type { SchemaLookup } from './notation.js';
export { SchemaDocumentError, buildSchemas, loadSchemaFile } from './schema-file.js';
export type { BuildOptions, DocumentSchema, SchemaSet } from './schema-file.js';
