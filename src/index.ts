/**
 * schemacast
 *
 * Schema-driven object construction: declare fields with types, defaults,
 * aliases and allowed values, then build typed instances from untyped
 * YAML, JSON or TOML documents.
 *
 * @packageDocumentation
 */

export { VERSION } from './version.js';

// Schema engine
export {
  ConstructionError,
  DescriptorError,
  FieldToken,
  MAP_KEY_KINDS,
  MAX_RESOLVE_DEPTH,
  PRIMITIVE_NOTATION,
  SchemaRegistrationError,
  classifyField,
  defineSchema,
  describeValue,
  field,
  formatDescriptor,
  formatPath,
  isMapping,
  isOption,
  mappingEntries,
  matchesPrimitive,
  nativeKindName,
  ownerOf,
  renderInstance,
  resolveValue,
  t,
  toRecord,
  validateDescriptor,
} from './schema/index.js';
export type {
  AnyDescriptor,
  Constructible,
  ConstructionErrorCode,
  ConstructionErrorDetails,
  DeclaredType,
  DefaultFactory,
  DefaultLiteral,
  DocumentMapping,
  FieldDeclaration,
  FieldDeclarations,
  FieldDefault,
  FieldOptions,
  FieldSpec,
  Infer,
  InstanceOf,
  InstanceOwner,
  ListDescriptor,
  MapDescriptor,
  NestedDescriptor,
  NoneDescriptor,
  PrimitiveDescriptor,
  PrimitiveKind,
  RegistrationErrorCode,
  Resolved,
  Schema,
  SchemaOptions,
  TypeDescriptor,
} from './schema/index.js';

// Documents
export {
  DocumentParseError,
  FORMAT_EXTENSIONS,
  SchemaDocumentError,
  TypeNotationError,
  buildSchemas,
  detectFormat,
  isDocumentFormat,
  loadConfig,
  loadDocument,
  loadSchemaFile,
  parseDocument,
  parseMappingDocument,
  parseTypeNotation,
} from './document/index.js';
export type {
  BuildOptions,
  DocumentFormat,
  DocumentSchema,
  LoadOptions,
  SchemaLookup,
  SchemaSet,
} from './document/index.js';

// Settings
export {
  DEFAULT_SETTINGS,
  EnvCoercionError,
  SETTINGS_SCHEMA,
  SettingsError,
  readEnvOverrides,
  resolveSettings,
} from './config/index.js';
export type { FormatSetting, PartialSettings, SchemacastSettings } from './config/index.js';

// Logging
export { Logger } from './utils/logger.js';
export type { LogEntry, LogLevel, LogSink, LoggerOptions } from './utils/logger.js';
