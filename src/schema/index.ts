/**
 * Schema engine: type descriptors, definition-time validation, recursive
 * resolution and object construction.
 *
 * The engine performs no logging and no I/O; see the document module for
 * loading files.
 *
 * @packageDocumentation
 */

export {
  MAP_KEY_KINDS,
  PRIMITIVE_NOTATION,
  formatDescriptor,
  t,
} from './descriptors.js';
export type {
  AnyDescriptor,
  Constructible,
  DocumentMapping,
  Infer,
  ListDescriptor,
  MapDescriptor,
  NestedDescriptor,
  NoneDescriptor,
  PrimitiveDescriptor,
  PrimitiveKind,
  Resolved,
  TypeDescriptor,
} from './descriptors.js';
export {
  ConstructionError,
  DescriptorError,
  SchemaRegistrationError,
  describeValue,
  formatPath,
  nativeKindName,
} from './errors.js';
export type {
  ConstructionErrorCode,
  ConstructionErrorDetails,
  RegistrationErrorCode,
} from './errors.js';
export { validateDescriptor } from './validator.js';
export {
  MAX_RESOLVE_DEPTH,
  isMapping,
  mappingEntries,
  matchesPrimitive,
  resolveValue,
} from './resolver.js';
export { FieldToken, classifyField, field, isOption } from './field.js';
export type {
  DefaultFactory,
  DefaultLiteral,
  FieldDeclaration,
  FieldDefault,
  FieldOptions,
  FieldSpec,
} from './field.js';
export { defineSchema, toRecord } from './schema.js';
export type {
  DeclaredType,
  FieldDeclarations,
  InstanceOf,
  Schema,
  SchemaOptions,
} from './schema.js';
export { renderInstance, ownerOf } from './render.js';
export type { InstanceOwner } from './render.js';
