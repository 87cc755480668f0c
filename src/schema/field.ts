/**
 * Field declarations and their classification into required/optional specs.
 *
 * @packageDocumentation
 */

import { isDeepStrictEqual } from 'node:util';
import { t } from './descriptors.js';
import type { TypeDescriptor } from './descriptors.js';
import { ConstructionError, DescriptorError, SchemaRegistrationError } from './errors.js';
import { resolveValue } from './resolver.js';
import { validateDescriptor } from './validator.js';

/**
 * Literal kinds accepted as defaults. Containers need a factory so every
 * instance gets its own copy.
 */
export type DefaultLiteral = string | number | boolean;

/**
 * Zero-argument default producer, invoked at construction time only.
 */
export type DefaultFactory = () => unknown;

/**
 * Extra settings for a field.
 */
export interface FieldOptions {
  /** Input key to read instead of the field's own name. */
  readonly alias?: string | undefined;
  /** Literal default or factory; `null`/`undefined` leaves the field required. */
  readonly default?: DefaultLiteral | DefaultFactory | null | undefined;
  /** Allow-list of raw input values. */
  readonly options?: readonly unknown[] | undefined;
}

/**
 * A declared field carrying alias, default or allow-list settings.
 *
 * Created with {@link field}.
 */
export class FieldToken<D extends TypeDescriptor = TypeDescriptor> {
  readonly type: D;
  readonly alias: string | undefined;
  readonly default: DefaultLiteral | DefaultFactory | null | undefined;
  readonly options: readonly unknown[] | undefined;

  constructor(type: D, options: FieldOptions) {
    this.type = type;
    this.alias = options.alias;
    this.default = options.default;
    this.options = options.options;
    Object.freeze(this);
  }
}

/**
 * Declares a field with an alias, a default or an allow-list.
 *
 * @example
 * ```typescript
 * const Server = defineSchema('Server', {
 *   host: t.string(),
 *   port: field(t.integer(), { default: 8080, options: [80, 443, 8080] }),
 *   tlsCert: field(t.string(), { alias: 'tls-cert', default: '' }),
 *   tags: field(t.list(t.string()), { default: () => [] }),
 * });
 * ```
 */
export function field<D extends TypeDescriptor>(type: D, options: FieldOptions = {}): FieldToken<D> {
  return new FieldToken(type, options);
}

/**
 * A field entry in a schema declaration: a bare descriptor is required.
 */
export type FieldDeclaration = TypeDescriptor | FieldToken;

/**
 * How a missing optional field gets its value.
 */
export type FieldDefault =
  | { readonly kind: 'literal'; readonly value: DefaultLiteral }
  | { readonly kind: 'factory'; readonly produce: DefaultFactory };

/**
 * A fully classified field.
 */
export interface FieldSpec {
  /** Internal field name. */
  readonly name: string;
  /** Declared type. */
  readonly type: TypeDescriptor;
  /** Required fields have no default. */
  readonly category: 'required' | 'optional';
  /** Default for optional fields. */
  readonly default: FieldDefault | undefined;
  /** Input key the field is read from. */
  readonly alias: string;
  /** Allow-list of raw input values, if declared. */
  readonly options: readonly unknown[] | undefined;
}

/**
 * Classifies one declaration and runs every definition-time check on it.
 *
 * @param schemaName - Owning schema, for messages.
 * @param name - Field name.
 * @param declaration - Bare descriptor or field token.
 * @throws SchemaRegistrationError when the declaration is invalid.
 */
export function classifyField(
  schemaName: string,
  name: string,
  declaration: FieldDeclaration
): FieldSpec {
  const token = declaration instanceof FieldToken ? declaration : undefined;
  const type: TypeDescriptor = declaration instanceof FieldToken ? declaration.type : declaration;
  const context = { schemaName, field: name };

  try {
    validateDescriptor(name, type);
  } catch (error) {
    if (error instanceof DescriptorError) {
      throw new SchemaRegistrationError(
        `Invalid type for '${schemaName}.${name}': ${error.message}`,
        error.code,
        { ...context, cause: error }
      );
    }
    throw error;
  }

  const fieldDefault = classifyDefault(schemaName, name, type, token?.default);
  const options = token?.options;

  if (options !== undefined) {
    checkOptions(schemaName, name, type, options);
    if (fieldDefault?.kind === 'literal' && !isOption(fieldDefault.value, options)) {
      throw new SchemaRegistrationError(
        `Default '${String(fieldDefault.value)}' of '${schemaName}.${name}' is not one of its options`,
        'DEFAULT_NOT_IN_OPTIONS',
        context
      );
    }
  }

  const spec: FieldSpec = {
    name,
    type,
    category: fieldDefault === undefined ? 'required' : 'optional',
    default: fieldDefault,
    alias: token?.alias ?? name,
    options: options !== undefined ? Object.freeze([...options]) : undefined,
  };
  return Object.freeze(spec);
}

/**
 * Checks raw membership in an allow-list by structural equality. Scalars
 * compare with `===`, so `-0` matches `0`.
 */
export function isOption(value: unknown, options: readonly unknown[]): boolean {
  return options.some((option) => option === value || isDeepStrictEqual(option, value));
}

function classifyDefault(
  schemaName: string,
  name: string,
  type: TypeDescriptor,
  value: DefaultLiteral | DefaultFactory | null | undefined
): FieldDefault | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (typeof value === 'function') {
    // Factories run at construction time only.
    return { kind: 'factory', produce: value };
  }
  if (!isDefaultLiteral(value)) {
    throw new SchemaRegistrationError(
      `Defaults must be str, int, float, bool or a factory. ` +
        `You set '${schemaName}.${name}' to a ${Array.isArray(value) ? 'list' : typeof value}`,
      'INVALID_DEFAULT',
      { schemaName, field: name }
    );
  }
  try {
    resolveValue([`Default of ${name}`], value, type);
  } catch (error) {
    if (error instanceof ConstructionError) {
      throw new SchemaRegistrationError(
        `Invalid default for '${schemaName}.${name}': ${error.message}`,
        'INVALID_DEFAULT',
        { schemaName, field: name, cause: error }
      );
    }
    throw error;
  }
  return { kind: 'literal', value };
}

function checkOptions(
  schemaName: string,
  name: string,
  type: TypeDescriptor,
  options: readonly unknown[]
): void {
  try {
    resolveValue([`Options of ${schemaName}.${name}`], options, t.list(type));
  } catch (error) {
    if (error instanceof ConstructionError) {
      throw new SchemaRegistrationError(
        `Invalid options for '${schemaName}.${name}': ${error.message}`,
        'UNSUPPORTED_TYPE',
        { schemaName, field: name, cause: error }
      );
    }
    throw error;
  }
}

function isDefaultLiteral(value: unknown): value is DefaultLiteral {
  return (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}
