/**
 * Schema definition and the object-construction protocol.
 *
 * `defineSchema` validates and classifies every field once, then returns a
 * frozen schema whose `construct` turns an untyped mapping into a typed
 * instance.
 *
 * @packageDocumentation
 */

import { formatDescriptor } from './descriptors.js';
import type { DocumentMapping, Resolved, TypeDescriptor } from './descriptors.js';
import { ConstructionError, SchemaRegistrationError } from './errors.js';
import { FieldToken, classifyField, isOption } from './field.js';
import type { FieldDeclaration, FieldSpec } from './field.js';
import { INSTANCE_OWNER, ownerOf, renderInstance } from './render.js';
import { isMapping, mappingEntries, resolveValue } from './resolver.js';

/**
 * Per-schema tolerance settings.
 */
export interface SchemaOptions {
  /**
   * Skip input keys that match no field instead of failing.
   * @defaultValue false
   */
  readonly ignoreUnknownFields?: boolean | undefined;
  /**
   * Leave missing required fields unset instead of failing.
   * @defaultValue false
   */
  readonly ignoreMissingFields?: boolean | undefined;
}

/**
 * Field declarations keyed by field name, in declaration order.
 */
export type FieldDeclarations = Readonly<Record<string, FieldDeclaration>>;

/** The descriptor behind a declaration. */
export type DeclaredType<F> =
  F extends FieldToken<infer D> ? D : F extends TypeDescriptor ? F : never;

/**
 * Instance type of a schema declared with fields `F`.
 */
export type InstanceOf<F extends FieldDeclarations> = {
  [K in keyof F]: Resolved<DeclaredType<F[K]>>;
};

/**
 * A defined record type.
 *
 * @template T - Instance type.
 */
export interface Schema<T> {
  /** Schema name, used in messages and rendering. */
  readonly name: string;
  /** Classified fields in declaration order. */
  readonly fields: readonly FieldSpec[];
  /** Required fields by internal name. */
  readonly required: ReadonlyMap<string, FieldSpec>;
  /** Optional fields by internal name. */
  readonly optional: ReadonlyMap<string, FieldSpec>;
  /** Input key to internal field name. */
  readonly aliases: ReadonlyMap<string, string>;
  /** Allow-lists by internal field name. */
  readonly options: ReadonlyMap<string, readonly unknown[]>;
  /** Effective tolerance settings. */
  readonly settings: Readonly<Required<SchemaOptions>>;

  /**
   * Builds an instance from one mapping.
   *
   * @throws ConstructionError with code USAGE_ERROR when given anything but
   *   exactly one mapping, or the first field error otherwise.
   */
  construct(input: DocumentMapping): T;

  /**
   * Builds an instance from named fields; same rules as {@link construct}.
   */
  constructFromFields(fields: Readonly<Record<string, unknown>>): T;

  /**
   * Top-level set fields as a plain object, in declaration order.
   * Nested instances are kept as they are.
   */
  toRecord(instance: T): Record<string, unknown>;

  /** Renders an instance as `Name(field=value, ...)`. */
  render(instance: T): string;

  /** Checks whether a value was built by this schema. */
  isInstance(value: unknown): value is T;
}

class DefinedSchema<T> implements Schema<T> {
  readonly name: string;
  readonly fields: readonly FieldSpec[];
  readonly required: ReadonlyMap<string, FieldSpec>;
  readonly optional: ReadonlyMap<string, FieldSpec>;
  readonly aliases: ReadonlyMap<string, string>;
  readonly options: ReadonlyMap<string, readonly unknown[]>;
  readonly settings: Readonly<Required<SchemaOptions>>;
  private readonly instancePrototype: object;

  constructor(name: string, declarations: FieldDeclarations, options: SchemaOptions) {
    const fields: FieldSpec[] = [];
    const required = new Map<string, FieldSpec>();
    const optional = new Map<string, FieldSpec>();
    const aliases = new Map<string, string>();
    const allowLists = new Map<string, readonly unknown[]>();

    for (const [fieldName, declaration] of Object.entries(declarations)) {
      const spec = classifyField(name, fieldName, declaration);
      const taken = aliases.get(spec.alias);
      if (taken !== undefined) {
        throw new SchemaRegistrationError(
          `Fields '${name}.${taken}' and '${name}.${fieldName}' both read input key '${spec.alias}'`,
          'DUPLICATE_INPUT_KEY',
          { schemaName: name, field: fieldName }
        );
      }
      fields.push(spec);
      (spec.category === 'required' ? required : optional).set(fieldName, spec);
      aliases.set(spec.alias, fieldName);
      if (spec.options !== undefined) {
        allowLists.set(fieldName, spec.options);
      }
    }

    this.name = name;
    this.fields = Object.freeze(fields);
    this.required = required;
    this.optional = optional;
    this.aliases = aliases;
    this.options = allowLists;
    this.settings = Object.freeze({
      ignoreUnknownFields: options.ignoreUnknownFields ?? false,
      ignoreMissingFields: options.ignoreMissingFields ?? false,
    });

    this.instancePrototype = Object.freeze({
      [INSTANCE_OWNER]: this,
      toString(this: object): string {
        return renderInstance(this);
      },
    });
    Object.freeze(this);
  }

  construct(input: DocumentMapping, ...extra: unknown[]): T {
    if (extra.length > 0) {
      throw this.usageError('Got a mapping and additional arguments.');
    }
    if (!isMapping(input)) {
      throw this.usageError(`Got ${Array.isArray(input) ? 'a list' : typeof input}.`);
    }
    return this.build(input);
  }

  constructFromFields(fields: Readonly<Record<string, unknown>>, ...extra: unknown[]): T {
    if (extra.length > 0 || !isMapping(fields)) {
      throw this.usageError('Pass named fields as a single object.');
    }
    return this.build(fields);
  }

  toRecord(instance: T): Record<string, unknown> {
    return toRecord(instance);
  }

  render(instance: T): string {
    return typeof instance === 'object' && instance !== null
      ? renderInstance(instance)
      : String(instance);
  }

  isInstance(value: unknown): value is T {
    return (
      typeof value === 'object' &&
      value !== null &&
      Object.getPrototypeOf(value) === this.instancePrototype
    );
  }

  private build(source: DocumentMapping): T {
    const seen = new Set<string>();
    const instance: object = Object.create(this.instancePrototype);

    for (const [rawKey, value] of mappingEntries(source)) {
      const fieldName = typeof rawKey === 'string' ? this.aliases.get(rawKey) : undefined;
      if (fieldName === undefined) {
        if (this.settings.ignoreUnknownFields) {
          continue;
        }
        throw new ConstructionError('UNKNOWN_ARGUMENT', {
          path: [String(rawKey)],
          value,
          schemaName: this.name,
        });
      }
      const key = String(rawKey);
      const spec = this.specFor(fieldName);
      seen.add(fieldName);

      if (!isSupportedInput(value)) {
        throw new ConstructionError('UNSUPPORTED_TYPE', {
          path: [key],
          value,
          schemaName: this.name,
        });
      }

      const allowed = this.options.get(fieldName);
      if (allowed !== undefined && !isOption(value, allowed)) {
        throw new ConstructionError('VALUE_NOT_AN_OPTION', {
          path: [key],
          value,
          schemaName: this.name,
          options: allowed,
        });
      }

      setField(instance, fieldName, resolveValue([key], value, spec.type));
    }

    for (const [fieldName, spec] of this.required) {
      if (!seen.has(fieldName) && !this.settings.ignoreMissingFields) {
        throw new ConstructionError('MISSING_REQUIRED_ARGUMENT', {
          path: [fieldName],
          schemaName: this.name,
          detail: spec.alias !== fieldName ? `(input key '${spec.alias}')` : undefined,
        });
      }
    }

    for (const [fieldName, spec] of this.optional) {
      if (seen.has(fieldName) || spec.default === undefined) {
        continue;
      }
      if (spec.default.kind === 'literal') {
        setField(instance, fieldName, spec.default.value);
        continue;
      }
      const produced = spec.default.produce();
      const path = [`Default of ${fieldName}`];
      if ((produced === null || produced === undefined) && !acceptsAbsent(spec.type)) {
        throw new ConstructionError('WRONG_TYPE', {
          path,
          value: produced,
          schemaName: this.name,
          expected: formatDescriptor(spec.type),
        });
      }
      setField(instance, fieldName, resolveValue(path, produced, spec.type));
    }

    if (!this.isInstance(instance)) {
      throw new Error(`Instance of '${this.name}' lost its prototype`);
    }
    return instance;
  }

  private specFor(fieldName: string): FieldSpec {
    const spec = this.required.get(fieldName) ?? this.optional.get(fieldName);
    if (spec === undefined) {
      throw new Error(`Alias table of '${this.name}' points at unknown field '${fieldName}'`);
    }
    return spec;
  }

  private usageError(detail: string): ConstructionError {
    return new ConstructionError('USAGE_ERROR', { path: [], schemaName: this.name, detail });
  }
}

/**
 * Defines a record type.
 *
 * @param name - Schema name, used in messages and rendering.
 * @param fields - Field declarations in order. A bare descriptor declares a
 *   required field; {@link field} adds an alias, default or allow-list.
 * @param options - Tolerance for unknown and missing input keys.
 * @returns A frozen schema.
 * @throws SchemaRegistrationError when a declaration is invalid.
 *
 * @example
 * ```typescript
 * import { defineSchema, field, t } from 'schemacast';
 *
 * const Server = defineSchema('Server', {
 *   host: t.string(),
 *   port: field(t.integer(), { default: 8080 }),
 * });
 *
 * const server = Server.construct({ host: 'localhost' });
 * console.log(server.port); // 8080
 * ```
 */
export function defineSchema<F extends FieldDeclarations>(
  name: string,
  fields: F,
  options: SchemaOptions & { readonly ignoreMissingFields: true }
): Schema<Partial<InstanceOf<F>>>;
export function defineSchema<F extends FieldDeclarations>(
  name: string,
  fields: F,
  options?: SchemaOptions
): Schema<InstanceOf<F>>;
export function defineSchema<F extends FieldDeclarations>(
  name: string,
  fields: F,
  options: SchemaOptions = {}
): Schema<InstanceOf<F>> | Schema<Partial<InstanceOf<F>>> {
  return new DefinedSchema<InstanceOf<F>>(name, fields, options);
}

/**
 * Flattens an instance's top-level set fields into a plain object, in
 * declaration order. Values are not copied or flattened further.
 */
export function toRecord(instance: unknown): Record<string, unknown> {
  if (typeof instance !== 'object' || instance === null) {
    return {};
  }
  const owner = ownerOf(instance);
  if (owner === undefined) {
    return Object.fromEntries(Object.entries(instance));
  }
  const entries: [string, unknown][] = [];
  for (const spec of owner.fields) {
    if (Object.prototype.hasOwnProperty.call(instance, spec.name)) {
      entries.push([spec.name, Reflect.get(instance, spec.name)]);
    }
  }
  return Object.fromEntries(entries);
}

function setField(instance: object, name: string, value: unknown): void {
  Object.defineProperty(instance, name, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

function isSupportedInput(value: unknown): boolean {
  return (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    Array.isArray(value) ||
    isMapping(value)
  );
}

function acceptsAbsent(type: TypeDescriptor): boolean {
  return type.kind === 'any' || type.kind === 'none';
}
