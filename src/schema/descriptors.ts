/**
 * Type descriptors: the closed set of value shapes a schema field can declare.
 *
 * A descriptor is an immutable tree. Containers carry their element, key and
 * value descriptors; an unparameterized container has `undefined` in those slots
 * and is rejected when a schema is defined.
 *
 * @packageDocumentation
 */

/**
 * Scalar kinds understood by the resolver.
 */
export type PrimitiveKind = 'integer' | 'float' | 'string' | 'boolean';

/** Primitive kinds a map key descriptor may have. */
export const MAP_KEY_KINDS: ReadonlySet<PrimitiveKind> = new Set(['integer', 'float', 'string']);

/**
 * Anything that can build an instance from a mapping.
 *
 * Every schema produced by `defineSchema` is a Constructible; callers can also
 * supply their own for types the engine does not own.
 *
 * @template T - The instance type produced.
 */
export interface Constructible<T = unknown> {
  /** Name used in messages and rendering. */
  readonly name: string;
  /**
   * Builds an instance from a mapping.
   *
   * @throws ConstructionError when the mapping does not fit.
   */
  construct(input: DocumentMapping): T;
}

/**
 * A mapping node of an untyped document: a plain object or a Map.
 */
export type DocumentMapping = Readonly<Record<string, unknown>> | ReadonlyMap<unknown, unknown>;

export interface PrimitiveDescriptor<K extends PrimitiveKind = PrimitiveKind> {
  readonly kind: 'primitive';
  readonly primitive: K;
}

export interface AnyDescriptor {
  readonly kind: 'any';
}

export interface NoneDescriptor {
  readonly kind: 'none';
}

export interface ListDescriptor<E extends TypeDescriptor = TypeDescriptor> {
  readonly kind: 'list';
  /** Element descriptor; `undefined` for an unparameterized list. */
  readonly element: E | undefined;
}

export interface MapDescriptor<
  K extends TypeDescriptor = TypeDescriptor,
  V extends TypeDescriptor = TypeDescriptor,
> {
  readonly kind: 'map';
  /** Key descriptor; `undefined` for an unparameterized map. */
  readonly key: K | undefined;
  /** Value descriptor; `undefined` for an unparameterized map. */
  readonly value: V | undefined;
}

export interface NestedDescriptor<T = unknown> {
  readonly kind: 'nested';
  readonly target: Constructible<T>;
}

/**
 * The closed descriptor union.
 */
export type TypeDescriptor =
  | PrimitiveDescriptor
  | AnyDescriptor
  | NoneDescriptor
  | ListDescriptor
  | MapDescriptor
  | NestedDescriptor;

type PrimitiveValue<K extends PrimitiveKind> = K extends 'integer' | 'float'
  ? number
  : K extends 'string'
    ? string
    : boolean;

/**
 * The TypeScript type of a value resolved against descriptor `D`.
 *
 * Absent values pass through the resolver as `null` at any position, so every
 * field, list element and map value may be `null`.
 *
 * @example
 * ```typescript
 * const d = t.list(t.map(t.string(), t.integer()));
 * type V = Infer<typeof d>; // Map<string, number | null>[] | null
 * ```
 */
export type Infer<D> = Resolved<D> | null;

/**
 * Like {@link Infer}, without the `null` at the top level.
 */
export type Resolved<D> =
  D extends PrimitiveDescriptor<infer K>
    ? PrimitiveValue<K>
    : D extends AnyDescriptor
      ? unknown
      : D extends NoneDescriptor
        ? null
        : D extends ListDescriptor<infer E>
          ? Infer<E>[]
          : D extends MapDescriptor<infer K, infer V>
            ? Map<Resolved<K>, Infer<V>>
            : D extends NestedDescriptor<infer T>
              ? T
              : never;

function freeze<D extends TypeDescriptor>(descriptor: D): D {
  Object.freeze(descriptor);
  return descriptor;
}

const INTEGER: PrimitiveDescriptor<'integer'> = freeze({ kind: 'primitive', primitive: 'integer' });
const FLOAT: PrimitiveDescriptor<'float'> = freeze({ kind: 'primitive', primitive: 'float' });
const STRING: PrimitiveDescriptor<'string'> = freeze({ kind: 'primitive', primitive: 'string' });
const BOOLEAN: PrimitiveDescriptor<'boolean'> = freeze({ kind: 'primitive', primitive: 'boolean' });
const ANY: AnyDescriptor = freeze({ kind: 'any' });
const NONE: NoneDescriptor = freeze({ kind: 'none' });

function list(): ListDescriptor<never>;
function list<E extends TypeDescriptor>(element: E): ListDescriptor<E>;
function list<E extends TypeDescriptor>(element?: E): ListDescriptor<E> {
  const descriptor: ListDescriptor<E> = { kind: 'list', element };
  Object.freeze(descriptor);
  return descriptor;
}

function map(): MapDescriptor<never, never>;
function map<K extends TypeDescriptor, V extends TypeDescriptor>(key: K, value: V): MapDescriptor<K, V>;
function map<K extends TypeDescriptor, V extends TypeDescriptor>(
  key?: K,
  value?: V
): MapDescriptor<K, V> {
  const descriptor: MapDescriptor<K, V> = { kind: 'map', key, value };
  Object.freeze(descriptor);
  return descriptor;
}

function nested<T>(target: Constructible<T>): NestedDescriptor<T> {
  const descriptor: NestedDescriptor<T> = { kind: 'nested', target };
  Object.freeze(descriptor);
  return descriptor;
}

/**
 * Descriptor builders.
 *
 * @example
 * ```typescript
 * import { t } from 'schemacast';
 *
 * const ports = t.map(t.string(), t.list(t.integer()));
 * ```
 */
export const t = {
  integer: (): PrimitiveDescriptor<'integer'> => INTEGER,
  float: (): PrimitiveDescriptor<'float'> => FLOAT,
  string: (): PrimitiveDescriptor<'string'> => STRING,
  boolean: (): PrimitiveDescriptor<'boolean'> => BOOLEAN,
  any: (): AnyDescriptor => ANY,
  none: (): NoneDescriptor => NONE,
  list,
  map,
  nested,
};

/** Notation names for primitive kinds. */
export const PRIMITIVE_NOTATION: Readonly<Record<PrimitiveKind, string>> = {
  integer: 'int',
  float: 'float',
  string: 'str',
  boolean: 'bool',
};

/**
 * Formats a descriptor in type notation, e.g. `list[dict[int, str]]`.
 *
 * Unparameterized containers print as `list` and `dict`.
 */
export function formatDescriptor(descriptor: TypeDescriptor): string {
  switch (descriptor.kind) {
    case 'primitive':
      return PRIMITIVE_NOTATION[descriptor.primitive];
    case 'any':
      return 'any';
    case 'none':
      return 'none';
    case 'list':
      return descriptor.element === undefined
        ? 'list'
        : `list[${formatDescriptor(descriptor.element)}]`;
    case 'map':
      return descriptor.key === undefined || descriptor.value === undefined
        ? 'dict'
        : `dict[${formatDescriptor(descriptor.key)}, ${formatDescriptor(descriptor.value)}]`;
    case 'nested':
      return descriptor.target.name;
  }
}
