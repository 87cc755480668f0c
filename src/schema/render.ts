/**
 * Debug rendering of constructed instances, e.g. `Server(host=localhost, port=8080)`.
 *
 * @packageDocumentation
 */

import type { FieldSpec } from './field.js';

/** Instance prototypes point back at their schema through this key. */
export const INSTANCE_OWNER: unique symbol = Symbol('schemacast.owner');

/**
 * The parts of a schema rendering needs.
 */
export interface InstanceOwner {
  readonly name: string;
  readonly fields: readonly FieldSpec[];
}

/**
 * Returns the schema that built `value`, if it is a constructed instance.
 */
export function ownerOf(value: unknown): InstanceOwner | undefined {
  if (typeof value !== 'object' || value === null || !(INSTANCE_OWNER in value)) {
    return undefined;
  }
  const owner: unknown = value[INSTANCE_OWNER];
  return isOwner(owner) ? owner : undefined;
}

/**
 * Renders an instance as `Name(field=value, ...)`, listing set fields in
 * declaration order. Nested instances render the same way.
 */
export function renderInstance(instance: object): string {
  const owner = ownerOf(instance);
  if (owner === undefined) {
    return renderValue(instance, false);
  }
  const parts: string[] = [];
  for (const spec of owner.fields) {
    if (Object.prototype.hasOwnProperty.call(instance, spec.name)) {
      const value: unknown = Reflect.get(instance, spec.name);
      parts.push(`${spec.name}=${renderValue(value, false)}`);
    }
  }
  return `${owner.name}(${parts.join(', ')})`;
}

function renderValue(value: unknown, quoted: boolean): string {
  if (typeof value === 'string') {
    return quoted ? `'${value}'` : value;
  }
  if (value === null || value === undefined) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return `[${value.map((item: unknown) => renderValue(item, true)).join(', ')}]`;
  }
  if (value instanceof Map) {
    const entries = [...value.entries()].map(
      ([k, v]: [unknown, unknown]) => `${renderValue(k, true)}: ${renderValue(v, true)}`
    );
    return `{${entries.join(', ')}}`;
  }
  if (typeof value === 'object') {
    if (ownerOf(value) !== undefined) {
      return renderInstance(value);
    }
    const entries = Object.entries(value).map(
      ([k, v]) => `'${k}': ${renderValue(v, true)}`
    );
    return `{${entries.join(', ')}}`;
  }
  return String(value);
}

function isOwner(value: unknown): value is InstanceOwner {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'fields' in value &&
    Array.isArray(value.fields)
  );
}
