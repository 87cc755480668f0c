/**
 * Construction-time resolution of untyped values against type descriptors.
 *
 * `resolveValue` is the single recursive core: lists, maps and nested schemas
 * all funnel back through it. Containers are rebuilt, never shared with the
 * input.
 *
 * @packageDocumentation
 */

import { ConstructionError, describeValue } from './errors.js';
import { formatDescriptor } from './descriptors.js';
import type { DocumentMapping, PrimitiveKind, TypeDescriptor } from './descriptors.js';

/** Nesting depth at which resolution gives up. */
export const MAX_RESOLVE_DEPTH = 256;

/**
 * Checks whether a value is a mapping node: a Map, or an object whose
 * prototype is `Object.prototype` or `null`.
 */
export function isMapping(value: unknown): value is DocumentMapping {
  if (value instanceof Map) {
    return true;
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Returns the entries of a mapping node in iteration order.
 */
export function mappingEntries(mapping: DocumentMapping): [unknown, unknown][] {
  if (mapping instanceof Map) {
    return [...mapping.entries()];
  }
  return Object.entries(mapping);
}

/**
 * Checks whether a value has the native representation of a primitive kind.
 *
 * Every JS number is a double, so any number passes as `float`; `integer`
 * additionally requires an integral value.
 */
export function matchesPrimitive(value: unknown, kind: PrimitiveKind): boolean {
  switch (kind) {
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'float':
      return typeof value === 'number';
    case 'string':
      return typeof value === 'string';
    case 'boolean':
      return typeof value === 'boolean';
  }
}

/**
 * Resolves `value` against `descriptor`.
 *
 * @param path - Path of the value, used in error messages.
 * @param value - Untyped input value.
 * @param descriptor - Expected shape.
 * @returns The typed value: containers freshly built, nested schemas constructed.
 * @throws ConstructionError on the first mismatch.
 *
 * @example
 * ```typescript
 * resolveValue(['ports'], [80, 443], t.list(t.integer())); // [80, 443]
 * resolveValue(['ports'], ['80'], t.list(t.integer()));    // throws WRONG_TYPE at ports[0]
 * ```
 */
export function resolveValue(
  path: readonly string[],
  value: unknown,
  descriptor: TypeDescriptor
): unknown {
  return resolveAt(path, value, descriptor, 0);
}

function resolveAt(
  path: readonly string[],
  value: unknown,
  descriptor: TypeDescriptor,
  depth: number
): unknown {
  if (depth > MAX_RESOLVE_DEPTH) {
    throw wrongType(path, value, descriptor, `Nesting exceeds ${String(MAX_RESOLVE_DEPTH)} levels.`);
  }

  // Whether null is acceptable is decided by the construction layer.
  if (value === null || value === undefined) {
    return null;
  }

  switch (descriptor.kind) {
    case 'any':
      return value;
    case 'none':
      throw wrongType(path, value, descriptor);
    case 'primitive':
      if (!matchesPrimitive(value, descriptor.primitive)) {
        throw wrongType(path, value, descriptor);
      }
      return value;
    case 'nested': {
      if (!isMapping(value)) {
        throw wrongType(path, value, descriptor);
      }
      try {
        return descriptor.target.construct(value);
      } catch (error) {
        if (error instanceof ConstructionError) {
          throw error.withPrefix(path);
        }
        throw error;
      }
    }
    case 'list': {
      const element = descriptor.element;
      if (!Array.isArray(value) || element === undefined) {
        throw wrongType(path, value, descriptor);
      }
      return value.map((item: unknown, index: number) =>
        resolveAt([...path, `[${String(index)}]`], item, element, depth + 1)
      );
    }
    case 'map': {
      const keyDescriptor = descriptor.key;
      const valueDescriptor = descriptor.value;
      if (!isMapping(value) || keyDescriptor === undefined || valueDescriptor === undefined) {
        throw wrongType(path, value, descriptor);
      }
      const fromObject = !(value instanceof Map);
      const result = new Map<unknown, unknown>();
      for (const [rawKey, rawValue] of mappingEntries(value)) {
        const key = fromObject ? decodeObjectKey(rawKey, keyDescriptor) : rawKey;
        const keyPath = [...path, `[${describeValue(key)}]`];
        if (typeof key !== 'string' && typeof key !== 'number') {
          throw wrongType(keyPath, key, keyDescriptor, 'Map keys must be int, float or str.');
        }
        resolveAt(keyPath, key, keyDescriptor, depth + 1);
        result.set(key, resolveAt(keyPath, rawValue, valueDescriptor, depth + 1));
      }
      return result;
    }
  }
}

/**
 * Object keys are always text; numeric key descriptors read canonical
 * decimal text back as a number.
 */
function decodeObjectKey(key: unknown, keyDescriptor: TypeDescriptor): unknown {
  if (typeof key !== 'string' || keyDescriptor.kind !== 'primitive') {
    return key;
  }
  if (keyDescriptor.primitive !== 'integer' && keyDescriptor.primitive !== 'float') {
    return key;
  }
  const asNumber = Number(key);
  return key.trim() !== '' && String(asNumber) === key ? asNumber : key;
}

function wrongType(
  path: readonly string[],
  value: unknown,
  descriptor: TypeDescriptor,
  detail?: string
): ConstructionError {
  return new ConstructionError('WRONG_TYPE', {
    path,
    value,
    expected: formatDescriptor(descriptor),
    detail,
  });
}
