/**
 * Definition-time checks for type descriptors.
 *
 * The resolver can only check what a descriptor spells out, so containers must
 * be fully parameterized and map keys restricted to scalar kinds.
 *
 * @packageDocumentation
 */

import { DescriptorError } from './errors.js';
import { MAP_KEY_KINDS, formatDescriptor } from './descriptors.js';
import type { TypeDescriptor } from './descriptors.js';

/**
 * Validates a field's descriptor tree.
 *
 * @param name - Field name for error messages.
 * @param descriptor - Descriptor to check. Typed loosely because descriptors
 *   may come from schema documents or untyped callers.
 * @throws DescriptorError with code UNTYPED_CONTAINER, INVALID_MAP_KEY or
 *   UNSUPPORTED_TYPE.
 */
export function validateDescriptor(name: string, descriptor: unknown): void {
  if (!isDescriptorShape(descriptor)) {
    throw new DescriptorError(
      `Unsupported type '${describeShape(descriptor)}' of key '${name}'`,
      'UNSUPPORTED_TYPE'
    );
  }

  switch (descriptor.kind) {
    case 'primitive':
    case 'any':
    case 'none':
      return;
    case 'list':
      if (descriptor.element === undefined) {
        throw new DescriptorError(
          `Cannot use untyped list '${name}'. Please add an element type`,
          'UNTYPED_CONTAINER'
        );
      }
      validateDescriptor(name, descriptor.element);
      return;
    case 'map': {
      if (descriptor.key === undefined || descriptor.value === undefined) {
        throw new DescriptorError(
          `Cannot use untyped dict '${name}'. Please add key and value types`,
          'UNTYPED_CONTAINER'
        );
      }
      const key: TypeDescriptor = descriptor.key;
      const keyAllowed =
        key.kind === 'any' || (key.kind === 'primitive' && MAP_KEY_KINDS.has(key.primitive));
      if (!keyAllowed) {
        throw new DescriptorError(
          `The dict '${name}' cannot use key type '${safeFormat(key)}' ` +
            `as only int, float, str or any are allowed`,
          'INVALID_MAP_KEY'
        );
      }
      validateDescriptor(name, descriptor.value);
      return;
    }
    case 'nested':
      return;
  }
}

const PRIMITIVE_KINDS: ReadonlySet<string> = new Set(['integer', 'float', 'string', 'boolean']);

/**
 * Checks the runtime shape of a descriptor node (not its children).
 */
function isDescriptorShape(value: unknown): value is TypeDescriptor {
  if (typeof value !== 'object' || value === null || !('kind' in value)) {
    return false;
  }
  switch (value.kind) {
    case 'primitive':
      return 'primitive' in value && typeof value.primitive === 'string' &&
        PRIMITIVE_KINDS.has(value.primitive);
    case 'any':
    case 'none':
    case 'list':
    case 'map':
      return true;
    case 'nested':
      return (
        'target' in value &&
        typeof value.target === 'object' &&
        value.target !== null &&
        'construct' in value.target &&
        typeof value.target.construct === 'function'
      );
    default:
      return false;
  }
}

function describeShape(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'kind' in value) {
    return String(value.kind);
  }
  return value === null ? 'null' : typeof value;
}

function safeFormat(descriptor: TypeDescriptor): string {
  return isDescriptorShape(descriptor) ? formatDescriptor(descriptor) : describeShape(descriptor);
}
