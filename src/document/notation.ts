/**
 * Type notation: the text form of descriptors used by schema documents.
 *
 * Grammar:
 * ```
 * type   := name | name '[' type (',' type)* ']'
 * name   := int | integer | float | str | string | bool | boolean
 *         | any | none | list | dict | map | <schema name>
 * ```
 *
 * `list` and `dict` without parameters parse to unparameterized descriptors;
 * `defineSchema` rejects those, so the error names the field.
 *
 * @packageDocumentation
 */

import { t } from '../schema/index.js';
import type { Constructible, TypeDescriptor } from '../schema/index.js';

/**
 * Looks up a schema by name; `undefined` means unknown.
 */
export type SchemaLookup = (name: string) => Constructible | undefined;

/**
 * Error class for notation that does not parse.
 */
export class TypeNotationError extends Error {
  /** The full notation text. */
  public readonly notation: string;
  /** Character offset where parsing failed. */
  public readonly position: number;

  /**
   * Creates a new TypeNotationError.
   *
   * @param message - Descriptive error message.
   * @param notation - The text being parsed.
   * @param position - Offset of the failure.
   */
  constructor(message: string, notation: string, position: number) {
    super(`${message} at position ${String(position)} in '${notation}'`);
    this.name = 'TypeNotationError';
    this.notation = notation;
    this.position = position;
  }
}

const PRIMITIVES: Readonly<Record<string, () => TypeDescriptor>> = {
  int: t.integer,
  integer: t.integer,
  float: t.float,
  str: t.string,
  string: t.string,
  bool: t.boolean,
  boolean: t.boolean,
  any: t.any,
  none: t.none,
};

const LIST_NAMES: ReadonlySet<string> = new Set(['list']);
const MAP_NAMES: ReadonlySet<string> = new Set(['dict', 'map']);

interface Token {
  readonly kind: 'name' | '[' | ']' | ',' | 'end';
  readonly text: string;
  readonly position: number;
}

const NAME_PATTERN = /[A-Za-z_][A-Za-z0-9_.-]*/y;

function tokenize(notation: string): Token[] {
  const tokens: Token[] = [];
  let position = 0;
  while (position < notation.length) {
    const char = notation.charAt(position);
    if (/\s/.test(char)) {
      position += 1;
      continue;
    }
    if (char === '[' || char === ']' || char === ',') {
      tokens.push({ kind: char, text: char, position });
      position += 1;
      continue;
    }
    NAME_PATTERN.lastIndex = position;
    const match = NAME_PATTERN.exec(notation);
    if (match === null) {
      throw new TypeNotationError(`Unexpected character '${char}'`, notation, position);
    }
    tokens.push({ kind: 'name', text: match[0], position });
    position += match[0].length;
  }
  tokens.push({ kind: 'end', text: '', position: notation.length });
  return tokens;
}

class NotationParser {
  private readonly notation: string;
  private readonly lookup: SchemaLookup;
  private readonly tokens: Token[];
  private index = 0;

  constructor(notation: string, lookup: SchemaLookup) {
    this.notation = notation;
    this.lookup = lookup;
    this.tokens = tokenize(notation);
  }

  parse(): TypeDescriptor {
    const descriptor = this.parseType();
    const trailing = this.peek();
    if (trailing.kind !== 'end') {
      throw this.error(`Unexpected '${trailing.text}'`, trailing);
    }
    return descriptor;
  }

  private parseType(): TypeDescriptor {
    const token = this.next();
    if (token.kind !== 'name') {
      throw this.error(
        token.kind === 'end' ? 'Expected a type name' : `Expected a type name, got '${token.text}'`,
        token
      );
    }
    const name = token.text;
    const params = this.peek().kind === '[' ? this.parseParams() : undefined;

    if (LIST_NAMES.has(name)) {
      if (params === undefined) {
        return t.list();
      }
      this.expectArity(name, params, 1, token);
      const [element] = params;
      return element === undefined ? t.list() : t.list(element);
    }

    if (MAP_NAMES.has(name)) {
      if (params === undefined) {
        return t.map();
      }
      this.expectArity(name, params, 2, token);
      const [key, value] = params;
      return key === undefined || value === undefined ? t.map() : t.map(key, value);
    }

    if (params !== undefined) {
      throw this.error(`Type '${name}' takes no parameters`, token);
    }

    const primitive = PRIMITIVES[name];
    if (primitive !== undefined) {
      return primitive();
    }
    const target = this.lookup(name);
    if (target === undefined) {
      throw this.error(`Unknown type '${name}'`, token);
    }
    return t.nested(target);
  }

  private parseParams(): TypeDescriptor[] {
    this.next();
    const params: TypeDescriptor[] = [this.parseType()];
    while (this.peek().kind === ',') {
      this.next();
      params.push(this.parseType());
    }
    const close = this.next();
    if (close.kind !== ']') {
      throw this.error(`Expected ']'`, close);
    }
    return params;
  }

  private expectArity(name: string, params: TypeDescriptor[], arity: number, token: Token): void {
    if (params.length !== arity) {
      throw this.error(
        `Type '${name}' takes ${String(arity)} parameter${arity === 1 ? '' : 's'}, got ${String(params.length)}`,
        token
      );
    }
  }

  private peek(): Token {
    return this.tokens[this.index] ?? this.endToken();
  }

  private next(): Token {
    const token = this.peek();
    if (token.kind !== 'end') {
      this.index += 1;
    }
    return token;
  }

  private endToken(): Token {
    return { kind: 'end', text: '', position: this.notation.length };
  }

  private error(message: string, token: Token): TypeNotationError {
    return new TypeNotationError(message, this.notation, token.position);
  }
}

const noSchemas: SchemaLookup = () => undefined;

/**
 * Parses type notation into a descriptor.
 *
 * @param notation - Text such as `list[dict[str, int]]`.
 * @param lookup - Resolves schema names; without it only built-in names parse.
 * @returns The descriptor. It is not validated; `defineSchema` does that.
 * @throws TypeNotationError for malformed text or unknown names.
 *
 * @example
 * ```typescript
 * parseTypeNotation('dict[str, list[int]]');
 * // t.map(t.string(), t.list(t.integer()))
 * ```
 */
export function parseTypeNotation(notation: string, lookup: SchemaLookup = noSchemas): TypeDescriptor {
  return new NotationParser(notation, lookup).parse();
}
