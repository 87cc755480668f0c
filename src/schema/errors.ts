/**
 * Errors raised while defining schemas and constructing instances.
 *
 * Registration errors are raised once, by `defineSchema`. Construction errors
 * are raised per construction call; the first one aborts the call.
 *
 * @packageDocumentation
 */

/**
 * Error codes for schema definition failures.
 */
export type RegistrationErrorCode =
  | 'UNTYPED_CONTAINER'
  | 'INVALID_MAP_KEY'
  | 'UNSUPPORTED_TYPE'
  | 'INVALID_DEFAULT'
  | 'DEFAULT_NOT_IN_OPTIONS'
  | 'DUPLICATE_INPUT_KEY';

/**
 * Error codes for construction failures.
 */
export type ConstructionErrorCode =
  | 'WRONG_TYPE'
  | 'UNKNOWN_ARGUMENT'
  | 'MISSING_REQUIRED_ARGUMENT'
  | 'UNSUPPORTED_TYPE'
  | 'VALUE_NOT_AN_OPTION'
  | 'USAGE_ERROR';

/**
 * Error class for invalid schema definitions.
 */
export class SchemaRegistrationError extends Error {
  /** The error code for programmatic handling. */
  public readonly code: RegistrationErrorCode;
  /** Name of the schema being defined. */
  public readonly schemaName: string;
  /** Field whose declaration was rejected. */
  public readonly field: string;
  /** The underlying error, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new SchemaRegistrationError.
   *
   * @param message - Human-readable error message.
   * @param code - The error code.
   * @param context - Schema and field the error belongs to.
   */
  constructor(
    message: string,
    code: RegistrationErrorCode,
    context: { schemaName: string; field: string; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'SchemaRegistrationError';
    this.code = code;
    this.schemaName = context.schemaName;
    this.field = context.field;
    this.cause = context.cause;
  }
}

/**
 * Error raised by the validator before the owning schema name is known.
 *
 * `defineSchema` turns it into a {@link SchemaRegistrationError}.
 */
export class DescriptorError extends Error {
  public readonly code: RegistrationErrorCode;

  constructor(message: string, code: RegistrationErrorCode) {
    super(message);
    this.name = 'DescriptorError';
    this.code = code;
  }
}

/**
 * Context carried by a construction error.
 */
export interface ConstructionErrorDetails {
  /** Path from the outermost field to the failing value. */
  readonly path: readonly string[];
  /** The offending value. */
  readonly value?: unknown;
  /** Expected shape in type notation, when one applies. */
  readonly expected?: string | undefined;
  /** Schema being constructed when the error was raised. */
  readonly schemaName?: string | undefined;
  /** Allowed values, for VALUE_NOT_AN_OPTION. */
  readonly options?: readonly unknown[] | undefined;
  /** Extra text appended to the message. */
  readonly detail?: string | undefined;
}

/**
 * Error class for failed construction calls.
 *
 * Messages are rebuilt from the details whenever a parent path segment is
 * prepended, so a failure deep inside nested schemas reads
 * `... for key 'servers[0].port'`.
 */
export class ConstructionError extends Error {
  /** The error code for programmatic handling. */
  public readonly code: ConstructionErrorCode;
  /** Path segments from the outermost field to the failing value. */
  public readonly path: readonly string[];
  /** The offending value. */
  public readonly value: unknown;
  /** Expected shape in type notation, when one applies. */
  public readonly expected: string | undefined;
  /** Schema being constructed when the error was raised. */
  public readonly schemaName: string | undefined;
  /** Allowed values, for VALUE_NOT_AN_OPTION. */
  public readonly options: readonly unknown[] | undefined;
  /** Extra text appended to the message. */
  public readonly detail: string | undefined;

  /**
   * Creates a new ConstructionError.
   *
   * @param code - The error code.
   * @param details - Path, value and expected shape.
   */
  constructor(code: ConstructionErrorCode, details: ConstructionErrorDetails) {
    super(formatConstructionMessage(code, details));
    this.name = 'ConstructionError';
    this.code = code;
    this.path = details.path;
    this.value = details.value;
    this.expected = details.expected;
    this.schemaName = details.schemaName;
    this.options = details.options;
    this.detail = details.detail;
  }

  /** The path rendered as a key, e.g. `servers[0].port`. */
  get field(): string {
    return formatPath(this.path);
  }

  /**
   * Returns a copy of this error with `prefix` prepended to the path.
   */
  withPrefix(prefix: readonly string[]): ConstructionError {
    return new ConstructionError(this.code, {
      path: [...prefix, ...this.path],
      value: this.value,
      expected: this.expected,
      schemaName: this.schemaName,
      options: this.options,
      detail: this.detail,
    });
  }
}

/**
 * Joins path segments; index segments (`[0]`, `[key]`) attach without a dot.
 */
export function formatPath(path: readonly string[]): string {
  let result = '';
  for (const segment of path) {
    if (result.length === 0 || segment.startsWith('[')) {
      result += segment;
    } else {
      result += `.${segment}`;
    }
  }
  return result;
}

/**
 * Names the native kind of an untyped document value.
 */
export function nativeKindName(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? 'integer' : 'float';
  }
  if (Array.isArray(value)) {
    return 'list';
  }
  if (value instanceof Map) {
    return 'map';
  }
  if (typeof value === 'object') {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto === Object.prototype || proto === null) {
      return 'map';
    }
    const ctor: unknown = Reflect.get(value, 'constructor');
    return typeof ctor === 'function' && ctor.name !== '' ? ctor.name : 'object';
  }
  return typeof value;
}

/**
 * Renders a value for messages: strings unquoted at the top level, containers
 * in a compact JSON-like form, Maps as `{key: value}`.
 */
export function describeValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  return describeNested(value);
}

function describeNested(value: unknown): string {
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (value === null || value === undefined) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return `[${value.map((item: unknown) => describeNested(item)).join(', ')}]`;
  }
  if (value instanceof Map) {
    const entries = [...value.entries()].map(
      ([k, v]: [unknown, unknown]) => `${describeNested(k)}: ${describeNested(v)}`
    );
    return `{${entries.join(', ')}}`;
  }
  if (typeof value === 'function') {
    return '<function>';
  }
  if (typeof value === 'object') {
    const entries = Object.entries(value).map(
      ([k, v]) => `${JSON.stringify(k)}: ${describeNested(v)}`
    );
    return `{${entries.join(', ')}}`;
  }
  return String(value);
}

function formatConstructionMessage(
  code: ConstructionErrorCode,
  details: ConstructionErrorDetails
): string {
  const key = formatPath(details.path);
  const actual = nativeKindName(details.value);
  const value = describeValue(details.value);
  const suffix = details.detail !== undefined ? ` ${details.detail}` : '';

  switch (code) {
    case 'WRONG_TYPE':
      return (
        `Wrong type '${actual}' with value '${value}' for key '${key}'. ` +
        `Expected '${details.expected ?? 'unknown'}'.${suffix}`
      );
    case 'UNKNOWN_ARGUMENT':
      return `Unknown argument '${value}' of type '${actual}' with key '${key}'.${suffix}`;
    case 'MISSING_REQUIRED_ARGUMENT':
      return `Missing required argument '${key}' for '${details.schemaName ?? 'unknown'}'${suffix}`;
    case 'UNSUPPORTED_TYPE':
      return `Value of type '${actual}' is not supported for key '${key}'${suffix}`;
    case 'VALUE_NOT_AN_OPTION':
      return (
        `Value of type '${actual}' with value '${value}' is not an option for key '${key}'. ` +
        `Choose one of: ${describeNested(details.options ?? [])}${suffix}`
      );
    case 'USAGE_ERROR':
      return `Construct '${details.schemaName ?? 'unknown'}' with either a mapping or named fields${suffix}`;
  }
}
