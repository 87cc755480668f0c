import { describe, it, expect } from 'vitest';
import {
  ConstructionError,
  SchemaRegistrationError,
  describeValue,
  formatPath,
  nativeKindName,
} from './errors.js';

describe('formatPath', () => {
  it('joins names with dots and attaches index segments', () => {
    expect(formatPath(['servers', '[0]', 'port'])).toBe('servers[0].port');
    expect(formatPath(['limits', '[cpu]'])).toBe('limits[cpu]');
    expect(formatPath([])).toBe('');
  });
});

describe('nativeKindName', () => {
  it.each([
    [null, 'null'],
    [undefined, 'null'],
    [1, 'integer'],
    [1.5, 'float'],
    ['a', 'string'],
    [true, 'boolean'],
    [[1], 'list'],
    [{ a: 1 }, 'map'],
    [new Map(), 'map'],
    [new Date(0), 'Date'],
    [Object.create(Object.create(null)), 'object'],
  ])('names %j as %s', (value, expected) => {
    expect(nativeKindName(value)).toBe(expected);
  });
});

describe('describeValue', () => {
  it('leaves top-level strings unquoted', () => {
    expect(describeValue('abc')).toBe('abc');
  });

  it('quotes strings inside containers', () => {
    expect(describeValue(['a', 1, null])).toBe('["a", 1, null]');
    expect(describeValue({ a: 'b' })).toBe('{"a": "b"}');
  });

  it('renders Maps with their keys', () => {
    expect(describeValue(new Map([[1, [true]]]))).toBe('{1: [true]}');
  });
});

describe('ConstructionError', () => {
  it('formats WRONG_TYPE', () => {
    const error = new ConstructionError('WRONG_TYPE', {
      path: ['a', '[0]'],
      value: 'x',
      expected: 'list[int]',
    });

    expect(error.message).toBe("Wrong type 'string' with value 'x' for key 'a[0]'. Expected 'list[int]'.");
    expect(error.name).toBe('ConstructionError');
  });

  it('formats UNKNOWN_ARGUMENT', () => {
    const error = new ConstructionError('UNKNOWN_ARGUMENT', { path: ['colour'], value: 'red' });
    expect(error.message).toBe("Unknown argument 'red' of type 'string' with key 'colour'.");
  });

  it('formats MISSING_REQUIRED_ARGUMENT with its detail', () => {
    const error = new ConstructionError('MISSING_REQUIRED_ARGUMENT', {
      path: ['tlsCert'],
      schemaName: 'Server',
      detail: "(input key 'tls-cert')",
    });

    expect(error.message).toBe(
      "Missing required argument 'tlsCert' for 'Server' (input key 'tls-cert')"
    );
  });

  it('formats UNSUPPORTED_TYPE', () => {
    const error = new ConstructionError('UNSUPPORTED_TYPE', { path: ['when'], value: new Date(0) });
    expect(error.message).toBe("Value of type 'Date' is not supported for key 'when'");
  });

  it('formats VALUE_NOT_AN_OPTION with the allowed values', () => {
    const error = new ConstructionError('VALUE_NOT_AN_OPTION', {
      path: ['mode'],
      value: 'fast',
      options: ['safe', 'slow'],
    });

    expect(error.message).toBe(
      "Value of type 'string' with value 'fast' is not an option for key 'mode'. " +
        'Choose one of: ["safe", "slow"]'
    );
  });

  it('formats USAGE_ERROR', () => {
    const error = new ConstructionError('USAGE_ERROR', {
      path: [],
      schemaName: 'Server',
      detail: 'Got a list.',
    });

    expect(error.message).toBe("Construct 'Server' with either a mapping or named fields Got a list.");
  });

  it('rebuilds the message when a prefix is added', () => {
    const error = new ConstructionError('WRONG_TYPE', {
      path: ['port'],
      value: '80',
      expected: 'int',
      schemaName: 'Server',
    }).withPrefix(['servers', '[1]']);

    expect(error.path).toEqual(['servers', '[1]', 'port']);
    expect(error.field).toBe('servers[1].port');
    expect(error.schemaName).toBe('Server');
    expect(error.message).toBe(
      "Wrong type 'string' with value '80' for key 'servers[1].port'. Expected 'int'."
    );
  });
});

describe('SchemaRegistrationError', () => {
  it('carries schema, field and code', () => {
    const cause = new Error('inner');
    const error = new SchemaRegistrationError('bad', 'INVALID_DEFAULT', {
      schemaName: 'Server',
      field: 'port',
      cause,
    });

    expect(error.name).toBe('SchemaRegistrationError');
    expect(error.code).toBe('INVALID_DEFAULT');
    expect(error.schemaName).toBe('Server');
    expect(error.field).toBe('port');
    expect(error.cause).toBe(cause);
  });
});
