import { describe, it, expect } from 'vitest';
import {
  EnvCoercionError,
  definedOverrides,
  getEnvVarDocumentation,
  readEnvOverrides,
} from './env.js';

describe('readEnvOverrides', () => {
  it('returns nothing for an empty environment', () => {
    expect(readEnvOverrides({})).toEqual({ overrides: {}, appliedVars: [], errors: [] });
  });

  it('coerces booleans case-insensitively', () => {
    const result = readEnvOverrides({
      SCHEMACAST_DEBUG: 'YES',
      SCHEMACAST_IGNORE_UNKNOWN: ' off ',
      SCHEMACAST_IGNORE_MISSING: '1',
    });

    expect(result.overrides).toEqual({
      debug: true,
      ignoreUnknownFields: false,
      ignoreMissingFields: true,
    });
    expect(result.appliedVars).toEqual([
      'SCHEMACAST_DEBUG',
      'SCHEMACAST_IGNORE_UNKNOWN',
      'SCHEMACAST_IGNORE_MISSING',
    ]);
  });

  it('normalizes the format', () => {
    expect(readEnvOverrides({ SCHEMACAST_FORMAT: ' TOML' }).overrides).toEqual({ format: 'toml' });
  });

  it('skips empty values', () => {
    expect(readEnvOverrides({ SCHEMACAST_DEBUG: '' }).appliedVars).toEqual([]);
  });

  it('ignores unrelated variables', () => {
    expect(readEnvOverrides({ DEBUG: 'true' }).overrides).toEqual({});
  });

  it('throws on the first malformed value', () => {
    expect(() => readEnvOverrides({ SCHEMACAST_DEBUG: 'maybe' })).toThrow(
      "Cannot coerce 'SCHEMACAST_DEBUG' value 'maybe' to boolean. " +
        'Expected one of: true, 1, yes, on, false, 0, no, off'
    );
  });

  it('collects errors when asked', () => {
    const result = readEnvOverrides(
      { SCHEMACAST_DEBUG: 'maybe', SCHEMACAST_FORMAT: 'xml', SCHEMACAST_IGNORE_MISSING: 'on' },
      { collectErrors: true }
    );

    expect(result.overrides).toEqual({ ignoreMissingFields: true });
    expect(result.errors.map((error) => error.envVar)).toEqual([
      'SCHEMACAST_DEBUG',
      'SCHEMACAST_FORMAT',
    ]);
    expect(result.errors[1]).toBeInstanceOf(EnvCoercionError);
    expect(result.errors[1]?.message).toBe(
      "Cannot coerce 'SCHEMACAST_FORMAT' value 'xml' to a format. Expected one of: auto, yaml, json, toml"
    );
    expect(result.errors[1]?.expectedType).toBe('format');
  });
});

describe('definedOverrides', () => {
  it('drops unset entries', () => {
    expect(definedOverrides({ debug: false, format: 'json' })).toEqual({
      debug: false,
      format: 'json',
    });
    expect(definedOverrides({})).toEqual({});
  });
});

describe('getEnvVarDocumentation', () => {
  it('documents every variable', () => {
    const docs = getEnvVarDocumentation();

    expect(Object.keys(docs)).toEqual([
      'SCHEMACAST_DEBUG',
      'SCHEMACAST_FORMAT',
      'SCHEMACAST_IGNORE_UNKNOWN',
      'SCHEMACAST_IGNORE_MISSING',
    ]);
    expect(docs['SCHEMACAST_FORMAT']?.type).toBe('format');
  });
});
