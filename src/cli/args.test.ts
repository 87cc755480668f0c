import { describe, it, expect } from 'vitest';
import { parseCommandArgs } from './args.js';
import type { CliFlag } from './args.js';
import { CliUsageError } from './errors.js';

const ALL: ReadonlySet<CliFlag> = new Set<CliFlag>([
  '--format',
  '--ignore-unknown',
  '--ignore-missing',
  '--debug',
]);

describe('parseCommandArgs', () => {
  it('separates positionals from flags', () => {
    expect(
      parseCommandArgs('check', ['a.yaml', '--debug', 'b.json', '--ignore-unknown'], ALL)
    ).toEqual({
      positionals: ['a.yaml', 'b.json'],
      flags: { debug: true, ignoreUnknownFields: true },
    });
  });

  it('reads --format as a separate or inline value', () => {
    expect(parseCommandArgs('check', ['--format', 'toml'], ALL).flags).toEqual({ format: 'toml' });
    expect(parseCommandArgs('check', ['--format=json'], ALL).flags).toEqual({ format: 'json' });
  });

  it('treats everything after -- and a lone - as positional', () => {
    expect(parseCommandArgs('check', ['-', '--', '--debug'], ALL)).toEqual({
      positionals: ['-', '--debug'],
      flags: {},
    });
  });

  it('rejects flags the command does not take', () => {
    const allowed: ReadonlySet<CliFlag> = new Set<CliFlag>(['--debug']);

    expect(() => parseCommandArgs('describe', ['--format', 'yaml'], allowed)).toThrow(
      "Unknown option '--format' for 'describe'"
    );
    expect(() => parseCommandArgs('check', ['--verbose'], ALL)).toThrow(CliUsageError);
  });

  it('rejects malformed values', () => {
    expect(() => parseCommandArgs('check', ['--debug=yes'], ALL)).toThrow(
      "Option '--debug' takes no value"
    );
    expect(() => parseCommandArgs('check', ['--format'], ALL)).toThrow(
      "Option '--format' needs a value"
    );
    expect(() => parseCommandArgs('check', ['--format=xml'], ALL)).toThrow(
      "Invalid --format 'xml': expected one of auto, yaml, json, toml"
    );
  });

  it('names the command on usage errors', () => {
    try {
      parseCommandArgs('check', ['--nope'], ALL);
    } catch (error) {
      expect(error).toBeInstanceOf(CliUsageError);
      if (error instanceof CliUsageError) {
        expect(error.command).toBe('check');
      }
    }
  });
});
