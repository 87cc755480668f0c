/**
 * Environment variable overrides for settings.
 *
 * Reads SCHEMACAST_* variables. Command-line flags take precedence over
 * environment variables, which take precedence over defaults.
 *
 * Override precedence: flags > env > defaults
 *
 * @packageDocumentation
 */

import { FORMAT_SETTINGS, isFormatSetting } from './defaults.js';
import type { FormatSetting, PartialSettings, SchemacastSettings } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

function getDefaultEnv(): EnvRecord {
  return process.env;
}

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

type EnvValueType = 'boolean' | 'format';

/**
 * Mapping from environment variable names to settings fields.
 */
const ENV_VAR_MAPPINGS: Readonly<
  Record<string, { field: keyof SchemacastSettings; type: EnvValueType; description: string }>
> = {
  SCHEMACAST_DEBUG: {
    field: 'debug',
    type: 'boolean',
    description: 'Emit debug log entries on stderr (true/false)',
  },
  SCHEMACAST_FORMAT: {
    field: 'format',
    type: 'format',
    description: 'Document format: auto, yaml, json or toml',
  },
  SCHEMACAST_IGNORE_UNKNOWN: {
    field: 'ignoreUnknownFields',
    type: 'boolean',
    description: 'Skip input keys that match no field (true/false)',
  },
  SCHEMACAST_IGNORE_MISSING: {
    field: 'ignoreMissingFields',
    type: 'boolean',
    description: 'Leave missing required fields unset (true/false)',
  },
};

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

function coerceToFormat(value: string, envVar: string): FormatSetting {
  const trimmed = value.trim().toLowerCase();
  if (!isFormatSetting(trimmed)) {
    throw new EnvCoercionError(
      envVar,
      value,
      'format',
      `Cannot coerce '${envVar}' value '${value}' to a format. Expected one of: ${FORMAT_SETTINGS.join(', ')}`
    );
  }
  return trimmed;
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Raw override values keyed by settings field. */
  overrides: Record<string, string | boolean>;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads environment variables and returns settings overrides.
 *
 * The overrides are not yet checked against the settings schema; see
 * `resolveSettings`.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Collect coercion errors instead of throwing the first.
 * @returns Result containing overrides and any errors.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ SCHEMACAST_DEBUG: 'yes' });
 * console.log(result.overrides); // { debug: true }
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = getDefaultEnv(),
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: Record<string, string | boolean> = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      overrides[mapping.field] =
        mapping.type === 'boolean' ? coerceToBoolean(value, envVar) : coerceToFormat(value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Drops `undefined` entries so they do not mask lower-precedence values
 * when spread.
 */
export function definedOverrides(overrides: PartialSettings): Record<string, string | boolean> {
  const result: Record<string, string | boolean> = {};
  for (const [key, value] of Object.entries(overrides)) {
    if (typeof value === 'string' || typeof value === 'boolean') {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    docs[envVar] = { description: mapping.description, type: mapping.type };
  }
  return docs;
}
