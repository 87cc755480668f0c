/**
 * Settings resolution: defaults, environment and flags merged and checked
 * with the schema engine itself.
 *
 * @packageDocumentation
 */

import { ConstructionError, defineSchema, field, t } from '../schema/index.js';
import { DEFAULT_SETTINGS, FORMAT_SETTINGS, isFormatSetting } from './defaults.js';
import { definedOverrides, readEnvOverrides } from './env.js';
import type { EnvRecord } from './env.js';
import type { FormatSetting, PartialSettings, SchemacastSettings } from './types.js';

/**
 * Schema the merged settings must satisfy.
 */
export const SETTINGS_SCHEMA = defineSchema('Settings', {
  debug: field(t.boolean(), { default: DEFAULT_SETTINGS.debug }),
  format: field(t.string(), {
    default: DEFAULT_SETTINGS.format,
    options: FORMAT_SETTINGS,
  }),
  ignoreUnknownFields: field(t.boolean(), { default: DEFAULT_SETTINGS.ignoreUnknownFields }),
  ignoreMissingFields: field(t.boolean(), { default: DEFAULT_SETTINGS.ignoreMissingFields }),
});

/**
 * Error class for settings that fail the settings schema.
 */
export class SettingsError extends Error {
  /** The underlying error, if any. */
  public readonly cause: Error | undefined;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'SettingsError';
    this.cause = cause;
  }
}

/**
 * Sources for {@link resolveSettings}.
 */
export interface SettingsSources {
  /** Values from command-line flags; `undefined` entries are ignored. */
  readonly flags?: PartialSettings | undefined;
  /** Environment to read SCHEMACAST_* variables from. */
  readonly env?: EnvRecord | undefined;
}

/**
 * Merges defaults, environment and flags into effective settings.
 *
 * @throws EnvCoercionError for malformed environment values.
 * @throws SettingsError when the merged settings fail the settings schema.
 *
 * @example
 * ```typescript
 * const settings = resolveSettings({ flags: { debug: true }, env: process.env });
 * ```
 */
export function resolveSettings(sources: SettingsSources = {}): SchemacastSettings {
  const { overrides } = readEnvOverrides(sources.env);
  const merged = { ...overrides, ...definedOverrides(sources.flags ?? {}) };

  let settings: ReturnType<typeof SETTINGS_SCHEMA.construct>;
  try {
    settings = SETTINGS_SCHEMA.constructFromFields(merged);
  } catch (error) {
    if (error instanceof ConstructionError) {
      throw new SettingsError(`Invalid settings: ${error.message}`, error);
    }
    throw error;
  }

  return {
    debug: settings.debug,
    format: toFormatSetting(settings.format),
    ignoreUnknownFields: settings.ignoreUnknownFields,
    ignoreMissingFields: settings.ignoreMissingFields,
  };
}

function toFormatSetting(value: string): FormatSetting {
  if (!isFormatSetting(value)) {
    throw new SettingsError(`Invalid settings: unknown format '${value}'`);
  }
  return value;
}
