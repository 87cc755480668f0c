/**
 * Settings for the loader and CLI: defaults, SCHEMACAST_* environment
 * overrides and the settings schema.
 *
 * Override precedence: flags > env > defaults
 *
 * @packageDocumentation
 */

export type { FormatSetting, PartialSettings, SchemacastSettings } from './types.js';
export { DEFAULT_SETTINGS, FORMAT_SETTINGS, isFormatSetting } from './defaults.js';
export {
  EnvCoercionError,
  definedOverrides,
  getEnvVarDocumentation,
  readEnvOverrides,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { SETTINGS_SCHEMA, SettingsError, resolveSettings } from './settings.js';
export type { SettingsSources } from './settings.js';
