/**
 * Default settings.
 *
 * @packageDocumentation
 */

import type { FormatSetting, SchemacastSettings } from './types.js';

/**
 * Settings used when neither flags nor environment say otherwise.
 */
export const DEFAULT_SETTINGS: Readonly<SchemacastSettings> = Object.freeze({
  debug: false,
  format: 'auto',
  ignoreUnknownFields: false,
  ignoreMissingFields: false,
});

/** Accepted values of the format setting. */
export const FORMAT_SETTINGS: readonly FormatSetting[] = ['auto', 'yaml', 'json', 'toml'];

/**
 * Checks whether a string is an accepted format setting.
 */
export function isFormatSetting(value: string): value is FormatSetting {
  return FORMAT_SETTINGS.some((format) => format === value);
}
