/**
 * Settings types for the loader and CLI.
 *
 * @packageDocumentation
 */

import type { DocumentFormat } from '../document/loader.js';

/**
 * Document format setting; `auto` picks the format from the file extension.
 */
export type FormatSetting = DocumentFormat | 'auto';

/**
 * Effective settings for a CLI run.
 */
export interface SchemacastSettings {
  /** Emit debug-level log entries. */
  debug: boolean;
  /** Format of the documents being checked. */
  format: FormatSetting;
  /** Skip unknown input keys in every schema. */
  ignoreUnknownFields: boolean;
  /** Leave missing required fields unset in every schema. */
  ignoreMissingFields: boolean;
}

/**
 * Settings with every field optional, used for overrides.
 */
export type PartialSettings = Partial<SchemacastSettings>;
