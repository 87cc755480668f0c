/**
 * Version command handler for the schemacast CLI.
 *
 * Displays the CLI version by reading it directly from package.json.
 */

import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { readFileSync } from 'node:fs';
import { VERSION } from '../../version.js';
import type { CliCommandResult, CliContext } from '../types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Reads the version from package.json.
 *
 * @returns The version string, or the built-in version if package.json
 *   cannot be read.
 */
export function getVersionFromPackageJson(): string {
  let raw: string;
  try {
    raw = readFileSync(join(__dirname, '../../../package.json'), 'utf-8');
  } catch {
    return VERSION;
  }
  const packageJson: unknown = JSON.parse(raw);
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return VERSION;
}

/**
 * Handles the version command.
 *
 * @param context - The CLI context.
 * @returns The command result.
 */
export function handleVersionCommand(context: CliContext): CliCommandResult {
  context.stdout(`schemacast v${getVersionFromPackageJson()}`);
  return { exitCode: 0 };
}
