/**
 * Version command handler for the arcade-forge CLI.
 *
 * Displays the CLI version by reading it directly from package.json.
 */

import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { readFileSync } from 'node:fs';
import type { CliCommandResult } from '../types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Extracts the version field from package.json text.
 *
 * @returns The version string, or '(unknown)' if absent.
 */
export function parseVersion(packageJsonText: string): string {
  const parsed: unknown = JSON.parse(packageJsonText);
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed) {
    return typeof parsed.version === 'string' ? parsed.version : '(unknown)';
  }
  return '(unknown)';
}

function getVersionFromPackageJson(): string {
  const packageJsonPath = join(__dirname, '../../../package.json');
  try {
    return parseVersion(readFileSync(packageJsonPath, 'utf-8'));
  } catch (error) {
    console.error(
      `Could not read ${packageJsonPath}: ${error instanceof Error ? error.message : String(error)}`
    );
    return '(unknown)';
  }
}

/**
 * Handles the version command.
 */
export function handleVersionCommand(): CliCommandResult {
  console.log(`arcade-forge v${getVersionFromPackageJson()}`);
  return { exitCode: 0 };
}
