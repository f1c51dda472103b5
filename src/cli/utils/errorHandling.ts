/**
 * Shared error handling utilities for CLI commands.
 */

import { formatErrorWithSuggestions } from '../errors.js';
import type { CliCommandResult, DisplayOptions } from '../types.js';

/**
 * Wraps a command handler with standard error handling.
 *
 * Executes the provided function (sync or async) and handles any errors:
 * - On success: prints the result's message, if any, and exits with its code
 * - On error: prints the error with suggestions and exits with 1
 *
 * @param fn - The function to wrap (sync or async).
 * @param display - Options for rendering errors.
 */
export function withErrorHandling(
  fn: () => CliCommandResult | Promise<CliCommandResult>,
  display: DisplayOptions = { colors: false, unicode: false }
): void {
  void (async () => {
    try {
      const result = await fn();
      if (result.message !== undefined && result.exitCode === 0) {
        console.log(result.message);
      } else if (result.message !== undefined) {
        console.error(result.message);
      }
      process.exit(result.exitCode);
    } catch (error) {
      console.error(formatErrorWithSuggestions(error, display));
      process.exit(1);
    }
  })();
}
