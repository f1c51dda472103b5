/**
 * Error suggestion system for the arcade-forge CLI.
 *
 * Maps the errors a build can end with to short, actionable suggestions.
 *
 * @packageDocumentation
 */

import { ConfigValidationError } from '../config/validator.js';
import { ConfigParseError } from '../config/parser.js';
import { EnvCoercionError } from '../config/env.js';
import { ArtifactStoreError } from '../persistence/artifact-store.js';
import { ClaudeCodeNotInstalledError } from '../router/claude-code-client.js';
import { GenerationError } from '../router/generate.js';
import type { DisplayOptions } from './types.js';
import { getPalette } from './utils/displayUtils.js';

/**
 * Error types the CLI distinguishes.
 */
export type ErrorType =
  | 'not_installed'
  | 'authentication'
  | 'rate_limited'
  | 'generation'
  | 'configuration'
  | 'persistence'
  | 'unknown';

/**
 * Suggestion item for resolving an error.
 */
export interface Suggestion {
  /** Suggestion text. */
  text: string;
  /** Command or action to take (optional). */
  action?: string;
}

const ERROR_SUGGESTIONS: Readonly<Record<ErrorType, readonly Suggestion[]>> = {
  not_installed: [
    {
      text: 'Install the Claude Code CLI and make sure it is on your PATH',
      action: 'npm install -g @anthropic-ai/claude-code',
    },
  ],
  authentication: [
    { text: 'Log in to the Claude Code CLI', action: 'claude' },
    { text: 'Check that your account has access to the configured models' },
  ],
  rate_limited: [
    { text: 'Wait a few minutes before starting another build' },
    {
      text: 'Raise the retry budget',
      action: 'Set [retry] max_attempts in arcade-forge.toml',
    },
  ],
  generation: [
    { text: 'Run the build again; model failures are often transient' },
    {
      text: 'Increase the call timeout for large games',
      action: 'Set ARCADE_FORGE_CALL_TIMEOUT_MS or [pipeline] call_timeout_ms',
    },
  ],
  configuration: [
    { text: 'Check arcade-forge.toml for typos and out-of-range values' },
    { text: 'Check ARCADE_FORGE_* environment variables' },
  ],
  persistence: [
    {
      text: 'Check that the output directory is writable',
      action: 'Set [pipeline] output_dir or ARCADE_FORGE_OUTPUT_DIR',
    },
  ],
  unknown: [{ text: 'Run again with debug logging for details', action: 'ARCADE_FORGE_LOG_LEVEL=debug' }],
};

/**
 * Classifies an error thrown out of a build.
 *
 * @param error - The thrown value.
 * @returns The matching error type.
 */
export function inferErrorType(error: unknown): ErrorType {
  if (error instanceof ClaudeCodeNotInstalledError) {
    return 'not_installed';
  }
  if (error instanceof GenerationError) {
    switch (error.routerError.kind) {
      case 'AuthenticationError':
        return 'authentication';
      case 'RateLimitError':
        return 'rate_limited';
      default:
        return 'generation';
    }
  }
  if (
    error instanceof ConfigParseError ||
    error instanceof ConfigValidationError ||
    error instanceof EnvCoercionError
  ) {
    return 'configuration';
  }
  if (error instanceof ArtifactStoreError) {
    return 'persistence';
  }
  return 'unknown';
}

/**
 * Returns the suggestions for an error type.
 */
export function getSuggestions(errorType: ErrorType): readonly Suggestion[] {
  return ERROR_SUGGESTIONS[errorType];
}

/**
 * Formats an error with its suggestions for the terminal.
 *
 * @param error - The thrown value.
 * @param options - Display options.
 * @returns The formatted message.
 *
 * @example
 * ```typescript
 * formatErrorWithSuggestions(new Error('boom'), { colors: false, unicode: false });
 * // 'Error: boom\n\nSuggestions:\n  - Run again with debug logging for details\n    ARCADE_FORGE_LOG_LEVEL=debug'
 * ```
 */
export function formatErrorWithSuggestions(error: unknown, options: DisplayOptions): string {
  const { red, bold, dim, reset } = getPalette(options);
  const bullet = options.unicode ? '•' : '-';
  const message = error instanceof Error ? error.message : String(error);

  const lines = [`${red}${bold}Error:${reset} ${message}`, '', 'Suggestions:'];
  for (const suggestion of getSuggestions(inferErrorType(error))) {
    lines.push(`  ${bullet} ${suggestion.text}`);
    if (suggestion.action !== undefined) {
      lines.push(`    ${dim}${suggestion.action}${reset}`);
    }
  }
  return lines.join('\n');
}
