/**
 * Model Router module.
 *
 * Provides the transport interface, error taxonomy, retry policy and the
 * `generateText` entry point used by the phase agents.
 *
 * @packageDocumentation
 */

export {
  // Core types
  type ModelParameters,
  type ModelRouterRequest,
  type ModelUsage,
  type ModelMetadata,
  type ModelRouterResponse,
  type ModelRouterResult,
  // Error types
  type ModelRouterErrorKind,
  type ModelRouterErrorBase,
  type RateLimitError,
  type AuthenticationError,
  type ModelError,
  type TimeoutError,
  type NetworkError,
  type ValidationError,
  type EmptyResponseError,
  type ModelRouterError,
  // Interface
  type ModelRouter,
  // Constants
  ERROR_KINDS,
  // Type guards
  isModelRouterError,
  isRetryableError,
  // Factory functions
  createRateLimitError,
  createAuthenticationError,
  createModelError,
  createTimeoutError,
  createNetworkError,
  createValidationError,
  createEmptyResponseError,
  createSuccessResult,
  createFailureResult,
} from './types.js';

export {
  type RetryConfig,
  type RetryAttemptInfo,
  type RetryCallback,
  type RetryOutcome,
  type WithRetryOptions,
  DEFAULT_RETRY_CONFIG,
  MAX_TIMEOUT_RETRIES,
  validateRetryConfig,
  retryConfigFromSettings,
  calculateBackoffDelay,
  shouldRetry,
  withRetry,
  defaultSleep,
} from './retry.js';

export {
  GenerationError,
  buildRequest,
  generateText,
  type GenerateTextOptions,
} from './generate.js';

export {
  type ClaudeCodeClientOptions,
  type ParsedClaudeOutput,
  CLAUDE_CODE_PROVIDER,
  ClaudeCodeClient,
  ClaudeCodeNotInstalledError,
  checkClaudeCodeInstalled,
  classifyFailure,
  createClaudeCodeClient,
  parseClaudeCodeOutput,
} from './claude-code-client.js';
