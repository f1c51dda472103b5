/**
 * Model Router types.
 *
 * Defines the transport-neutral interface every phase agent calls through,
 * so the CLI-backed client and test doubles are interchangeable.
 *
 * @packageDocumentation
 */

import type { AgentIdentity } from '../config/types.js';

/**
 * Generation parameters for one request, looked up from the agent's config.
 */
export interface ModelParameters {
  /** Model identifier. */
  model: string;
  /** Sampling temperature. */
  temperature: number;
  /** Maximum tokens to generate. */
  maxTokens: number;
  /** Nucleus sampling parameter. */
  topP: number;
  /** Top-k sampling parameter. */
  topK: number;
  /** Per-call timeout in milliseconds. */
  timeoutMs?: number;
}

/**
 * Request to the model router.
 */
export interface ModelRouterRequest {
  /** Agent issuing the request. */
  agent: AgentIdentity;
  /** System instructions for the agent. */
  systemPrompt: string;
  /** User-side context. */
  prompt: string;
  /** Generation parameters. */
  parameters: ModelParameters;
  /** Optional request ID for tracking/correlation. */
  requestId?: string;
}

/**
 * Usage statistics from a model response.
 */
export interface ModelUsage {
  /** Number of tokens in the prompt. */
  promptTokens: number;
  /** Number of tokens in the completion. */
  completionTokens: number;
  /** Total tokens used. */
  totalTokens: number;
}

/**
 * Metadata about the model that processed the request.
 */
export interface ModelMetadata {
  /** The actual model identifier used. */
  modelId: string;
  /** The backend provider (e.g., 'claude-code'). */
  provider: string;
  /** Latency in milliseconds. */
  latencyMs: number;
}

/**
 * Response from the model router.
 */
export interface ModelRouterResponse {
  /** The generated content. */
  content: string;
  /** Token usage statistics. */
  usage: ModelUsage;
  /** Metadata about the model and request. */
  metadata: ModelMetadata;
  /** The original request ID if provided. */
  requestId?: string;
}

/**
 * Discriminant of model router error types.
 */
export type ModelRouterErrorKind =
  | 'RateLimitError'
  | 'AuthenticationError'
  | 'ModelError'
  | 'TimeoutError'
  | 'NetworkError'
  | 'ValidationError'
  | 'EmptyResponseError';

/**
 * Base interface for all model router errors.
 */
export interface ModelRouterErrorBase {
  /** Discriminant for error type. */
  readonly kind: ModelRouterErrorKind;
  /** Human-readable error message. */
  readonly message: string;
  /** Optional underlying error. */
  readonly cause?: Error;
}

/**
 * Error when rate limit is exceeded.
 */
export interface RateLimitError extends ModelRouterErrorBase {
  readonly kind: 'RateLimitError';
  /** Milliseconds to wait before retrying. */
  readonly retryAfterMs?: number;
  readonly retryable: true;
}

/**
 * Error when authentication fails.
 */
export interface AuthenticationError extends ModelRouterErrorBase {
  readonly kind: 'AuthenticationError';
  /** The provider that rejected authentication. */
  readonly provider: string;
  readonly retryable: false;
}

/**
 * Error from the model or its transport (non-zero exit, content filter).
 */
export interface ModelError extends ModelRouterErrorBase {
  readonly kind: 'ModelError';
  /** Error code from the provider or transport. */
  readonly errorCode?: string;
  readonly retryable: boolean;
}

/**
 * Error when a request times out.
 */
export interface TimeoutError extends ModelRouterErrorBase {
  readonly kind: 'TimeoutError';
  /** The timeout duration in milliseconds. */
  readonly timeoutMs: number;
  readonly retryable: true;
}

/**
 * Error for network-level or process-spawn failures.
 */
export interface NetworkError extends ModelRouterErrorBase {
  readonly kind: 'NetworkError';
  /** The endpoint or executable that failed. */
  readonly endpoint?: string;
  readonly retryable: true;
}

/**
 * Error when request validation fails.
 */
export interface ValidationError extends ModelRouterErrorBase {
  readonly kind: 'ValidationError';
  /** Fields that failed validation. */
  readonly invalidFields?: readonly string[];
  readonly retryable: false;
}

/**
 * A call that succeeded but produced no text.
 */
export interface EmptyResponseError extends ModelRouterErrorBase {
  readonly kind: 'EmptyResponseError';
  readonly retryable: false;
}

/**
 * Union type of all model router errors.
 */
export type ModelRouterError =
  | RateLimitError
  | AuthenticationError
  | ModelError
  | TimeoutError
  | NetworkError
  | ValidationError
  | EmptyResponseError;

/**
 * Array of all valid error kinds.
 */
export const ERROR_KINDS: readonly ModelRouterErrorKind[] = [
  'RateLimitError',
  'AuthenticationError',
  'ModelError',
  'TimeoutError',
  'NetworkError',
  'ValidationError',
  'EmptyResponseError',
] as const;

/**
 * Checks whether an error can be retried.
 *
 * @param error - The error to check.
 * @returns True if the error can be retried.
 */
export function isRetryableError(error: ModelRouterError): boolean {
  return error.retryable;
}

/**
 * Type guard to check if a value is a ModelRouterError.
 *
 * @param value - The value to check.
 * @returns True if the value is a ModelRouterError.
 */
export function isModelRouterError(value: unknown): value is ModelRouterError {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  if (!('kind' in value) || !('message' in value)) {
    return false;
  }
  const { kind, message } = value;
  return (
    typeof kind === 'string' &&
    ERROR_KINDS.some((known) => known === kind) &&
    typeof message === 'string'
  );
}

function withCause(cause: Error | undefined): { cause?: Error } {
  return cause !== undefined ? { cause } : {};
}

/**
 * Creates a RateLimitError.
 *
 * @param message - Error message.
 * @param options - Retry hint and underlying error.
 * @returns A RateLimitError instance.
 */
export function createRateLimitError(
  message: string,
  options: { retryAfterMs?: number; cause?: Error } = {}
): RateLimitError {
  const { retryAfterMs, cause } = options;
  return {
    kind: 'RateLimitError',
    message,
    retryable: true,
    ...(retryAfterMs !== undefined ? { retryAfterMs } : {}),
    ...withCause(cause),
  };
}

/**
 * Creates an AuthenticationError.
 *
 * @param message - Error message.
 * @param provider - The provider that rejected authentication.
 * @param options - Underlying error.
 * @returns An AuthenticationError instance.
 */
export function createAuthenticationError(
  message: string,
  provider: string,
  options: { cause?: Error } = {}
): AuthenticationError {
  return {
    kind: 'AuthenticationError',
    message,
    provider,
    retryable: false,
    ...withCause(options.cause),
  };
}

/**
 * Creates a ModelError.
 *
 * @param message - Error message.
 * @param retryable - Whether the error can be retried.
 * @param options - Error code and underlying error.
 * @returns A ModelError instance.
 */
export function createModelError(
  message: string,
  retryable: boolean,
  options: { errorCode?: string; cause?: Error } = {}
): ModelError {
  const { errorCode, cause } = options;
  return {
    kind: 'ModelError',
    message,
    retryable,
    ...(errorCode !== undefined ? { errorCode } : {}),
    ...withCause(cause),
  };
}

/**
 * Creates a TimeoutError.
 *
 * @param message - Error message.
 * @param timeoutMs - The timeout duration in milliseconds.
 * @param options - Underlying error.
 * @returns A TimeoutError instance.
 */
export function createTimeoutError(
  message: string,
  timeoutMs: number,
  options: { cause?: Error } = {}
): TimeoutError {
  return {
    kind: 'TimeoutError',
    message,
    timeoutMs,
    retryable: true,
    ...withCause(options.cause),
  };
}

/**
 * Creates a NetworkError.
 *
 * @param message - Error message.
 * @param options - Endpoint and underlying error.
 * @returns A NetworkError instance.
 */
export function createNetworkError(
  message: string,
  options: { endpoint?: string; cause?: Error } = {}
): NetworkError {
  const { endpoint, cause } = options;
  return {
    kind: 'NetworkError',
    message,
    retryable: true,
    ...(endpoint !== undefined ? { endpoint } : {}),
    ...withCause(cause),
  };
}

/**
 * Creates a ValidationError.
 *
 * @param message - Error message.
 * @param options - Offending fields and underlying error.
 * @returns A ValidationError instance.
 */
export function createValidationError(
  message: string,
  options: { invalidFields?: readonly string[]; cause?: Error } = {}
): ValidationError {
  const { invalidFields, cause } = options;
  return {
    kind: 'ValidationError',
    message,
    retryable: false,
    ...(invalidFields !== undefined ? { invalidFields } : {}),
    ...withCause(cause),
  };
}

/**
 * Creates an EmptyResponseError.
 *
 * @param message - Error message.
 * @returns An EmptyResponseError instance.
 */
export function createEmptyResponseError(message: string): EmptyResponseError {
  return { kind: 'EmptyResponseError', message, retryable: false };
}

/**
 * Result type for model router operations.
 */
export type ModelRouterResult =
  | { readonly success: true; readonly response: ModelRouterResponse }
  | { readonly success: false; readonly error: ModelRouterError };

/**
 * Creates a successful result.
 *
 * @param response - The successful response.
 * @returns A successful ModelRouterResult.
 */
export function createSuccessResult(
  response: ModelRouterResponse
): Extract<ModelRouterResult, { success: true }> {
  return { success: true, response };
}

/**
 * Creates a failure result.
 *
 * @param error - The error that occurred.
 * @returns A failure ModelRouterResult.
 */
export function createFailureResult(
  error: ModelRouterError
): Extract<ModelRouterResult, { success: false }> {
  return { success: false, error };
}

/**
 * Abstract interface for model routing.
 *
 * @remarks
 * Implementations never throw for transport failures; they return a failure
 * result carrying one of the {@link ModelRouterError} kinds.
 */
export interface ModelRouter {
  /**
   * Sends a complete request.
   *
   * @param request - Agent, prompts and parameters.
   * @returns A result containing the response or an error.
   */
  complete(request: ModelRouterRequest): Promise<ModelRouterResult>;
}
