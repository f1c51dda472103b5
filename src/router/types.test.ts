/**
 * Tests for Model Router types.
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  ERROR_KINDS,
  isModelRouterError,
  isRetryableError,
  createRateLimitError,
  createAuthenticationError,
  createModelError,
  createTimeoutError,
  createNetworkError,
  createValidationError,
  createEmptyResponseError,
  createSuccessResult,
  createFailureResult,
  type ModelRouterResponse,
} from './types.js';

describe('ModelRouterError', () => {
  describe('createRateLimitError', () => {
    it('omits retryAfterMs when not given', () => {
      const error = createRateLimitError('slow down');
      expect(error).toEqual({ kind: 'RateLimitError', message: 'slow down', retryable: true });
      expect('retryAfterMs' in error).toBe(false);
    });

    it('keeps the retry hint and cause', () => {
      const cause = new Error('429');
      const error = createRateLimitError('slow down', { retryAfterMs: 1500, cause });
      expect(error.retryAfterMs).toBe(1500);
      expect(error.cause).toBe(cause);
    });
  });

  it('createAuthenticationError is never retryable', () => {
    const error = createAuthenticationError('bad key', 'claude-code');
    expect(error).toEqual({
      kind: 'AuthenticationError',
      message: 'bad key',
      provider: 'claude-code',
      retryable: false,
    });
  });

  it('createModelError carries the error code', () => {
    const error = createModelError('exit 2', true, { errorCode: 'EXIT_2' });
    expect(error).toEqual({
      kind: 'ModelError',
      message: 'exit 2',
      retryable: true,
      errorCode: 'EXIT_2',
    });
  });

  it('createTimeoutError records the timeout', () => {
    expect(createTimeoutError('too slow', 5000)).toEqual({
      kind: 'TimeoutError',
      message: 'too slow',
      timeoutMs: 5000,
      retryable: true,
    });
  });

  it('createNetworkError records the endpoint', () => {
    expect(createNetworkError('spawn failed', { endpoint: 'claude' }).endpoint).toBe('claude');
  });

  it('createValidationError lists invalid fields', () => {
    const error = createValidationError('bad request', { invalidFields: ['prompt'] });
    expect(error.invalidFields).toEqual(['prompt']);
    expect(error.retryable).toBe(false);
  });

  it('createEmptyResponseError is never retryable', () => {
    expect(createEmptyResponseError('nothing came back')).toEqual({
      kind: 'EmptyResponseError',
      message: 'nothing came back',
      retryable: false,
    });
  });

  describe('isModelRouterError', () => {
    it('recognises every factory output', () => {
      const errors = [
        createRateLimitError('a'),
        createAuthenticationError('b', 'p'),
        createModelError('c', false),
        createTimeoutError('d', 1),
        createNetworkError('e'),
        createValidationError('f'),
        createEmptyResponseError('g'),
      ];
      for (const error of errors) {
        expect(isModelRouterError(error)).toBe(true);
      }
      expect(errors.map((e) => e.kind)).toEqual([...ERROR_KINDS]);
    });

    it('rejects other values', () => {
      expect(isModelRouterError(null)).toBe(false);
      expect(isModelRouterError('RateLimitError')).toBe(false);
      expect(isModelRouterError({ kind: 'SomethingElse', message: 'x' })).toBe(false);
      expect(isModelRouterError({ kind: 'ModelError' })).toBe(false);
      expect(isModelRouterError(new Error('plain'))).toBe(false);
    });

    it('property: unknown kinds are rejected', () => {
      fc.assert(
        fc.property(
          fc.string().filter((s) => !ERROR_KINDS.some((kind) => kind === s)),
          (kind) => !isModelRouterError({ kind, message: 'm' })
        )
      );
    });
  });

  it('isRetryableError follows the retryable flag', () => {
    expect(isRetryableError(createTimeoutError('t', 1))).toBe(true);
    expect(isRetryableError(createModelError('m', false))).toBe(false);
    expect(isRetryableError(createModelError('m', true))).toBe(true);
  });
});

describe('ModelRouterResult', () => {
  const response: ModelRouterResponse = {
    content: 'hello',
    usage: { promptTokens: 1, completionTokens: 1, totalTokens: 2 },
    metadata: { modelId: 'test-model', provider: 'test', latencyMs: 3 },
  };

  it('createSuccessResult wraps the response', () => {
    const result = createSuccessResult(response);
    expect(result.success).toBe(true);
    expect(result.response.content).toBe('hello');
  });

  it('createFailureResult wraps the error', () => {
    const result = createFailureResult(createNetworkError('down'));
    expect(result.success).toBe(false);
    expect(result.error.kind).toBe('NetworkError');
  });
});
