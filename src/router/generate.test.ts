import { describe, it, expect, vi } from 'vitest';
import { getDefaultConfig } from '../config/parser.js';
import { Logger } from '../utils/logger.js';
import { GenerationError, buildRequest, generateText } from './generate.js';
import {
  createAuthenticationError,
  createFailureResult,
  createRateLimitError,
  createSuccessResult,
  createTimeoutError,
  type ModelRouter,
  type ModelRouterResult,
} from './types.js';

function success(content: string): ModelRouterResult {
  return createSuccessResult({
    content,
    usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
    metadata: { modelId: 'test-model', provider: 'test', latencyMs: 1 },
  });
}

function routerReturning(...results: ModelRouterResult[]) {
  const complete = vi.fn<ModelRouter['complete']>();
  for (const result of results) {
    complete.mockResolvedValueOnce(result);
  }
  const router: ModelRouter = { complete };
  return { router, complete };
}

const noSleep = (): Promise<void> => Promise.resolve();

describe('buildRequest', () => {
  it('copies the agent parameters and call timeout from configuration', () => {
    const config = getDefaultConfig();
    const request = buildRequest('validator', 'system text', 'user text', config);

    expect(request).toEqual({
      agent: 'validator',
      systemPrompt: 'system text',
      prompt: 'user text',
      parameters: {
        model: 'claude-sonnet-4-5',
        temperature: 0.1,
        maxTokens: 3072,
        topP: 0.85,
        topK: 40,
        timeoutMs: 300000,
      },
    });
  });
});

describe('generateText', () => {
  it('returns the content of a successful call', async () => {
    const { router, complete } = routerReturning(success('{"complete": true}'));

    const text = await generateText(router, 'clarifier', 'sys', 'ctx', {
      config: getDefaultConfig(),
    });

    expect(text).toBe('{"complete": true}');
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it('treats a blank reply as a fatal empty response', async () => {
    const { router, complete } = routerReturning(success('   \n'));

    const promise = generateText(router, 'planner', 'sys', 'ctx', {
      config: getDefaultConfig(),
      sleep: noSleep,
    });

    await expect(promise).rejects.toBeInstanceOf(GenerationError);
    await expect(promise).rejects.toMatchObject({
      agent: 'planner',
      attempts: 1,
      routerError: { kind: 'EmptyResponseError' },
    });
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it('retries rate limits and returns the eventual success', async () => {
    const { router, complete } = routerReturning(
      createFailureResult(createRateLimitError('busy')),
      success('<html></html>')
    );
    const sleep = vi.fn(noSleep);

    const text = await generateText(router, 'executor', 'sys', 'ctx', {
      config: getDefaultConfig(),
      sleep,
    });

    expect(text).toBe('<html></html>');
    expect(complete).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(2000);
  });

  it('throws immediately on fatal errors', async () => {
    const { router, complete } = routerReturning(
      createFailureResult(createAuthenticationError('denied', 'test'))
    );

    await expect(
      generateText(router, 'executor', 'sys', 'ctx', { config: getDefaultConfig(), sleep: noSleep })
    ).rejects.toThrow(
      'executor generation failed after 1 attempt(s): AuthenticationError: denied'
    );
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it('gives a timed-out call one retry only', async () => {
    const { router, complete } = routerReturning(
      createFailureResult(createTimeoutError('slow', 300000)),
      createFailureResult(createTimeoutError('slow', 300000))
    );

    await expect(
      generateText(router, 'validator', 'sys', 'ctx', {
        config: getDefaultConfig(),
        sleep: noSleep,
      })
    ).rejects.toMatchObject({ attempts: 2, routerError: { kind: 'TimeoutError' } });
    expect(complete).toHaveBeenCalledTimes(2);
  });

  it('logs retries and the final failure', async () => {
    const lines: string[] = [];
    const logger = new Logger({ component: 'Test', level: 'debug', sink: (l) => lines.push(l) });
    const { router } = routerReturning(
      createFailureResult(createRateLimitError('busy')),
      createFailureResult(createRateLimitError('busy')),
      createFailureResult(createRateLimitError('still busy'))
    );

    await expect(
      generateText(router, 'clarifier', 'sys', 'ctx', {
        config: getDefaultConfig(),
        logger,
        sleep: noSleep,
      })
    ).rejects.toBeInstanceOf(GenerationError);

    const events = lines.map((line) => {
      const parsed: unknown = JSON.parse(line);
      return typeof parsed === 'object' && parsed !== null && 'event' in parsed
        ? parsed.event
        : undefined;
    });
    expect(events).toEqual(['generation_retry', 'generation_retry', 'generation_failed']);
  });
});
