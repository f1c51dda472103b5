/**
 * Single entry point the phase agents use to obtain text from a model.
 *
 * @packageDocumentation
 */

import type { AgentIdentity, Config } from '../config/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { retryConfigFromSettings, withRetry } from './retry.js';
import {
  createEmptyResponseError,
  createFailureResult,
  type ModelRouter,
  type ModelRouterError,
  type ModelRouterRequest,
  type ModelRouterResult,
} from './types.js';

/**
 * Thrown when a generation call fails for good: a fatal error, or a
 * transient one that outlived the retry budget.
 */
export class GenerationError extends Error {
  /** Agent whose call failed. */
  public readonly agent: AgentIdentity;
  /** The last error the router reported. */
  public readonly routerError: ModelRouterError;
  /** Attempts made before giving up. */
  public readonly attempts: number;

  constructor(agent: AgentIdentity, routerError: ModelRouterError, attempts: number) {
    super(
      `${agent} generation failed after ${String(attempts)} attempt(s): ${routerError.kind}: ${routerError.message}`
    );
    this.name = 'GenerationError';
    this.agent = agent;
    this.routerError = routerError;
    this.attempts = attempts;
  }
}

/**
 * Options for {@link generateText}.
 */
export interface GenerateTextOptions {
  /** Effective configuration; supplies agent parameters, timeout and retry policy. */
  config: Config;
  /** Logger for retry and failure events. */
  logger?: Logger;
  /** Sleep function for backoff delays (injectable for testing). */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Builds the router request for an agent from its configured parameters.
 *
 * @param agent - The calling agent.
 * @param systemPrompt - System instructions.
 * @param prompt - User-side context.
 * @param config - Effective configuration.
 * @returns The request to hand to the router.
 */
export function buildRequest(
  agent: AgentIdentity,
  systemPrompt: string,
  prompt: string,
  config: Config
): ModelRouterRequest {
  const settings = config.agents[agent];
  return {
    agent,
    systemPrompt,
    prompt,
    parameters: {
      model: settings.model,
      temperature: settings.temperature,
      maxTokens: settings.max_output_tokens,
      topP: settings.top_p,
      topK: settings.top_k,
      timeoutMs: config.pipeline.call_timeout_ms,
    },
  };
}

/**
 * Calls the router for one agent, applying the retry policy, and returns the text.
 *
 * A reply that is empty after trimming counts as a failed call.
 *
 * @param router - Generation transport.
 * @param agent - The calling agent.
 * @param systemPrompt - System instructions.
 * @param prompt - User-side context.
 * @param options - Configuration, logger and sleep hook.
 * @returns The generated text, never empty.
 * @throws GenerationError when the call fails for good.
 */
export async function generateText(
  router: ModelRouter,
  agent: AgentIdentity,
  systemPrompt: string,
  prompt: string,
  options: GenerateTextOptions
): Promise<string> {
  const logger = options.logger ?? silentLogger;
  const request = buildRequest(agent, systemPrompt, prompt, options.config);

  const attempt = async (): Promise<ModelRouterResult> => {
    const result = await router.complete(request);
    if (result.success && result.response.content.trim() === '') {
      return createFailureResult(
        createEmptyResponseError(`Model '${request.parameters.model}' returned an empty response`)
      );
    }
    return result;
  };

  const { result, attempts } = await withRetry(attempt, {
    config: retryConfigFromSettings(options.config.retry),
    onRetry: (info) => {
      logger.warn('generation_retry', {
        agent,
        attempt: info.attempt,
        maxAttempts: info.maxAttempts,
        delayMs: info.delayMs,
        errorKind: info.previousError.kind,
        message: info.previousError.message,
      });
    },
    ...(options.sleep !== undefined ? { sleep: options.sleep } : {}),
  });

  if (!result.success) {
    logger.error('generation_failed', {
      agent,
      attempts,
      errorKind: result.error.kind,
      message: result.error.message,
    });
    throw new GenerationError(agent, result.error, attempts);
  }

  logger.debug('generation_succeeded', {
    agent,
    attempts,
    modelId: result.response.metadata.modelId,
    totalTokens: result.response.usage.totalTokens,
  });

  return result.response.content;
}
