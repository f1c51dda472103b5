import { describe, it, expect, vi } from 'vitest';
import { getDefaultConfig } from '../config/parser.js';
import { createInitialState } from '../pipeline/types.js';
import { GenerationError } from '../router/generate.js';
import {
  createAuthenticationError,
  createFailureResult,
  createSuccessResult,
  type ModelRouter,
  type ModelRouterResult,
} from '../router/types.js';
import { Logger } from '../utils/logger.js';
import { CLARIFIER_FALLBACK_QUESTION, normalizeRequirements, runClarifier } from './clarifier.js';

function reply(content: string): ModelRouterResult {
  return createSuccessResult({
    content,
    usage: { promptTokens: 12, completionTokens: 8, totalTokens: 20 },
    metadata: { modelId: 'test-model', provider: 'test', latencyMs: 1 },
  });
}

function routerReturning(result: ModelRouterResult) {
  const complete = vi.fn<ModelRouter['complete']>().mockResolvedValue(result);
  const router: ModelRouter = { complete };
  return { router, complete };
}

const state = createInitialState('a space dodger');

describe('runClarifier', () => {
  it('returns questions and normalized requirements', async () => {
    const { router } = routerReturning(
      reply(
        JSON.stringify({
          complete: false,
          questions: ['Keyboard or mouse?', ''],
          requirements: {
            game_type: 'arcade',
            core_mechanic: ' dodge ',
            win_condition: null,
            additional_features: ['high score', 3],
          },
        })
      )
    );

    await expect(runClarifier(state, { router, config: getDefaultConfig() })).resolves.toEqual({
      complete: false,
      questions: ['Keyboard or mouse?'],
      requirements: {
        game_type: 'arcade',
        core_mechanic: 'dodge',
        win_condition: null,
        lose_condition: null,
        control_scheme: null,
        visual_style: null,
        additional_features: ['high score'],
      },
    });
  });

  it('sends the clarifier context with the clarifier model', async () => {
    const { router, complete } = routerReturning(reply('{"complete": true, "questions": []}'));

    await runClarifier(state, { router, config: getDefaultConfig() });

    expect(complete).toHaveBeenCalledTimes(1);
    const request = complete.mock.calls[0]?.[0];
    expect(request?.agent).toBe('clarifier');
    expect(request?.prompt).toBe('Game idea: a space dodger');
    expect(request?.parameters.model).toBe('claude-haiku-4-5');
  });

  it('accepts completion only when it is literally true', async () => {
    const { router } = routerReturning(reply('{"complete": "yes"}'));
    const result = await runClarifier(state, { router, config: getDefaultConfig() });
    expect(result).toEqual({ complete: false, questions: [], requirements: undefined });
  });

  it('falls back to a follow-up question for unparseable replies', async () => {
    const lines: string[] = [];
    const logger = new Logger({ component: 'Test', sink: (l) => lines.push(l) });
    const { router } = routerReturning(reply('I am not sure what you mean.'));

    const result = await runClarifier(state, { router, config: getDefaultConfig(), logger });

    expect(result).toEqual({
      complete: false,
      questions: [CLARIFIER_FALLBACK_QUESTION],
      requirements: undefined,
    });
    const fallback = lines.find((l) => l.includes('"event":"record_parse_fallback"'));
    expect(fallback).toContain('"component":"Clarifier"');
    expect(fallback).toContain('"label":"clarifier"');
  });

  it('propagates generation failures', async () => {
    const { router } = routerReturning(
      createFailureResult(createAuthenticationError('Invalid API key', 'test'))
    );
    await expect(runClarifier(state, { router, config: getDefaultConfig() })).rejects.toBeInstanceOf(
      GenerationError
    );
  });
});

describe('normalizeRequirements', () => {
  it('returns undefined for non-objects', () => {
    expect(normalizeRequirements(null)).toBeUndefined();
    expect(normalizeRequirements(['arcade'])).toBeUndefined();
  });

  it('turns blank and non-string fields into null', () => {
    expect(normalizeRequirements({ game_type: '  ', core_mechanic: 7, visual_style: 'retro' })).toEqual({
      game_type: null,
      core_mechanic: null,
      win_condition: null,
      lose_condition: null,
      control_scheme: null,
      visual_style: 'retro',
      additional_features: [],
    });
  });
});
