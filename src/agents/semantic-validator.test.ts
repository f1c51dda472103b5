import { describe, it, expect, vi } from 'vitest';
import { getDefaultConfig } from '../config/parser.js';
import { createInitialState, type PipelineState } from '../pipeline/types.js';
import { createSuccessResult, type ModelRouter } from '../router/types.js';
import { VALIDATOR_FALLBACK_ISSUE, runSemanticValidator } from './semantic-validator.js';

function routerReplying(content: string) {
  const complete = vi.fn<ModelRouter['complete']>().mockResolvedValue(
    createSuccessResult({
      content,
      usage: { promptTokens: 500, completionTokens: 50, totalTokens: 550 },
      metadata: { modelId: 'test-model', provider: 'test', latencyMs: 1 },
    })
  );
  const router: ModelRouter = { complete };
  return { router, complete };
}

const state: PipelineState = {
  ...createInitialState('pong'),
  phase: 'validating',
  artifacts: { 'index.html': '<canvas></canvas>', 'style.css': 'canvas {}', 'game.js': 'play();' },
};

describe('runSemanticValidator', () => {
  it('accepts an explicit valid verdict', async () => {
    const { router } = routerReplying('{"valid": true, "issues": [], "suggestions": ["Add sound"]}');

    await expect(runSemanticValidator(state, { router, config: getDefaultConfig() })).resolves.toEqual({
      valid: true,
      issues: [],
      suggestions: ['Add sound'],
    });
  });

  it('treats anything but literal true as invalid', async () => {
    const { router } = routerReplying('Result: {"valid": "true", "issues": ["Ball never resets"]}');

    await expect(runSemanticValidator(state, { router, config: getDefaultConfig() })).resolves.toEqual({
      valid: false,
      issues: ['Ball never resets'],
      suggestions: [],
    });
  });

  it('fails closed when the reply is not JSON', async () => {
    const { router } = routerReplying('Looks great to me!');

    await expect(runSemanticValidator(state, { router, config: getDefaultConfig() })).resolves.toEqual({
      valid: false,
      issues: [VALIDATOR_FALLBACK_ISSUE],
      suggestions: [],
    });
  });

  it('sends every file to the validator model', async () => {
    const { router, complete } = routerReplying('{"valid": true}');

    await runSemanticValidator(state, { router, config: getDefaultConfig() });

    const request = complete.mock.calls[0]?.[0];
    expect(request?.agent).toBe('validator');
    expect(request?.prompt).toBe(
      '=== index.html ===\n<canvas></canvas>\n\n=== style.css ===\ncanvas {}\n\n=== game.js ===\nplay();\n'
    );
  });
});
