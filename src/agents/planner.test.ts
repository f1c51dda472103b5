import { describe, it, expect, vi } from 'vitest';
import { getDefaultConfig } from '../config/parser.js';
import { createInitialState } from '../pipeline/types.js';
import { createSuccessResult, type ModelRouter } from '../router/types.js';
import { runPlanner } from './planner.js';

function routerReplying(content: string) {
  const complete = vi.fn<ModelRouter['complete']>().mockResolvedValue(
    createSuccessResult({
      content,
      usage: { promptTokens: 40, completionTokens: 200, totalTokens: 240 },
      metadata: { modelId: 'test-model', provider: 'test', latencyMs: 1 },
    })
  );
  const router: ModelRouter = { complete };
  return { router, complete };
}

const state = {
  ...createInitialState('snake with portals'),
  requirements: {
    game_type: 'arcade',
    core_mechanic: 'steer the snake',
    win_condition: 'reach 50 points',
    lose_condition: 'hit yourself',
    control_scheme: 'keyboard',
    visual_style: null,
    additional_features: ['portals'],
  },
};

describe('runPlanner', () => {
  it('returns the decoded design document', async () => {
    const plan = {
      metadata: { game_title: 'Portal Snake', framework: 'vanilla-js' },
      technical_architecture: { framework_choice: { selected: 'vanilla-js' } },
    };
    const { router } = routerReplying('```json\n' + JSON.stringify(plan) + '\n```');

    await expect(runPlanner(state, { router, config: getDefaultConfig() })).resolves.toEqual(plan);
  });

  it('sends requirements and the original idea to the planner model', async () => {
    const { router, complete } = routerReplying('{"metadata": {}}');

    await runPlanner(state, { router, config: getDefaultConfig() });

    const request = complete.mock.calls[0]?.[0];
    expect(request?.agent).toBe('planner');
    expect(request?.prompt).toContain('- Win Condition: reach 50 points');
    expect(request?.prompt).toContain('- Additional Features: portals');
    expect(request?.prompt).toContain('Original game idea: snake with portals');
  });

  it('falls back to a minimal vanilla plan that keeps the raw text', async () => {
    const { router } = routerReplying('  A snake game where portals teleport you.  ');

    await expect(runPlanner(state, { router, config: getDefaultConfig() })).resolves.toEqual({
      metadata: { game_title: 'Generated Game', framework: 'vanilla-js' },
      raw_plan: 'A snake game where portals teleport you.',
    });
  });
});
