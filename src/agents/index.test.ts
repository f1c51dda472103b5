import { describe, it, expect, vi } from 'vitest';
import { getDefaultConfig } from '../config/parser.js';
import { createInitialState } from '../pipeline/types.js';
import { createSuccessResult, type ModelRouter } from '../router/types.js';
import { createPhaseAgents } from './index.js';

describe('createPhaseAgents', () => {
  it('routes each phase through the shared router with its own identity', async () => {
    const complete = vi.fn<ModelRouter['complete']>().mockResolvedValue(
      createSuccessResult({
        content: '{"valid": true}',
        usage: { promptTokens: 1, completionTokens: 1, totalTokens: 2 },
        metadata: { modelId: 'test-model', provider: 'test', latencyMs: 1 },
      })
    );
    const agents = createPhaseAgents({ router: { complete }, config: getDefaultConfig() });
    const state = createInitialState('tetris');

    await agents.clarify(state);
    await agents.plan(state);
    await agents.execute(state);
    await agents.validate(state);

    expect(complete.mock.calls.map(([request]) => request.agent)).toEqual([
      'clarifier',
      'planner',
      'executor',
      'validator',
    ]);
  });
});
