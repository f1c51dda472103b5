/**
 * Planner agent: turns requirements into a design document.
 *
 * @packageDocumentation
 */

import { parseRecord } from '../parser/record.js';
import { planTitle } from '../pipeline/state.js';
import type { PipelineState, Plan } from '../pipeline/types.js';
import { buildPlannerContext, createPlannerSystemPrompt } from './prompts.js';
import { agentLogger, callAgent } from './shared.js';
import type { AgentDeps } from './types.js';

/**
 * Runs the planner once.
 *
 * An unparseable reply yields a minimal vanilla-JS plan that keeps the raw
 * text under `raw_plan`, so generation can still proceed.
 *
 * @throws GenerationError when the call fails after retries.
 */
export async function runPlanner(state: Readonly<PipelineState>, deps: AgentDeps): Promise<Plan> {
  const logger = agentLogger(deps, 'Planner');
  const raw = await callAgent(
    deps,
    'planner',
    createPlannerSystemPrompt(),
    buildPlannerContext(state),
    logger
  );

  const { value } = parseRecord(
    raw,
    {
      metadata: { game_title: 'Generated Game', framework: 'vanilla-js' },
      raw_plan: raw.trim(),
    },
    { logger, label: 'planner' }
  );

  logger.info('plan_created', { title: planTitle(value) });
  return value;
}
