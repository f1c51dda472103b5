/**
 * Phase agents for the game-builder pipeline.
 *
 * @packageDocumentation
 */

import type { AgentDeps, PhaseAgents } from './types.js';
import { runClarifier } from './clarifier.js';
import { runExecutor } from './executor.js';
import { runPlanner } from './planner.js';
import { runSemanticValidator } from './semantic-validator.js';

export type { AgentDeps, ClarifierResult, PhaseAgents } from './types.js';
export { CLARIFIER_FALLBACK_QUESTION, normalizeRequirements, runClarifier } from './clarifier.js';
export { runPlanner } from './planner.js';
export { runExecutor } from './executor.js';
export { VALIDATOR_FALLBACK_ISSUE, runSemanticValidator } from './semantic-validator.js';
export {
  buildClarifierContext,
  buildExecutorContext,
  buildPlannerContext,
  buildValidatorContext,
  createClarifierSystemPrompt,
  createExecutorSystemPrompt,
  createPlannerSystemPrompt,
  createValidatorSystemPrompt,
  formatPlan,
  formatRequirements,
} from './prompts.js';

/**
 * Binds the four agents to one set of dependencies.
 *
 * @example
 * ```typescript
 * const agents = createPhaseAgents({ router: createClaudeCodeClient(), config, logger });
 * const orchestrator = new Orchestrator({ agents, store, config, logger });
 * ```
 */
export function createPhaseAgents(deps: AgentDeps): PhaseAgents {
  return {
    clarify: (state) => runClarifier(state, deps),
    plan: (state) => runPlanner(state, deps),
    execute: (state) => runExecutor(state, deps),
    validate: (state) => runSemanticValidator(state, deps),
  };
}
