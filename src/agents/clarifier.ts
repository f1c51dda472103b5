/**
 * Clarifier agent: asks the human for missing requirements.
 *
 * @packageDocumentation
 */

import { isRecord } from '../config/parser.js';
import { REQUIREMENT_FIELDS } from '../config/defaults.js';
import { parseRecord } from '../parser/record.js';
import type { PipelineState, Requirements } from '../pipeline/types.js';
import { buildClarifierContext, createClarifierSystemPrompt } from './prompts.js';
import { agentLogger, callAgent, stringList } from './shared.js';
import type { AgentDeps, ClarifierResult } from './types.js';

/**
 * Question asked when the clarifier's reply cannot be parsed.
 */
export const CLARIFIER_FALLBACK_QUESTION = 'Could you describe your game idea in more detail?';

/**
 * Reads requirements out of a decoded reply.
 *
 * Blank or non-string fields become `null`.
 *
 * @param value - The `requirements` member of the reply.
 * @returns Requirements, or `undefined` when the member is not an object.
 */
export function normalizeRequirements(value: unknown): Requirements | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const requirements: Requirements = {
    game_type: null,
    core_mechanic: null,
    win_condition: null,
    lose_condition: null,
    control_scheme: null,
    visual_style: null,
    additional_features: stringList(value['additional_features']),
  };
  for (const field of REQUIREMENT_FIELDS) {
    const raw = value[field];
    requirements[field] = typeof raw === 'string' && raw.trim() !== '' ? raw.trim() : null;
  }
  return requirements;
}

/**
 * Runs one clarification round.
 *
 * @param state - Current pipeline state.
 * @param deps - Router, configuration and logger.
 * @returns Whether requirements are complete, any follow-up questions and
 * the requirements as the agent understands them.
 * @throws GenerationError when the call fails after retries.
 */
export async function runClarifier(
  state: Readonly<PipelineState>,
  deps: AgentDeps
): Promise<ClarifierResult> {
  const logger = agentLogger(deps, 'Clarifier');
  const raw = await callAgent(
    deps,
    'clarifier',
    createClarifierSystemPrompt(),
    buildClarifierContext(state),
    logger
  );

  const { value } = parseRecord(
    raw,
    { complete: false, questions: [CLARIFIER_FALLBACK_QUESTION], requirements: null },
    { logger, label: 'clarifier' }
  );

  const result: ClarifierResult = {
    complete: value['complete'] === true,
    questions: stringList(value['questions']),
    requirements: normalizeRequirements(value['requirements']),
  };

  logger.info('clarifier_result', {
    complete: result.complete,
    questions: result.questions.length,
  });
  return result;
}
