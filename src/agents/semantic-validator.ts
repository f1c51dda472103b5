/**
 * Semantic validator agent: a model review of artifacts that already
 * passed the structural checks.
 *
 * @packageDocumentation
 */

import { parseRecord } from '../parser/record.js';
import type { PipelineState, ValidationResult } from '../pipeline/types.js';
import { buildValidatorContext, createValidatorSystemPrompt } from './prompts.js';
import { agentLogger, callAgent, stringList } from './shared.js';
import type { AgentDeps } from './types.js';

/**
 * Issue reported when the reviewer's reply cannot be parsed.
 */
export const VALIDATOR_FALLBACK_ISSUE =
  'Validator response was not valid JSON, treating as failure.';

/**
 * Runs the semantic review once.
 *
 * Only an explicit `"valid": true` accepts the artifacts.
 *
 * @throws GenerationError when the call fails after retries.
 */
export async function runSemanticValidator(
  state: Readonly<PipelineState>,
  deps: AgentDeps
): Promise<ValidationResult> {
  const logger = agentLogger(deps, 'Validator');
  const raw = await callAgent(
    deps,
    'validator',
    createValidatorSystemPrompt(),
    buildValidatorContext(state.artifacts),
    logger
  );

  const { value } = parseRecord(
    raw,
    { valid: false, issues: [VALIDATOR_FALLBACK_ISSUE], suggestions: [] },
    { logger, label: 'validator' }
  );

  const result: ValidationResult = {
    valid: value['valid'] === true,
    issues: stringList(value['issues']),
    suggestions: stringList(value['suggestions']),
  };

  logger.info('semantic_validation_result', {
    valid: result.valid,
    issues: result.issues.length,
  });
  return result;
}
