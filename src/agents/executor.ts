/**
 * Executor agent: writes the three game files from the plan.
 *
 * @packageDocumentation
 */

import { extractNamedBlocks } from '../parser/named-blocks.js';
import type { ArtifactSet, PipelineState } from '../pipeline/types.js';
import { buildExecutorContext, createExecutorSystemPrompt } from './prompts.js';
import { agentLogger, callAgent } from './shared.js';
import type { AgentDeps } from './types.js';

/**
 * Runs the executor once. Files missing from the reply come back as `''`
 * and are caught by the structural checks.
 *
 * @param state - Current pipeline state; the plan and, on a retry, the last
 * validation issues feed the context.
 * @param deps - Router, configuration and logger.
 * @returns The generated artifacts.
 * @throws GenerationError when the call fails after retries.
 */
export async function runExecutor(
  state: Readonly<PipelineState>,
  deps: AgentDeps
): Promise<ArtifactSet> {
  const logger = agentLogger(deps, 'Executor');
  const raw = await callAgent(
    deps,
    'executor',
    createExecutorSystemPrompt(),
    buildExecutorContext(state),
    logger
  );

  const { artifacts, missing } = extractNamedBlocks(raw, logger);
  logger.info('artifacts_generated', {
    attempt: state.retryCount + 1,
    sizes: {
      'index.html': artifacts['index.html'].length,
      'style.css': artifacts['style.css'].length,
      'game.js': artifacts['game.js'].length,
    },
    missing,
  });
  return artifacts;
}
