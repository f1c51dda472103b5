/**
 * Helpers shared by the phase agents.
 *
 * @packageDocumentation
 */

import type { AgentIdentity } from '../config/types.js';
import { generateText } from '../router/generate.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { AgentDeps } from './types.js';

/**
 * Returns the agent's logger, a child of the injected one.
 */
export function agentLogger(deps: AgentDeps, component: string): Logger {
  return (deps.logger ?? silentLogger).child(component);
}

/**
 * Makes the agent's single generation call.
 *
 * @throws GenerationError when the call fails after retries.
 */
export function callAgent(
  deps: AgentDeps,
  agent: AgentIdentity,
  systemPrompt: string,
  context: string,
  logger: Logger
): Promise<string> {
  return generateText(deps.router, agent, systemPrompt, context, {
    config: deps.config,
    logger,
    ...(deps.sleep !== undefined ? { sleep: deps.sleep } : {}),
  });
}

/**
 * Keeps the non-blank strings of an array-like value.
 *
 * @param value - Anything a model returned.
 * @returns Trimmed strings; `[]` for non-arrays.
 */
export function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const strings: string[] = [];
  for (const item of value) {
    if (typeof item === 'string' && item.trim() !== '') {
      strings.push(item.trim());
    }
  }
  return strings;
}
