/**
 * Shared types for the phase agents.
 *
 * @packageDocumentation
 */

import type { Config } from '../config/types.js';
import type {
  ArtifactSet,
  PipelineState,
  Plan,
  Requirements,
  ValidationResult,
} from '../pipeline/types.js';
import type { ModelRouter } from '../router/types.js';
import type { Logger } from '../utils/logger.js';

/**
 * Collaborators every agent needs.
 */
export interface AgentDeps {
  /** Generation transport. */
  readonly router: ModelRouter;
  /** Effective configuration. */
  readonly config: Config;
  /** Logger; agents log under their own child component. */
  readonly logger?: Logger;
  /** Backoff sleep, injectable for tests. */
  readonly sleep?: (ms: number) => Promise<void>;
}

/**
 * What the clarifier returns for one round.
 */
export interface ClarifierResult {
  /** True when the agent considers the requirements complete. */
  complete: boolean;
  /** Questions for the human; empty when complete. */
  questions: string[];
  /** Requirements as the agent now understands them. */
  requirements: Requirements | undefined;
}

/**
 * The four phase agents, bound to their dependencies.
 *
 * @remarks
 * Agents read the state and never mutate it. The orchestrator applies their
 * results.
 */
export interface PhaseAgents {
  clarify(state: Readonly<PipelineState>): Promise<ClarifierResult>;
  plan(state: Readonly<PipelineState>): Promise<Plan>;
  execute(state: Readonly<PipelineState>): Promise<ArtifactSet>;
  validate(state: Readonly<PipelineState>): Promise<ValidationResult>;
}
