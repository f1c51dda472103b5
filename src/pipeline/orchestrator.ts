/**
 * Pipeline orchestrator.
 *
 * A step-driven state machine over {@link PipelineState}. Each call to
 * {@link Orchestrator.step} runs the handler for the current phase, awaits
 * at most one agent call and moves the state to its next phase. The
 * orchestrator is the only writer of the state.
 *
 * @packageDocumentation
 */

import type { PhaseAgents } from '../agents/types.js';
import type { Config } from '../config/types.js';
import type { ArtifactStore } from '../persistence/artifact-store.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { runStructuralChecks } from '../validation/structural.js';
import {
  delegateUnfilled,
  isRequirementField,
  meetsThreshold,
  mergeRequirements,
  pairAnswers,
  planTitle,
} from './state.js';
import {
  createInitialState,
  type Phase,
  type PipelineState,
  type ValidationResult,
} from './types.js';

/**
 * Suggestion attached to a result synthesized from structural issues.
 */
export const STRUCTURAL_SUGGESTION = 'Fix the structural issues above and regenerate.';

/**
 * Options for constructing an {@link Orchestrator}.
 */
export interface OrchestratorOptions {
  /** The four phase agents. */
  agents: PhaseAgents;
  /** Destination for accepted and discarded artifacts. */
  store: ArtifactStore;
  /** Effective configuration. */
  config: Config;
  /** Logger for phase events. */
  logger?: Logger;
}

/**
 * Outcome of one {@link Orchestrator.step}.
 */
export interface StepResult {
  /** Phase after the step. */
  phase: Phase;
  /** Read-only view of the state after the step. */
  state: Readonly<PipelineState>;
  /** True when clarification stopped to wait for the human. */
  awaitingAnswers: boolean;
}

/**
 * Error thrown when the orchestrator is used before {@link Orchestrator.start}.
 */
export class OrchestratorStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OrchestratorStateError';
  }
}

/**
 * Drives one game-builder run from idea to saved artifacts.
 *
 * @example
 * ```typescript
 * const orchestrator = new Orchestrator({ agents, store, config, logger });
 * orchestrator.start('a snake game with portals');
 * let result = await orchestrator.runUntilInput();
 * while (result.awaitingAnswers) {
 *   orchestrator.applyAnswers(await ask(result.state.pendingQuestions));
 *   result = await orchestrator.runUntilInput();
 * }
 * ```
 */
export class Orchestrator {
  private readonly agents: PhaseAgents;
  private readonly store: ArtifactStore;
  private readonly config: Config;
  private readonly logger: Logger;
  private state: PipelineState | undefined;
  private awaitingInput = false;

  constructor(options: OrchestratorOptions) {
    this.agents = options.agents;
    this.store = options.store;
    this.config = options.config;
    this.logger = (options.logger ?? silentLogger).child('Orchestrator');
  }

  /**
   * Begins a new run, discarding any previous one.
   *
   * @param request - The human's game idea.
   * @returns The fresh state, in the clarifying phase.
   */
  start(request: string): Readonly<PipelineState> {
    this.state = createInitialState(request);
    this.awaitingInput = false;
    this.logger.info('run_started', { request });
    return this.state;
  }

  /**
   * Returns a read-only view of the current state.
   *
   * @throws OrchestratorStateError if no run has started.
   */
  getState(): Readonly<PipelineState> {
    return this.current();
  }

  /**
   * Runs the handler for the current phase once.
   *
   * A no-op once the run is done.
   *
   * @throws GenerationError when the phase's agent call fails; the state is
   * left in the phase that failed.
   * @throws OrchestratorStateError if no run has started.
   */
  async step(): Promise<StepResult> {
    const state = this.current();
    const from = state.phase;

    switch (from) {
      case 'clarifying':
        await this.clarify(state);
        break;
      case 'planning':
        await this.plan(state);
        break;
      case 'generating':
        await this.generate(state);
        break;
      case 'validating':
        await this.validate(state);
        break;
      case 'done':
        break;
    }

    if (state.phase !== from) {
      this.logger.info('phase_transition', { from, to: state.phase });
    }
    return this.result(state);
  }

  /**
   * Steps until the run is done or clarification waits for the human.
   */
  async runUntilInput(): Promise<StepResult> {
    let result = this.result(this.current());
    while (!result.state.done) {
      result = await this.step();
      if (result.awaitingAnswers) {
        break;
      }
    }
    return result;
  }

  /**
   * Records the human's answers to the pending questions.
   *
   * Answers pair with questions by position; blank answers are recorded as
   * no preference. Without pending questions, non-blank answers are recorded
   * as free-form additions. Pending questions are cleared.
   *
   * @param answers - Answers in question order.
   * @throws OrchestratorStateError if no run has started.
   */
  applyAnswers(answers: readonly string[]): void {
    const state = this.current();
    if (state.pendingQuestions.length > 0) {
      state.dialogue.push(...pairAnswers(state.pendingQuestions, answers));
    } else {
      for (const answer of answers) {
        if (answer.trim() !== '') {
          state.dialogue.push({ role: 'user', content: answer.trim() });
        }
      }
    }
    state.pendingQuestions = [];
    this.awaitingInput = false;
  }

  /**
   * Leaves every requirement still unknown to the agents.
   *
   * Called when the human has used up the question rounds; the next
   * clarifying step then meets the completeness threshold.
   *
   * @throws OrchestratorStateError if no run has started.
   */
  delegateRemaining(): void {
    const state = this.current();
    state.requirements = delegateUnfilled(state.requirements);
    state.pendingQuestions = [];
    this.awaitingInput = false;
    this.logger.info('requirements_delegated', { rounds: state.clarificationRounds });
  }

  private current(): PipelineState {
    if (this.state === undefined) {
      throw new OrchestratorStateError('No run in progress; call start() first');
    }
    return this.state;
  }

  private result(state: PipelineState): StepResult {
    return {
      phase: state.phase,
      state,
      awaitingAnswers: state.phase === 'clarifying' && this.awaitingInput,
    };
  }

  private async runAgent<T>(phase: Phase, call: () => Promise<T>): Promise<T> {
    this.logger.info('phase_started', { phase });
    try {
      return await call();
    } catch (error) {
      this.logger.error('phase_failed', {
        phase,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  private async clarify(state: PipelineState): Promise<void> {
    const result = await this.runAgent('clarifying', () => this.agents.clarify(state));
    state.clarificationRounds += 1;
    state.requirements = mergeRequirements(state.requirements, result.requirements);

    const { completeness_threshold, required_fields } = this.config.clarification;
    const thresholdMet = meetsThreshold(
      state.requirements,
      required_fields.filter(isRequirementField),
      completeness_threshold
    );

    if (result.complete || thresholdMet) {
      state.pendingQuestions = [];
      state.phase = 'planning';
      this.awaitingInput = false;
      return;
    }

    state.pendingQuestions = result.questions;
    this.awaitingInput = true;
  }

  private async plan(state: PipelineState): Promise<void> {
    if (state.plan === undefined) {
      state.plan = await this.runAgent('planning', () => this.agents.plan(state));
    }
    state.phase = 'generating';
  }

  private async generate(state: PipelineState): Promise<void> {
    state.artifacts = await this.runAgent('generating', () => this.agents.execute(state));
    state.phase = 'validating';
  }

  private async validate(state: PipelineState): Promise<void> {
    const structural = runStructuralChecks(state.artifacts, state.plan, {
      minArtifactBytes: this.config.pipeline.min_artifact_bytes,
    });

    let result: ValidationResult;
    if (!structural.ok) {
      this.logger.warn('structural_validation_failed', {
        attempt: state.retryCount + 1,
        issues: structural.issues,
      });
      result = { valid: false, issues: structural.issues, suggestions: [STRUCTURAL_SUGGESTION] };
    } else {
      result = await this.runAgent('validating', () => this.agents.validate(state));
    }
    state.validationResult = result;

    if (result.valid) {
      this.logger.info('validation_passed', { attempt: state.retryCount + 1 });
      await this.save(state);
      this.finish(state);
      return;
    }

    const maxRetries = this.config.pipeline.max_retries;
    this.logger.warn('validation_failed', {
      attempt: state.retryCount + 1,
      maxRetries,
      issues: result.issues,
    });
    await this.saveFailed(state);

    // retryCount counts failed validations and never exceeds maxRetries
    const next = state.retryCount + 1;
    if (next < maxRetries) {
      state.retryCount = next;
      state.phase = 'generating';
      return;
    }

    state.retryCount = Math.min(next, maxRetries);
    this.logger.warn('retries_exhausted', { maxRetries });
    state.bestEffort = true;
    await this.save(state);
    this.finish(state);
  }

  private finish(state: PipelineState): void {
    state.phase = 'done';
    state.done = true;
    this.logger.info('run_finished', {
      valid: state.validationResult?.valid ?? false,
      bestEffort: state.bestEffort,
      retries: state.retryCount,
      outputLocation: state.outputLocation,
    });
  }

  private async save(state: PipelineState): Promise<void> {
    try {
      state.outputLocation = await this.store.save(state.artifacts, planTitle(state.plan));
    } catch (error) {
      this.logger.error('artifact_save_failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async saveFailed(state: PipelineState): Promise<void> {
    try {
      await this.store.saveFailed(state.artifacts, state.retryCount + 1);
    } catch (error) {
      this.logger.error('failed_attempt_save_failed', {
        attempt: state.retryCount + 1,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
