/**
 * Pipeline state types for the game-builder orchestrator.
 *
 * @packageDocumentation
 */

import { REQUIREMENT_FIELDS } from '../config/defaults.js';

/**
 * Pipeline phases in execution order.
 *
 * @remarks
 * - clarifying: gather requirements from the human
 * - planning: turn requirements into a design document
 * - generating: produce the three artifacts from the plan
 * - validating: structural checks, then the semantic check
 * - done: terminal
 */
export type Phase = 'clarifying' | 'planning' | 'generating' | 'validating' | 'done';

/**
 * Array of all phases in execution order.
 */
export const PHASES: readonly Phase[] = [
  'clarifying',
  'planning',
  'generating',
  'validating',
  'done',
] as const;

/**
 * Names of the generated files.
 */
export type ArtifactName = 'index.html' | 'style.css' | 'game.js';

/**
 * The three required artifacts, in output order.
 */
export const REQUIRED_ARTIFACTS: readonly ArtifactName[] = [
  'index.html',
  'style.css',
  'game.js',
] as const;

/**
 * Generated file contents keyed by file name. Missing content is `''`.
 */
export type ArtifactSet = Record<ArtifactName, string>;

/**
 * Creates an artifact set with every file empty.
 *
 * @returns A fresh empty set.
 */
export function emptyArtifacts(): ArtifactSet {
  return { 'index.html': '', 'style.css': '', 'game.js': '' };
}

/**
 * Sentinel stored in a requirement field the human left to the agent.
 * Counts as filled.
 */
export const AGENT_DECIDES = 'Agent will decide';

/**
 * Scalar requirement field names.
 */
export type RequirementField = (typeof REQUIREMENT_FIELDS)[number];

/**
 * Game requirements gathered during clarification.
 */
export type Requirements = Record<RequirementField, string | null> & {
  /** Extra features the human asked for. */
  additional_features: string[];
};

/**
 * The design document produced by the planner. Open-ended; the pipeline
 * only reads `metadata.game_title` and the declared framework.
 */
export type Plan = Record<string, unknown>;

/**
 * One turn of the clarification dialogue.
 */
export interface DialogueEntry {
  readonly role: 'assistant' | 'user';
  readonly content: string;
}

/**
 * Outcome of validating one set of artifacts.
 */
export interface ValidationResult {
  /** Whether the artifacts were accepted. */
  valid: boolean;
  /** Problems found. */
  issues: string[];
  /** Suggested fixes. */
  suggestions: string[];
}

/**
 * Complete mutable state of one pipeline run. Owned by the orchestrator;
 * agents receive read-only views.
 */
export interface PipelineState {
  /** The human's first description of the game. */
  readonly originalRequest: string;
  /** Clarification dialogue, append-only. */
  dialogue: DialogueEntry[];
  /** Questions waiting for answers. */
  pendingQuestions: string[];
  /** Requirements gathered so far. */
  requirements: Requirements | undefined;
  /** Design document; set once. */
  plan: Plan | undefined;
  /** Latest generated artifacts. */
  artifacts: ArtifactSet;
  /** Current phase. */
  phase: Phase;
  /** Latest validation outcome. */
  validationResult: ValidationResult | undefined;
  /** Regeneration attempts used. */
  retryCount: number;
  /** True once the run reached its terminal phase. */
  done: boolean;
  /** Clarifier calls made. */
  clarificationRounds: number;
  /** True when the run ended by exhausting retries. */
  bestEffort: boolean;
  /** Directory the accepted or best-effort artifacts were saved to. */
  outputLocation: string | undefined;
}

/**
 * Creates the initial state for a new run.
 *
 * @param originalRequest - The human's game idea.
 * @returns State in the clarifying phase.
 */
export function createInitialState(originalRequest: string): PipelineState {
  return {
    originalRequest,
    dialogue: [],
    pendingQuestions: [],
    requirements: undefined,
    plan: undefined,
    artifacts: emptyArtifacts(),
    phase: 'clarifying',
    validationResult: undefined,
    retryCount: 0,
    done: false,
    clarificationRounds: 0,
    bestEffort: false,
    outputLocation: undefined,
  };
}
