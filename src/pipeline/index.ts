/**
 * Pipeline state and orchestrator.
 *
 * @packageDocumentation
 */

export {
  AGENT_DECIDES,
  PHASES,
  REQUIRED_ARTIFACTS,
  createInitialState,
  emptyArtifacts,
  type ArtifactName,
  type ArtifactSet,
  type DialogueEntry,
  type Phase,
  type PipelineState,
  type Plan,
  type RequirementField,
  type Requirements,
  type ValidationResult,
} from './types.js';
export {
  DEFAULT_GAME_TITLE,
  NO_PREFERENCE_ANSWER,
  countFilled,
  delegateUnfilled,
  emptyRequirements,
  isFilled,
  isRequirementField,
  meetsThreshold,
  mergeRequirements,
  pairAnswers,
  planTitle,
} from './state.js';
export {
  Orchestrator,
  OrchestratorStateError,
  STRUCTURAL_SUGGESTION,
  type OrchestratorOptions,
  type StepResult,
} from './orchestrator.js';
