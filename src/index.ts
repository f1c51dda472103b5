/**
 * arcade-forge
 *
 * Turns a plain-language game idea into a playable browser game through a
 * clarify, plan, generate and validate pipeline.
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

// Pipeline
export {
  AGENT_DECIDES,
  Orchestrator,
  OrchestratorStateError,
  PHASES,
  REQUIRED_ARTIFACTS,
  createInitialState,
  type ArtifactName,
  type ArtifactSet,
  type DialogueEntry,
  type OrchestratorOptions,
  type Phase,
  type PipelineState,
  type Plan,
  type Requirements,
  type StepResult,
  type ValidationResult,
} from './pipeline/index.js';

// Agents
export { createPhaseAgents, type AgentDeps, type PhaseAgents } from './agents/index.js';

// Validation
export { runStructuralChecks, type StructuralCheckResult } from './validation/index.js';

// Response parsing
export { extractNamedBlocks, parseRecord } from './parser/index.js';

// Configuration
export {
  CONFIG_FILE_NAME,
  ConfigParseError,
  ConfigValidationError,
  EnvCoercionError,
  getDefaultConfig,
  loadConfig,
  type Config,
  type ValidationResult as ConfigValidationResult,
} from './config/index.js';

// Generation transport
export {
  ClaudeCodeClient,
  GenerationError,
  createClaudeCodeClient,
  generateText,
  type ModelRouter,
  type ModelRouterError,
  type ModelRouterResult,
} from './router/index.js';

// Persistence
export {
  ArtifactStoreError,
  FileArtifactStore,
  type ArtifactStore,
} from './persistence/index.js';

// Logging
export { Logger, silentLogger, type LogLevel } from './utils/logger.js';
