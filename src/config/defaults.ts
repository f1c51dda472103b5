/**
 * Default configuration values for arcade-forge.toml.
 *
 * @packageDocumentation
 */

import type {
  AgentModels,
  ClarificationConfig,
  Config,
  LoggingConfig,
  PipelineConfig,
  RetrySettings,
} from './types.js';

/**
 * Default model settings per agent. The clarifier is cheap and quick, the
 * executor gets the largest output budget, and the validator runs coolest.
 */
export const DEFAULT_AGENT_MODELS: AgentModels = {
  clarifier: {
    model: 'claude-haiku-4-5',
    temperature: 0.3,
    max_output_tokens: 2048,
    top_p: 0.9,
    top_k: 40,
  },
  planner: {
    model: 'claude-sonnet-4-5',
    temperature: 0.2,
    max_output_tokens: 4096,
    top_p: 0.9,
    top_k: 40,
  },
  executor: {
    model: 'claude-sonnet-4-5',
    temperature: 0.2,
    max_output_tokens: 8192,
    top_p: 0.9,
    top_k: 40,
  },
  validator: {
    model: 'claude-sonnet-4-5',
    temperature: 0.1,
    max_output_tokens: 3072,
    top_p: 0.85,
    top_k: 40,
  },
};

/**
 * Default pipeline constants.
 */
export const DEFAULT_PIPELINE: PipelineConfig = {
  max_retries: 3,
  call_timeout_ms: 300_000,
  output_dir: 'output',
  min_artifact_bytes: 100,
};

/**
 * Scalar requirement fields the clarifier can fill.
 */
export const REQUIREMENT_FIELDS = [
  'game_type',
  'core_mechanic',
  'win_condition',
  'lose_condition',
  'control_scheme',
  'visual_style',
] as const;

/**
 * Requirement fields that must be known before planning.
 */
export const DEFAULT_REQUIRED_FIELDS: readonly string[] = [
  'game_type',
  'core_mechanic',
  'win_condition',
  'control_scheme',
] as const;

/**
 * Default clarification settings.
 */
export const DEFAULT_CLARIFICATION: ClarificationConfig = {
  max_rounds: 3,
  completeness_threshold: 4,
  required_fields: [...DEFAULT_REQUIRED_FIELDS],
};

/**
 * Default retry policy for generation calls.
 */
export const DEFAULT_RETRY: RetrySettings = {
  max_attempts: 3,
  base_delay_ms: 2000,
  max_delay_ms: 30_000,
  timeout_retry_delay_ms: 5000,
  jitter_factor: 0,
};

/**
 * Default logging settings.
 */
export const DEFAULT_LOGGING: LoggingConfig = {
  level: 'info',
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  agents: DEFAULT_AGENT_MODELS,
  pipeline: DEFAULT_PIPELINE,
  clarification: DEFAULT_CLARIFICATION,
  retry: DEFAULT_RETRY,
  logging: DEFAULT_LOGGING,
};
