/**
 * Configuration module for arcade-forge.toml parsing and validation.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, isRecord, parseConfig } from './parser.js';
export type {
  AgentIdentity,
  AgentModelConfig,
  AgentModels,
  ClarificationConfig,
  Config,
  LoggingConfig,
  PartialConfig,
  PipelineConfig,
  RetrySettings,
} from './types.js';
export { AGENT_IDENTITIES } from './types.js';
export {
  DEFAULT_AGENT_MODELS,
  DEFAULT_CLARIFICATION,
  DEFAULT_CONFIG,
  DEFAULT_LOGGING,
  DEFAULT_PIPELINE,
  DEFAULT_REQUIRED_FIELDS,
  DEFAULT_RETRY,
  REQUIREMENT_FIELDS,
} from './defaults.js';
export { ConfigValidationError, validateConfig, assertConfigValid } from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  mergeConfig,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { CONFIG_FILE_NAME, loadConfig } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
