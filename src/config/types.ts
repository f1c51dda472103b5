/**
 * Configuration types for arcade-forge.toml parsing.
 *
 * @packageDocumentation
 */

import type { LogLevel } from '../utils/logger.js';

/**
 * Identity of a phase agent. Each agent gets its own model settings.
 */
export type AgentIdentity = 'clarifier' | 'planner' | 'executor' | 'validator';

/**
 * Array of all agent identities, in pipeline order.
 */
export const AGENT_IDENTITIES: readonly AgentIdentity[] = [
  'clarifier',
  'planner',
  'executor',
  'validator',
] as const;

/**
 * Generation settings for a single agent.
 */
export interface AgentModelConfig {
  /** Model identifier passed to the transport. */
  model: string;
  /** Sampling temperature. */
  temperature: number;
  /** Ceiling on generated tokens. */
  max_output_tokens: number;
  /** Nucleus sampling probability mass. */
  top_p: number;
  /** Top-k sampling cutoff. */
  top_k: number;
}

/**
 * Per-agent generation settings.
 */
export type AgentModels = Record<AgentIdentity, AgentModelConfig>;

/**
 * Process-wide pipeline constants.
 */
export interface PipelineConfig {
  /** Regeneration attempts allowed after the first failed validation. */
  max_retries: number;
  /** Timeout for a single generation call in milliseconds. */
  call_timeout_ms: number;
  /** Root directory for generated games and failed attempts. */
  output_dir: string;
  /** Artifacts smaller than this many bytes are reported as suspiciously short. */
  min_artifact_bytes: number;
}

/**
 * Clarification settings.
 */
export interface ClarificationConfig {
  /** Question rounds the presentation layer runs before delegating the rest. */
  max_rounds: number;
  /** How many of `required_fields` must be filled to stop asking. */
  completeness_threshold: number;
  /** Requirement fields that count toward the threshold. */
  required_fields: string[];
}

/**
 * Transport-level retry policy for generation calls.
 */
export interface RetrySettings {
  /** Total attempts for rate-limited or transient failures. */
  max_attempts: number;
  /** Base delay for exponential backoff. */
  base_delay_ms: number;
  /** Upper bound for any single backoff delay. */
  max_delay_ms: number;
  /** Delay before the single retry granted to a timed-out call. */
  timeout_retry_delay_ms: number;
  /** Fraction (0-1) by which backoff delays are randomly spread. */
  jitter_factor: number;
}

/**
 * Logging settings.
 */
export interface LoggingConfig {
  /** Minimum level written to stderr. */
  level: LogLevel;
}

/**
 * Complete configuration object parsed from arcade-forge.toml.
 */
export interface Config {
  /** Per-agent model settings. */
  agents: AgentModels;
  /** Pipeline constants. */
  pipeline: PipelineConfig;
  /** Clarification settings. */
  clarification: ClarificationConfig;
  /** Generation retry policy. */
  retry: RetrySettings;
  /** Logging settings. */
  logging: LoggingConfig;
}

/**
 * Partial configuration for merging with defaults.
 */
export interface PartialConfig {
  agents?: Partial<Record<AgentIdentity, Partial<AgentModelConfig>>>;
  pipeline?: Partial<PipelineConfig>;
  clarification?: Partial<ClarificationConfig>;
  retry?: Partial<RetrySettings>;
  logging?: Partial<LoggingConfig>;
}
