/**
 * TOML configuration parser for arcade-forge.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { isLogLevel } from '../utils/logger.js';
import {
  DEFAULT_AGENT_MODELS,
  DEFAULT_CLARIFICATION,
  DEFAULT_LOGGING,
  DEFAULT_PIPELINE,
  DEFAULT_RETRY,
} from './defaults.js';
import {
  AGENT_IDENTITIES,
  type AgentModelConfig,
  type AgentModels,
  type ClarificationConfig,
  type Config,
  type LoggingConfig,
  type PipelineConfig,
  type RetrySettings,
} from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

/**
 * Checks whether a value is a plain key-value table.
 *
 * @param value - Value to check.
 * @returns True for non-null, non-array objects.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeType(value: unknown): string {
  if (Array.isArray(value)) {
    return 'array';
  }
  return value === null ? 'null' : typeof value;
}

function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${describeType(value)}`
    );
  }
  return value;
}

function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${describeType(value)}`
    );
  }
  return value;
}

function validateStringArray(value: unknown, fieldPath: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected array of strings, got ${describeType(value)}`
    );
  }
  return value.map((item, index) => validateString(item, `${fieldPath}[${String(index)}]`));
}

/**
 * Reads an optional sub-table, rejecting non-table values.
 */
function validateSection(value: unknown, fieldPath: string): Record<string, unknown> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected table, got ${describeType(value)}`
    );
  }
  return value;
}

function parseAgentModel(
  raw: Record<string, unknown> | undefined,
  defaults: AgentModelConfig,
  section: string
): AgentModelConfig {
  const result: AgentModelConfig = { ...defaults };
  if (raw === undefined) {
    return result;
  }

  if ('model' in raw) {
    result.model = validateString(raw.model, `${section}.model`);
  }
  if ('temperature' in raw) {
    result.temperature = validateNumber(raw.temperature, `${section}.temperature`);
  }
  if ('max_output_tokens' in raw) {
    result.max_output_tokens = validateNumber(raw.max_output_tokens, `${section}.max_output_tokens`);
  }
  if ('top_p' in raw) {
    result.top_p = validateNumber(raw.top_p, `${section}.top_p`);
  }
  if ('top_k' in raw) {
    result.top_k = validateNumber(raw.top_k, `${section}.top_k`);
  }

  return result;
}

function parseAgents(raw: Record<string, unknown> | undefined): AgentModels {
  const result: AgentModels = {
    clarifier: { ...DEFAULT_AGENT_MODELS.clarifier },
    planner: { ...DEFAULT_AGENT_MODELS.planner },
    executor: { ...DEFAULT_AGENT_MODELS.executor },
    validator: { ...DEFAULT_AGENT_MODELS.validator },
  };
  if (raw === undefined) {
    return result;
  }

  for (const agent of AGENT_IDENTITIES) {
    const section = `agents.${agent}`;
    result[agent] = parseAgentModel(
      validateSection(raw[agent], section),
      DEFAULT_AGENT_MODELS[agent],
      section
    );
  }

  return result;
}

function parsePipeline(raw: Record<string, unknown> | undefined): PipelineConfig {
  const result: PipelineConfig = { ...DEFAULT_PIPELINE };
  if (raw === undefined) {
    return result;
  }

  if ('max_retries' in raw) {
    result.max_retries = validateNumber(raw.max_retries, 'pipeline.max_retries');
  }
  if ('call_timeout_ms' in raw) {
    result.call_timeout_ms = validateNumber(raw.call_timeout_ms, 'pipeline.call_timeout_ms');
  }
  if ('output_dir' in raw) {
    result.output_dir = validateString(raw.output_dir, 'pipeline.output_dir');
  }
  if ('min_artifact_bytes' in raw) {
    result.min_artifact_bytes = validateNumber(
      raw.min_artifact_bytes,
      'pipeline.min_artifact_bytes'
    );
  }

  return result;
}

function parseClarification(raw: Record<string, unknown> | undefined): ClarificationConfig {
  const result: ClarificationConfig = {
    ...DEFAULT_CLARIFICATION,
    required_fields: [...DEFAULT_CLARIFICATION.required_fields],
  };
  if (raw === undefined) {
    return result;
  }

  if ('max_rounds' in raw) {
    result.max_rounds = validateNumber(raw.max_rounds, 'clarification.max_rounds');
  }
  if ('completeness_threshold' in raw) {
    result.completeness_threshold = validateNumber(
      raw.completeness_threshold,
      'clarification.completeness_threshold'
    );
  }
  if ('required_fields' in raw) {
    result.required_fields = validateStringArray(
      raw.required_fields,
      'clarification.required_fields'
    );
  }

  return result;
}

function parseRetry(raw: Record<string, unknown> | undefined): RetrySettings {
  const result: RetrySettings = { ...DEFAULT_RETRY };
  if (raw === undefined) {
    return result;
  }

  if ('max_attempts' in raw) {
    result.max_attempts = validateNumber(raw.max_attempts, 'retry.max_attempts');
  }
  if ('base_delay_ms' in raw) {
    result.base_delay_ms = validateNumber(raw.base_delay_ms, 'retry.base_delay_ms');
  }
  if ('max_delay_ms' in raw) {
    result.max_delay_ms = validateNumber(raw.max_delay_ms, 'retry.max_delay_ms');
  }
  if ('timeout_retry_delay_ms' in raw) {
    result.timeout_retry_delay_ms = validateNumber(
      raw.timeout_retry_delay_ms,
      'retry.timeout_retry_delay_ms'
    );
  }
  if ('jitter_factor' in raw) {
    result.jitter_factor = validateNumber(raw.jitter_factor, 'retry.jitter_factor');
  }

  return result;
}

function parseLogging(raw: Record<string, unknown> | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw === undefined) {
    return result;
  }

  if ('level' in raw) {
    const level = validateString(raw.level, 'logging.level');
    if (!isLogLevel(level)) {
      throw new ConfigParseError(
        `Invalid value for 'logging.level': expected 'debug', 'info', 'warn', or 'error', got '${level}'`
      );
    }
    result.level = level;
  }

  return result;
}

/**
 * Parses a TOML string into a validated Config object.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Configuration with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or mistyped fields.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [agents.executor]
 * model = "claude-opus-4-1"
 *
 * [pipeline]
 * max_retries = 5
 * `);
 * console.log(config.agents.executor.model); // "claude-opus-4-1"
 * console.log(config.pipeline.max_retries); // 5
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return {
    agents: parseAgents(validateSection(parsed.agents, 'agents')),
    pipeline: parsePipeline(validateSection(parsed.pipeline, 'pipeline')),
    clarification: parseClarification(validateSection(parsed.clarification, 'clarification')),
    retry: parseRetry(validateSection(parsed.retry, 'retry')),
    logging: parseLogging(validateSection(parsed.logging, 'logging')),
  };
}

/**
 * Returns a fresh copy of the default configuration.
 *
 * @returns Default configuration object that callers may mutate.
 */
export function getDefaultConfig(): Config {
  return parseConfig('');
}
