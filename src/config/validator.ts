/**
 * Semantic validation for configuration values.
 *
 * Checks what the parser cannot: numeric ranges, integer counts, and that
 * clarification settings agree with the known requirement fields.
 *
 * @packageDocumentation
 */

import { REQUIREMENT_FIELDS } from './defaults.js';
import { AGENT_IDENTITIES, type AgentModelConfig, type Config } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

function validateRange(
  value: number,
  fieldPath: string,
  min: number,
  max: number,
  errors: ValidationError[]
): void {
  if (Number.isNaN(value) || value < min || value > max) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must be between ${String(min)} and ${String(max)}, got ${String(value)}`,
    });
  }
}

function validatePositiveInteger(
  value: number,
  fieldPath: string,
  errors: ValidationError[]
): void {
  if (!Number.isInteger(value) || value < 1) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must be a positive integer, got ${String(value)}`,
    });
  }
}

function validateNonNegativeInteger(
  value: number,
  fieldPath: string,
  errors: ValidationError[]
): void {
  if (!Number.isInteger(value) || value < 0) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must be a non-negative integer, got ${String(value)}`,
    });
  }
}

function validateAgentModel(
  model: AgentModelConfig,
  section: string,
  errors: ValidationError[]
): void {
  if (model.model.trim() === '') {
    errors.push({
      field: `${section}.model`,
      value: model.model,
      message: `'${section}.model' cannot be empty`,
    });
  }
  validateRange(model.temperature, `${section}.temperature`, 0, 2, errors);
  validateRange(model.top_p, `${section}.top_p`, 0, 1, errors);
  validatePositiveInteger(model.max_output_tokens, `${section}.max_output_tokens`, errors);
  validatePositiveInteger(model.top_k, `${section}.top_k`, errors);
}

function validateClarification(config: Config, errors: ValidationError[]): void {
  const { clarification } = config;
  const known: readonly string[] = REQUIREMENT_FIELDS;

  validatePositiveInteger(clarification.max_rounds, 'clarification.max_rounds', errors);
  validateNonNegativeInteger(
    clarification.completeness_threshold,
    'clarification.completeness_threshold',
    errors
  );

  clarification.required_fields.forEach((field, index) => {
    if (!known.includes(field)) {
      errors.push({
        field: `clarification.required_fields[${String(index)}]`,
        value: field,
        message: `Unknown requirement field '${field}'. Known fields: ${known.join(', ')}`,
      });
    }
  });

  if (clarification.completeness_threshold > clarification.required_fields.length) {
    errors.push({
      field: 'clarification.completeness_threshold',
      value: clarification.completeness_threshold,
      message: `'clarification.completeness_threshold' (${String(clarification.completeness_threshold)}) exceeds the number of required fields (${String(clarification.required_fields.length)})`,
    });
  }
}

/**
 * Validates configuration semantically.
 *
 * @param config - The parsed configuration to validate.
 * @returns Validation result with every error found.
 *
 * @example
 * ```typescript
 * const result = validateConfig(parseConfig(tomlContent));
 * if (!result.valid) {
 *   for (const error of result.errors) {
 *     console.error(`${error.field}: ${error.message}`);
 *   }
 * }
 * ```
 */
export function validateConfig(config: Config): ValidationResult {
  const errors: ValidationError[] = [];

  for (const agent of AGENT_IDENTITIES) {
    validateAgentModel(config.agents[agent], `agents.${agent}`, errors);
  }

  validateNonNegativeInteger(config.pipeline.max_retries, 'pipeline.max_retries', errors);
  validatePositiveInteger(config.pipeline.call_timeout_ms, 'pipeline.call_timeout_ms', errors);
  validateNonNegativeInteger(
    config.pipeline.min_artifact_bytes,
    'pipeline.min_artifact_bytes',
    errors
  );
  if (config.pipeline.output_dir.trim() === '') {
    errors.push({
      field: 'pipeline.output_dir',
      value: config.pipeline.output_dir,
      message: `'pipeline.output_dir' cannot be empty`,
    });
  }

  validateClarification(config, errors);

  validatePositiveInteger(config.retry.max_attempts, 'retry.max_attempts', errors);
  validateNonNegativeInteger(config.retry.base_delay_ms, 'retry.base_delay_ms', errors);
  validateNonNegativeInteger(config.retry.max_delay_ms, 'retry.max_delay_ms', errors);
  validateNonNegativeInteger(
    config.retry.timeout_retry_delay_ms,
    'retry.timeout_retry_delay_ms',
    errors
  );
  validateRange(config.retry.jitter_factor, 'retry.jitter_factor', 0, 1, errors);
  if (config.retry.max_delay_ms < config.retry.base_delay_ms) {
    errors.push({
      field: 'retry.max_delay_ms',
      value: config.retry.max_delay_ms,
      message: `'retry.max_delay_ms' must be at least 'retry.base_delay_ms' (${String(config.retry.base_delay_ms)})`,
    });
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @param config - The parsed configuration to validate.
 * @throws ConfigValidationError listing every failure.
 */
export function assertConfigValid(config: Config): void {
  const result = validateConfig(config);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
