/**
 * Environment variable overrides for configuration.
 *
 * ARCADE_FORGE_* variables override values from arcade-forge.toml, which in
 * turn override the defaults.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { isLogLevel } from '../utils/logger.js';
import {
  AGENT_IDENTITIES,
  type AgentIdentity,
  type AgentModelConfig,
  type Config,
  type PartialConfig,
} from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    super(
      message ??
        `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`
    );
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);
  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * One supported environment variable: how to coerce it and where it lands.
 */
interface EnvMapping {
  readonly type: 'string' | 'number' | 'log-level';
  readonly description: string;
  readonly apply: (overrides: PartialConfig, value: string, envVar: string) => void;
}

function agentOverride(
  overrides: PartialConfig,
  agent: AgentIdentity,
  patch: Partial<AgentModelConfig>
): void {
  const agents = overrides.agents ?? {};
  agents[agent] = { ...agents[agent], ...patch };
  overrides.agents = agents;
}

function buildEnvMappings(): ReadonlyMap<string, EnvMapping> {
  const mappings = new Map<string, EnvMapping>([
    [
      'ARCADE_FORGE_MAX_RETRIES',
      {
        type: 'number',
        description: 'Regeneration attempts after a failed validation',
        apply: (o, v, name) => {
          o.pipeline = { ...o.pipeline, max_retries: coerceToNumber(v, name) };
        },
      },
    ],
    [
      'ARCADE_FORGE_CALL_TIMEOUT_MS',
      {
        type: 'number',
        description: 'Timeout for one generation call in milliseconds',
        apply: (o, v, name) => {
          o.pipeline = { ...o.pipeline, call_timeout_ms: coerceToNumber(v, name) };
        },
      },
    ],
    [
      'ARCADE_FORGE_OUTPUT_DIR',
      {
        type: 'string',
        description: 'Root directory for generated games',
        apply: (o, v) => {
          o.pipeline = { ...o.pipeline, output_dir: v };
        },
      },
    ],
    [
      'ARCADE_FORGE_LOG_LEVEL',
      {
        type: 'log-level',
        description: 'Minimum log level (debug, info, warn, error)',
        apply: (o, v, name) => {
          const level = v.trim().toLowerCase();
          if (!isLogLevel(level)) {
            throw new EnvCoercionError(
              name,
              v,
              'log level',
              `Cannot coerce '${name}' value '${v}' to log level. Expected one of: debug, info, warn, error`
            );
          }
          o.logging = { ...o.logging, level };
        },
      },
    ],
  ]);

  for (const agent of AGENT_IDENTITIES) {
    const prefix = `ARCADE_FORGE_${agent.toUpperCase()}`;
    mappings.set(`${prefix}_MODEL`, {
      type: 'string',
      description: `Model identifier for the ${agent} agent`,
      apply: (o, v) => {
        agentOverride(o, agent, { model: v });
      },
    });
    mappings.set(`${prefix}_TEMPERATURE`, {
      type: 'number',
      description: `Sampling temperature for the ${agent} agent`,
      apply: (o, v, name) => {
        agentOverride(o, agent, { temperature: coerceToNumber(v, name) });
      },
    });
  }

  return mappings;
}

const ENV_VAR_MAPPINGS = buildEnvMappings();

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** Environment variables that were applied. */
  appliedVars: string[];
  /** Coercion errors, populated only when `collectErrors` is set. */
  errors: EnvCoercionError[];
}

/**
 * Reads ARCADE_FORGE_* environment variables into a partial configuration.
 *
 * @param env - The environment to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 * @returns Overrides plus the names of the variables that produced them.
 * @throws EnvCoercionError on the first bad value unless `collectErrors` is set.
 *
 * @example
 * ```typescript
 * const { overrides } = readEnvOverrides({ ARCADE_FORGE_MAX_RETRIES: '5' });
 * console.log(overrides.pipeline?.max_retries); // 5
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of ENV_VAR_MAPPINGS) {
    const value = env[envVar];
    if (value === undefined || value === '') {
      continue;
    }

    try {
      mapping.apply(overrides, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges a partial configuration into a full configuration.
 *
 * @param base - The base configuration.
 * @param partial - The values to lay over it.
 * @returns A new configuration; `base` is not modified.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    agents: {
      clarifier: { ...base.agents.clarifier, ...partial.agents?.clarifier },
      planner: { ...base.agents.planner, ...partial.agents?.planner },
      executor: { ...base.agents.executor, ...partial.agents?.executor },
      validator: { ...base.agents.validator, ...partial.agents?.validator },
    },
    pipeline: { ...base.pipeline, ...partial.pipeline },
    clarification: {
      ...base.clarification,
      ...partial.clarification,
      required_fields: [
        ...(partial.clarification?.required_fields ?? base.clarification.required_fields),
      ],
    },
    retry: { ...base.retry, ...partial.retry },
    logging: { ...base.logging, ...partial.logging },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration.
 * @param env - The environment to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);
  return mergeConfig(config, overrides);
}

/**
 * Lists every supported environment variable with its type and purpose.
 *
 * @returns Documentation keyed by variable name.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of ENV_VAR_MAPPINGS) {
    docs[envVar] = { description: mapping.description, type: mapping.type };
  }
  return docs;
}
