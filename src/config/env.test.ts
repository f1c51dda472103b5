import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  getEnvVarDocumentation,
  mergeConfig,
} from './env.js';
import { DEFAULT_CONFIG, parseConfig } from './index.js';

describe('Environment Variable Overrides', () => {
  describe('readEnvOverrides', () => {
    it('should read pipeline variables with number coercion', () => {
      const result = readEnvOverrides({
        ARCADE_FORGE_MAX_RETRIES: '5',
        ARCADE_FORGE_CALL_TIMEOUT_MS: ' 60000 ',
        ARCADE_FORGE_OUTPUT_DIR: '/tmp/games',
      });

      expect(result.overrides.pipeline).toEqual({
        max_retries: 5,
        call_timeout_ms: 60000,
        output_dir: '/tmp/games',
      });
      expect(result.appliedVars).toEqual([
        'ARCADE_FORGE_MAX_RETRIES',
        'ARCADE_FORGE_CALL_TIMEOUT_MS',
        'ARCADE_FORGE_OUTPUT_DIR',
      ]);
    });

    it('should read per-agent model and temperature', () => {
      const result = readEnvOverrides({
        ARCADE_FORGE_EXECUTOR_MODEL: 'executor-model',
        ARCADE_FORGE_EXECUTOR_TEMPERATURE: '0.7',
        ARCADE_FORGE_CLARIFIER_MODEL: 'clarifier-model',
      });

      expect(result.overrides.agents?.executor).toEqual({
        model: 'executor-model',
        temperature: 0.7,
      });
      expect(result.overrides.agents?.clarifier).toEqual({ model: 'clarifier-model' });
      expect(result.overrides.agents?.planner).toBeUndefined();
    });

    it('should normalise the log level', () => {
      const result = readEnvOverrides({ ARCADE_FORGE_LOG_LEVEL: 'DEBUG' });
      expect(result.overrides.logging?.level).toBe('debug');
    });

    it('should ignore unset and empty variables', () => {
      const result = readEnvOverrides({
        ARCADE_FORGE_MAX_RETRIES: '',
        ARCADE_FORGE_OUTPUT_DIR: undefined,
        UNRELATED: 'x',
      });

      expect(result.overrides).toEqual({});
      expect(result.appliedVars).toEqual([]);
    });

    it('should throw EnvCoercionError for a non-numeric number', () => {
      expect(() => readEnvOverrides({ ARCADE_FORGE_MAX_RETRIES: 'many' })).toThrow(
        EnvCoercionError
      );
      expect(() => readEnvOverrides({ ARCADE_FORGE_MAX_RETRIES: 'many' })).toThrow(
        "Cannot coerce environment variable 'ARCADE_FORGE_MAX_RETRIES' value 'many' to number"
      );
    });

    it('should report whitespace-only numbers as empty', () => {
      expect(() => readEnvOverrides({ ARCADE_FORGE_CALL_TIMEOUT_MS: '   ' })).toThrow(
        "Empty value for 'ARCADE_FORGE_CALL_TIMEOUT_MS'"
      );
    });

    it('should throw for an unknown log level', () => {
      try {
        readEnvOverrides({ ARCADE_FORGE_LOG_LEVEL: 'loud' });
        expect.unreachable('readEnvOverrides should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(EnvCoercionError);
        if (error instanceof EnvCoercionError) {
          expect(error.envVar).toBe('ARCADE_FORGE_LOG_LEVEL');
          expect(error.rawValue).toBe('loud');
          expect(error.expectedType).toBe('log level');
        }
      }
    });

    it('should collect errors instead of throwing when asked', () => {
      const result = readEnvOverrides(
        {
          ARCADE_FORGE_MAX_RETRIES: 'many',
          ARCADE_FORGE_PLANNER_TEMPERATURE: 'hot',
          ARCADE_FORGE_OUTPUT_DIR: 'out',
        },
        { collectErrors: true }
      );

      expect(result.errors.map((e) => e.envVar)).toEqual([
        'ARCADE_FORGE_MAX_RETRIES',
        'ARCADE_FORGE_PLANNER_TEMPERATURE',
      ]);
      expect(result.appliedVars).toEqual(['ARCADE_FORGE_OUTPUT_DIR']);
      expect(result.overrides.pipeline?.output_dir).toBe('out');
    });
  });

  describe('applyEnvOverrides', () => {
    it('should let env values win over file values', () => {
      const fileConfig = parseConfig(`
[pipeline]
max_retries = 1
output_dir = "from-file"
`);
      const config = applyEnvOverrides(fileConfig, { ARCADE_FORGE_MAX_RETRIES: '4' });

      expect(config.pipeline.max_retries).toBe(4);
      expect(config.pipeline.output_dir).toBe('from-file');
    });

    it('should keep untouched agent fields', () => {
      const config = applyEnvOverrides(DEFAULT_CONFIG, {
        ARCADE_FORGE_VALIDATOR_TEMPERATURE: '0',
      });

      expect(config.agents.validator).toEqual({
        ...DEFAULT_CONFIG.agents.validator,
        temperature: 0,
      });
    });

    it('should not modify the base configuration', () => {
      applyEnvOverrides(DEFAULT_CONFIG, { ARCADE_FORGE_PLANNER_MODEL: 'other' });
      expect(DEFAULT_CONFIG.agents.planner.model).toBe('claude-sonnet-4-5');
    });
  });

  describe('mergeConfig', () => {
    it('should copy required_fields rather than share them', () => {
      const merged = mergeConfig(DEFAULT_CONFIG, {});
      merged.clarification.required_fields.push('visual_style');
      expect(DEFAULT_CONFIG.clarification.required_fields).toHaveLength(4);
    });
  });

  describe('getEnvVarDocumentation', () => {
    it('should document every supported variable', () => {
      const docs = getEnvVarDocumentation();

      expect(Object.keys(docs)).toHaveLength(12);
      expect(docs.ARCADE_FORGE_LOG_LEVEL?.type).toBe('log-level');
      expect(docs.ARCADE_FORGE_EXECUTOR_TEMPERATURE).toEqual({
        type: 'number',
        description: 'Sampling temperature for the executor agent',
      });
    });
  });

  describe('property-based tests', () => {
    it('should coerce any integer string for max retries', () => {
      fc.assert(
        fc.property(fc.integer({ min: 0, max: 10_000 }), (n) => {
          const { overrides } = readEnvOverrides({ ARCADE_FORGE_MAX_RETRIES: String(n) });
          return overrides.pipeline?.max_retries === n;
        })
      );
    });
  });
});
