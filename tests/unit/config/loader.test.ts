import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as yaml from 'js-yaml';
import {
  getConfig,
  initializeConfig,
  loadConfig,
  resetConfig,
  resolveProfile,
  toAnalysisConfig,
  toConditionSweeps,
  toMetricDefinitions,
  toRunnerSettings,
  toVariantLabels,
  validateConfig,
} from '../../../src/config/loader.js';
import { expandConditionGrid } from '../../../src/conditions/condition-grid.js';
import { conditionId } from '../../../src/conditions/condition-key.js';
import { captureError } from '../../helpers/capture.js';

function baseConfig(): Record<string, unknown> {
  return {
    analysis: {
      outlier_k: 2,
      confidence: 0.95,
      significance_policy: { kind: 'non_overlap' },
      crossover_threshold_pct: 5,
      min_valid_samples: 1,
      normally_inferior: 'v2',
    },
    metrics: [
      { name: 'throughput', direction: 'higher_is_better', unit: 'req/s' },
      { name: 'latency', direction: 'lower_is_better' },
    ],
    variants: { v1: { label: 'HTTP/2' }, v2: { label: 'HTTP/3' } },
    runner: { trials_per_condition: 3, settle_delay_ms: 100, trial_interval_ms: 50 },
    profiles: {
      relaxed: { confidence: 0.9, significance_policy: { kind: 'relaxed_ratio', ratio: 0.5 } },
    },
    sweeps: [{ kind: 'delay', delays_ms: { start: 0, end: 20, step: 10 }, loss_pct: 1 }],
  };
}

describe('Config Loader', () => {
  let testConfigDir: string;
  let testConfigPath: string;
  const savedNodeEnv = process.env.NODE_ENV;

  beforeEach(() => {
    testConfigDir = mkdtempSync(join(tmpdir(), 'boundary-config-'));
    testConfigPath = join(testConfigDir, 'boundary.yaml');
    resetConfig();
  });

  afterEach(() => {
    rmSync(testConfigDir, { recursive: true, force: true });
    if (savedNodeEnv === undefined) {
      delete process.env.NODE_ENV;
    } else {
      process.env.NODE_ENV = savedNodeEnv;
    }
    resetConfig();
  });

  function writeConfig(content: Record<string, unknown>): void {
    writeFileSync(testConfigPath, yaml.dump(content));
  }

  describe('bundled config/boundary.yaml', () => {
    it('should load and validate the production settings', () => {
      const config = loadConfig(undefined, 'production');

      expect(config.analysis.outlier_k).toBe(3);
      expect(config.analysis.significance_policy).toEqual({ kind: 'non_overlap' });
      expect(config.runner).toEqual({ trials_per_condition: 3, settle_delay_ms: 10000, trial_interval_ms: 5000 });
      expect(Object.keys(config.profiles)).toEqual(['strict', 'relaxed', 'exploratory']);
      expect(toVariantLabels(config)).toEqual({ v1: 'HTTP/2', v2: 'HTTP/3' });
    });

    it('should apply the test environment overrides', () => {
      const config = loadConfig(undefined, 'test');

      expect(config.runner).toEqual({ trials_per_condition: 2, settle_delay_ms: 0, trial_interval_ms: 0 });
      expect(config.analysis.outlier_k).toBe(3);
    });

    it('should expand the bundled sweeps into a deduplicated grid', () => {
      const grid = expandConditionGrid(toConditionSweeps(loadConfig(undefined, 'production')));

      expect(grid).toHaveLength(326);
      expect(conditionId(grid[0])).toBe('0ms/0%/0Mbps');
      expect(conditionId(grid[grid.length - 1])).toBe('300ms/5%/0Mbps');
    });

    it('should resolve the named profiles', () => {
      const config = loadConfig(undefined, 'production');

      expect(resolveProfile(config, 'strict')).toMatchObject({
        confidence: 0.95,
        significancePolicy: { kind: 'non_overlap' },
      });
      expect(resolveProfile(config, 'relaxed')).toMatchObject({
        confidence: 0.9,
        significancePolicy: { kind: 'relaxed_ratio', ratio: 0.5 },
      });
      expect(resolveProfile(config, 'exploratory')).toEqual({
        outlierK: 3,
        confidence: 0.8,
        significancePolicy: { kind: 'relaxed_ratio', ratio: 0.3 },
        crossoverThresholdPct: 10,
        minValidSamples: 1,
        normallyInferior: 'v2',
      });
    });
  });

  describe('loadConfig', () => {
    it('should convert sections to camelCase shapes', () => {
      writeConfig(baseConfig());
      const config = loadConfig(testConfigPath, 'production');

      expect(toAnalysisConfig(config.analysis)).toEqual({
        outlierK: 2,
        confidence: 0.95,
        significancePolicy: { kind: 'non_overlap' },
        crossoverThresholdPct: 5,
        minValidSamples: 1,
        normallyInferior: 'v2',
      });
      expect(toRunnerSettings(config)).toEqual({ trialsPerCondition: 3, settleDelayMs: 100, trialIntervalMs: 50 });
      expect(toMetricDefinitions(config)).toEqual([
        { name: 'throughput', direction: 'higher_is_better', unit: 'req/s' },
        { name: 'latency', direction: 'lower_is_better' },
      ]);
      expect(toConditionSweeps(config)).toEqual([
        { kind: 'delay', delaysMs: { start: 0, end: 20, step: 10 }, lossPct: 1 },
      ]);
    });

    it('should deep-merge the selected environment', () => {
      writeConfig({
        ...baseConfig(),
        environments: {
          development: {
            analysis: { significance_policy: { kind: 'relaxed_ratio', ratio: 0.4 } },
            runner: { trials_per_condition: 5 },
          },
        },
      });

      const config = loadConfig(testConfigPath, 'development');

      expect(config.analysis.significance_policy).toEqual({ kind: 'relaxed_ratio', ratio: 0.4 });
      expect(config.analysis.outlier_k).toBe(2);
      expect(config.runner).toEqual({ trials_per_condition: 5, settle_delay_ms: 100, trial_interval_ms: 50 });
    });

    it('should pick the environment from NODE_ENV', () => {
      writeConfig({ ...baseConfig(), environments: { test: { runner: { trials_per_condition: 4 } } } });
      process.env.NODE_ENV = 'test';

      expect(loadConfig(testConfigPath).runner.trials_per_condition).toBe(4);
    });

    it('should default profiles and sweeps to empty', () => {
      const { profiles: _profiles, sweeps: _sweeps, ...rest } = baseConfig();
      writeConfig(rest);

      const config = loadConfig(testConfigPath, 'production');

      expect(config.profiles).toEqual({});
      expect(config.sweeps).toEqual([]);
    });

    it('should report a missing file', () => {
      const error = captureError(() => loadConfig(join(testConfigDir, 'missing.yaml')));

      expect(error).toMatchObject({ code: 'ConfigError' });
      expect(error).toBeInstanceOf(Error);
      expect(String(error)).toContain('Configuration file not found');
    });

    it('should reject a non-mapping document', () => {
      writeFileSync(testConfigPath, '- just\n- a list\n');

      expect(() => loadConfig(testConfigPath)).toThrow('Configuration root must be a mapping');
    });
  });

  describe('validateConfig', () => {
    it('should list every invalid field with its path', () => {
      const config = baseConfig();
      config.analysis = {
        outlier_k: -1,
        confidence: 1.5,
        significance_policy: { kind: 'relaxed_ratio', ratio: 1.2 },
        crossover_threshold_pct: 5,
        min_valid_samples: 1,
        normally_inferior: 'v2',
      };

      const error = captureError(() => validateConfig(config));

      expect(error).toMatchObject({ code: 'ConfigError' });
      expect(String(error)).toContain('Configuration validation failed:');
      expect(String(error)).toContain('analysis.outlier_k Outlier k must be positive');
      expect(String(error)).toContain('analysis.confidence must be < 1');
      expect(String(error)).toContain('analysis.significance_policy.ratio must be < 1');
    });

    it('should reject duplicate metric names', () => {
      const config = baseConfig();
      config.metrics = [
        { name: 'throughput', direction: 'higher_is_better' },
        { name: 'throughput', direction: 'lower_is_better' },
      ];

      expect(() => validateConfig(config)).toThrow('metrics Metric names must be unique');
    });

    it('should reject a reversed sweep range', () => {
      const config = baseConfig();
      config.sweeps = [{ kind: 'delay', delays_ms: { start: 20, end: 0, step: 5 }, loss_pct: 0 }];

      expect(() => validateConfig(config)).toThrow('Configuration validation failed');
    });

    it('should reject an environment section that is not a mapping', () => {
      writeConfig({ ...baseConfig(), environments: { test: 'fast' } });

      expect(() => loadConfig(testConfigPath, 'test')).toThrow('environments.test');
    });
  });

  describe('resolveProfile', () => {
    it('should return the base analysis without a name', () => {
      writeConfig(baseConfig());
      const config = loadConfig(testConfigPath, 'production');

      expect(resolveProfile(config)).toEqual(toAnalysisConfig(config.analysis));
    });

    it('should overlay the profile on the base analysis', () => {
      writeConfig(baseConfig());
      const profile = resolveProfile(loadConfig(testConfigPath, 'production'), 'relaxed');

      expect(profile).toEqual({
        outlierK: 2,
        confidence: 0.9,
        significancePolicy: { kind: 'relaxed_ratio', ratio: 0.5 },
        crossoverThresholdPct: 5,
        minValidSamples: 1,
        normallyInferior: 'v2',
      });
    });

    it('should reject an unknown profile', () => {
      writeConfig(baseConfig());
      const config = loadConfig(testConfigPath, 'production');

      expect(captureError(() => resolveProfile(config, 'paranoid'))).toMatchObject({
        code: 'ConfigError',
        message: "Unknown analysis profile 'paranoid'",
        details: { known: ['relaxed'] },
      });
      expect(captureError(() => resolveProfile(config, 'toString'))).toMatchObject({ code: 'ConfigError' });
    });
  });

  describe('global configuration', () => {
    it('should cache the initialized configuration until reset', () => {
      writeConfig(baseConfig());
      const first = initializeConfig(testConfigPath, 'production');

      expect(getConfig()).toBe(first);

      resetConfig();
      process.env.NODE_ENV = 'production';
      expect(getConfig()).not.toBe(first);
      expect(getConfig().analysis.outlier_k).toBe(3);
    });
  });
});
