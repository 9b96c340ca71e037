/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { BoundaryAnalysisError, zodErrorToBoundaryError } from '../api/errors.js';
import type { ConditionSweep } from '../conditions/condition-grid.js';
import type {
  AnalysisConfig,
  MetricDefinition,
  RunnerSettings,
  VariantId,
} from '../types/boundary.js';
import {
  BoundaryConfigSchema,
  EnvironmentsSchema,
  type AnalysisSection,
  type BoundaryConfig,
  type SweepSection,
} from '../types/schemas/config.js';

export type Environment = 'production' | 'development' | 'test';

export type { BoundaryConfig };

type PlainObject = Record<string, unknown>;

const CONFIG_ERROR = { code: 'ConfigError', summary: 'Configuration validation failed' } as const;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects (arrays and scalars from source replace target)
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = output[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  // Walk up until we find package.json or reach root
  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

function resolveEnvironment(environment?: Environment): Environment {
  const env = environment ?? process.env.NODE_ENV;
  return env === 'production' || env === 'test' ? env : 'development';
}

function readYaml(path: string): PlainObject {
  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(path, 'utf8'));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new BoundaryAnalysisError(
        'ConfigError',
        `Configuration file not found: ${path}. ` +
          `Please ensure config/boundary.yaml exists in the project root.`,
        { path }
      );
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new BoundaryAnalysisError('ConfigError', `Failed to load configuration: ${reason}`, { path });
  }

  if (!isPlainObject(parsed)) {
    throw new BoundaryAnalysisError('ConfigError', `Configuration root must be a mapping: ${path}`, { path });
  }
  return parsed;
}

/**
 * Load configuration from YAML file.
 *
 * The environment section (explicit, else NODE_ENV, else development) is
 * deep-merged over the base values before validation.
 */
export function loadConfig(configPath?: string, environment?: Environment): BoundaryConfig {
  // Default config path is inside the package, not the caller's cwd
  const finalPath = configPath ?? join(findPackageRoot(), 'config', 'boundary.yaml');
  const { environments, ...base } = readYaml(finalPath);

  const envSections = EnvironmentsSchema.safeParse(environments);
  if (!envSections.success) {
    throw zodErrorToBoundaryError(envSections.error, { ...CONFIG_ERROR, pathPrefix: ['environments'] });
  }

  const override = envSections.data?.[resolveEnvironment(environment)];
  return validateConfig(override ? deepMerge(base, override) : base);
}

/**
 * Validate configuration values
 *
 * @throws BoundaryAnalysisError (ConfigError) listing every `field.path message`
 */
export function validateConfig(config: unknown): BoundaryConfig {
  const parseResult = BoundaryConfigSchema.safeParse(config);
  if (!parseResult.success) {
    throw zodErrorToBoundaryError(parseResult.error, CONFIG_ERROR);
  }
  return parseResult.data;
}

/**
 * Global configuration instance
 */
let globalConfig: BoundaryConfig | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(configPath?: string, environment?: Environment): BoundaryConfig {
  globalConfig = loadConfig(configPath, environment);
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): BoundaryConfig {
  if (!globalConfig) {
    globalConfig = initializeConfig();
  }
  return globalConfig;
}

/**
 * Reset global configuration (for testing)
 */
export function resetConfig(): void {
  globalConfig = null;
}

/**
 * Convert a YAML analysis section (snake_case) to AnalysisConfig (camelCase)
 */
export function toAnalysisConfig(section: AnalysisSection): AnalysisConfig {
  const policy = section.significance_policy;

  return {
    outlierK: section.outlier_k,
    confidence: section.confidence,
    significancePolicy:
      policy.kind === 'relaxed_ratio' ? { kind: 'relaxed_ratio', ratio: policy.ratio } : { kind: 'non_overlap' },
    crossoverThresholdPct: section.crossover_threshold_pct,
    minValidSamples: section.min_valid_samples,
    normallyInferior: section.normally_inferior,
  };
}

/**
 * Analysis configuration for a named profile; without a name the base
 * `analysis` section applies.
 *
 * @throws BoundaryAnalysisError (ConfigError) for an unknown profile
 */
export function resolveProfile(config: BoundaryConfig, name?: string): AnalysisConfig {
  if (name === undefined) {
    return toAnalysisConfig(config.analysis);
  }

  const profile = Object.prototype.hasOwnProperty.call(config.profiles, name) ? config.profiles[name] : undefined;
  if (!profile) {
    throw new BoundaryAnalysisError('ConfigError', `Unknown analysis profile '${name}'`, {
      known: Object.keys(config.profiles),
    });
  }

  return toAnalysisConfig({ ...config.analysis, ...profile });
}

export function toMetricDefinitions(config: BoundaryConfig): MetricDefinition[] {
  return config.metrics.map((metric) => ({
    name: metric.name,
    direction: metric.direction,
    ...(metric.unit !== undefined && { unit: metric.unit }),
  }));
}

export function toRunnerSettings(config: BoundaryConfig): RunnerSettings {
  return {
    trialsPerCondition: config.runner.trials_per_condition,
    settleDelayMs: config.runner.settle_delay_ms,
    trialIntervalMs: config.runner.trial_interval_ms,
  };
}

export function toVariantLabels(config: BoundaryConfig): Record<VariantId, string> {
  return {
    v1: config.variants.v1.label,
    v2: config.variants.v2.label,
  };
}

function toConditionSweep(sweep: SweepSection): ConditionSweep {
  switch (sweep.kind) {
    case 'delay':
      return {
        kind: 'delay',
        delaysMs: sweep.delays_ms,
        lossPct: sweep.loss_pct,
        ...(sweep.bandwidth_mbps !== undefined && { bandwidthMbps: sweep.bandwidth_mbps }),
      };
    case 'loss':
      return {
        kind: 'loss',
        delayMs: sweep.delay_ms,
        lossesPct: sweep.losses_pct,
        ...(sweep.bandwidth_mbps !== undefined && { bandwidthMbps: sweep.bandwidth_mbps }),
      };
    case 'bandwidth':
      return {
        kind: 'bandwidth',
        delayMs: sweep.delay_ms,
        lossPct: sweep.loss_pct,
        bandwidthsMbps: sweep.bandwidths_mbps,
      };
  }
}

/**
 * Convert YAML sweeps (snake_case) to ConditionSweep values
 */
export function toConditionSweeps(config: BoundaryConfig): ConditionSweep[] {
  return config.sweeps.map(toConditionSweep);
}
