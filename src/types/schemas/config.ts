/**
 * Boundary Analysis Configuration Schemas
 *
 * Zod schemas for validating config/boundary.yaml. Keys are snake_case as
 * written in YAML; the loader converts them to the camelCase shapes used in
 * code.
 *
 * @module schemas/config
 */

import { z } from 'zod';

const VariantIdSchema = z.enum(['v1', 'v2']);

/**
 * Significance policy (tagged by `kind`)
 */
export const SignificancePolicySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('non_overlap') }),
  z.object({
    kind: z.literal('relaxed_ratio'),
    ratio: z.number().gt(0, 'must be > 0').lt(1, 'must be < 1'),
  }),
]);

/**
 * Analysis Configuration
 */
export const AnalysisSectionSchema = z.object({
  outlier_k: z.number().positive('Outlier k must be positive'),
  confidence: z.number().gt(0, 'must be > 0').lt(1, 'must be < 1'),
  significance_policy: SignificancePolicySchema,
  crossover_threshold_pct: z.number().min(0, 'must be >= 0'),
  min_valid_samples: z.number().int().min(1, 'must be >= 1'),
  normally_inferior: VariantIdSchema,
});

/**
 * Metric Definition
 */
export const MetricSchema = z.object({
  name: z.string().min(1, 'Metric name cannot be empty'),
  direction: z.enum(['higher_is_better', 'lower_is_better']),
  unit: z.string().optional(),
});

/**
 * Variant Labels
 */
export const VariantsSectionSchema = z.object({
  v1: z.object({ label: z.string().min(1, 'Label cannot be empty') }),
  v2: z.object({ label: z.string().min(1, 'Label cannot be empty') }),
});

/**
 * Sweep Runner Configuration
 */
export const RunnerSectionSchema = z.object({
  trials_per_condition: z.number().int().min(1, 'must be >= 1'),
  settle_delay_ms: z.number().int().min(0, 'must be >= 0'),
  trial_interval_ms: z.number().int().min(0, 'must be >= 0'),
});

const NumericRangeSchema = z
  .object({
    start: z.number(),
    end: z.number(),
    step: z.number().positive('Step must be positive'),
  })
  .refine((data) => data.end >= data.start, {
    message: 'must be >= start',
    path: ['end'],
  });

const RangeOrListSchema = z.union([NumericRangeSchema, z.array(z.number()).min(1, 'must not be empty')]);

/**
 * Condition Sweep (one varying dimension)
 */
export const SweepSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('delay'),
    delays_ms: RangeOrListSchema,
    loss_pct: z.number().min(0),
    bandwidth_mbps: z.number().min(0).optional(),
  }),
  z.object({
    kind: z.literal('loss'),
    delay_ms: z.number().min(0),
    losses_pct: RangeOrListSchema,
    bandwidth_mbps: z.number().min(0).optional(),
  }),
  z.object({
    kind: z.literal('bandwidth'),
    delay_ms: z.number().min(0),
    loss_pct: z.number().min(0),
    bandwidths_mbps: RangeOrListSchema,
  }),
]);

/**
 * Boundary Configuration Schema
 *
 * Defines the complete structure for boundary.yaml (after environment
 * overrides have been merged)
 */
export const BoundaryConfigSchema = z
  .object({
    analysis: AnalysisSectionSchema,
    metrics: z.array(MetricSchema).min(1, 'At least one metric is required'),
    variants: VariantsSectionSchema,
    runner: RunnerSectionSchema,
    profiles: z.record(AnalysisSectionSchema.partial()).default({}),
    sweeps: z.array(SweepSchema).default([]),
  })
  .refine(
    (data) => new Set(data.metrics.map((metric) => metric.name)).size === data.metrics.length,
    {
      message: 'Metric names must be unique',
      path: ['metrics'],
    }
  );

/**
 * Environment override sections are deep partials; they are validated as
 * part of the merged result.
 */
export const EnvironmentsSchema = z
  .object({
    production: z.record(z.unknown()).optional(),
    development: z.record(z.unknown()).optional(),
    test: z.record(z.unknown()).optional(),
  })
  .optional();

export type BoundaryConfig = z.infer<typeof BoundaryConfigSchema>;
export type AnalysisSection = z.infer<typeof AnalysisSectionSchema>;
export type SweepSection = z.infer<typeof SweepSchema>;
export type RunnerSection = z.infer<typeof RunnerSectionSchema>;
