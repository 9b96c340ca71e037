/**
 * Main type exports for protocol-boundary-analysis
 */

export type * from './boundary.js';

export {
  BoundaryConfigSchema,
  AnalysisSectionSchema,
  SignificancePolicySchema,
  SweepSchema,
  type BoundaryConfig,
  type AnalysisSection,
  type SweepSection,
  type RunnerSection,
} from './schemas/config.js';
