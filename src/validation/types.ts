import type { Segment } from '../registry/segment.js';

export type ValidationStatus = 'success' | 'failure' | 'error';

export type ValidationCategory =
  | 'temporal_consistency'
  | 'referential_integrity'
  | 'distribution_similarity'
  | 'completion_rates'
  | 'business_rules'
  | 'data_quality';

export const VALIDATION_CATEGORIES: ValidationCategory[] = [
  'temporal_consistency',
  'referential_integrity',
  'distribution_similarity',
  'completion_rates',
  'business_rules',
  'data_quality',
];

export type DetailValue = string | number | boolean | null;

export interface ValidationResult {
  category: ValidationCategory;
  /** Segment key, or the category name for corpus-wide checks. */
  subject: string;
  status: ValidationStatus;
  metric: number;
  threshold: number;
  sampleSize: number;
  message: string;
  details: Record<string, DetailValue>;
}

export interface RateBand {
  min: number;
  max: number;
}

export interface ValidationConfig {
  /** Fraction of rows that must be temporally consistent. */
  temporalConsistencyThreshold: number;
  /** Largest KL divergence still counted as similar. */
  distributionSimilarityThreshold: number;
  /** Fraction of rows whose references must resolve. */
  referentialIntegrityThreshold: number;
  minSampleSize: number;
  /** Keyed by work-item type; `default` is required. */
  completionRateBands: Record<string, RateBand>;
}

export interface BenchmarkDistribution {
  name: string;
  metric: string;
  /** Segment pattern, `department/type` with optional `*` halves. */
  segment: string;
  bucketBoundaries: number[];
  bucketProbabilities: number[];
}

export interface Observation {
  segment: Segment;
  value: number;
}
