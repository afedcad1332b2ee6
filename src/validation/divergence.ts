import { segmentKey, segmentMatch } from '../registry/segment.js';
import type { Segment } from '../registry/segment.js';
import type { BenchmarkDistribution, Observation, ValidationResult } from './types.js';

export const SMOOTHING_EPSILON = 1e-10;

/** Bucket i holds values <= boundaries[i]; the last bucket is open-ended. */
export function bucketIndex(value: number, boundaries: readonly number[]): number {
  for (let i = 0; i < boundaries.length; i++) {
    if (value <= boundaries[i]) return i;
  }
  return boundaries.length;
}

export function bucketCounts(values: readonly number[], boundaries: readonly number[]): number[] {
  const counts = new Array<number>(boundaries.length + 1).fill(0);
  for (const v of values) counts[bucketIndex(v, boundaries)] += 1;
  return counts;
}

export function smoothAndNormalize(vector: readonly number[], epsilon = SMOOTHING_EPSILON): number[] {
  const smoothed = vector.map((v) => v + epsilon);
  const total = smoothed.reduce((sum, v) => sum + v, 0);
  return smoothed.map((v) => v / total);
}

/** KL(p || q) after smoothing and renormalising both vectors. */
export function klDivergence(
  observed: readonly number[],
  benchmark: readonly number[],
  epsilon = SMOOTHING_EPSILON
): number {
  if (observed.length !== benchmark.length) {
    throw new Error(`Vector length mismatch: ${observed.length} vs ${benchmark.length}`);
  }
  const p = smoothAndNormalize(observed, epsilon);
  const q = smoothAndNormalize(benchmark, epsilon);
  let kl = 0;
  for (let i = 0; i < p.length; i++) {
    kl += p[i] * Math.log(p[i] / q[i]);
  }
  return kl;
}

export interface DivergenceOptions {
  threshold: number;
  minSampleSize: number;
  epsilon?: number;
}

/**
 * Most specific benchmark whose segment pattern matches.
 */
export function findBenchmark(
  benchmarks: readonly BenchmarkDistribution[],
  segment: Segment
): BenchmarkDistribution | undefined {
  let best: { benchmark: BenchmarkDistribution; score: number } | undefined;
  for (const benchmark of benchmarks) {
    const score = segmentMatch(benchmark.segment, segment);
    if (score >= 0 && (!best || score > best.score)) best = { benchmark, score };
  }
  return best?.benchmark;
}

export class DivergenceValidator {
  constructor(private readonly options: DivergenceOptions) {}

  /**
   * One result per observed segment that has a benchmark and at least
   * `minSampleSize` observations; smaller segments are skipped.
   */
  validate(observations: readonly Observation[], benchmarks: readonly BenchmarkDistribution[]): ValidationResult[] {
    const groups = new Map<string, { segment: Segment; values: number[] }>();
    for (const obs of observations) {
      const key = segmentKey(obs.segment);
      const group = groups.get(key) ?? { segment: obs.segment, values: [] };
      group.values.push(obs.value);
      groups.set(key, group);
    }

    const results: ValidationResult[] = [];
    for (const [key, group] of groups) {
      if (group.values.length < this.options.minSampleSize) continue;
      const benchmark = findBenchmark(benchmarks, group.segment);
      if (!benchmark) continue;

      const counts = bucketCounts(group.values, benchmark.bucketBoundaries);
      const observed = counts.map((c) => c / group.values.length);
      const divergence = klDivergence(observed, benchmark.bucketProbabilities, this.options.epsilon);
      const passed = divergence <= this.options.threshold;

      results.push({
        category: 'distribution_similarity',
        subject: key,
        status: passed ? 'success' : 'failure',
        metric: divergence,
        threshold: this.options.threshold,
        sampleSize: group.values.length,
        message:
          `${benchmark.metric} for ${key}: KL divergence ${divergence.toFixed(4)} ` +
          `${passed ? 'within' : 'exceeds'} ${this.options.threshold}`,
        details: {
          benchmark: benchmark.name,
          metric: benchmark.metric,
          observed: observed.map((p) => p.toFixed(3)).join(' / '),
          expected: benchmark.bucketProbabilities.map((p) => p.toFixed(3)).join(' / '),
        },
      });
    }
    return results;
  }
}
