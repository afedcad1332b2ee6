import { normal, weightedIndex } from './random.js';
import type { RandomSource } from './random.js';
import type { ContinuousSpec, SamplingSpec } from './types.js';

/**
 * What to do when a continuous draw keeps landing outside [min, max]:
 * retry up to `maxAttempts`, then return `fallback(spec)`.
 */
export interface RetryPolicy {
  readonly maxAttempts: number;
  fallback(spec: ContinuousSpec): number;
}

/**
 * Falls back to the distribution's centre, never to a bound. For a
 * log-normal the configured mean lives in log space, so the fallback is
 * its image exp(mean).
 */
export const MEAN_FALLBACK: RetryPolicy = {
  maxAttempts: 10,
  fallback(spec) {
    return spec.kind === 'boundedLogNormal' ? Math.exp(spec.mean) : spec.mean;
  },
};

export interface SampleOutcome {
  value: number;
  attempts: number;
  fellBack: boolean;
}

export class BoundedSampler {
  constructor(
    private readonly rng: RandomSource,
    private readonly policy: RetryPolicy = MEAN_FALLBACK
  ) {}

  sample(spec: SamplingSpec): number {
    return this.draw(spec).value;
  }

  draw(spec: SamplingSpec): SampleOutcome {
    switch (spec.kind) {
      case 'weighted': {
        const idx = weightedIndex(this.rng, spec.weights);
        return { value: spec.values[idx], attempts: 1, fellBack: false };
      }
      case 'boundedNormal':
      case 'boundedLogNormal':
        return this.drawBounded(spec);
      case 'uniform':
        return {
          value: spec.min + this.rng.next() * (spec.max - spec.min),
          attempts: 1,
          fellBack: false,
        };
      default:
        return assertNever(spec);
    }
  }

  private drawBounded(spec: ContinuousSpec): SampleOutcome {
    for (let attempt = 1; attempt <= this.policy.maxAttempts; attempt++) {
      const raw = normal(this.rng, spec.mean, spec.std);
      const value = spec.kind === 'boundedLogNormal' ? Math.exp(raw) : raw;
      if (value >= spec.min && value <= spec.max) {
        return { value, attempts: attempt, fellBack: false };
      }
    }
    return {
      value: this.policy.fallback(spec),
      attempts: this.policy.maxAttempts,
      fellBack: true,
    };
  }
}

function assertNever(spec: never): never {
  throw new Error(`Unhandled sampling spec: ${JSON.stringify(spec)}`);
}
