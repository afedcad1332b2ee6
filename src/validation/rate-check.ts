import { segmentKey } from '../registry/segment.js';
import type { Segment } from '../registry/segment.js';
import type { RateBand, ValidationResult } from './types.js';

export interface RateSample {
  segment: Segment;
  hit: boolean;
}

export function bandFor(bands: Record<string, RateBand>, workItemType: string): RateBand {
  const band = bands[workItemType] ?? bands['default'];
  if (!band) {
    throw new Error(`No rate band for "${workItemType}" and no default band`);
  }
  return band;
}

/**
 * Range-membership check of a per-segment rate against the band for the
 * segment's work-item type. Independent of the divergence check.
 */
export function checkCompletionRates(
  samples: readonly RateSample[],
  bands: Record<string, RateBand>,
  minSampleSize: number
): ValidationResult[] {
  const groups = new Map<string, { segment: Segment; total: number; hits: number }>();
  for (const sample of samples) {
    const key = segmentKey(sample.segment);
    const group = groups.get(key) ?? { segment: sample.segment, total: 0, hits: 0 };
    group.total += 1;
    if (sample.hit) group.hits += 1;
    groups.set(key, group);
  }

  const results: ValidationResult[] = [];
  for (const [key, group] of groups) {
    if (group.total < minSampleSize) continue;
    const rate = group.hits / group.total;
    const band = bandFor(bands, group.segment.workItemType);
    const inside = rate >= band.min && rate <= band.max;

    results.push({
      category: 'completion_rates',
      subject: key,
      status: inside ? 'success' : 'failure',
      metric: rate,
      threshold: inside ? band.min : rate < band.min ? band.min : band.max,
      sampleSize: group.total,
      message:
        `Completion rate for ${key} is ${(rate * 100).toFixed(1)}% ` +
        `(acceptable ${(band.min * 100).toFixed(0)}-${(band.max * 100).toFixed(0)}%)`,
      details: { completed: group.hits, total: group.total, min: band.min, max: band.max },
    });
  }
  return results;
}
