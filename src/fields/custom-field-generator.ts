import { BusinessCalendar } from '../calendar/business-calendar.js';
import { addDays, dateKey } from '../calendar/time.js';
import { DistributionRegistry } from '../registry/distribution-registry.js';
import type { Segment } from '../registry/segment.js';
import type { FieldSpec } from '../registry/types.js';
import { BoundedSampler } from '../sampling/bounded-sampler.js';
import { chance, pick, randomInt, weightedIndex } from '../sampling/random.js';
import type { RandomSource } from '../sampling/random.js';
import type { CustomFieldDefinition } from '../config/schemas.js';
import type { CustomFieldValue } from '../corpus/types.js';

const REQUIRED_TOKENS = ['priority', 'due', 'deadline', 'required', 'critical', 'mandatory'];
const IMPORTANT_TOKENS = ['impact', 'effort', 'score', 'value', 'target', 'budget', 'cost'];

const REQUIRED_FILL_RATE = 0.95;
const IMPORTANT_FILL_RATE = 0.8;
const OPTIONAL_FILL_RATE = 0.45;
const USAGE_BOOST = 1.2;

export interface CustomFieldContext {
  segment: Segment;
  createdAt: Date;
  /** Lower-cased field names the segment uses heavily. */
  usage: readonly string[];
}

export function fillProbability(fieldName: string, usage: readonly string[]): number {
  const name = fieldName.toLowerCase();
  let rate = OPTIONAL_FILL_RATE;
  if (REQUIRED_TOKENS.some((t) => name.includes(t))) rate = REQUIRED_FILL_RATE;
  else if (IMPORTANT_TOKENS.some((t) => name.includes(t))) rate = IMPORTANT_FILL_RATE;
  if (usage.includes(name)) rate *= USAGE_BOOST;
  return Math.min(1, rate);
}

/** Rounds to `precision` decimals; negative precision rounds to tens, hundreds, … */
export function roundTo(value: number, precision: number): number {
  if (precision < 0) {
    const scale = 10 ** -precision;
    return Math.round(value / scale) * scale;
  }
  return Number(value.toFixed(precision));
}

export class CustomFieldGenerator {
  private readonly sampler: BoundedSampler;

  constructor(
    private readonly registry: DistributionRegistry,
    private readonly calendar: BusinessCalendar,
    private readonly rng: RandomSource
  ) {
    this.sampler = new BoundedSampler(rng);
  }

  generate(
    definitions: readonly CustomFieldDefinition[],
    ctx: CustomFieldContext
  ): Record<string, CustomFieldValue> {
    const values: Record<string, CustomFieldValue> = {};
    for (const def of definitions) {
      if (!chance(this.rng, fillProbability(def.name, ctx.usage))) continue;
      values[def.name] = this.valueFor(this.registry.resolve(ctx.segment, def.name, def.valueKind), ctx);
    }
    return values;
  }

  valueFor(spec: FieldSpec, ctx: CustomFieldContext): CustomFieldValue {
    switch (spec.valueKind) {
      case 'number': {
        const value = this.sampler.sample(spec.sampling);
        return spec.precision === undefined ? value : roundTo(value, spec.precision);
      }
      case 'enum':
        if (spec.weights && spec.weights.length === spec.options.length) {
          return spec.options[weightedIndex(this.rng, spec.weights)];
        }
        return pick(this.rng, spec.options);
      case 'date': {
        const [lo, hi] = spec.offsetDays;
        let date = addDays(ctx.createdAt, randomInt(this.rng, Math.min(lo, hi), Math.max(lo, hi)));
        if (!this.calendar.isBusinessDay(date) && chance(this.rng, spec.businessDayBias)) {
          date = this.calendar.nextBusinessDay(date);
        }
        return dateKey(date);
      }
      case 'boolean':
        return chance(this.rng, spec.trueProbability);
      case 'text':
        return pick(this.rng, spec.values);
    }
  }
}
