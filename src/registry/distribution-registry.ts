import { segmentKey, segmentMatch } from './segment.js';
import type { Segment } from './segment.js';
import type {
  FieldSpec,
  FieldSpecOf,
  NumberFieldSpec,
  RegistryEntry,
  Resolution,
  ValueKind,
} from './types.js';
import type { SamplingSpec } from '../sampling/types.js';

export type DefaultSpecs = { [K in ValueKind]: FieldSpecOf<K> };

export const BUILTIN_DEFAULTS: DefaultSpecs = {
  number: { valueKind: 'number', sampling: { kind: 'uniform', min: 1, max: 100 }, precision: 0 },
  enum: { valueKind: 'enum', options: ['High', 'Medium', 'Low'] },
  date: { valueKind: 'date', offsetDays: [0, 30], businessDayBias: 0.85 },
  boolean: { valueKind: 'boolean', trueProbability: 0.5 },
  text: { valueKind: 'text', values: ['value1', 'value2', 'value3'] },
};

function isKind<K extends ValueKind>(spec: FieldSpec, kind: K): spec is FieldSpecOf<K> {
  return spec.valueKind === kind;
}

/**
 * Read-only `(segment, field) → FieldSpec` table. Resolution never fails:
 * exact entry, then category token contained in the field name, then the
 * global default for the value kind.
 */
export class DistributionRegistry {
  private readonly exact = new Map<string, RegistryEntry>();
  private readonly warned = new Set<string>();

  constructor(
    private readonly entries: readonly RegistryEntry[],
    private readonly defaults: DefaultSpecs = BUILTIN_DEFAULTS
  ) {
    for (const entry of entries) {
      const key = `${entry.segment}|${entry.field.toLowerCase()}|${entry.spec.valueKind}`;
      if (!this.exact.has(key)) this.exact.set(key, entry);
    }
  }

  get size(): number {
    return this.entries.length;
  }

  resolve<K extends ValueKind>(segment: Segment, fieldName: string, kind: K): FieldSpecOf<K> {
    return this.explain(segment, fieldName, kind).spec;
  }

  /** Numeric fields only; returns the bare sampling spec. */
  resolveSampling(segment: Segment, fieldName: string): SamplingSpec {
    const spec: NumberFieldSpec = this.resolve(segment, fieldName, 'number');
    return spec.sampling;
  }

  explain<K extends ValueKind>(segment: Segment, fieldName: string, kind: K): Resolution<K> {
    const field = fieldName.toLowerCase();
    const key = segmentKey(segment);

    const exact = this.exact.get(`${key}|${field}|${kind}`);
    if (exact && isKind(exact.spec, kind)) {
      return { spec: exact.spec, tier: 'exact', entry: exact };
    }

    let best: { entry: RegistryEntry; spec: FieldSpecOf<K>; scope: number } | undefined;
    for (const entry of this.entries) {
      if (!isKind(entry.spec, kind)) continue;
      const scope = segmentMatch(entry.segment, segment);
      if (scope < 0 || !field.includes(entry.field.toLowerCase())) continue;
      if (
        !best ||
        scope > best.scope ||
        (scope === best.scope && entry.field.length > best.entry.field.length)
      ) {
        best = { entry, spec: entry.spec, scope };
      }
    }
    if (best) {
      return { spec: best.spec, tier: 'category', entry: best.entry };
    }

    const warnKey = `${key}|${field}|${kind}`;
    if (!this.warned.has(warnKey)) {
      this.warned.add(warnKey);
      console.warn(`  [warn] No ${kind} distribution for "${field}" in ${key}, using default`);
    }
    return { spec: this.defaults[kind], tier: 'default' };
  }
}
