import type { SamplingSpec } from '../sampling/types.js';

export type ValueKind = 'number' | 'enum' | 'date' | 'boolean' | 'text';

export interface NumberFieldSpec {
  valueKind: 'number';
  sampling: SamplingSpec;
  /** Decimal places kept; negative values round to tens, hundreds, … */
  precision?: number;
}

export interface EnumFieldSpec {
  valueKind: 'enum';
  options: string[];
  weights?: number[];
}

export interface DateFieldSpec {
  valueKind: 'date';
  offsetDays: [number, number];
  businessDayBias: number;
}

export interface BooleanFieldSpec {
  valueKind: 'boolean';
  trueProbability: number;
}

export interface TextFieldSpec {
  valueKind: 'text';
  values: string[];
}

export type FieldSpec =
  | NumberFieldSpec
  | EnumFieldSpec
  | DateFieldSpec
  | BooleanFieldSpec
  | TextFieldSpec;

export type FieldSpecOf<K extends ValueKind> = Extract<FieldSpec, { valueKind: K }>;

/**
 * `segment` is `department/workItemType`; either half may be `*`,
 * and `*` alone matches every segment.
 */
export interface RegistryEntry {
  segment: string;
  field: string;
  spec: FieldSpec;
}

export type ResolutionTier = 'exact' | 'category' | 'default';

export interface Resolution<K extends ValueKind = ValueKind> {
  spec: FieldSpecOf<K>;
  tier: ResolutionTier;
  entry?: RegistryEntry;
}
