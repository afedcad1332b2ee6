export interface WeightedSpec {
  kind: 'weighted';
  values: number[];
  weights: number[];
  min: number;
  max: number;
}

/** `mean`/`std` describe the untruncated normal. */
export interface BoundedNormalSpec {
  kind: 'boundedNormal';
  mean: number;
  std: number;
  min: number;
  max: number;
}

/** `mean`/`std` are in log space; `min`/`max` bound the drawn value. */
export interface BoundedLogNormalSpec {
  kind: 'boundedLogNormal';
  mean: number;
  std: number;
  min: number;
  max: number;
}

export interface UniformSpec {
  kind: 'uniform';
  min: number;
  max: number;
}

export type SamplingSpec = WeightedSpec | BoundedNormalSpec | BoundedLogNormalSpec | UniformSpec;

export type ContinuousSpec = BoundedNormalSpec | BoundedLogNormalSpec;
