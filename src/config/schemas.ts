import { z } from 'zod';
import type { UniformSpec } from '../sampling/types.js';

const KNOWN_KINDS = ['weighted', 'boundedNormal', 'boundedLogNormal', 'uniform'];

const probability = z.number().finite().min(0).max(1);
const weight = z.number().finite().min(0);

const WeightedSamplingSchema = z
  .object({
    kind: z.literal('weighted'),
    values: z.array(z.number().finite()).min(1),
    weights: z.array(weight).min(1),
    min: z.number().finite(),
    max: z.number().finite(),
  })
  .refine((s) => s.values.length === s.weights.length, {
    message: 'values and weights must have the same length',
  })
  .refine((s) => s.values.every((v) => v >= s.min && v <= s.max), {
    message: 'every weighted value must lie within [min, max]',
  });

const BoundedNormalSamplingSchema = z.object({
  kind: z.literal('boundedNormal'),
  mean: z.number().finite(),
  std: z.number().finite().min(0),
  min: z.number().finite(),
  max: z.number().finite(),
});

const BoundedLogNormalSamplingSchema = z.object({
  kind: z.literal('boundedLogNormal'),
  mean: z.number().finite(),
  std: z.number().finite().min(0),
  min: z.number().finite(),
  max: z.number().finite(),
});

const UniformSamplingSchema = z.object({
  kind: z.literal('uniform'),
  min: z.number().finite(),
  max: z.number().finite(),
});

// Any other kind keeps its bounds and is sampled uniformly.
const UnknownSamplingSchema = z
  .object({
    kind: z.string().refine((k) => !KNOWN_KINDS.includes(k)),
    min: z.number().finite(),
    max: z.number().finite(),
  })
  .transform((raw): UniformSpec => {
    console.warn(`  [warn] Unknown sampling kind "${raw.kind}", using uniform [${raw.min}, ${raw.max}]`);
    return { kind: 'uniform', min: raw.min, max: raw.max };
  });

export const SamplingSchema = z
  .union([
    WeightedSamplingSchema,
    BoundedNormalSamplingSchema,
    BoundedLogNormalSamplingSchema,
    UniformSamplingSchema,
    UnknownSamplingSchema,
  ])
  .refine((s) => s.min <= s.max, { message: 'min must not exceed max' });

const NumberFieldSchema = z.object({
  valueKind: z.literal('number'),
  sampling: SamplingSchema,
  precision: z.number().int().optional(),
});

const EnumFieldSchema = z.object({
  valueKind: z.literal('enum'),
  options: z.array(z.string()).min(1),
  weights: z.array(weight).optional(),
});

const DateFieldSchema = z.object({
  valueKind: z.literal('date'),
  offsetDays: z.tuple([z.number().int(), z.number().int()]),
  businessDayBias: probability,
});

const BooleanFieldSchema = z.object({
  valueKind: z.literal('boolean'),
  trueProbability: probability,
});

const TextFieldSchema = z.object({
  valueKind: z.literal('text'),
  values: z.array(z.string()).min(1),
});

export const FieldSpecSchema = z.discriminatedUnion('valueKind', [
  NumberFieldSchema,
  EnumFieldSchema,
  DateFieldSchema,
  BooleanFieldSchema,
  TextFieldSchema,
]);

export const DistributionsFileSchema = z.object({
  defaults: z.object({
    number: NumberFieldSchema,
    enum: EnumFieldSchema,
    date: DateFieldSchema,
    boolean: BooleanFieldSchema,
    text: TextFieldSchema,
  }),
  entries: z.array(
    z.object({
      segment: z.string().min(1),
      field: z.string().min(1),
      spec: FieldSpecSchema,
    })
  ),
});

const hourWeights = z.array(weight).length(24);

const DepartmentProfileSchema = z.object({
  baseCompletionRate: probability,
  startFactor: z.number().positive(),
  durationMultiplier: z.number().positive(),
  weekendActivity: probability,
  eveningActivity: probability,
  creationVolume: z.number().min(0),
});

const WorkItemTypeProfileSchema = z.object({
  completionAdjustment: z.number().min(-1).max(1),
  startFactor: z.number().positive(),
  completionAcceleration: z.number().positive(),
  weekendPauseFactor: probability,
  dailyCreationStdDev: z.number().min(0),
  unassignedRate: probability,
  dueDateBuckets: z
    .array(
      z.object({
        minDays: z.number().int().min(0).nullable(),
        maxDays: z.number().int().min(0).nullable(),
        weight,
      })
    )
    .min(1),
});

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

export const SegmentsFileSchema = z
  .object({
    workHours: z.object({
      start: z.number().int().min(0).max(23),
      end: z.number().int().min(1).max(24),
    }),
    departments: z.record(DepartmentProfileSchema),
    defaultDepartment: DepartmentProfileSchema,
    workItemTypes: z.record(WorkItemTypeProfileSchema),
    defaultWorkItemType: WorkItemTypeProfileSchema,
    activities: z.object({
      task_creation: hourWeights,
      task_completion: hourWeights,
      meeting_scheduling: hourWeights,
      email_activity: hourWeights,
    }),
    minuteBuckets: z
      .array(
        z
          .object({ from: z.number().int().min(0), to: z.number().int().max(60), weight })
          .refine((b) => b.from < b.to, { message: 'minute bucket must be non-empty' })
      )
      .min(1),
    extraHolidays: z.array(z.object({ date: isoDate, name: z.string().min(1) })).default([]),
  })
  .refine((s) => s.workHours.start < s.workHours.end, { message: 'workHours.start must precede workHours.end' });

const RateBandSchema = z
  .object({ min: probability, max: probability })
  .refine((b) => b.min <= b.max, { message: 'band min must not exceed max' });

export const BenchmarksFileSchema = z.object({
  validation: z.object({
    temporalConsistencyThreshold: probability,
    distributionSimilarityThreshold: z.number().finite().min(0),
    referentialIntegrityThreshold: probability,
    minSampleSize: z.number().int().min(1),
    completionRateBands: z
      .record(RateBandSchema)
      .refine((bands) => 'default' in bands, { message: 'a "default" band is required' }),
  }),
  benchmarks: z.array(
    z
      .object({
        name: z.string().min(1),
        metric: z.string().min(1),
        segment: z.string().min(1),
        bucketBoundaries: z.array(z.number().finite()).min(1),
        bucketProbabilities: z.array(probability),
      })
      .refine((b) => b.bucketProbabilities.length === b.bucketBoundaries.length + 1, {
        message: 'bucketProbabilities needs one entry per boundary plus one',
      })
  ),
});

const CustomFieldDefinitionSchema = z.object({
  name: z.string().min(1),
  valueKind: z.enum(['number', 'enum', 'date', 'boolean', 'text']),
});

const names = z.array(z.string().min(1)).min(1);

const TagGroupSchema = z.object({
  /** Chance that a task carries one tag from this group. */
  usage: probability,
  colors: z.array(z.string().regex(/^#[0-9A-Fa-f]{6}$/, 'expected #RRGGBB')).min(1),
  tags: names,
});

const SectionCatalogSchema = z.object({
  byWorkItemType: z.record(names),
  byDepartment: z.record(names),
  default: names,
});

const DepartmentCatalogSchema = z.object({
  teams: z.array(z.string()).min(1),
  workItemTypes: z.record(weight),
  topics: z.array(z.string()).min(1),
  projectTemplates: z.array(z.string()).min(1),
  taskTemplates: z.array(z.string()).min(1),
  customFields: z.array(CustomFieldDefinitionSchema),
  fieldUsage: z.array(z.string()),
  tagGroups: z.record(TagGroupSchema).default({}),
});

export const CatalogFileSchema = z.object({
  companies: z.array(z.object({ name: z.string().min(1), domain: z.string().min(1) })).min(1),
  firstNames: z.array(z.string()).min(1),
  lastNames: z.array(z.string()).min(1),
  departments: z
    .record(DepartmentCatalogSchema)
    .refine((d) => Object.keys(d).length > 0, { message: 'at least one department is required' }),
  descriptionTemplates: z.array(z.string()).min(1),
  commentTemplates: z.array(z.string()).min(1),
  subtaskTemplates: z.array(z.string()).min(1),
  sections: SectionCatalogSchema,
});

export type CustomFieldDefinition = z.infer<typeof CustomFieldDefinitionSchema>;
export type DepartmentCatalog = z.infer<typeof DepartmentCatalogSchema>;
export type SectionCatalog = z.infer<typeof SectionCatalogSchema>;
export type TagGroup = z.infer<typeof TagGroupSchema>;
export type Catalog = z.infer<typeof CatalogFileSchema>;
