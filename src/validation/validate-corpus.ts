import type { Corpus } from '../corpus/types.js';
import type { Segment } from '../registry/segment.js';
import { DivergenceValidator } from './divergence.js';
import { IntegrityChecker } from './integrity.js';
import { checkCompletionRates } from './rate-check.js';
import { checkBusinessRules, checkDataQuality } from './rules.js';
import { VALIDATION_CATEGORIES } from './types.js';
import type {
  BenchmarkDistribution,
  Observation,
  ValidationCategory,
  ValidationConfig,
  ValidationResult,
} from './types.js';

/** Where the validator reads the materialised corpus from. */
export interface CorpusSource {
  describe(): string;
  read(): Promise<Corpus>;
}

export class CorpusReadError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'CorpusReadError';
  }
}

const DAY_MS = 86_400_000;

type MetricExtractor = (corpus: Corpus, segmentOf: (projectId: number) => Segment | undefined) => Observation[];

export const METRIC_EXTRACTORS: Record<string, MetricExtractor> = {
  due_date_lead_days: (corpus, segmentOf) =>
    corpus.tasks.flatMap((task) => {
      const segment = segmentOf(task.projectId);
      if (!segment || !task.dueDate) return [];
      return [{ segment, value: (Date.parse(task.dueDate) - Date.parse(task.createdAt)) / DAY_MS }];
    }),
  cycle_time_days: (corpus, segmentOf) =>
    corpus.tasks.flatMap((task) => {
      const segment = segmentOf(task.projectId);
      if (!segment || task.cycleTimeDays === undefined) return [];
      return [{ segment, value: task.cycleTimeDays }];
    }),
  lead_time_days: (corpus, segmentOf) =>
    corpus.tasks.flatMap((task) => {
      const segment = segmentOf(task.projectId);
      if (!segment || task.leadTimeDays === undefined) return [];
      return [{ segment, value: task.leadTimeDays }];
    }),
};

function segmentLookup(corpus: Corpus): (projectId: number) => Segment | undefined {
  const byProject = new Map<number, Segment>();
  for (const p of corpus.projects) {
    byProject.set(p.id, { department: p.department, workItemType: p.workItemType });
  }
  return (projectId) => byProject.get(projectId);
}

export function errorResult(category: ValidationCategory, err: unknown): ValidationResult {
  const message = err instanceof Error ? err.message : String(err);
  return {
    category,
    subject: category,
    status: 'error',
    metric: Number.NaN,
    threshold: Number.NaN,
    sampleSize: 0,
    message: `${category} validation failed: ${message}`,
    details: { error: message },
  };
}

function guarded(category: ValidationCategory, run: () => ValidationResult[]): ValidationResult[] {
  try {
    return run();
  } catch (err) {
    return [errorResult(category, err)];
  }
}

export function validateLoadedCorpus(
  corpus: Corpus,
  benchmarks: readonly BenchmarkDistribution[],
  config: ValidationConfig,
  now: Date
): ValidationResult[] {
  const integrity = new IntegrityChecker(config);
  const divergence = new DivergenceValidator({
    threshold: config.distributionSimilarityThreshold,
    minSampleSize: config.minSampleSize,
  });
  const segmentOf = segmentLookup(corpus);

  const distribution = guarded('distribution_similarity', () => {
    const results: ValidationResult[] = [];
    const metrics = [...new Set(benchmarks.map((b) => b.metric))];
    for (const metric of metrics) {
      const extract = METRIC_EXTRACTORS[metric];
      if (!extract) {
        console.warn(`  [warn] No extractor for benchmark metric "${metric}", skipping`);
        continue;
      }
      const forMetric = benchmarks.filter((b) => b.metric === metric);
      results.push(...divergence.validate(extract(corpus, segmentOf), forMetric));
    }
    return results;
  });

  const completion = guarded('completion_rates', () =>
    checkCompletionRates(
      corpus.tasks.flatMap((task) => {
        const segment = segmentOf(task.projectId);
        return segment ? [{ segment, hit: task.completed }] : [];
      }),
      config.completionRateBands,
      config.minSampleSize
    )
  );

  return [
    ...guarded('temporal_consistency', () => [integrity.checkTemporalConsistency(corpus, now)]),
    ...guarded('referential_integrity', () => [integrity.checkReferentialIntegrity(corpus)]),
    ...distribution,
    ...completion,
    ...guarded('business_rules', () => [checkBusinessRules(corpus)]),
    ...guarded('data_quality', () => [checkDataQuality(corpus)]),
  ];
}

/**
 * A read fault marks every category `error`; threshold breaches come
 * back as `failure` results, never as exceptions. Without `now` the
 * corpus is checked against the time it was generated for.
 */
export async function validateCorpus(
  source: CorpusSource,
  benchmarks: readonly BenchmarkDistribution[],
  config: ValidationConfig,
  now?: Date
): Promise<ValidationResult[]> {
  let corpus: Corpus;
  try {
    corpus = await source.read();
  } catch (err) {
    const fault = err instanceof CorpusReadError ? err : new CorpusReadError(`Cannot read ${source.describe()}`, err);
    const detail = err instanceof Error && err !== fault ? `${fault.message}: ${err.message}` : fault.message;
    return VALIDATION_CATEGORIES.map((category) => errorResult(category, detail));
  }
  return validateLoadedCorpus(corpus, benchmarks, config, now ?? recordedNow(corpus));
}

/** The "now" a corpus was generated against, or the wall clock when it carries none. */
export function recordedNow(corpus: Corpus): Date {
  const ms = Date.parse(corpus.now);
  return Number.isNaN(ms) ? new Date() : new Date(ms);
}
