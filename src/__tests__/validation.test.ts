import { describe, it, expect, vi, afterEach } from 'vitest';
import { DivergenceValidator, bucketCounts, bucketIndex, findBenchmark, klDivergence } from '../validation/divergence.js';
import { IntegrityChecker } from '../validation/integrity.js';
import { bandFor, checkCompletionRates } from '../validation/rate-check.js';
import { checkBusinessRules, checkDataQuality } from '../validation/rules.js';
import { CorpusReadError, recordedNow, validateCorpus, validateLoadedCorpus } from '../validation/validate-corpus.js';
import type { CorpusSource } from '../validation/validate-corpus.js';
import type { BenchmarkDistribution, Observation, ValidationConfig } from '../validation/types.js';
import { MemoryCorpusSource } from '../corpus/corpus-file.js';
import { smallCorpus } from './helpers.js';

const sprint = { department: 'engineering', workItemType: 'sprint' };
const now = new Date('2026-01-15T12:00:00Z');

const config: ValidationConfig = {
  temporalConsistencyThreshold: 0.95,
  distributionSimilarityThreshold: 0.05,
  referentialIntegrityThreshold: 0.99,
  minSampleSize: 10,
  completionRateBands: {
    sprint: { min: 0.5, max: 0.8 },
    default: { min: 0.45, max: 0.75 },
  },
};

const leadBenchmark: BenchmarkDistribution = {
  name: 'sprint_tasks',
  metric: 'due_date_lead_days',
  segment: '*/sprint',
  bucketBoundaries: [1, 3, 7, 14],
  bucketProbabilities: [0.1, 0.2, 0.3, 0.3, 0.1],
};

function observations(values: number[], segment = sprint): Observation[] {
  return values.map((value) => ({ segment, value }));
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('divergence helpers', () => {
  it('puts a value in the first bucket whose boundary holds it', () => {
    expect(bucketIndex(1, [1, 3, 7, 14])).toBe(0);
    expect(bucketIndex(2, [1, 3, 7, 14])).toBe(1);
    expect(bucketIndex(14, [1, 3, 7, 14])).toBe(3);
    expect(bucketIndex(15, [1, 3, 7, 14])).toBe(4);
    expect(bucketCounts([0.5, 2, 2, 20], [1, 3])).toEqual([1, 2, 1]);
  });

  it('gives zero divergence for identical vectors', () => {
    expect(klDivergence([0.2, 0.3, 0.5], [0.2, 0.3, 0.5])).toBe(0);
  });

  it('stays finite when the observed vector has empty buckets', () => {
    const kl = klDivergence([0, 0, 1], [0.5, 0.4, 0.1]);
    expect(Number.isFinite(kl)).toBe(true);
    expect(kl).toBeCloseTo(Math.log(10), 6);
  });

  it('rejects vectors of different length', () => {
    expect(() => klDivergence([1], [0.5, 0.5])).toThrow('length mismatch');
  });

  it('picks the most specific matching benchmark', () => {
    const exact = { ...leadBenchmark, name: 'engineering_sprint', segment: 'engineering/sprint' };
    expect(findBenchmark([leadBenchmark, exact], sprint)?.name).toBe('engineering_sprint');
    expect(findBenchmark([leadBenchmark], { department: 'sales', workItemType: 'campaign' })).toBeUndefined();
  });
});

describe('DivergenceValidator', () => {
  const validator = new DivergenceValidator({ threshold: 0.05, minSampleSize: 10 });
  const matching = [0.5, 2, 2, 5, 5, 5, 10, 10, 10, 30];

  it('passes a segment whose histogram matches the benchmark', () => {
    const [result] = validator.validate(observations(matching), [leadBenchmark]);
    expect(result.status).toBe('success');
    expect(result.metric).toBe(0);
    expect(result.subject).toBe('engineering/sprint');
    expect(result.sampleSize).toBe(10);
    expect(result.details.observed).toBe('0.100 / 0.200 / 0.300 / 0.300 / 0.100');
  });

  it('fails a skewed segment', () => {
    const [result] = validator.validate(observations(new Array<number>(10).fill(30)), [leadBenchmark]);
    expect(result.status).toBe('failure');
    expect(result.message).toBe('due_date_lead_days for engineering/sprint: KL divergence 2.3026 exceeds 0.05');
  });

  it('skips segments below the minimum sample size', () => {
    expect(validator.validate(observations(matching.slice(1)), [leadBenchmark])).toEqual([]);
  });

  it('skips segments without a benchmark', () => {
    const research = { department: 'product', workItemType: 'research' };
    expect(validator.validate(observations(matching, research), [leadBenchmark])).toEqual([]);
  });
});

describe('checkCompletionRates', () => {
  const samples = (hits: number, total: number, segment = sprint) =>
    Array.from({ length: total }, (_, i) => ({ segment, hit: i < hits }));

  it('passes a rate inside the band', () => {
    const [result] = checkCompletionRates(samples(6, 10), config.completionRateBands, 10);
    expect(result.status).toBe('success');
    expect(result.metric).toBe(0.6);
    expect(result.message).toBe('Completion rate for engineering/sprint is 60.0% (acceptable 50-80%)');
  });

  it('reports the crossed bound for a rate outside the band', () => {
    const [high] = checkCompletionRates(samples(9, 10), config.completionRateBands, 10);
    expect(high.status).toBe('failure');
    expect(high.threshold).toBe(0.8);

    const [low] = checkCompletionRates(samples(2, 10), config.completionRateBands, 10);
    expect(low.threshold).toBe(0.5);
  });

  it('uses the default band for unlisted types', () => {
    expect(bandFor(config.completionRateBands, 'roadmap_planning')).toEqual({ min: 0.45, max: 0.75 });
    expect(() => bandFor({ sprint: { min: 0, max: 1 } }, 'campaign')).toThrow('no default band');
  });

  it('skips small segments', () => {
    expect(checkCompletionRates(samples(5, 9), config.completionRateBands, 10)).toEqual([]);
  });
});

describe('IntegrityChecker', () => {
  const checker = new IntegrityChecker(config);

  it('finds no temporal violations in a clean corpus', () => {
    const result = checker.checkTemporalConsistency(smallCorpus(), now);
    expect(result.status).toBe('success');
    expect(result.sampleSize).toBe(15);
    expect(result.message).toBe('Temporal consistency: 0 violations found in 15 checks');
  });

  it('counts a row once however many rules it breaks', () => {
    const corpus = smallCorpus();
    corpus.tasks[1].completedAt = '2026-01-05T00:00:00.000Z';
    const result = checker.checkTemporalConsistency(corpus, now);
    expect(result.status).toBe('failure');
    expect(result.metric).toBeCloseTo(1 / 15, 10);
    expect(result.details).toEqual({ completed_before_created: 1, start_out_of_order: 1, violations: 1 });
  });

  it('flags timestamps after now', () => {
    const result = checker.checkTemporalConsistency(smallCorpus(), new Date('2026-01-06T12:00:00Z'));
    expect(result.details.future_creation).toBe(9);
  });

  it('flags dangling references', () => {
    const corpus = smallCorpus();
    corpus.comments[0].authorId = 99;
    const result = checker.checkReferentialIntegrity(corpus);
    expect(result.sampleSize).toBe(23);
    expect(result.status).toBe('failure');
    expect(result.details).toEqual({ comments_to_users: 1, violations: 1 });
  });

  it('flags a task placed in another project\'s section', () => {
    const corpus = smallCorpus();
    corpus.sections.push({ id: 3, projectId: 9, name: 'Elsewhere', position: 0 });
    corpus.tasks[4].sectionId = 3;
    corpus.tasks[5].sectionId = 42;
    const result = checker.checkReferentialIntegrity(corpus);
    expect(result.sampleSize).toBe(24);
    expect(result.details).toEqual({ sections_to_projects: 1, tasks_to_sections: 2, violations: 3 });
  });

  it('flags task-tag links to missing tasks or tags', () => {
    const corpus = smallCorpus();
    corpus.taskTags.push({ taskId: 99, tagId: 1 }, { taskId: 3, tagId: 7 }, { taskId: 98, tagId: 8 });
    corpus.tags[0].organizationId = 5;
    const result = checker.checkReferentialIntegrity(corpus);
    expect(result.sampleSize).toBe(26);
    expect(result.details).toEqual({
      tags_to_organizations: 1,
      task_tags_to_tasks: 2,
      task_tags_to_tags: 2,
      violations: 4,
    });
  });

  it('allows unassigned tasks', () => {
    const corpus = smallCorpus();
    delete corpus.tasks[0].assigneeId;
    expect(checker.checkReferentialIntegrity(corpus).status).toBe('success');
  });
});

describe('business rules and data quality', () => {
  it('passes a clean corpus', () => {
    expect(checkBusinessRules(smallCorpus()).message).toBe('All business rules satisfied');
    expect(checkDataQuality(smallCorpus()).message).toBe('All data quality checks passed');
  });

  it('names each broken rule', () => {
    const corpus = smallCorpus();
    corpus.tasks[0].name = 'ab';
    delete corpus.tasks[1].completedAt;
    const result = checkBusinessRules(corpus);
    expect(result.status).toBe('failure');
    expect(result.message).toBe(
      'Business rules: 2 rules violated (completed_tasks_must_have_completion_dates, task_names_must_be_valid)'
    );
  });

  it('counts duplicate emails case-insensitively', () => {
    const corpus = smallCorpus();
    corpus.users[1].email = 'ADA.LANE.1@northwind.example';
    const result = checkDataQuality(corpus);
    expect(result.message).toBe('Data quality: 1 issues found');
    expect(result.details).toEqual({ 'users.email duplicated': 1 });
  });
});

describe('validateCorpus', () => {
  it('returns one result per category for a clean corpus', async () => {
    const results = await validateCorpus(new MemoryCorpusSource(smallCorpus()), [], config);
    expect(results.map((r) => r.category)).toEqual([
      'temporal_consistency',
      'referential_integrity',
      'completion_rates',
      'business_rules',
      'data_quality',
    ]);
    expect(results.every((r) => r.status === 'success')).toBe(true);
  });

  it('checks a benchmark metric against the corpus', async () => {
    const results = await validateCorpus(new MemoryCorpusSource(smallCorpus()), [leadBenchmark], config);
    const distribution = results.filter((r) => r.category === 'distribution_similarity');
    expect(distribution).toHaveLength(1);
    expect(distribution[0].subject).toBe('engineering/sprint');
    expect(distribution[0].status).toBe('failure');
  });

  it('skips benchmark metrics it cannot extract, with a warning', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const results = validateLoadedCorpus(smallCorpus(), [{ ...leadBenchmark, metric: 'story_points' }], config, now);
    expect(results.some((r) => r.category === 'distribution_similarity')).toBe(false);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('marks every category as errored when the corpus cannot be read', async () => {
    const broken: CorpusSource = {
      describe: () => 'broken.json',
      read: async () => {
        throw new CorpusReadError('Corpus broken.json is not valid JSON');
      },
    };
    const results = await validateCorpus(broken, [leadBenchmark], config);
    expect(results).toHaveLength(6);
    expect(results.every((r) => r.status === 'error')).toBe(true);
    expect(results[0].message).toBe('temporal_consistency validation failed: Corpus broken.json is not valid JSON');
  });

  it('wraps unexpected read failures', async () => {
    const broken: CorpusSource = {
      describe: () => 'remote corpus',
      read: async () => {
        throw new Error('socket closed');
      },
    };
    const [first] = await validateCorpus(broken, [], config);
    expect(first.details.error).toBe('Cannot read remote corpus: socket closed');
  });

  it('reads the recorded now', () => {
    expect(recordedNow(smallCorpus()).toISOString()).toBe('2026-01-15T12:00:00.000Z');
  });
});
