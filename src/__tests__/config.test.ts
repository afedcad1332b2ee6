import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { copyFile, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError, DEFAULT_CONFIG_DIR, buildRegistry, loadConfig } from '../config/loader.js';
import { loadSettings, withThresholdOverrides } from '../config/env.js';
import { workItemTypeProfile } from '../lifecycle/types.js';
import { parseSegment } from '../registry/segment.js';
import { bucketIndex, klDivergence } from '../validation/divergence.js';

const FILES = ['segments.json', 'distributions.json', 'benchmarks.json', 'catalog.json'];

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'workgen-config-'));
    for (const file of FILES) await copyFile(join(DEFAULT_CONFIG_DIR, file), join(dir, file));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  async function patch(file: string, edit: (json: Record<string, unknown>) => void): Promise<void> {
    const path = join(dir, file);
    const json: Record<string, unknown> = JSON.parse(await readFile(path, 'utf-8'));
    edit(json);
    await writeFile(path, JSON.stringify(json));
  }

  it('loads the shipped tables', async () => {
    const config = await loadConfig();
    expect(Object.keys(config.profiles.departments)).toEqual([
      'engineering',
      'product',
      'marketing',
      'sales',
      'operations',
    ]);
    expect(config.profiles.workHours).toEqual({ start: 9, end: 18 });
    expect(config.extraHolidays).toEqual([]);
    expect(config.validation.minSampleSize).toBe(10);
    expect(config.validation.completionRateBands.sprint).toEqual({ min: 0.5, max: 0.8 });
    expect(config.benchmarks.map((b) => b.name)).toEqual(['sprint_tasks', 'campaign_tasks']);
    expect(buildRegistry(config).size).toBe(config.registryEntries.length);
  });

  it('resolves the sprint completion-time override', async () => {
    const registry = buildRegistry(await loadConfig());
    expect(registry.resolveSampling({ department: 'engineering', workItemType: 'sprint' }, 'completion_hours')).toEqual({
      kind: 'boundedLogNormal',
      mean: 2.2,
      std: 0.8,
      min: 1,
      max: 240,
    });
  });

  it('samples an unknown kind uniformly over its bounds', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    await patch('distributions.json', (json) => {
      json.entries = [
        {
          segment: '*',
          field: 'effort',
          spec: { valueKind: 'number', sampling: { kind: 'triangular', min: 2, max: 9, mode: 4 } },
        },
      ];
    });
    const config = await loadConfig(dir);
    expect(config.registryEntries[0].spec).toEqual({
      valueKind: 'number',
      sampling: { kind: 'uniform', min: 2, max: 9 },
    });
    expect(warn).toHaveBeenCalledWith('  [warn] Unknown sampling kind "triangular", using uniform [2, 9]');
  });

  it('rejects weighted values outside their bounds', async () => {
    await patch('distributions.json', (json) => {
      json.entries = [
        {
          segment: '*',
          field: 'effort',
          spec: { valueKind: 'number', sampling: { kind: 'weighted', values: [1, 50], weights: [1, 1], min: 1, max: 10 } },
        },
      ];
    });
    await expect(loadConfig(dir)).rejects.toThrow(
      'distributions.json failed validation: entries.0.spec.sampling: every weighted value must lie within [min, max]'
    );
  });

  it('rejects an hour table of the wrong length', async () => {
    await patch('segments.json', (json) => {
      json.activities = { task_creation: [1], task_completion: [1], meeting_scheduling: [1], email_activity: [1] };
    });
    await expect(loadConfig(dir)).rejects.toThrow(ConfigError);
    await expect(loadConfig(dir)).rejects.toThrow(/^segments\.json failed validation: activities\.task_creation/);
  });

  it('requires a default completion band', async () => {
    await patch('benchmarks.json', (json) => {
      json.validation = {
        temporalConsistencyThreshold: 0.95,
        distributionSimilarityThreshold: 0.05,
        referentialIntegrityThreshold: 0.99,
        minSampleSize: 10,
        completionRateBands: { sprint: { min: 0.5, max: 0.8 } },
      };
    });
    await expect(loadConfig(dir)).rejects.toThrow('a "default" band is required');
  });

  it('reports malformed JSON and missing files', async () => {
    await writeFile(join(dir, 'catalog.json'), '{ not json');
    await expect(loadConfig(dir)).rejects.toThrow(/^catalog\.json is not valid JSON/);
    await expect(loadConfig(join(dir, 'missing'))).rejects.toThrow(/^Cannot read /);
  });
});

describe('loadSettings', () => {
  it('applies defaults for an empty environment', () => {
    const settings = loadSettings({});
    expect(settings.seed).toBeUndefined();
    expect(settings.organizations).toBe(1);
    expect(settings.teamsPerOrg).toEqual([2, 4]);
    expect(settings.tasksPerProject).toEqual([20, 60]);
    expect(settings.validationEnabled).toBe(true);
    expect(settings.openAi).toEqual({ model: 'gpt-4o-mini', temperature: 0.7 });
    expect(settings.thresholdOverrides).toEqual({});
  });

  it('coerces values and treats blanks as unset', () => {
    const settings = loadSettings({
      WORKGEN_SEED: '42',
      NUM_ORGANIZATIONS: '3',
      SIMULATION_START_DATE: '',
      VALIDATION_ENABLED: 'no',
      OPENAI_API_KEY: 'test-secret',
      TEMPORAL_CONSISTENCY_THRESHOLD: '0.9',
    });
    expect(settings.seed).toBe(42);
    expect(settings.organizations).toBe(3);
    expect(settings.simulationStart).toBeUndefined();
    expect(settings.validationEnabled).toBe(false);
    expect(settings.openAi.apiKey).toBe('test-secret');
    expect(settings.thresholdOverrides).toEqual({ temporalConsistencyThreshold: 0.9 });
  });

  it('rejects invalid values', () => {
    expect(() => loadSettings({ NUM_ORGANIZATIONS: 'many' })).toThrow(ConfigError);
    expect(() => loadSettings({ REFERENTIAL_INTEGRITY_THRESHOLD: '1.5' })).toThrow(/REFERENTIAL_INTEGRITY_THRESHOLD/);
  });

  it('rejects an inverted count range', () => {
    expect(() => loadSettings({ NUM_USERS_PER_TEAM_MIN: '9', NUM_USERS_PER_TEAM_MAX: '4' })).toThrow(
      'NUM_USERS_PER_TEAM_MIN (9) exceeds NUM_USERS_PER_TEAM_MAX (4)'
    );
  });

  it('overrides only the thresholds that were set', async () => {
    const { validation } = await loadConfig();
    const merged = withThresholdOverrides(validation, loadSettings({ DISTRIBUTION_SIMILARITY_THRESHOLD: '0.2' }));
    expect(merged.distributionSimilarityThreshold).toBe(0.2);
    expect(merged.temporalConsistencyThreshold).toBe(0.95);
  });
});

describe('shipped due-date buckets', () => {
  it('spread lead days within the similarity threshold of each lead-day benchmark', async () => {
    const config = await loadConfig();
    const leadBenchmarks = config.benchmarks.filter((b) => b.metric === 'due_date_lead_days');
    expect(leadBenchmarks).toHaveLength(2);

    for (const benchmark of leadBenchmarks) {
      const buckets = workItemTypeProfile(config.profiles, parseSegment(benchmark.segment)).dueDateBuckets;
      const mass = new Array<number>(benchmark.bucketProbabilities.length).fill(0);
      for (const { minDays, maxDays, weight } of buckets) {
        if (minDays === null || maxDays === null) continue;
        const days = maxDays - minDays + 1;
        for (let d = minDays; d <= maxDays; d++) {
          mass[bucketIndex(d, benchmark.bucketBoundaries)] += weight / days;
        }
      }
      const divergence = klDivergence(mass, benchmark.bucketProbabilities);
      expect(divergence, benchmark.name).toBeLessThan(config.validation.distributionSimilarityThreshold);
    }
  });
});
