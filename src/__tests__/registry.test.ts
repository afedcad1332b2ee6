import { describe, it, expect, vi, afterEach } from 'vitest';
import { BUILTIN_DEFAULTS, DistributionRegistry } from '../registry/distribution-registry.js';
import { parseSegment, segmentKey, segmentMatch } from '../registry/segment.js';
import type { RegistryEntry } from '../registry/types.js';

const sprint = { department: 'engineering', workItemType: 'sprint' };

const entries: RegistryEntry[] = [
  {
    segment: 'engineering/sprint',
    field: 'Story Points',
    spec: { valueKind: 'number', sampling: { kind: 'weighted', values: [1, 2, 3], weights: [1, 1, 1], min: 1, max: 3 } },
  },
  {
    segment: '*',
    field: 'points',
    spec: { valueKind: 'number', sampling: { kind: 'uniform', min: 1, max: 13 } },
  },
  {
    segment: '*',
    field: 'story points',
    spec: { valueKind: 'number', sampling: { kind: 'uniform', min: 1, max: 21 } },
  },
  {
    segment: 'engineering/*',
    field: 'points',
    spec: { valueKind: 'number', sampling: { kind: 'uniform', min: 1, max: 8 } },
  },
  {
    segment: '*',
    field: 'priority',
    spec: { valueKind: 'enum', options: ['P1', 'P2'] },
  },
];

afterEach(() => {
  vi.restoreAllMocks();
});

describe('segmentMatch', () => {
  it('ranks patterns by specificity', () => {
    expect(segmentMatch('engineering/sprint', sprint)).toBe(3);
    expect(segmentMatch('engineering/*', sprint)).toBe(2);
    expect(segmentMatch('*/sprint', sprint)).toBe(1);
    expect(segmentMatch('*', sprint)).toBe(0);
    expect(segmentMatch('marketing/*', sprint)).toBe(-1);
  });

  it('reads a bare department as a department wildcard', () => {
    expect(parseSegment('sales')).toEqual({ department: 'sales', workItemType: '*' });
    expect(segmentKey(sprint)).toBe('engineering/sprint');
  });
});

describe('DistributionRegistry', () => {
  const registry = new DistributionRegistry(entries);

  it('prefers an exact entry, ignoring case in the field name', () => {
    const resolution = registry.explain(sprint, 'story points', 'number');
    expect(resolution.tier).toBe('exact');
    expect(resolution.spec.sampling).toEqual({ kind: 'weighted', values: [1, 2, 3], weights: [1, 1, 1], min: 1, max: 3 });
  });

  it('prefers the more specific scope among category matches', () => {
    const resolution = registry.explain({ department: 'engineering', workItemType: 'bug_tracking' }, 'Effort Points', 'number');
    expect(resolution.tier).toBe('category');
    expect(resolution.entry?.segment).toBe('engineering/*');
  });

  it('prefers the longest token within one scope', () => {
    const resolution = registry.explain({ department: 'marketing', workItemType: 'campaign' }, 'Story Points Estimate', 'number');
    expect(resolution.tier).toBe('category');
    expect(resolution.spec.sampling).toEqual({ kind: 'uniform', min: 1, max: 21 });
  });

  it('falls back to the default for the value kind and warns once', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const segment = { department: 'sales', workItemType: 'campaign' };
    expect(registry.resolve(segment, 'Budget', 'number')).toEqual(BUILTIN_DEFAULTS.number);
    expect(registry.explain(segment, 'Budget', 'number').tier).toBe('default');
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('only matches entries of the requested kind', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    expect(registry.explain(sprint, 'priority', 'enum').tier).toBe('category');
    expect(registry.explain(sprint, 'priority', 'number').tier).toBe('default');
  });

  it('returns the bare sampling spec for numeric fields', () => {
    expect(registry.resolveSampling(sprint, 'Story Points')).toEqual({
      kind: 'weighted',
      values: [1, 2, 3],
      weights: [1, 1, 1],
      min: 1,
      max: 3,
    });
  });

  it('counts its entries', () => {
    expect(registry.size).toBe(5);
  });
});
