import { describe, it, expect } from 'vitest';
import { generateRunId } from '../utils/id.js';

describe('generateRunId', () => {
  it('starts with run_ prefix', () => {
    expect(generateRunId()).toMatch(/^run_/);
  });

  it('dates the id in UTC', () => {
    const id = generateRunId(new Date('2026-01-02T23:30:00Z'));
    expect(id).toMatch(/^run_20260102_[a-f0-9]{6}$/);
  });

  it('contains a 6-char hex suffix', () => {
    expect(generateRunId()).toMatch(/^run_\d{8}_[a-f0-9]{6}$/);
  });

  it('generates unique IDs', () => {
    const ids = new Set(Array.from({ length: 50 }, () => generateRunId()));
    expect(ids.size).toBe(50);
  });
});
