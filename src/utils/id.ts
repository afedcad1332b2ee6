import { randomBytes } from 'node:crypto';

/** `run_<YYYYMMDD>_<6 hex>`, dated in UTC. */
export function generateRunId(now: Date = new Date()): string {
  const date = now.toISOString().slice(0, 10).replace(/-/g, '');
  const rand = randomBytes(3).toString('hex');
  return `run_${date}_${rand}`;
}
