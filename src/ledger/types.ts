import type { RunCommand, StepName } from '../control-plane/types.js';
import type { ValidationCategory } from '../validation/types.js';

export interface ValidationLedgerEntry {
  overallStatus: 'success' | 'failure';
  failedCategories: ValidationCategory[];
  erroredCategories: ValidationCategory[];
}

export interface RunLedger {
  runId: string;
  timestamp: string;
  command: RunCommand;
  seed: number | null;
  /** True when the seed was supplied rather than drawn from the clock. */
  deterministic: boolean;
  now: string | null;
  requiredSteps: StepName[];
  executedSteps: StepName[];
  skippedSteps: StepName[];
  durationsMs: Record<string, number>;
  counts: Record<string, number>;
  validation: ValidationLedgerEntry | null;
  artifacts: Record<string, string>;
  passed: boolean;
  failureReason?: string;
}
