import type { BusinessCalendar } from '../calendar/business-calendar.js';
import type { WorkgenConfig } from '../config/loader.js';
import type { Settings } from '../config/env.js';
import type { Corpus } from '../corpus/types.js';
import type { DistributionRegistry } from '../registry/distribution-registry.js';
import type { ValidationReport } from '../report/report-builder.js';
import type { ValidationConfig, ValidationResult } from '../validation/types.js';

export type RunCommand = 'generate' | 'validate';
export type OutputFormat = 'text' | 'json' | 'md';

export interface RunOptions {
  command: RunCommand;
  runId: string;
  /** Seed for every random draw; recorded in the ledger. */
  seed?: number;
  now?: Date;
  start?: string;
  end?: string;
  organizations?: number;
  out: string;
  format: OutputFormat;
  configDir?: string;
  seedFile?: string;
  llm: boolean;
  model?: string;
  llmLimit: number;
  validate: boolean;
  /** Corpus file read by the `validate` command. */
  corpusPath?: string;
}

export type StepName =
  | 'load_config'
  | 'generate'
  | 'enrich'
  | 'persist'
  | 'validate'
  | 'report'
  | 'emit_ledger';

export type StepStatus = 'pending' | 'running' | 'passed' | 'failed' | 'skipped';

export interface StepResult {
  name: StepName;
  status: StepStatus;
  durationMs: number;
  error?: string;
}

export interface WorkflowStep {
  name: StepName;
  required: boolean;
  /** Checked just before the step runs; `false` records it as skipped. */
  enabled?: (ctx: WorkflowContext) => boolean;
  execute: (ctx: WorkflowContext) => Promise<void>;
}

/** What `load_config` resolves; later steps read it through `requireLoaded`. */
export interface LoadedRun {
  settings: Settings;
  config: WorkgenConfig;
  validation: ValidationConfig;
  calendar: BusinessCalendar;
  registry: DistributionRegistry;
  seed: number;
  now: Date;
  window: { start: Date; end: Date };
}

export interface WorkflowContext {
  options: RunOptions;
  loaded?: LoadedRun;
  corpus?: Corpus;
  counts: Record<string, number>;
  results: ValidationResult[];
  report?: ValidationReport;
  artifacts: Record<string, string>;
  stepResults: StepResult[];
}

export interface WorkflowPlan {
  steps: WorkflowStep[];
  skippedSteps: StepName[];
}
