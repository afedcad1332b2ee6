import { z } from 'zod';
import { ConfigError } from './loader.js';
import type { CountRange } from '../corpus/corpus-generator.js';
import type { ValidationConfig } from '../validation/types.js';

const blankAsUndefined = (value: unknown): unknown => (value === '' ? undefined : value);

const optionalInt = z.preprocess(blankAsUndefined, z.coerce.number().int().optional());
const optionalFraction = z.preprocess(blankAsUndefined, z.coerce.number().min(0).max(1).optional());
const optionalString = z.preprocess(blankAsUndefined, z.string().optional());
const flag = z.preprocess(
  blankAsUndefined,
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .optional()
    .transform((v) => v === undefined || v === 'true' || v === '1' || v === 'yes')
);

function countWithDefault(fallback: number) {
  return z.preprocess(blankAsUndefined, z.coerce.number().int().min(0).default(fallback));
}

const EnvSchema = z.object({
  WORKGEN_SEED: optionalInt,
  SIMULATION_START_DATE: optionalString,
  SIMULATION_END_DATE: optionalString,
  SIMULATION_TIMEZONE: z.preprocess(blankAsUndefined, z.string().default('UTC')),
  NUM_ORGANIZATIONS: countWithDefault(1),
  NUM_TEAMS_PER_ORG_MIN: countWithDefault(2),
  NUM_TEAMS_PER_ORG_MAX: countWithDefault(4),
  NUM_USERS_PER_TEAM_MIN: countWithDefault(3),
  NUM_USERS_PER_TEAM_MAX: countWithDefault(8),
  NUM_PROJECTS_PER_TEAM_MIN: countWithDefault(1),
  NUM_PROJECTS_PER_TEAM_MAX: countWithDefault(3),
  NUM_TASKS_PER_PROJECT_MIN: countWithDefault(20),
  NUM_TASKS_PER_PROJECT_MAX: countWithDefault(60),
  TEMPORAL_CONSISTENCY_THRESHOLD: optionalFraction,
  DISTRIBUTION_SIMILARITY_THRESHOLD: optionalFraction,
  REFERENTIAL_INTEGRITY_THRESHOLD: optionalFraction,
  VALIDATION_ENABLED: flag,
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.preprocess(blankAsUndefined, z.string().default('gpt-4o-mini')),
  OPENAI_TEMPERATURE: z.preprocess(blankAsUndefined, z.coerce.number().min(0).max(2).default(0.7)),
});

export interface Settings {
  seed?: number;
  simulationStart?: string;
  simulationEnd?: string;
  timezone: string;
  organizations: number;
  teamsPerOrg: CountRange;
  usersPerTeam: CountRange;
  projectsPerTeam: CountRange;
  tasksPerProject: CountRange;
  thresholdOverrides: Partial<
    Pick<
      ValidationConfig,
      'temporalConsistencyThreshold' | 'distributionSimilarityThreshold' | 'referentialIntegrityThreshold'
    >
  >;
  validationEnabled: boolean;
  openAi: { apiKey?: string; model: string; temperature: number };
}

function range(name: string, min: number, max: number): CountRange {
  if (min > max) throw new ConfigError(`${name}_MIN (${min}) exceeds ${name}_MAX (${max})`);
  return [min, max];
}

/**
 * Reads process settings from the environment. `dotenv/config` has
 * already merged `.env` into `process.env` by the time this runs.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid environment: ${issues}`, parsed.error);
  }
  const e = parsed.data;

  const thresholdOverrides: Settings['thresholdOverrides'] = {};
  if (e.TEMPORAL_CONSISTENCY_THRESHOLD !== undefined) {
    thresholdOverrides.temporalConsistencyThreshold = e.TEMPORAL_CONSISTENCY_THRESHOLD;
  }
  if (e.DISTRIBUTION_SIMILARITY_THRESHOLD !== undefined) {
    thresholdOverrides.distributionSimilarityThreshold = e.DISTRIBUTION_SIMILARITY_THRESHOLD;
  }
  if (e.REFERENTIAL_INTEGRITY_THRESHOLD !== undefined) {
    thresholdOverrides.referentialIntegrityThreshold = e.REFERENTIAL_INTEGRITY_THRESHOLD;
  }

  return {
    ...(e.WORKGEN_SEED !== undefined ? { seed: e.WORKGEN_SEED } : {}),
    ...(e.SIMULATION_START_DATE !== undefined ? { simulationStart: e.SIMULATION_START_DATE } : {}),
    ...(e.SIMULATION_END_DATE !== undefined ? { simulationEnd: e.SIMULATION_END_DATE } : {}),
    timezone: e.SIMULATION_TIMEZONE,
    organizations: e.NUM_ORGANIZATIONS,
    teamsPerOrg: range('NUM_TEAMS_PER_ORG', e.NUM_TEAMS_PER_ORG_MIN, e.NUM_TEAMS_PER_ORG_MAX),
    usersPerTeam: range('NUM_USERS_PER_TEAM', e.NUM_USERS_PER_TEAM_MIN, e.NUM_USERS_PER_TEAM_MAX),
    projectsPerTeam: range('NUM_PROJECTS_PER_TEAM', e.NUM_PROJECTS_PER_TEAM_MIN, e.NUM_PROJECTS_PER_TEAM_MAX),
    tasksPerProject: range('NUM_TASKS_PER_PROJECT', e.NUM_TASKS_PER_PROJECT_MIN, e.NUM_TASKS_PER_PROJECT_MAX),
    thresholdOverrides,
    validationEnabled: e.VALIDATION_ENABLED,
    openAi: {
      ...(e.OPENAI_API_KEY !== undefined ? { apiKey: e.OPENAI_API_KEY } : {}),
      model: e.OPENAI_MODEL,
      temperature: e.OPENAI_TEMPERATURE,
    },
  };
}

export function withThresholdOverrides(config: ValidationConfig, settings: Settings): ValidationConfig {
  return { ...config, ...settings.thresholdOverrides };
}
