import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { z } from 'zod';
import type { Holiday } from '../calendar/holidays.js';
import { DistributionRegistry } from '../registry/distribution-registry.js';
import type { DefaultSpecs } from '../registry/distribution-registry.js';
import type { RegistryEntry } from '../registry/types.js';
import type { SegmentProfiles } from '../lifecycle/types.js';
import type { BenchmarkDistribution, ValidationConfig } from '../validation/types.js';
import {
  BenchmarksFileSchema,
  CatalogFileSchema,
  DistributionsFileSchema,
  SegmentsFileSchema,
} from './schemas.js';
import type { Catalog } from './schemas.js';

export const DEFAULT_CONFIG_DIR = fileURLToPath(new URL('../../config/', import.meta.url));

/** Configuration that cannot be loaded at all. Fatal for a run. */
export class ConfigError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ConfigError';
  }
}

export interface WorkgenConfig {
  dir: string;
  profiles: SegmentProfiles;
  extraHolidays: Holiday[];
  registryEntries: RegistryEntry[];
  registryDefaults: DefaultSpecs;
  validation: ValidationConfig;
  benchmarks: BenchmarkDistribution[];
  catalog: Catalog;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

async function readTable<S extends z.ZodTypeAny>(dir: string, file: string, schema: S): Promise<z.output<S>> {
  const path = join(dir, file);
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`, err);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`, err);
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`${file} failed validation: ${formatIssues(parsed.error)}`, parsed.error);
  }
  return parsed.data;
}

export async function loadConfig(dir: string = DEFAULT_CONFIG_DIR): Promise<WorkgenConfig> {
  const [segments, distributions, benchmarks, catalog] = await Promise.all([
    readTable(dir, 'segments.json', SegmentsFileSchema),
    readTable(dir, 'distributions.json', DistributionsFileSchema),
    readTable(dir, 'benchmarks.json', BenchmarksFileSchema),
    readTable(dir, 'catalog.json', CatalogFileSchema),
  ]);

  const { extraHolidays, ...profiles } = segments;

  return {
    dir,
    profiles,
    extraHolidays,
    registryEntries: distributions.entries,
    registryDefaults: distributions.defaults,
    validation: benchmarks.validation,
    benchmarks: benchmarks.benchmarks,
    catalog,
  };
}

export function buildRegistry(config: WorkgenConfig): DistributionRegistry {
  return new DistributionRegistry(config.registryEntries, config.registryDefaults);
}
