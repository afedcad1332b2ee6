import { join } from 'node:path';
import {
  BusinessCalendar,
  defaultSimulationWindow,
  parseSimulationWindow,
} from '../calendar/business-calendar.js';
import { dateKey } from '../calendar/time.js';
import { loadSettings, withThresholdOverrides } from '../config/env.js';
import { buildRegistry, loadConfig } from '../config/loader.js';
import {
  OpenAiContentProvider,
  TemplateContentProvider,
  enrichCorpus,
  openAiCompleter,
} from '../content/provider.js';
import type { ContentProvider } from '../content/provider.js';
import { FileCorpusSource, MemoryCorpusSource, writeCorpus } from '../corpus/corpus-file.js';
import { CorpusGenerator } from '../corpus/corpus-generator.js';
import type { Corpus } from '../corpus/types.js';
import { buildReport, renderText } from '../report/report-builder.js';
import { SeededRandom, seedFromClock } from '../sampling/random.js';
import { loadSeedList } from '../seeds/seed-list.js';
import { validateCorpus } from '../validation/validate-corpus.js';
import type { CorpusSource } from '../validation/validate-corpus.js';
import type { LoadedRun, RunOptions, StepName, WorkflowContext, WorkflowPlan, WorkflowStep } from './types.js';

// keeps enrichment draws off the generation stream
const ENRICH_SEED_SALT = 0x5eed;

function requireLoaded(ctx: WorkflowContext): LoadedRun {
  if (!ctx.loaded) throw new Error('Configuration was not loaded');
  return ctx.loaded;
}

function requireCorpus(ctx: WorkflowContext): Corpus {
  if (!ctx.corpus) throw new Error('No corpus was generated');
  return ctx.corpus;
}

function simulationWindow(start: string | undefined, end: string | undefined, now: Date): { start: Date; end: Date } {
  const fallback = defaultSimulationWindow(now);
  if (start === undefined && end === undefined) return fallback;
  return parseSimulationWindow(start ?? dateKey(fallback.start), end ?? dateKey(fallback.end), now);
}

/**
 * Steps for one run. A `load_config` failure aborts the run; any other
 * failure is recorded and the run carries on, so the ledger and report
 * are still written.
 */
export function buildWorkflow(options: RunOptions): WorkflowPlan {
  const generating = options.command === 'generate';

  const steps: WorkflowStep[] = [
    {
      name: 'load_config',
      required: true,
      execute: async (ctx) => {
        const settings = loadSettings();
        const config = await loadConfig(ctx.options.configDir);
        const now = ctx.options.now ?? new Date();
        const calendar = new BusinessCalendar(config.extraHolidays, settings.timezone);
        ctx.loaded = {
          settings,
          config,
          validation: withThresholdOverrides(config.validation, settings),
          calendar,
          registry: buildRegistry(config),
          seed: ctx.options.seed ?? settings.seed ?? seedFromClock(),
          now,
          window: simulationWindow(
            ctx.options.start ?? settings.simulationStart,
            ctx.options.end ?? settings.simulationEnd,
            now
          ),
        };
      },
    },
    {
      name: 'generate',
      required: false,
      execute: async (ctx) => {
        const run = requireLoaded(ctx);
        const { settings } = run;
        const names = ctx.options.seedFile ? await loadSeedList(ctx.options.seedFile) : [];
        const generator = new CorpusGenerator(
          {
            config: run.config,
            calendar: run.calendar,
            registry: run.registry,
            rng: new SeededRandom(run.seed),
            names,
          },
          {
            seed: run.seed,
            now: run.now,
            window: run.window,
            organizations: ctx.options.organizations ?? settings.organizations,
            teamsPerOrg: settings.teamsPerOrg,
            usersPerTeam: settings.usersPerTeam,
            projectsPerTeam: settings.projectsPerTeam,
            tasksPerProject: settings.tasksPerProject,
          }
        );
        const { corpus, store } = generator.generate();
        ctx.corpus = corpus;
        ctx.counts = store.counts();
        const summary = run.calendar.summarizeWindow(run.window.start, run.window.end);
        console.log(
          `         window=${dateKey(summary.start)}..${dateKey(summary.end)} ` +
          `(${summary.businessDays} business days) seed=${run.seed}`
        );
        console.log(
          `         ${Object.entries(ctx.counts).map(([k, v]) => `${k}=${v}`).join(' ')}`
        );
      },
    },
    {
      name: 'enrich',
      required: false,
      execute: async (ctx) => {
        const run = requireLoaded(ctx);
        const corpus = requireCorpus(ctx);
        const template = new TemplateContentProvider(
          run.config.catalog,
          new SeededRandom(run.seed ^ ENRICH_SEED_SALT)
        );

        let provider: ContentProvider = template;
        if (ctx.options.llm) {
          const { apiKey, model, temperature } = run.settings.openAi;
          if (!apiKey) {
            throw new Error('OPENAI_API_KEY environment variable is required for --llm');
          }
          const selectedModel = ctx.options.model ?? model;
          console.log(`  [llm]  Enriching up to ${ctx.options.llmLimit} tasks with ${selectedModel}...`);
          provider = new OpenAiContentProvider(openAiCompleter(apiKey, selectedModel, temperature), template);
        }

        const summary = await enrichCorpus(corpus, provider, template, {
          limit: ctx.options.llm ? ctx.options.llmLimit : undefined,
        });
        console.log(`         descriptions=${summary.descriptions} comments=${summary.comments} via ${provider.name}`);
      },
    },
    {
      name: 'persist',
      required: false,
      execute: async (ctx) => {
        const corpus = requireCorpus(ctx);
        const path = join(ctx.options.out, `${ctx.options.runId}-corpus.json`);
        await writeCorpus(path, corpus);
        ctx.artifacts.corpus = path;
      },
    },
    {
      name: 'validate',
      required: false,
      enabled: (ctx) => ctx.loaded?.settings.validationEnabled !== false,
      execute: async (ctx) => {
        const run = requireLoaded(ctx);
        let source: CorpusSource;
        if (ctx.corpus) {
          source = new MemoryCorpusSource(ctx.corpus);
        } else if (ctx.options.corpusPath) {
          source = new FileCorpusSource(ctx.options.corpusPath);
        } else {
          throw new Error('Nothing to validate: no corpus generated and no --corpus given');
        }
        ctx.results = await validateCorpus(
          source,
          run.config.benchmarks,
          run.validation,
          generating ? run.now : ctx.options.now
        );
      },
    },
    {
      name: 'report',
      required: false,
      enabled: (ctx) => ctx.results.length > 0,
      execute: async (ctx) => {
        ctx.report = buildReport(ctx.results, new Date());
        console.log('');
        console.log(renderText(ctx.report));
      },
    },
    {
      name: 'emit_ledger',
      required: true,
      execute: async () => {
        // Ledger emission is handled by the orchestrator after all steps complete.
      },
    },
  ];

  const skippedSteps: StepName[] = [];
  if (!generating) skippedSteps.push('generate', 'enrich', 'persist');
  if (!options.validate) skippedSteps.push('validate', 'report');

  return { steps, skippedSteps };
}
