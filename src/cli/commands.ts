import { Command, InvalidArgumentError } from 'commander';
import { BusinessCalendar } from '../calendar/business-calendar.js';
import { dateKey, parseDate } from '../calendar/time.js';
import { loadConfig } from '../config/loader.js';
import { generateRunId } from '../utils/id.js';
import { runWorkflow } from '../control-plane/orchestrator.js';
import type { OutputFormat, RunOptions } from '../control-plane/types.js';

const FORMATS: OutputFormat[] = ['text', 'json', 'md'];
const DEFAULT_LLM_LIMIT = 50;

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError('Not an integer.');
  return n;
}

function parseCount(value: string): number {
  const n = parseInteger(value);
  if (n < 0) throw new InvalidArgumentError('Must not be negative.');
  return n;
}

function parseFormat(value: string): OutputFormat {
  const format = FORMATS.find((f) => f === value);
  if (!format) throw new InvalidArgumentError(`Expected one of: ${FORMATS.join(', ')}.`);
  return format;
}

function parseNow(value: string): Date {
  const date = parseDate(value);
  if (!date) throw new InvalidArgumentError('Expected YYYY-MM-DD or an ISO timestamp.');
  return date;
}

export function buildCli(): Command {
  const program = new Command();

  program
    .name('workgen')
    .description(
      'Synthetic work-item corpus generator.\n\n' +
      'Generates organizations, teams, projects and tasks with realistic lifecycles on a\n' +
      'business calendar, then checks the corpus against statistical benchmarks.'
    )
    .version('0.1.0');

  program
    .command('generate')
    .description('Generate a corpus, validate it and write the run ledger')
    .option('--seed <n>', 'Seed for every random draw', parseInteger)
    .option('--orgs <n>', 'Number of organizations', parseCount)
    .option('--start <date>', 'Simulation window start (YYYY-MM-DD)')
    .option('--end <date>', 'Simulation window end (YYYY-MM-DD)')
    .option('--now <timestamp>', 'Fix "now" for a reproducible run', parseNow)
    .option('--out <path>', 'Output directory', './out')
    .option('--format <format>', 'Report format: text, json or md', parseFormat, 'text')
    .option('--config-dir <path>', 'Directory holding the JSON configuration tables')
    .option('--seed-file <path>', 'HTML or text file of person names')
    .option('--llm', 'Write descriptions and comments with OpenAI (requires OPENAI_API_KEY)')
    .option('--model <model>', 'OpenAI model to use with --llm')
    .option('--llm-limit <n>', 'Tasks enriched through OpenAI; the rest use templates', parseCount, DEFAULT_LLM_LIMIT)
    .option('--no-validate', 'Skip validation and the report')
    .option('--run-id <string>', 'Explicit run ID')
    .action(async (opts) => {
      const options: RunOptions = {
        command: 'generate',
        runId: opts.runId || generateRunId(),
        seed: opts.seed,
        now: opts.now,
        start: opts.start,
        end: opts.end,
        organizations: opts.orgs,
        out: opts.out,
        format: opts.format,
        configDir: opts.configDir,
        seedFile: opts.seedFile,
        llm: opts.llm === true,
        model: opts.model,
        llmLimit: opts.llmLimit,
        validate: opts.validate !== false,
      };

      // Findings live in the report and the ledger; only load_config exits non-zero.
      await runWorkflow(options);
    });

  program
    .command('validate')
    .description('Validate a previously generated corpus file')
    .requiredOption('--corpus <path>', 'Corpus JSON written by "generate"')
    .option('--now <timestamp>', 'Check against this "now" instead of the one recorded in the corpus', parseNow)
    .option('--out <path>', 'Output directory', './out')
    .option('--format <format>', 'Report format: text, json or md', parseFormat, 'text')
    .option('--config-dir <path>', 'Directory holding the JSON configuration tables')
    .option('--run-id <string>', 'Explicit run ID')
    .action(async (opts) => {
      const options: RunOptions = {
        command: 'validate',
        runId: opts.runId || generateRunId(),
        now: opts.now,
        out: opts.out,
        format: opts.format,
        configDir: opts.configDir,
        llm: false,
        llmLimit: 0,
        validate: true,
        corpusPath: opts.corpus,
      };

      await runWorkflow(options);
    });

  program
    .command('calendar')
    .description('Describe a date on the business calendar')
    .argument('<date>', 'Date (YYYY-MM-DD)')
    .option('--offset <n>', 'Business days to move from the date', parseInteger, 0)
    .option('--config-dir <path>', 'Directory holding the JSON configuration tables')
    .action(async (dateArg: string, opts) => {
      const date = parseDate(dateArg);
      if (!date) throw new InvalidArgumentError(`Invalid date "${dateArg}".`);

      const config = await loadConfig(opts.configDir);
      const calendar = new BusinessCalendar(config.extraHolidays);
      const day = calendar.describe(date);
      console.log(
        `${day.date}: ${day.isBusinessDay ? 'business day' : 'non-business day'}` +
        (day.holidayName ? ` (${day.holidayName})` : '')
      );
      if (opts.offset !== 0) {
        const moved = calendar.offsetByBusinessDays(date, opts.offset);
        console.log(`${opts.offset > 0 ? '+' : ''}${opts.offset} business days: ${dateKey(moved)}`);
      }
    });

  return program;
}
