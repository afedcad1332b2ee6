import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { StepTimer } from '../utils/timer.js';
import { buildLedger } from '../ledger/ledger.js';
import { renderMarkdown, renderText, suggestFixes } from '../report/report-builder.js';
import { buildWorkflow } from './workflow.js';
import type {
  RunOptions,
  WorkflowContext,
  WorkflowPlan,
  StepName,
} from './types.js';

export interface RunOutcome {
  runId: string;
  /** Report verdict; null when validation did not run. */
  reportStatus: 'success' | 'failure' | null;
  failedSteps: StepName[];
  totalMs: number;
  ledgerPath: string;
}

export async function runWorkflow(
  options: RunOptions,
  plan: WorkflowPlan = buildWorkflow(options)
): Promise<RunOutcome> {
  const ctx: WorkflowContext = {
    options,
    counts: {},
    results: [],
    artifacts: {},
    stepResults: [],
  };

  const skippedSet = new Set<StepName>(plan.skippedSteps);
  const timer = new StepTimer();

  console.log(`\n[workgen] command=${options.command} id=${options.runId}`);
  console.log(
    `[workgen] seed=${options.seed ?? 'auto'} out=${options.out} validate=${options.validate}\n`
  );

  for (const step of plan.steps) {
    if (skippedSet.has(step.name) || (step.enabled && !step.enabled(ctx))) {
      ctx.stepResults.push({
        name: step.name,
        status: 'skipped',
        durationMs: 0,
      });
      console.log(`  [skip] ${step.name}`);
      continue;
    }

    timer.begin();
    console.log(`  [run]  ${step.name}...`);

    try {
      await step.execute(ctx);
      const duration = timer.lap(step.name);
      ctx.stepResults.push({
        name: step.name,
        status: 'passed',
        durationMs: duration,
      });
      console.log(`  [pass] ${step.name} (${duration}ms)`);
    } catch (err) {
      const duration = timer.lap(step.name);
      const message = err instanceof Error ? err.message : String(err);

      ctx.stepResults.push({
        name: step.name,
        status: 'failed',
        durationMs: duration,
        error: message,
      });
      console.error(`  [FAIL] ${step.name}: ${message}`);

      if (step.required) {
        await emitOutputs(ctx, plan, false, message);
        console.error(`\n[workgen] FATAL: required step "${step.name}" failed`);
        printRemediation(step.name, message);
        process.exit(2);
      }
    }
  }

  const failedSteps = ctx.stepResults.filter((r) => r.status === 'failed').map((r) => r.name);
  const ledgerPath = await emitOutputs(
    ctx,
    plan,
    failedSteps.length === 0,
    failedSteps.length > 0 ? `steps failed: ${failedSteps.join(', ')}` : undefined
  );
  console.log(`\n[workgen] done in ${timer.total()}ms. Output written to ${options.out}/`);

  return {
    runId: options.runId,
    reportStatus: ctx.report?.overallStatus ?? null,
    failedSteps,
    totalMs: timer.total(),
    ledgerPath,
  };
}

async function emitOutputs(
  ctx: WorkflowContext,
  plan: WorkflowPlan,
  passed: boolean,
  failureReason?: string
): Promise<string> {
  const { options } = ctx;
  await mkdir(options.out, { recursive: true });

  if (ctx.report) {
    const ext = options.format === 'md' ? 'md' : options.format === 'json' ? 'json' : 'txt';
    const reportPath = join(options.out, `${options.runId}-report.${ext}`);

    if (options.format === 'md') {
      await writeFile(reportPath, renderMarkdown(ctx.report));
    } else if (options.format === 'json') {
      const body = { ...ctx.report, suggestedFixes: suggestFixes(ctx.report) };
      await writeFile(reportPath, JSON.stringify(body, null, 2));
    } else {
      await writeFile(reportPath, renderText(ctx.report));
    }
    ctx.artifacts.report = reportPath;
  }

  const ledger = buildLedger(ctx, plan, passed, failureReason);
  const ledgerPath = join(options.out, `${options.runId}-ledger.json`);
  await writeFile(ledgerPath, JSON.stringify(ledger, null, 2));
  return ledgerPath;
}

function printRemediation(stepName: StepName, error: string): void {
  console.error('\n[workgen] Remediation suggestions:');
  if (stepName === 'load_config') {
    console.error('  - Check the JSON tables in --config-dir (segments, distributions, benchmarks, catalog)');
    console.error('  - Compare your environment with .env.example');
  }
  console.error(`  - Details: ${error}`);
}
