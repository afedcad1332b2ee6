import type { WorkflowContext, WorkflowPlan, StepName } from '../control-plane/types.js';
import type { RunLedger } from './types.js';

export function buildLedger(
  ctx: WorkflowContext,
  plan: WorkflowPlan,
  passed: boolean,
  failureReason?: string
): RunLedger {
  const durationsMs: Record<string, number> = {};
  const executedSteps: StepName[] = [];
  const skippedSteps: StepName[] = [...plan.skippedSteps];

  for (const result of ctx.stepResults) {
    durationsMs[result.name] = result.durationMs;
    if (result.status === 'passed' || result.status === 'failed') {
      executedSteps.push(result.name);
    } else if (result.status === 'skipped' && !skippedSteps.includes(result.name)) {
      skippedSteps.push(result.name);
    }
  }

  const { options, loaded, report } = ctx;
  const seed = loaded?.seed ?? options.seed ?? null;

  return {
    runId: options.runId,
    timestamp: new Date().toISOString(),
    command: options.command,
    seed,
    deterministic: options.seed !== undefined || loaded?.settings.seed !== undefined,
    now: (loaded?.now ?? options.now)?.toISOString() ?? null,
    requiredSteps: plan.steps.filter((s) => s.required).map((s) => s.name),
    executedSteps,
    skippedSteps,
    durationsMs,
    counts: ctx.counts,
    validation: report
      ? {
          overallStatus: report.overallStatus,
          failedCategories: report.failedCategories,
          erroredCategories: report.erroredCategories,
        }
      : null,
    artifacts: ctx.artifacts,
    passed,
    ...(failureReason !== undefined ? { failureReason } : {}),
  };
}
