import type { Corpus } from '../corpus/types.js';
import type { ValidationConfig, ValidationResult } from './types.js';

function time(value: string | undefined): number | null {
  if (value === undefined) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
}

function isBefore(a: number | null, b: number | null): boolean {
  return a !== null && b !== null && a < b;
}

interface ViolationTally {
  checks: number;
  violations: number;
  counts: Record<string, number>;
}

function tally(): ViolationTally {
  return { checks: 0, violations: 0, counts: {} };
}

function record(t: ViolationTally, reasons: string[]): void {
  t.checks += 1;
  if (reasons.length > 0) t.violations += 1;
  for (const reason of reasons) t.counts[reason] = (t.counts[reason] ?? 0) + 1;
}

/**
 * Corpus-wide ordering and dangling-reference rates, each compared with
 * its own tolerance. A row counts once however many rules it breaks.
 */
export class IntegrityChecker {
  constructor(
    private readonly config: Pick<ValidationConfig, 'temporalConsistencyThreshold' | 'referentialIntegrityThreshold'>
  ) {}

  checkTemporalConsistency(corpus: Corpus, now: Date): ValidationResult {
    const nowMs = now.getTime();
    const t = tally();
    const taskCreated = new Map<number, number | null>();

    for (const task of corpus.tasks) {
      const created = time(task.createdAt);
      const started = time(task.startedAt);
      const completed = time(task.completedAt);
      taskCreated.set(task.id, created);
      const reasons: string[] = [];
      if (created === null) reasons.push('unparseable_creation');
      if (created !== null && created > nowMs) reasons.push('future_creation');
      if (task.completed && completed === null) reasons.push('missing_completion');
      if (isBefore(completed, created)) reasons.push('completed_before_created');
      if (completed !== null && completed > nowMs) reasons.push('future_completion');
      if (isBefore(started, created) || isBefore(completed, started)) reasons.push('start_out_of_order');
      record(t, reasons);
    }

    for (const project of corpus.projects) {
      const reasons: string[] = [];
      if (isBefore(time(project.endDate), time(project.startDate))) reasons.push('project_ends_before_start');
      record(t, reasons);
    }

    for (const comment of corpus.comments) {
      const created = time(comment.createdAt);
      const reasons: string[] = [];
      if (isBefore(created, taskCreated.get(comment.taskId) ?? null)) reasons.push('comment_before_task');
      if (created !== null && created > nowMs) reasons.push('future_comment');
      record(t, reasons);
    }

    for (const subtask of corpus.subtasks) {
      const created = time(subtask.createdAt);
      const reasons: string[] = [];
      if (isBefore(created, taskCreated.get(subtask.taskId) ?? null)) reasons.push('subtask_before_parent');
      if (isBefore(time(subtask.completedAt), created)) reasons.push('subtask_completed_before_created');
      record(t, reasons);
    }

    return this.toResult(
      'temporal_consistency',
      t,
      1 - this.config.temporalConsistencyThreshold,
      'Temporal consistency'
    );
  }

  checkReferentialIntegrity(corpus: Corpus): ValidationResult {
    const orgIds = new Set(corpus.organizations.map((o) => o.id));
    const teamIds = new Set(corpus.teams.map((tm) => tm.id));
    const userIds = new Set(corpus.users.map((u) => u.id));
    const projectIds = new Set(corpus.projects.map((p) => p.id));
    const sectionProject = new Map(corpus.sections.map((sc) => [sc.id, sc.projectId]));
    const taskIds = new Set(corpus.tasks.map((tk) => tk.id));
    const tagIds = new Set(corpus.tags.map((tg) => tg.id));
    const t = tally();

    for (const team of corpus.teams) {
      record(t, orgIds.has(team.organizationId) ? [] : ['teams_to_organizations']);
    }
    for (const user of corpus.users) {
      record(t, teamIds.has(user.teamId) ? [] : ['users_to_teams']);
    }
    for (const project of corpus.projects) {
      record(t, teamIds.has(project.teamId) ? [] : ['projects_to_teams']);
    }
    for (const section of corpus.sections) {
      record(t, projectIds.has(section.projectId) ? [] : ['sections_to_projects']);
    }
    for (const task of corpus.tasks) {
      const reasons: string[] = [];
      if (!projectIds.has(task.projectId)) reasons.push('tasks_to_projects');
      // a task's section must belong to the task's own project
      if (sectionProject.get(task.sectionId) !== task.projectId) reasons.push('tasks_to_sections');
      if (task.assigneeId !== undefined && !userIds.has(task.assigneeId)) reasons.push('tasks_to_users');
      record(t, reasons);
    }
    for (const subtask of corpus.subtasks) {
      record(t, taskIds.has(subtask.taskId) ? [] : ['subtasks_to_tasks']);
    }
    for (const comment of corpus.comments) {
      const reasons: string[] = [];
      if (!taskIds.has(comment.taskId)) reasons.push('comments_to_tasks');
      if (!userIds.has(comment.authorId)) reasons.push('comments_to_users');
      record(t, reasons);
    }
    for (const tag of corpus.tags) {
      record(t, orgIds.has(tag.organizationId) ? [] : ['tags_to_organizations']);
    }
    for (const link of corpus.taskTags) {
      const reasons: string[] = [];
      if (!taskIds.has(link.taskId)) reasons.push('task_tags_to_tasks');
      if (!tagIds.has(link.tagId)) reasons.push('task_tags_to_tags');
      record(t, reasons);
    }

    return this.toResult(
      'referential_integrity',
      t,
      1 - this.config.referentialIntegrityThreshold,
      'Referential integrity'
    );
  }

  private toResult(
    category: 'temporal_consistency' | 'referential_integrity',
    t: ViolationTally,
    allowedRate: number,
    label: string
  ): ValidationResult {
    const rate = t.checks > 0 ? t.violations / t.checks : 0;
    // tolerance for float noise in 1 - threshold
    const passed = rate <= allowedRate + 1e-12;
    return {
      category,
      subject: category,
      status: passed ? 'success' : 'failure',
      metric: rate,
      threshold: allowedRate,
      sampleSize: t.checks,
      message: `${label}: ${t.violations} violations found in ${t.checks} checks`,
      details: { ...t.counts, violations: t.violations },
    };
  }
}
