import type { Corpus } from '../corpus/types.js';
import type { ValidationResult } from './types.js';

const MIN_TASK_NAME_LENGTH = 3;

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === '';
}

export function checkBusinessRules(corpus: Corpus): ValidationResult {
  const projectsWithTasks = new Set(corpus.tasks.map((t) => t.projectId));
  const violations: Record<string, number> = {
    projects_must_have_tasks: corpus.projects.filter((p) => !projectsWithTasks.has(p.id)).length,
    completed_tasks_must_have_completion_dates: corpus.tasks.filter((t) => t.completed && !t.completedAt).length,
    task_names_must_be_valid: corpus.tasks.filter((t) => t.name.trim().length < MIN_TASK_NAME_LENGTH).length,
  };
  const broken = Object.entries(violations).filter(([, count]) => count > 0);
  const rows = corpus.projects.length + corpus.tasks.length;

  return {
    category: 'business_rules',
    subject: 'business_rules',
    status: broken.length === 0 ? 'success' : 'failure',
    metric: broken.length,
    threshold: 0,
    sampleSize: rows,
    message:
      broken.length === 0
        ? 'All business rules satisfied'
        : `Business rules: ${broken.length} rules violated (${broken.map(([rule]) => rule).join(', ')})`,
    details: violations,
  };
}

export function checkDataQuality(corpus: Corpus): ValidationResult {
  const issues: Record<string, number> = {};
  const note = (key: string, count: number): void => {
    if (count > 0) issues[key] = count;
  };

  note('users.name empty', corpus.users.filter((u) => isBlank(u.name)).length);
  note('users.email empty', corpus.users.filter((u) => isBlank(u.email)).length);
  note('projects.name empty', corpus.projects.filter((p) => isBlank(p.name)).length);
  note('tasks.name empty', corpus.tasks.filter((t) => isBlank(t.name)).length);
  note('teams.name empty', corpus.teams.filter((t) => isBlank(t.name)).length);
  note(
    'organizations.domain empty',
    corpus.organizations.filter((o) => isBlank(o.name) || isBlank(o.domain)).length
  );

  const seen = new Map<string, number>();
  for (const user of corpus.users) {
    const email = user.email.trim().toLowerCase();
    if (email) seen.set(email, (seen.get(email) ?? 0) + 1);
  }
  note('users.email duplicated', [...seen.values()].filter((n) => n > 1).length);

  const issueCount = Object.keys(issues).length;
  return {
    category: 'data_quality',
    subject: 'data_quality',
    status: issueCount === 0 ? 'success' : 'failure',
    metric: issueCount,
    threshold: 0,
    sampleSize: corpus.users.length + corpus.projects.length + corpus.tasks.length,
    message: issueCount === 0 ? 'All data quality checks passed' : `Data quality: ${issueCount} issues found`,
    details: issues,
  };
}
