import { BusinessCalendar } from '../calendar/business-calendar.js';
import {
  addDays,
  addMinutes,
  clampDate,
  maxDate,
  minDate,
  startOfDay,
} from '../calendar/time.js';
import type { Catalog, DepartmentCatalog, SectionCatalog } from '../config/schemas.js';
import type { WorkgenConfig } from '../config/loader.js';
import { fillTemplate } from '../content/templates.js';
import { CustomFieldGenerator } from '../fields/custom-field-generator.js';
import { ActivityClock } from '../lifecycle/activity-clock.js';
import { dailyCreationSeries } from '../lifecycle/creation-series.js';
import { LifecycleGenerator } from '../lifecycle/lifecycle-generator.js';
import { workItemTypeProfile } from '../lifecycle/types.js';
import type { LifecycleRecord } from '../lifecycle/types.js';
import { DistributionRegistry } from '../registry/distribution-registry.js';
import type { Segment } from '../registry/segment.js';
import { chance, pick, randomFloat, randomInt, weightedIndex } from '../sampling/random.js';
import type { RandomSource } from '../sampling/random.js';
import { RecordStore } from './record-store.js';
import type { Corpus, Organization, Project, ProjectStatus, Section, Task, Team, User } from './types.js';

export type CountRange = readonly [min: number, max: number];

export interface GenerationPlan {
  seed: number;
  now: Date;
  window: { start: Date; end: Date };
  organizations: number;
  teamsPerOrg: CountRange;
  usersPerTeam: CountRange;
  projectsPerTeam: CountRange;
  tasksPerProject: CountRange;
}

export interface CorpusGeneratorDeps {
  config: WorkgenConfig;
  calendar: BusinessCalendar;
  registry: DistributionRegistry;
  rng: RandomSource;
  /** Full person names; the catalog's first/last names are used when empty. */
  names?: readonly string[];
}

const PROJECT_STATUSES: ProjectStatus[] = ['active', 'completed', 'archived'];
const PROJECT_STATUS_WEIGHTS = [0.6, 0.3, 0.1];
const ORG_AGE_DAYS: CountRange = [365, 1500];
const PROJECT_LENGTH_DAYS: CountRange = [14, 120];
const SUBTASK_RATE = 0.3;
const SUBTASK_COUNT: CountRange = [1, 5];
const SUBTASK_COMPLETION_RATE = 0.8;
const COMMENT_COUNT: CountRange = [0, 3];
const DUE_DATE_BUSINESS_DAY_BIAS = 0.85;

function between(rng: RandomSource, range: CountRange): number {
  return randomInt(rng, range[0], range[1]);
}

function emailLocalPart(name: string): string {
  return name
    .toLowerCase()
    .normalize('NFKD')
    .replace(/[^a-z0-9 ]/g, '')
    .trim()
    .split(/\s+/)
    .join('.');
}

function quarterOf(date: Date): string {
  return `Q${Math.floor(date.getUTCMonth() / 3) + 1}`;
}

/** Section names by work-item type, then department, then the catalog default. */
export function sectionNamesFor(sections: SectionCatalog, segment: Segment): string[] {
  return sections.byWorkItemType[segment.workItemType] ?? sections.byDepartment[segment.department] ?? sections.default;
}

/** A point uniformly between `from` and `to` (or `from` when the span is empty). */
function pointBetween(rng: RandomSource, from: Date, to: Date): Date {
  return to.getTime() > from.getTime() ? new Date(randomFloat(rng, from.getTime(), to.getTime())) : from;
}

interface TaggableTask {
  taskId: number;
  deptCatalog: DepartmentCatalog;
}

/**
 * Dependency-ordered batch generator: organizations, teams and users,
 * projects and their sections, tasks with their subtasks and comments,
 * then each organization's tags and task-tag links. Every draw comes from
 * the one random source, so a seed reproduces the corpus exactly.
 */
export class CorpusGenerator {
  private readonly catalog: Catalog;
  private readonly clock: ActivityClock;
  private readonly lifecycle: LifecycleGenerator;
  private readonly fields: CustomFieldGenerator;
  private readonly rng: RandomSource;

  constructor(
    private readonly deps: CorpusGeneratorDeps,
    private readonly plan: GenerationPlan
  ) {
    const { config, calendar, registry, rng } = deps;
    const { now } = plan;
    this.catalog = config.catalog;
    this.rng = rng;
    this.clock = new ActivityClock(calendar, config.profiles, rng);
    this.lifecycle = new LifecycleGenerator(calendar, registry, config.profiles, rng, { now });
    this.fields = new CustomFieldGenerator(registry, calendar, rng);
  }

  generate(): { corpus: Corpus; store: RecordStore } {
    const { plan } = this;
    const store = new RecordStore();
    const windowEnd = minDate(plan.window.end, plan.now);
    const windowStart = minDate(plan.window.start, windowEnd);
    const departments = Object.keys(this.catalog.departments);

    for (let o = 0; o < plan.organizations; o++) {
      const org = this.addOrganization(store, o, windowStart);
      const orgDepartments: string[] = [];
      const taggable: TaggableTask[] = [];

      const teamCount = between(this.rng, plan.teamsPerOrg);
      for (let t = 0; t < teamCount; t++) {
        const department = departments[t % departments.length];
        const deptCatalog = this.catalog.departments[department];
        if (!orgDepartments.includes(department)) orgDepartments.push(department);
        const team = store.teams.insert((id) => ({
          id,
          organizationId: org.id,
          name: pick(this.rng, deptCatalog.teams),
          department,
        }));

        const members: User[] = [];
        const userCount = between(this.rng, plan.usersPerTeam);
        for (let u = 0; u < userCount; u++) {
          members.push(this.addUser(store, org, team));
        }

        const projectCount = between(this.rng, plan.projectsPerTeam);
        for (let p = 0; p < projectCount; p++) {
          const project = this.addProject(store, team, deptCatalog, windowStart, windowEnd, plan.now);
          const segment: Segment = { department, workItemType: project.workItemType };
          const sections = this.addSections(store, project, segment);
          const taskCount = between(this.rng, plan.tasksPerProject);
          const projectStart = new Date(project.startDate);
          const series = dailyCreationSeries(this.rng, this.deps.config.profiles, segment, projectStart, windowEnd);

          for (let k = 0; k < taskCount; k++) {
            const day = series.length > 0
              ? series[weightedIndex(this.rng, series.map((s) => s.value))].date
              : projectStart;
            const task = this.addTask(
              store, project, sections, segment, deptCatalog, team, members, day, projectStart, plan.now
            );
            taggable.push({ taskId: task.id, deptCatalog });
          }
        }
      }

      this.addTags(store, org, orgDepartments, taggable);
    }

    const corpus = store.snapshot({
      generatedAt: new Date().toISOString(),
      now: plan.now.toISOString(),
      seed: plan.seed,
    });
    return { corpus, store };
  }

  private addOrganization(store: RecordStore, index: number, windowStart: Date): Organization {
    const companies = this.catalog.companies;
    const company = companies[index % companies.length];
    const round = Math.floor(index / companies.length);
    return store.organizations.insert((id) => ({
      id,
      name: round === 0 ? company.name : `${company.name} ${round + 1}`,
      domain: round === 0 ? company.domain : `${round + 1}.${company.domain}`,
      createdAt: addDays(startOfDay(windowStart), -between(this.rng, ORG_AGE_DAYS)).toISOString(),
    }));
  }

  private personName(): string {
    const names = this.deps.names;
    if (names && names.length > 0) return pick(this.rng, names);
    return `${pick(this.rng, this.catalog.firstNames)} ${pick(this.rng, this.catalog.lastNames)}`;
  }

  private addUser(store: RecordStore, org: Organization, team: Team): User {
    const name = this.personName();
    return store.users.insert((id) => ({
      id,
      organizationId: org.id,
      teamId: team.id,
      name,
      // unique per user id
      email: `${emailLocalPart(name) || 'user'}.${id}@${org.domain}`,
      department: team.department,
    }));
  }

  private addProject(
    store: RecordStore,
    team: Team,
    deptCatalog: DepartmentCatalog,
    windowStart: Date,
    windowEnd: Date,
    now: Date
  ): Project {
    const types = Object.keys(deptCatalog.workItemTypes);
    const workItemType = types[weightedIndex(this.rng, types.map((t) => deptCatalog.workItemTypes[t]))];
    const start = startOfDay(
      minDate(this.deps.calendar.randomBusinessDayInRange(this.rng, windowStart, windowEnd), windowEnd)
    );
    const status = PROJECT_STATUSES[weightedIndex(this.rng, PROJECT_STATUS_WEIGHTS)];
    const plannedEnd = addDays(start, between(this.rng, PROJECT_LENGTH_DAYS));
    const endDate = status === 'active' ? plannedEnd : maxDate(start, minDate(plannedEnd, now));

    const name = fillTemplate(pick(this.rng, deptCatalog.projectTemplates), {
      team: team.name,
      number: randomInt(this.rng, 1, 40),
      topic: pick(this.rng, deptCatalog.topics),
      quarter: quarterOf(start),
      year: start.getUTCFullYear(),
    });

    return store.projects.insert((id) => ({
      id,
      organizationId: team.organizationId,
      teamId: team.id,
      name,
      department: team.department,
      workItemType,
      status,
      startDate: start.toISOString(),
      endDate: endDate.toISOString(),
    }));
  }

  private addSections(store: RecordStore, project: Project, segment: Segment): Section[] {
    return sectionNamesFor(this.catalog.sections, segment).map((name, position) =>
      store.sections.insert((id) => ({ id, projectId: project.id, name, position }))
    );
  }

  /** Completed tasks sit in the final section; open ones in any earlier section. */
  private sectionFor(sections: readonly Section[], completed: boolean): Section {
    const last = sections[sections.length - 1];
    if (completed || sections.length === 1) return last;
    return pick(this.rng, sections.slice(0, -1));
  }

  /**
   * One tag per name for every tag group of the organization's departments,
   * then per task at most one tag from each of its department's groups.
   */
  private addTags(
    store: RecordStore,
    org: Organization,
    departments: readonly string[],
    tasks: readonly TaggableTask[]
  ): void {
    const byName = new Map<string, number>();
    for (const department of departments) {
      for (const group of Object.values(this.catalog.departments[department].tagGroups)) {
        for (const name of group.tags) {
          if (byName.has(name)) continue;
          const tag = store.tags.insert((id) => ({
            id,
            organizationId: org.id,
            name,
            color: pick(this.rng, group.colors),
            createdAt: org.createdAt,
          }));
          byName.set(name, tag.id);
        }
      }
    }

    for (const { taskId, deptCatalog } of tasks) {
      for (const group of Object.values(deptCatalog.tagGroups)) {
        if (!chance(this.rng, group.usage)) continue;
        const tagId = byName.get(pick(this.rng, group.tags));
        if (tagId !== undefined) store.tagTask(taskId, tagId);
      }
    }
  }

  private dueDateFor(segment: Segment, createdAt: Date): Date | undefined {
    const buckets = workItemTypeProfile(this.deps.config.profiles, segment).dueDateBuckets;
    const bucket = buckets[weightedIndex(this.rng, buckets.map((b) => b.weight))];
    if (bucket.minDays === null || bucket.maxDays === null) return undefined;

    let due = addDays(createdAt, randomInt(this.rng, bucket.minDays, bucket.maxDays));
    if (!this.deps.calendar.isBusinessDay(due) && chance(this.rng, DUE_DATE_BUSINESS_DAY_BIAS)) {
      due = this.deps.calendar.nextBusinessDay(due);
    }
    return due;
  }

  private addTask(
    store: RecordStore,
    project: Project,
    sections: readonly Section[],
    segment: Segment,
    deptCatalog: DepartmentCatalog,
    team: Team,
    members: readonly User[],
    day: Date,
    projectStart: Date,
    now: Date
  ): Task {
    const createdAt = clampDate(
      this.clock.realisticTimestamp('task_creation', segment, day),
      projectStart,
      now
    );
    const dueDate = this.dueDateFor(segment, createdAt);
    const life = this.lifecycle.generate({ segment, createdAt, ...(dueDate ? { dueDate } : {}) });

    const unassigned = chance(this.rng, workItemTypeProfile(this.deps.config.profiles, segment).unassignedRate);
    const assignee = !unassigned && members.length > 0 ? pick(this.rng, members) : undefined;
    const name = fillTemplate(pick(this.rng, deptCatalog.taskTemplates), {
      topic: pick(this.rng, deptCatalog.topics),
      team: team.name,
    });
    const customFields = this.fields.generate(deptCatalog.customFields, {
      segment,
      createdAt,
      usage: deptCatalog.fieldUsage.map((f) => f.toLowerCase()),
    });

    const section = this.sectionFor(sections, life.completed);

    const task = store.tasks.insert((id) => ({
      id,
      projectId: project.id,
      sectionId: section.id,
      ...(assignee ? { assigneeId: assignee.id } : {}),
      name,
      ...lifecycleFields(life),
      customFields,
    }));

    this.addSubtasks(store, task, life, members, now);
    this.addComments(store, task, life, team, members, now);
    return task;
  }

  private addSubtasks(
    store: RecordStore,
    task: Task,
    life: LifecycleRecord,
    members: readonly User[],
    now: Date
  ): void {
    if (!chance(this.rng, SUBTASK_RATE)) return;
    const end = life.completedAt ?? now;
    const count = between(this.rng, SUBTASK_COUNT);

    for (let i = 0; i < count; i++) {
      const createdAt = pointBetween(this.rng, life.createdAt, end);
      const completed = life.completed && chance(this.rng, SUBTASK_COMPLETION_RATE);
      const completedAt = completed ? pointBetween(this.rng, createdAt, end) : undefined;
      const assigneeId = task.assigneeId ?? (members.length > 0 ? pick(this.rng, members).id : undefined);

      store.subtasks.insert((id) => ({
        id,
        taskId: task.id,
        ...(assigneeId !== undefined ? { assigneeId } : {}),
        name: `${pick(this.rng, this.catalog.subtaskTemplates)}: ${task.name}`,
        createdAt: createdAt.toISOString(),
        completed,
        ...(completedAt ? { completedAt: completedAt.toISOString() } : {}),
      }));
    }
  }

  private addComments(
    store: RecordStore,
    task: Task,
    life: LifecycleRecord,
    team: Team,
    members: readonly User[],
    now: Date
  ): void {
    if (members.length === 0) return;
    const count = between(this.rng, COMMENT_COUNT);
    const end = maxDate(life.createdAt, life.completedAt ?? now);

    for (let i = 0; i < count; i++) {
      const createdAt = clampDate(
        pointBetween(this.rng, addMinutes(life.createdAt, 1), end),
        life.createdAt,
        end
      );
      store.comments.insert((id) => ({
        id,
        taskId: task.id,
        authorId: pick(this.rng, members).id,
        body: fillTemplate(pick(this.rng, this.catalog.commentTemplates), { team: team.name, task: task.name }),
        createdAt: createdAt.toISOString(),
      }));
    }
  }
}

function lifecycleFields(life: LifecycleRecord): Omit<Task, 'id' | 'projectId' | 'sectionId' | 'assigneeId' | 'name' | 'customFields'> {
  return {
    createdAt: life.createdAt.toISOString(),
    ...(life.startedAt ? { startedAt: life.startedAt.toISOString() } : {}),
    ...(life.completedAt ? { completedAt: life.completedAt.toISOString() } : {}),
    ...(life.dueDate ? { dueDate: life.dueDate.toISOString() } : {}),
    completed: life.completed,
    overdue: life.overdue,
    ...(life.cycleTimeDays !== undefined ? { cycleTimeDays: life.cycleTimeDays } : {}),
    ...(life.leadTimeDays !== undefined ? { leadTimeDays: life.leadTimeDays } : {}),
  };
}
