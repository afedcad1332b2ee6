import type {
  Comment,
  Corpus,
  Organization,
  Project,
  Section,
  Subtask,
  Tag,
  Task,
  TaskTag,
  Team,
  User,
} from './types.js';

/** Append-only rows with sequential ids starting at 1. */
export class Table<T extends { id: number }> {
  private readonly rows: T[] = [];
  private nextId = 1;

  insert(build: (id: number) => T): T {
    const row = build(this.nextId);
    this.nextId += 1;
    this.rows.push(row);
    return row;
  }

  get(id: number): T | undefined {
    return this.rows[id - 1];
  }

  all(): readonly T[] {
    return this.rows;
  }

  get size(): number {
    return this.rows.length;
  }
}

export type CorpusMeta = Pick<Corpus, 'generatedAt' | 'now' | 'seed'>;

/**
 * In-memory record store. Parents are inserted before children, so a
 * child's foreign key always names an id the store has already issued.
 */
export class RecordStore {
  readonly organizations = new Table<Organization>();
  readonly teams = new Table<Team>();
  readonly users = new Table<User>();
  readonly projects = new Table<Project>();
  readonly sections = new Table<Section>();
  readonly tasks = new Table<Task>();
  readonly subtasks = new Table<Subtask>();
  readonly comments = new Table<Comment>();
  readonly tags = new Table<Tag>();
  private readonly taskTags = new Map<string, TaskTag>();

  /** Links a tag to a task; a repeated pair is ignored. Returns whether a link was added. */
  tagTask(taskId: number, tagId: number): boolean {
    const key = `${taskId}:${tagId}`;
    if (this.taskTags.has(key)) return false;
    this.taskTags.set(key, { taskId, tagId });
    return true;
  }

  counts(): Record<string, number> {
    return {
      organizations: this.organizations.size,
      teams: this.teams.size,
      users: this.users.size,
      projects: this.projects.size,
      sections: this.sections.size,
      tasks: this.tasks.size,
      subtasks: this.subtasks.size,
      comments: this.comments.size,
      tags: this.tags.size,
      taskTags: this.taskTags.size,
    };
  }

  snapshot(meta: CorpusMeta): Corpus {
    return {
      ...meta,
      organizations: [...this.organizations.all()],
      teams: [...this.teams.all()],
      users: [...this.users.all()],
      projects: [...this.projects.all()],
      sections: [...this.sections.all()],
      tasks: [...this.tasks.all()],
      subtasks: [...this.subtasks.all()],
      comments: [...this.comments.all()],
      tags: [...this.tags.all()],
      taskTags: [...this.taskTags.values()],
    };
  }
}
