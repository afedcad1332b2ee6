import type { RandomSource } from '../sampling/random.js';
import type { Corpus, Task } from '../corpus/types.js';

/** Replays `values` in order, then repeats the last one. */
export class ScriptedRandom implements RandomSource {
  private index = 0;

  constructor(private readonly values: number[]) {}

  next(): number {
    const value = this.values[Math.min(this.index, this.values.length - 1)];
    this.index += 1;
    return value;
  }

  get calls(): number {
    return this.index;
  }
}

/**
 * One engineering sprint project with two sections and twelve tasks,
 * seven of them completed (in "Done"), each due two days after creation.
 * Tasks 1 and 2 carry the organization's one tag.
 */
export function smallCorpus(): Corpus {
  const tasks: Task[] = Array.from({ length: 12 }, (_, i) => {
    const hour = String(10 + (i % 8)).padStart(2, '0');
    const day = 6 + Math.floor(i / 8);
    const createdAt = `2026-01-0${day}T${hour}:00:00.000Z`;
    const completed = i < 7;
    return {
      id: i + 1,
      projectId: 1,
      sectionId: completed ? 2 : 1,
      assigneeId: (i % 2) + 1,
      name: `Task number ${i + 1}`,
      createdAt,
      dueDate: `2026-01-0${day + 2}T${hour}:00:00.000Z`,
      completed,
      overdue: false,
      ...(completed
        ? {
            startedAt: `2026-01-0${day}T${hour}:30:00.000Z`,
            completedAt: `2026-01-0${day}T${hour}:59:00.000Z`,
          }
        : {}),
      customFields: {},
    };
  });

  return {
    generatedAt: '2026-01-15T12:00:05.000Z',
    now: '2026-01-15T12:00:00.000Z',
    seed: 42,
    organizations: [{ id: 1, name: 'Northwind', domain: 'northwind.example', createdAt: '2025-01-01T00:00:00.000Z' }],
    teams: [{ id: 1, organizationId: 1, name: 'Platform', department: 'engineering' }],
    users: [
      { id: 1, organizationId: 1, teamId: 1, name: 'Ada Lane', email: 'ada.lane.1@northwind.example', department: 'engineering' },
      { id: 2, organizationId: 1, teamId: 1, name: 'Ben Ortiz', email: 'ben.ortiz.2@northwind.example', department: 'engineering' },
    ],
    projects: [
      {
        id: 1,
        organizationId: 1,
        teamId: 1,
        name: 'Platform Sprint 1',
        department: 'engineering',
        workItemType: 'sprint',
        status: 'active',
        startDate: '2026-01-05T00:00:00.000Z',
      },
    ],
    sections: [
      { id: 1, projectId: 1, name: 'In Progress', position: 0 },
      { id: 2, projectId: 1, name: 'Done', position: 1 },
    ],
    tasks,
    subtasks: [
      { id: 1, taskId: 1, name: 'Write tests', createdAt: '2026-01-06T10:10:00.000Z', completed: false },
    ],
    comments: [
      { id: 1, taskId: 1, authorId: 2, body: 'Looks good', createdAt: '2026-01-06T10:20:00.000Z' },
    ],
    tags: [{ id: 1, organizationId: 1, name: 'backend', color: '#795548', createdAt: '2025-01-01T00:00:00.000Z' }],
    taskTags: [
      { taskId: 1, tagId: 1 },
      { taskId: 2, tagId: 1 },
    ],
  };
}
