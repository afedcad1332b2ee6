import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { CorpusReadError } from '../validation/validate-corpus.js';
import type { CorpusSource } from '../validation/validate-corpus.js';
import type { Corpus } from './types.js';

const id = z.number().int().positive();
const timestamp = z.string().min(1);
const customValue = z.union([z.string(), z.number(), z.boolean()]);

const CorpusSchema = z.object({
  generatedAt: timestamp,
  now: timestamp,
  seed: z.number().int(),
  organizations: z.array(z.object({ id, name: z.string(), domain: z.string(), createdAt: timestamp })),
  teams: z.array(z.object({ id, organizationId: id, name: z.string(), department: z.string() })),
  users: z.array(
    z.object({
      id,
      organizationId: id,
      teamId: id,
      name: z.string(),
      email: z.string(),
      department: z.string(),
    })
  ),
  projects: z.array(
    z.object({
      id,
      organizationId: id,
      teamId: id,
      name: z.string(),
      department: z.string(),
      workItemType: z.string(),
      status: z.enum(['active', 'completed', 'archived']),
      startDate: timestamp,
      endDate: timestamp.optional(),
    })
  ),
  sections: z.array(z.object({ id, projectId: id, name: z.string(), position: z.number().int().min(0) })),
  tasks: z.array(
    z.object({
      id,
      projectId: id,
      sectionId: id,
      assigneeId: id.optional(),
      name: z.string(),
      description: z.string().optional(),
      createdAt: timestamp,
      startedAt: timestamp.optional(),
      completedAt: timestamp.optional(),
      dueDate: timestamp.optional(),
      completed: z.boolean(),
      overdue: z.boolean(),
      cycleTimeDays: z.number().optional(),
      leadTimeDays: z.number().optional(),
      customFields: z.record(customValue),
    })
  ),
  subtasks: z.array(
    z.object({
      id,
      taskId: id,
      assigneeId: id.optional(),
      name: z.string(),
      createdAt: timestamp,
      completed: z.boolean(),
      completedAt: timestamp.optional(),
    })
  ),
  comments: z.array(z.object({ id, taskId: id, authorId: id, body: z.string(), createdAt: timestamp })),
  tags: z.array(z.object({ id, organizationId: id, name: z.string(), color: z.string(), createdAt: timestamp })),
  taskTags: z.array(z.object({ taskId: id, tagId: id })),
});

export async function writeCorpus(path: string, corpus: Corpus): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(corpus, null, 2));
}

/** Reads a corpus written by `writeCorpus`; every fault surfaces as `CorpusReadError`. */
export class FileCorpusSource implements CorpusSource {
  constructor(private readonly path: string) {}

  describe(): string {
    return this.path;
  }

  async read(): Promise<Corpus> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (err) {
      throw new CorpusReadError(`Cannot read corpus ${this.path}: ${err instanceof Error ? err.message : String(err)}`, err);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new CorpusReadError(`Corpus ${this.path} is not valid JSON`, err);
    }

    const parsed = CorpusSchema.safeParse(json);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      throw new CorpusReadError(
        `Corpus ${this.path} is malformed at ${first.path.join('.')}: ${first.message}`,
        parsed.error
      );
    }
    return parsed.data;
  }
}

/** Wraps an already materialised corpus, as the generate command validates in-process. */
export class MemoryCorpusSource implements CorpusSource {
  constructor(private readonly corpus: Corpus) {}

  describe(): string {
    return 'in-memory corpus';
  }

  async read(): Promise<Corpus> {
    return this.corpus;
  }
}
