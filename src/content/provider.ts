import OpenAI from 'openai';
import type { Catalog } from '../config/schemas.js';
import type { Corpus } from '../corpus/types.js';
import { pick } from '../sampling/random.js';
import type { RandomSource } from '../sampling/random.js';
import { fillTemplate } from './templates.js';

export type ContentRequest =
  | { kind: 'taskDescription'; taskName: string; teamName: string; department: string; workItemType: string }
  | { kind: 'commentBody'; taskName: string; teamName: string };

export interface ContentProvider {
  readonly name: string;
  generate(request: ContentRequest): Promise<string>;
}

export class TemplateContentProvider implements ContentProvider {
  readonly name = 'template';

  constructor(
    private readonly catalog: Pick<Catalog, 'descriptionTemplates' | 'commentTemplates'>,
    private readonly rng: RandomSource
  ) {}

  async generate(request: ContentRequest): Promise<string> {
    const templates =
      request.kind === 'taskDescription' ? this.catalog.descriptionTemplates : this.catalog.commentTemplates;
    return fillTemplate(pick(this.rng, templates), { task: request.taskName, team: request.teamName });
  }
}

/** The one chat call the OpenAI provider needs; tests pass a fake. */
export interface ChatCompleter {
  complete(system: string, user: string): Promise<string | null>;
}

export function openAiCompleter(apiKey: string, model: string, temperature: number): ChatCompleter {
  const client = new OpenAI({ apiKey });
  return {
    async complete(system, user) {
      const response = await client.chat.completions.create({
        model,
        temperature,
        max_tokens: 160,
        messages: [
          { role: 'system', content: system },
          { role: 'user', content: user },
        ],
      });
      return response.choices[0]?.message?.content ?? null;
    },
  };
}

const SYSTEM_PROMPT =
  'You write short, realistic text for a project-management tool used by a mid-size company. ' +
  'Reply with the text only: no quotes, no markdown, at most three sentences.';

export function promptFor(request: ContentRequest): string {
  if (request.kind === 'taskDescription') {
    return (
      `Write a task description for "${request.taskName}", owned by the ${request.teamName} team ` +
      `(${request.department}, ${request.workItemType.replace(/_/g, ' ')} project).`
    );
  }
  return `Write a one-line comment a teammate on ${request.teamName} might leave on the task "${request.taskName}".`;
}

/**
 * Chat-completion content. Any failed or empty completion is replaced
 * by the fallback provider's text.
 */
export class OpenAiContentProvider implements ContentProvider {
  readonly name = 'openai';
  private failures = 0;

  constructor(
    private readonly completer: ChatCompleter,
    private readonly fallback: ContentProvider
  ) {}

  get failureCount(): number {
    return this.failures;
  }

  async generate(request: ContentRequest): Promise<string> {
    try {
      const text = (await this.completer.complete(SYSTEM_PROMPT, promptFor(request)))?.trim();
      if (text) return text;
      throw new Error('empty completion');
    } catch (err) {
      this.failures += 1;
      if (this.failures === 1) {
        console.warn(
          `  [warn] Content generation failed (${err instanceof Error ? err.message : String(err)}), ` +
          `using ${this.fallback.name} content`
        );
      }
      return this.fallback.generate(request);
    }
  }
}

export interface EnrichOptions {
  /** Tasks past this index get `fallback` content instead of `provider` content. */
  limit?: number;
}

export interface EnrichSummary {
  descriptions: number;
  comments: number;
}

/** Fills task descriptions and rewrites comment bodies in place. */
export async function enrichCorpus(
  corpus: Corpus,
  provider: ContentProvider,
  fallback: ContentProvider,
  options: EnrichOptions = {}
): Promise<EnrichSummary> {
  const limit = options.limit ?? Number.POSITIVE_INFINITY;
  const projects = new Map(corpus.projects.map((p) => [p.id, p]));
  const teams = new Map(corpus.teams.map((t) => [t.id, t]));
  const commentsByTask = new Map<number, Corpus['comments']>();
  for (const comment of corpus.comments) {
    const list = commentsByTask.get(comment.taskId) ?? [];
    list.push(comment);
    commentsByTask.set(comment.taskId, list);
  }

  const summary: EnrichSummary = { descriptions: 0, comments: 0 };
  for (const [index, task] of corpus.tasks.entries()) {
    const project = projects.get(task.projectId);
    if (!project) continue;
    const teamName = teams.get(project.teamId)?.name ?? project.name;
    const source = index < limit ? provider : fallback;

    task.description = await source.generate({
      kind: 'taskDescription',
      taskName: task.name,
      teamName,
      department: project.department,
      workItemType: project.workItemType,
    });
    summary.descriptions += 1;

    for (const comment of commentsByTask.get(task.id) ?? []) {
      comment.body = await source.generate({ kind: 'commentBody', taskName: task.name, teamName });
      summary.comments += 1;
    }
  }
  return summary;
}
