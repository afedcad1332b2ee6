import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fillTemplate } from '../content/templates.js';
import { OpenAiContentProvider, TemplateContentProvider, enrichCorpus, promptFor } from '../content/provider.js';
import type { ChatCompleter, ContentRequest } from '../content/provider.js';
import { loadSeedList, parseSeedList } from '../seeds/seed-list.js';
import { ScriptedRandom, smallCorpus } from './helpers.js';

const catalog = {
  descriptionTemplates: ['Deliver {task} for the {team} team.'],
  commentTemplates: ['{team}: update on {task}'],
};

const description: ContentRequest = {
  kind: 'taskDescription',
  taskName: 'Fix login',
  teamName: 'Platform',
  department: 'engineering',
  workItemType: 'bug_tracking',
};

function completer(reply: () => Promise<string | null>): ChatCompleter & { calls: number } {
  const fake: ChatCompleter & { calls: number } = {
    calls: 0,
    async complete(): Promise<string | null> {
      fake.calls += 1;
      return reply();
    },
  };
  return fake;
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('fillTemplate', () => {
  it('fills known placeholders and keeps unknown ones', () => {
    expect(fillTemplate('Ship {task} for {team} by {quarter}', { task: 'login', team: 'Platform' })).toBe(
      'Ship login for Platform by {quarter}'
    );
    expect(fillTemplate('Sprint {number}', { number: 4 })).toBe('Sprint 4');
  });
});

describe('TemplateContentProvider', () => {
  it('fills the template for the request kind', async () => {
    const provider = new TemplateContentProvider(catalog, new ScriptedRandom([0]));
    expect(await provider.generate(description)).toBe('Deliver Fix login for the Platform team.');
    expect(await provider.generate({ kind: 'commentBody', taskName: 'Fix login', teamName: 'Platform' })).toBe(
      'Platform: update on Fix login'
    );
  });
});

describe('OpenAiContentProvider', () => {
  const fallback = new TemplateContentProvider(catalog, new ScriptedRandom([0]));

  it('returns the trimmed completion', async () => {
    const provider = new OpenAiContentProvider(completer(async () => '  Reproduce the bug, then patch it.  '), fallback);
    expect(await provider.generate(description)).toBe('Reproduce the bug, then patch it.');
    expect(provider.failureCount).toBe(0);
  });

  it('falls back on errors and empty replies, warning once', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    let call = 0;
    const provider = new OpenAiContentProvider(
      completer(async () => {
        call += 1;
        if (call === 1) throw new Error('rate limited');
        return '   ';
      }),
      fallback
    );

    expect(await provider.generate(description)).toBe('Deliver Fix login for the Platform team.');
    expect(await provider.generate(description)).toBe('Deliver Fix login for the Platform team.');
    expect(provider.failureCount).toBe(2);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('  [warn] Content generation failed (rate limited), using template content');
  });

  it('describes the task in the prompt', () => {
    expect(promptFor(description)).toBe(
      'Write a task description for "Fix login", owned by the Platform team (engineering, bug tracking project).'
    );
  });
});

describe('enrichCorpus', () => {
  it('uses the provider up to the limit and the fallback after it', async () => {
    const corpus = smallCorpus();
    const fake = completer(async () => 'Written by the model.');
    const provider = new OpenAiContentProvider(fake, new TemplateContentProvider(catalog, new ScriptedRandom([0])));
    const fallback = new TemplateContentProvider(catalog, new ScriptedRandom([0]));

    const summary = await enrichCorpus(corpus, provider, fallback, { limit: 1 });

    expect(summary).toEqual({ descriptions: 12, comments: 1 });
    expect(fake.calls).toBe(2);
    expect(corpus.tasks[0].description).toBe('Written by the model.');
    expect(corpus.comments[0].body).toBe('Written by the model.');
    expect(corpus.tasks[1].description).toBe('Deliver Task number 2 for the Platform team.');
  });
});

describe('parseSeedList', () => {
  it('reads list items and table cells from HTML', () => {
    const html =
      '<ul><li>Ada Lane</li><li>ada lane</li><li>123</li></ul>' +
      '<table><tr><td>José Núñez</td><td>Siobhan O\'Brien</td></tr></table>' +
      '<script>var li = "Not A Name";</script>';
    expect(parseSeedList(html, 'html')).toEqual(['Ada Lane', 'José Núñez', "Siobhan O'Brien"]);
  });

  it('reads one name per line, skipping comments and noise', () => {
    const text = '# staff list\nGrace Hopper\n\n  Linus   Pauling \nX\nuser_42\n';
    expect(parseSeedList(text, 'text')).toEqual(['Grace Hopper', 'Linus Pauling']);
  });
});

describe('loadSeedList', () => {
  it('detects the format and reads the file', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'workgen-seeds-'));
    try {
      await writeFile(join(dir, 'names.txt'), 'Grace Hopper\nAda Lane\n');
      await writeFile(join(dir, 'names.html'), '<ol><li>Linus Pauling</li></ol>');
      expect(await loadSeedList(join(dir, 'names.txt'))).toEqual(['Grace Hopper', 'Ada Lane']);
      expect(await loadSeedList(join(dir, 'names.html'))).toEqual(['Linus Pauling']);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('returns no names for a missing file, with a warning', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    expect(await loadSeedList(join(tmpdir(), 'workgen-no-such-seed-list.txt'))).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
