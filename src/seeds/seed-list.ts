import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import * as cheerio from 'cheerio';

export type SeedFormat = 'html' | 'text';

const MAX_NAME_LENGTH = 80;
const NAME_PATTERN = /^[\p{L}][\p{L}'.\- ]*[\p{L}.]$/u;

function detectFormat(path: string, content: string): SeedFormat {
  const ext = extname(path).toLowerCase();
  if (ext === '.html' || ext === '.htm') return 'html';
  return content.trimStart().startsWith('<') ? 'html' : 'text';
}

function candidatesFromHtml(html: string): string[] {
  const $ = cheerio.load(html);
  $('script, style, noscript').remove();
  return $('li, td')
    .toArray()
    .map((el) => $(el).text());
}

function candidatesFromText(text: string): string[] {
  return text.split(/\r?\n/).filter((line) => !line.trimStart().startsWith('#'));
}

/** Person names from an HTML page (list items, table cells) or one-per-line text. */
export function parseSeedList(content: string, format: SeedFormat): string[] {
  const raw = format === 'html' ? candidatesFromHtml(content) : candidatesFromText(content);
  const seen = new Set<string>();
  const names: string[] = [];

  for (const candidate of raw) {
    const name = candidate.replace(/\s+/g, ' ').trim();
    if (name.length < 2 || name.length > MAX_NAME_LENGTH || !NAME_PATTERN.test(name)) continue;
    const key = name.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    names.push(name);
  }
  return names;
}

/**
 * Reads a seed list from disk. A missing or empty list yields `[]`,
 * and the generator then uses the catalog's names.
 */
export async function loadSeedList(path: string): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    console.warn(`  [warn] Seed list ${path} unreadable (${err instanceof Error ? err.message : String(err)}), using catalog names`);
    return [];
  }
  const names = parseSeedList(content, detectFormat(path, content));
  if (names.length === 0) {
    console.warn(`  [warn] Seed list ${path} has no usable names, using catalog names`);
  }
  return names;
}
