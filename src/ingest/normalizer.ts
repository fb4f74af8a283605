import { readFileSync } from 'node:fs';
import { z } from 'zod';

const stopwordFileSchema = z.array(z.string());

function loadStopwords(file: URL): ReadonlySet<string> {
  const parsed = stopwordFileSchema.parse(JSON.parse(readFileSync(file, 'utf8')));
  return new Set(parsed.map((w) => w.toLowerCase()));
}

export const DEFAULT_STOPWORDS = loadStopwords(new URL('../../data/stopwords.json', import.meta.url));
export const DEFAULT_MIN_WORD_LENGTH = 4;

export interface NormalizeOptions {
  stopwords?: ReadonlySet<string>;
  minLength?: number;
}

/** Lower-cased runs of letters, in order. Nothing is dropped. */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/\p{L}+/gu) ?? [];
}

export function normalize(text: string, options: NormalizeOptions = {}): string[] {
  const stopwords = options.stopwords ?? DEFAULT_STOPWORDS;
  const minLength = options.minLength ?? DEFAULT_MIN_WORD_LENGTH;
  return tokenize(text).filter((w) => w.length >= minLength && !stopwords.has(w));
}

/** Occurrences per word, keyed in first-seen order. */
export function countWords(words: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const w of words) counts.set(w, (counts.get(w) ?? 0) + 1);
  return counts;
}
