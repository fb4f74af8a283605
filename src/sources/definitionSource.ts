import { z } from 'zod';
import { type Result, settle } from '../utils/result.js';

export interface DefinitionSource {
  /** `null` when the source knows no such word. */
  lookup(word: string): Promise<Result<string | null>>;
}

// dictionaryapi.dev: [{ word, meanings: [{ partOfSpeech, definitions: [{ definition }] }] }]
const dictionaryEntriesSchema = z
  .array(
    z.object({
      meanings: z
        .array(
          z.object({
            definitions: z.array(z.object({ definition: z.string().trim().min(1) })).min(1)
          })
        )
        .min(1)
    })
  )
  .min(1);

export function firstDefinition(payload: unknown): string {
  const parsed = dictionaryEntriesSchema.safeParse(payload);
  if (!parsed.success) {
    throw new Error(`Malformed dictionary response: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`);
  }
  return parsed.data[0].meanings[0].definitions[0].definition;
}

export function createHttpDefinitionSource(baseUrl: string, timeoutMs: number): DefinitionSource {
  return {
    lookup(word) {
      return settle(async () => {
        const res = await fetch(`${baseUrl}/${encodeURIComponent(word)}`, {
          headers: { Accept: 'application/json' },
          signal: AbortSignal.timeout(timeoutMs)
        });
        if (res.status === 404) return null;
        if (!res.ok) throw new Error(`Dictionary lookup failed for "${word}": ${res.status}`);
        return firstDefinition(await res.json());
      });
    }
  };
}
