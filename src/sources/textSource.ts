import { type Result, settle } from '../utils/result.js';

export interface TextSource {
  fetchPassage(): Promise<Result<string>>;
}

/** Fetches one passage of plain text per call, e.g. from metaphorpsum.com. */
export function createHttpTextSource(url: string, timeoutMs: number): TextSource {
  return {
    fetchPassage() {
      return settle(async () => {
        const res = await fetch(url, { redirect: 'follow', signal: AbortSignal.timeout(timeoutMs) });
        if (!res.ok) throw new Error(`Text source fetch failed: ${res.status}`);
        const text = (await res.text()).trim();
        if (!text) throw new Error('Text source returned an empty body');
        return text;
      });
    }
  };
}
