/** Two-outcome return value of every adapter call. */
export type Result<T> = { ok: true; value: T } | { ok: false; error: Error };

/** Outcome of one stage in a fallback chain; miss and error both advance. */
export type StageOutcome<T> = { kind: 'hit'; value: T } | { kind: 'miss' } | { kind: 'error'; error: Error };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(error: unknown): Result<T> {
  return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
}

export async function settle<T>(fn: () => T | Promise<T>): Promise<Result<T>> {
  try {
    return ok(await fn());
  } catch (error) {
    return fail(error);
  }
}

export const hit = <T>(value: T): StageOutcome<T> => ({ kind: 'hit', value });
export const miss = <T>(): StageOutcome<T> => ({ kind: 'miss' });
export const stageError = <T>(error: Error): StageOutcome<T> => ({ kind: 'error', error });

export interface Stage<I, T> {
  name: string;
  run(input: I): Promise<StageOutcome<T>>;
}

export interface ChainResult<T> {
  value: T | null;
  /** stage that produced the value, null when every stage missed or failed */
  stage: string | null;
  errors: Array<{ stage: string; error: Error }>;
}

/** Runs stages in order until one hits. */
export async function runChain<I, T>(stages: Array<Stage<I, T>>, input: I): Promise<ChainResult<T>> {
  const errors: Array<{ stage: string; error: Error }> = [];
  for (const stage of stages) {
    const outcome = await stage.run(input);
    if (outcome.kind === 'hit') return { value: outcome.value, stage: stage.name, errors };
    if (outcome.kind === 'error') errors.push({ stage: stage.name, error: outcome.error });
  }
  return { value: null, stage: null, errors };
}
