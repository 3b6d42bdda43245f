/**
 * Aggregate classification for tagged per-item results (fetches, uploads).
 * Every result carries an `ok` discriminant.
 */

export type OutcomeClass = 'all_failed' | 'some_failed' | 'all_succeeded';

/**
 * An empty list is classified as all_failed: there is nothing to advance with.
 */
export function classifyOutcomes(outcomes: ReadonlyArray<{ ok: boolean }>): OutcomeClass {
  const successCount = outcomes.filter(o => o.ok).length;
  if (successCount === 0) return 'all_failed';
  if (successCount === outcomes.length) return 'all_succeeded';
  return 'some_failed';
}

export function successes<T extends { ok: boolean }>(outcomes: readonly T[]): Array<Extract<T, { ok: true }>> {
  return outcomes.filter((o): o is Extract<T, { ok: true }> => o.ok);
}

export function failures<T extends { ok: boolean }>(outcomes: readonly T[]): Array<Extract<T, { ok: false }>> {
  return outcomes.filter((o): o is Extract<T, { ok: false }> => !o.ok);
}
