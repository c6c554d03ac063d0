/**
 * Shared aggregation helpers for the per-kind summarize() functions.
 *
 * Every helper re-evaluates the confines it is given, so a summary never
 * reports a stale outcome cache. None of them throws.
 */

import { describeValue, type Confine } from '../confine.js';
import type { ConfineSubject } from '../types.js';

/** Total number of failing values across all confines. */
export function countFailures(
  confines: ReadonlyArray<Confine>,
  subject: ConfineSubject,
): number {
  return confines.reduce(
    (count, confine) => count + confine.evaluate(subject).filter((o) => !o.passed).length,
    0,
  );
}

/** Failing values of every confine, concatenated in declaration order. */
export function failingValues(
  confines: ReadonlyArray<Confine>,
  subject: ConfineSubject,
): ReadonlyArray<string> {
  return confines.flatMap((confine) =>
    confine
      .evaluate(subject)
      .filter((o) => !o.passed)
      .map((o) => describeValue(o.value)),
  );
}

/** Failing values of every confine, deduplicated, first occurrence wins. */
export function uniqueFailingValues(
  confines: ReadonlyArray<Confine>,
  subject: ConfineSubject,
): ReadonlyArray<string> {
  return Array.from(new Set(failingValues(confines, subject)));
}
