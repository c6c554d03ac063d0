import { Confine } from '../confine.js';
import { ConfineKind, type ConfineSubject, type ConfineValue } from '../types.js';
import { countFailures } from './summaries.js';

/**
 * Passes when the value is truthy. Usually given a thunk so the check runs
 * at evaluation time: `{ true: () => process.getuid?.() === 0 }`.
 */
export class TrueConfine extends Confine {
  readonly kind = ConfineKind.True;

  /** Number of values that were not truthy. */
  static summarize(confines: ReadonlyArray<Confine>, subject: ConfineSubject): number {
    return countFailures(confines, subject);
  }

  pass(value: unknown): boolean {
    return Boolean(value);
  }

  message(): string {
    return 'false value when expecting true';
  }

  protected instantiate(values: ReadonlyArray<ConfineValue>): TrueConfine {
    return new TrueConfine(values, this.environment);
  }
}
