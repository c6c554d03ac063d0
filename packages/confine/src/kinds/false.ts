import { Confine } from '../confine.js';
import { ConfineKind, type ConfineSubject, type ConfineValue } from '../types.js';
import { countFailures } from './summaries.js';

/** Passes when the value is falsy. */
export class FalseConfine extends Confine {
  readonly kind = ConfineKind.False;

  /** Number of values that were not falsy. */
  static summarize(confines: ReadonlyArray<Confine>, subject: ConfineSubject): number {
    return countFailures(confines, subject);
  }

  pass(value: unknown): boolean {
    return !value;
  }

  message(): string {
    return 'true value when expecting false';
  }

  protected instantiate(values: ReadonlyArray<ConfineValue>): FalseConfine {
    return new FalseConfine(values, this.environment);
  }
}
