import { Confine, describeValue } from '../confine.js';
import { ConfineKind, type ConfineSubject, type ConfineValue } from '../types.js';
import { uniqueFailingValues } from './summaries.js';

/**
 * Passes when the named process-wide global feature is available, as
 * reported by the host environment (e.g. "is the libshadow binding
 * installed"). Not to be confused with the per-type features a resource
 * type declares.
 */
export class FeatureConfine extends Confine {
  readonly kind = ConfineKind.Feature;

  /** Missing global feature names, deduplicated. */
  static summarize(
    confines: ReadonlyArray<Confine>,
    subject: ConfineSubject,
  ): ReadonlyArray<string> {
    return uniqueFailingValues(confines, subject);
  }

  pass(value: unknown): boolean {
    return typeof value === 'string' && value !== '' && this.environment.globalFeatureAvailable(value);
  }

  message(value: unknown): string {
    return `feature ${describeValue(value)} is missing`;
  }

  protected instantiate(values: ReadonlyArray<ConfineValue>): FeatureConfine {
    return new FeatureConfine(values, this.environment);
  }
}
