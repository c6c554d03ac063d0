/**
 * Warden Confine — Confine Base Class
 *
 * A confine is a single predicate check holding one or more candidate
 * values. Each concrete kind decides how one value passes against a
 * subject; the base class owns value normalization, the evaluation
 * protocol, the outcome cache and deep copying.
 *
 * Evaluation protocol:
 * 1. Resolve each value (a zero-argument function is called; anything else
 *    is used as-is).
 * 2. Test it with the kind's pass().
 * 3. Cache the outcome vector so failures and summaries can name the
 *    specific values that failed.
 * 4. The confine is valid iff every outcome is true.
 *
 * Evaluation never throws for an environment finding. A missing file, an
 * absent fact or an unavailable method is an ordinary `false` outcome.
 */

import {
  DefinitionError,
  type ConfineKind,
  type ConfineSubject,
  type ConfineValue,
  type HostEnvironment,
} from './types.js';

/** One evaluated value: the resolved value and whether it passed. */
export interface ConfineOutcome {
  readonly value: unknown;
  readonly passed: boolean;
}

export abstract class Confine {
  abstract readonly kind: ConfineKind;

  /** Candidate values, always a non-empty array. */
  readonly values: ReadonlyArray<ConfineValue>;

  /** "Type.feature" or provider identity; diagnostics only. */
  label = '';

  /**
   * Resolve `exists` values on the search path instead of the file system.
   * Other kinds ignore it.
   */
  forBinary = false;

  private lastOutcomes: ReadonlyArray<ConfineOutcome> = [];

  /**
   * @param values - One value or an array of values. A scalar is wrapped.
   * @param environment - Host collaborators consulted by pass()
   * @throws {DefinitionError} If no value is given
   */
  constructor(
    values: ConfineValue | ReadonlyArray<ConfineValue>,
    protected readonly environment: HostEnvironment,
  ) {
    const list: ConfineValue[] = Array.isArray(values) ? [...values] : [values];
    if (list.length === 0) {
      throw new DefinitionError(`A ${new.target.name} requires at least one value`);
    }
    this.values = list;
  }

  /**
   * Test a single resolved value against the subject.
   */
  abstract pass(value: unknown, subject?: ConfineSubject): boolean;

  /**
   * Human-readable reason a single resolved value failed.
   */
  abstract message(value: unknown): string;

  /**
   * Build a fresh confine of the same kind over the given values.
   * Used by clone(); label and forBinary are copied by the caller.
   */
  protected abstract instantiate(values: ReadonlyArray<ConfineValue>): Confine;

  /**
   * Evaluate every value against the subject and cache the outcomes.
   *
   * @returns The outcome of each value, in declaration order
   */
  evaluate(subject?: ConfineSubject): ReadonlyArray<ConfineOutcome> {
    this.lastOutcomes = this.values.map((raw) => {
      const value = resolveValue(raw);
      return { value, passed: this.pass(value, subject) };
    });
    return this.lastOutcomes;
  }

  /**
   * Whether every value passes against the subject.
   */
  valid(subject?: ConfineSubject): boolean {
    return this.evaluate(subject).every((o) => o.passed);
  }

  /**
   * The outcome vector of the most recent evaluation. Empty before the
   * first call to valid() or evaluate().
   */
  outcomes(): ReadonlyArray<boolean> {
    return this.lastOutcomes.map((o) => o.passed);
  }

  /**
   * Failure messages for the values that do not pass, prefixed with the
   * label. Evaluates first.
   */
  failures(subject?: ConfineSubject): ReadonlyArray<string> {
    return this.evaluate(subject)
      .filter((o) => !o.passed)
      .map((o) => `${this.label}: ${this.message(o.value)}`);
  }

  /**
   * Deep copy. The copy owns a new values array, keeps the label and the
   * binary flag, and starts with an empty outcome cache.
   */
  clone(): Confine {
    const copy = this.instantiate([...this.values]);
    copy.label = this.label;
    copy.forBinary = this.forBinary;
    return copy;
  }
}

/**
 * Resolve a candidate value: thunks are called, everything else passes
 * through unchanged.
 */
export function resolveValue(value: ConfineValue): unknown {
  if (typeof value === 'function' && value.length === 0) {
    const result: unknown = value();
    return result;
  }
  return value;
}

/**
 * Render a resolved value for a diagnostic message.
 */
export function describeValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined) return 'undefined';
  if (typeof value === 'function') return value.name !== '' ? value.name : '<function>';
  if (typeof value === 'bigint' || typeof value === 'symbol') return value.toString();
  return JSON.stringify(value);
}
