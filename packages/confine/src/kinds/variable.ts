import { Confine, describeValue } from '../confine.js';
import {
  ConfineKind,
  type ConfineSubject,
  type ConfineValue,
  type HostEnvironment,
} from '../types.js';

/**
 * Fallback kind for criteria keys that are not confine kinds: the key is a
 * fact name and the confine passes when the fact's current value is one of
 * the candidate values.
 *
 *   { osfamily: ['debian', 'ubuntu'] }   // osfamily must be debian OR ubuntu
 *
 * Unlike the other kinds this is a membership test, so the confine is valid
 * when ANY value matches. String comparison is case-insensitive. A boolean
 * fact matches `true`/`false` values as well as their string spellings. An
 * absent fact never matches.
 */
export class VariableConfine extends Confine {
  readonly kind = ConfineKind.Variable;

  constructor(
    values: ConfineValue | ReadonlyArray<ConfineValue>,
    environment: HostEnvironment,
    readonly factName: string,
  ) {
    super(values, environment);
  }

  /**
   * Fact name -> required values, for every failing confine of this kind.
   */
  static summarize(
    confines: ReadonlyArray<Confine>,
    subject: ConfineSubject,
  ): Readonly<Record<string, ReadonlyArray<string>>> {
    const result: Record<string, string[]> = {};
    for (const confine of confines) {
      if (!(confine instanceof VariableConfine) || confine.valid(subject)) continue;
      const required = confine.values.map((v) => describeValue(v));
      result[confine.factName] = [...(result[confine.factName] ?? []), ...required];
    }
    return result;
  }

  pass(value: unknown): boolean {
    const actual = this.environment.factValue(this.factName);
    if (actual === undefined) return false;
    if (typeof actual === 'boolean' && typeof value === 'boolean') {
      return actual === value;
    }
    if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') {
      return false;
    }
    return String(actual).toLowerCase() === String(value).toLowerCase();
  }

  valid(subject?: ConfineSubject): boolean {
    return this.evaluate(subject).some((o) => o.passed);
  }

  failures(subject?: ConfineSubject): ReadonlyArray<string> {
    return this.valid(subject) ? [] : [`${this.label}: ${this.message()}`];
  }

  message(): string {
    const actual = this.environment.factValue(this.factName);
    const required = this.values.map((v) => describeValue(v)).join(',');
    return `fact value '${actual === undefined ? '' : String(actual)}' for '${this.factName}' not in required list '${required}'`;
  }

  protected instantiate(values: ReadonlyArray<ConfineValue>): VariableConfine {
    return new VariableConfine(values, this.environment, this.factName);
  }
}
