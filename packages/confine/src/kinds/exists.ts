import { Confine, describeValue } from '../confine.js';
import { ConfineKind, type ConfineSubject, type ConfineValue } from '../types.js';
import { failingValues } from './summaries.js';

/**
 * Passes when the value names an existing path.
 *
 * With `forBinary` set the value is an executable name looked up on the
 * search path (`{ exists: 'apt-get', for_binary: true }`); otherwise it is a
 * literal path checked on the file system. An empty or non-string value
 * never passes.
 */
export class ExistsConfine extends Confine {
  readonly kind = ConfineKind.Exists;

  /**
   * The values that did not exist, across every confine of this kind.
   * Used to report missing files and binaries by name.
   */
  static summarize(
    confines: ReadonlyArray<Confine>,
    subject: ConfineSubject,
  ): ReadonlyArray<string> {
    return failingValues(confines, subject);
  }

  pass(value: unknown): boolean {
    if (typeof value !== 'string' || value === '') return false;
    return this.forBinary
      ? this.environment.findOnSearchPath(value) !== null
      : this.environment.pathExists(value);
  }

  message(value: unknown): string {
    return this.forBinary
      ? `binary ${describeValue(value)} is not on the search path`
      : `file ${describeValue(value)} does not exist`;
  }

  protected instantiate(values: ReadonlyArray<ConfineValue>): ExistsConfine {
    return new ExistsConfine(values, this.environment);
  }
}
