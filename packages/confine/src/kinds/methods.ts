import { Confine, describeValue } from '../confine.js';
import { ConfineKind, type ConfineSubject, type ConfineValue } from '../types.js';
import { uniqueFailingValues } from './summaries.js';

/**
 * Passes when the subject exposes a callable with the given name.
 *
 * The check depends on what the subject is:
 * - a class (constructor): the method must be defined on its prototype
 *   chain, i.e. every instance would have it;
 * - an instance: the property must be invokable right now, which also
 *   covers methods attached to the instance itself.
 *
 * No subject means no methods.
 */
export class MethodsConfine extends Confine {
  readonly kind = ConfineKind.Methods;

  /** Missing method names across every confine of this kind, deduplicated. */
  static summarize(
    confines: ReadonlyArray<Confine>,
    subject: ConfineSubject,
  ): ReadonlyArray<string> {
    return uniqueFailingValues(confines, subject);
  }

  pass(value: unknown, subject?: ConfineSubject): boolean {
    if (typeof value !== 'string' || subject === undefined) return false;
    return methodAvailable(value, subject);
  }

  message(value: unknown): string {
    return `method ${describeValue(value)} is missing`;
  }

  protected instantiate(values: ReadonlyArray<ConfineValue>): MethodsConfine {
    return new MethodsConfine(values, this.environment);
  }
}

function methodAvailable(name: string, subject: object): boolean {
  if (typeof subject === 'function') {
    const prototype: unknown = Reflect.get(subject, 'prototype');
    return (
      typeof prototype === 'object' &&
      prototype !== null &&
      name !== 'constructor' &&
      typeof Reflect.get(prototype, name) === 'function'
    );
  }
  return name !== 'constructor' && typeof Reflect.get(subject, name) === 'function';
}
