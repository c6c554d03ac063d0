/**
 * Warden Kernel — Feature Confine Collection
 *
 * The confines guarding one declared feature of a resource type. For
 * example a feature `installable` that relies on a provider method
 * `install` holds a methods confine for `install`.
 *
 * The type owns one master collection per feature. Every capability bundle
 * and every provider works on clones, so a provider adding confines to a
 * feature never changes the type's definition or a sibling provider.
 */

import {
  DefinitionError,
  type ConfineSubject,
  type HostEnvironment,
} from '@warden/confine';
import { ConfineCollection } from './confine-collection.js';

export class FeatureConfineCollection extends ConfineCollection {
  readonly name: string;
  readonly docs: string;

  /**
   * @param name - Feature name
   * @param label - "<Type>.<feature>", copied onto every confine
   * @param docs - What the feature means, for generated documentation
   * @param environment - Host collaborators for the confines built here
   * @throws {DefinitionError} If name, label or docs is missing or empty
   */
  constructor(name: string, label: string, docs: string, environment: HostEnvironment) {
    super(label, environment);
    for (const [field, value] of [
      ['name', name],
      ['label', label],
      ['docs', docs],
    ] as const) {
      if (typeof value !== 'string' || value.trim() === '') {
        throw new DefinitionError(`A feature confine collection requires a ${field}`);
      }
    }
    this.name = name;
    this.docs = docs;
  }

  /** Same as valid(); reads better at call sites asking about a feature. */
  available(subject?: ConfineSubject): boolean {
    return this.valid(subject);
  }

  /**
   * Independent copy with the same name, label and docs. Every confine is
   * deep-copied: appending to the clone is never observable from the
   * original or from any other clone.
   */
  clone(): FeatureConfineCollection {
    const copy = new FeatureConfineCollection(this.name, this.label, this.docs, this.environment);
    copy.items.push(...this.items.map((c) => c.clone()));
    return copy;
  }
}
