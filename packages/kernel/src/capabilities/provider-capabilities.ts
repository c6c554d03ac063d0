/**
 * Warden Kernel — Provider Capabilities
 *
 * The capability operations of one provider, bound to its type's bundle:
 *
 * - hasCapability(name): declared, or confines satisfied
 * - capabilities(): every capability present, sorted
 * - satisfies(...names): all present, short-circuiting
 * - predicate(name) / predicates(): per-capability predicates
 * - declareCapabilities(...names): explicit support, independent of confines
 * - extendConfine(name, criteria): extra confines on this provider's copy
 *
 * Declaration always wins: a declared capability is present even when its
 * confines would fail.
 *
 * Queries on this object evaluate confines against the default subject
 * (the provider class). view(subject) answers the same queries against
 * another subject, e.g. a provider instance, sharing this provider's
 * declarations and private collections.
 */

import {
  DefinitionError,
  type ConfineCriteria,
  type ConfineSubject,
} from '@warden/confine';
import type { FeatureConfineCollection } from '../collections/feature-confine-collection.js';
import type { CapabilityBundle } from './bundle.js';
import {
  canonicalCapabilityName,
  flattenCapabilityNames,
  type CapabilityNames,
  type CapabilityQueries,
} from './queries.js';

export class ProviderCapabilities<F extends string = string> implements CapabilityQueries<F> {
  private readonly collections: Map<string, FeatureConfineCollection>;
  private readonly declaredNames: Set<string> = new Set();

  constructor(
    private readonly bundle: CapabilityBundle<F>,
    readonly providerName: string,
    private readonly defaultSubject?: ConfineSubject,
  ) {
    this.collections = bundle.cloneCollections();
  }

  // -------------------------------------------------------------------------
  // Declarations
  // -------------------------------------------------------------------------

  /**
   * Record that the provider supports the named capabilities regardless of
   * confines. Idempotent; accumulates across calls.
   */
  declareCapabilities(...names: ReadonlyArray<CapabilityNames>): void {
    const flat = flattenCapabilityNames(names);
    for (const name of flat) {
      this.declaredNames.add(name);
    }
    this.bundle.type.logger.record({
      event: 'capability.declared',
      type: this.bundle.type.name,
      provider: this.providerName,
      names: flat,
    });
  }

  isDeclared(name: string): boolean {
    return this.declaredNames.has(canonicalCapabilityName(name));
  }

  /** Declared capability names, sorted. */
  declared(): ReadonlyArray<string> {
    return Array.from(this.declaredNames).sort();
  }

  /**
   * Append confines to this provider's private copy of a capability.
   *
   * @throws {DefinitionError} If the type does not declare the capability.
   *   The capability is never created implicitly.
   */
  extendConfine(name: string, criteria: ConfineCriteria): void {
    const collection = this.collections.get(canonicalCapabilityName(name));
    if (collection === undefined) {
      throw new DefinitionError(
        `Unable to find capability ${name} on ${this.bundle.type.name} for provider ${this.providerName}`,
      );
    }
    collection.confine(criteria);
    this.bundle.type.logger.record({
      event: 'confine.extended',
      type: this.bundle.type.name,
      provider: this.providerName,
      names: [collection.name],
      detail: { confines: collection.size },
    });
  }

  /**
   * This provider's private collection for a capability. Inspection only.
   */
  collection(name: string): FeatureConfineCollection | undefined {
    return this.collections.get(canonicalCapabilityName(name));
  }

  // -------------------------------------------------------------------------
  // Evaluation
  // -------------------------------------------------------------------------

  /**
   * Whether the capability is present when evaluated against the subject.
   * Unknown, undeclared names are absent.
   */
  check(name: string, subject: ConfineSubject): boolean {
    const key = canonicalCapabilityName(name);
    if (this.declaredNames.has(key)) return true;
    return this.collections.get(key)?.available(subject) ?? false;
  }

  /** Capability queries evaluated against the given subject. */
  view(subject: ConfineSubject): CapabilityQueries<F> {
    return new CapabilityView(this, this.bundle, subject);
  }

  hasCapability(name: string): boolean {
    return this.check(name, this.defaultSubject);
  }

  capabilities(): ReadonlyArray<F> {
    return this.view(this.defaultSubject).capabilities();
  }

  satisfies(...names: ReadonlyArray<CapabilityNames>): boolean {
    return this.view(this.defaultSubject).satisfies(...names);
  }

  predicate(name: F): () => boolean {
    return this.view(this.defaultSubject).predicate(name);
  }

  predicates(): ReadonlyMap<F, () => boolean> {
    return this.view(this.defaultSubject).predicates();
  }
}

/**
 * Capability queries of one provider against one subject.
 */
class CapabilityView<F extends string> implements CapabilityQueries<F> {
  constructor(
    private readonly owner: ProviderCapabilities<F>,
    private readonly bundle: CapabilityBundle<F>,
    private readonly subject: ConfineSubject,
  ) {}

  hasCapability(name: string): boolean {
    return this.owner.check(name, this.subject);
  }

  capabilities(): ReadonlyArray<F> {
    // Bundle names are already unique and sorted.
    return this.bundle.names().filter((name) => this.hasCapability(name));
  }

  satisfies(...names: ReadonlyArray<CapabilityNames>): boolean {
    for (const name of flattenCapabilityNames(names)) {
      if (!this.hasCapability(name)) return false;
    }
    return true;
  }

  predicate(name: F): () => boolean {
    if (!this.bundle.has(name)) {
      throw new DefinitionError(`Unable to find capability ${name} on ${this.bundle.type.name}`);
    }
    return () => this.hasCapability(name);
  }

  predicates(): ReadonlyMap<F, () => boolean> {
    return new Map(this.bundle.names().map((name) => [name, () => this.hasCapability(name)] as const));
  }
}
