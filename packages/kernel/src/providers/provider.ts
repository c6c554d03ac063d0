/**
 * Warden Kernel — Provider Definitions
 *
 * A provider is one implementation of a resource type (e.g. `apt` for
 * `package`). Two questions are asked of it, with different rules:
 *
 * 1. Suitability: may this provider be used on this host at all?
 *    Answered by the provider-level ConfineCollection. A provider with no
 *    confines is suitable. This is deliberately the opposite of the
 *    feature rule, where an empty collection means "not applicable".
 *
 * 2. Capability: does this provider support feature X of its type?
 *    Answered by the provider's ProviderCapabilities binding.
 *
 * ProviderDefinition carries both. The optional implementation class is
 * the default subject for methods confines, so `{ methods: ['install'] }`
 * asks whether the class prototype defines `install`. Provider instances
 * (subclasses of Provider) answer capability queries with themselves as
 * the subject.
 */

import {
  DefinitionError,
  type ConfineCriteria,
  type ConfineSubject,
  type ConfineSummary,
} from '@warden/confine';
import type { CapabilityBundle } from '../capabilities/bundle.js';
import type { ProviderCapabilities } from '../capabilities/provider-capabilities.js';
import type { CapabilityNames, CapabilityQueries } from '../capabilities/queries.js';
import { ConfineCollection } from '../collections/confine-collection.js';
import type { ResourceType } from '../features/resource-type.js';

// ---------------------------------------------------------------------------
// Registry View
// ---------------------------------------------------------------------------

/**
 * What the provider registry and reports need from a provider, independent
 * of its type's feature names.
 */
export interface RegisteredProvider {
  readonly name: string;
  readonly typeName: string;
  /** Default subject for provider and capability confines. */
  readonly subject: ConfineSubject;
  readonly queries: CapabilityQueries;
  suitable(subject?: ConfineSubject): boolean;
  summary(subject?: ConfineSubject): ConfineSummary;
  failures(subject?: ConfineSubject): ReadonlyArray<string>;
}

/** Constructor of a concrete provider class. */
export type ProviderClass<F extends string = string> = new (
  definition: ProviderDefinition<F>,
) => Provider<F>;

// ---------------------------------------------------------------------------
// Provider Definition
// ---------------------------------------------------------------------------

export class ProviderDefinition<F extends string = string> implements RegisteredProvider {
  /** Provider-level confines, labelled "<Type>::<provider>". */
  readonly confines: ConfineCollection;
  readonly capabilities: ProviderCapabilities<F>;

  /**
   * @param name - Provider name, unique within its type
   * @param type - The resource type the provider implements
   * @param bundle - The type's capability bundle
   * @param implementation - Concrete provider class, if any
   * @throws {DefinitionError} If the name is empty
   */
  constructor(
    readonly name: string,
    readonly type: ResourceType<F>,
    bundle: CapabilityBundle<F>,
    readonly implementation?: ProviderClass<F>,
  ) {
    if (name.trim() === '') {
      throw new DefinitionError(`A provider of ${type.name} requires a name`);
    }
    this.confines = new ConfineCollection(`${type.name}::${name}`, type.environment);
    this.capabilities = bundle.bind(name, implementation);
  }

  get typeName(): string {
    return this.type.name;
  }

  get subject(): ConfineSubject {
    return this.implementation;
  }

  get queries(): CapabilityQueries<F> {
    return this.capabilities;
  }

  /** Add provider-level confines. */
  confine(criteria: ConfineCriteria): void {
    this.confines.confine(criteria);
  }

  /**
   * Whether the provider may be used on this host. No confines means
   * suitable.
   */
  suitable(subject: ConfineSubject = this.implementation): boolean {
    return this.confines.size === 0 || this.confines.valid(subject);
  }

  summary(subject: ConfineSubject = this.implementation): ConfineSummary {
    return this.confines.summary(subject);
  }

  failures(subject: ConfineSubject = this.implementation): ReadonlyArray<string> {
    return this.confines.failures(subject);
  }

  hasCapability(name: string): boolean {
    return this.capabilities.hasCapability(name);
  }

  declareCapabilities(...names: ReadonlyArray<CapabilityNames>): void {
    this.capabilities.declareCapabilities(...names);
  }

  extendConfine(name: string, criteria: ConfineCriteria): void {
    this.capabilities.extendConfine(name, criteria);
  }

  /**
   * Create an instance of the implementation class.
   *
   * @throws {DefinitionError} If the provider has no implementation class
   */
  instantiate(): Provider<F> {
    if (this.implementation === undefined) {
      throw new DefinitionError(
        `Provider ${this.name} of ${this.type.name} has no implementation class`,
      );
    }
    return new this.implementation(this);
  }
}

// ---------------------------------------------------------------------------
// Provider Base Class
// ---------------------------------------------------------------------------

/**
 * Base class of concrete providers. Capability queries are evaluated with
 * the instance as the subject, so methods confines see instance members
 * as well as prototype methods.
 */
export abstract class Provider<F extends string = string> implements CapabilityQueries<F> {
  private readonly view: CapabilityQueries<F>;

  constructor(readonly definition: ProviderDefinition<F>) {
    this.view = definition.capabilities.view(this);
  }

  get providerName(): string {
    return this.definition.name;
  }

  suitable(): boolean {
    return this.definition.suitable(this);
  }

  hasCapability(name: string): boolean {
    return this.view.hasCapability(name);
  }

  capabilities(): ReadonlyArray<F> {
    return this.view.capabilities();
  }

  satisfies(...names: ReadonlyArray<CapabilityNames>): boolean {
    return this.view.satisfies(...names);
  }

  predicate(name: F): () => boolean {
    return this.view.predicate(name);
  }

  predicates(): ReadonlyMap<F, () => boolean> {
    return this.view.predicates();
  }
}
