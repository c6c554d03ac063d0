/**
 * Warden Kernel — Capability Bundle
 *
 * The per-type set of capability checks every provider of the type
 * exposes. Synthesized once per type by CapabilityBundleRegistry.
 *
 * On construction every feature of the type is deep-cloned into a private
 * map, so the bundle is independent of the type's master registry. Each
 * provider bound to the bundle clones those collections again and owns
 * the result: extending a feature's confines for one provider is never
 * visible to the type, the bundle, or another provider.
 *
 * Features declared on the type after the bundle is built are not part of
 * it. Types declare their features at definition time, before any
 * provider asks for a bundle.
 */

import type { ConfineSubject } from '@warden/confine';
import type { FeatureConfineCollection } from '../collections/feature-confine-collection.js';
import type { ResourceType } from '../features/resource-type.js';
import { ProviderCapabilities } from './provider-capabilities.js';

export class CapabilityBundle<F extends string = string> {
  private readonly templates: Map<string, FeatureConfineCollection> = new Map();
  private readonly sortedNames: ReadonlyArray<F>;

  constructor(readonly type: ResourceType<F>) {
    for (const [name, collection] of type.features.entries()) {
      this.templates.set(name, collection.clone());
    }
    this.sortedNames = [...type.features.listFeatures()].sort();

    type.logger.record({
      event: 'bundle.built',
      type: type.name,
      names: this.sortedNames,
    });
  }

  /** Capability names in lexicographic order. */
  names(): ReadonlyArray<F> {
    return this.sortedNames;
  }

  has(name: string): boolean {
    return this.templates.has(name);
  }

  /**
   * Fresh deep copies of every capability collection, for one provider.
   */
  cloneCollections(): Map<string, FeatureConfineCollection> {
    const copies = new Map<string, FeatureConfineCollection>();
    for (const [name, collection] of this.templates) {
      copies.set(name, collection.clone());
    }
    return copies;
  }

  /**
   * Bind the bundle to one provider.
   *
   * @param providerName - Provider identity, used in events
   * @param subject - What capability confines are evaluated against by
   *   default; normally the provider's implementation class
   */
  bind(providerName: string, subject?: ConfineSubject): ProviderCapabilities<F> {
    return new ProviderCapabilities(this, providerName, subject);
  }
}
