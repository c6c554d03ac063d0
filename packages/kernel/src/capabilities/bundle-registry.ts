/**
 * Warden Kernel — Capability Bundle Registry
 *
 * Explicit per-type registry of capability bundles: type name -> bundle.
 * A bundle is synthesized on the first request for its type and reused for
 * the lifetime of the registry. The single guard is the map lookup: the
 * engine is single-threaded and synchronous, so the first bundleFor() call
 * for a type is the only one that builds.
 */

import { DefinitionError } from '@warden/confine';
import type { ResourceType } from '../features/resource-type.js';
import { CapabilityBundle } from './bundle.js';

export class CapabilityBundleRegistry {
  private readonly bundles: Map<string, CapabilityBundle> = new Map();

  /**
   * The bundle for a type, built on first request.
   *
   * @throws {DefinitionError} If a different type object with the same name
   *   already has a bundle in this registry
   */
  bundleFor<F extends string>(type: ResourceType<F>): CapabilityBundle<F> {
    const existing = this.bundles.get(type.name);
    if (existing === undefined) {
      const bundle = new CapabilityBundle(type);
      this.bundles.set(type.name, bundle);
      return bundle;
    }
    if (!belongsTo(existing, type)) {
      throw new DefinitionError(
        `A different resource type named ${type.name} already has a capability bundle`,
      );
    }
    return existing;
  }

  has(typeName: string): boolean {
    return this.bundles.has(typeName);
  }

  /** Forget every bundle. Intended for tests. */
  clear(): void {
    this.bundles.clear();
  }
}

function belongsTo<F extends string>(
  bundle: CapabilityBundle,
  type: ResourceType<F>,
): bundle is CapabilityBundle<F> {
  return bundle.type === type;
}
