/**
 * Warden Kernel — Capability Query Interface
 *
 * The capability-check operations every provider exposes. Implemented by
 * ProviderCapabilities (evaluated against the provider class), by the
 * per-instance views it hands out, and by the Provider base class.
 */

/** A capability name, or a list of them. Lists are flattened. */
export type CapabilityNames = string | ReadonlyArray<string>;

export interface CapabilityQueries<F extends string = string> {
  /**
   * True iff the provider explicitly declared the capability, or the
   * capability's confines are all satisfied.
   */
  hasCapability(name: string): boolean;

  /** Every capability that hasCapability() accepts, sorted by name. */
  capabilities(): ReadonlyArray<F>;

  /**
   * True iff every named capability is present. Stops at the first
   * missing one. With no names it is vacuously true.
   */
  satisfies(...names: ReadonlyArray<CapabilityNames>): boolean;

  /**
   * A zero-argument predicate equivalent to hasCapability(name).
   *
   * @throws {DefinitionError} If the type does not declare the capability
   */
  predicate(name: F): () => boolean;

  /** One predicate per capability of the type, in name order. */
  predicates(): ReadonlyMap<F, () => boolean>;
}

/**
 * What feature documentation needs from the provider registry: the
 * providers of one type and their capability queries.
 */
export interface ProviderSource {
  providerNames(): ReadonlyArray<string>;
  capabilitiesOf(providerName: string): CapabilityQueries | undefined;
}

/**
 * Canonical form of a capability name as given by a caller.
 */
export function canonicalCapabilityName(name: string): string {
  return name.trim();
}

/**
 * Flatten variadic capability names into canonical names.
 */
export function flattenCapabilityNames(names: ReadonlyArray<CapabilityNames>): string[] {
  return names
    .flatMap((entry): ReadonlyArray<string> => (typeof entry === 'string' ? [entry] : entry))
    .map(canonicalCapabilityName);
}
