/**
 * Warden Provider Loader — Provider Declarations
 *
 * The data form of a provider: everything TypeRegistry.registerProvider()
 * needs to build a ProviderDefinition, applied in field order.
 *
 * @example
 *   registry.registerProvider(packageType, {
 *     name: 'apt',
 *     implementation: AptProvider,
 *     confines: [{ osfamily: ['debian', 'ubuntu'] }, { exists: 'apt-get', for_binary: true }],
 *     capabilities: ['holdable'],
 *     featureConfines: { upgradeable: { exists: '/usr/bin/apt-mark' } },
 *   });
 */

import type { ConfineCriteria } from '@warden/confine';
import type { ProviderClass } from '@warden/kernel';

export interface ProviderDeclaration<F extends string = string> {
  /** Provider name, unique within its type. */
  readonly name: string;
  /** Concrete provider class; the subject of methods confines. */
  readonly implementation?: ProviderClass<F> | undefined;
  /** Provider-level confines, one criteria mapping per entry. */
  readonly confines?: ReadonlyArray<ConfineCriteria> | undefined;
  /** Capabilities the provider declares outright. */
  readonly capabilities?: ReadonlyArray<F> | undefined;
  /** Extra confines per capability, applied to this provider only. */
  readonly featureConfines?: Readonly<Partial<Record<F, ConfineCriteria>>> | undefined;
}
