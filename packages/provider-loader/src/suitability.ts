/**
 * Warden Provider Loader — Suitability Report
 *
 * Which providers of a type may be used on this host, and why the others
 * may not. Unsuitable providers are recorded as `provider.unsuitable`
 * events with their failure summary.
 */

import { DefinitionError, type ConfineSummary } from '@warden/confine';
import type { TypeRegistry } from './type-registry.js';

export interface ProviderSuitability {
  readonly provider: string;
  readonly suitable: boolean;
  /** Failure summary keyed by confine kind; `{}` when suitable. */
  readonly summary: ConfineSummary;
  readonly failures: ReadonlyArray<string>;
  /** Capabilities present for the provider class, sorted. */
  readonly capabilities: ReadonlyArray<string>;
}

export interface SuitabilityReport {
  readonly type: string;
  /** One entry per provider, sorted by name. */
  readonly providers: ReadonlyArray<ProviderSuitability>;
}

/**
 * @throws {DefinitionError} If the type is not registered
 */
export function buildSuitabilityReport(registry: TypeRegistry, typeName: string): SuitabilityReport {
  const type = registry.getType(typeName);
  if (type === undefined) {
    throw new DefinitionError(`Unknown resource type ${typeName}`);
  }

  const providers = registry.providers(typeName).flatMap((name): ProviderSuitability[] => {
    const provider = registry.provider(typeName, name);
    if (provider === undefined) return [];

    const suitable = provider.suitable();
    const summary = suitable ? {} : provider.summary();
    if (!suitable) {
      type.logger.record({
        event: 'provider.unsuitable',
        type: typeName,
        provider: name,
        detail: { summary },
      });
    }
    return [
      {
        provider: name,
        suitable,
        summary,
        failures: suitable ? [] : provider.failures(),
        capabilities: provider.queries.capabilities(),
      },
    ];
  });

  return { type: typeName, providers };
}

/** Names of the providers of a type that are suitable on this host. */
export function suitableProviders(registry: TypeRegistry, typeName: string): ReadonlyArray<string> {
  const type = registry.getType(typeName);
  if (type === undefined) {
    throw new DefinitionError(`Unknown resource type ${typeName}`);
  }
  return registry.providers(typeName).filter((name) => registry.provider(typeName, name)?.suitable() === true);
}
