/**
 * Warden Provider Loader — Type Registry
 *
 * The authoritative record of resource types and their providers.
 *
 * Registry invariants:
 * - A type name is registered at most once.
 * - A provider name is unique within its type.
 * - A provider is registered against the type object that was registered
 *   under its name, never a look-alike.
 * - Declarations are validated before anything is built; an invalid
 *   declaration leaves the registry unchanged.
 *
 * Capability bundles come from one CapabilityBundleRegistry shared by every
 * type in this registry.
 */

import { DefinitionError } from '@warden/confine';
import {
  CapabilityBundleRegistry,
  ProviderDefinition,
  type CapabilityBundle,
  type ProviderSource,
  type RegisteredProvider,
  type ResourceType,
} from '@warden/kernel';
import type { ProviderDeclaration } from './declaration.js';
import { ProviderValidator } from './validator.js';

export class TypeRegistry {
  private readonly types: Map<string, ResourceType> = new Map();
  private readonly providersByType: Map<string, Map<string, RegisteredProvider>> = new Map();
  private readonly validator = new ProviderValidator();

  constructor(private readonly bundles: CapabilityBundleRegistry = new CapabilityBundleRegistry()) {}

  // -------------------------------------------------------------------------
  // Types
  // -------------------------------------------------------------------------

  /**
   * @throws {DefinitionError} If a type with the same name is registered
   */
  registerType<F extends string>(type: ResourceType<F>): ResourceType<F> {
    if (this.types.has(type.name)) {
      throw new DefinitionError(`Resource type ${type.name} is already registered`);
    }
    this.types.set(type.name, type);
    this.providersByType.set(type.name, new Map());
    return type;
  }

  getType(name: string): ResourceType | undefined {
    return this.types.get(name);
  }

  /** Registered type names, sorted. */
  listTypes(): ReadonlyArray<string> {
    return Array.from(this.types.keys()).sort();
  }

  // -------------------------------------------------------------------------
  // Providers
  // -------------------------------------------------------------------------

  /**
   * Build and register a provider from its declaration.
   *
   * Order of application: provider confines, declared capabilities, then
   * per-capability confines.
   *
   * @throws {DefinitionError} If the type is not registered here, the
   *   declaration is invalid, or the provider name is taken
   */
  registerProvider<F extends string>(
    type: ResourceType<F>,
    declaration: ProviderDeclaration<F>,
  ): ProviderDefinition<F> {
    const providers = this.providersByType.get(type.name);
    if (providers === undefined || this.types.get(type.name) !== type) {
      throw new DefinitionError(`Resource type ${type.name} is not registered`);
    }

    const validation = this.validator.validateDeclaration(type, declaration);
    if (!validation.ok) {
      throw new DefinitionError(
        `Invalid provider declaration ${declaration.name} for ${type.name}:\n` +
          validation.errors.map((e) => `  ${e.message}`).join('\n'),
      );
    }
    if (providers.has(declaration.name)) {
      throw new DefinitionError(
        `Provider ${declaration.name} is already registered for ${type.name}`,
      );
    }

    const definition = new ProviderDefinition(
      declaration.name,
      type,
      this.bundles.bundleFor(type),
      declaration.implementation,
    );
    for (const criteria of declaration.confines ?? []) {
      definition.confine(criteria);
    }
    if (declaration.capabilities !== undefined && declaration.capabilities.length > 0) {
      definition.declareCapabilities(declaration.capabilities);
    }
    for (const name of type.features.listFeatures()) {
      const criteria = declaration.featureConfines?.[name];
      if (criteria !== undefined) {
        definition.extendConfine(name, criteria);
      }
    }

    providers.set(definition.name, definition);
    type.logger.record({
      event: 'provider.registered',
      type: type.name,
      provider: definition.name,
      detail: { confines: definition.confines.size },
    });
    return definition;
  }

  /** Provider names of a type, sorted. Empty for an unknown type. */
  providers(typeName: string): ReadonlyArray<string> {
    return Array.from(this.providersByType.get(typeName)?.keys() ?? []).sort();
  }

  provider(typeName: string, providerName: string): RegisteredProvider | undefined {
    return this.providersByType.get(typeName)?.get(providerName);
  }

  /** The providers of a type, in the shape feature documentation reads. */
  providerSource(typeName: string): ProviderSource {
    return {
      providerNames: () => this.providers(typeName),
      capabilitiesOf: (providerName) => this.provider(typeName, providerName)?.queries,
    };
  }

  /** The capability bundle of a registered type. */
  bundleFor(typeName: string): CapabilityBundle | undefined {
    const type = this.types.get(typeName);
    return type === undefined ? undefined : this.bundles.bundleFor(type);
  }
}
