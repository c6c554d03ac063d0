/**
 * @warden/module-package
 *
 * Warden first-party package module: the `package` resource type and its
 * apt, yum and pip providers.
 */

import type { ProviderDefinition, ResourceType, ResourceTypeOptions } from '@warden/kernel';
import type { TypeRegistry } from '@warden/provider-loader';
import { PACKAGE_PROVIDERS } from './catalog.js';
import { createPackageType, type PackageFeature } from './type.js';

export { PACKAGE_TYPE, createPackageType } from './type.js';
export type { PackageFeature } from './type.js';
export { AptProvider, PipProvider, YumProvider } from './providers.js';
export type { PackageCommand } from './providers.js';
export { PACKAGE_PROVIDERS } from './catalog.js';

export interface PackageModule {
  readonly type: ResourceType<PackageFeature>;
  /** Provider definitions in catalog order. */
  readonly providers: ReadonlyArray<ProviderDefinition<PackageFeature>>;
}

/**
 * Register the package type and every catalog provider.
 *
 * @throws {DefinitionError} If the registry already has a package type
 */
export function registerPackageModule(
  registry: TypeRegistry,
  options: ResourceTypeOptions = {},
): PackageModule {
  const type = registry.registerType(createPackageType(options));
  const providers = PACKAGE_PROVIDERS.map((declaration) => registry.registerProvider(type, declaration));
  return { type, providers };
}
