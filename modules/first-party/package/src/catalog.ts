/**
 * Warden First-Party Package Module — Provider Catalog
 *
 * The package providers as typed declarations. Registration validates each
 * one against the package type; see TypeRegistry.registerProvider().
 */

import type { ProviderDeclaration } from '@warden/provider-loader';
import { AptProvider, PipProvider, YumProvider } from './providers.js';
import type { PackageFeature } from './type.js';

export const PACKAGE_PROVIDERS: ReadonlyArray<ProviderDeclaration<PackageFeature>> = [
  {
    name: 'apt',
    implementation: AptProvider,
    confines: [{ osfamily: ['debian', 'ubuntu'] }, { exists: ['apt-get', 'dpkg-query'], for_binary: true }],
    capabilities: ['versionable'],
    featureConfines: { holdable: { exists: 'apt-mark', for_binary: true } },
  },
  {
    name: 'yum',
    implementation: YumProvider,
    confines: [{ osfamily: ['redhat'] }, { exists: ['yum', 'rpm'], for_binary: true }],
    capabilities: ['versionable'],
    featureConfines: { holdable: { exists: '/etc/yum/pluginconf.d/versionlock.conf' } },
  },
  {
    name: 'pip',
    implementation: PipProvider,
    confines: [{ exists: 'pip', for_binary: true }],
    capabilities: ['versionable'],
  },
];
