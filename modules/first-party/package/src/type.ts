/**
 * Warden First-Party Package Module — Resource Type
 *
 * The `package` resource type and its features. Most features are
 * guarded by a methods confine, so a provider class gets the feature by
 * implementing the named methods. `versionable` has no confines and must
 * be declared.
 */

import { ResourceType, type ResourceTypeOptions } from '@warden/kernel';

export const PACKAGE_TYPE = 'package';

export type PackageFeature =
  | 'installable'
  | 'uninstallable'
  | 'upgradeable'
  | 'versionable'
  | 'holdable'
  | 'purgeable';

export function createPackageType(options: ResourceTypeOptions = {}): ResourceType<PackageFeature> {
  return new ResourceType<PackageFeature>(PACKAGE_TYPE, options)
    .feature('installable', 'The provider can install packages.', { methods: ['install'] })
    .feature('uninstallable', 'The provider can uninstall packages.', { methods: ['uninstall'] })
    .feature(
      'upgradeable',
      `The provider can upgrade to the latest version of a
        package. This feature is used by specifying \`latest\` as the
        desired value for the package.`,
      { methods: ['update', 'latest'] },
    )
    .feature(
      'versionable',
      'The provider is capable of interrogating the package database for installed version(s), and can select which out of a set of available versions of a package to install if asked.',
    )
    .feature('holdable', 'The provider is capable of placing packages on hold such that they are not automatically upgraded.', {
      methods: ['hold', 'unhold'],
    })
    .feature('purgeable', 'The provider can purge packages, removing configuration files as well.', {
      methods: ['purge'],
    });
}
