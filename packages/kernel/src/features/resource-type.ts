/**
 * Warden Kernel — Resource Type
 *
 * An abstract resource type (e.g. `package`, `service`) and the features
 * its providers may support. The type is the definition-time owner of the
 * FeatureRegistry; capability bundles are synthesized from it on demand by
 * a CapabilityBundleRegistry.
 *
 * The type parameter F narrows feature names for typed call sites:
 *
 * @example
 *   type PackageFeature = 'installable' | 'upgradeable';
 *   const pkg = new ResourceType<PackageFeature>('package', { environment })
 *     .feature('installable', 'The provider can install packages.', { methods: ['install'] })
 *     .feature('upgradeable', 'The provider can upgrade to the latest version.');
 */

import {
  DefinitionError,
  NULL_ENVIRONMENT,
  type ConfineCriteria,
  type HostEnvironment,
} from '@warden/confine';
import type { ProviderSource } from '../capabilities/queries.js';
import { SILENT_LOGGER, type ConfinementLogger } from '../logging/confinement-log.js';
import { FeatureRegistry } from './feature-registry.js';

export interface ResourceTypeOptions {
  /** Host collaborators. Default: NULL_ENVIRONMENT (nothing on the host is known). */
  readonly environment?: HostEnvironment | undefined;
  /** Receives definition-time events for this type and its providers. */
  readonly logger?: ConfinementLogger | undefined;
}

export class ResourceType<F extends string = string> {
  readonly environment: HostEnvironment;
  readonly logger: ConfinementLogger;
  readonly features: FeatureRegistry<F>;

  /**
   * @throws {DefinitionError} If the name is empty
   */
  constructor(
    readonly name: string,
    options: ResourceTypeOptions = {},
  ) {
    if (name.trim() === '') {
      throw new DefinitionError('A resource type requires a name');
    }
    this.environment = options.environment ?? NULL_ENVIRONMENT;
    this.logger = options.logger ?? SILENT_LOGGER;
    this.features = new FeatureRegistry<F>(name, this.environment, this.logger);
  }

  /**
   * Definition DSL shorthand for features.declareFeature(); chainable.
   */
  feature(name: F, docs: string, criteria: ConfineCriteria = {}): this {
    this.features.declareFeature(name, docs, criteria);
    return this;
  }

  /**
   * Feature documentation, with a provider matrix when providers are given.
   */
  documentation(providers?: ProviderSource): string | null {
    return this.features.featureDocumentation(providers);
  }
}
