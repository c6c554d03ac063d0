/**
 * @warden/kernel
 *
 * Warden kernel — confine collections, feature registries, the capability
 * bundle synthesizer, provider definitions and the confinement logger.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net, fetch, or any other I/O API. Host state
 * reaches it only through the HostEnvironment injected into each type.
 *
 * Concrete host collaborators and log persistence live in
 * @warden/runtime-host.
 */

// Collections
export { buildConfines } from './collections/build-confines.js';
export { ConfineCollection } from './collections/confine-collection.js';
export { FeatureConfineCollection } from './collections/feature-confine-collection.js';

// Features
export { FeatureRegistry } from './features/feature-registry.js';
export type { ResourceTypeOptions } from './features/resource-type.js';
export { ResourceType } from './features/resource-type.js';
export { renderDocTable } from './features/doc-table.js';

// Capabilities
export type { CapabilityNames, CapabilityQueries, ProviderSource } from './capabilities/queries.js';
export { canonicalCapabilityName, flattenCapabilityNames } from './capabilities/queries.js';
export { CapabilityBundle } from './capabilities/bundle.js';
export { CapabilityBundleRegistry } from './capabilities/bundle-registry.js';
export { ProviderCapabilities } from './capabilities/provider-capabilities.js';

// Providers
export type { ProviderClass, RegisteredProvider } from './providers/provider.js';
export { Provider, ProviderDefinition } from './providers/provider.js';

// Logging
export type { LogSink } from './logging/log-sink.js';
export type {
  ConfinementEvent,
  ConfinementEventInput,
  ConfinementEventKind,
} from './logging/confinement-log.js';
export {
  CONFINEMENT_EVENT_KINDS,
  ConfinementLogger,
  SILENT_LOGGER,
  isConfinementEventKind,
} from './logging/confinement-log.js';
