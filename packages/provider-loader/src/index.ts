/**
 * @warden/provider-loader
 *
 * Warden provider loader — the registry of resource types and their
 * providers, declaration validation, and suitability reporting.
 */

export type { ProviderDeclaration } from './declaration.js';
export { ProviderValidator } from './validator.js';
export { TypeRegistry } from './type-registry.js';

export type { ProviderSuitability, SuitabilityReport } from './suitability.js';
export { buildSuitabilityReport, suitableProviders } from './suitability.js';
