/**
 * @warden/confine
 *
 * Warden Confine — the predicate layer of the confinement engine.
 *
 * This package is the base layer of the Warden type system. It defines:
 * - The closed set of confine kinds (ConfineKind enum) and their classes
 * - The kind registry that maps criteria keys to confines
 * - The HostEnvironment contract and an in-memory implementation
 * - DefinitionError and the ValidationResult type
 *
 * This package is side-effect free. All host access goes through the
 * injected HostEnvironment. It has no internal Warden dependencies.
 */

// Types
export type {
  ConfineCriteria,
  ConfineSubject,
  ConfineSummary,
  ConfineSummaryValue,
  ConfineValue,
  FactTable,
  FactValue,
  HostEnvironment,
  ValidationError,
  ValidationResult,
} from './types.js';

export { ConfineKind, DefinitionError, FOR_BINARY_KEY } from './types.js';

// Confines
export type { ConfineOutcome } from './confine.js';
export { Confine, describeValue, resolveValue } from './confine.js';
export { TrueConfine } from './kinds/true.js';
export { FalseConfine } from './kinds/false.js';
export { ExistsConfine } from './kinds/exists.js';
export { MethodsConfine } from './kinds/methods.js';
export { FeatureConfine } from './kinds/feature.js';
export { VariableConfine } from './kinds/variable.js';

// Registry
export {
  createConfine,
  isEmptySummary,
  lookupConfineKind,
  summarizeConfines,
} from './registry.js';

// Environment
export type { MemoryEnvironmentInit } from './environment.js';
export { MemoryEnvironment, NULL_ENVIRONMENT } from './environment.js';
