/**
 * Warden Confine — Core Type Definitions
 *
 * This module defines the closed set of confine kinds, the shape of confine
 * criteria, the host environment contract consulted during evaluation, and
 * the result and error types shared by every Warden package.
 *
 * These types are the base layer of the Warden type system. The kernel
 * depends on this package; this package has no internal Warden dependencies.
 */

// ---------------------------------------------------------------------------
// Confine Kinds
// ---------------------------------------------------------------------------

/**
 * The closed set of confine kinds recognized by the engine.
 *
 * Criteria keys that do not name one of these kinds are treated as fact
 * names and evaluated by the `Variable` kind. Kinds are not extensible at
 * runtime and there is no string-evaluated predicate form.
 */
export enum ConfineKind {
  /** Every value must be truthy. Values may be thunks evaluated lazily. */
  True = 'true',
  /** Every value must be falsy. */
  False = 'false',
  /** Every value must name an existing path (or a binary on the search path). */
  Exists = 'exists',
  /** The subject must expose every named method. */
  Methods = 'methods',
  /** Every named process-wide global feature must be available. */
  Feature = 'feature',
  /** Fallback: the fact named by the criteria key must hold one of the values. */
  Variable = 'variable',
}

// ---------------------------------------------------------------------------
// Criteria
// ---------------------------------------------------------------------------

/**
 * A single candidate value for a confine.
 *
 * A zero-argument function is a thunk: it is called at evaluation time and
 * its return value is what the confine tests. This is how a `true` or
 * `false` confine expresses predicate code, e.g. `{ true: () => hasLibFoo }`.
 */
export type ConfineValue = unknown;

/**
 * Reserved criteria key. When present and truthy, every `exists` confine
 * created from the same criteria resolves its values on the search path
 * instead of the filesystem. The key is stripped before confines are built.
 */
export const FOR_BINARY_KEY = 'for_binary';

/**
 * Mapping from confine kind name (or arbitrary fact name) to one or more
 * candidate values.
 *
 * @example
 *   { exists: '/etc/debian_version' }
 *   { exists: ['apt-get', 'dpkg'], for_binary: true }
 *   { osfamily: ['debian', 'ubuntu'] }
 *   { methods: ['install', 'query'] }
 */
export type ConfineCriteria = Readonly<Record<string, ConfineValue>>;

/**
 * The object a confine is evaluated against: a provider instance, a provider
 * class (its constructor), or nothing at all.
 */
export type ConfineSubject = object | undefined;

/** A host fact value as supplied by the fact-lookup collaborator. */
export type FactValue = string | number | boolean;

// ---------------------------------------------------------------------------
// Host Environment
// ---------------------------------------------------------------------------

/**
 * The host-side collaborators consulted by confine kinds.
 *
 * The confine package never touches the file system, the process
 * environment or the module loader directly. A concrete implementation is
 * injected at construction time: `NodeHostEnvironment` from
 * @warden/runtime-host in production, `MemoryEnvironment` in tests.
 *
 * Implementations must not throw for "the host does not have this"; an
 * absent fact, a missing path or an unavailable feature is an ordinary
 * `undefined`/`false`/`null` answer.
 */
export interface HostEnvironment {
  /** Value of the named host fact, or undefined when the fact is unknown. */
  factValue(name: string): FactValue | undefined;
  /** Whether the path exists on the host file system. */
  pathExists(path: string): boolean;
  /** Absolute path of the named executable on the search path, or null. */
  findOnSearchPath(name: string): string | null;
  /** Whether a process-wide global feature (e.g. a library) is available. */
  globalFeatureAvailable(name: string): boolean;
}

/** An environment that can list what it knows, for display. */
export interface FactTable {
  /** Every known fact, sorted by name. Names are lower-cased. */
  facts(): ReadonlyArray<readonly [string, FactValue]>;
}

// ---------------------------------------------------------------------------
// Summaries
// ---------------------------------------------------------------------------

/**
 * Aggregated failure information for all confines of one kind.
 *
 * - `true` / `false`: number of failing values
 * - `exists` / `methods` / `feature`: names that were missing
 * - `variable`: fact name -> the values that were required
 */
export type ConfineSummaryValue =
  | number
  | ReadonlyArray<string>
  | Readonly<Record<string, ReadonlyArray<string>>>;

/** Failure summary keyed by confine kind. Kinds with nothing to report are omitted. */
export type ConfineSummary = Readonly<Partial<Record<ConfineKind, ConfineSummaryValue>>>;

// ---------------------------------------------------------------------------
// Validation Result Types
// ---------------------------------------------------------------------------

/**
 * A validation error produced by a declaration validator.
 */
export interface ValidationError {
  readonly message: string;
  readonly context?: string | undefined;
}

/**
 * Generic validation result type.
 *
 * - `ValidationResult<void>`: success has no value (structural validation only)
 * - `ValidationResult<T>`: success carries a typed value
 */
export type ValidationResult<T = void> =
  | (T extends void ? { readonly ok: true } : { readonly ok: true; readonly value: T })
  | { readonly ok: false; readonly errors: ReadonlyArray<ValidationError> };

// ---------------------------------------------------------------------------
// Error Types
// ---------------------------------------------------------------------------

/**
 * Thrown for mistakes in a type or provider declaration: a duplicate
 * feature, an extension of an unknown capability, a confine without values,
 * a collection without a name.
 *
 * A DefinitionError is a programming error in the declaring code. It is
 * never thrown for "the host does not support this". That outcome is an
 * ordinary `false`.
 */
export class DefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DefinitionError';
  }
}
