/**
 * Warden Confine — Kind Registry
 *
 * Fixed mapping from confine kind to its implementation. Criteria keys are
 * resolved here: a key naming one of the built-in kinds builds that kind;
 * any other key builds a Variable confine with the key bound as the fact
 * name. The fallback is an explicit branch, never an error.
 */

import type { Confine } from './confine.js';
import { ExistsConfine } from './kinds/exists.js';
import { FalseConfine } from './kinds/false.js';
import { FeatureConfine } from './kinds/feature.js';
import { MethodsConfine } from './kinds/methods.js';
import { TrueConfine } from './kinds/true.js';
import { VariableConfine } from './kinds/variable.js';
import {
  ConfineKind,
  type ConfineSubject,
  type ConfineSummaryValue,
  type ConfineValue,
  type HostEnvironment,
} from './types.js';

type ConfineFactory = (
  values: ConfineValue | ReadonlyArray<ConfineValue>,
  environment: HostEnvironment,
) => Confine;

type ConfineSummarizer = (
  confines: ReadonlyArray<Confine>,
  subject: ConfineSubject,
) => ConfineSummaryValue;

/** Kinds that are selected by their own name as a criteria key. */
type KeyedConfineKind = Exclude<ConfineKind, ConfineKind.Variable>;

const FACTORIES: Readonly<Record<KeyedConfineKind, ConfineFactory>> = {
  [ConfineKind.True]: (values, environment) => new TrueConfine(values, environment),
  [ConfineKind.False]: (values, environment) => new FalseConfine(values, environment),
  [ConfineKind.Exists]: (values, environment) => new ExistsConfine(values, environment),
  [ConfineKind.Methods]: (values, environment) => new MethodsConfine(values, environment),
  [ConfineKind.Feature]: (values, environment) => new FeatureConfine(values, environment),
};

const SUMMARIZERS: Readonly<Record<ConfineKind, ConfineSummarizer>> = {
  [ConfineKind.True]: TrueConfine.summarize,
  [ConfineKind.False]: FalseConfine.summarize,
  [ConfineKind.Exists]: ExistsConfine.summarize,
  [ConfineKind.Methods]: MethodsConfine.summarize,
  [ConfineKind.Feature]: FeatureConfine.summarize,
  [ConfineKind.Variable]: VariableConfine.summarize,
};

const KEYED_KINDS: ReadonlyArray<KeyedConfineKind> = [
  ConfineKind.True,
  ConfineKind.False,
  ConfineKind.Exists,
  ConfineKind.Methods,
  ConfineKind.Feature,
];

/**
 * Resolve a criteria key to a built-in kind.
 *
 * Matching ignores surrounding whitespace and case. `variable` is not a
 * key-selectable kind: a `variable` key names a fact like any other
 * unknown key.
 *
 * @returns The kind, or undefined when the key is a fact name
 */
export function lookupConfineKind(name: string): KeyedConfineKind | undefined {
  const normalized = name.trim().toLowerCase();
  return KEYED_KINDS.find((kind) => kind === normalized);
}

/**
 * Build a confine for one criteria entry.
 *
 * @param name - Criteria key: a kind name or a fact name
 * @param values - One value or an array of values
 * @param environment - Host collaborators the confine will consult
 * @throws {DefinitionError} If values is an empty array
 */
export function createConfine(
  name: string,
  values: ConfineValue | ReadonlyArray<ConfineValue>,
  environment: HostEnvironment,
): Confine {
  const kind = lookupConfineKind(name);
  if (kind === undefined) {
    return new VariableConfine(values, environment, name.trim());
  }
  return FACTORIES[kind](values, environment);
}

/**
 * Summarize all confines of one kind against a subject.
 * The caller is responsible for passing confines of that kind only.
 */
export function summarizeConfines(
  kind: ConfineKind,
  confines: ReadonlyArray<Confine>,
  subject: ConfineSubject,
): ConfineSummaryValue {
  return SUMMARIZERS[kind](confines, subject);
}

/**
 * Whether a summary value carries anything worth reporting.
 * Zero counts, empty lists and empty maps are not.
 */
export function isEmptySummary(value: ConfineSummaryValue): boolean {
  if (typeof value === 'number') return value === 0;
  if (isStringList(value)) return value.length === 0;
  return Object.keys(value).length === 0;
}

function isStringList(value: ConfineSummaryValue): value is ReadonlyArray<string> {
  return Array.isArray(value);
}
