/**
 * Warden Kernel — Confine Collection
 *
 * An ordered bag of confines belonging to one owner (a provider, or a
 * feature through FeatureConfineCollection). Answers "are all of these
 * satisfied" and produces failure summaries for diagnostics.
 *
 * An empty collection is NOT valid. The absence of any stated requirement
 * means "not explicitly confined", which this layer treats as "not
 * applicable" rather than "always true". A provider that supports a
 * feature without confines must say so with declareCapabilities().
 */

import {
  isEmptySummary,
  summarizeConfines,
  type Confine,
  type ConfineCriteria,
  type ConfineKind,
  type ConfineSubject,
  type ConfineSummary,
  type ConfineSummaryValue,
  type HostEnvironment,
} from '@warden/confine';
import { buildConfines } from './build-confines.js';

export class ConfineCollection {
  protected readonly items: Confine[] = [];

  /**
   * @param label - Human-readable identity copied onto every confine
   * @param environment - Host collaborators for the confines built here
   */
  constructor(
    readonly label: string,
    protected readonly environment: HostEnvironment,
  ) {}

  /**
   * Add confines from a criteria mapping. Keys naming a confine kind build
   * that kind; any other key is a fact name. See buildConfines().
   *
   * @throws {DefinitionError} If any entry has an empty value list
   */
  confine(criteria: ConfineCriteria): void {
    this.items.push(...buildConfines(criteria, this.label, this.environment));
  }

  /**
   * True iff the collection is non-empty and every confine is valid
   * against the subject.
   */
  valid(subject?: ConfineSubject): boolean {
    return this.items.length > 0 && this.items.every((c) => c.valid(subject));
  }

  /**
   * Failure summary keyed by confine kind, for diagnostics only.
   *
   * Confines are grouped by kind and each group is handed to the kind's
   * summarizer. Kinds with nothing to report are omitted, so a fully
   * satisfied collection summarizes to `{}`.
   */
  summary(subject?: ConfineSubject): ConfineSummary {
    const groups = new Map<ConfineKind, Confine[]>();
    for (const confine of this.items) {
      const group = groups.get(confine.kind) ?? [];
      group.push(confine);
      groups.set(confine.kind, group);
    }

    const result: Partial<Record<ConfineKind, ConfineSummaryValue>> = {};
    for (const [kind, group] of groups) {
      const value = summarizeConfines(kind, group, subject);
      if (!isEmptySummary(value)) {
        result[kind] = value;
      }
    }
    return result;
  }

  /**
   * One "<label>: <reason>" line per failing value, in declaration order.
   */
  failures(subject?: ConfineSubject): ReadonlyArray<string> {
    return this.items.flatMap((c) => c.failures(subject));
  }

  get size(): number {
    return this.items.length;
  }

  get confines(): ReadonlyArray<Confine> {
    return this.items;
  }
}
