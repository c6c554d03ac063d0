/**
 * Warden Kernel — Feature Registry
 *
 * The features a resource type declares, each with documentation and the
 * confines under which a provider is deemed to have it. For example a
 * package type may declare `upgradeable`, guarded by a methods confine on
 * `update`; one provider gets it by implementing `update`, another declares
 * it outright.
 *
 * Registry invariants:
 * - A feature name is declared at most once per type (DefinitionError).
 * - Entries are never removed. The only later mutation is appending
 *   confines, and bundles and providers do that on their own clones.
 */

import { DefinitionError, type ConfineCriteria, type HostEnvironment } from '@warden/confine';
import type { ProviderSource } from '../capabilities/queries.js';
import { FeatureConfineCollection } from '../collections/feature-confine-collection.js';
import { SILENT_LOGGER, type ConfinementLogger } from '../logging/confinement-log.js';
import { renderDocTable } from './doc-table.js';

/** Cell marker for "provider has this feature" in the documentation matrix. */
const PRESENT_MARKER = '*X*';

export class FeatureRegistry<F extends string = string> {
  private readonly collections: Map<string, FeatureConfineCollection> = new Map();
  private readonly order: F[] = [];

  /**
   * @param typeName - Owning type, used in labels ("<Type>.<feature>")
   * @param environment - Host collaborators for every feature's confines
   * @param logger - Receives `feature.declared` events
   */
  constructor(
    private readonly typeName: string,
    private readonly environment: HostEnvironment,
    private readonly logger: ConfinementLogger = SILENT_LOGGER,
  ) {}

  /**
   * Declare a feature of the type.
   *
   * @param name - Feature name; must be a non-empty identifier without
   *   surrounding whitespace, since it is used as-is as the canonical key
   * @param docs - Description used in generated documentation
   * @param criteria - Optional confines under which providers have the feature
   * @returns The type's master collection for the feature
   * @throws {DefinitionError} If the name is malformed or already declared
   */
  declareFeature(name: F, docs: string, criteria: ConfineCriteria = {}): FeatureConfineCollection {
    if (name.trim() === '' || name.trim() !== name) {
      throw new DefinitionError(
        `Feature name "${name}" on ${this.typeName} must be a non-empty name without surrounding whitespace`,
      );
    }
    if (this.collections.has(name)) {
      throw new DefinitionError(`Feature ${name} is already defined on ${this.typeName}`);
    }

    const collection = new FeatureConfineCollection(
      name,
      `${this.typeName}.${name}`,
      docs,
      this.environment,
    );
    if (Object.keys(criteria).length > 0) {
      collection.confine(criteria);
    }
    this.collections.set(name, collection);
    this.order.push(name);

    this.logger.record({
      event: 'feature.declared',
      type: this.typeName,
      names: [name],
      detail: { confines: collection.size },
    });
    return collection;
  }

  /** Declared feature names in declaration order. */
  listFeatures(): ReadonlyArray<F> {
    return [...this.order];
  }

  /** Whether the name is a declared feature. */
  has(name: string): boolean {
    return this.collections.has(name.trim());
  }

  /**
   * The type's master collection for a feature. Intended for inspection
   * and tests; providers must never append to it.
   */
  providerFeature(name: string): FeatureConfineCollection | undefined {
    return this.collections.get(name.trim());
  }

  /** Declared features with their master collections, in declaration order. */
  entries(): ReadonlyArray<readonly [F, FeatureConfineCollection]> {
    return this.order.flatMap((name) => {
      const collection = this.collections.get(name);
      return collection === undefined ? [] : [[name, collection] as const];
    });
  }

  /**
   * Documentation covering every feature.
   *
   * One line per feature, sorted by name: `- *<name>*: <docs>`, with runs
   * of whitespace in the docs collapsed to single spaces. When providers
   * are given and there is at least one, a markdown matrix follows with a
   * row per provider (sorted) and a `*X*` cell for each feature the
   * provider has.
   *
   * @returns The documentation, or null when the type declares no features
   */
  featureDocumentation(providers?: ProviderSource): string | null {
    if (this.order.length === 0) return null;

    const names = [...this.order].sort();
    let text = '';
    for (const name of names) {
      const docs = this.collections.get(name)?.docs ?? '';
      text += `- *${name}*: ${docs.replace(/\s+/g, ' ').trim()}\n`;
    }

    const providerNames = [...(providers?.providerNames() ?? [])].sort();
    if (providers !== undefined && providerNames.length > 0) {
      const rows = providerNames.map((providerName) => {
        const queries = providers.capabilitiesOf(providerName);
        return [
          providerName,
          ...names.map((name) => (queries?.hasCapability(name) === true ? PRESENT_MARKER : '')),
        ];
      });
      text += '\n' + renderDocTable(['Provider', ...names], rows);
    }
    return text;
  }
}
