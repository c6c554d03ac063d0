/**
 * Warden Confine — In-Memory Host Environment
 *
 * A HostEnvironment backed by plain maps and sets. No file system access,
 * no process environment, no module resolution. Suitable for unit tests
 * and for embedding the engine where host facts are supplied by the caller.
 *
 * Fact names are case-insensitive, matching NodeHostEnvironment.
 */

import type { FactTable, FactValue, HostEnvironment } from './types.js';

export interface MemoryEnvironmentInit {
  readonly facts?: Readonly<Record<string, FactValue>> | undefined;
  /** Paths that exist. */
  readonly paths?: ReadonlyArray<string> | undefined;
  /** Executable name -> resolved absolute path. */
  readonly binaries?: Readonly<Record<string, string>> | undefined;
  /** Available global features. */
  readonly features?: ReadonlyArray<string> | undefined;
}

export class MemoryEnvironment implements HostEnvironment, FactTable {
  private readonly factTable: Map<string, FactValue> = new Map();
  private readonly paths: Set<string>;
  private readonly binaries: Map<string, string>;
  private readonly features: Set<string>;

  constructor(init: MemoryEnvironmentInit = {}) {
    for (const [name, value] of Object.entries(init.facts ?? {})) {
      this.factTable.set(name.toLowerCase(), value);
    }
    this.paths = new Set(init.paths ?? []);
    this.binaries = new Map(Object.entries(init.binaries ?? {}));
    this.features = new Set(init.features ?? []);
  }

  factValue(name: string): FactValue | undefined {
    return this.factTable.get(name.toLowerCase());
  }

  pathExists(path: string): boolean {
    return this.paths.has(path);
  }

  findOnSearchPath(name: string): string | null {
    return this.binaries.get(name) ?? null;
  }

  globalFeatureAvailable(name: string): boolean {
    return this.features.has(name);
  }

  facts(): ReadonlyArray<readonly [string, FactValue]> {
    return [...this.factTable.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  /** Set or replace a fact. */
  setFact(name: string, value: FactValue): void {
    this.factTable.set(name.toLowerCase(), value);
  }

  /** Remove a fact so lookups return undefined. */
  removeFact(name: string): void {
    this.factTable.delete(name.toLowerCase());
  }

  addPath(path: string): void {
    this.paths.add(path);
  }

  addBinary(name: string, resolvedPath: string): void {
    this.binaries.set(name, resolvedPath);
  }

  addFeature(name: string): void {
    this.features.add(name);
  }
}

/**
 * An environment where nothing is known: no facts, no paths, no binaries,
 * no global features. Every host-dependent confine fails against it.
 */
export const NULL_ENVIRONMENT: HostEnvironment = new MemoryEnvironment();
