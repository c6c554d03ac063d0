/**
 * Warden Runtime Host — Node Host Environment
 *
 * The production HostEnvironment: answers confine questions about the
 * machine the process runs on.
 *
 * - facts: system facts overlaid by operator facts (operator wins);
 *   names are case-insensitive
 * - pathExists: file system existence check
 * - findOnSearchPath: executable lookup over the search path
 *   (WARDEN_PATH, else PATH), honoring PATHEXT on Windows
 * - globalFeatureAvailable: operator-listed features, else whether a
 *   module of that name resolves from the configured directory
 */

import { accessSync, constants, existsSync, statSync } from 'node:fs';
import { createRequire } from 'node:module';
import { delimiter, isAbsolute, join, resolve, sep } from 'node:path';
import type { FactTable, FactValue, HostEnvironment } from '@warden/confine';
import type { StateIO } from '../state/state-io.js';
import { loadOperatorState } from './operator-state.js';
import { collectSystemFacts } from './system-facts.js';

export interface NodeHostEnvironmentOptions {
  /** System facts. Default: collectSystemFacts(). */
  readonly systemFacts?: Readonly<Record<string, FactValue>> | undefined;
  /** Operator fact overrides. */
  readonly facts?: Readonly<Record<string, FactValue>> | undefined;
  /** Global features known to be available. */
  readonly features?: ReadonlyArray<string> | undefined;
  /** Search path for binaries. Default: WARDEN_PATH, else PATH. */
  readonly searchPath?: string | undefined;
  /** Executable extensions. Default: PATHEXT on Windows, none elsewhere. */
  readonly pathExtensions?: ReadonlyArray<string> | undefined;
  /** Directory module resolution starts from. Default: process.cwd(). */
  readonly resolveFrom?: string | undefined;
}

export class NodeHostEnvironment implements HostEnvironment, FactTable {
  private readonly factTable: Map<string, FactValue> = new Map();
  private readonly features: Set<string>;
  private readonly searchDirs: ReadonlyArray<string>;
  private readonly extensions: ReadonlyArray<string>;
  private readonly resolveFrom: string;
  private readonly resolvedModules: Map<string, boolean> = new Map();

  constructor(options: NodeHostEnvironmentOptions = {}) {
    for (const source of [options.systemFacts ?? collectSystemFacts(), options.facts ?? {}]) {
      for (const [name, value] of Object.entries(source)) {
        this.factTable.set(name.toLowerCase(), value);
      }
    }
    this.features = new Set(options.features ?? []);
    this.searchDirs = (options.searchPath ?? defaultSearchPath())
      .split(delimiter)
      .filter((dir) => dir !== '');
    this.extensions = options.pathExtensions ?? defaultPathExtensions();
    this.resolveFrom = options.resolveFrom ?? process.cwd();
  }

  /**
   * Build an environment from the operator state in a warden home.
   *
   * @throws {HostConfigurationError} If facts.json or features.json is malformed
   */
  static fromState(
    stateIO: StateIO,
    options: Omit<NodeHostEnvironmentOptions, 'facts' | 'features'> = {},
  ): NodeHostEnvironment {
    return new NodeHostEnvironment({ ...options, ...loadOperatorState(stateIO) });
  }

  factValue(name: string): FactValue | undefined {
    return this.factTable.get(name.toLowerCase());
  }

  /** Every resolved fact, sorted by name. */
  facts(): ReadonlyArray<readonly [string, FactValue]> {
    return [...this.factTable.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  pathExists(path: string): boolean {
    return existsSync(path);
  }

  findOnSearchPath(name: string): string | null {
    if (name === '') return null;
    if (isAbsolute(name) || name.includes(sep) || name.includes('/')) {
      return this.firstExecutable(resolve(name));
    }
    for (const dir of this.searchDirs) {
      const found = this.firstExecutable(join(dir, name));
      if (found !== null) return found;
    }
    return null;
  }

  globalFeatureAvailable(name: string): boolean {
    if (this.features.has(name)) return true;
    const cached = this.resolvedModules.get(name);
    if (cached !== undefined) return cached;

    const available = resolvesModule(name, this.resolveFrom);
    this.resolvedModules.set(name, available);
    return available;
  }

  private firstExecutable(base: string): string | null {
    for (const ext of ['', ...this.extensions]) {
      const candidate = base + ext;
      if (isExecutableFile(candidate)) return candidate;
    }
    return null;
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function defaultSearchPath(): string {
  const override = process.env['WARDEN_PATH'];
  if (override !== undefined && override !== '') return override;
  return process.env['PATH'] ?? '';
}

function defaultPathExtensions(): ReadonlyArray<string> {
  if (process.platform !== 'win32') return [];
  return (process.env['PATHEXT'] ?? '.COM;.EXE;.BAT;.CMD')
    .split(';')
    .filter((ext) => ext !== '');
}

function isExecutableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) return false;
    if (process.platform !== 'win32') accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function resolvesModule(name: string, fromDir: string): boolean {
  try {
    createRequire(join(fromDir, 'package.json')).resolve(name);
    return true;
  } catch {
    return false;
  }
}
